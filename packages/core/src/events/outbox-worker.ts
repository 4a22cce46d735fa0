import { EventEnvelopeSchema } from '@expensox/shared';
import { createAdminClient, sql } from '@expensox/db';
import { logger, errorFields } from '../observability/logger';
import type { EventBus } from './bus';

type ClaimedRow = {
  id: string;
  payload: unknown;
  event_type: string;
  event_id: string;
};

export class OutboxWorker {
  private running = false;
  private processing = false;
  private pollIntervalMs: number;
  private batchSize: number;
  private eventBus: EventBus;
  private pollTimer: ReturnType<typeof setTimeout> | null = null;
  private consecutiveErrors = 0;
  private static readonly MAX_BACKOFF_MS = 30_000;
  private static readonly STALE_CLAIM_THRESHOLD_MINUTES = 10;
  private static readonly MIN_INTER_BATCH_MS = 200;

  constructor(options: {
    eventBus: EventBus;
    pollIntervalMs?: number;
    batchSize?: number;
  }) {
    this.eventBus = options.eventBus;
    this.pollIntervalMs = options.pollIntervalMs ?? 2_000;
    this.batchSize = options.batchSize ?? 20;
  }

  async start(): Promise<void> {
    this.running = true;
    logger.info('Outbox worker started', {
      pollIntervalMs: this.pollIntervalMs,
      batchSize: this.batchSize,
    });
    this.schedule(this.pollIntervalMs);
  }

  async stop(): Promise<void> {
    this.running = false;
    if (this.pollTimer) {
      clearTimeout(this.pollTimer);
      this.pollTimer = null;
    }
    logger.info('Outbox worker stopped');
  }

  isRunning(): boolean {
    return this.running;
  }

  private schedule(delayMs: number): void {
    this.pollTimer = setTimeout(() => {
      void this.poll();
    }, delayMs);
  }

  private async poll(): Promise<void> {
    if (!this.running) return;

    if (this.processing) {
      this.schedule(this.pollIntervalMs);
      return;
    }

    try {
      this.processing = true;
      await this.recoverStaleClaims();
      const published = await this.processBatch();
      this.consecutiveErrors = 0;
      this.schedule(published > 0 ? OutboxWorker.MIN_INTER_BATCH_MS : this.pollIntervalMs);
    } catch (error) {
      this.consecutiveErrors++;
      logger.error('Outbox worker error', {
        consecutiveErrors: this.consecutiveErrors,
        error: errorFields(error),
      });
      const backoff = Math.min(
        this.pollIntervalMs * Math.pow(2, this.consecutiveErrors - 1),
        OutboxWorker.MAX_BACKOFF_MS,
      );
      this.schedule(backoff);
    } finally {
      this.processing = false;
    }
  }

  /** Releases rows claimed by a worker that died before delivering them. */
  private async recoverStaleClaims(): Promise<void> {
    const recovered = await createAdminClient().execute<{ id: string }>(sql`
      UPDATE event_outbox
      SET published_at = NULL
      WHERE published_at IS NOT NULL
        AND published_at < NOW() - make_interval(mins => ${OutboxWorker.STALE_CLAIM_THRESHOLD_MINUTES})
      RETURNING id
    `);

    if (recovered.length > 0) {
      logger.warn('Recovered stale outbox claims', { count: recovered.length });
    }
  }

  /**
   * Claims a batch in one statement, delivers it outside any transaction and
   * deletes the delivered rows. Failed rows stay claimed until stale recovery.
   */
  async processBatch(): Promise<number> {
    const admin = createAdminClient();
    const claimed = await admin.execute<ClaimedRow>(sql`
      WITH batch AS (
        SELECT id
        FROM event_outbox
        WHERE published_at IS NULL
        ORDER BY created_at ASC
        LIMIT ${this.batchSize}
        FOR UPDATE SKIP LOCKED
      )
      UPDATE event_outbox
      SET published_at = NOW()
      FROM batch
      WHERE event_outbox.id = batch.id
      RETURNING event_outbox.id, event_outbox.payload, event_outbox.event_type, event_outbox.event_id
    `);

    if (claimed.length === 0) return 0;

    const deliveredIds: string[] = [];

    for (const row of claimed) {
      try {
        const event = EventEnvelopeSchema.parse(row.payload);
        await this.eventBus.publish(event);
        deliveredIds.push(row.id);
      } catch (error) {
        logger.error('Failed to publish outbox event', {
          outboxId: row.id,
          eventType: row.event_type,
          eventId: row.event_id,
          error: errorFields(error),
        });
      }
    }

    if (deliveredIds.length > 0) {
      const idList = sql.join(deliveredIds.map((id) => sql`${id}`), sql`, `);
      await admin.execute(sql`DELETE FROM event_outbox WHERE id IN (${idList})`);
      logger.debug('Outbox batch delivered', { count: deliveredIds.length });
    }

    return deliveredIds.length;
  }
}
