import { EventEnvelopeSchema } from '@expensox/shared';
import type { EventEnvelope } from '@expensox/shared';
import { logger, errorFields } from '../observability/logger';
import type { EventBus, EventHandler } from './bus';
import { DrizzleProcessedEventStore } from './processed-store';
import type { ProcessedEventStore } from './processed-store';

interface NamedHandler {
  handler: EventHandler;
  consumerName: string;
}

export interface DeadLetter {
  event: EventEnvelope;
  consumerName: string;
  error: Error;
  failedAt: string;
}

const HANDLER_TIMEOUT_MS = 30_000;
const MAX_CONCURRENT_HANDLERS = 10;

export interface InMemoryEventBusOptions {
  processedStore?: ProcessedEventStore;
  maxRetries?: number;
  /** Base delay for the quadratic backoff between attempts. */
  retryDelayMs?: number;
}

export class InMemoryEventBus implements EventBus {
  private handlers = new Map<string, NamedHandler[]>();
  private patternHandlers = new Map<string, NamedHandler[]>();
  private deadLetterQueue: DeadLetter[] = [];
  private processedStore: ProcessedEventStore;
  private maxRetries: number;
  private retryDelayMs: number;
  private running = false;

  constructor(options: InMemoryEventBusOptions = {}) {
    this.processedStore = options.processedStore ?? new DrizzleProcessedEventStore();
    this.maxRetries = options.maxRetries ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 100;
  }

  subscribe(eventType: string, handler: EventHandler, consumerName?: string): void {
    const existing = this.handlers.get(eventType) ?? [];
    const name = consumerName ?? `${eventType}:handler_${existing.length}`;
    existing.push({ handler, consumerName: name });
    this.handlers.set(eventType, existing);
  }

  subscribePattern(pattern: string, handler: EventHandler, consumerName?: string): void {
    const existing = this.patternHandlers.get(pattern) ?? [];
    const name = consumerName ?? `${pattern}:handler_${existing.length}`;
    existing.push({ handler, consumerName: name });
    this.patternHandlers.set(pattern, existing);
  }

  async publish(event: EventEnvelope): Promise<void> {
    EventEnvelopeSchema.parse(event);

    const handlers = this.getMatchingHandlers(event.eventType);

    for (let i = 0; i < handlers.length; i += MAX_CONCURRENT_HANDLERS) {
      const batch = handlers.slice(i, i + MAX_CONCURRENT_HANDLERS);
      await Promise.allSettled(
        batch.map(({ handler, consumerName }) =>
          this.dispatchWithRetry(event, handler, consumerName),
        ),
      );
    }
  }

  async start(): Promise<void> {
    this.running = true;
  }

  async stop(): Promise<void> {
    this.running = false;
  }

  isRunning(): boolean {
    return this.running;
  }

  getDeadLetterQueue(): DeadLetter[] {
    return [...this.deadLetterQueue];
  }

  clearDeadLetterQueue(): void {
    this.deadLetterQueue = [];
  }

  private getMatchingHandlers(eventType: string): NamedHandler[] {
    const result: NamedHandler[] = [...(this.handlers.get(eventType) ?? [])];

    for (const [pattern, handlers] of this.patternHandlers) {
      if (matchEventPattern(pattern, eventType)) {
        result.push(...handlers);
      }
    }

    return result;
  }

  private async dispatchWithRetry(
    event: EventEnvelope,
    handler: EventHandler,
    consumerName: string,
  ): Promise<void> {
    if (await this.processedStore.isProcessed(event.eventId, consumerName)) return;

    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      try {
        await runWithTimeout(handler(event), HANDLER_TIMEOUT_MS);
        await this.processedStore.markProcessed(event.eventId, consumerName, event.tenantId);
        return;
      } catch (error) {
        logger.warn('Event handler failed', {
          eventType: event.eventType,
          eventId: event.eventId,
          consumerName,
          attempt,
          maxRetries: this.maxRetries,
          error: errorFields(error),
        });

        if (attempt < this.maxRetries) {
          const delay = attempt * attempt * this.retryDelayMs;
          await new Promise((resolve) => setTimeout(resolve, delay));
        } else {
          this.deadLetterQueue.push({
            event,
            consumerName,
            error: error instanceof Error ? error : new Error(String(error)),
            failedAt: new Date().toISOString(),
          });
          logger.error('Event moved to dead letter queue', {
            eventType: event.eventType,
            eventId: event.eventId,
            consumerName,
          });
        }
      }
    }
  }
}

/** `expense.*` matches every event of the `expense` domain; anything else matches exactly. */
export function matchEventPattern(pattern: string, eventType: string): boolean {
  if (pattern.endsWith('.*')) {
    const prefix = pattern.slice(0, -2);
    return eventType.startsWith(prefix + '.');
  }
  return pattern === eventType;
}

async function runWithTimeout(promise: Promise<void>, ms: number): Promise<void> {
  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  try {
    await Promise.race([
      promise,
      new Promise<never>((_, reject) => {
        timeoutId = setTimeout(() => reject(new Error(`Handler timeout after ${ms}ms`)), ms);
      }),
    ]);
  } finally {
    if (timeoutId) clearTimeout(timeoutId);
  }
}
