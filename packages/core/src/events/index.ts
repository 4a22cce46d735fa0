import type { EventBus } from './bus';
import type { OutboxWriter } from './outbox';
import { InMemoryEventBus } from './in-memory-bus';
import { DrizzleOutboxWriter } from './outbox-writer';
import { OutboxWorker } from './outbox-worker';
import { logger } from '../observability/logger';

let eventBus: EventBus | null = null;
let outboxWorker: OutboxWorker | null = null;
let outboxWriter: OutboxWriter | null = null;

export function getEventBus(): EventBus {
  if (!eventBus) {
    eventBus = new InMemoryEventBus();
  }
  return eventBus;
}

export function setEventBus(bus: EventBus): void {
  eventBus = bus;
}

export function getOutboxWriter(): OutboxWriter {
  if (!outboxWriter) {
    outboxWriter = new DrizzleOutboxWriter();
  }
  return outboxWriter;
}

export function setOutboxWriter(writer: OutboxWriter): void {
  outboxWriter = writer;
}

export function getOutboxWorker(): OutboxWorker {
  if (!outboxWorker) {
    outboxWorker = new OutboxWorker({ eventBus: getEventBus() });
  }
  return outboxWorker;
}

export function setOutboxWorker(worker: OutboxWorker): void {
  outboxWorker = worker;
}

export async function initializeEventSystem(): Promise<void> {
  await getEventBus().start();
  await getOutboxWorker().start();
  logger.info('Event system initialized');
}

export async function shutdownEventSystem(): Promise<void> {
  await getOutboxWorker().stop();
  await getEventBus().stop();
  logger.info('Event system shut down');
}

export type { EventHandler, EventBus } from './bus';
export type { OutboxWriter } from './outbox';
export { InMemoryEventBus, matchEventPattern } from './in-memory-bus';
export type { DeadLetter, InMemoryEventBusOptions } from './in-memory-bus';
export {
  DrizzleProcessedEventStore,
  MemoryProcessedEventStore,
} from './processed-store';
export type { ProcessedEventStore } from './processed-store';
export { DrizzleOutboxWriter } from './outbox-writer';
export { OutboxWorker } from './outbox-worker';
export { buildEvent, buildEventFromContext } from './build-event';
export { publishWithOutbox, publishEventsOnly } from './publish-with-outbox';
export { registerModuleEvents } from './register';
export type {
  EventRegistration,
  PatternRegistration,
  ModuleEventRegistration,
} from './register';
