import { logger } from '../observability/logger';
import type { EventBus, EventHandler } from './bus';

export type EventRegistration = {
  eventType: string;
  consumerName: string;
  handler: EventHandler;
};

export type PatternRegistration = {
  pattern: string;
  consumerName: string;
  handler: EventHandler;
};

export interface ModuleEventRegistration {
  exact?: EventRegistration[];
  patterns?: PatternRegistration[];
}

export function registerModuleEvents(
  bus: EventBus,
  moduleName: string,
  registration: ModuleEventRegistration,
): void {
  for (const reg of registration.exact ?? []) {
    const stableConsumerName = `${moduleName}/${reg.consumerName}`;
    bus.subscribe(reg.eventType, reg.handler, stableConsumerName);
    logger.debug('Registered consumer', { consumer: stableConsumerName, eventType: reg.eventType });
  }

  for (const reg of registration.patterns ?? []) {
    const stableConsumerName = `${moduleName}/${reg.consumerName}`;
    bus.subscribePattern(reg.pattern, reg.handler, stableConsumerName);
    logger.debug('Registered pattern consumer', { consumer: stableConsumerName, pattern: reg.pattern });
  }
}
