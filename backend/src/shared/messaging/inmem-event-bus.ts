/**
 * src/shared/messaging/inmem-event-bus.ts
 *
 * WHY:
 * - Single-process delivery is all the service needs: external calls happen
 *   inline after commit, so request latency includes them.
 * - Holds subscriptions only; events are not retained after delivery.
 *
 * RULES:
 * - A throwing subscriber is logged and skipped; other subscribers still run.
 * - No retries.
 */

import { logger } from '../logger/logger';
import {
  isEventOfType,
  type DomainEvent,
  type DomainEventType,
  type EventBus,
  type EventHandler,
  type HandlerOutcome,
  NO_WARNINGS,
} from './events';

type Subscription = {
  type: DomainEventType;
  handle: (event: DomainEvent) => Promise<HandlerOutcome>;
};

export class InMemEventBus implements EventBus {
  private readonly subscriptions: Subscription[] = [];

  subscribe<T extends DomainEventType>(type: T, handler: EventHandler<T>): void {
    this.subscriptions.push({
      type,
      handle: (event) => (isEventOfType(event, type) ? handler(event) : Promise.resolve(NO_WARNINGS)),
    });
  }

  async publish(event: DomainEvent): Promise<HandlerOutcome> {
    const warnings: string[] = [];

    for (const sub of this.subscriptions) {
      if (sub.type !== event.type) continue;

      try {
        const outcome = await sub.handle(event);
        warnings.push(...outcome.warnings);
      } catch (err: unknown) {
        logger.error('events.subscriber_failed', {
          flow: 'events.publish',
          type: event.type,
          requestId: event.requestId,
          message: err instanceof Error ? err.message : String(err),
          stack: err instanceof Error ? err.stack : undefined,
        });
      }
    }

    return { warnings };
  }
}
