import { silentLogger, type Logger } from "../../infra/observability/logger.js";

export type DomainEvent = {
  name: string;
  aggregateId: string;
  occurredAt: Date;
};

export type DomainEventHandler = (event: DomainEvent) => Promise<void> | void;

/**
 * In-process dispatch of committed domain events. Delivery is best effort:
 * a failing handler is logged and the remaining handlers still run.
 */
export class DomainEventPublisher {
  private readonly handlers = new Map<string, DomainEventHandler[]>();
  private readonly catchAll: DomainEventHandler[] = [];
  private readonly logger: Logger;

  constructor(deps: { logger?: Logger } = {}) {
    this.logger = deps.logger ?? silentLogger;
  }

  subscribe(eventName: string, handler: DomainEventHandler): void {
    const current = this.handlers.get(eventName) ?? [];
    current.push(handler);
    this.handlers.set(eventName, current);
  }

  subscribeAll(handler: DomainEventHandler): void {
    this.catchAll.push(handler);
  }

  async publish(events: readonly DomainEvent[]): Promise<void> {
    for (const event of events) {
      const handlers = [...(this.handlers.get(event.name) ?? []), ...this.catchAll];
      for (const handler of handlers) {
        try {
          await handler(event);
        } catch (error) {
          this.logger.error("domain_event_handler_failed", {
            event_name: event.name,
            aggregate_id: event.aggregateId,
            error,
          });
        }
      }
    }
  }
}

export function logDomainEvents(publisher: DomainEventPublisher, logger: Logger): void {
  publisher.subscribeAll((event) => {
    logger.info("domain_event", {
      event_name: event.name,
      aggregate_id: event.aggregateId,
      occurred_at: event.occurredAt.toISOString(),
    });
  });
}
