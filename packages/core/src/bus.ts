import { v7 as uuidv7 } from "uuid";
import { WayfarerError } from "@wayfarer/types";
import type {
  EventBus,
  EventFilter,
  EventHandler,
  Logger,
  Subscription,
  TravelEvent,
} from "@wayfarer/types";

/**
 * In-memory implementation of the Wayfarer Event Bus.
 * Handler failures are logged and never reach the publisher.
 */
export class InMemoryEventBus implements EventBus {
  private subscribers = new Set<{
    filter: EventFilter;
    handler: EventHandler<unknown>;
    id: string;
  }>();

  constructor(private readonly log?: Logger) {}

  async publish<T>(event: TravelEvent<T>): Promise<void> {
    const promises: Promise<void>[] = [];

    for (const sub of this.subscribers) {
      if (!this.matches(event, sub.filter)) continue;
      try {
        const result = sub.handler(event);
        if (result instanceof Promise) {
          promises.push(result);
        }
      } catch (err) {
        this.handlerFailed(event, err);
      }
    }

    const settled = await Promise.allSettled(promises);
    for (const outcome of settled) {
      if (outcome.status === "rejected") this.handlerFailed(event, outcome.reason);
    }
  }

  subscribe<T>(filter: EventFilter, handler: EventHandler<T>): Subscription {
    const id = uuidv7();
    const sub = { filter, handler: handler as EventHandler<unknown>, id };
    this.subscribers.add(sub);

    return {
      id,
      unsubscribe: () => {
        this.subscribers.delete(sub);
      },
    };
  }

  waitFor<T>(filter: EventFilter, timeoutMs: number): Promise<TravelEvent<T>> {
    return new Promise((resolve, reject) => {
      const timeout = setTimeout(() => {
        sub.unsubscribe();
        reject(new WayfarerError("TIMEOUT", `No event matched within ${timeoutMs}ms`));
      }, timeoutMs);

      const sub = this.subscribe<T>(filter, (event) => {
        clearTimeout(timeout);
        sub.unsubscribe();
        resolve(event);
      });
    });
  }

  /** Number of live subscriptions. */
  get size(): number {
    return this.subscribers.size;
  }

  private matches(event: TravelEvent, filter: EventFilter): boolean {
    if (filter.topics && filter.topics.length > 0 && !filter.topics.includes(event.topic)) {
      return false;
    }
    if (filter.sessionId && event.sessionId !== filter.sessionId) {
      return false;
    }
    if (filter.predicate && !filter.predicate(event)) {
      return false;
    }
    return true;
  }

  private handlerFailed(event: TravelEvent, err: unknown): void {
    this.log?.error("Event handler failed", {
      topic: event.topic,
      eventId: event.id,
      error: err instanceof Error ? err.message : String(err),
    });
  }
}
