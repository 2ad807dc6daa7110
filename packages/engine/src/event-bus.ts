import type { EngineEvent, EngineEventType, EventUnsubscribe } from "../../shared/src/index";
import { normalizeError } from "../../core/src/index";
import type { EngineLogger } from "./logger";

export type EngineEventListener = (event: Readonly<EngineEvent>) => void;

export interface EventFilter {
  types?: readonly EngineEventType[];
  requestId?: string;
}

export interface EventBus {
  subscribe(listener: EngineEventListener, filter?: EventFilter): EventUnsubscribe;
  emit(event: EngineEvent): void;
}

interface Subscription {
  listener: EngineEventListener;
  filter?: EventFilter;
  queue: EngineEvent[];
  scheduled: boolean;
  active: boolean;
}

const matches = (filter: EventFilter | undefined, event: EngineEvent): boolean => {
  if (!filter) {
    return true;
  }

  if (filter.types && !filter.types.includes(event.type)) {
    return false;
  }

  if (filter.requestId !== undefined) {
    return "requestId" in event && event.requestId === filter.requestId;
  }

  return true;
};

/**
 * Events reach each subscriber asynchronously and in emission order, so
 * everything emitted for one request arrives in order.
 */
export class InMemoryEventBus implements EventBus {
  private readonly subscriptions = new Set<Subscription>();

  constructor(private readonly logger: EngineLogger) {}

  subscribe(listener: EngineEventListener, filter?: EventFilter): EventUnsubscribe {
    const subscription: Subscription = {
      listener,
      filter,
      queue: [],
      scheduled: false,
      active: true
    };
    this.subscriptions.add(subscription);

    return () => {
      subscription.active = false;
      subscription.queue.length = 0;
      this.subscriptions.delete(subscription);
    };
  }

  emit(event: EngineEvent): void {
    const frozen = Object.freeze({ ...event });
    for (const subscription of this.subscriptions) {
      if (!matches(subscription.filter, frozen)) {
        continue;
      }

      subscription.queue.push(frozen);
      this.schedule(subscription);
    }
  }

  get subscriberCount(): number {
    return this.subscriptions.size;
  }

  private schedule(subscription: Subscription): void {
    if (subscription.scheduled) {
      return;
    }

    subscription.scheduled = true;
    setImmediate(() => {
      subscription.scheduled = false;
      this.flush(subscription);
    });
  }

  private flush(subscription: Subscription): void {
    while (subscription.active && subscription.queue.length > 0) {
      const event = subscription.queue.shift();
      if (!event) {
        break;
      }

      try {
        subscription.listener(event);
      } catch (error) {
        this.logger.warn("[EventBus] listener failed", {
          eventType: event.type,
          reason: normalizeError(error)
        });
      }
    }
  }
}
