import type { KnownTopic, TopicPayloadMap } from "./payloads.js";
import { Topics } from "./topics.js";

export type EventBusHandler<K extends KnownTopic> = (payload: TopicPayloadMap[K]) => void;

export type Unsubscribe = () => void;

/** A published event as middlewares see it. */
export type BusEvent = {
  topic: KnownTopic;
  payload: unknown;
};

/** Runs before delivery; calling `next` passes the event on, not calling it swallows the event. */
export type EventBusMiddleware = (event: BusEvent, next: () => void, bus: EventBus) => void;

type HandlerTable = { [K in KnownTopic]: Set<EventBusHandler<K>> };

export type EventBusOptions = {
  middlewares?: readonly EventBusMiddleware[];
};

/** Synchronous typed pub/sub over the diagnostics topics. */
export class EventBus {
  private readonly handlers: HandlerTable = {
    "offset:segment-dropped": new Set(),
    "offset:completed": new Set(),
    log: new Set()
  };
  private readonly middlewares: readonly EventBusMiddleware[];

  constructor(options: EventBusOptions = {}) {
    this.middlewares = [...(options.middlewares ?? [])];
  }

  subscribe<K extends KnownTopic>(topic: K, handler: EventBusHandler<K>): Unsubscribe {
    const handlers: Set<EventBusHandler<K>> = this.handlers[topic];
    handlers.add(handler);
    return () => {
      handlers.delete(handler);
    };
  }

  publish<K extends KnownTopic>(topic: K, payload: TopicPayloadMap[K]): void {
    const handlers: Set<EventBusHandler<K>> = this.handlers[topic];
    const deliver = () => {
      for (const handler of handlers) handler(payload);
    };

    const event: BusEvent = { topic, payload };
    const chain = this.middlewares.reduceRight<() => void>(
      (next, middleware) => () => middleware(event, next, this),
      deliver
    );
    chain();
  }
}

export function createEventBus(options?: EventBusOptions): EventBus {
  return new EventBus(options);
}

/**
 * Republishes every event on {@link Topics.LOG_EVENT} once its own handlers
 * have run. Log events themselves are never forwarded.
 */
export function createEventLoggerMiddleware(options: { ignoreTopics?: readonly KnownTopic[] } = {}): EventBusMiddleware {
  const ignored = new Set<KnownTopic>(options.ignoreTopics);
  ignored.add(Topics.LOG_EVENT);

  return (event, next, bus) => {
    next();
    if (ignored.has(event.topic)) return;
    bus.publish(Topics.LOG_EVENT, { topic: event.topic, payload: event.payload });
  };
}
