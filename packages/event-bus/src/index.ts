export type {
  KnownTopic,
  LogEventPayload,
  OffsetCompletedPayload,
  OffsetSegmentDroppedPayload,
  OffsetShapeKind,
  PointPayload,
  TopicPayloadMap
} from "./payloads.js";
export type { BusEvent, EventBus, EventBusHandler, EventBusMiddleware, EventBusOptions, Unsubscribe } from "./eventBus.js";
export { createEventBus, createEventLoggerMiddleware } from "./eventBus.js";
export { Topics } from "./topics.js";
