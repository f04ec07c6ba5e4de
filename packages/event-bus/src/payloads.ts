export type PointPayload = {
  x: number;
  y: number;
};

export type OffsetShapeKind = "polyline" | "polygon";

export type OffsetSegmentDroppedPayload = {
  shape: OffsetShapeKind;
  /** Index of the input edge whose offset segment was consumed by its neighbours. */
  edge: number;
  start: PointPayload;
  stop: PointPayload;
  distance: number;
};

export type OffsetCompletedPayload = {
  shape: OffsetShapeKind;
  inputVertices: number;
  outputVertices: number;
  droppedSegments: number;
  distance: number;
};

/** What the logger middleware republishes for every other event. */
export type LogEventPayload = {
  topic: KnownTopic;
  payload: unknown;
};

export type TopicPayloadMap = {
  "offset:segment-dropped": OffsetSegmentDroppedPayload;
  "offset:completed": OffsetCompletedPayload;
  log: LogEventPayload;
};

export type KnownTopic = keyof TopicPayloadMap;
