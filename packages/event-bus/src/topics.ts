import type { KnownTopic } from "./payloads.js";

export const Topics = {
  OFFSET_SEGMENT_DROPPED: "offset:segment-dropped",
  OFFSET_COMPLETED: "offset:completed",
  LOG_EVENT: "log"
} as const satisfies Record<string, KnownTopic>;
