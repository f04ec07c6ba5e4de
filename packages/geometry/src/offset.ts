import type { EventBus } from "@planar/event-bus";
import type { Tolerance } from "./tolerance.js";

/**
 * Perpendicular translation by a signed distance. For lines and polygons a
 * positive distance moves to the right-hand side of the direction of travel;
 * for arcs it moves away from the center.
 */
export interface Offsettable<T> {
  offset(distance: number): T;
}

export type OffsetOptions = {
  tolerance?: Partial<Tolerance>;
  /** Receives `offset:segment-dropped` and `offset:completed` diagnostics. */
  bus?: EventBus;
};

export function offset<T>(shape: Offsettable<T>, distance: number): T {
  return shape.offset(distance);
}
