import type { Arc, ArcIntersection } from "./arc.js";
import type { Line, LineIntersection } from "./line.js";
import type { Tolerance } from "./tolerance.js";

export type Segment = Line | Arc;

export function intersect(a: Line, b: Line, tolerance?: Partial<Tolerance>): LineIntersection;
export function intersect(a: Line, b: Arc, tolerance?: Partial<Tolerance>): ArcIntersection;
export function intersect(a: Arc, b: Line, tolerance?: Partial<Tolerance>): ArcIntersection;
export function intersect(a: Arc, b: Arc, tolerance?: Partial<Tolerance>): never;
export function intersect(a: Segment, b: Segment, tolerance?: Partial<Tolerance>): LineIntersection | ArcIntersection;
export function intersect(a: Segment, b: Segment, tolerance?: Partial<Tolerance>): LineIntersection | ArcIntersection {
  if (a.kind === "line") {
    return b.kind === "line" ? a.intersect(b, tolerance) : b.intersect(a, tolerance);
  }
  if (b.kind === "line") {
    return a.intersect(b, tolerance);
  }
  // Throws: arc-arc intersection has no algorithm yet.
  return a.intersectArc(b);
}
