import { Topics, type EventBus, type OffsetShapeKind } from "@planar/event-bus";
import { GeometryError, PreconditionError, UnsupportedOperationError } from "./errors.js";
import { Line } from "./line.js";
import type { OffsetOptions, Offsettable } from "./offset.js";
import type { Point } from "./point.js";
import { finite } from "./scalar.js";
import { resolveTolerance, type Tolerance } from "./tolerance.js";

type Accepted = { line: Line; edge: number };

type StitchContext = {
  shape: OffsetShapeKind;
  distance: number;
  tolerance: Tolerance;
  bus?: EventBus;
  dropped: number;
};

function edgeBetween(a: Point, b: Point, index: number): Line {
  const line = Line.new(a, b);
  if (!line.ok) {
    throw new PreconditionError(`vertex ${index} coincides with the next vertex: ${line.error.message}`);
  }
  return line.value;
}

function vertexAt(points: readonly Point[], index: number): Point {
  const point = points[index];
  if (!point) throw new PreconditionError(`no vertex at index ${index}`);
  return point;
}

function curveSize(before: number, after: number, size: number): number {
  return Math.min(Math.min(before, after) / 2, size);
}

function checkCurveSize(size: number): number {
  finite(size, "curve size");
  if (size < 0) throw new PreconditionError(`curve size must not be negative, got ${size}`);
  return size;
}

/**
 * Where two consecutive offset edges meet, or undefined when `prev` cannot
 * reach `next`: the lines are distinct parallels, or `next` runs back along
 * `prev` (the offset closed a notch between them).
 */
function joinPoint(prev: Line, next: Line, tolerance: Tolerance): Point | undefined {
  const turn = next.angle.sub(prev.angle).radians();
  if (Math.abs(Math.sin(turn)) <= tolerance.parallel && Math.cos(turn) < 0) {
    return undefined;
  }

  const crossing = prev.intersect(next, tolerance);
  switch (crossing.kind) {
    case "onePoint":
    case "outOfBounds":
      return crossing.point;
    case "many":
    case "manyOutOfBounds":
      // Collinear neighbours: they already meet where the next one starts.
      return next.start();
    case "none":
      return undefined;
  }
}

// Shorter than the distance tolerance counts as consumed; keeping it would emit coincident vertices.
function consumed(line: Line, ctx: StitchContext): boolean {
  return line.length() <= ctx.tolerance.distance;
}

function reportDropped(ctx: StitchContext, dropped: Accepted): void {
  ctx.dropped++;
  ctx.bus?.publish(Topics.OFFSET_SEGMENT_DROPPED, {
    shape: ctx.shape,
    edge: dropped.edge,
    start: dropped.line.start(),
    stop: dropped.line.stop(),
    distance: ctx.distance
  });
}

/**
 * Joins `next` onto the stack of accepted lines. The previous line is clipped
 * to the join; when it cannot reach the join, or the clip leaves nothing of
 * it, it was consumed by the offset, so it is popped and the join retried
 * against the one before it. Every pop shrinks the stack, so the loop ends.
 */
function stitch(accepted: Accepted[], next: Accepted, ctx: StitchContext): void {
  let prev = accepted[accepted.length - 1];
  while (prev) {
    const point = joinPoint(prev.line, next.line, ctx.tolerance);
    const clipped = point && prev.line.until(point);
    if (point && clipped && !consumed(clipped, ctx)) {
      accepted[accepted.length - 1] = { line: clipped, edge: prev.edge };
      accepted.push({ line: next.line.herefrom(point), edge: next.edge });
      return;
    }
    accepted.pop();
    reportDropped(ctx, prev);
    prev = accepted[accepted.length - 1];
  }
  accepted.push(next);
}

/** Joins the last accepted line back onto the first, dropping lines consumed at either end. */
function closeLoop(accepted: Accepted[], ctx: StitchContext): void {
  for (;;) {
    const first = accepted[0];
    const last = accepted[accepted.length - 1];
    if (!first || !last || accepted.length < 3) {
      throw new GeometryError(`offset by ${ctx.distance} collapses the polygon`);
    }

    const point = joinPoint(last.line, first.line, ctx.tolerance);
    const clipped = point && last.line.until(point);
    if (!point || !clipped || consumed(clipped, ctx)) {
      accepted.pop();
      reportDropped(ctx, last);
      continue;
    }
    const opened = first.line.herefrom(point);
    if (consumed(opened, ctx)) {
      accepted.shift();
      reportDropped(ctx, first);
      continue;
    }

    accepted[accepted.length - 1] = { line: clipped, edge: last.edge };
    accepted[0] = { line: opened, edge: first.edge };
    return;
  }
}

/** The last line only had its leading bound moved; drop it when that left nothing. */
function trimTail(accepted: Accepted[], ctx: StitchContext): void {
  let last = accepted[accepted.length - 1];
  while (last && accepted.length > 1 && consumed(last.line, ctx)) {
    accepted.pop();
    reportDropped(ctx, last);
    last = accepted[accepted.length - 1];
  }
}

function context(shape: OffsetShapeKind, distance: number, options: OffsetOptions): StitchContext {
  return {
    shape,
    distance: finite(distance, "offset distance"),
    tolerance: resolveTolerance(options.tolerance),
    bus: options.bus,
    dropped: 0
  };
}

function reportCompleted(ctx: StitchContext, inputVertices: number, outputVertices: number): void {
  ctx.bus?.publish(Topics.OFFSET_COMPLETED, {
    shape: ctx.shape,
    inputVertices,
    outputVertices,
    droppedSegments: ctx.dropped,
    distance: ctx.distance
  });
}

/** Open chain of at least two points. */
export class Polyline implements Offsettable<Polyline> {
  private readonly vertices: readonly Point[];

  constructor(points: readonly Point[]) {
    if (points.length < 2) {
      throw new PreconditionError(`a polyline needs at least 2 points, got ${points.length}`);
    }
    this.vertices = [...points];
  }

  points(): readonly Point[] {
    return this.vertices;
  }

  start(): Point {
    return vertexAt(this.vertices, 0);
  }

  stop(): Point {
    return vertexAt(this.vertices, this.vertices.length - 1);
  }

  *segments(): Generator<Line> {
    for (let i = 0; i + 1 < this.vertices.length; i++) {
      yield edgeBetween(vertexAt(this.vertices, i), vertexAt(this.vertices, i + 1), i);
    }
  }

  /**
   * Moves every edge `distance` to its right and re-stitches the corners.
   * Segments consumed by a tight inner corner are dropped, so the result may
   * have fewer points than the input.
   */
  offset(distance: number, options: OffsetOptions = {}): Polyline {
    const ctx = context("polyline", distance, options);
    const accepted: Accepted[] = [];
    let edge = 0;
    for (const line of this.segments()) {
      stitch(accepted, { line: line.offset(ctx.distance), edge }, ctx);
      edge++;
    }
    trimTail(accepted, ctx);

    const last = accepted[accepted.length - 1];
    if (!last) throw new GeometryError(`offset by ${ctx.distance} left no segments`);

    const points = accepted.map((entry) => entry.line.start());
    points.push(last.line.stop());
    reportCompleted(ctx, this.vertices.length, points.length);
    return new Polyline(points);
  }

  /** Fillet size per interior vertex, capped at half the shorter adjacent edge. */
  curve(size: number): Polyarc {
    checkCurveSize(size);
    const lengths = Array.from(this.segments(), (line) => line.length());
    const sizes: number[] = [];
    for (let i = 1; i < lengths.length; i++) {
      sizes.push(curveSize(lengths[i - 1] ?? 0, lengths[i] ?? 0, size));
    }
    return new Polyarc(this, sizes);
  }

  toString(): string {
    return `Polyline(${this.vertices.join(" ")})`;
  }
}

/** Closed loop of at least three points; the last point connects back to the first. */
export class Polygon implements Offsettable<Polygon> {
  private readonly vertices: readonly Point[];

  constructor(points: readonly Point[]) {
    if (points.length < 3) {
      throw new PreconditionError(`a polygon needs at least 3 points, got ${points.length}`);
    }
    this.vertices = [...points];
  }

  points(): readonly Point[] {
    return this.vertices;
  }

  start(): Point {
    return vertexAt(this.vertices, 0);
  }

  // The loop closes where it started.
  stop(): Point {
    return this.start();
  }

  *segments(): Generator<Line> {
    const count = this.vertices.length;
    for (let i = 0; i < count; i++) {
      yield edgeBetween(vertexAt(this.vertices, i), vertexAt(this.vertices, (i + 1) % count), i);
    }
  }

  /**
   * Moves every edge `distance` to its right (outwards for counterclockwise
   * polygons) and re-stitches the corners, closing the loop against the
   * first edge. Throws a {@link GeometryError} when the offset collapses the
   * polygon entirely.
   */
  offset(distance: number, options: OffsetOptions = {}): Polygon {
    const ctx = context("polygon", distance, options);
    const accepted: Accepted[] = [];
    let edge = 0;
    for (const line of this.segments()) {
      stitch(accepted, { line: line.offset(ctx.distance), edge }, ctx);
      edge++;
    }
    closeLoop(accepted, ctx);

    const points = accepted.map((entry) => entry.line.start());
    reportCompleted(ctx, this.vertices.length, points.length);
    return new Polygon(points);
  }

  /**
   * Fillet size per vertex; index i is the corner at vertex i, so index 0
   * sits between the closing edge and the first edge.
   */
  curve(size: number): Polycurve {
    checkCurveSize(size);
    const lengths = Array.from(this.segments(), (line) => line.length());
    const sizes = lengths.map((length, i) => curveSize(lengths[(i + lengths.length - 1) % lengths.length] ?? 0, length, size));
    return new Polycurve(this, sizes);
  }

  toString(): string {
    return `Polygon(${this.vertices.join(" ")})`;
  }
}

/** Polyline plus a fillet size for each interior vertex (two fewer than the points). */
export class Polyarc implements Offsettable<Polyarc> {
  private readonly sizes: readonly number[];

  constructor(readonly polyline: Polyline, curveSizes: readonly number[]) {
    const expected = polyline.points().length - 2;
    if (curveSizes.length !== expected) {
      throw new PreconditionError(`a polyarc needs ${expected} curve sizes, got ${curveSizes.length}`);
    }
    this.sizes = curveSizes.map(checkCurveSize);
  }

  curveSizes(): readonly number[] {
    return this.sizes;
  }

  points(): readonly Point[] {
    return this.polyline.points();
  }

  start(): Point {
    return this.polyline.start();
  }

  stop(): Point {
    return this.polyline.stop();
  }

  // Convex corners would have to become true offset arcs while concave ones stay sharp.
  offset(_distance: number): never {
    throw new UnsupportedOperationError("Offsetting a polyarc");
  }
}

/** Polygon plus a fillet size for every vertex. */
export class Polycurve implements Offsettable<Polycurve> {
  private readonly sizes: readonly number[];

  constructor(readonly polygon: Polygon, curveSizes: readonly number[]) {
    const expected = polygon.points().length;
    if (curveSizes.length !== expected) {
      throw new PreconditionError(`a polycurve needs ${expected} curve sizes, got ${curveSizes.length}`);
    }
    this.sizes = curveSizes.map(checkCurveSize);
  }

  curveSizes(): readonly number[] {
    return this.sizes;
  }

  points(): readonly Point[] {
    return this.polygon.points();
  }

  start(): Point {
    return this.polygon.start();
  }

  stop(): Point {
    return this.polygon.stop();
  }

  offset(_distance: number): never {
    throw new UnsupportedOperationError("Offsetting a polycurve");
  }
}
