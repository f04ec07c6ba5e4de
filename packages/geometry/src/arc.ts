import { Angle, AngleDiff } from "./angle.js";
import { Delta } from "./delta.js";
import { UnsupportedOperationError, fail, ok, type GeometryResult } from "./errors.js";
import { Line } from "./line.js";
import type { Offsettable } from "./offset.js";
import type { Point } from "./point.js";
import { HALF_PI, PI, TWO_PI, finite, mod } from "./scalar.js";
import { resolveTolerance, type Tolerance } from "./tolerance.js";

const ANGLE_EPSILON = 1e-12;

export type ArcIntersectionPoint =
  | { kind: "inBounds"; point: Point }
  | { kind: "inArcBounds"; point: Point }
  | { kind: "inLineBounds"; point: Point }
  | { kind: "outOfBounds"; point: Point };

export type ArcIntersection =
  | { kind: "none" }
  | { kind: "one"; point: ArcIntersectionPoint }
  | { kind: "two"; points: [ArcIntersectionPoint, ArcIntersectionPoint] };

function classify(onLine: boolean, onArc: boolean, point: Point): ArcIntersectionPoint {
  if (onLine && onArc) return { kind: "inBounds", point };
  if (onArc) return { kind: "inArcBounds", point };
  if (onLine) return { kind: "inLineBounds", point };
  return { kind: "outOfBounds", point };
}

/**
 * Circular arc stored as center, signed radius, start direction and signed
 * sweep. Offsetting changes the radius only; start and stop points are always
 * derived. A negative radius (an inset past the center) places every point on
 * the opposite side of the center and flips the sign of `begin`, `end` and
 * `length`.
 */
export class Arc implements Offsettable<Arc> {
  readonly kind = "arc" as const;
  readonly center: Point;
  readonly radius: number;
  readonly stopDiff: AngleDiff;
  private readonly startDirection: Angle;

  constructor(center: Point, radius: number, startAngle: Angle, stopDiff: AngleDiff) {
    this.center = center;
    this.radius = finite(radius, "radius");
    this.startDirection = startAngle;
    this.stopDiff = stopDiff;
  }

  /**
   * Arc from `start` to `stop` leaving `start` in direction `angle`.
   *
   * The center is where the perpendicular to the tangent at `start` meets the
   * perpendicular bisector of the chord; by the tangent-chord angle the sweep
   * is twice the turn from the tangent to the chord.
   */
  static new(start: Point, stop: Point, angle: Angle): GeometryResult<Arc> {
    if (start.equals(stop)) {
      return fail("Start, stop points are the same");
    }

    const quarter = new AngleDiff(HALF_PI);
    const chordAngle = stop.sub(start).angle();
    const startPerpendicular = Line.fromPointAngle(start, angle.add(quarter), 1);
    const midpointPerpendicular = Line.fromPointAngle(start.midpoint(stop), chordAngle.add(quarter), 1);
    if (!startPerpendicular.ok) return fail(startPerpendicular.error.message);
    if (!midpointPerpendicular.ok) return fail(midpointPerpendicular.error.message);

    const crossing = startPerpendicular.value.intersect(midpointPerpendicular.value);
    if (crossing.kind !== "onePoint" && crossing.kind !== "outOfBounds") {
      return fail("Undefinable circular arc");
    }

    const center = crossing.point;
    const startDelta = start.sub(center);
    return ok(new Arc(center, startDelta.magnitude(), startDelta.angle(), chordAngle.sub(angle).scale(2)));
  }

  /** Overspecified: `stop` must lie on the circle through `start`, within tolerance. */
  static fromCenter(center: Point, start: Point, stop: Point, tolerance?: Partial<Tolerance>): GeometryResult<Arc> {
    const tol = resolveTolerance(tolerance);
    const startDelta = start.sub(center);
    const stopDelta = stop.sub(center);
    const radius = startDelta.magnitude();
    if (radius <= tol.distance || Math.abs(radius - stopDelta.magnitude()) > tol.distance) {
      return fail("Undefinable circular arc");
    }

    const startAngle = startDelta.angle();
    return ok(new Arc(center, radius, startAngle, stopDelta.angle().sub(startAngle)));
  }

  startAngle(): Angle {
    return this.startDirection;
  }

  stopAngle(): Angle {
    return this.startDirection.add(this.stopDiff);
  }

  begin(): number {
    return this.startDirection.radians() * this.radius;
  }

  end(): number {
    return (this.startDirection.radians() + this.stopDiff.radians()) * this.radius;
  }

  length(): number {
    return this.stopDiff.radians() * this.radius;
  }

  applyAngle(angle: Angle): Point {
    return this.center.add(Delta.magnitudeAngle(this.radius, angle));
  }

  apply(t: number): Point {
    if (this.radius === 0) return this.center;
    return this.applyAngle(Angle.fromRadians(t / this.radius));
  }

  applyBounded(t: number): Point | undefined {
    const lo = Math.min(this.begin(), this.end());
    const hi = Math.max(this.begin(), this.end());
    if (t >= lo && t <= hi) return this.apply(t);
    return undefined;
  }

  signedDistance(point: Point): number {
    return point.sub(this.center).angle().radians() * this.radius;
  }

  start(): Point {
    return this.applyAngle(this.startAngle());
  }

  stop(): Point {
    return this.applyAngle(this.stopAngle());
  }

  /** True when `angle`, measured as the arc's own parameter, lies inside the signed sweep. */
  containsAngle(angle: Angle, epsilon = ANGLE_EPSILON): boolean {
    const sweep = this.stopDiff.radians();
    const from = this.startDirection.radians();
    const along = sweep >= 0 ? mod(angle.radians() - from, TWO_PI) : mod(from - angle.radians(), TWO_PI);
    return along <= Math.abs(sweep) + epsilon || along >= TWO_PI - epsilon;
  }

  sweepFlag(): boolean {
    return this.stopDiff.radians() > 0;
  }

  largeArcFlag(): boolean {
    return Math.abs(this.stopDiff.radians()) > PI;
  }

  /**
   * Where the tangents at `start()` and `stop()` meet, or null when they are
   * parallel (half circles, empty sweeps).
   */
  controlPoint(): Point | null {
    const quarter = new AngleDiff(HALF_PI);
    const startTangent = Line.fromPointAngle(this.start(), this.startAngle().add(quarter), 1);
    const stopTangent = Line.fromPointAngle(this.stop(), this.stopAngle().add(quarter), 1);
    if (!startTangent.ok || !stopTangent.ok) return null;

    const crossing = startTangent.value.intersect(stopTangent.value);
    if (crossing.kind === "onePoint" || crossing.kind === "outOfBounds") return crossing.point;
    return null;
  }

  curveSize(): number | null {
    const control = this.controlPoint();
    return control ? this.start().distance(control) : null;
  }

  offset(distance: number): Arc {
    return new Arc(this.center, this.radius + distance, this.startDirection, this.stopDiff);
  }

  /**
   * Solves a*t^2 + 2b*t + c = 0 for the line parameter t of the crossings
   * with this arc's circle, then checks each root against the segment bounds
   * and the arc's sweep.
   */
  intersect(line: Line, tolerance?: Partial<Tolerance>): ArcIntersection {
    const tol = resolveTolerance(tolerance);
    const delta = line.pointNearestOrigin().sub(this.center);
    const direction = Delta.magnitudeAngle(1, line.angle);

    const a = direction.dx * direction.dx + direction.dy * direction.dy;
    const b = delta.dx * direction.dx + delta.dy * direction.dy;
    const c = delta.dx * delta.dx + delta.dy * delta.dy - this.radius * this.radius;

    const radicand = b * b - a * c;
    const band = tol.distance * Math.max(1, Math.abs(this.radius));
    if (radicand < -band) {
      return { kind: "none" };
    }

    const onLine = (t: number) => t >= line.begin() - tol.distance && t <= line.end() + tol.distance;

    if (radicand <= band) {
      const t = -b / a;
      const point = line.apply(t);
      const inBounds = onLine(t) && this.containsAngle(this.parameterAngle(point));
      return { kind: "one", point: inBounds ? { kind: "inBounds", point } : { kind: "outOfBounds", point } };
    }

    const root = Math.sqrt(radicand);
    const t1 = (-b + root) / a;
    const t2 = (-b - root) / a;
    const p1 = line.apply(t1);
    const p2 = line.apply(t2);

    return {
      kind: "two",
      points: [
        classify(onLine(t1), this.containsAngle(this.parameterAngle(p1)), p1),
        classify(onLine(t2), this.containsAngle(this.parameterAngle(p2)), p2)
      ]
    };
  }

  intersectArc(_other: Arc): never {
    throw new UnsupportedOperationError("Arc-arc intersection");
  }

  // With a negative radius the point at parameter angle θ sits at θ + PI around the center.
  private parameterAngle(point: Point): Angle {
    return this.radius < 0 ? this.center.sub(point).angle() : point.sub(this.center).angle();
  }

  toString(): string {
    return `Arc(${this.center}, r=${this.radius}, ${this.startDirection} +${this.stopDiff})`;
  }
}
