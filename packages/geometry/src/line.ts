import { Angle, AngleDiff } from "./angle.js";
import { Delta } from "./delta.js";
import { fail, ok, type GeometryResult } from "./errors.js";
import type { Offsettable } from "./offset.js";
import { Point } from "./point.js";
import { HALF_PI, PI, finite } from "./scalar.js";
import { resolveTolerance, type Tolerance } from "./tolerance.js";

export type LineIntersection =
  | { kind: "none" }
  | { kind: "outOfBounds"; point: Point }
  | { kind: "onePoint"; point: Point }
  // Collinear overlap. No single point describes it, so none is carried.
  | { kind: "many" }
  | { kind: "manyOutOfBounds" };

/**
 * Bounded segment stored as the infinite line it lies on (direction plus
 * signed distance of that line from the origin) and a parameter interval
 * measured from the line's foot point. Offsetting perpendicular to the line
 * touches `distanceFromOrigin` only.
 *
 * `end < begin` describes a segment with negative length and no points. It is
 * never produced by {@link Line.new}; the offset re-stitch uses it to detect
 * segments consumed by a neighbouring join.
 */
export class Line implements Offsettable<Line> {
  readonly kind = "line" as const;
  readonly angle: Angle;
  readonly distanceFromOrigin: number;
  private readonly lower: number;
  private readonly upper: number;

  private constructor(angle: Angle, distanceFromOrigin: number, begin: number, end: number) {
    this.angle = angle;
    this.distanceFromOrigin = finite(distanceFromOrigin, "distance from origin");
    this.lower = finite(begin, "begin");
    this.upper = finite(end, "end");
  }

  static new(start: Point, stop: Point): GeometryResult<Line> {
    if (start.equals(stop)) {
      return fail("Start, stop points are the same");
    }

    const angle = stop.sub(start).angle();
    // Both endpoints in the line's own frame: x runs along the line, y is the offset from the origin.
    const d1 = start.sub(Point.origin()).rotate(angle.neg());
    const d2 = stop.sub(Point.origin()).rotate(angle.neg());

    if (d1.dx < d2.dx) {
      return ok(new Line(angle, d1.dy, d1.dx, d2.dx));
    }
    if (d2.dx < d1.dx) {
      return ok(new Line(angle.add(new AngleDiff(PI)), -d1.dy, -d1.dx, -d2.dx));
    }
    return fail("Start, stop points are too close to define a direction");
  }

  static fromPointAngle(start: Point, angle: Angle, length: number): GeometryResult<Line> {
    return Line.new(start, start.add(Delta.magnitudeAngle(length, angle)));
  }

  /** Same points, opposite direction. */
  reversed(): Line {
    return new Line(this.angle.add(new AngleDiff(PI)), -this.distanceFromOrigin, -this.upper, -this.lower);
  }

  begin(): number {
    return this.lower;
  }

  end(): number {
    return this.upper;
  }

  length(): number {
    return this.upper - this.lower;
  }

  pointNearestOrigin(): Point {
    return Point.origin().add(Delta.magnitudeAngle(this.distanceFromOrigin, this.angle.add(new AngleDiff(HALF_PI))));
  }

  apply(t: number): Point {
    return this.pointNearestOrigin().add(Delta.magnitudeAngle(t, this.angle));
  }

  pointAlong(signedDistance: number): Point {
    return this.apply(signedDistance);
  }

  applyBounded(t: number): Point | undefined {
    if (t >= this.lower && t <= this.upper) return this.apply(t);
    return undefined;
  }

  /** Coordinate of `point` along this line, measured from the foot point. */
  signedDistance(point: Point): number {
    return point.sub(this.pointNearestOrigin()).rotate(this.angle.neg()).dx;
  }

  start(): Point {
    return this.apply(this.lower);
  }

  stop(): Point {
    return this.apply(this.upper);
  }

  /** Moves the leading bound to `point`'s projection. */
  herefrom(point: Point): Line {
    return new Line(this.angle, this.distanceFromOrigin, this.signedDistance(point), this.upper);
  }

  /** Moves the trailing bound to `point`'s projection. */
  until(point: Point): Line {
    return new Line(this.angle, this.distanceFromOrigin, this.lower, this.signedDistance(point));
  }

  /**
   * Positive distances move the line to the right of its direction, so
   * counterclockwise polygons grow and clockwise ones shrink.
   */
  offset(distance: number): Line {
    return new Line(this.angle, this.distanceFromOrigin - distance, this.lower, this.upper);
  }

  intersect(other: Line, tolerance?: Partial<Tolerance>): LineIntersection {
    const tol = resolveTolerance(tolerance);
    const turn = other.angle.sub(this.angle).radians();
    const det = Math.sin(turn);

    if (Math.abs(det) <= tol.parallel) {
      return this.intersectParallel(other, Math.cos(turn) > 0, tol);
    }

    // Normal form: x*cos(n) + y*sin(n) = d, with n the left-hand normal of each line.
    const n1 = this.angle.radians() + HALF_PI;
    const n2 = other.angle.radians() + HALF_PI;
    const d1 = this.distanceFromOrigin;
    const d2 = other.distanceFromOrigin;
    const point = new Point(
      (d1 * Math.sin(n2) - d2 * Math.sin(n1)) / det,
      (d2 * Math.cos(n1) - d1 * Math.cos(n2)) / det
    );

    if (!this.contains(this.signedDistance(point), tol) || !other.contains(other.signedDistance(point), tol)) {
      return { kind: "outOfBounds", point };
    }
    return { kind: "onePoint", point };
  }

  private intersectParallel(other: Line, sameDirection: boolean, tol: Tolerance): LineIntersection {
    const otherDistance = sameDirection ? other.distanceFromOrigin : -other.distanceFromOrigin;
    if (Math.abs(this.distanceFromOrigin - otherDistance) > tol.distance) {
      return { kind: "none" };
    }

    // Same infinite line: mirror the other's bounds into this line's parameter when it runs backwards.
    const otherBegin = sameDirection ? other.lower : -other.upper;
    const otherEnd = sameDirection ? other.upper : -other.lower;

    if (this.lower > otherEnd + tol.distance || otherBegin > this.upper + tol.distance) {
      return { kind: "manyOutOfBounds" };
    }
    if (Math.abs(this.lower - otherEnd) <= tol.distance) {
      return { kind: "onePoint", point: this.start() };
    }
    if (Math.abs(otherBegin - this.upper) <= tol.distance) {
      return { kind: "onePoint", point: this.stop() };
    }
    return { kind: "many" };
  }

  private contains(t: number, tol: Tolerance): boolean {
    return t >= this.lower - tol.distance && t <= this.upper + tol.distance;
  }

  toString(): string {
    return `Line(${this.start()} -> ${this.stop()})`;
  }
}
