import type { Angle } from "./angle.js";
import { Delta } from "./delta.js";
import { finite } from "./scalar.js";

export class Point {
  readonly x: number;
  readonly y: number;

  constructor(x: number, y: number) {
    this.x = finite(x, "x");
    this.y = finite(y, "y");
  }

  static origin(): Point {
    return new Point(0, 0);
  }

  add(delta: Delta): Point {
    return new Point(this.x + delta.dx, this.y + delta.dy);
  }

  sub(other: Point): Delta {
    return new Delta(this.x - other.x, this.y - other.y);
  }

  midpoint(other: Point): Point {
    return new Point((this.x + other.x) / 2, (this.y + other.y) / 2);
  }

  distance(other: Point): number {
    return this.sub(other).magnitude();
  }

  rotateAbout(center: Point, angle: Angle): Point {
    return center.add(this.sub(center).rotate(angle));
  }

  equals(other: Point): boolean {
    return this.x === other.x && this.y === other.y;
  }

  approxEquals(other: Point, epsilon = 1e-9): boolean {
    return Math.abs(this.x - other.x) <= epsilon && Math.abs(this.y - other.y) <= epsilon;
  }

  toString(): string {
    return `${this.x},${this.y}`;
  }
}
