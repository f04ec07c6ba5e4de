import { Angle } from "./angle.js";
import { finite } from "./scalar.js";

/** 2D vector: the difference between two {@link Point}s. */
export class Delta {
  readonly dx: number;
  readonly dy: number;

  constructor(dx: number, dy: number) {
    this.dx = finite(dx, "dx");
    this.dy = finite(dy, "dy");
  }

  // Polar form: `magnitude` away, towards `angle`.
  static magnitudeAngle(magnitude: number, angle: Angle): Delta {
    const theta = angle.radians();
    return new Delta(magnitude * Math.cos(theta), magnitude * Math.sin(theta));
  }

  add(other: Delta): Delta {
    return new Delta(this.dx + other.dx, this.dy + other.dy);
  }

  sub(other: Delta): Delta {
    return new Delta(this.dx - other.dx, this.dy - other.dy);
  }

  scale(factor: number): Delta {
    return new Delta(this.dx * factor, this.dy * factor);
  }

  div(divisor: number): Delta {
    return new Delta(this.dx / divisor, this.dy / divisor);
  }

  neg(): Delta {
    return new Delta(-this.dx, -this.dy);
  }

  magnitude(): number {
    return Math.sqrt(this.dx * this.dx + this.dy * this.dy);
  }

  angle(): Angle {
    return Angle.of(this);
  }

  /**
   * Read as a point on a circle drawn around its origin: how far along that
   * circle, counterclockwise from (magnitude, 0), the point sits.
   */
  arcLength(): number {
    return this.magnitude() * this.angle().radians();
  }

  rotate(angle: Angle): Delta {
    const sin = Math.sin(angle.radians());
    const cos = Math.cos(angle.radians());
    return new Delta(this.dx * cos - this.dy * sin, this.dx * sin + this.dy * cos);
  }

  equals(other: Delta): boolean {
    return this.dx === other.dx && this.dy === other.dy;
  }

  toString(): string {
    return `${this.dx},${this.dy}`;
  }
}
