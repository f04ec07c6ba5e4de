import type { Delta } from "./delta.js";
import { PreconditionError } from "./errors.js";
import { PI, TWO_PI, finite, mod } from "./scalar.js";

export enum Direction {
  None = "none",
  Clockwise = "clockwise",
  Counterclockwise = "counterclockwise"
}

/**
 * Shortest signed rotation equivalent to `radians`, in (-PI, PI].
 */
function shortest(radians: number): number {
  return PI - mod(PI - radians, TWO_PI);
}

/**
 * Rotation value kept in [0, 2PI). Two angles never add together; they
 * compose through {@link AngleDiff}.
 */
export class Angle {
  private constructor(private readonly value: number) {}

  /** Strict constructor: the caller normalizes, nothing wraps here. */
  static new(theta: number): Angle {
    finite(theta, "angle");
    if (theta < 0 || theta >= TWO_PI) {
      throw new PreconditionError(`angle must be in [0, 2PI), got ${theta}`);
    }
    return new Angle(theta);
  }

  static fromRadians(theta: number): Angle {
    return new Angle(mod(finite(theta, "angle"), TWO_PI));
  }

  static of(delta: Delta): Angle {
    return Angle.fromRadians(Math.atan2(delta.dy, delta.dx));
  }

  static fromDiff(diff: AngleDiff): Angle {
    return Angle.fromRadians(diff.radians());
  }

  radians(): number {
    return this.value;
  }

  degrees(): number {
    return (this.value * 180) / PI;
  }

  add(diff: AngleDiff): Angle {
    return Angle.fromRadians(this.value + diff.radians());
  }

  // ((a - b + PI) mod 2PI) - PI, with the -PI boundary reported as +PI
  sub(other: Angle): AngleDiff {
    return new AngleDiff(shortest(this.value - other.value));
  }

  neg(): Angle {
    return Angle.fromRadians(TWO_PI - this.value);
  }

  equals(other: Angle): boolean {
    return mod(this.value, TWO_PI) === mod(other.value, TWO_PI);
  }

  approxEquals(other: Angle, epsilon = 1e-9): boolean {
    return Math.abs(other.sub(this).radians()) <= epsilon;
  }

  /**
   * Direction of the shortest rotation from this angle to `other`.
   * Exactly opposite (and coincident) angles have no preferred direction.
   */
  direction(other: Angle): Direction {
    const diff = other.sub(this).radians();
    if (diff === 0 || diff === PI) return Direction.None;
    return diff > 0 ? Direction.Counterclockwise : Direction.Clockwise;
  }

  between(start: Angle, stop: Angle): boolean {
    return start.direction(this) === start.direction(stop);
  }

  toString(): string {
    return `${this.value} (${this.degrees()}deg)`;
  }
}

/**
 * Signed rotation. Arithmetic keeps it inside (-2PI, 2PI) by convention; the
 * constructor does not enforce a range.
 */
export class AngleDiff {
  private readonly value: number;

  constructor(radians: number) {
    this.value = finite(radians, "angle difference");
  }

  static fromAngle(angle: Angle): AngleDiff {
    return new AngleDiff(angle.radians());
  }

  radians(): number {
    return this.value;
  }

  neg(): AngleDiff {
    return new AngleDiff(-this.value);
  }

  add(other: AngleDiff): AngleDiff {
    return new AngleDiff(this.value + other.value);
  }

  scale(factor: number): AngleDiff {
    return new AngleDiff(this.value * factor);
  }

  toString(): string {
    return `${this.value} (${(this.value * 180) / PI}deg)`;
  }
}
