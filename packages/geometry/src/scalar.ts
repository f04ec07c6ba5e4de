import { PreconditionError } from "./errors.js";

export const PI = Math.PI;
export const TWO_PI = Math.PI * 2;
export const HALF_PI = Math.PI / 2;

// Every coordinate, bound and radius is stored through this; NaN and ±Infinity never get in.
export function finite(value: number, label = "value"): number {
  if (!Number.isFinite(value)) {
    throw new PreconditionError(`${label} must be finite, got ${value}`);
  }
  return value;
}

// Euclidean remainder, always in [0, modulus).
export function mod(value: number, modulus: number): number {
  const r = ((value % modulus) + modulus) % modulus;
  return r >= modulus ? 0 : r;
}
