/**
 * Programmer error: a value broke an invariant the caller was responsible for
 * (non-finite scalar, angle out of range, too few vertices). Always thrown.
 */
export class PreconditionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PreconditionError";
  }
}

/**
 * Recoverable degeneracy, e.g. an arc that cannot be defined from its inputs.
 * Fallible constructors return it inside a {@link GeometryResult} instead of throwing.
 */
export class GeometryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "GeometryError";
  }
}

export class UnsupportedOperationError extends Error {
  constructor(operation: string) {
    super(`${operation} is not supported`);
    this.name = "UnsupportedOperationError";
  }
}

export type GeometryResult<T> = { ok: true; value: T } | { ok: false; error: GeometryError };

export function ok<T>(value: T): GeometryResult<T> {
  return { ok: true, value };
}

export function fail<T>(message: string): GeometryResult<T> {
  return { ok: false, error: new GeometryError(message) };
}

export function unwrap<T>(result: GeometryResult<T>): T {
  if (!result.ok) throw result.error;
  return result.value;
}
