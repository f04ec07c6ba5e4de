export type Tolerance = {
  /** Absolute distance below which two lengths or positions are considered equal. */
  distance: number;
  /** Threshold on |sin(Δangle)| below which two lines are treated as parallel. */
  parallel: number;
};

export const DEFAULT_TOLERANCE: Readonly<Tolerance> = { distance: 1e-9, parallel: 1e-12 };

export function resolveTolerance(tolerance?: Partial<Tolerance>): Tolerance {
  return {
    distance: Math.max(0, tolerance?.distance ?? DEFAULT_TOLERANCE.distance),
    parallel: Math.max(0, tolerance?.parallel ?? DEFAULT_TOLERANCE.parallel)
  };
}
