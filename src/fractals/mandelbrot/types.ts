// ABOUTME: Type definitions for reference orbits, series coefficients and complex values
// ABOUTME: Shared by the double and double-double orbit engines and the GPU packing layer

import type { DoubleDouble } from "./double-double";

/**
 * Standard precision complex number using JavaScript's native number type.
 * Used for view centers, deltas and the double-precision reference orbit.
 */
export type ComplexStd = {
  real: number;
  imag: number;
};

/**
 * Complex number with double-double components (~30 significant digits).
 * Used only for the double-double reference orbit.
 */
export type ComplexDD = {
  real: DoubleDouble;
  imag: DoubleDouble;
};

/**
 * Precision tier a reference orbit is computed at.
 */
export type PrecisionLevel = "double" | "doubleDouble";

/**
 * Anything that carries a packed orbit: `points` holds `length` complex values
 * interleaved as [re0, im0, re1, im1, ...].
 */
export type OrbitPoints = {
  readonly points: Float64Array;
  readonly length: number;
};

/**
 * Series approximation coefficients computed alongside a reference orbit.
 * δₙ ≈ Aₙ·δc + Bₙ·δc²
 */
export type SeriesApproximation = {
  /** A coefficients, interleaved like the orbit points */
  readonly a: Float64Array;
  /** B coefficients, interleaved like the orbit points */
  readonly b: Float64Array;
  /** Number of coefficient pairs (equals the orbit length) */
  readonly length: number;
  /** Largest iteration count the series may skip; never 0 for a non-empty orbit */
  readonly validIterations: number;
};

/**
 * Reference orbit data structure.
 * Snapshot of the orbit Z_0 = 0, Z_1, ..., Z_{length-1} for one reference point.
 * Never mutated after it is returned; a recompute produces a new one.
 */
export type ReferenceOrbit = OrbitPoints & {
  /** Point in the complex plane the orbit was computed for */
  readonly center: ComplexStd;
  /** Iteration whose value exceeded the escape threshold, or maxIterations */
  readonly escapeIteration: number;
  /** Whether the reference point escaped before maxIterations */
  readonly didEscape: boolean;
  /** Iteration budget the orbit was computed with */
  readonly maxIterations: number;
  /** Arithmetic the orbit was computed with (projected to double either way) */
  readonly precisionLevel: PrecisionLevel;
  /** Series coefficients, when computed */
  readonly series: SeriesApproximation | null;
};

/**
 * Double-double reference orbit. Same shape as ReferenceOrbit but the points
 * are kept at full double-double precision.
 */
export type ReferenceOrbitDD = {
  readonly center: ComplexDD;
  readonly points: readonly ComplexDD[];
  readonly escapeIteration: number;
  readonly didEscape: boolean;
  readonly maxIterations: number;
};
