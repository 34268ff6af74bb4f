import { computeSeriesCoefficients } from "./series-approximation";
import type { ComplexStd, PrecisionLevel, ReferenceOrbit, SeriesApproximation } from "./types";

/**
 * Escape threshold on |Z|². Matches the GPU kernels so smooth coloring agrees
 * between the reference and the per-pixel iteration.
 */
export const ESCAPE_RADIUS_SQUARED = 65536;

/** Largest iteration budget an orbit may be allocated for */
export const MAX_ORBIT_ITERATIONS = 1 << 24;

/** Fraction of the view scale the center may drift before the orbit is stale */
export const DEFAULT_DRIFT_THRESHOLD = 0.1;

/**
 * Validate an iteration budget before any buffer is allocated.
 * An oversized budget is a configuration error, not something to recover from.
 */
export function assertIterationBudget(maxIterations: number): void {
  if (!Number.isInteger(maxIterations) || maxIterations < 0) {
    throw new RangeError(`ReferenceOrbit: maxIterations must be a non-negative integer, got ${maxIterations}`);
  }
  if (maxIterations > MAX_ORBIT_ITERATIONS) {
    throw new RangeError(
      `ReferenceOrbit: maxIterations ${maxIterations} exceeds the orbit allocation limit of ${MAX_ORBIT_ITERATIONS}`
    );
  }
}

/**
 * Freeze an orbit snapshot. Only the record is frozen; typed arrays cannot be,
 * and nothing writes to them after this point.
 */
export function createReferenceOrbit(fields: {
  center: ComplexStd;
  points: Float64Array;
  length: number;
  escapeIteration: number;
  didEscape: boolean;
  maxIterations: number;
  precisionLevel: PrecisionLevel;
  series?: SeriesApproximation | null;
}): ReferenceOrbit {
  return Object.freeze({
    ...fields,
    center: Object.freeze({ ...fields.center }),
    series: fields.series ?? null,
  });
}

/**
 * Calculate the reference orbit for perturbation theory in double precision.
 *
 * Iterates Z₀ = 0, Zₙ₊₁ = Zₙ² + center, recording each Zₙ before it is
 * updated, until |Z|² > 65536 (escaped) or maxIterations points are stored.
 *
 * @param center - Reference point (typically the viewport center)
 * @param maxIterations - Maximum number of iterations to compute
 * @returns Orbit snapshot; escapeIteration is i+1 when the update at step i escaped
 */
export function computeReferenceOrbit(center: ComplexStd, maxIterations: number): ReferenceOrbit {
  assertIterationBudget(maxIterations);

  const buffer = new Float64Array(maxIterations * 2);
  const cRe = center.real;
  const cIm = center.imag;

  let zRe = 0;
  let zIm = 0;
  let length = 0;

  for (let i = 0; i < maxIterations; i++) {
    buffer[2 * i] = zRe;
    buffer[2 * i + 1] = zIm;
    length = i + 1;

    const nextRe = zRe * zRe - zIm * zIm + cRe;
    const nextIm = 2 * zRe * zIm + cIm;
    zRe = nextRe;
    zIm = nextIm;

    if (zRe * zRe + zIm * zIm > ESCAPE_RADIUS_SQUARED) {
      return createReferenceOrbit({
        center,
        points: buffer.slice(0, length * 2),
        length,
        escapeIteration: i + 1,
        didEscape: true,
        maxIterations,
        precisionLevel: "double",
      });
    }
  }

  return createReferenceOrbit({
    center,
    points: buffer,
    length,
    escapeIteration: maxIterations,
    didEscape: false,
    maxIterations,
    precisionLevel: "double",
  });
}

/**
 * Compute the reference orbit and its series coefficients.
 * The coefficients are derived from the completed orbit.
 *
 * @param screenDiagonalSquared - Largest |δc|² for any pixel on screen
 */
export function computeReferenceOrbitWithSeries(
  center: ComplexStd,
  maxIterations: number,
  screenDiagonalSquared: number
): ReferenceOrbit {
  return attachSeries(computeReferenceOrbit(center, maxIterations), screenDiagonalSquared);
}

/**
 * Return a copy of the orbit snapshot with series coefficients attached.
 */
export function attachSeries(orbit: ReferenceOrbit, maxDeltaSquared: number): ReferenceOrbit {
  return createReferenceOrbit({ ...orbit, series: computeSeriesCoefficients(orbit, maxDeltaSquared) });
}

/**
 * Read orbit point Zᵢ.
 */
export function orbitPoint(orbit: ReferenceOrbit, index: number): ComplexStd {
  if (index < 0 || index >= orbit.length) {
    throw new RangeError(`orbitPoint: index ${index} outside 0..${orbit.length - 1}`);
  }
  return { real: orbit.points[2 * index], imag: orbit.points[2 * index + 1] };
}

/**
 * Squared diagonal of the view in the complex plane: the largest |δc|² any
 * pixel can have relative to a reference inside the view.
 */
export function screenDiagonalSquared(scale: number, aspect: number): number {
  const width = scale * aspect;
  return width * width + scale * scale;
}

/**
 * Whether the view has moved far enough from the orbit's reference point
 * that the orbit should be recomputed.
 *
 * @param driftThreshold - Allowed drift as a fraction of the scale
 */
export function needsReferenceRecompute(
  orbit: { readonly center: ComplexStd } | null,
  viewCenter: ComplexStd,
  scale: number,
  driftThreshold: number = DEFAULT_DRIFT_THRESHOLD
): boolean {
  if (!orbit) {
    return true;
  }
  const driftRe = viewCenter.real - orbit.center.real;
  const driftIm = viewCenter.imag - orbit.center.imag;
  return Math.sqrt(driftRe * driftRe + driftIm * driftIm) > scale * driftThreshold;
}
