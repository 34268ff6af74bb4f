// ABOUTME: Series approximation coefficients for perturbation theory: δₙ ≈ Aₙ·δc + Bₙ·δc²
// ABOUTME: Lets each pixel skip the early iterations the polynomial already predicts

import type { ComplexStd, OrbitPoints, SeriesApproximation } from "./types";

/**
 * Relative size the quadratic term may reach before the series is no longer trusted:
 * |Bₙ|²·|δc|⁴ compared against ε·|Aₙ|²·|δc|², simplified to |B|²·|δc|² > ε·|A|².
 */
export const SERIES_TOLERANCE = 1e-6;

/**
 * Compute series coefficients from a completed orbit.
 *
 * Recurrence (complex arithmetic):
 *   A₀ = 1, B₀ = 0
 *   Aₙ₊₁ = 2·zₙ·Aₙ + 1
 *   Bₙ₊₁ = 2·zₙ·Bₙ + Aₙ²
 *
 * Validity is tested at each index before advancing. The first index that
 * breaches the tolerance fixes validIterations; later recovery is ignored.
 *
 * @param orbit - Orbit points z₀..zₙ₋₁
 * @param maxDeltaSquared - Largest |δc|² any pixel can have (screen or region diagonal squared)
 */
export function computeSeriesCoefficients(orbit: OrbitPoints, maxDeltaSquared: number): SeriesApproximation {
  const length = orbit.length;
  const z = orbit.points;
  const a = new Float64Array(length * 2);
  const b = new Float64Array(length * 2);

  if (length === 0) {
    return Object.freeze({ a, b, length, validIterations: 0 });
  }

  let aRe = 1;
  let aIm = 0;
  let bRe = 0;
  let bIm = 0;

  let validIterations = length;
  let breached = false;

  for (let i = 0; i < length; i++) {
    a[2 * i] = aRe;
    a[2 * i + 1] = aIm;
    b[2 * i] = bRe;
    b[2 * i + 1] = bIm;

    if (!breached) {
      const aMagSq = aRe * aRe + aIm * aIm;
      const bMagSq = bRe * bRe + bIm * bIm;
      if (bMagSq * maxDeltaSquared > SERIES_TOLERANCE * aMagSq) {
        validIterations = i;
        breached = true;
      }
    }

    const twoZRe = 2 * z[2 * i];
    const twoZIm = 2 * z[2 * i + 1];

    const nextARe = twoZRe * aRe - twoZIm * aIm + 1;
    const nextAIm = twoZRe * aIm + twoZIm * aRe;
    const nextBRe = twoZRe * bRe - twoZIm * bIm + (aRe * aRe - aIm * aIm);
    const nextBIm = twoZRe * bIm + twoZIm * bRe + 2 * aRe * aIm;

    aRe = nextARe;
    aIm = nextAIm;
    bRe = nextBRe;
    bIm = nextBIm;
  }

  // Never report an empty skip for a non-empty orbit. B₀ = 0 keeps index 0 from
  // breaching for any finite maxDeltaSquared, so this only guards degenerate inputs.
  if (validIterations === 0) {
    validIterations = Math.min(1, length);
  }

  return Object.freeze({ a, b, length, validIterations });
}

/**
 * Number of iterations a pixel may skip with this orbit, 0 without series.
 */
export function skipIterations(orbit: { readonly series: SeriesApproximation | null }): number {
  return orbit.series?.validIterations ?? 0;
}

/**
 * Initial delta after skipping: A[skip-1]·δc + B[skip-1]·δc².
 */
export function seedDelta(series: SeriesApproximation, skip: number, deltaC: ComplexStd): ComplexStd {
  if (skip < 1 || skip > series.length) {
    throw new RangeError(`seedDelta: skip ${skip} outside 1..${series.length}`);
  }
  const k = 2 * (skip - 1);
  const aRe = series.a[k];
  const aIm = series.a[k + 1];
  const bRe = series.b[k];
  const bIm = series.b[k + 1];

  const dcSqRe = deltaC.real * deltaC.real - deltaC.imag * deltaC.imag;
  const dcSqIm = 2 * deltaC.real * deltaC.imag;

  return {
    real: aRe * deltaC.real - aIm * deltaC.imag + (bRe * dcSqRe - bIm * dcSqIm),
    imag: aRe * deltaC.imag + aIm * deltaC.real + (bRe * dcSqIm + bIm * dcSqRe),
  };
}

/**
 * Read the A and B coefficient at an index.
 */
export function seriesCoefficients(series: SeriesApproximation, index: number): { a: ComplexStd; b: ComplexStd } {
  return {
    a: { real: series.a[2 * index], imag: series.a[2 * index + 1] },
    b: { real: series.b[2 * index], imag: series.b[2 * index + 1] },
  };
}
