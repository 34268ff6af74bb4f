// ABOUTME: Double-double reference orbit for zooms past the reach of double precision
// ABOUTME: Same iteration as the double orbit with every operation in ComplexDD arithmetic

import { addDD, ddToStd, magnitudeSquaredDD, squareDD, ZERO_DD } from "./dd-math";
import { DoubleDouble } from "./double-double";
import { assertIterationBudget, attachSeries, createReferenceOrbit, ESCAPE_RADIUS_SQUARED } from "./reference-orbit";
import type { ComplexDD, ReferenceOrbit, ReferenceOrbitDD } from "./types";

const ESCAPE_THRESHOLD_DD = new DoubleDouble(ESCAPE_RADIUS_SQUARED);

/**
 * Calculate a reference orbit in double-double precision.
 *
 * Iterates Z₀ = 0, Zₙ₊₁ = Zₙ² + center, recording Zₙ before the update,
 * until |Z|² > 65536 or maxIterations points are stored.
 */
export function computeReferenceOrbitDD(center: ComplexDD, maxIterations: number): ReferenceOrbitDD {
  assertIterationBudget(maxIterations);

  const points: ComplexDD[] = [];
  let z: ComplexDD = ZERO_DD;

  for (let i = 0; i < maxIterations; i++) {
    points.push(z);
    z = addDD(squareDD(z), center);

    if (magnitudeSquaredDD(z).gt(ESCAPE_THRESHOLD_DD)) {
      return Object.freeze({
        center,
        points: Object.freeze(points),
        escapeIteration: i + 1,
        didEscape: true,
        maxIterations,
      });
    }
  }

  return Object.freeze({
    center,
    points: Object.freeze(points),
    escapeIteration: maxIterations,
    didEscape: false,
    maxIterations,
  });
}

/**
 * Project a double-double orbit down to double precision for packing.
 * Lossy: only the nearest double of each point survives.
 *
 * @param maxDeltaSquared - When given, series coefficients are computed on the projected orbit
 */
export function projectOrbitDD(orbitDD: ReferenceOrbitDD, maxDeltaSquared?: number): ReferenceOrbit {
  const length = orbitDD.points.length;
  const points = new Float64Array(length * 2);
  for (let i = 0; i < length; i++) {
    const z = orbitDD.points[i];
    points[2 * i] = z.real.toNumber();
    points[2 * i + 1] = z.imag.toNumber();
  }

  const orbit = createReferenceOrbit({
    center: ddToStd(orbitDD.center),
    points,
    length,
    escapeIteration: orbitDD.escapeIteration,
    didEscape: orbitDD.didEscape,
    maxIterations: orbitDD.maxIterations,
    precisionLevel: "doubleDouble",
  });

  return maxDeltaSquared === undefined ? orbit : attachSeries(orbit, maxDeltaSquared);
}
