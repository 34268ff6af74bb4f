// ABOUTME: CPU perturbation iteration mirroring the GPU kernels, with optional series skip and glitch detection
// ABOUTME: Produces per-pixel glitch flag buffers in the layout the glitch detector reads

import { pixelToDeltaC } from "@/lib/coordinates";
import { ESCAPE_RADIUS_SQUARED } from "./reference-orbit";
import { seedDelta } from "./series-approximation";
import type { ComplexStd, ReferenceOrbit } from "./types";

/** Relative size |δ|² may reach against |Z|² before the pixel is flagged as glitched */
export const GLITCH_TOLERANCE = 1e-6;

/** Below this |Z|² the glitch test is skipped (Z₀ = 0 and near-zero crossings) */
export const GLITCH_MIN_REFERENCE_MAGNITUDE_SQUARED = 1e-20;

export type PerturbationOptions = {
  /** Start from the series estimate when the orbit carries usable coefficients */
  useSeries?: boolean;
  /** Record the first iteration at which the delta outgrew the reference */
  detectGlitches?: boolean;
};

export type PerturbationResult = {
  /** Iteration at which the pixel escaped, or maxIterations */
  iterations: number;
  escaped: boolean;
  /** First glitched iteration, 0 when none was seen (or detection was off) */
  glitchIteration: number;
  /** Full z value at the last iteration, for smooth coloring */
  finalZ: ComplexStd;
};

/**
 * Iterate one pixel against a reference orbit.
 *
 * Algorithm:
 * - Zₙ + δₙ is the pixel's orbit, Zₙ from the reference
 * - δₙ₊₁ = 2·Zₙ·δₙ + δₙ² + δc
 * - Escape when |Zₙ + δₙ|² > 65536
 * - With series: δ starts at A[skip-1]·δc + B[skip-1]·δc² and the loop
 *   starts at index skip instead of 0
 * - When the reference runs out the pixel rebases onto Z₀ with δ = z
 *
 * @param referenceOrbit - Orbit snapshot (possibly stale relative to the view)
 * @param deltaC - Offset of the pixel from the orbit's reference point
 * @param maxIterations - Maximum iterations to compute
 */
export function iteratePerturbation(
  referenceOrbit: ReferenceOrbit,
  deltaC: ComplexStd,
  maxIterations: number,
  options: PerturbationOptions = {}
): PerturbationResult {
  const x = referenceOrbit.points;
  const lastRef = referenceOrbit.length - 1;

  let deltaRe = 0;
  let deltaIm = 0;
  let iteration = 0;
  let ref = 0;
  let glitchIteration = 0;
  let zRe = 0;
  let zIm = 0;

  if (lastRef < 0) {
    return { iterations: maxIterations, escaped: false, glitchIteration, finalZ: { real: 0, imag: 0 } };
  }

  const series = referenceOrbit.series;
  if (options.useSeries && series && series.validIterations > 1) {
    // The seed is δ at index skip, which must still have a reference point
    const skip = Math.min(series.validIterations, maxIterations, lastRef);
    if (skip >= 1) {
      const seed = seedDelta(series, skip, deltaC);
      deltaRe = seed.real;
      deltaIm = seed.imag;
      iteration = skip;
      ref = skip;
    }
  }

  while (iteration < maxIterations) {
    const xRe = x[2 * ref];
    const xIm = x[2 * ref + 1];
    zRe = xRe + deltaRe;
    zIm = xIm + deltaIm;

    if (zRe * zRe + zIm * zIm > ESCAPE_RADIUS_SQUARED) {
      return { iterations: iteration, escaped: true, glitchIteration, finalZ: { real: zRe, imag: zIm } };
    }

    if (options.detectGlitches && glitchIteration === 0) {
      const refMagSq = xRe * xRe + xIm * xIm;
      const deltaMagSq = deltaRe * deltaRe + deltaIm * deltaIm;
      if (refMagSq > GLITCH_MIN_REFERENCE_MAGNITUDE_SQUARED && deltaMagSq > GLITCH_TOLERANCE * refMagSq) {
        glitchIteration = iteration;
      }
    }

    let stepRe = xRe;
    let stepIm = xIm;
    if (ref >= lastRef) {
      // Reference exhausted: continue from Z₀ = 0 with the full value as delta
      deltaRe = zRe;
      deltaIm = zIm;
      ref = 0;
      stepRe = 0;
      stepIm = 0;
    }

    // δₙ₊₁ = 2·Zₙ·δₙ + δₙ² + δc
    const nextRe = 2 * (stepRe * deltaRe - stepIm * deltaIm) + (deltaRe * deltaRe - deltaIm * deltaIm) + deltaC.real;
    const nextIm = 2 * (stepRe * deltaIm + stepIm * deltaRe) + 2 * deltaRe * deltaIm + deltaC.imag;
    deltaRe = nextRe;
    deltaIm = nextIm;

    ref++;
    iteration++;

    if (ref > lastRef) {
      // A one-point reference has no Z₁: fold the reference point into δ and iterate directly from Z₀
      deltaRe += referenceOrbit.center.real;
      deltaIm += referenceOrbit.center.imag;
      ref = 0;
    }
  }

  return { iterations: maxIterations, escaped: false, glitchIteration, finalZ: { real: zRe, imag: zIm } };
}

export type ViewGeometry = {
  center: ComplexStd;
  scale: number;
  width: number;
  height: number;
};

/**
 * Produce the per-pixel glitch buffer the GPU glitch kernels write:
 * flags[y * width + x] is the first glitched iteration, or 0.
 */
export function computeGlitchFlags(
  referenceOrbit: ReferenceOrbit,
  view: ViewGeometry,
  maxIterations: number,
  options: Omit<PerturbationOptions, "detectGlitches"> = {}
): Uint32Array {
  const { width, height } = view;
  const flags = new Uint32Array(width * height);

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const deltaC = pixelToDeltaC({ x, y }, width, height, view.center, referenceOrbit.center, view.scale);
      const result = iteratePerturbation(referenceOrbit, deltaC, maxIterations, { ...options, detectGlitches: true });
      flags[y * width + x] = result.glitchIteration;
    }
  }

  return flags;
}
