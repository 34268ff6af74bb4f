// ABOUTME: Packs orbits, series coefficients and region metadata into the float buffers the GPU kernels read
// ABOUTME: Doubles crossing into float32 buffers are split into (hi, lo) pairs

import type { ComplexStd, ReferenceOrbit, SeriesApproximation } from "@/fractals/mandelbrot/types";

/** A double carried as two float32 values whose sum recovers ~48 bits */
export type FloatPair = readonly [hi: number, lo: number];

/**
 * Split a double into high and low float32 components.
 * hi is the value rounded to float precision, lo the remainder, also rounded.
 */
export function splitDouble(value: number): FloatPair {
  const hi = Math.fround(value);
  const lo = Math.fround(value - hi);
  return [hi, lo];
}

/**
 * Interleaved complex doubles → interleaved float32: [re0, im0, re1, im1, ...].
 */
export function packComplexPoints(points: Float64Array, count: number): Float32Array {
  return new Float32Array(points.subarray(0, count * 2));
}

export function packOrbit(orbit: ReferenceOrbit): Float32Array {
  return packComplexPoints(orbit.points, orbit.length);
}

/**
 * Pack A and B coefficients up to validIterations; the kernels never read past the skip point.
 */
export function packSeries(series: SeriesApproximation): { a: Float32Array; b: Float32Array } {
  const count = series.validIterations;
  return {
    a: packComplexPoints(series.a, count),
    b: packComplexPoints(series.b, count),
  };
}

/**
 * Normalized screen rectangle, 0..1 on both axes.
 */
export type RegionBounds = {
  readonly minX: number;
  readonly minY: number;
  readonly maxX: number;
  readonly maxY: number;
};

export type RegionLayout = {
  readonly bounds: RegionBounds;
  readonly center: ComplexStd;
  readonly orbitOffset: number;
  readonly orbitLength: number;
  readonly skipIterations: number;
};

/** [minX, minY, maxX, maxY] per region */
export function packRegionBounds(regions: readonly RegionLayout[]): Float32Array {
  const data = new Float32Array(regions.length * 4);
  regions.forEach((region, i) => {
    data[i * 4] = region.bounds.minX;
    data[i * 4 + 1] = region.bounds.minY;
    data[i * 4 + 2] = region.bounds.maxX;
    data[i * 4 + 3] = region.bounds.maxY;
  });
  return data;
}

/** [real_hi, real_lo, imag_hi, imag_lo] per region */
export function packRegionCenters(regions: readonly RegionLayout[]): Float32Array {
  const data = new Float32Array(regions.length * 4);
  regions.forEach((region, i) => {
    const [realHi, realLo] = splitDouble(region.center.real);
    const [imagHi, imagLo] = splitDouble(region.center.imag);
    data[i * 4] = realHi;
    data[i * 4 + 1] = realLo;
    data[i * 4 + 2] = imagHi;
    data[i * 4 + 3] = imagLo;
  });
  return data;
}

/** [offset, length, skipIterations, padding] per region */
export function packRegionOffsets(regions: readonly RegionLayout[]): Uint32Array {
  const data = new Uint32Array(regions.length * 4);
  regions.forEach((region, i) => {
    data[i * 4] = region.orbitOffset;
    data[i * 4 + 1] = region.orbitLength;
    data[i * 4 + 2] = region.skipIterations;
  });
  return data;
}

/**
 * Parameters for the single-reference perturbation kernels.
 */
export interface PerturbationParams {
  referenceCenterHiLo: [realHi: number, realLo: number, imagHi: number, imagLo: number];
  viewCenterHiLo: [realHi: number, realLo: number, imagHi: number, imagLo: number];
  scaleHiLo: FloatPair;
  scaleAspectHiLo: FloatPair;
  width: number;
  height: number;
  maxIterations: number;
  orbitLength: number;
  skipIterations: number;
}

/**
 * Parameters for the multi-reference kernel.
 */
export interface MultiReferenceParams {
  viewCenterHiLo: [realHi: number, realLo: number, imagHi: number, imagLo: number];
  scaleHiLo: FloatPair;
  scaleAspectHiLo: FloatPair;
  width: number;
  height: number;
  maxIterations: number;
  regionCount: number;
}

function splitComplex(z: ComplexStd): [number, number, number, number] {
  const [realHi, realLo] = splitDouble(z.real);
  const [imagHi, imagLo] = splitDouble(z.imag);
  return [realHi, realLo, imagHi, imagLo];
}

export function createPerturbationParams(input: {
  referenceCenter: ComplexStd;
  viewCenter: ComplexStd;
  scale: number;
  width: number;
  height: number;
  maxIterations: number;
  orbitLength: number;
  skipIterations?: number;
}): PerturbationParams {
  const aspect = input.width / input.height;
  return {
    referenceCenterHiLo: splitComplex(input.referenceCenter),
    viewCenterHiLo: splitComplex(input.viewCenter),
    scaleHiLo: splitDouble(input.scale),
    scaleAspectHiLo: splitDouble(input.scale * aspect),
    width: input.width,
    height: input.height,
    maxIterations: input.maxIterations,
    orbitLength: input.orbitLength,
    skipIterations: input.skipIterations ?? 0,
  };
}

export function createMultiReferenceParams(input: {
  viewCenter: ComplexStd;
  scale: number;
  width: number;
  height: number;
  maxIterations: number;
  regionCount: number;
}): MultiReferenceParams {
  const aspect = input.width / input.height;
  return {
    viewCenterHiLo: splitComplex(input.viewCenter),
    scaleHiLo: splitDouble(input.scale),
    scaleAspectHiLo: splitDouble(input.scale * aspect),
    width: input.width,
    height: input.height,
    maxIterations: input.maxIterations,
    regionCount: input.regionCount,
  };
}
