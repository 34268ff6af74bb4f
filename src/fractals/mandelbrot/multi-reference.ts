// ABOUTME: Splits the view into an N×N grid with one reference orbit per cell
// ABOUTME: Keeps every pixel close to its own reference so deltas stay small at extreme zoom

import {
  packComplexPoints,
  packRegionBounds,
  packRegionCenters,
  packRegionOffsets,
  type RegionBounds,
} from "@/fractals/render/gpu-packing";
import { normalizedToComplex } from "@/lib/coordinates";
import type { PerformanceMonitor } from "@/lib/performance-monitor";
import { resolveCenter } from "./conversions";
import { addDD, createComplexDD } from "./dd-math";
import { assertIterationBudget, computeReferenceOrbitWithSeries, screenDiagonalSquared } from "./reference-orbit";
import { computeReferenceOrbitDD, projectOrbitDD } from "./reference-orbit-dd";
import { skipIterations } from "./series-approximation";
import type { ComplexDD, ComplexStd, PrecisionLevel, ReferenceOrbit } from "./types";

/**
 * One cell of the partition and where its data sits in the combined buffers.
 */
export type ReferenceRegion = {
  readonly bounds: RegionBounds;
  readonly center: ComplexStd;
  /** First point of this region's orbit in the combined orbit buffer */
  readonly orbitOffset: number;
  readonly orbitLength: number;
  /** First coefficient of this region's series in the combined A/B buffers */
  readonly seriesOffset: number;
  readonly skipIterations: number;
};

/**
 * Packed float32 buffers for the multi-reference kernel.
 */
export type MultiReferenceBuffers = {
  readonly orbits: Float32Array;
  readonly seriesA: Float32Array;
  readonly seriesB: Float32Array;
  readonly bounds: Float32Array;
  readonly centers: Float32Array;
  readonly offsets: Uint32Array;
};

export type MultiReferenceOptions = {
  /** Cells per side */
  gridSize: number;
  /** Records each partition as a recompute session */
  monitor?: PerformanceMonitor;
};

const EMPTY_BUFFERS: MultiReferenceBuffers = Object.freeze({
  orbits: new Float32Array(0),
  seriesA: new Float32Array(0),
  seriesB: new Float32Array(0),
  bounds: new Float32Array(0),
  centers: new Float32Array(0),
  offsets: new Uint32Array(0),
});

/**
 * Manages the reference orbits of a multi-reference partition.
 *
 * Every call to partition() discards the previous regions and orbits; nothing
 * is carried over between views.
 */
export class MultiReferenceManager {
  readonly gridSize: number;
  private readonly monitor: PerformanceMonitor | undefined;
  private regions: readonly ReferenceRegion[] = [];
  private orbits: readonly ReferenceOrbit[] = [];
  private packed: MultiReferenceBuffers = EMPTY_BUFFERS;

  constructor(options: Partial<MultiReferenceOptions> = {}) {
    const gridSize = options.gridSize ?? 3;
    if (!Number.isInteger(gridSize) || gridSize < 1) {
      throw new RangeError(`MultiReferenceManager: gridSize must be a positive integer, got ${gridSize}`);
    }
    this.gridSize = gridSize;
    this.monitor = options.monitor;
  }

  /**
   * Partition the view and compute one orbit (with series) per cell.
   *
   * Each cell's series is validated against the cell diagonal, the screen
   * diagonal divided by N, since no pixel in a cell is further from its center.
   *
   * @param precisionLevel - "doubleDouble" computes cell centers and orbits in double-double
   */
  partition(
    viewCenter: ComplexStd | ComplexDD,
    scale: number,
    aspect: number,
    maxIterations: number,
    precisionLevel: PrecisionLevel = "double"
  ): readonly ReferenceRegion[] {
    // Checked before anything is discarded or a session is opened
    assertIterationBudget(maxIterations);
    this.clear();

    const n = this.gridSize;
    const center = resolveCenter(viewCenter);
    const regionDeltaSquared = screenDiagonalSquared(scale, aspect) / (n * n);
    const sessionId = this.monitor?.startRecompute("multiReference", n * n);

    const regions: ReferenceRegion[] = [];
    const orbits: ReferenceOrbit[] = [];
    let orbitOffset = 0;
    let seriesOffset = 0;

    for (let row = 0; row < n; row++) {
      for (let col = 0; col < n; col++) {
        const bounds: RegionBounds = Object.freeze({
          minX: col / n,
          minY: row / n,
          maxX: (col + 1) / n,
          maxY: (row + 1) / n,
        });
        const midX = (col + 0.5) / n;
        const midY = (row + 0.5) / n;

        const start = performance.now();
        const orbit =
          precisionLevel === "doubleDouble"
            ? projectOrbitDD(
                computeReferenceOrbitDD(cellCenterDD(center.dd, midX, midY, scale, aspect), maxIterations),
                regionDeltaSquared
              )
            : computeReferenceOrbitWithSeries(
                normalizedToComplex(midX, midY, center.std, scale, aspect),
                maxIterations,
                regionDeltaSquared
              );
        if (sessionId !== undefined) {
          this.monitor?.recordOrbit(sessionId, orbits.length, performance.now() - start, orbit.length);
        }

        const skip = skipIterations(orbit);
        regions.push(
          Object.freeze({
            bounds,
            center: orbit.center,
            orbitOffset,
            orbitLength: orbit.length,
            seriesOffset,
            skipIterations: skip,
          })
        );
        orbits.push(orbit);
        orbitOffset += orbit.length;
        seriesOffset += skip;
      }
    }

    if (sessionId !== undefined) {
      this.monitor?.endRecompute(sessionId);
    }

    this.regions = Object.freeze(regions);
    this.orbits = Object.freeze(orbits);
    this.packed = packBuffers(regions, orbits, orbitOffset, seriesOffset);
    return this.regions;
  }

  /**
   * Region containing a normalized screen point (bounds are half-open).
   * Falls back to region 0 for points outside every cell.
   */
  regionIndex(normX: number, normY: number): number {
    const index = this.regions.findIndex(
      ({ bounds }) => normX >= bounds.minX && normX < bounds.maxX && normY >= bounds.minY && normY < bounds.maxY
    );
    return index === -1 ? 0 : index;
  }

  region(index: number): ReferenceRegion | undefined {
    return this.regions[index];
  }

  orbit(index: number): ReferenceOrbit | undefined {
    return this.orbits[index];
  }

  get regionCount(): number {
    return this.regions.length;
  }

  get allRegions(): readonly ReferenceRegion[] {
    return this.regions;
  }

  get totalOrbitPoints(): number {
    return this.orbits.reduce((sum, orbit) => sum + orbit.length, 0);
  }

  get buffers(): MultiReferenceBuffers {
    return this.packed;
  }

  clear(): void {
    this.regions = [];
    this.orbits = [];
    this.packed = EMPTY_BUFFERS;
  }
}

function cellCenterDD(viewCenter: ComplexDD, normX: number, normY: number, scale: number, aspect: number): ComplexDD {
  // Offsets are small enough for double; the sum keeps the view center's full precision
  return addDD(viewCenter, createComplexDD((normX - 0.5) * scale * aspect, (normY - 0.5) * scale));
}

function packBuffers(
  regions: readonly ReferenceRegion[],
  orbits: readonly ReferenceOrbit[],
  totalPoints: number,
  totalSeries: number
): MultiReferenceBuffers {
  const orbitBuffer = new Float32Array(totalPoints * 2);
  const seriesA = new Float32Array(totalSeries * 2);
  const seriesB = new Float32Array(totalSeries * 2);

  regions.forEach((region, i) => {
    const orbit = orbits[i];
    orbitBuffer.set(packComplexPoints(orbit.points, orbit.length), region.orbitOffset * 2);
    if (orbit.series) {
      seriesA.set(packComplexPoints(orbit.series.a, region.skipIterations), region.seriesOffset * 2);
      seriesB.set(packComplexPoints(orbit.series.b, region.skipIterations), region.seriesOffset * 2);
    }
  });

  return Object.freeze({
    orbits: orbitBuffer,
    seriesA,
    seriesB,
    bounds: packRegionBounds(regions),
    centers: packRegionCenters(regions),
    offsets: packRegionOffsets(regions),
  });
}
