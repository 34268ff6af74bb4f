// ABOUTME: Glitch detection and re-referencing for perturbation rendering
// ABOUTME: Clusters glitched pixels from the GPU flag buffer and proposes new reference points

import { normalizedToComplex } from "@/lib/coordinates";
import type { ComplexStd } from "./types";

/**
 * A pixel whose delta outgrew the reference orbit.
 */
export interface GlitchedPixel {
  x: number;
  y: number;
  /** Iteration at which |δ|² first exceeded ε·|Z|² */
  iteration: number;
}

/**
 * Glitched pixels sharing one grid cell, and the reference point chosen for them.
 */
export interface GlitchCluster {
  pixels: GlitchedPixel[];
  /** Pixel-space centroid */
  centroid: { x: number; y: number };
  newReference: ComplexStd | null;
}

export type GlitchDetectorOptions = {
  /** Minimum number of glitched pixels in a cell to warrant a new reference */
  minClusterSize: number;
  /** Maximum number of new references proposed per pass */
  maxNewReferences: number;
  /** Cells per side of the clustering grid */
  gridSize: number;
};

export const DEFAULT_GLITCH_DETECTOR_OPTIONS: GlitchDetectorOptions = {
  minClusterSize: 16,
  maxNewReferences: 4,
  gridSize: 4,
};

function assertFlagBuffer(flags: ArrayLike<number>, width: number, height: number): void {
  if (flags.length < width * height) {
    throw new Error(`GlitchDetector: flag buffer holds ${flags.length} values, expected ${width * height}`);
  }
}

/**
 * Analyzes the glitch buffer produced by the GPU and selects new reference points.
 *
 * Usage:
 * ```typescript
 * const detector = new GlitchDetector();
 * const references = detector.analyzeAndSelectReferences(flags, center, scale, width, height);
 * ```
 */
export class GlitchDetector {
  readonly options: GlitchDetectorOptions;

  constructor(options: Partial<GlitchDetectorOptions> = {}) {
    this.options = { ...DEFAULT_GLITCH_DETECTOR_OPTIONS, ...options };
  }

  /**
   * Collect pixels with a nonzero flag (the iteration the glitch was detected at).
   */
  extractGlitchedPixels(flags: ArrayLike<number>, width: number, height: number): GlitchedPixel[] {
    assertFlagBuffer(flags, width, height);
    const glitched: GlitchedPixel[] = [];

    for (let y = 0; y < height; y++) {
      for (let x = 0; x < width; x++) {
        const iteration = flags[y * width + x];
        if (iteration > 0) {
          glitched.push({ x, y, iteration });
        }
      }
    }

    return glitched;
  }

  /**
   * Group glitched pixels by grid cell. Cells with at least minClusterSize
   * pixels become clusters; the largest maxNewReferences are kept.
   */
  clusterPixels(pixels: GlitchedPixel[], width: number, height: number): GlitchCluster[] {
    if (pixels.length === 0) {
      return [];
    }

    const { gridSize, minClusterSize, maxNewReferences } = this.options;
    const grid: GlitchedPixel[][] = Array.from({ length: gridSize * gridSize }, () => []);

    const cellWidth = width / gridSize;
    const cellHeight = height / gridSize;

    for (const pixel of pixels) {
      const gridX = Math.min(gridSize - 1, Math.floor(pixel.x / cellWidth));
      const gridY = Math.min(gridSize - 1, Math.floor(pixel.y / cellHeight));
      grid[gridY * gridSize + gridX].push(pixel);
    }

    const clusters: GlitchCluster[] = [];
    for (const cellPixels of grid) {
      if (cellPixels.length < minClusterSize) continue;

      let sumX = 0;
      let sumY = 0;
      for (const p of cellPixels) {
        sumX += p.x;
        sumY += p.y;
      }

      clusters.push({
        pixels: cellPixels,
        centroid: { x: sumX / cellPixels.length, y: sumY / cellPixels.length },
        newReference: null,
      });
    }

    // Stable sort keeps grid order among equally sized clusters
    clusters.sort((a, b) => b.pixels.length - a.pixels.length);
    return clusters.slice(0, maxNewReferences);
  }

  /**
   * Map each cluster centroid into the complex plane with the kernels' pixel mapping,
   * so the new reference lands inside the region it is meant to fix.
   */
  selectReferencePoints(
    clusters: GlitchCluster[],
    viewCenter: ComplexStd,
    scale: number,
    aspect: number,
    width: number,
    height: number
  ): GlitchCluster[] {
    return clusters.map((cluster) => ({
      ...cluster,
      newReference: normalizedToComplex(
        cluster.centroid.x / width,
        cluster.centroid.y / height,
        viewCenter,
        scale,
        aspect
      ),
    }));
  }

  /**
   * Analyze a glitch buffer and return reference points for re-rendering.
   * Returns [] straight away when no pixel is flagged, the usual case.
   */
  analyzeAndSelectReferences(
    flags: ArrayLike<number>,
    viewCenter: ComplexStd,
    scale: number,
    width: number,
    height: number
  ): ComplexStd[] {
    const pixels = this.extractGlitchedPixels(flags, width, height);
    if (pixels.length === 0) {
      return [];
    }

    const clusters = this.clusterPixels(pixels, width, height);
    if (clusters.length === 0) {
      return [];
    }

    const aspect = width / height;
    return this.selectReferencePoints(clusters, viewCenter, scale, aspect, width, height).flatMap((cluster) =>
      cluster.newReference ? [cluster.newReference] : []
    );
  }

  /**
   * Percentage of pixels that were flagged.
   */
  glitchPercentage(flags: ArrayLike<number>, width: number, height: number): number {
    const total = width * height;
    if (total === 0) {
      return 0;
    }
    return (this.extractGlitchedPixels(flags, width, height).length / total) * 100;
  }
}
