// ABOUTME: Frame coordinator owning the reference orbit snapshot, region partition and glitch references
// ABOUTME: Reacts to view updates and exposes its state through a vanilla zustand store

import { createStore, type StoreApi } from "zustand/vanilla";
import { resolveCenter } from "@/fractals/mandelbrot/conversions";
import { addDD, ddToStd, stdToDD, subtractDD } from "@/fractals/mandelbrot/dd-math";
import { GlitchDetector } from "@/fractals/mandelbrot/glitch-detector";
import { MultiReferenceManager, type MultiReferenceBuffers, type ReferenceRegion } from "@/fractals/mandelbrot/multi-reference";
import {
  assertIterationBudget,
  computeReferenceOrbit,
  computeReferenceOrbitWithSeries,
  needsReferenceRecompute,
  screenDiagonalSquared,
} from "@/fractals/mandelbrot/reference-orbit";
import { computeReferenceOrbitDD, projectOrbitDD } from "@/fractals/mandelbrot/reference-orbit-dd";
import { skipIterations } from "@/fractals/mandelbrot/series-approximation";
import type { ComplexDD, ComplexStd, PrecisionLevel, ReferenceOrbit } from "@/fractals/mandelbrot/types";
import { PerformanceMonitor, type RecomputeSessionMetrics } from "@/lib/performance-monitor";
import { resolveEngineConfig, type EngineConfig, type EngineConfigOverrides } from "./config";
import {
  createMultiReferenceParams,
  createPerturbationParams,
  packOrbit,
  type MultiReferenceParams,
  type PerturbationParams,
} from "./gpu-packing";
import { selectKernelVariant, selectRenderingState, type KernelVariant, type RenderingState } from "./mode-selector";

const ORIGIN: ComplexStd = Object.freeze({ real: 0, imag: 0 });

export type EngineState = {
  /** Latest requested view, updated on every call including low-quality ones */
  viewCenter: ComplexStd;
  viewCenterDD: ComplexDD;
  scale: number;
  lowQuality: boolean;
  /** View of the last full-quality frame; glitch buffers are read against it */
  displayCenter: ComplexStd;
  displayCenterDD: ComplexDD;
  displayScale: number;
  width: number;
  height: number;
  maxIterations: number;
  rendering: RenderingState;
  /** Primary reference; may be stale relative to the view between recomputes */
  orbit: ReferenceOrbit | null;
  orbitCenterDD: ComplexDD | null;
  /** Extra references placed inside glitched clusters */
  glitchOrbits: readonly ReferenceOrbit[];
  /** Proposals from the last glitch pass, turned into orbits on the next full-quality frame */
  pendingGlitchReferences: readonly ComplexDD[];
  regions: readonly ReferenceRegion[];
  lastGlitchPercentage: number;
};

export type EngineMetrics = {
  stats: ReturnType<PerformanceMonitor["getStats"]>;
  last: RecomputeSessionMetrics | null;
};

/**
 * Owns everything the GPU side needs to render one frame with perturbation.
 *
 * Usage:
 * ```typescript
 * const engine = new PerturbationEngine({ maxIterations: 2000 });
 * engine.setViewport(1280, 720);
 * engine.setView(center, 1e-9);
 * const variant = engine.kernelVariant();
 * const params = engine.perturbationParams();
 * // after a glitch-detecting pass:
 * engine.submitGlitchFlags(flags);
 * ```
 */
export class PerturbationEngine {
  readonly config: EngineConfig;
  private readonly store: StoreApi<EngineState>;
  private readonly monitor = new PerformanceMonitor();
  private readonly detector: GlitchDetector;
  private readonly multiReference: MultiReferenceManager;
  private warnedBeyondFloor = false;

  constructor(overrides: EngineConfigOverrides = {}) {
    this.config = resolveEngineConfig(overrides);
    this.detector = new GlitchDetector(this.config.glitch);
    this.multiReference = new MultiReferenceManager({
      gridSize: this.config.multiReferenceGridSize,
      monitor: this.monitor,
    });

    const initialCenter = resolveCenter({ real: -0.75, imag: 0 });
    const initialScale = 2;
    this.store = createStore<EngineState>()(() => ({
      viewCenter: initialCenter.std,
      viewCenterDD: initialCenter.dd,
      scale: initialScale,
      lowQuality: false,
      displayCenter: initialCenter.std,
      displayCenterDD: initialCenter.dd,
      displayScale: initialScale,
      width: 1,
      height: 1,
      maxIterations: this.config.maxIterations,
      rendering: selectRenderingState(initialScale, this.config),
      orbit: null,
      orbitCenterDD: null,
      glitchOrbits: [],
      pendingGlitchReferences: [],
      regions: [],
      lastGlitchPercentage: 0,
    }));
  }

  getState(): EngineState {
    return this.store.getState();
  }

  subscribe(listener: (state: EngineState, previous: EngineState) => void): () => void {
    return this.store.subscribe(listener);
  }

  setViewport(width: number, height: number): void {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width < 1 || height < 1) {
      throw new RangeError(`PerturbationEngine: viewport must be positive integers, got ${width}x${height}`);
    }
    this.store.setState({ width, height });
  }

  /**
   * Change the iteration budget. Takes effect on the next full-quality frame.
   */
  setMaxIterations(maxIterations: number): void {
    assertIterationBudget(maxIterations);
    if (maxIterations < 1) {
      throw new RangeError(`PerturbationEngine: maxIterations must be at least 1`);
    }
    this.store.setState({ maxIterations });
  }

  /**
   * Per-frame view update.
   *
   * Low-quality frames (during gestures) only record the view and mode; they
   * reuse whatever orbit and regions exist and leave the display view alone.
   */
  setView(center: ComplexStd | ComplexDD, scale: number, lowQuality = false): void {
    if (!(scale > 0) || !Number.isFinite(scale)) {
      throw new RangeError(`PerturbationEngine: scale must be a positive finite number, got ${scale}`);
    }

    const resolved = resolveCenter(center);
    const rendering = selectRenderingState(scale, this.config);
    this.warnIfBeyondFloor(rendering, scale);

    const view = { viewCenter: resolved.std, viewCenterDD: resolved.dd, scale, lowQuality, rendering };
    if (lowQuality) {
      this.store.setState(view);
      return;
    }

    const display = { displayCenter: resolved.std, displayCenterDD: resolved.dd, displayScale: scale };
    if (rendering.renderingMode === "standard") {
      this.multiReference.clear();
      this.store.setState({ ...view, ...display, regions: [], glitchOrbits: [], pendingGlitchReferences: [] });
      return;
    }

    const state = this.store.getState();
    const aspect = state.width / state.height;
    const next: Partial<EngineState> = { ...view, ...display };

    if (this.primaryOrbitIsStale(state, resolved.dd, scale, rendering)) {
      next.orbit = this.computePrimaryOrbit(resolved, scale, aspect, rendering, state.maxIterations);
      next.orbitCenterDD = resolved.dd;
      next.glitchOrbits = [];
      next.pendingGlitchReferences = [];
    } else if (state.pendingGlitchReferences.length > 0) {
      next.glitchOrbits = rendering.enableGlitchDetection
        ? this.computeGlitchOrbits(state.pendingGlitchReferences, rendering.precisionLevel, state.maxIterations)
        : [];
      next.pendingGlitchReferences = [];
    }

    if (rendering.useMultiReference) {
      next.regions = this.multiReference.partition(
        resolved.dd,
        scale,
        aspect,
        state.maxIterations,
        rendering.precisionLevel
      );
    } else {
      this.multiReference.clear();
      next.regions = [];
    }

    this.store.setState(next);
  }

  /**
   * Hand back the glitch buffer of the last glitch-detecting pass.
   * The buffer is read against the last full-quality view.
   *
   * @returns Proposed reference points (at double precision), also kept for the next frame
   */
  submitGlitchFlags(flags: ArrayLike<number>): ComplexStd[] {
    const state = this.store.getState();
    if (!state.rendering.enableGlitchDetection) {
      console.warn("PerturbationEngine: glitch flags submitted while glitch detection is off, ignoring");
      return [];
    }

    const { width, height, displayScale, displayCenterDD } = state;
    // Offsets from the display center, added in double-double so deep proposals keep their digits
    const offsets = this.detector.analyzeAndSelectReferences(flags, ORIGIN, displayScale, width, height);
    const proposals = offsets.map((offset) => addDD(displayCenterDD, stdToDD(offset)));

    this.store.setState({
      pendingGlitchReferences: proposals,
      lastGlitchPercentage: this.detector.glitchPercentage(flags, width, height),
    });

    if (proposals.length > 0) {
      console.debug(`PerturbationEngine: ${proposals.length} glitch reference(s) proposed`);
    }
    return proposals.map(ddToStd);
  }

  kernelVariant(): KernelVariant {
    const { rendering, orbit, regions } = this.store.getState();
    return selectKernelVariant(
      rendering,
      { skipIterations: orbit ? skipIterations(orbit) : 0, hasRegions: regions.length > 0 },
      this.config.capabilities
    );
  }

  /**
   * Parameters for the single-reference kernels, null before any orbit exists.
   */
  perturbationParams(): PerturbationParams | null {
    const state = this.store.getState();
    if (!state.orbit) {
      return null;
    }
    const variant = this.kernelVariant();
    const useSeries = variant.kind === "perturbation" && variant.series;
    return createPerturbationParams({
      referenceCenter: state.orbit.center,
      viewCenter: state.viewCenter,
      scale: state.scale,
      width: state.width,
      height: state.height,
      maxIterations: state.maxIterations,
      orbitLength: state.orbit.length,
      skipIterations: useSeries ? skipIterations(state.orbit) : 0,
    });
  }

  multiReferenceParams(): MultiReferenceParams | null {
    const state = this.store.getState();
    if (state.regions.length === 0) {
      return null;
    }
    return createMultiReferenceParams({
      viewCenter: state.viewCenter,
      scale: state.scale,
      width: state.width,
      height: state.height,
      maxIterations: state.maxIterations,
      regionCount: state.regions.length,
    });
  }

  /** Float32 orbit for the single-reference kernels */
  orbitBuffer(): Float32Array | null {
    const { orbit } = this.store.getState();
    return orbit ? packOrbit(orbit) : null;
  }

  multiReferenceBuffers(): MultiReferenceBuffers {
    return this.multiReference.buffers;
  }

  getMetrics(): EngineMetrics {
    return { stats: this.monitor.getStats(), last: this.monitor.getLastMetrics() };
  }

  private primaryOrbitIsStale(
    state: EngineState,
    centerDD: ComplexDD,
    scale: number,
    rendering: RenderingState
  ): boolean {
    const { orbit, orbitCenterDD } = state;
    if (!orbit || !orbitCenterDD) {
      return true;
    }
    if (orbit.precisionLevel !== rendering.precisionLevel) return true;
    if ((orbit.series !== null) !== rendering.useSeriesApproximation) return true;
    if (orbit.maxIterations !== state.maxIterations) return true;

    // Drift measured in double-double against an orbit placed at the origin
    const drift = ddToStd(subtractDD(centerDD, orbitCenterDD));
    return needsReferenceRecompute({ center: ORIGIN }, drift, scale, this.config.referenceDriftThreshold);
  }

  private computePrimaryOrbit(
    center: { std: ComplexStd; dd: ComplexDD },
    scale: number,
    aspect: number,
    rendering: RenderingState,
    maxIterations: number
  ): ReferenceOrbit {
    const sessionId = this.monitor.startRecompute("primary", 1);
    const start = performance.now();
    const diagonalSquared = screenDiagonalSquared(scale, aspect);

    let orbit: ReferenceOrbit;
    if (rendering.precisionLevel === "doubleDouble") {
      const orbitDD = computeReferenceOrbitDD(center.dd, maxIterations);
      orbit = projectOrbitDD(orbitDD, rendering.useSeriesApproximation ? diagonalSquared : undefined);
    } else if (rendering.useSeriesApproximation) {
      orbit = computeReferenceOrbitWithSeries(center.std, maxIterations, diagonalSquared);
    } else {
      orbit = computeReferenceOrbit(center.std, maxIterations);
    }

    this.monitor.recordOrbit(sessionId, 0, performance.now() - start, orbit.length);
    const metrics = this.monitor.endRecompute(sessionId);
    console.debug(
      `PerturbationEngine: reference orbit recomputed (${orbit.precisionLevel}, ${orbit.length} points, ${metrics.duration.toFixed(1)}ms)`
    );
    return orbit;
  }

  private computeGlitchOrbits(
    references: readonly ComplexDD[],
    precisionLevel: PrecisionLevel,
    maxIterations: number
  ): ReferenceOrbit[] {
    const sessionId = this.monitor.startRecompute("glitchReferences", references.length);
    const orbits = references.map((reference, index) => {
      const start = performance.now();
      const orbit =
        precisionLevel === "doubleDouble"
          ? projectOrbitDD(computeReferenceOrbitDD(reference, maxIterations))
          : computeReferenceOrbit(ddToStd(reference), maxIterations);
      this.monitor.recordOrbit(sessionId, index, performance.now() - start, orbit.length);
      return orbit;
    });
    this.monitor.endRecompute(sessionId);
    return orbits;
  }

  private warnIfBeyondFloor(rendering: RenderingState, scale: number): void {
    if (!rendering.beyondPrecisionFloor) {
      this.warnedBeyondFloor = false;
      return;
    }
    if (!this.warnedBeyondFloor) {
      console.warn(
        `PerturbationEngine: scale ${scale.toExponential(2)} is beyond double-double precision, results may be inaccurate`
      );
      this.warnedBeyondFloor = true;
    }
  }
}
