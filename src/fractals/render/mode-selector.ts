// ABOUTME: Chooses rendering mode, precision tier and enabled features from the current scale
// ABOUTME: Also resolves which GPU kernel variant runs, falling back when a kernel is unavailable

import { isBeyondPrecisionFloor, PrecisionLevel } from "@/fractals/mandelbrot/conversions";
import type { EngineConfig } from "./config";

export type RenderingMode = "standard" | "perturbation";

export type RenderingState = {
  renderingMode: RenderingMode;
  precisionLevel: PrecisionLevel;
  useSeriesApproximation: boolean;
  enableGlitchDetection: boolean;
  useMultiReference: boolean;
  /** Deeper than double-double resolves; rendering continues regardless */
  beyondPrecisionFloor: boolean;
};

/**
 * Kernel to dispatch for a frame.
 */
export type KernelVariant =
  | { kind: "standard" }
  | { kind: "perturbation"; series: boolean; glitch: boolean }
  | { kind: "multiReference" };

/**
 * Pure function of scale and configuration.
 */
export function selectRenderingState(scale: number, config: EngineConfig): RenderingState {
  const { thresholds, capabilities } = config;
  const precisionLevel = PrecisionLevel.required(scale);
  const beyondPrecisionFloor = isBeyondPrecisionFloor(scale);

  if (!(scale < thresholds.perturbation) || !capabilities.perturbation) {
    return {
      renderingMode: "standard",
      precisionLevel,
      useSeriesApproximation: false,
      enableGlitchDetection: false,
      useMultiReference: false,
      beyondPrecisionFloor,
    };
  }

  return {
    renderingMode: "perturbation",
    precisionLevel,
    useSeriesApproximation: scale < thresholds.seriesApproximation && capabilities.series,
    enableGlitchDetection: scale < thresholds.glitchDetection && (capabilities.glitch || capabilities.seriesAndGlitch),
    useMultiReference: scale < thresholds.multiReference && capabilities.multiReference,
    beyondPrecisionFloor,
  };
}

/**
 * Pick the kernel for a frame.
 *
 * Series is only worth dispatching when more than one iteration can be
 * skipped. When the combined kernel is missing, series wins over glitch
 * detection; glitch-only without its kernel degrades to plain perturbation.
 */
export function selectKernelVariant(
  state: RenderingState,
  orbitInfo: { skipIterations: number; hasRegions: boolean },
  capabilities: EngineConfig["capabilities"]
): KernelVariant {
  if (state.renderingMode === "standard") {
    return { kind: "standard" };
  }

  if (state.useMultiReference && orbitInfo.hasRegions && capabilities.multiReference) {
    return { kind: "multiReference" };
  }

  const series = state.useSeriesApproximation && orbitInfo.skipIterations > 1 && capabilities.series;
  const glitch = state.enableGlitchDetection;

  if (series && glitch) {
    return capabilities.seriesAndGlitch
      ? { kind: "perturbation", series: true, glitch: true }
      : { kind: "perturbation", series: true, glitch: false };
  }
  if (glitch) {
    return { kind: "perturbation", series: false, glitch: capabilities.glitch };
  }
  return { kind: "perturbation", series, glitch: false };
}
