// ABOUTME: Engine configuration: mode thresholds, GPU kernel capabilities and orbit management settings
// ABOUTME: resolveEngineConfig merges overrides onto the defaults and rejects inconsistent values

import { DEFAULT_GLITCH_DETECTOR_OPTIONS, type GlitchDetectorOptions } from "@/fractals/mandelbrot/glitch-detector";
import { DEFAULT_DRIFT_THRESHOLD, MAX_ORBIT_ITERATIONS } from "@/fractals/mandelbrot/reference-orbit";

/**
 * Scale below which each feature switches on.
 */
export type ModeThresholds = {
  perturbation: number;
  seriesApproximation: number;
  glitchDetection: number;
  multiReference: number;
};

/**
 * Which compute kernels the GPU layer managed to build.
 * A missing kernel disables its feature instead of failing the frame.
 */
export type KernelCapabilities = {
  perturbation: boolean;
  series: boolean;
  glitch: boolean;
  seriesAndGlitch: boolean;
  multiReference: boolean;
};

export type EngineConfig = {
  thresholds: ModeThresholds;
  capabilities: KernelCapabilities;
  /** Drift (as a fraction of the scale) that makes the primary orbit stale */
  referenceDriftThreshold: number;
  maxIterations: number;
  multiReferenceGridSize: number;
  glitch: GlitchDetectorOptions;
};

export type EngineConfigOverrides = {
  thresholds?: Partial<ModeThresholds>;
  capabilities?: Partial<KernelCapabilities>;
  referenceDriftThreshold?: number;
  maxIterations?: number;
  multiReferenceGridSize?: number;
  glitch?: Partial<GlitchDetectorOptions>;
};

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  thresholds: {
    perturbation: 1e-6,
    seriesApproximation: 1e-7,
    glitchDetection: 1e-8,
    multiReference: 1e-7,
  },
  capabilities: {
    perturbation: true,
    series: true,
    glitch: true,
    seriesAndGlitch: true,
    multiReference: true,
  },
  referenceDriftThreshold: DEFAULT_DRIFT_THRESHOLD,
  maxIterations: 512,
  multiReferenceGridSize: 3,
  glitch: DEFAULT_GLITCH_DETECTOR_OPTIONS,
};

function fail(message: string): never {
  throw new Error(`EngineConfig: ${message}`);
}

function requirePositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    fail(`${name} must be a positive integer, got ${value}`);
  }
}

/**
 * Merge overrides onto the defaults and validate the result.
 */
export function resolveEngineConfig(overrides: EngineConfigOverrides = {}): EngineConfig {
  const config: EngineConfig = {
    thresholds: { ...DEFAULT_ENGINE_CONFIG.thresholds, ...overrides.thresholds },
    capabilities: { ...DEFAULT_ENGINE_CONFIG.capabilities, ...overrides.capabilities },
    referenceDriftThreshold: overrides.referenceDriftThreshold ?? DEFAULT_ENGINE_CONFIG.referenceDriftThreshold,
    maxIterations: overrides.maxIterations ?? DEFAULT_ENGINE_CONFIG.maxIterations,
    multiReferenceGridSize: overrides.multiReferenceGridSize ?? DEFAULT_ENGINE_CONFIG.multiReferenceGridSize,
    glitch: { ...DEFAULT_ENGINE_CONFIG.glitch, ...overrides.glitch },
  };

  for (const [name, value] of Object.entries(config.thresholds)) {
    if (!(value > 0) || !Number.isFinite(value)) {
      fail(`threshold ${name} must be a positive number, got ${value}`);
    }
  }
  if (!(config.referenceDriftThreshold > 0)) {
    fail(`referenceDriftThreshold must be positive, got ${config.referenceDriftThreshold}`);
  }
  requirePositiveInteger("maxIterations", config.maxIterations);
  if (config.maxIterations > MAX_ORBIT_ITERATIONS) {
    fail(`maxIterations ${config.maxIterations} exceeds ${MAX_ORBIT_ITERATIONS}`);
  }
  requirePositiveInteger("multiReferenceGridSize", config.multiReferenceGridSize);
  requirePositiveInteger("glitch.gridSize", config.glitch.gridSize);
  requirePositiveInteger("glitch.minClusterSize", config.glitch.minClusterSize);
  if (!Number.isInteger(config.glitch.maxNewReferences) || config.glitch.maxNewReferences < 0) {
    fail(`glitch.maxNewReferences must be a non-negative integer, got ${config.glitch.maxNewReferences}`);
  }

  return config;
}
