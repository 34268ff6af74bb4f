import { describe, expect, it } from "vitest";
import { DEFAULT_ENGINE_CONFIG, resolveEngineConfig } from "./config";

describe("resolveEngineConfig", () => {
  it("returns the defaults without overrides", () => {
    const config = resolveEngineConfig();

    expect(config).toEqual(DEFAULT_ENGINE_CONFIG);
    expect(config.thresholds).toEqual({
      perturbation: 1e-6,
      seriesApproximation: 1e-7,
      glitchDetection: 1e-8,
      multiReference: 1e-7,
    });
    expect(config.maxIterations).toBe(512);
    expect(config.multiReferenceGridSize).toBe(3);
    expect(config.referenceDriftThreshold).toBe(0.1);
    expect(config.glitch).toEqual({ minClusterSize: 16, maxNewReferences: 4, gridSize: 4 });
  });

  it("merges nested overrides onto the defaults", () => {
    const config = resolveEngineConfig({
      thresholds: { glitchDetection: 1e-9 },
      capabilities: { multiReference: false },
      glitch: { maxNewReferences: 2 },
    });

    expect(config.thresholds.glitchDetection).toBe(1e-9);
    expect(config.thresholds.perturbation).toBe(1e-6);
    expect(config.capabilities.multiReference).toBe(false);
    expect(config.capabilities.series).toBe(true);
    expect(config.glitch).toEqual({ minClusterSize: 16, maxNewReferences: 2, gridSize: 4 });
  });

  it("does not share nested records with the defaults", () => {
    const config = resolveEngineConfig();

    config.capabilities.glitch = false;

    expect(DEFAULT_ENGINE_CONFIG.capabilities.glitch).toBe(true);
  });

  it("rejects invalid values", () => {
    expect(() => resolveEngineConfig({ thresholds: { perturbation: 0 } })).toThrow(
      "EngineConfig: threshold perturbation must be a positive number, got 0"
    );
    expect(() => resolveEngineConfig({ maxIterations: 0 })).toThrow(
      "EngineConfig: maxIterations must be a positive integer, got 0"
    );
    expect(() => resolveEngineConfig({ maxIterations: 2 ** 25 })).toThrow(/exceeds/);
    expect(() => resolveEngineConfig({ multiReferenceGridSize: 1.5 })).toThrow(/multiReferenceGridSize/);
    expect(() => resolveEngineConfig({ referenceDriftThreshold: -1 })).toThrow(/referenceDriftThreshold/);
    expect(() => resolveEngineConfig({ glitch: { gridSize: 0 } })).toThrow(/glitch.gridSize/);
    expect(() => resolveEngineConfig({ glitch: { maxNewReferences: -1 } })).toThrow(/maxNewReferences/);
  });
});
