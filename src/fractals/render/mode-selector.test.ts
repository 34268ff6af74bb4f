import { describe, expect, it } from "vitest";
import { resolveEngineConfig } from "./config";
import { selectKernelVariant, selectRenderingState, type RenderingState } from "./mode-selector";

const config = resolveEngineConfig();

describe("selectRenderingState", () => {
  it("renders shallow views in standard mode with every feature off", () => {
    expect(selectRenderingState(2, config)).toEqual({
      renderingMode: "standard",
      precisionLevel: "double",
      useSeriesApproximation: false,
      enableGlitchDetection: false,
      useMultiReference: false,
      beyondPrecisionFloor: false,
    });
  });

  it("switches to perturbation below 1e-6", () => {
    const state = selectRenderingState(5e-7, config);

    expect(state.renderingMode).toBe("perturbation");
    expect(state.useSeriesApproximation).toBe(false);
    expect(state.useMultiReference).toBe(false);
    expect(state.enableGlitchDetection).toBe(false);
  });

  it("adds series and multi-reference below 1e-7, glitch detection below 1e-8", () => {
    const series = selectRenderingState(5e-8, config);
    expect(series.useSeriesApproximation).toBe(true);
    expect(series.useMultiReference).toBe(true);
    expect(series.enableGlitchDetection).toBe(false);

    const deep = selectRenderingState(1e-9, config);
    expect(deep.enableGlitchDetection).toBe(true);
    expect(deep.precisionLevel).toBe("double");
  });

  it("moves to double-double and flags the precision floor", () => {
    expect(selectRenderingState(1e-15, config).precisionLevel).toBe("doubleDouble");
    expect(selectRenderingState(1e-15, config).beyondPrecisionFloor).toBe(false);
    expect(selectRenderingState(1e-30, config).beyondPrecisionFloor).toBe(true);
  });

  it("stays in standard mode without a perturbation kernel", () => {
    const noKernel = resolveEngineConfig({ capabilities: { perturbation: false } });

    expect(selectRenderingState(1e-12, noKernel).renderingMode).toBe("standard");
    expect(selectRenderingState(1e-12, noKernel).useSeriesApproximation).toBe(false);
  });

  it("gates each feature on its capability", () => {
    const limited = resolveEngineConfig({
      capabilities: { series: false, multiReference: false, glitch: false, seriesAndGlitch: false },
    });
    const state = selectRenderingState(1e-12, limited);

    expect(state.renderingMode).toBe("perturbation");
    expect(state.useSeriesApproximation).toBe(false);
    expect(state.useMultiReference).toBe(false);
    expect(state.enableGlitchDetection).toBe(false);
  });

  it("reads thresholds from the configuration", () => {
    const early = resolveEngineConfig({ thresholds: { perturbation: 1e-3 } });

    expect(selectRenderingState(1e-4, early).renderingMode).toBe("perturbation");
  });
});

describe("selectKernelVariant", () => {
  const perturbation: RenderingState = {
    renderingMode: "perturbation",
    precisionLevel: "double",
    useSeriesApproximation: true,
    enableGlitchDetection: true,
    useMultiReference: false,
    beyondPrecisionFloor: false,
  };
  const orbitInfo = { skipIterations: 12, hasRegions: false };

  it("dispatches the standard kernel in standard mode", () => {
    const standard = selectRenderingState(1, config);

    expect(selectKernelVariant(standard, orbitInfo, config.capabilities)).toEqual({ kind: "standard" });
  });

  it("uses the combined series and glitch kernel when both apply", () => {
    expect(selectKernelVariant(perturbation, orbitInfo, config.capabilities)).toEqual({
      kind: "perturbation",
      series: true,
      glitch: true,
    });
  });

  it("drops series when at most one iteration can be skipped", () => {
    expect(selectKernelVariant(perturbation, { skipIterations: 1, hasRegions: false }, config.capabilities)).toEqual({
      kind: "perturbation",
      series: false,
      glitch: true,
    });
  });

  it("falls back to series only without the combined kernel", () => {
    const capabilities = { ...config.capabilities, seriesAndGlitch: false };

    expect(selectKernelVariant(perturbation, orbitInfo, capabilities)).toEqual({
      kind: "perturbation",
      series: true,
      glitch: false,
    });
  });

  it("falls back to plain perturbation without the glitch kernel", () => {
    const capabilities = { ...config.capabilities, glitch: false };
    const glitchOnly = { ...perturbation, useSeriesApproximation: false };

    expect(selectKernelVariant(glitchOnly, orbitInfo, capabilities)).toEqual({
      kind: "perturbation",
      series: false,
      glitch: false,
    });
  });

  it("prefers the multi-reference kernel once regions exist", () => {
    const multi = { ...perturbation, useMultiReference: true };

    expect(selectKernelVariant(multi, { skipIterations: 12, hasRegions: true }, config.capabilities)).toEqual({
      kind: "multiReference",
    });
    expect(selectKernelVariant(multi, orbitInfo, config.capabilities).kind).toBe("perturbation");
  });
});
