import { describe, expect, it } from "vitest";
import { computeGlitchFlags } from "../mandelbrot/delta-orbit";
import { GlitchDetector } from "../mandelbrot/glitch-detector";
import { GlitchMask } from "../mandelbrot/glitch-mask";
import { computeReferenceOrbit } from "../mandelbrot/reference-orbit";

describe("glitch pipeline", () => {
  // 8×8 view of width 0.4 around the reference: every pixel except (4, 4) has
  // |δc| ≥ 0.05, so |δ₁|² = |δc|² outgrows 1e-6·|Z₁|² at iteration 1
  const center = { real: -0.5, imag: 0 };
  const view = { center, scale: 0.4, width: 8, height: 8 };
  const orbit = computeReferenceOrbit(center, 40);
  const flags = computeGlitchFlags(orbit, view, 40);

  it("flags every pixel off the reference at iteration 1", () => {
    expect(flags[4 * 8 + 4]).toBe(0);
    expect(flags[0]).toBe(1);
    expect(flags[63]).toBe(1);
    expect(Array.from(flags).filter((flag) => flag > 0)).toHaveLength(63);
  });

  it("places new references at the centroids of the largest cells", () => {
    const detector = new GlitchDetector({ minClusterSize: 3, maxNewReferences: 2 });

    const references = detector.analyzeAndSelectReferences(flags, center, view.scale, view.width, view.height);

    // Cells are 2×2 pixels; the first two full cells have centroids (0.5, 0.5) and (2.5, 0.5)
    expect(references).toHaveLength(2);
    expect(references[0].real).toBeCloseTo(-0.675, 12);
    expect(references[0].imag).toBeCloseTo(-0.175, 12);
    expect(references[1].real).toBeCloseTo(-0.575, 12);
    expect(references[1].imag).toBeCloseTo(-0.175, 12);
    expect(detector.glitchPercentage(flags, view.width, view.height)).toBe(98.4375);
  });

  it("finds no cluster with the default cell size on a small image", () => {
    const detector = new GlitchDetector();

    expect(detector.analyzeAndSelectReferences(flags, center, view.scale, view.width, view.height)).toEqual([]);
  });

  it("marks the same pixels for re-rendering", () => {
    const mask = GlitchMask.fromFlags(flags, view.width, view.height);

    expect(mask.count).toBe(63);
    expect(mask.needsRerender(4, 4)).toBe(false);

    mask.expand(1);
    expect(mask.count).toBe(64);
  });
});
