// ABOUTME: Tests for the CPU perturbation iteration and glitch flag buffers
// ABOUTME: Checks agreement with direct iteration, rebasing, series seeding and glitch flags

import { describe, expect, it } from "vitest";
import { computeGlitchFlags, iteratePerturbation } from "./delta-orbit";
import { computeReferenceOrbit, computeReferenceOrbitWithSeries } from "./reference-orbit";

describe("delta-orbit: Perturbation Iteration", () => {
  describe("iteratePerturbation", () => {
    it("escapes at the reference's own escape iteration when δc = 0", () => {
      const orbit = computeReferenceOrbit({ real: 2, imag: 0 }, 100);
      const result = iteratePerturbation(orbit, { real: 0, imag: 0 }, 100);

      expect(result.escaped).toBe(true);
      expect(result.iterations).toBe(orbit.escapeIteration);
      expect(result.finalZ).toEqual({ real: 1446, imag: 0 });
    });

    it("matches direct iteration of the pixel: 0.5 against a -0.5 reference", () => {
      const orbit = computeReferenceOrbit({ real: -0.5, imag: 0 }, 200);
      const direct = computeReferenceOrbit({ real: 0.5, imag: 0 }, 200);
      const result = iteratePerturbation(orbit, { real: 1, imag: 0 }, 200);

      expect(direct.escapeIteration).toBe(8);
      expect(result.escaped).toBe(true);
      expect(result.iterations).toBe(8);
    });

    it("stays bounded for a pixel inside the set", () => {
      const orbit = computeReferenceOrbit({ real: -0.5, imag: 0 }, 200);
      const result = iteratePerturbation(orbit, { real: 1e-3, imag: 0 }, 200);

      expect(result.escaped).toBe(false);
      expect(result.iterations).toBe(200);
    });

    it("rebases onto the orbit start when the reference runs out", () => {
      // The reference (c = 0) holds only Z₀ and Z₁; the pixel c = 2 needs four iterations
      const orbit = computeReferenceOrbit({ real: 0, imag: 0 }, 2);
      const result = iteratePerturbation(orbit, { real: 2, imag: 0 }, 100);

      expect(result.escaped).toBe(true);
      expect(result.iterations).toBe(4);
    });

    it("iterates directly against a one-point reference", () => {
      // maxIterations = 1 stores only Z₀; the pixel c = 2 runs 0, 2, 6, 38, 1446
      const orbit = computeReferenceOrbit({ real: 0, imag: 0 }, 1);
      const result = iteratePerturbation(orbit, { real: 2, imag: 0 }, 100);

      expect(orbit.length).toBe(1);
      expect(result.escaped).toBe(true);
      expect(result.iterations).toBe(4);
      expect(result.finalZ).toEqual({ real: 1446, imag: 0 });
    });

    it("keeps the reference point when the reference escapes on its first step", () => {
      const orbit = computeReferenceOrbit({ real: 300, imag: 0 }, 100);
      const result = iteratePerturbation(orbit, { real: 1e-9, imag: 0 }, 100);

      expect(orbit.length).toBe(1);
      expect(result.escaped).toBe(true);
      expect(result.iterations).toBe(1);
      expect(result.finalZ.real).toBeCloseTo(300, 6);
    });

    it("reports maxIterations for an empty reference", () => {
      const orbit = computeReferenceOrbit({ real: 0, imag: 0 }, 0);

      expect(iteratePerturbation(orbit, { real: 2, imag: 0 }, 50)).toEqual({
        iterations: 50,
        escaped: false,
        glitchIteration: 0,
        finalZ: { real: 0, imag: 0 },
      });
    });

    describe("series", () => {
      it("skips ahead and agrees for an interior pixel", () => {
        const orbit = computeReferenceOrbitWithSeries({ real: -0.5, imag: 0 }, 200, 1e-6);
        const result = iteratePerturbation(orbit, { real: 1e-3, imag: 0 }, 200, { useSeries: true });

        expect(orbit.series?.validIterations).toBeGreaterThan(1);
        expect(result.escaped).toBe(false);
        expect(result.iterations).toBe(200);
      });

      it("iterates from the start when only one iteration could be skipped", () => {
        const orbit = computeReferenceOrbitWithSeries({ real: -0.5, imag: 0 }, 200, 1);
        const result = iteratePerturbation(orbit, { real: 1, imag: 0 }, 200, { useSeries: true });

        expect(orbit.series?.validIterations).toBe(1);
        expect(result.iterations).toBe(8);
      });
    });

    describe("glitch detection", () => {
      const orbit = computeReferenceOrbit({ real: -0.5, imag: 0 }, 200);

      it("flags a delta that outgrows the reference", () => {
        // |δ₁|² = 0.01 > 1e-6·|Z₁|² = 2.5e-7
        const result = iteratePerturbation(orbit, { real: 0.1, imag: 0 }, 200, { detectGlitches: true });

        expect(result.glitchIteration).toBe(1);
      });

      it("leaves small deltas unflagged", () => {
        const result = iteratePerturbation(orbit, { real: 1e-6, imag: 0 }, 200, { detectGlitches: true });

        expect(result.glitchIteration).toBe(0);
      });

      it("records nothing when detection is off", () => {
        const result = iteratePerturbation(orbit, { real: 0.1, imag: 0 }, 200);

        expect(result.glitchIteration).toBe(0);
      });
    });
  });

  describe("computeGlitchFlags", () => {
    it("writes the first glitched iteration per pixel, row-major", () => {
      const orbit = computeReferenceOrbit({ real: -0.5, imag: 0 }, 50);
      const flags = computeGlitchFlags(orbit, { center: { real: -0.5, imag: 0 }, scale: 0.4, width: 4, height: 4 }, 50);

      // Every pixel but the one sitting on the reference (x = 2, y = 2) is at least 0.1 away
      const expected = new Array<number>(16).fill(1);
      expected[2 * 4 + 2] = 0;
      expect(flags).toHaveLength(16);
      expect(Array.from(flags)).toEqual(expected);
    });
  });
});
