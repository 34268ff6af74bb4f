import { describe, expect, it } from "vitest";
import { complexToPixel, normalizedToComplex, pixelToComplex, pixelToDeltaC } from "./coordinates";

describe("Coordinate Functions", () => {
  const width = 800;
  const height = 400;
  const center = { real: -0.75, imag: 0 };

  it("maps the image center to the view center", () => {
    expect(pixelToComplex({ x: 400, y: 200 }, width, height, center, 2)).toEqual(center);
  });

  it("spans scale·aspect horizontally and scale vertically", () => {
    const topLeft = pixelToComplex({ x: 0, y: 0 }, width, height, center, 2);

    expect(topLeft).toEqual({ real: -2.75, imag: -1 });
  });

  it("uses no half-pixel offset in normalized coordinates", () => {
    expect(normalizedToComplex(0.25, 0.75, { real: 0, imag: 0 }, 4, 1)).toEqual({ real: -1, imag: 1 });
  });

  it("inverts pixelToComplex", () => {
    const point = pixelToComplex({ x: 123, y: 45 }, width, height, center, 0.5);
    const pixel = complexToPixel(point, width, height, center, 0.5);

    expect(pixel.x).toBeCloseTo(123, 9);
    expect(pixel.y).toBeCloseTo(45, 9);
  });

  describe("pixelToDeltaC", () => {
    it("is zero for the pixel on the reference", () => {
      expect(pixelToDeltaC({ x: 400, y: 200 }, width, height, center, center, 1e-20)).toEqual({ real: 0, imag: 0 });
    });

    it("keeps offsets far below the resolution of the absolute coordinates", () => {
      const scale = 1e-20;
      const delta = pixelToDeltaC({ x: 600, y: 200 }, width, height, center, center, scale);

      // (600/800 - 0.5) · 1e-20 · 2; the absolute coordinate would round back to -0.75
      expect(delta.real).toBeCloseTo(5e-21, 35);
      expect(delta.imag).toBe(0);
      expect(pixelToComplex({ x: 600, y: 200 }, width, height, center, scale).real).toBe(-0.75);
    });

    it("adds the offset between the view and the reference", () => {
      const delta = pixelToDeltaC({ x: 400, y: 200 }, width, height, { real: 0.5, imag: 0.25 }, { real: 0.25, imag: 0 }, 1);

      expect(delta).toEqual({ real: 0.25, imag: 0.25 });
    });
  });
});
