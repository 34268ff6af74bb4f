import type { ComplexStd } from "@/fractals/mandelbrot/types";

/**
 * Pixel and normalized-screen mappings shared with the GPU kernels.
 *
 * The view spans `scale` units vertically and `scale * aspect` horizontally,
 * centered on `center`. Normalized coordinates run 0..1 across the image with
 * x = pixel / width and y = pixel / height, no half-pixel offset.
 */

export const normalizedToComplex = (
  normX: number,
  normY: number,
  center: ComplexStd,
  scale: number,
  aspect: number
): ComplexStd => {
  return {
    real: center.real + (normX - 0.5) * scale * aspect,
    imag: center.imag + (normY - 0.5) * scale,
  };
};

export const pixelToComplex = (
  point: { x: number; y: number },
  width: number,
  height: number,
  center: ComplexStd,
  scale: number
): ComplexStd => {
  return normalizedToComplex(point.x / width, point.y / height, center, scale, width / height);
};

export const complexToPixel = (
  point: ComplexStd,
  width: number,
  height: number,
  center: ComplexStd,
  scale: number
): { x: number; y: number } => {
  const aspect = width / height;
  const normX = (point.real - center.real) / (scale * aspect) + 0.5;
  const normY = (point.imag - center.imag) / scale + 0.5;
  return { x: normX * width, y: normY * height };
};

/**
 * Offset of a pixel from a reference point, without forming the pixel's
 * absolute coordinate first. Subtracting two nearly equal absolute
 * coordinates would cancel away the digits that matter at deep zoom.
 */
export const pixelToDeltaC = (
  point: { x: number; y: number },
  width: number,
  height: number,
  viewCenter: ComplexStd,
  referenceCenter: ComplexStd,
  scale: number
): ComplexStd => {
  const aspect = width / height;
  return {
    real: (point.x / width - 0.5) * scale * aspect + (viewCenter.real - referenceCenter.real),
    imag: (point.y / height - 0.5) * scale + (viewCenter.imag - referenceCenter.imag),
  };
};
