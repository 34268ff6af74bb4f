import { Decimal } from "decimal.js";
import { createComplexDD, ddToStd, isComplexDD, stdToDD } from "./dd-math";
import type { ComplexDD, ComplexStd, PrecisionLevel as PrecisionLevelType } from "./types";

export type PrecisionLevel = PrecisionLevelType;

/** Safety margin added to the digits a scale needs */
const PRECISION_SAFETY_DIGITS = 3;

/** Digits at which double precision stops being enough */
const DOUBLE_DIGITS_LIMIT = 14;

/** Deepest scale passed to log10; keeps the result finite for scale <= 0 */
const MIN_SCALE = 1e-30;

/**
 * Digits needed to resolve pixels at a given scale.
 *
 * digits = -log10(scale) + 3
 *
 * Examples:
 * - Scale 2: ~2.7 digits
 * - Scale 1e-10: 13 digits (double)
 * - Scale 1e-15: 18 digits (double-double)
 */
export function requiredDigits(scale: number): number {
  return -Math.log10(Math.max(scale, MIN_SCALE)) + PRECISION_SAFETY_DIGITS;
}

/**
 * Precision tiers. A pure function of scale; safe to call every frame.
 */
export const PrecisionLevel = {
  required(scale: number): PrecisionLevel {
    return requiredDigits(scale) < DOUBLE_DIGITS_LIMIT ? "double" : "doubleDouble";
  },

  displayName(level: PrecisionLevel): string {
    return level === "double" ? "Double" : "Double-Double";
  },

  /** Deepest zoom (as a power of ten) the tier supports */
  maxZoomExponent(level: PrecisionLevel): number {
    return level === "double" ? 14 : 28;
  },
} as const;

/**
 * Whether a scale lies beyond what double-double can resolve.
 * Rendering still proceeds there; the result is simply not reliable.
 */
export function isBeyondPrecisionFloor(scale: number): boolean {
  return scale < Math.pow(10, -PrecisionLevel.maxZoomExponent("doubleDouble"));
}

/**
 * Convert a Decimal-backed point (as the UI stores deep locations) to
 * a double-double complex number.
 */
export function decimalPointToDD(point: { x: Decimal; y: Decimal }): ComplexDD {
  return createComplexDD(point.x.toString(), point.y.toString());
}

/**
 * Normalize a view center to both representations.
 * The double value is what GPU parameters and region maths use; the
 * double-double value seeds the high-precision orbit.
 */
export function resolveCenter(center: ComplexStd | ComplexDD): { std: ComplexStd; dd: ComplexDD } {
  if (isComplexDD(center)) {
    return { std: ddToStd(center), dd: center };
  }
  return { std: center, dd: stdToDD(center) };
}
