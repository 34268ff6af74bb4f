import { DoubleDouble } from "./double-double";
import type { ComplexDD, ComplexStd } from "./types";

/**
 * Add two double-double complex numbers.
 * Returns: a + b
 */
export function addDD(a: ComplexDD, b: ComplexDD): ComplexDD {
  return {
    real: a.real.plus(b.real),
    imag: a.imag.plus(b.imag),
  };
}

/**
 * Subtract two double-double complex numbers.
 * Returns: a - b
 */
export function subtractDD(a: ComplexDD, b: ComplexDD): ComplexDD {
  return {
    real: a.real.minus(b.real),
    imag: a.imag.minus(b.imag),
  };
}

/**
 * Multiply two double-double complex numbers.
 * Formula: (a + bi) * (c + di) = (ac - bd) + (ad + bc)i
 */
export function multiplyDD(a: ComplexDD, b: ComplexDD): ComplexDD {
  return {
    real: a.real.times(b.real).minus(a.imag.times(b.imag)),
    imag: a.real.times(b.imag).plus(a.imag.times(b.real)),
  };
}

/**
 * Square of a double-double complex number.
 * Formula: (a + bi)² = (a² - b²) + 2abi
 */
export function squareDD(z: ComplexDD): ComplexDD {
  return {
    real: z.real.times(z.real).minus(z.imag.times(z.imag)),
    imag: z.real.times(2).times(z.imag),
  };
}

/**
 * Multiply by a real scalar.
 */
export function scaleDD(z: ComplexDD, k: DoubleDouble | number): ComplexDD {
  return {
    real: z.real.times(k),
    imag: z.imag.times(k),
  };
}

export function negateDD(z: ComplexDD): ComplexDD {
  return { real: z.real.neg(), imag: z.imag.neg() };
}

/**
 * Calculate the squared magnitude.
 * Formula: |z|² = real² + imag²
 */
export function magnitudeSquaredDD(z: ComplexDD): DoubleDouble {
  return z.real.times(z.real).plus(z.imag.times(z.imag));
}

/**
 * Magnitude |z|, through the double-double Newton square root.
 */
export function magnitudeDD(z: ComplexDD): DoubleDouble {
  return magnitudeSquaredDD(z).sqrt();
}

/**
 * Convert to standard precision (loses the low parts).
 * Used when handing orbit points to the double-precision pipeline.
 */
export function ddToStd(z: ComplexDD): ComplexStd {
  return {
    real: z.real.toNumber(),
    imag: z.imag.toNumber(),
  };
}

/**
 * Convert a standard precision complex number to double-double.
 */
export function stdToDD(z: ComplexStd): ComplexDD {
  return {
    real: new DoubleDouble(z.real),
    imag: new DoubleDouble(z.imag),
  };
}

/**
 * Create a double-double complex number.
 * Accepts numbers or decimal strings; strings keep digits beyond double precision.
 */
export function createComplexDD(real: number | string, imag: number | string): ComplexDD {
  return {
    real: typeof real === "string" ? DoubleDouble.fromString(real) : new DoubleDouble(real),
    imag: typeof imag === "string" ? DoubleDouble.fromString(imag) : new DoubleDouble(imag),
  };
}

export const ZERO_DD: ComplexDD = { real: DoubleDouble.ZERO, imag: DoubleDouble.ZERO };

export function isComplexDD(z: ComplexDD | ComplexStd): z is ComplexDD {
  return z.real instanceof DoubleDouble;
}
