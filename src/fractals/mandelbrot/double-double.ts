// ABOUTME: Double-double arithmetic: a value stored as the unevaluated sum hi + lo of two doubles
// ABOUTME: Error-free transformations keep ~30 significant digits, enough for zooms to about 10^28

import { Decimal } from "decimal.js";

/** 2^27 + 1, splits a double into two halves whose products are exact */
const SPLITTER = 134217729;

/** Digits used when converting to and from decimal.js values */
const DECIMAL_DIGITS = 45;

const DDDecimal = Decimal.clone({ precision: 60 });

/**
 * Two-sum: s = fl(a + b) and e such that a + b = s + e exactly.
 */
export function twoSum(a: number, b: number): [s: number, e: number] {
  const s = a + b;
  const v = s - a;
  const e = a - (s - v) + (b - v);
  return [s, e];
}

/**
 * Two-product: p = fl(a * b) and e such that a * b = p + e exactly.
 *
 * JavaScript has no fused multiply-add, so the error term is recovered with
 * Dekker's split instead of fma(a, b, -p). Both give the same e for finite
 * inputs whose product does not overflow.
 */
export function twoProduct(a: number, b: number): [p: number, e: number] {
  const p = a * b;

  let t = SPLITTER * a;
  const aHi = t - (t - a);
  const aLo = a - aHi;
  t = SPLITTER * b;
  const bHi = t - (t - b);
  const bLo = b - bHi;

  const e = aHi * bHi - p + aHi * bLo + aLo * bHi + aLo * bLo;
  return [p, e];
}

/**
 * Exact decimal expansion of a double, rounded far below double-double resolution.
 * Going through toPrecision avoids the shortest round-trip string, which is not
 * the binary value.
 */
function exactDecimal(value: number): Decimal {
  return new DDDecimal(value.toPrecision(DECIMAL_DIGITS));
}

/**
 * Immutable double-double value. Method names follow decimal.js so the two
 * read alike (plus, minus, times, div, sqrt, lt, gt...).
 */
export class DoubleDouble {
  static readonly ZERO = new DoubleDouble(0, 0);
  static readonly ONE = new DoubleDouble(1, 0);

  constructor(
    readonly hi: number,
    readonly lo: number = 0
  ) {}

  static from(value: DoubleDouble | number): DoubleDouble {
    return value instanceof DoubleDouble ? value : new DoubleDouble(value, 0);
  }

  /**
   * Parse a decimal string (or decimal.js value) keeping the digits a double
   * cannot hold in the low part.
   */
  static fromDecimal(value: Decimal.Value): DoubleDouble {
    const d = new DDDecimal(value);
    const hi = d.toNumber();
    if (!Number.isFinite(hi) || hi === 0) {
      return new DoubleDouble(hi, 0);
    }
    const lo = d.minus(exactDecimal(hi)).toNumber();
    return new DoubleDouble(hi, lo);
  }

  static fromString(value: string): DoubleDouble {
    return DoubleDouble.fromDecimal(value);
  }

  plus(other: DoubleDouble | number): DoubleDouble {
    const b = DoubleDouble.from(other);
    const [s1, e1] = twoSum(this.hi, b.hi);
    const [s2, e2] = twoSum(this.lo, b.lo);
    const e3 = e1 + s2;
    const [s3, e4] = twoSum(s1, e3);
    return new DoubleDouble(s3, e2 + e4);
  }

  minus(other: DoubleDouble | number): DoubleDouble {
    return this.plus(DoubleDouble.from(other).neg());
  }

  times(other: DoubleDouble | number): DoubleDouble {
    if (typeof other === "number") {
      // Scalar product: a plain double needs no cross terms
      const [p, e] = twoProduct(other, this.hi);
      return new DoubleDouble(p, e + other * this.lo);
    }
    const [p, e] = twoProduct(this.hi, other.hi);
    const e2 = e + this.hi * other.lo + this.lo * other.hi;
    const hi = p + e2;
    return new DoubleDouble(hi, p - hi + e2);
  }

  /**
   * Division: hi/hi seed plus one correction from the remainder a - q1·b.
   * The remainder carries the exact product error, so a single step reaches
   * double-double precision; there is no further iteration.
   */
  div(other: DoubleDouble | number): DoubleDouble {
    const b = DoubleDouble.from(other);
    const q1 = this.hi / b.hi;

    const [p, e] = twoProduct(q1, b.hi);
    const rHi = this.hi - p;
    const rLo = this.lo - e - q1 * b.lo;

    const q2 = (rHi + rLo) / b.hi;
    const hi = q1 + q2;
    return new DoubleDouble(hi, q1 - hi + q2);
  }

  squared(): DoubleDouble {
    return this.times(this);
  }

  /**
   * Square root by Newton-Raphson: Math.sqrt seed, then two refinements
   * x ← (x + v/x) / 2 carried out in double-double.
   */
  sqrt(): DoubleDouble {
    if (!(this.hi > 0)) {
      return DoubleDouble.ZERO;
    }
    const x0 = new DoubleDouble(Math.sqrt(this.hi));
    const x1 = x0.plus(this.div(x0)).times(0.5);
    return x1.plus(this.div(x1)).times(0.5);
  }

  neg(): DoubleDouble {
    return new DoubleDouble(-this.hi, -this.lo);
  }

  abs(): DoubleDouble {
    return this.hi < 0 ? this.neg() : this;
  }

  cmp(other: DoubleDouble | number): -1 | 0 | 1 {
    const b = DoubleDouble.from(other);
    if (this.hi < b.hi || (this.hi === b.hi && this.lo < b.lo)) return -1;
    if (this.hi === b.hi && this.lo === b.lo) return 0;
    return 1;
  }

  lt(other: DoubleDouble | number): boolean {
    return this.cmp(other) < 0;
  }

  lte(other: DoubleDouble | number): boolean {
    return this.cmp(other) <= 0;
  }

  gt(other: DoubleDouble | number): boolean {
    return this.cmp(other) > 0;
  }

  gte(other: DoubleDouble | number): boolean {
    return this.cmp(other) >= 0;
  }

  eq(other: DoubleDouble | number): boolean {
    return this.cmp(other) === 0;
  }

  isZero(): boolean {
    return this.hi === 0 && this.lo === 0;
  }

  /** Nearest double (loses the low part) */
  toNumber(): number {
    return this.hi + this.lo;
  }

  toDecimal(): Decimal {
    return exactDecimal(this.hi).plus(exactDecimal(this.lo));
  }

  toString(): string {
    return this.toDecimal().toSignificantDigits(32).toString();
  }
}
