import { f16round } from "@petamoriken/float16";

/**
 * Floating-point format of an affine transform's coefficients.
 *
 * Numbers are always stored as doubles; a narrower precision means every
 * stored value has been rounded to the nearest value of that format.
 */
export type Precision = "float16" | "float32" | "float64";

/** Precision used when a constructor is not given one. */
export const DEFAULT_PRECISION = "float64" satisfies Precision;

const ROUNDING: Record<Precision, (value: number) => number> = {
  float16: f16round,
  float32: Math.fround,
  float64: (value) => value,
};

// Widest precision of each pair. Symmetric.
const PROMOTION: Record<Precision, Record<Precision, Precision>> = {
  float16: { float16: "float16", float32: "float32", float64: "float64" },
  float32: { float16: "float32", float32: "float32", float64: "float64" },
  float64: { float16: "float64", float32: "float64", float64: "float64" },
};

export function isPrecision(value: unknown): value is Precision {
  return typeof value === "string" && Object.hasOwn(ROUNDING, value);
}

/** Round a number to the nearest value representable in `precision`. */
export function coerce(value: number, precision: Precision): number {
  if (!isPrecision(precision)) {
    throw new RangeError(`Unknown precision: ${String(precision)}`);
  }
  return ROUNDING[precision](value);
}

/** The common precision two operands are promoted to when combined. */
export function promote(a: Precision, b: Precision): Precision {
  if (!isPrecision(a) || !isPrecision(b)) {
    throw new RangeError(`Cannot promote ${String(a)} and ${String(b)}`);
  }
  return PROMOTION[a][b];
}
