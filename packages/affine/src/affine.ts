import type { Precision } from "./precision.js";
import { coerce, DEFAULT_PRECISION } from "./precision.js";

/**
 * Affine transform with six coefficients and a precision tag.
 *
 * Maps (px, py) to:
 *   qx = xx * px + xy * py + x
 *   qy = yx * px + yy * py + y
 *
 * Values are frozen; every operation returns a new transform.
 */
export interface Affine<P extends Precision = Precision> {
  readonly precision: P;
  readonly xx: number;
  readonly xy: number;
  readonly x: number;
  readonly yx: number;
  readonly yy: number;
  readonly y: number;
}

export type Point = [x: number, y: number];

/**
 * Coefficients in geotransform order: [a, b, c, d, e, f].
 *
 * Same layout as GDAL and rasterio geotransforms, i.e.
 * [xx, xy, x, yx, yy, y].
 */
export type Coefficients = [
  a: number,
  b: number,
  c: number,
  d: number,
  e: number,
  f: number,
];

/** Create a transform from six coefficients, each rounded to `precision`. */
export function affine(
  xx: number,
  xy: number,
  x: number,
  yx: number,
  yy: number,
  y: number,
): Affine<typeof DEFAULT_PRECISION>;
export function affine<P extends Precision>(
  xx: number,
  xy: number,
  x: number,
  yx: number,
  yy: number,
  y: number,
  precision: P,
): Affine<P>;
export function affine(
  xx: number,
  xy: number,
  x: number,
  yx: number,
  yy: number,
  y: number,
  precision: Precision = DEFAULT_PRECISION,
): Affine {
  return Object.freeze({
    precision,
    xx: coerce(xx, precision),
    xy: coerce(xy, precision),
    x: coerce(x, precision),
    yx: coerce(yx, precision),
    yy: coerce(yy, precision),
    y: coerce(y, precision),
  });
}

/** The identity transform. */
export function identity(): Affine<typeof DEFAULT_PRECISION>;
export function identity<P extends Precision>(precision: P): Affine<P>;
export function identity(precision: Precision = DEFAULT_PRECISION): Affine {
  return affine(1, 0, 0, 0, 1, 0, precision);
}

/** Create a translation transform. */
export function translation(
  xoff: number,
  yoff: number,
): Affine<typeof DEFAULT_PRECISION> {
  return affine(1, 0, xoff, 0, 1, yoff);
}

/** Create a scaling transform. If only one argument, scale uniformly. */
export function scale(
  sx: number,
  sy: number = sx,
): Affine<typeof DEFAULT_PRECISION> {
  return affine(sx, 0, 0, 0, sy, 0);
}

/** Create a counter-clockwise rotation about the origin, in radians. */
export function rotation(theta: number): Affine<typeof DEFAULT_PRECISION> {
  const cs = Math.cos(theta);
  const sn = Math.sin(theta);
  return affine(cs, -sn, 0, sn, cs, 0);
}

/** Build a transform from a six-element geotransform array. */
export function fromArray(
  coefficients: readonly number[],
): Affine<typeof DEFAULT_PRECISION>;
export function fromArray<P extends Precision>(
  coefficients: readonly number[],
  precision: P,
): Affine<P>;
export function fromArray(
  coefficients: readonly number[],
  precision: Precision = DEFAULT_PRECISION,
): Affine {
  if (coefficients.length !== 6) {
    throw new RangeError(
      `Expected 6 coefficients, got ${coefficients.length}`,
    );
  }
  const [a, b, c, d, e, f] = coefficients;
  return affine(a, b, c, d, e, f, precision);
}

export function toArray({ xx, xy, x, yx, yy, y }: Affine): Coefficients {
  return [xx, xy, x, yx, yy, y];
}

function hasPrecision<P extends Precision>(
  transform: Affine,
  precision: P,
): transform is Affine<P> {
  return transform.precision === precision;
}

/**
 * Convert the coefficients of a transform to another precision.
 *
 * Returns the input itself when it already has that precision.
 */
export function convert<P extends Precision>(
  transform: Affine,
  precision: P,
): Affine<P> {
  if (hasPrecision(transform, precision)) {
    return transform;
  }
  const { xx, xy, x, yx, yy, y } = transform;
  return affine(xx, xy, x, yx, yy, y, precision);
}

export function precisionOf<P extends Precision>(transform: Affine<P>): P {
  return transform.precision;
}

/**
 * Normalize the `(x, y)` or `([x, y])` argument forms of an operation.
 *
 * @internal
 */
export function toPoint(
  operation: string,
  pointOrX: number | Readonly<Point>,
  maybeY: number | undefined,
): Point {
  if (typeof pointOrX !== "number") {
    return [pointOrX[0], pointOrX[1]];
  }
  if (maybeY === undefined) {
    throw new TypeError(`${operation}: missing y coordinate`);
  }
  return [pointOrX, maybeY];
}

/**
 * Apply a transform to a coordinate.
 *
 * The coordinate is first rounded to the transform's precision.
 */
export function apply(transform: Affine, px: number, py: number): Point;
export function apply(transform: Affine, point: Readonly<Point>): Point;
export function apply(
  transform: Affine,
  pointOrX: number | Readonly<Point>,
  maybeY?: number,
): Point {
  const [rawX, rawY] = toPoint("apply", pointOrX, maybeY);
  const { precision, xx, xy, x, yx, yy, y } = transform;
  const px = coerce(rawX, precision);
  const py = coerce(rawY, precision);
  return [
    coerce(xx * px + xy * py + x, precision),
    coerce(yx * px + yy * py + y, precision),
  ];
}

/** Largest absolute difference between corresponding coefficients. */
export function distance(a: Affine, b: Affine): number {
  return Math.max(
    Math.abs(a.xx - b.xx),
    Math.abs(a.xy - b.xy),
    Math.abs(a.x - b.x),
    Math.abs(a.yx - b.yx),
    Math.abs(a.yy - b.yy),
    Math.abs(a.y - b.y),
  );
}

export function almostEqual(a: Affine, b: Affine, tolerance = 1e-14): boolean {
  return distance(a, b) <= tolerance;
}

/**
 * Diagnostic text for a transform, e.g. `Affine<float64>(1,0,0,  0,1,0)`.
 *
 * Not meant to be parsed back.
 */
export function format({ precision, xx, xy, x, yx, yy, y }: Affine): string {
  return `Affine<${precision}>(${xx},${xy},${x},  ${yx},${yy},${y})`;
}
