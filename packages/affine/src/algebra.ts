import type { Affine, Point } from "./affine.js";
import { affine, convert, toPoint } from "./affine.js";
import { MissingOperandError, SingularTransformError } from "./errors.js";
import type { Precision } from "./precision.js";
import { coerce, promote } from "./precision.js";

// Left operations act on the output of a transform, right operations on its
// input. They do not commute.

/** B(p) = A(p) + (dx, dy) */
export function translateOutput<P extends Precision>(
  dx: number,
  dy: number,
  a: Affine<P>,
): Affine<P>;
export function translateOutput<P extends Precision>(
  offset: Readonly<Point>,
  a: Affine<P>,
): Affine<P>;
export function translateOutput(
  ...args: [dx: number, dy: number, a: Affine] | [Readonly<Point>, Affine]
): Affine {
  let offset: Readonly<Point>;
  let a: Affine;
  if (args.length === 3) {
    offset = [args[0], args[1]];
    a = args[2];
  } else {
    [offset, a] = args;
  }

  const p = a.precision;
  return affine(
    a.xx,
    a.xy,
    a.x + coerce(offset[0], p),
    a.yx,
    a.yy,
    a.y + coerce(offset[1], p),
    p,
  );
}

/** C(p) = A(p + (dx, dy)) */
export function translateInput<P extends Precision>(
  a: Affine<P>,
  dx: number,
  dy: number,
): Affine<P>;
export function translateInput<P extends Precision>(
  a: Affine<P>,
  offset: Readonly<Point>,
): Affine<P>;
export function translateInput(
  a: Affine,
  offsetOrDx: number | Readonly<Point>,
  maybeDy?: number,
): Affine {
  const [dx, dy] = toPoint("translateInput", offsetOrDx, maybeDy);
  const p = a.precision;
  const tx = coerce(dx, p);
  const ty = coerce(dy, p);
  return affine(
    a.xx,
    a.xy,
    a.xx * tx + a.xy * ty + a.x,
    a.yx,
    a.yy,
    a.yx * tx + a.yy * ty + a.y,
    p,
  );
}

/** B(p) = rho * A(p) */
export function scaleOutput<P extends Precision>(
  rho: number,
  a: Affine<P>,
): Affine<P> {
  const p = a.precision;
  const r = coerce(rho, p);
  return affine(r * a.xx, r * a.xy, r * a.x, r * a.yx, r * a.yy, r * a.y, p);
}

/** C(p) = A(rho * p) */
export function scaleInput<P extends Precision>(
  a: Affine<P>,
  rho: number,
): Affine<P> {
  const p = a.precision;
  const r = coerce(rho, p);
  return affine(r * a.xx, r * a.xy, a.x, r * a.yx, r * a.yy, a.y, p);
}

function cosSin(theta: number, precision: Precision): [number, number] {
  const t = coerce(theta, precision);
  return [coerce(Math.cos(t), precision), coerce(Math.sin(t), precision)];
}

/**
 * R∘A, where R rotates by `theta` radians counter-clockwise about the origin.
 */
export function rotateOutput<P extends Precision>(
  theta: number,
  a: Affine<P>,
): Affine<P> {
  const [cs, sn] = cosSin(theta, a.precision);
  return affine(
    cs * a.xx - sn * a.yx,
    cs * a.xy - sn * a.yy,
    cs * a.x - sn * a.y,
    cs * a.yx + sn * a.xx,
    cs * a.yy + sn * a.xy,
    cs * a.y + sn * a.x,
    a.precision,
  );
}

/**
 * A∘R, where R rotates by `theta` radians counter-clockwise about the origin.
 */
export function rotateInput<P extends Precision>(
  a: Affine<P>,
  theta: number,
): Affine<P> {
  const [cs, sn] = cosSin(theta, a.precision);
  return affine(
    a.xx * cs + a.xy * sn,
    a.xy * cs - a.xx * sn,
    a.x,
    a.yx * cs + a.yy * sn,
    a.yy * cs - a.yx * sn,
    a.y,
    a.precision,
  );
}

/** Determinant of the linear part; the translation is ignored. */
export function determinant({ precision, xx, xy, yx, yy }: Affine): number {
  return coerce(xx * yy - xy * yx, precision);
}

export function jacobian(a: Affine): number {
  return Math.abs(determinant(a));
}

/**
 * Compute the inverse of an Affine.
 *
 * Throws a {@link SingularTransformError} when the determinant is exactly
 * zero.
 */
export function invert<P extends Precision>(a: Affine<P>): Affine<P> {
  const det = determinant(a);

  if (det === 0) {
    throw new SingularTransformError(a);
  }

  // Round the linear part before deriving the translation from it.
  const p = a.precision;
  const ra = coerce(a.yy / det, p);
  const rb = coerce(-a.xy / det, p);
  const rd = coerce(-a.yx / det, p);
  const re = coerce(a.xx / det, p);

  return affine(
    ra,
    rb,
    -ra * a.x - rb * a.y,
    rd,
    re,
    -rd * a.x - re * a.y,
    p,
  );
}

/** The point that `a` maps to the origin. */
export function intercept(a: Affine): Point {
  const det = determinant(a);

  if (det === 0) {
    throw new SingularTransformError(a);
  }

  return [
    coerce((a.xy * a.y - a.yy * a.x) / det, a.precision),
    coerce((a.yx * a.x - a.xx * a.y) / det, a.precision),
  ];
}

/**
 * Multiply the 3×3 matrices of two transforms: A×B (apply B first, then A).
 *
 *   | a.xx a.xy a.x |   | b.xx b.xy b.x |
 *   | a.yx a.yy a.y | × | b.yx b.yy b.y |
 *   |  0    0    1  |   |  0    0    1  |
 */
function multiply(a: Affine, b: Affine): Affine {
  return affine(
    a.xx * b.xx + a.xy * b.yx,
    a.xx * b.xy + a.xy * b.yy,
    a.xx * b.x + a.xy * b.y + a.x,
    a.yx * b.xx + a.yy * b.yx,
    a.yx * b.xy + a.yy * b.yy,
    a.yx * b.x + a.yy * b.y + a.y,
    promote(a.precision, b.precision),
  );
}

/**
 * Compose affine transforms: compose(A, B, C) applies C, then B, then A.
 *
 * The result has the widest precision of its operands. A single operand is
 * returned as is.
 */
export function compose<P extends Precision>(
  ...transforms: [Affine<P>, ...Affine<P>[]]
): Affine<P>;
export function compose(...transforms: Affine[]): Affine;
export function compose(...transforms: Affine[]): Affine {
  if (transforms.length === 0) {
    throw new MissingOperandError("compose");
  }
  return transforms.reduce((acc, t) => multiply(acc, t));
}

/**
 * Right division A/B, i.e. compose(A, invert(B)): the X solving X∘B = A.
 *
 * Throws a {@link SingularTransformError} when B is not invertible.
 */
export function rightDivide<P extends Precision>(
  a: Affine<P>,
  b: Affine<P>,
): Affine<P>;
export function rightDivide(a: Affine, b: Affine): Affine;
export function rightDivide(lhs: Affine, rhs: Affine): Affine {
  const p = promote(lhs.precision, rhs.precision);
  const a = convert(lhs, p);
  const b = convert(rhs, p);

  const det = determinant(b);
  if (det === 0) {
    throw new SingularTransformError(b, "Right operand is not invertible");
  }

  const rxx = coerce((a.xx * b.yy - a.xy * b.yx) / det, p);
  const rxy = coerce((a.xy * b.xx - a.xx * b.xy) / det, p);
  const ryx = coerce((a.yx * b.yy - a.yy * b.yx) / det, p);
  const ryy = coerce((a.yy * b.xx - a.yx * b.xy) / det, p);

  return affine(
    rxx,
    rxy,
    a.x - (rxx * b.x + rxy * b.y),
    ryx,
    ryy,
    a.y - (ryx * b.x + ryy * b.y),
    p,
  );
}

/**
 * Left division A\B, i.e. compose(invert(A), B): the X solving A∘X = B.
 *
 * Throws a {@link SingularTransformError} when A is not invertible.
 */
export function leftDivide<P extends Precision>(
  a: Affine<P>,
  b: Affine<P>,
): Affine<P>;
export function leftDivide(a: Affine, b: Affine): Affine;
export function leftDivide(lhs: Affine, rhs: Affine): Affine {
  const p = promote(lhs.precision, rhs.precision);
  const a = convert(lhs, p);
  const b = convert(rhs, p);

  const det = determinant(a);
  if (det === 0) {
    throw new SingularTransformError(a, "Left operand is not invertible");
  }

  const txx = coerce(a.yy / det, p);
  const txy = coerce(-a.xy / det, p);
  const tyx = coerce(-a.yx / det, p);
  const tyy = coerce(a.xx / det, p);
  const tx = b.x - a.x;
  const ty = b.y - a.y;

  return affine(
    txx * b.xx + txy * b.yx,
    txx * b.xy + txy * b.yy,
    txx * tx + txy * ty,
    tyx * b.xx + tyy * b.yx,
    tyx * b.xy + tyy * b.yy,
    tyx * tx + tyy * ty,
    p,
  );
}
