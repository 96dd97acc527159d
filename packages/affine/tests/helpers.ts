import { expect } from "vitest";
import type { Affine, Point } from "../src/affine.js";
import { affine, distance } from "../src/affine.js";

export const TOLERANCE = 1e-14;

// ── Fixtures ────────────────────────────────────────────────────────────

export const A = affine(1, 0, -3, 0.1, 1, 2);
export const B = affine(-0.4, 0.1, -4.2, -0.3, 0.7, 1.1);
export const C = affine(2.3, -0.9, -6.1, 0.7, -3.1, -5.2);

export const VECTORS: Point[] = [
  [0.2, 1.3],
  [-1, Math.PI],
  [-Math.SQRT2, 0.75],
];

export const SCALES = [2, 0.1, (1 + Math.sqrt(5)) / 2];

export const ANGLES = [(-2 * Math.PI) / 11, Math.PI / 7, 0.1];

// ── Assertions ──────────────────────────────────────────────────────────

export function pointDistance(a: Readonly<Point>, b: Readonly<Point>): number {
  return Math.hypot(a[0] - b[0], a[1] - b[1]);
}

export function expectPointClose(
  actual: Readonly<Point>,
  expected: Readonly<Point>,
  tolerance = TOLERANCE,
): void {
  expect(pointDistance(actual, expected)).toBeLessThanOrEqual(tolerance);
}

export function expectTransformClose(
  actual: Affine,
  expected: Affine,
  tolerance = TOLERANCE,
): void {
  expect(distance(actual, expected)).toBeLessThanOrEqual(tolerance);
}
