import type { Affine } from "./affine.js";

/**
 * Thrown when an operation needs the inverse of a transform whose linear part
 * has a zero determinant.
 */
export class SingularTransformError extends Error {
  readonly transform: Affine;

  constructor(
    transform: Affine,
    message = "Cannot invert degenerate transform",
  ) {
    super(message);
    this.name = "SingularTransformError";
    this.transform = transform;
  }
}

export class MissingOperandError extends Error {
  constructor(operation: string) {
    super(`${operation}: missing operand(s)`);
    this.name = "MissingOperandError";
  }
}
