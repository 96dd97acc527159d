export type { Affine, Coefficients, Point } from "./affine.js";
export {
  affine,
  almostEqual,
  apply,
  convert,
  distance,
  format,
  fromArray,
  identity,
  precisionOf,
  rotation,
  scale,
  toArray,
  translation,
} from "./affine.js";
export {
  compose,
  determinant,
  intercept,
  invert,
  jacobian,
  leftDivide,
  rightDivide,
  rotateInput,
  rotateOutput,
  scaleInput,
  scaleOutput,
  translateInput,
  translateOutput,
} from "./algebra.js";
export { MissingOperandError, SingularTransformError } from "./errors.js";
export type { Precision } from "./precision.js";
export { coerce, DEFAULT_PRECISION, isPrecision, promote } from "./precision.js";
