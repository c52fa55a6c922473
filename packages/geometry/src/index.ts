/**
 * @branchwork/geometry: 4x4 affine matrix builders and composition.
 *
 * Matrices are flat, row-major, readonly 16-tuples. Angles are in degrees.
 * Every builder is pure and returns an affine matrix (last row `[0, 0, 0, 1]`).
 *
 * @packageDocumentation
 */

export type {
  Mat4,
  Mat3,
  Row4,
  Rows4,
  Vec3,
  TransformFunction,
  StepTransform,
  BranchTransform,
} from "./types.js";

export {
  normalizeDegrees,
  degToRad,
  sinDeg,
  cosDeg,
  tanDeg,
  isTangentPole,
} from "./angles.js";

export {
  multiply,
  chain,
  compose,
  identity,
  scale,
  rotateX,
  rotateY,
  rotateZ,
  rotate,
  translate,
  skew,
  skewWith,
  applyToPoint,
  applyToVector,
  approxEqual,
  isAffine,
  linearPart,
  toRows,
  fromRows,
  type SkewAngles,
  type SkewOptions,
} from "./transforms.js";

export {
  sideLength,
  totalInteriorDegrees,
  placeOnPolygonSide,
  placeOnPolygonSideWithZOffset,
} from "./polygon.js";

export { memoizeTransform, type MemoizedTransform } from "./memoize.js";
