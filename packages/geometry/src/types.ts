/**
 * A 4x4 homogeneous matrix stored as a flat 16-element tuple (row-major).
 *
 * Builders always produce an affine matrix, i.e. one whose last row is
 * `[0, 0, 0, 1]`; products of affine matrices stay affine.
 */
// prettier-ignore
export type Mat4 = readonly [
  number, number, number, number,
  number, number, number, number,
  number, number, number, number,
  number, number, number, number,
];

/** Upper-left 3x3 block of a Mat4, row-major */
// prettier-ignore
export type Mat3 = readonly [
  number, number, number,
  number, number, number,
  number, number, number,
];

export type Row4 = readonly [number, number, number, number];

/** A Mat4 as nested rows, the shape most renderers take */
export type Rows4 = readonly [Row4, Row4, Row4, Row4];

/** Cartesian 3D point or vector */
export type Vec3 = readonly [number, number, number];

/** A pure function from numeric parameters to a matrix */
export type TransformFunction<P extends readonly number[] = readonly number[]> = (
  ...params: P
) => Mat4;

/** Transform parameterised by a single distance (or index) */
export type StepTransform = (distance: number) => Mat4;

/** Transform placing a branch at the tip of a trunk of length `size` */
export type BranchTransform = (size: number, angleX: number, angleZ: number) => Mat4;
