import { InvalidArgumentError, createLogger, getGeometryConfig, type SkewPolicy } from "@branchwork/core";
import { cosDeg, isTangentPole, sinDeg, tanDeg } from "./angles.js";
import type { Mat3, Mat4, Rows4, Vec3 } from "./types.js";

const log = createLogger("geometry");

// ---------------------------------------------------------------------------
// Internal helpers: flat row-major homogeneous matrices
// ---------------------------------------------------------------------------

/** Entry (row, col) of a * b */
function dotRowCol(a: Mat4, b: Mat4, row: number, col: number): number {
  let sum = 0;
  for (let k = 0; k < 4; k++) {
    sum += a[row * 4 + k] * b[k * 4 + col];
  }
  return sum;
}

// ---------------------------------------------------------------------------
// Composition
// ---------------------------------------------------------------------------

/**
 * Multiply two 4x4 matrices.
 * Result = a * b, so `b` acts on the object first.
 */
export function multiply(a: Mat4, b: Mat4): Mat4 {
  // prettier-ignore
  return [
    dotRowCol(a, b, 0, 0), dotRowCol(a, b, 0, 1), dotRowCol(a, b, 0, 2), dotRowCol(a, b, 0, 3),
    dotRowCol(a, b, 1, 0), dotRowCol(a, b, 1, 1), dotRowCol(a, b, 1, 2), dotRowCol(a, b, 1, 3),
    dotRowCol(a, b, 2, 0), dotRowCol(a, b, 2, 1), dotRowCol(a, b, 2, 2), dotRowCol(a, b, 2, 3),
    dotRowCol(a, b, 3, 0), dotRowCol(a, b, 3, 1), dotRowCol(a, b, 3, 2), dotRowCol(a, b, 3, 3),
  ];
}

/**
 * Left-to-right product `m0 * m1 * ... * mk`. The rightmost matrix is applied
 * to the object first. An empty chain is the identity.
 */
export function chain(...matrices: Mat4[]): Mat4 {
  if (matrices.length === 0) return identity();
  return matrices.reduce((acc, m) => multiply(acc, m));
}

/** Compose two transforms: apply `first`, then `second` */
export function compose(first: Mat4, second: Mat4): Mat4 {
  return multiply(second, first);
}

// ---------------------------------------------------------------------------
// Builders (4x4 homogeneous, angles in degrees)
// ---------------------------------------------------------------------------

/** 3D identity transform, the neutral element of composition */
export function identity(): Mat4 {
  // prettier-ignore
  return [
    1, 0, 0, 0,
    0, 1, 0, 0,
    0, 0, 1, 0,
    0, 0, 0, 1,
  ];
}

/** 3D scale by (sx, sy, sz) */
export function scale(sx = 1, sy = 1, sz = 1): Mat4 {
  // prettier-ignore
  return [
    sx,  0,  0, 0,
     0, sy,  0, 0,
     0,  0, sz, 0,
     0,  0,  0, 1,
  ];
}

/** 3D rotation around the X axis */
export function rotateX(angle: number): Mat4 {
  const c = cosDeg(angle);
  const s = sinDeg(angle);
  // prettier-ignore
  return [
    1, 0,  0, 0,
    0, c, -s, 0,
    0, s,  c, 0,
    0, 0,  0, 1,
  ];
}

/** 3D rotation around the Y axis */
export function rotateY(angle: number): Mat4 {
  const c = cosDeg(angle);
  const s = sinDeg(angle);
  // prettier-ignore
  return [
     c, 0, s, 0,
     0, 1, 0, 0,
    -s, 0, c, 0,
     0, 0, 0, 1,
  ];
}

/** 3D rotation around the Z axis */
export function rotateZ(angle: number): Mat4 {
  const c = cosDeg(angle);
  const s = sinDeg(angle);
  // prettier-ignore
  return [
    c, -s, 0, 0,
    s,  c, 0, 0,
    0,  0, 1, 0,
    0,  0, 0, 1,
  ];
}

/**
 * Rotate about X, then Y, then Z: `rotateZ(az) * rotateY(ay) * rotateX(ax)`.
 * Matches the argument order of a renderer's `rotate([ax, ay, az])`.
 */
export function rotate(ax = 0, ay = 0, az = 0): Mat4 {
  return chain(rotateZ(az), rotateY(ay), rotateX(ax));
}

/** 3D translation by (dx, dy, dz) */
export function translate(dx: number, dy: number, dz: number): Mat4 {
  // prettier-ignore
  return [
    1, 0, 0, dx,
    0, 1, 0, dy,
    0, 0, 1, dz,
    0, 0, 0,  1,
  ];
}

/**
 * Skew angles in degrees. `xy` skews x along y, `zx` skews z along x, and so
 * on; each ends up in the matching off-diagonal entry as its tangent.
 */
export interface SkewAngles {
  xy?: number;
  xz?: number;
  yx?: number;
  yz?: number;
  zx?: number;
  zy?: number;
}

export interface SkewOptions {
  /** Overrides `geometry.skewPolicy` from configuration */
  policy?: SkewPolicy;
}

function skewEntry(name: keyof SkewAngles, angle: number, policy: SkewPolicy): number {
  if (!isTangentPole(angle)) return tanDeg(angle);
  if (policy === "throw") {
    throw new InvalidArgumentError("skew", name, "undefined_tangent", `has no tangent at ${angle}°`);
  }
  log.warn(`skew: ${name} is on a tangent pole (${angle}°); using Infinity`);
  return Infinity;
}

/** Skew by named angles; omitted angles are 0 */
export function skewWith(angles: SkewAngles, options: SkewOptions = {}): Mat4 {
  const policy = options.policy ?? getGeometryConfig().skewPolicy;
  const t = (name: keyof SkewAngles): number => skewEntry(name, angles[name] ?? 0, policy);
  // prettier-ignore
  return [
    1,       t("xy"), t("xz"), 0,
    t("yx"), 1,       t("yz"), 0,
    t("zx"), t("zy"), 1,       0,
    0,       0,       0,       1,
  ];
}

/** Skew by angles in degrees; all default to 0, which gives the identity */
export function skew(xy = 0, xz = 0, yx = 0, yz = 0, zx = 0, zy = 0): Mat4 {
  return skewWith({ xy, xz, yx, yz, zx, zy });
}

// ---------------------------------------------------------------------------
// Transform application
// ---------------------------------------------------------------------------

/** Apply a transform to a point (includes translation) */
export function applyToPoint(t: Mat4, p: Vec3): Vec3 {
  return [
    t[0] * p[0] + t[1] * p[1] + t[2] * p[2] + t[3],
    t[4] * p[0] + t[5] * p[1] + t[6] * p[2] + t[7],
    t[8] * p[0] + t[9] * p[1] + t[10] * p[2] + t[11],
  ];
}

/** Apply a transform to a vector (translation is ignored) */
export function applyToVector(t: Mat4, v: Vec3): Vec3 {
  return [
    t[0] * v[0] + t[1] * v[1] + t[2] * v[2],
    t[4] * v[0] + t[5] * v[1] + t[6] * v[2],
    t[8] * v[0] + t[9] * v[1] + t[10] * v[2],
  ];
}

// ---------------------------------------------------------------------------
// Inspection and conversion
// ---------------------------------------------------------------------------

/** Component-wise comparison within `tolerance` (default: `geometry.tolerance`) */
export function approxEqual(a: Mat4, b: Mat4, tolerance = getGeometryConfig().tolerance): boolean {
  for (let i = 0; i < 16; i++) {
    if (a[i] === b[i]) continue;
    if (!(Math.abs(a[i] - b[i]) <= tolerance)) return false;
  }
  return true;
}

/** Whether the last row is `[0, 0, 0, 1]` within `tolerance` */
export function isAffine(m: Mat4, tolerance = getGeometryConfig().tolerance): boolean {
  return (
    Math.abs(m[12]) <= tolerance &&
    Math.abs(m[13]) <= tolerance &&
    Math.abs(m[14]) <= tolerance &&
    Math.abs(m[15] - 1) <= tolerance
  );
}

/** The rotation/scale/skew block, without translation */
export function linearPart(m: Mat4): Mat3 {
  // prettier-ignore
  return [
    m[0], m[1], m[2],
    m[4], m[5], m[6],
    m[8], m[9], m[10],
  ];
}

export function toRows(m: Mat4): Rows4 {
  return [
    [m[0], m[1], m[2], m[3]],
    [m[4], m[5], m[6], m[7]],
    [m[8], m[9], m[10], m[11]],
    [m[12], m[13], m[14], m[15]],
  ];
}

/**
 * Build a Mat4 from nested rows.
 * @throws InvalidArgumentError unless `rows` is exactly 4x4
 */
export function fromRows(rows: readonly (readonly number[])[]): Mat4 {
  if (rows.length !== 4 || rows.some((row) => row.length !== 4)) {
    throw new InvalidArgumentError(
      "fromRows",
      "rows",
      "invalid_shape",
      `must be 4x4, got ${rows.map((row) => row.length).join("/") || "no rows"}`
    );
  }
  const [r0, r1, r2, r3] = rows;
  // prettier-ignore
  return [
    r0[0], r0[1], r0[2], r0[3],
    r1[0], r1[1], r1[2], r1[3],
    r2[0], r2[1], r2[2], r2[3],
    r3[0], r3[1], r3[2], r3[3],
  ];
}
