/**
 * Trigonometry in degrees.
 *
 * Angles are reduced modulo 360 before evaluation, and multiples of 90° return
 * exact values, so `rotateZ(90)` has entries that are exactly 0 and ±1 and
 * angles a full turn apart give bit-identical results.
 */

/** Reduce an angle to [0, 360) */
export function normalizeDegrees(angle: number): number {
  const reduced = ((angle % 360) + 360) % 360;
  return reduced === 360 ? 0 : reduced;
}

export function degToRad(angle: number): number {
  return (angle * Math.PI) / 180;
}

export function sinDeg(angle: number): number {
  const a = normalizeDegrees(angle);
  if (a === 0 || a === 180) return 0;
  if (a === 90) return 1;
  if (a === 270) return -1;
  return Math.sin(degToRad(a));
}

export function cosDeg(angle: number): number {
  const a = normalizeDegrees(angle);
  if (a === 90 || a === 270) return 0;
  if (a === 0) return 1;
  if (a === 180) return -1;
  return Math.cos(degToRad(a));
}

/** True where the tangent is undefined: 90° mod 180° */
export function isTangentPole(angle: number): boolean {
  return normalizeDegrees(angle) % 180 === 90;
}

/** Tangent in degrees; `Infinity` at a pole */
export function tanDeg(angle: number): number {
  const a = normalizeDegrees(angle);
  if (a % 180 === 0) return 0;
  if (a % 180 === 90) return Infinity;
  return Math.tan(degToRad(a));
}
