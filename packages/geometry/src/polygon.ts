/**
 * Placement on the sides of a regular polygon (or the faces of a regular
 * prism, when the placed object extends along Z).
 *
 * Side `k` of an n-gon with circumradius r runs from the vertex at angle
 * `360k/n` to the vertex at `360(k+1)/n`. Side numbers wrap, so side `n + k`
 * is side `k`.
 */

import { InvalidArgumentError, requireFinite } from "@branchwork/core";
import { cosDeg, sinDeg } from "./angles.js";
import { chain, rotateZ, translate } from "./transforms.js";
import type { Mat4 } from "./types.js";

function requireSides(operation: string, sides: number): void {
  if (!Number.isFinite(sides) || sides < 1) {
    throw new InvalidArgumentError(operation, "sides", "invalid_sides", `must be at least 1, got ${sides}`);
  }
}

/** Side number reduced to [0, sides) */
function wrapSide(sideNumber: number, sides: number): number {
  return ((sideNumber % sides) + sides) % sides;
}

/** Length of a side of a regular polygon with circumradius `height` */
export function sideLength(height: number, sides: number): number {
  requireSides("sideLength", sides);
  return 2 * height * sinDeg(180 / sides);
}

/** Sum of the interior angles of a polygon, in degrees */
export function totalInteriorDegrees(sides: number): number {
  requireSides("totalInteriorDegrees", sides);
  return (sides - 2) * 180;
}

/**
 * Matrix that puts an object's origin at the midpoint of side `sideNumber`,
 * with its X axis running along the side.
 */
export function placeOnPolygonSide(sideNumber: number, sides: number, radius: number): Mat4 {
  requireSides("placeOnPolygonSide", sides);
  requireFinite("placeOnPolygonSide", "sideNumber", sideNumber);
  requireFinite("placeOnPolygonSide", "radius", radius);

  const k = wrapSide(sideNumber, sides);
  const vertexAngle = (360 / sides) * k;
  const x = radius * cosDeg(vertexAngle);
  const y = radius * sinDeg(vertexAngle);
  const heading = 360 * (0.25 + (k + 0.5) / sides);

  return chain(
    translate(x, y, 0),
    rotateZ(heading),
    translate(sideLength(radius, sides) / 2, 0, 0)
  );
}

/**
 * Matrix that puts an object's origin on the starting vertex of side
 * `sideNumber`, lifted by `zOffset` and turned by the vertex angle.
 */
export function placeOnPolygonSideWithZOffset(
  sideNumber: number,
  sides: number,
  radius: number,
  zOffset: number
): Mat4 {
  requireSides("placeOnPolygonSideWithZOffset", sides);
  requireFinite("placeOnPolygonSideWithZOffset", "sideNumber", sideNumber);
  requireFinite("placeOnPolygonSideWithZOffset", "radius", radius);
  requireFinite("placeOnPolygonSideWithZOffset", "zOffset", zOffset);

  const k = wrapSide(sideNumber, sides);
  const vertexAngle = (360 / sides) * k;

  return chain(
    translate(radius * cosDeg(vertexAngle), radius * sinDeg(vertexAngle), zOffset),
    rotateZ(vertexAngle)
  );
}
