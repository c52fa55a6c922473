/**
 * Cyclic transform-array mapping.
 *
 * A short palette of step transforms is reused for any number of copies of a
 * single template child. Copy `i` uses palette entry `i mod L`, evaluated at
 * `floor(i / L) * dist`: the first full pass sits at distance 0, each later
 * pass is pushed `dist` further out.
 */

import { InvalidArgumentError, createLogger, requireCount, requireFinite } from "@branchwork/core";
import { chain, rotateZ, translate, type Mat4, type StepTransform } from "@branchwork/geometry";
import type { ChildRenderer } from "./renderer.js";

const log = createLogger("arrange");

export interface CyclicPlacement {
  /** Position in the output sequence */
  index: number;
  /** Palette entry used */
  funcIndex: number;
  /** Completed passes through the palette before this copy */
  cycle: number;
  /** Argument passed to the palette entry: `cycle * dist` */
  distance: number;
  matrix: Mat4;
}

export interface CyclicOptions {
  /** Child rendered for every copy (default 0) */
  templateIndex?: number;
}

function requirePalette(operation: string, transforms: readonly StepTransform[]): void {
  if (transforms.length === 0) {
    throw new InvalidArgumentError(
      operation,
      "transforms",
      "empty_transform_array",
      "must hold at least one transform"
    );
  }
}

export function planCyclic(
  transforms: readonly StepTransform[],
  numChildren: number,
  dist: number
): CyclicPlacement[] {
  requirePalette("planCyclic", transforms);
  requireCount("planCyclic", "numChildren", numChildren);
  requireFinite("planCyclic", "dist", dist);

  const length = transforms.length;
  return Array.from({ length: numChildren }, (_, index) => {
    const cycle = Math.floor(index / length);
    const funcIndex = index % length;
    const distance = cycle * dist;
    return { index, funcIndex, cycle, distance, matrix: transforms[funcIndex](distance) };
  });
}

/**
 * Render the template child `numChildren` times, cycling through
 * `transforms`. The whole plan is computed before the first render, so an
 * invalid palette never produces partial output.
 */
export function applyCyclic(
  target: ChildRenderer,
  transforms: readonly StepTransform[],
  numChildren: number,
  dist: number,
  options: CyclicOptions = {}
): void {
  const templateIndex = options.templateIndex ?? 0;
  const plan = planCyclic(transforms, numChildren, dist);

  if (numChildren > 0) {
    const count = target.childCount();
    if (!Number.isInteger(templateIndex) || templateIndex < 0 || templateIndex >= count) {
      throw new InvalidArgumentError(
        "applyCyclic",
        "templateIndex",
        "invalid_index",
        `must name one of ${count} children, got ${templateIndex}`
      );
    }
  }

  log.debug(
    `applyCyclic: ${numChildren} copies of child ${templateIndex}, ${transforms.length} transforms, spacing ${dist}`
  );
  for (const placement of plan) {
    target.renderChildAt(templateIndex, placement.matrix);
  }
}

// ---------------------------------------------------------------------------
// Palettes
// ---------------------------------------------------------------------------

/** Six axis-aligned steps: +X, -X, +Y, -Y, +Z, -Z */
export function axisSteps(): StepTransform[] {
  return [
    (d) => translate(d, 0, 0),
    (d) => translate(-d, 0, 0),
    (d) => translate(0, d, 0),
    (d) => translate(0, -d, 0),
    (d) => translate(0, 0, d),
    (d) => translate(0, 0, -d),
  ];
}

/**
 * `count` steps that move along X by the distance, then turn about Z by
 * `j * stepDegrees` for the j-th step. Gives stars for a fixed distance and
 * spirals once the distance grows.
 */
export function turnSteps(count: number, stepDegrees: number): StepTransform[] {
  requireCount("turnSteps", "count", count);
  requireFinite("turnSteps", "stepDegrees", stepDegrees);
  return Array.from(
    { length: count },
    (_, j): StepTransform =>
      (d) =>
        chain(rotateZ(j * stepDegrees), translate(d, 0, 0))
  );
}
