/**
 * Indexed child application: one matrix per child, by position.
 *
 * Child `i` (0-based) gets the transform evaluated at `(i + 1) * dist`, so the
 * first child is already one step away from the origin.
 */

import { createLogger, requireCount, requireFinite } from "@branchwork/core";
import { multiply, type Mat4, type StepTransform } from "@branchwork/geometry";
import type { ChildRenderer } from "./renderer.js";

const log = createLogger("arrange");

function readChildCount(operation: string, target: ChildRenderer): number {
  const count = target.childCount();
  requireCount(operation, "childCount()", count);
  return count;
}

/** Matrices `step((i + 1) * dist)` for `i` in `0..count-1` */
export function planAlong(count: number, step: StepTransform, dist: number): Mat4[] {
  requireCount("planAlong", "count", count);
  requireFinite("planAlong", "dist", dist);
  return Array.from({ length: count }, (_, i) => step((i + 1) * dist));
}

/** Render every child of `target`, child `i` under `step((i + 1) * dist)` */
export function applyAlong(target: ChildRenderer, step: StepTransform, dist: number): void {
  const count = readChildCount("applyAlong", target);
  const plan = planAlong(count, step, dist);
  log.debug(`applyAlong: ${count} children, spacing ${dist}`);
  plan.forEach((matrix, i) => target.renderChildAt(i, matrix));
}

/**
 * Matrices `extra * baseStep((i + 1) * dist)`: the per-index step acts first,
 * the fixed `extra` transform after it.
 */
export function planWithExtra(
  count: number,
  baseStep: StepTransform,
  dist: number,
  extra: Mat4
): Mat4[] {
  requireCount("planWithExtra", "count", count);
  requireFinite("planWithExtra", "dist", dist);
  return Array.from({ length: count }, (_, i) => multiply(extra, baseStep(dist * (i + 1))));
}

export function applyWithExtra(
  target: ChildRenderer,
  baseStep: StepTransform,
  dist: number,
  extra: Mat4
): void {
  const count = readChildCount("applyWithExtra", target);
  const plan = planWithExtra(count, baseStep, dist, extra);
  log.debug(`applyWithExtra: ${count} children, spacing ${dist}`);
  plan.forEach((matrix, i) => target.renderChildAt(i, matrix));
}

/** Render every child under the same matrix */
export function applyFixed(target: ChildRenderer, matrix: Mat4): void {
  const count = readChildCount("applyFixed", target);
  for (let i = 0; i < count; i++) {
    target.renderChildAt(i, matrix);
  }
}
