/**
 * The rendering collaborator.
 *
 * branchwork never draws anything itself: it decides which matrix applies to
 * which child or primitive and hands that decision to a renderer. The child
 * count is an explicit capability of the renderer, read once per run.
 */

import type { Mat4 } from "@branchwork/geometry";

/** Named numeric parameters of a primitive, e.g. `{ height: 30, radius: 3 }` */
export type PrimitiveParams = Readonly<Record<string, number>>;

export interface ChildRenderer {
  /** Number of children in the current scope */
  childCount(): number;
  /**
   * Apply `matrix` to child `index` and emit it. May be called any number of
   * times for the same index.
   */
  renderChildAt(index: number, matrix: Mat4): void;
}

export interface PrimitiveRenderer {
  /** Emit a primitive solid (cylinder, sphere, ...) under `matrix` */
  renderPrimitive(kind: string, params: PrimitiveParams, matrix: Mat4, label: string): void;
}
