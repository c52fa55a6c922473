/**
 * Recursive branch generation.
 *
 * Each node emits a trunk, then one child per branch descriptor. A child is
 * positioned by the depth table entry for the current remaining depth `n`,
 * clamped into the table:
 *
 *   table[clamp(n + 1)].label       trunk label at this node
 *   table[clamp(n)].transform       placement of each child
 *   table[clamp(n)].label           leaf label when n reaches 0
 *
 * Because of the clamp, the last entry covers every depth at or beyond the
 * end of the table, and appending an entry shifts which levels the others
 * apply to.
 */

import {
  InvalidArgumentError,
  createLogger,
  getArrangeConfig,
  requireCount,
  requireFinite,
} from "@branchwork/core";
import {
  chain,
  identity,
  multiply,
  rotateX,
  rotateZ,
  scale,
  translate,
  type BranchTransform,
  type Mat4,
} from "@branchwork/geometry";
import type { PrimitiveParams, PrimitiveRenderer } from "./renderer.js";

const log = createLogger("arrange");

/** One child branch at a node */
export interface BranchDescriptor {
  /** Inclination away from the parent's axis, in degrees */
  angleX: number;
  /** Turn about the parent's axis, in degrees */
  angleZ: number;
  /** Child size relative to the parent */
  scale: number;
}

/** Branch descriptors applied identically at every node */
export type Dna = readonly BranchDescriptor[];

export interface DepthEntry {
  transform: BranchTransform;
  label: string;
}

/** Indexed by remaining depth; index 0 is the leaf level */
export type DepthTransformTable = readonly DepthEntry[];

export interface PrimitiveSpec {
  kind: string;
  params(size: number): PrimitiveParams;
}

export interface GrowOptions {
  /** Trunk length at the root */
  size: number;
  dna: Dna;
  /** Remaining recursion depth at the root; 0 means leaves right away */
  depth: number;
  table: DepthTransformTable;
  /** World transform of the root (default identity) */
  origin?: Mat4;
  trunk?: PrimitiveSpec;
  leaf?: PrimitiveSpec;
}

export interface GrowthSummary {
  trunks: number;
  leaves: number;
}

export const DEFAULT_TRUNK: PrimitiveSpec = {
  kind: "cylinder",
  params: (size) => ({ height: size, radius: size / 10 }),
};

export const DEFAULT_LEAF: PrimitiveSpec = {
  kind: "sphere",
  params: (size) => ({ radius: size / 4 }),
};

/** `depth` clamped into `[0, tableLength - 1]` */
export function depthIndex(depth: number, tableLength: number): number {
  return Math.min(Math.max(depth, 0), tableLength - 1);
}

export function selectDepthEntry(table: DepthTransformTable, depth: number): DepthEntry {
  if (table.length === 0) {
    throw new InvalidArgumentError("selectDepthEntry", "table", "invalid_count", "must not be empty");
  }
  return table[depthIndex(depth, table.length)];
}

interface GrowContext {
  target: PrimitiveRenderer;
  dna: Dna;
  table: DepthTransformTable;
  trunk: PrimitiveSpec;
  leaf: PrimitiveSpec;
  summary: GrowthSummary;
}

function grow(ctx: GrowContext, size: number, n: number, world: Mat4): void {
  const { target, dna, table, trunk, leaf } = ctx;

  target.renderPrimitive(trunk.kind, trunk.params(size), world, selectDepthEntry(table, n + 1).label);
  ctx.summary.trunks++;

  const entry = selectDepthEntry(table, n);
  for (const branch of dna) {
    const placed = multiply(world, entry.transform(size, branch.angleX, branch.angleZ));
    if (n > 0) {
      grow(ctx, branch.scale * size, n - 1, placed);
    } else {
      target.renderPrimitive(leaf.kind, leaf.params(size), placed, entry.label);
      ctx.summary.leaves++;
    }
  }
}

/**
 * Emit a branching structure, pre-order: a node's trunk first, then each
 * descriptor's subtree in `dna` order, each finished before the next begins.
 *
 * @throws InvalidArgumentError if `depth` is not an integer in
 *   `[0, arrange.maxDepth]` or the table is empty
 */
export function growBranches(target: PrimitiveRenderer, options: GrowOptions): GrowthSummary {
  const { size, dna, depth, table } = options;
  const { maxDepth } = getArrangeConfig();

  if (!Number.isInteger(depth) || depth < 0 || depth > maxDepth) {
    throw new InvalidArgumentError(
      "growBranches",
      "depth",
      "invalid_depth",
      `must be an integer between 0 and ${maxDepth}, got ${depth}`
    );
  }
  if (table.length === 0) {
    throw new InvalidArgumentError("growBranches", "table", "invalid_count", "must not be empty");
  }
  requireFinite("growBranches", "size", size);

  if (depth > table.length - 1) {
    log.debug(
      `growBranches: depth ${depth} exceeds the ${table.length}-entry table; "${table[table.length - 1].label}" covers depths ${table.length - 1} and up`
    );
  }

  const ctx: GrowContext = {
    target,
    dna,
    table,
    trunk: options.trunk ?? DEFAULT_TRUNK,
    leaf: options.leaf ?? DEFAULT_LEAF,
    summary: { trunks: 0, leaves: 0 },
  };
  grow(ctx, size, depth, options.origin ?? identity());
  return ctx.summary;
}

/** Number of trunks and leaves `growBranches` emits for a dna of this length */
export function countBranchEmissions(dnaLength: number, depth: number): GrowthSummary {
  requireCount("countBranchEmissions", "dnaLength", dnaLength);
  requireCount("countBranchEmissions", "depth", depth);
  let trunks = 0;
  for (let k = 0; k <= depth; k++) {
    trunks += dnaLength ** k;
  }
  return { trunks, leaves: dnaLength ** (depth + 1) };
}

// ---------------------------------------------------------------------------
// Stock depth table
// ---------------------------------------------------------------------------

/** Move to the tip of a trunk of length `size`, turn about it, then incline */
export const tipBranch: BranchTransform = (size, angleX, angleZ) =>
  chain(translate(0, 0, size), rotateZ(angleZ), rotateX(angleX));

/** Like `tipBranch`, at half scale */
export const tipLeaf: BranchTransform = (size, angleX, angleZ) =>
  chain(translate(0, 0, size), rotateZ(angleZ), rotateX(angleX), scale(0.5, 0.5, 0.5));

/** Two-level table: "leaf" at depth 0, "branch" everywhere above */
export function treeTable(): DepthEntry[] {
  return [
    { transform: tipLeaf, label: "leaf" },
    { transform: tipBranch, label: "branch" },
  ];
}
