/**
 * @branchwork/arrange: apply matrices to children by index, cyclically, or
 * recursively to grow branching structures.
 *
 * @packageDocumentation
 */

export type { ChildRenderer, PrimitiveRenderer, PrimitiveParams } from "./renderer.js";

export {
  RecordingRenderer,
  type RenderCall,
  type ChildCall,
  type PrimitiveCall,
} from "./recording.js";

export { planAlong, applyAlong, planWithExtra, applyWithExtra, applyFixed } from "./indexed.js";

export {
  planCyclic,
  applyCyclic,
  axisSteps,
  turnSteps,
  type CyclicPlacement,
  type CyclicOptions,
} from "./cyclic.js";

export {
  growBranches,
  depthIndex,
  selectDepthEntry,
  countBranchEmissions,
  tipBranch,
  tipLeaf,
  treeTable,
  DEFAULT_TRUNK,
  DEFAULT_LEAF,
  type BranchDescriptor,
  type Dna,
  type DepthEntry,
  type DepthTransformTable,
  type PrimitiveSpec,
  type GrowOptions,
  type GrowthSummary,
} from "./branches.js";
