/**
 * @branchwork/arrange Showcase
 *
 * Builds three small arrangements against a RecordingRenderer and prints
 * where every child or primitive ends up.
 *
 * Run: npm run showcase
 */

import { applyToPoint, placeOnPolygonSide, type Mat4 } from "@branchwork/geometry";
import {
  RecordingRenderer,
  applyCyclic,
  countBranchEmissions,
  growBranches,
  treeTable,
  turnSteps,
  type Dna,
} from "../src/index.js";

function origin(m: Mat4): string {
  return applyToPoint(m, [0, 0, 0])
    .map((v) => v.toFixed(2))
    .join(", ");
}

// ============================================================================
// 1. A hexagonal ring: one child per side
// ============================================================================

const ring = new RecordingRenderer(6);
for (let side = 0; side < 6; side++) {
  ring.renderChildAt(side, placeOnPolygonSide(side, 6, 10));
}
console.log("hexagon side midpoints:");
for (const call of ring.childCalls()) {
  console.log(`  child ${call.index} at (${origin(call.matrix)})`);
}

// ============================================================================
// 2. A five-armed star that spirals outward
// ============================================================================

const star = new RecordingRenderer(1);
applyCyclic(star, turnSteps(5, 72), 15, 4);
console.log("\nstar, 15 copies on 5 arms:");
for (const call of star.childCalls()) {
  console.log(`  (${origin(call.matrix)})`);
}

// ============================================================================
// 3. A three-way tree
// ============================================================================

const dna: Dna = [
  { angleX: 35, angleZ: 0, scale: 0.7 },
  { angleX: 35, angleZ: 120, scale: 0.7 },
  { angleX: 35, angleZ: 240, scale: 0.7 },
];

const tree = new RecordingRenderer();
const summary = growBranches(tree, { size: 20, dna, depth: 2, table: treeTable() });
const expected = countBranchEmissions(dna.length, 2);

console.log(`\ntree: ${summary.trunks} trunks, ${summary.leaves} leaves`);
console.log(`expected: ${expected.trunks} trunks, ${expected.leaves} leaves`);
for (const call of tree.primitiveCalls().slice(0, 5)) {
  console.log(`  ${call.label.padEnd(6)} ${call.kind.padEnd(8)} at (${origin(call.matrix)})`);
}
