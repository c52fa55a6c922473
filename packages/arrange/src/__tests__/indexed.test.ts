import { describe, expect, it, vi } from "vitest";
import { InvalidArgumentError } from "@branchwork/core";
import {
  applyToPoint,
  multiply,
  rotateZ,
  translate,
  type Mat4,
  type StepTransform,
} from "@branchwork/geometry";
import {
  RecordingRenderer,
  applyAlong,
  applyFixed,
  applyWithExtra,
  planAlong,
  planWithExtra,
} from "../index.js";

function spyRenderer(count: number) {
  return {
    childCount: vi.fn(() => count),
    renderChildAt: vi.fn<(index: number, matrix: Mat4) => void>(),
  };
}

const alongX: StepTransform = (d) => translate(d, 0, 0);

describe("applyAlong", () => {
  it("renders each of four children exactly once, in index order", () => {
    const target = spyRenderer(4);

    applyAlong(target, alongX, 10);

    expect(target.renderChildAt).toHaveBeenCalledTimes(4);
    expect(target.renderChildAt.mock.calls.map(([index]) => index)).toEqual([0, 1, 2, 3]);
  });

  it("evaluates the step at (i + 1) * dist", () => {
    const step = vi.fn(alongX);
    const target = new RecordingRenderer(3);

    applyAlong(target, step, 2.5);

    expect(step.mock.calls).toEqual([[2.5], [5], [7.5]]);
    expect(target.childCalls().map((call) => call.matrix)).toEqual([
      translate(2.5, 0, 0),
      translate(5, 0, 0),
      translate(7.5, 0, 0),
    ]);
  });

  it("reads the child count once", () => {
    const target = spyRenderer(5);

    applyAlong(target, alongX, 1);

    expect(target.childCount).toHaveBeenCalledTimes(1);
  });

  it("renders nothing without children", () => {
    const target = spyRenderer(0);

    applyAlong(target, alongX, 1);

    expect(target.renderChildAt).not.toHaveBeenCalled();
  });

  it("rejects a child count that is not a non-negative integer", () => {
    expect(() => applyAlong(spyRenderer(-1), alongX, 1)).toThrow(
      "applyAlong: childCount() must be a non-negative integer, got -1"
    );
    expect(() => applyAlong(spyRenderer(2.5), alongX, 1)).toThrow(InvalidArgumentError);
  });
});

describe("applyWithExtra", () => {
  it("applies the extra transform after the per-index step", () => {
    const target = new RecordingRenderer(2);
    const extra = rotateZ(90);

    applyWithExtra(target, alongX, 3, extra);

    const matrices = target.childCalls().map((call) => call.matrix);
    expect(matrices).toEqual([multiply(extra, alongX(3)), multiply(extra, alongX(6))]);

    // moved along X first, then turned onto Y
    const tip = applyToPoint(matrices[1], [0, 0, 0]);
    expect(tip[0]).toBeCloseTo(0, 10);
    expect(tip[1]).toBeCloseTo(6, 10);
  });

  it("visits children in index order", () => {
    const target = spyRenderer(3);

    applyWithExtra(target, alongX, 1, rotateZ(45));

    expect(target.renderChildAt.mock.calls.map(([index]) => index)).toEqual([0, 1, 2]);
  });
});

describe("applyFixed", () => {
  it("renders every child under the same matrix", () => {
    const target = new RecordingRenderer(3);
    const m = translate(0, 0, 4);

    applyFixed(target, m);

    expect(target.childCalls()).toEqual([
      { type: "child", index: 0, matrix: m },
      { type: "child", index: 1, matrix: m },
      { type: "child", index: 2, matrix: m },
    ]);
  });
});

describe("plans", () => {
  it("planAlong matches what applyAlong renders", () => {
    expect(planAlong(2, alongX, 4)).toEqual([translate(4, 0, 0), translate(8, 0, 0)]);
  });

  it("planWithExtra composes extra on the left", () => {
    const extra = translate(0, 1, 0);
    expect(planWithExtra(1, alongX, 2, extra)).toEqual([multiply(extra, translate(2, 0, 0))]);
  });

  it("rejects a non-finite spacing", () => {
    expect(() => planAlong(2, alongX, Infinity)).toThrow("planAlong: dist must be finite, got Infinity");
  });
});
