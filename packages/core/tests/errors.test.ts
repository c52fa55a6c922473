/**
 * Tests for error types
 */

import { describe, expect, it } from "vitest";
import {
  BranchworkError,
  InvalidArgumentError,
  requireCount,
  requireFinite,
} from "@branchwork/core";

describe("InvalidArgumentError", () => {
  it("should carry operation, parameter and reason", () => {
    const error = new InvalidArgumentError("skew", "xy", "undefined_tangent", "has no tangent at 90°");

    expect(error).toBeInstanceOf(BranchworkError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("InvalidArgumentError");
    expect(error.operation).toBe("skew");
    expect(error.parameter).toBe("xy");
    expect(error.reason).toBe("undefined_tangent");
    expect(error.message).toBe("skew: xy has no tangent at 90°");
  });
});

describe("requireCount", () => {
  it("should accept zero and positive integers", () => {
    expect(() => requireCount("applyAlong", "childCount", 0)).not.toThrow();
    expect(() => requireCount("applyAlong", "childCount", 7)).not.toThrow();
  });

  it("should reject negative and fractional counts", () => {
    expect(() => requireCount("applyAlong", "childCount", -1)).toThrow(
      "applyAlong: childCount must be a non-negative integer, got -1"
    );
    expect(() => requireCount("applyAlong", "childCount", 2.5)).toThrow(InvalidArgumentError);
  });
});

describe("requireFinite", () => {
  it("should reject NaN and infinities", () => {
    expect(() => requireFinite("translate", "dx", Number.NaN)).toThrow(
      "translate: dx must be finite, got NaN"
    );
    expect(() => requireFinite("translate", "dx", Infinity)).toThrow(InvalidArgumentError);
    expect(() => requireFinite("translate", "dx", 3)).not.toThrow();
  });
});
