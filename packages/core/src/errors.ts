/**
 * Error types shared by every branchwork package.
 *
 * Degenerate numeric input is reported by throwing, never by returning a
 * matrix full of NaN or Infinity.
 */

/** Reason codes for argument validation failures. */
export type InvalidArgumentReason =
  | "invalid_sides"
  | "undefined_tangent"
  | "empty_transform_array"
  | "invalid_depth"
  | "invalid_count"
  | "invalid_index"
  | "invalid_shape"
  | "non_finite";

/**
 * Base class for all branchwork errors.
 */
export class BranchworkError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BranchworkError";
  }
}

/**
 * Thrown when a public operation receives an argument it cannot turn into a
 * well-defined affine matrix or a terminating traversal.
 */
export class InvalidArgumentError extends BranchworkError {
  constructor(
    readonly operation: string,
    readonly parameter: string,
    readonly reason: InvalidArgumentReason,
    detail: string
  ) {
    super(`${operation}: ${parameter} ${detail}`);
    this.name = "InvalidArgumentError";
  }
}

/** Throw an InvalidArgumentError unless `value` is a finite number. */
export function requireFinite(operation: string, parameter: string, value: number): void {
  if (!Number.isFinite(value)) {
    throw new InvalidArgumentError(operation, parameter, "non_finite", `must be finite, got ${value}`);
  }
}

/** Throw unless `value` is an integer >= 0. */
export function requireCount(operation: string, parameter: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new InvalidArgumentError(
      operation,
      parameter,
      "invalid_count",
      `must be a non-negative integer, got ${value}`
    );
  }
}
