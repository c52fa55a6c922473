/**
 * @branchwork/core: the ambient stack shared by every branchwork package.
 *
 * This package provides:
 * - Unified configuration (defaults, config files, BRANCHWORK_* env vars)
 * - Error types for degenerate numeric input
 * - Scoped, level-gated logging
 *
 * @packageDocumentation
 */

export {
  config,
  defineConfig,
  getLogLevel,
  getGeometryConfig,
  getArrangeConfig,
  DEFAULT_CONFIG,
  type BranchworkConfig,
  type GeometryConfig,
  type ArrangeConfig,
  type LogLevel,
  type SkewPolicy,
} from "./config.js";

export {
  BranchworkError,
  InvalidArgumentError,
  requireFinite,
  requireCount,
  type InvalidArgumentReason,
} from "./errors.js";

export {
  createLogger,
  type Logger,
  type LoggerOptions,
  type LogSeverity,
  type LogWriter,
} from "./logger.js";
