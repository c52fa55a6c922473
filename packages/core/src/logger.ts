/**
 * Scoped, level-gated logging.
 *
 * Every line carries a `[branchwork/<scope>]` prefix and the level name, e.g.
 * `[branchwork/geometry] WARN: skew: xy is on a tangent pole`. The threshold is
 * read from configuration on every call, so `config.set({ logLevel })` takes
 * effect immediately.
 */

import { getLogLevel, type LogLevel } from "./config.js";

export type LogSeverity = Exclude<LogLevel, "silent">;

/** Receives each formatted line that passes the threshold. */
export type LogWriter = (severity: LogSeverity, line: string) => void;

export interface Logger {
  readonly scope: string;
  error(message: string): void;
  warn(message: string): void;
  info(message: string): void;
  debug(message: string): void;
  /** Whether a message at `severity` would currently be written */
  enabled(severity: LogSeverity): boolean;
}

export interface LoggerOptions {
  /** Custom writer function (default: the matching console method) */
  writer?: LogWriter;
  /** Fixed threshold; when omitted the configured level applies */
  level?: LogLevel;
}

const RANK: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

function consoleWriter(severity: LogSeverity, line: string): void {
  switch (severity) {
    case "error":
      console.error(line);
      break;
    case "warn":
      console.warn(line);
      break;
    case "info":
      console.info(line);
      break;
    case "debug":
      console.debug(line);
      break;
  }
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const writer = options.writer ?? consoleWriter;
  const prefix = `[branchwork/${scope}]`;

  const enabled = (severity: LogSeverity): boolean =>
    RANK[severity] <= RANK[options.level ?? getLogLevel()];

  const emit = (severity: LogSeverity, message: string): void => {
    if (!enabled(severity)) return;
    writer(severity, `${prefix} ${severity.toUpperCase()}: ${message}`);
  };

  return {
    scope,
    error: (message) => emit("error", message),
    warn: (message) => emit("warn", message),
    info: (message) => emit("info", message),
    debug: (message) => emit("debug", message),
    enabled,
  };
}
