/**
 * Unified Configuration System
 *
 * Configuration is loaded lazily, on first read, from (in priority order):
 *
 * 1. Programmatic: config.set() calls (highest priority)
 * 2. Environment variables: BRANCHWORK_* (for CI overrides)
 * 3. Config files: .branchworkrc, .branchworkrc.json, .branchworkrc.yaml, branchwork.config.cjs, etc.
 * 4. package.json: "branchwork" key
 * 5. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config, getGeometryConfig } from "@branchwork/core";
 *
 * config.get("geometry.skewPolicy")   // → "throw" | "infinite"
 * config.set({ logLevel: "debug" });
 * getGeometryConfig().tolerance       // → 1e-9
 * ```
 *
 * @example Config file (.branchworkrc.json)
 * ```json
 * {
 *   "logLevel": "info",
 *   "geometry": { "skewPolicy": "infinite" },
 *   "arrange": { "maxDepth": 12 }
 * }
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";

// ============================================================================
// Types
// ============================================================================

/** Logger threshold, from quietest to noisiest. */
export type LogLevel = "silent" | "error" | "warn" | "info" | "debug";

/**
 * What `skew` does when an angle sits on a tangent pole (90° mod 180°):
 * - "throw": raise an InvalidArgumentError (default)
 * - "infinite": write `Infinity` into the matrix entry
 */
export type SkewPolicy = "throw" | "infinite";

export interface GeometryConfig {
  /** Tolerance used by approximate matrix comparison and the affine check */
  tolerance: number;
  skewPolicy: SkewPolicy;
}

export interface ArrangeConfig {
  /** Largest recursion depth the branch generator accepts */
  maxDepth: number;
}

/**
 * Full branchwork configuration schema.
 */
export interface BranchworkConfig {
  /** Enable debug mode (forces log level "debug") */
  debug?: boolean;
  logLevel?: LogLevel;
  geometry?: Partial<GeometryConfig>;
  arrange?: Partial<ArrangeConfig>;
  /** Custom user configuration */
  [key: string]: unknown;
}

const LOG_LEVELS: readonly LogLevel[] = ["silent", "error", "warn", "info", "debug"];
const SKEW_POLICIES: readonly SkewPolicy[] = ["throw", "infinite"];

export const DEFAULT_CONFIG = {
  debug: false,
  logLevel: "warn",
  geometry: {
    tolerance: 1e-9,
    skewPolicy: "throw",
  },
  arrange: {
    maxDepth: 1000,
  },
} as const satisfies BranchworkConfig;

// ============================================================================
// Global State
// ============================================================================

let configStore: Record<string, unknown> = {};
let configLoaded = false;
let configFilePath: string | undefined;
const reportedKeys = new Set<string>();

// ============================================================================
// Environment Variable Loading
// ============================================================================

const ENV_PREFIX = "BRANCHWORK_";

/**
 * Load configuration from environment variables.
 * Variables prefixed with BRANCHWORK_ are parsed into the config object.
 * A double underscore separates nesting levels, a single underscore joins
 * the words of a camelCase key.
 *
 * Examples:
 *   BRANCHWORK_DEBUG=true                       → { debug: true }
 *   BRANCHWORK_LOG_LEVEL=info                   → { logLevel: "info" }
 *   BRANCHWORK_GEOMETRY__SKEW_POLICY=infinite   → { geometry: { skewPolicy: "infinite" } }
 */
function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const envConfig: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;

    const configPath = key.slice(ENV_PREFIX.length).split("__").map(toCamelCase).join(".");
    setNestedValue(envConfig, configPath, parseEnvValue(value));
  }

  return envConfig;
}

function toCamelCase(segment: string): string {
  return segment
    .toLowerCase()
    .split("_")
    .filter((word) => word.length > 0)
    .map((word, i) => (i === 0 ? word : word[0].toUpperCase() + word.slice(1)))
    .join("");
}

function parseEnvValue(value: string): unknown {
  if (value === "true") return true;
  if (value === "false" || value === "") return false;
  if (/^-?\d+(\.\d+)?([eE][-+]?\d+)?$/.test(value)) return Number(value);
  return value;
}

// ============================================================================
// Utility Functions
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Set a nested value using dot notation.
 */
function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split(".");
  let current = obj;

  for (let i = 0; i < parts.length - 1; i++) {
    const next = current[parts[i]];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[parts[i]] = created;
      current = created;
    }
  }

  current[parts[parts.length - 1]] = value;
}

/**
 * Get a nested value using dot notation.
 */
function getNestedValue(obj: unknown, path: string): unknown {
  let current: unknown = obj;

  for (const part of path.split(".")) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[part];
  }

  return current;
}

/**
 * Deep merge objects (right takes precedence).
 */
function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = result[key];

    if (isRecord(sourceValue) && isRecord(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else {
      result[key] = sourceValue;
    }
  }

  return result;
}

// ============================================================================
// Config File Loading (cosmiconfig)
// ============================================================================

const MODULE_NAME = "branchwork";

/**
 * Load configuration synchronously from files.
 * Uses cosmiconfig to search for config in standard locations. Only formats
 * with a synchronous loader are searched: JSON, YAML and CommonJS.
 */
function loadConfigFromFiles(searchFrom?: string): Record<string, unknown> {
  try {
    const explorer = cosmiconfigSync(MODULE_NAME, {
      searchPlaces: [
        "package.json",
        `.${MODULE_NAME}rc`,
        `.${MODULE_NAME}rc.json`,
        `.${MODULE_NAME}rc.yaml`,
        `.${MODULE_NAME}rc.yml`,
        `.${MODULE_NAME}rc.cjs`,
        `${MODULE_NAME}.config.cjs`,
      ],
    });

    const result = explorer.search(searchFrom);
    if (result && !result.isEmpty) {
      const loaded: unknown = result.config;
      if (isRecord(loaded)) {
        configFilePath = result.filepath;
        return loaded;
      }
      console.warn(`[branchwork] Ignoring ${result.filepath}: configuration must be an object`);
    }
  } catch (error) {
    console.warn(`[branchwork] Failed to load config file:`, error);
  }

  return {};
}

// ============================================================================
// Config Initialization
// ============================================================================

/**
 * Initialize configuration from all sources.
 */
function initializeConfig(searchFrom?: string): void {
  if (configLoaded) return;

  const fileConfig = loadConfigFromFiles(searchFrom);
  const envConfig = loadConfigFromEnv();

  // Merge: defaults < fileConfig < envConfig
  configStore = deepMerge(deepMerge(structuredClone(DEFAULT_CONFIG), fileConfig), envConfig);
  configLoaded = true;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a configuration value by path.
 */
function get(path: string): unknown {
  initializeConfig();
  return getNestedValue(configStore, path);
}

/**
 * Set configuration values programmatically.
 */
function set(values: BranchworkConfig): void {
  initializeConfig();
  configStore = deepMerge(configStore, values);
}

/**
 * Check if a configuration path has a truthy value.
 */
function has(path: string): boolean {
  return !!get(path);
}

/**
 * Get all configuration values.
 */
function getAll(): Readonly<Record<string, unknown>> {
  initializeConfig();
  return configStore;
}

/**
 * Get the path to the loaded config file (if any).
 */
function getConfigFilePath(): string | undefined {
  initializeConfig();
  return configFilePath;
}

/**
 * Reset configuration so the next read loads it again (mainly for testing).
 */
function reset(): void {
  configStore = {};
  configLoaded = false;
  configFilePath = undefined;
  reportedKeys.clear();
}

/**
 * Discard the current configuration and load it again, searching for a
 * config file in `searchFrom` instead of the working directory.
 */
function load(searchFrom?: string): Readonly<Record<string, unknown>> {
  reset();
  initializeConfig(searchFrom);
  return configStore;
}

// ============================================================================
// Typed Accessors
// ============================================================================

function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function isSkewPolicy(value: unknown): value is SkewPolicy {
  return SKEW_POLICIES.some((policy) => policy === value);
}

function isPositiveNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value) && value > 0;
}

function isDepthLimit(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

/**
 * Read a known key, falling back to its default when the stored value has
 * the wrong shape. Each bad key is reported once per load.
 */
function read<T>(path: string, guard: (value: unknown) => value is T, fallback: T): T {
  const value = get(path);
  if (value === undefined) return fallback;
  if (guard(value)) return value;
  if (!reportedKeys.has(path)) {
    reportedKeys.add(path);
    console.warn(
      `[branchwork] Ignoring invalid value for "${path}": ${JSON.stringify(value)}; using ${JSON.stringify(fallback)}`
    );
  }
  return fallback;
}

/**
 * Effective log threshold. `debug: true` (or `BRANCHWORK_DEBUG=1`) forces "debug".
 */
export function getLogLevel(): LogLevel {
  const debug = get("debug");
  if (debug === true || debug === 1) return "debug";
  return read("logLevel", isLogLevel, DEFAULT_CONFIG.logLevel);
}

export function getGeometryConfig(): GeometryConfig {
  return {
    tolerance: read("geometry.tolerance", isPositiveNumber, DEFAULT_CONFIG.geometry.tolerance),
    skewPolicy: read("geometry.skewPolicy", isSkewPolicy, DEFAULT_CONFIG.geometry.skewPolicy),
  };
}

export function getArrangeConfig(): ArrangeConfig {
  return {
    maxDepth: read("arrange.maxDepth", isDepthLimit, DEFAULT_CONFIG.arrange.maxDepth),
  };
}

// ============================================================================
// Export: config object
// ============================================================================

/**
 * Unified configuration API.
 */
export const config = {
  get,
  set,
  has,
  getAll,
  getConfigFilePath,
  reset,
  load,
} as const;

/**
 * Helper for writing config files with type checking.
 */
export function defineConfig(cfg: BranchworkConfig): BranchworkConfig {
  return cfg;
}
