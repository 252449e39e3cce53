/**
 * Unified Configuration System
 *
 * Configuration is loaded from (in priority order):
 *
 * 1. Environment variables: GRAPHFOLD_* (highest priority, for CI overrides)
 * 2. Config files: graphfold.config.ts, .graphfoldrc, package.json "graphfold" key, ...
 * 3. Programmatic: config.set() calls
 * 4. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "@graphfold/core";
 *
 * config.get("debug")                  // → boolean
 * config.get("graph.distancePolicy")   // → "first" | "min" | "mean"
 *
 * config.set({ graph: { verifyMutations: true } });
 * ```
 *
 * @example Config file (graphfold.config.ts)
 * ```typescript
 * import { defineConfig } from "@graphfold/core";
 *
 * export default defineConfig({
 *   debug: true,
 *   graph: { distancePolicy: "min" },
 * });
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";

// ============================================================================
// Types
// ============================================================================

/**
 * How the distance of an existing edge is combined with the distance of a
 * parallel edge merged into it.
 */
export type DistancePolicy = "first" | "min" | "mean";

export const DISTANCE_POLICIES: readonly DistancePolicy[] = ["first", "min", "mean"];

export function isDistancePolicy(value: unknown): value is DistancePolicy {
  return typeof value === "string" && DISTANCE_POLICIES.some((p) => p === value);
}

/**
 * Graph engine configuration.
 */
export interface GraphConfig {
  /** Distance merge rule for parallel edges (default "first") */
  distancePolicy?: DistancePolicy;
  /** Run a full integrity check after every mutation (default false) */
  verifyMutations?: boolean;
}

/**
 * Full graphfold configuration schema.
 */
export interface GraphfoldConfig {
  /** Enable debug logging */
  debug?: boolean;
  /** Graph engine configuration */
  graph?: GraphConfig;
  /** Custom user configuration */
  [key: string]: unknown;
}

// ============================================================================
// Global State
// ============================================================================

// Each source is kept apart so that precedence holds whatever order they
// arrive in; `configStore` is their merge.
let programmaticLayer: Record<string, unknown> = {};
let fileLayer: Record<string, unknown> = {};
let envLayer: Record<string, unknown> = {};
let configStore: Record<string, unknown> = {};
let configLoaded = false;
let configFilePath: string | undefined;

// ============================================================================
// Environment Variable Loading
// ============================================================================

const ENV_PREFIX = "GRAPHFOLD_";

/**
 * Convert the part of an env var name after the prefix to a config path.
 *
 *   DEBUG                       → debug
 *   GRAPH__VERIFY_MUTATIONS     → graph.verifyMutations
 */
export function envKeyToPath(name: string): string {
  return name
    .split("__")
    .map((segment) =>
      segment
        .toLowerCase()
        .split("_")
        .filter((word) => word.length > 0)
        .map((word, i) => (i === 0 ? word : word[0].toUpperCase() + word.slice(1)))
        .join("")
    )
    .join(".");
}

function parseEnvValue(value: string): unknown {
  if (value === "1" || value === "true") return true;
  if (value === "0" || value === "false" || value === "") return false;
  if (/^\d+$/.test(value)) return parseInt(value, 10);
  return value;
}

/**
 * Load configuration from environment variables.
 * Variables prefixed with GRAPHFOLD_ are parsed into the config object.
 */
function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const envConfig: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    setNestedValue(envConfig, envKeyToPath(key.slice(ENV_PREFIX.length)), parseEnvValue(value));
  }

  return envConfig;
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
    if (!isRecord(current)) return undefined;
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

    result[key] =
      isRecord(sourceValue) && isRecord(targetValue)
        ? deepMerge(targetValue, sourceValue)
        : sourceValue;
  }

  return result;
}

// ============================================================================
// Config File Loading
// ============================================================================

const MODULE_NAME = "graphfold";

/**
 * Load configuration from files through cosmiconfig, looking in `searchFrom`.
 * A file that exists but fails to load is reported and skipped.
 */
function loadConfigFromFiles(searchFrom: string = process.cwd()): {
  config: Record<string, unknown>;
  filepath?: string;
} {
  try {
    const explorer = cosmiconfigSync(MODULE_NAME, {
      searchPlaces: [
        "package.json",
        `.${MODULE_NAME}rc`,
        `.${MODULE_NAME}rc.json`,
        `.${MODULE_NAME}rc.yaml`,
        `.${MODULE_NAME}rc.yml`,
        `.${MODULE_NAME}rc.js`,
        `.${MODULE_NAME}rc.cjs`,
        `${MODULE_NAME}.config.js`,
        `${MODULE_NAME}.config.cjs`,
        `${MODULE_NAME}.config.ts`,
      ],
    });
    const result = explorer.search(searchFrom);
    if (result && !result.isEmpty) {
      const loaded: unknown = result.config;
      if (isRecord(loaded)) {
        return { config: loaded, filepath: result.filepath };
      }
      console.warn(`[graphfold] Ignoring config file ${result.filepath}: not an object`);
    }
  } catch (error) {
    console.warn(`[graphfold] Failed to load config file:`, error);
  }
  return { config: {} };
}

// ============================================================================
// Config Initialization
// ============================================================================

const DEFAULTS: GraphfoldConfig = {
  debug: false,
  graph: {
    distancePolicy: "first",
    verifyMutations: false,
  },
};

/**
 * Initialize configuration from all sources.
 */
function initializeConfig(): void {
  if (configLoaded) return;

  const file = loadConfigFromFiles();
  fileLayer = file.config;
  configFilePath = file.filepath;
  envLayer = loadConfigFromEnv();
  configLoaded = true;
  rebuildStore();
}

// defaults < config.set() < config file < environment
function rebuildStore(): void {
  configStore = [programmaticLayer, fileLayer, envLayer].reduce(
    (merged, layer) => deepMerge(merged, layer),
    deepMerge({}, DEFAULTS)
  );
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a configuration value by dot path. Values come from files and the
 * environment, so callers narrow the result themselves.
 */
function get(path: string): unknown {
  initializeConfig();
  return getNestedValue(configStore, path);
}

/**
 * Set configuration values programmatically. Values from config files and
 * the environment still take precedence.
 */
function set(values: GraphfoldConfig): void {
  initializeConfig();
  programmaticLayer = deepMerge(programmaticLayer, values);
  rebuildStore();
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
 * Reset configuration so the next read reloads every source (mainly for testing).
 */
function reset(): void {
  programmaticLayer = {};
  fileLayer = {};
  envLayer = {};
  configStore = {};
  configLoaded = false;
  configFilePath = undefined;
}

/**
 * Resolved `graph.distancePolicy`; an unrecognised value falls back to "first".
 */
function distancePolicy(): DistancePolicy {
  const value = get("graph.distancePolicy");
  return isDistancePolicy(value) ? value : "first";
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
  distancePolicy,
} as const;

/**
 * Helper for creating type-safe configuration files.
 */
export function defineConfig(cfg: GraphfoldConfig): GraphfoldConfig {
  return cfg;
}

export { loadConfigFromEnv, loadConfigFromFiles };
