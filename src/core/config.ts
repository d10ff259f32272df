/**
 * Configuration
 *
 * Loaded lazily on first read from (in priority order):
 *
 * 1. Environment variables: TRUTHISH_* (for CI overrides)
 * 2. Config files: truthish.config.js, .truthishrc, .truthishrc.json, etc.
 * 3. package.json: "truthish" key
 * 4. Defaults
 *
 * `config.set()` merges over whatever has been loaded.
 *
 * @example Config file (.truthishrc.json)
 * ```json
 * {
 *   "features": { "either": false },
 *   "instances": {
 *     "Money": { "module": "./money.js", "exportName": "truthyMoney" }
 *   }
 * }
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";
import type { ExpansionOptions, InstanceLocation } from "./types.js";

// ============================================================================
// Types
// ============================================================================

export interface TruthishConfig {
  /** Log every file and expansion */
  debug?: boolean;
  /** Module the `truthy` macro is imported from and instances are loaded from */
  runtimeModule?: string;
  /** Optional capabilities */
  features?: {
    either?: boolean;
  };
  /** Extra instances keyed by type name */
  instances?: Record<string, InstanceLocation>;
  [key: string]: unknown;
}

export const DEFAULT_RUNTIME_MODULE = "truthish";

// ============================================================================
// Global State
// ============================================================================

let configStore: Record<string, unknown> = {};
let configLoaded = false;
let configFilePath: string | undefined;

// ============================================================================
// Config File Loading (cosmiconfig)
// ============================================================================

const MODULE_NAME = "truthish";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Load configuration synchronously from files.
 */
function loadConfigFromFiles(): Record<string, unknown> {
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
      ],
    });

    const result = explorer.search();
    if (result && !result.isEmpty && isRecord(result.config)) {
      configFilePath = result.filepath;
      return result.config;
    }
  } catch (error) {
    // A broken config file falls back to defaults
    if (process.env.TRUTHISH_DEBUG || process.env.NODE_ENV === "development") {
      console.warn(`[truthish] Failed to load config file:`, error);
    }
  }

  return {};
}

// ============================================================================
// Environment Variable Loading
// ============================================================================

/**
 * Load configuration from environment variables.
 *
 * Examples:
 *   TRUTHISH_DEBUG=1                 → { debug: true }
 *   TRUTHISH_FEATURES__EITHER=0      → { features: { either: false } }
 *   TRUTHISH_RUNTIME_MODULE=my-lib   → { runtimeModule: "my-lib" }
 */
function loadConfigFromEnv(): Record<string, unknown> {
  const envConfig: Record<string, unknown> = {};
  const PREFIX = "TRUTHISH_";

  for (const [key, value] of Object.entries(process.env)) {
    if (!key.startsWith(PREFIX) || value === undefined) continue;

    // Double underscore nests; a single underscore joins words in camelCase
    const configPath = key
      .slice(PREFIX.length)
      .toLowerCase()
      .split("__")
      .map((segment) => segment.replace(/_([a-z])/g, (_, c: string) => c.toUpperCase()))
      .join(".");

    let parsedValue: unknown;
    if (value === "1" || value === "true") {
      parsedValue = true;
    } else if (value === "0" || value === "false" || value === "") {
      parsedValue = false;
    } else {
      parsedValue = value;
    }

    setNestedValue(envConfig, configPath, parsedValue);
  }

  return envConfig;
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Set a nested value using dot notation.
 */
function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split(".");
  let current: Record<string, unknown> = obj;

  for (let i = 0; i < parts.length - 1; i++) {
    const part = parts[i];
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
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
  source: Record<string, unknown>,
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
// Config Initialization
// ============================================================================

/**
 * Initialize configuration from all sources.
 * Priority: env vars > config files > defaults
 */
function initializeConfig(): void {
  if (configLoaded) return;

  const defaults: TruthishConfig = {
    debug: false,
    runtimeModule: DEFAULT_RUNTIME_MODULE,
    features: { either: true },
    instances: {},
  };

  configStore = deepMerge(deepMerge(defaults, loadConfigFromFiles()), loadConfigFromEnv());
  configLoaded = true;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a configuration value by path.
 *
 * @example
 * config.get("debug")            // → false
 * config.get("features.either")  // → true
 */
function get(path: string): unknown {
  initializeConfig();
  return getNestedValue(configStore, path);
}

/**
 * Set configuration values programmatically. Merges with existing values.
 */
function set(values: Partial<TruthishConfig>): void {
  initializeConfig();
  configStore = deepMerge(configStore, values);
}

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
}

function isInstanceLocation(value: unknown): value is InstanceLocation {
  return (
    isRecord(value) && typeof value.module === "string" && typeof value.exportName === "string"
  );
}

/**
 * The expansion options described by the current configuration.
 * Malformed `instances` entries are skipped.
 */
function expansionOptions(): ExpansionOptions {
  const runtimeModule = get("runtimeModule");
  const instances: Record<string, InstanceLocation> = {};
  const configured = get("instances");
  if (isRecord(configured)) {
    for (const [typeName, location] of Object.entries(configured)) {
      if (isInstanceLocation(location)) {
        instances[typeName] = { module: location.module, exportName: location.exportName };
      }
    }
  }

  return {
    runtimeModule: typeof runtimeModule === "string" ? runtimeModule : DEFAULT_RUNTIME_MODULE,
    features: { either: get("features.either") !== false },
    instances,
  };
}

/**
 * Unified configuration API.
 */
export const config = {
  get,
  set,
  has: (path: string): boolean => !!get(path),
  getAll,
  getConfigFilePath,
  reset,
  expansionOptions,
} as const;

/**
 * Helper for type-safe configuration files.
 *
 * @example
 * // truthish.config.js
 * module.exports = defineConfig({ features: { either: false } });
 */
export function defineConfig(config: TruthishConfig): TruthishConfig {
  return config;
}
