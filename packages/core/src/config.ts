/**
 * Unified Configuration System
 *
 * Configuration is loaded from (in priority order):
 *
 * 1. Programmatic: config.set() calls (highest priority)
 * 2. Environment variables: ERASURE_PRIMER_*
 * 3. Config files found by cosmiconfig: erasure-primer.config.js,
 *    .erasure-primerrc, the "erasure-primer" key in package.json, etc.
 * 4. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "@erasure-primer/core";
 *
 * config.get("opaque.verify")            // → true
 * config.set({ output: { fractionDigits: 2 } });
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";
import { EP1008, primerError } from "./diagnostics.js";

// ============================================================================
// Types
// ============================================================================

export interface OpaqueConfig {
  /** Check every opaque call against the pinned concrete type */
  verify?: boolean;
}

export interface OutputConfig {
  /** Minimum fraction digits when printing magnitudes */
  fractionDigits?: number;
  /** ANSI colors in rendered diagnostics */
  colors?: boolean;
}

/**
 * Full erasure-primer configuration schema.
 */
export interface PrimerConfig {
  /** Enable debug logging */
  debug?: boolean;
  opaque?: OpaqueConfig;
  output?: OutputConfig;
  [key: string]: unknown;
}

// ============================================================================
// Global State
// ============================================================================

let configStore: PrimerConfig = {};
let configLoaded = false;
let configFilePath: string | undefined;

const DEFAULTS: PrimerConfig = {
  debug: false,
  opaque: { verify: true },
  output: { fractionDigits: 1, colors: true },
};

// ============================================================================
// Environment Variable Loading
// ============================================================================

/**
 * Load configuration from environment variables.
 *
 * Examples:
 *   ERASURE_PRIMER_DEBUG=1                      → { debug: true }
 *   ERASURE_PRIMER_OPAQUE_VERIFY=0              → { opaque: { verify: false } }
 *   ERASURE_PRIMER_OUTPUT_FRACTION_DIGITS=2     → { output: { fractionDigits: 2 } }
 */
function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): PrimerConfig {
  const envConfig: PrimerConfig = {};
  const PREFIX = "ERASURE_PRIMER_";

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(PREFIX) || value === undefined) continue;
    if (key === "ERASURE_PRIMER_NO_COLOR") continue;

    const configPath = ENV_ALIASES[key] ?? key.slice(PREFIX.length).toLowerCase().replace(/__?/g, ".");

    let parsedValue: unknown;
    if (NUMERIC_KEYS.has(configPath) && /^\d+$/.test(value)) {
      parsedValue = parseInt(value, 10);
    } else if (value === "1" || value === "true") {
      parsedValue = true;
    } else if (value === "0" || value === "false" || value === "") {
      parsedValue = false;
    } else if (/^\d+$/.test(value)) {
      parsedValue = parseInt(value, 10);
    } else {
      parsedValue = value;
    }

    setNestedValue(envConfig, configPath, parsedValue);
  }

  return envConfig;
}

/** Keys where "0" and "1" are numbers, not booleans. */
const NUMERIC_KEYS = new Set(["output.fractionDigits"]);

/** Environment names whose config key is camel-cased. */
const ENV_ALIASES: Record<string, string> = {
  ERASURE_PRIMER_OUTPUT_FRACTION_DIGITS: "output.fractionDigits",
};

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
  let current: Record<string, unknown> = obj;

  for (const part of parts.slice(0, -1)) {
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
    if (!isRecord(current)) return undefined;
    current = current[part];
  }
  return current;
}

function cloneRecord(obj: Record<string, unknown>): Record<string, unknown> {
  const copy: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    copy[key] = isRecord(value) ? cloneRecord(value) : value;
  }
  return copy;
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
    result[key] =
      isRecord(sourceValue) && isRecord(targetValue)
        ? deepMerge(targetValue, sourceValue)
        : sourceValue;
  }

  return result;
}

// ============================================================================
// Config File Loading (cosmiconfig)
// ============================================================================

const MODULE_NAME = "erasure-primer";

/**
 * Load configuration from the first config file cosmiconfig finds in the
 * working directory.
 */
function loadConfigFromFiles(): PrimerConfig {
  const explorer = cosmiconfigSync(MODULE_NAME, {
    searchPlaces: [
      "package.json",
      `.${MODULE_NAME}rc`,
      `.${MODULE_NAME}rc.json`,
      `.${MODULE_NAME}rc.yaml`,
      `.${MODULE_NAME}rc.yml`,
      `${MODULE_NAME}.config.js`,
      `${MODULE_NAME}.config.cjs`,
    ],
  });

  try {
    const result = explorer.search();
    if (result && !result.isEmpty && isRecord(result.config)) {
      configFilePath = result.filepath;
      return result.config;
    }
  } catch (error) {
    // A broken config file falls back to defaults; the reason is still reported
    console.warn(`[erasure-primer] Failed to load config file: ${String(error)}`);
  }
  return {};
}

// ============================================================================
// Config Initialization
// ============================================================================

function initializeConfig(): void {
  if (configLoaded) return;

  const fileConfig = loadConfigFromFiles();
  const envConfig = loadConfigFromEnv();

  // Merge: defaults < fileConfig < envConfig
  configStore = deepMerge(deepMerge(DEFAULTS, fileConfig), envConfig);
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
function set(values: PrimerConfig): void {
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
 * A copy of the merged configuration; changing it does not change the config.
 */
function getAll(): Readonly<PrimerConfig> {
  initializeConfig();
  return cloneRecord(configStore);
}

/**
 * Get the path to the loaded config file (if any).
 */
function getConfigFilePath(): string | undefined {
  initializeConfig();
  return configFilePath;
}

/**
 * Reset configuration to defaults (mainly for testing).
 */
function reset(): void {
  configStore = {};
  configLoaded = false;
  configFilePath = undefined;
}

// ============================================================================
// Typed Accessors
// ============================================================================

function readBoolean(path: string): boolean {
  const value = get(path);
  if (typeof value === "boolean") return value;
  if (value === undefined) return getNestedValue(DEFAULTS, path) === true;
  throw primerError(EP1008, { key: path, reason: `expected a boolean, found ${JSON.stringify(value)}` })
    .build();
}

/** Whether debug logging is on. */
function isDebug(): boolean {
  return readBoolean("debug");
}

/** Whether opaque functions check every call against their pinned type. */
function verifiesOpaque(): boolean {
  return readBoolean("opaque.verify");
}

function useColors(): boolean {
  return readBoolean("output.colors");
}

/**
 * Minimum fraction digits for printed magnitudes.
 *
 * @throws {PrimerError} EP1008 when the configured value is not an
 *   integer between 0 and 20.
 */
function fractionDigits(): number {
  const value = get("output.fractionDigits");
  if (typeof value === "number" && Number.isInteger(value) && value >= 0 && value <= 20) {
    return value;
  }
  throw primerError(EP1008, {
    key: "output.fractionDigits",
    reason: `expected an integer between 0 and 20, found ${JSON.stringify(value)}`,
  }).build();
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
  isDebug,
  verifiesOpaque,
  useColors,
  fractionDigits,
} as const;

/**
 * Helper for creating type-safe configuration files.
 */
export function defineConfig(cfg: PrimerConfig): PrimerConfig {
  return cfg;
}
