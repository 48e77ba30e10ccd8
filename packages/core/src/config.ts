/**
 * Unified Configuration System
 *
 * Configuration is loaded from (in priority order):
 *
 * 1. Environment variables: ALTGEN_* (highest priority, for CI overrides)
 * 2. Config files: .altgenrc, .altgenrc.json, altgen.config.js, etc.
 * 3. package.json: "altgen" key
 * 4. Programmatic: config.set() calls
 * 5. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "@altgen/core";
 *
 * config.get("debug")            // → boolean
 * config.get("variant.access")   // → "unchecked" | "checked"
 *
 * const trace = config.when("debug", () => collectTrace());
 * ```
 *
 * @example Config file (.altgenrc.json)
 * ```json
 * { "debug": true, "variant": { "access": "checked" } }
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";

// ============================================================================
// Types
// ============================================================================

/**
 * Variant configuration options.
 */
export interface VariantConfig {
  /**
   * "unchecked" = value(key) reads the slot without looking at the tag,
   * "checked" = a tag mismatch raises AG1002
   */
  access?: "unchecked" | "checked";
}

/**
 * Complete configuration.
 */
export interface AltgenConfig {
  /** Enable debug logging through debugLog() */
  debug?: boolean;
  /** Variant access policy */
  variant?: VariantConfig;
  /** Custom user-defined options */
  [key: string]: unknown;
}

// ============================================================================
// Global State
// ============================================================================

let configStore: Record<string, unknown> = {};
let configLoaded = false;
let configFilePath: string | undefined;

// ============================================================================
// Environment Variable Loading
// ============================================================================

/**
 * Load configuration from environment variables.
 * Variables prefixed with ALTGEN_ are parsed into the config object.
 *
 * Examples:
 *   ALTGEN_DEBUG=1                  → { debug: true }
 *   ALTGEN_VARIANT_ACCESS=checked   → { variant: { access: "checked" } }
 */
function loadConfigFromEnv(): Record<string, unknown> {
  const envConfig: Record<string, unknown> = {};
  const PREFIX = "ALTGEN_";

  for (const [key, value] of Object.entries(process.env)) {
    if (!key.startsWith(PREFIX) || value === undefined) continue;
    // Rendering switch, read by the diagnostics renderer directly
    if (key === "ALTGEN_NO_COLOR") continue;

    const configPath = key
      .slice(PREFIX.length)
      .toLowerCase()
      .replace(/__/g, ".")
      .replace(/_/g, ".");

    let parsedValue: unknown;
    if (value === "1" || value === "true") {
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
// Config File Loading (cosmiconfig)
// ============================================================================

const MODULE_NAME = "altgen";

/**
 * Load configuration from the nearest config file in the working directory.
 */
function loadConfigFromFiles(): Record<string, unknown> {
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
  return {};
}

// ============================================================================
// Config Initialization
// ============================================================================

const DEFAULTS: AltgenConfig = {
  debug: false,
  variant: {
    access: "unchecked",
  },
};

/**
 * Initialize configuration from all sources.
 */
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
 * Get a configuration value by path. The type argument is the caller's
 * assertion about the shape stored at `path`.
 */
function get<T = unknown>(path: string): T | undefined {
  initializeConfig();
  return getNestedValue(configStore, path) as T | undefined;
}

/**
 * Set configuration values programmatically.
 */
function set(values: Partial<AltgenConfig>): void {
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
 * Reset configuration so the next read loads every source again
 * (mainly for testing).
 */
function reset(): void {
  configStore = {};
  configLoaded = false;
  configFilePath = undefined;
}

/**
 * Conditional value based on configuration.
 */
function when<T, U = undefined>(
  path: string,
  thenFn: () => T,
  elseFn?: () => U,
): T | U | undefined {
  if (has(path)) {
    return thenFn();
  }
  return elseFn?.();
}

/**
 * The configuration API.
 */
export const config = {
  get,
  set,
  has,
  getAll,
  getConfigFilePath,
  reset,
  when,
};

/**
 * Helper for writing type-checked config files.
 */
export function defineConfig(cfg: AltgenConfig): AltgenConfig {
  return cfg;
}

/** The configured variant access policy. */
export function variantAccess(): "unchecked" | "checked" {
  return get("variant.access") === "checked" ? "checked" : "unchecked";
}
