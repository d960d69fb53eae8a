/**
 * Unified Configuration System
 *
 * Provides a centralized configuration API for tagweave packages and the CLI.
 * Configuration is loaded from (in priority order):
 *
 * 1. Environment variables: TAGWEAVE_* (highest priority, for CI overrides)
 * 2. Programmatic: config.set() calls
 * 3. Config files: .tagweaverc, tagweave.config.js, package.json "tagweave" key
 * 4. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "@tagweave/core";
 *
 * config.getString("serialize.content")   // → "" unless configured
 * config.getNumber("serialize.limit")     // → 1048576
 *
 * config.set({ serialize: { escape: false } });
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";

// ============================================================================
// Types
// ============================================================================

/**
 * Serializer configuration options.
 */
export interface SerializeConfig {
  /** Inner content written into elements that have no children */
  content?: string;
  /** Escape `& < > "` in attribute values */
  escape?: boolean;
  /** Maximum output length in UTF-16 code units */
  limit?: number;
}

/**
 * Full tagweave configuration schema.
 */
export interface TagweaveConfig {
  /** Enable debug logging */
  debug?: boolean;
  /** Serializer configuration */
  serialize?: SerializeConfig;
  /** Custom user configuration */
  [key: string]: unknown;
}

type ConfigRecord = Record<string, unknown>;

/** Default output limit: 1 MiB of code units. */
export const DEFAULT_OUTPUT_LIMIT = 1 << 20;

// ============================================================================
// Global State
// ============================================================================

let configStore: ConfigRecord = {};
let programmatic: ConfigRecord = {};
let configLoaded = false;
let configFilePath: string | undefined;

// ============================================================================
// Utility Functions
// ============================================================================

export function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Set a nested value using dot notation.
 */
function setNestedValue(obj: ConfigRecord, path: string, value: unknown): void {
  const parts = path.split(".");
  let current = obj;

  for (let i = 0; i < parts.length - 1; i++) {
    const part = parts[i];
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: ConfigRecord = {};
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
function deepMerge(target: ConfigRecord, source: ConfigRecord): ConfigRecord {
  const result: ConfigRecord = { ...target };

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
// Environment Variable Loading
// ============================================================================

const PREFIX = "TAGWEAVE_";

export type EnvValueKind = "boolean" | "number" | "string";

/** Types of the documented keys; env values for these are coerced accordingly. */
const ENV_SCHEMA: ReadonlyMap<string, EnvValueKind> = new Map<string, EnvValueKind>([
  ["debug", "boolean"],
  ["serialize.content", "string"],
  ["serialize.escape", "boolean"],
  ["serialize.limit", "number"],
]);

/**
 * Parse a single environment value. With a `kind`, the value is coerced to it
 * (`undefined` when it cannot be); without one, flags and integers are guessed.
 */
export function parseEnvValue(value: string, kind?: EnvValueKind): unknown {
  switch (kind) {
    case "string":
      return value;
    case "number":
      return /^\d+$/.test(value) ? parseInt(value, 10) : undefined;
    case "boolean":
      if (value === "1" || value === "true") return true;
      if (value === "0" || value === "false" || value === "") return false;
      return undefined;
    case undefined:
      if (value === "1" || value === "true") return true;
      if (value === "0" || value === "false" || value === "") return false;
      if (/^\d+$/.test(value)) return parseInt(value, 10);
      return value;
  }
}

/**
 * Load configuration from environment variables.
 * Variables prefixed with TAGWEAVE_ are parsed into the config object.
 *
 * Examples:
 *   TAGWEAVE_DEBUG=1                    → { debug: true }
 *   TAGWEAVE_SERIALIZE_CONTENT=hello    → { serialize: { content: "hello" } }
 *   TAGWEAVE_SERIALIZE__LIMIT=4096      → { serialize: { limit: 4096 } }
 *   TAGWEAVE_SERIALIZE_CONTENT=1        → { serialize: { content: "1" } }
 *
 * A value that does not fit its key's type is skipped with a warning.
 */
function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ConfigRecord {
  const envConfig: ConfigRecord = {};

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(PREFIX) || value === undefined) continue;

    const configPath = key
      .slice(PREFIX.length)
      .toLowerCase()
      .replace(/__/g, ".")
      .replace(/_/g, ".");

    const kind = ENV_SCHEMA.get(configPath);
    const parsed = parseEnvValue(value, kind);
    if (parsed === undefined) {
      console.warn(`[tagweave:config] Ignoring ${key}=${JSON.stringify(value)}: expected a ${kind ?? "value"}`);
      continue;
    }

    setNestedValue(envConfig, configPath, parsed);
  }

  return envConfig;
}

// ============================================================================
// Config File Loading (cosmiconfig)
// ============================================================================

const MODULE_NAME = "tagweave";

/**
 * Load configuration synchronously from files.
 * Uses cosmiconfig to search for config in standard locations.
 */
function loadConfigFromFiles(): ConfigRecord {
  try {
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

    const result = explorer.search();
    if (result && !result.isEmpty && isRecord(result.config)) {
      configFilePath = result.filepath;
      return result.config;
    }
  } catch (error) {
    // A broken config file falls back to defaults
    console.warn(`[tagweave:config] Failed to load config file:`, error);
  }

  return {};
}

// ============================================================================
// Config Initialization
// ============================================================================

function defaults(): ConfigRecord {
  return {
    debug: false,
    serialize: {
      content: "",
      escape: true,
      limit: DEFAULT_OUTPUT_LIMIT,
    },
  };
}

function initializeConfig(): void {
  if (configLoaded) return;

  const fileConfig = loadConfigFromFiles();
  const envConfig = loadConfigFromEnv();

  // Merge: defaults < fileConfig < programmatic < envConfig
  configStore = deepMerge(deepMerge(deepMerge(defaults(), fileConfig), programmatic), envConfig);
  configLoaded = true;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a configuration value by dot-notation path.
 */
function get(path: string): unknown {
  initializeConfig();
  return getNestedValue(configStore, path);
}

function getString(path: string): string | undefined {
  const value = get(path);
  if (typeof value === "string") return value;
  // `content: 42` in a YAML config file
  if (typeof value === "number") return String(value);
  return undefined;
}

function getBoolean(path: string): boolean | undefined {
  const value = get(path);
  return typeof value === "boolean" ? value : undefined;
}

function getNumber(path: string): number | undefined {
  const value = get(path);
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

/**
 * Set configuration values programmatically. Environment variables still win.
 */
function set(values: TagweaveConfig): void {
  programmatic = deepMerge(programmatic, values);
  configLoaded = false;
  initializeConfig();
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
function getAll(): Readonly<ConfigRecord> {
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
 * Reset configuration to defaults (mainly for testing).
 */
function reset(): void {
  configStore = {};
  programmatic = {};
  configLoaded = false;
  configFilePath = undefined;
}

/**
 * Unified configuration API.
 */
export const config = {
  get,
  getString,
  getBoolean,
  getNumber,
  set,
  has,
  getAll,
  getConfigFilePath,
  reset,
} as const;

/**
 * Identity helper that gives config files type checking.
 *
 * @example
 * ```js
 * // tagweave.config.js
 * import { defineConfig } from "@tagweave/core";
 * export default defineConfig({ serialize: { content: "lorem" } });
 * ```
 */
export function defineConfig(value: TagweaveConfig): TagweaveConfig {
  return value;
}
