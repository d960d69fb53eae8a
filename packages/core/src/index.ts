/**
 * Core module exports for @tagweave/core
 *
 * This package provides:
 * - Configuration loading (env, config files, programmatic)
 * - The diagnostics catalog and its renderer
 * - Scoped console logging
 */

// Configuration System
export {
  config,
  defineConfig,
  isRecord,
  parseEnvValue,
  DEFAULT_OUTPUT_LIMIT,
  type EnvValueKind,
  type TagweaveConfig,
  type SerializeConfig,
} from "./config.js";

// Diagnostics System
export * from "./diagnostics.js";

// Logging
export { createLogger, type Logger, type LoggerOptions, type LogLevel, type LogWriter } from "./logging.js";
