/**
 * Scoped console logging.
 *
 * Every line is prefixed with `[tagweave:<scope>]`. `debug` lines are only
 * written when the logger is verbose or the `debug` config key is set.
 */

import { config } from "./config.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogWriter = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
  /** Emit debug lines regardless of config */
  verbose?: boolean;
  /** Custom writer (default: console.log for debug/info, console.error for warn/error) */
  writer?: LogWriter;
}

export interface Logger {
  readonly scope: string;
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const consoleWriter: LogWriter = (level, line) => {
  if (level === "warn" || level === "error") {
    console.error(line);
  } else {
    console.log(line);
  }
};

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const writer = options.writer ?? consoleWriter;
  const prefix = `[tagweave:${scope}]`;
  const write = (level: LogLevel, message: string): void => {
    writer(level, level === "info" || level === "debug" ? `${prefix} ${message}` : `${prefix} ${level}: ${message}`);
  };

  return {
    scope,
    debug(message) {
      if (options.verbose || config.getBoolean("debug")) {
        write("debug", message);
      }
    },
    info(message) {
      write("info", message);
    },
    warn(message) {
      write("warn", message);
    },
    error(message) {
      write("error", message);
    },
  };
}
