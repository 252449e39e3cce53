/**
 * Scoped console logging.
 *
 * Lines are prefixed `[graphfold:<scope>] LEVEL: message`. Debug lines are
 * only written when `config.debug` is on; info lines when debug is on or
 * NODE_ENV is "development"; warnings and errors always.
 */

import { config } from "./config.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

/** Receives each rendered line (default: the matching console method). */
export type LogWriter = (level: LogLevel, line: string) => void;

export interface Logger {
  readonly scope: string;
  debug(message: string, details?: Record<string, unknown>): void;
  info(message: string, details?: Record<string, unknown>): void;
  warn(message: string, details?: Record<string, unknown>): void;
  error(message: string, details?: Record<string, unknown>): void;
}

export interface LoggerOptions {
  writer?: LogWriter;
}

const consoleWriter: LogWriter = (level, line) => {
  switch (level) {
    case "debug":
      console.debug(line);
      break;
    case "info":
      console.info(line);
      break;
    case "warn":
      console.warn(line);
      break;
    case "error":
      console.error(line);
      break;
  }
};

function isEnabled(level: LogLevel): boolean {
  switch (level) {
    case "debug":
      return config.has("debug");
    case "info":
      return config.has("debug") || process.env.NODE_ENV === "development";
    case "warn":
    case "error":
      return true;
  }
}

function renderDetails(details: Record<string, unknown> | undefined): string {
  if (!details) return "";
  const parts = Object.entries(details).map(([k, v]) => `${k}=${String(v)}`);
  return parts.length > 0 ? ` ${parts.join(" ")}` : "";
}

/**
 * Create a logger for one subsystem.
 *
 * @example
 * ```ts
 * const log = createLogger("graph");
 * log.debug("connect", { tail: 1, head: 2 });
 * // [graphfold:graph] DEBUG: connect tail=1 head=2
 * ```
 */
export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const writer = options.writer ?? consoleWriter;
  const prefix = `[graphfold:${scope}]`;

  const emit = (level: LogLevel, message: string, details?: Record<string, unknown>): void => {
    if (!isEnabled(level)) return;
    writer(level, `${prefix} ${level.toUpperCase()}: ${message}${renderDetails(details)}`);
  };

  return {
    scope,
    debug: (message, details) => emit("debug", message, details),
    info: (message, details) => emit("info", message, details),
    warn: (message, details) => emit("warn", message, details),
    error: (message, details) => emit("error", message, details),
  };
}
