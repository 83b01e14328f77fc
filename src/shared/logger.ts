/**
 * Leveled file logger.
 *
 * stdout carries the chosen directory and the terminal belongs to the UI,
 * so log lines only ever go to the file named by TREENAV_LOG_FILE. Without
 * one, every call is a no-op.
 */

import * as fs from "fs";

// ─── Types ──────────────────────────────────────────────────────────────────

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LoggerSettings {
  /** Destination file; null disables logging */
  file: string | null;
  /** Minimum level written */
  level: LogLevel;
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

// ─── Settings ───────────────────────────────────────────────────────────────

/** Read logger settings from the environment */
export function settingsFromEnv(env: NodeJS.ProcessEnv = process.env): LoggerSettings {
  const level = env.TREENAV_LOG_LEVEL?.toLowerCase() ?? "warn";
  return {
    file: env.TREENAV_LOG_FILE && env.TREENAV_LOG_FILE.length > 0 ? env.TREENAV_LOG_FILE : null,
    level: isLogLevel(level) ? level : "warn",
  };
}

let settings: LoggerSettings = settingsFromEnv();

/** Override logger settings (tests, or a front end that wants its own file) */
export function configureLogger(next: Partial<LoggerSettings>): void {
  settings = { ...settings, ...next };
}

// ─── Formatting ─────────────────────────────────────────────────────────────

export function formatLine(
  level: LogLevel,
  scope: string,
  message: string,
  context?: Record<string, unknown>,
  now: Date = new Date(),
): string {
  const suffix = context && Object.keys(context).length > 0 ? ` ${JSON.stringify(context)}` : "";
  return `${now.toISOString()} ${level.toUpperCase()} [${scope}] ${message}${suffix}\n`;
}

function write(level: LogLevel, scope: string, message: string, context?: Record<string, unknown>): void {
  const { file } = settings;
  if (file === null || LEVEL_ORDER[level] < LEVEL_ORDER[settings.level]) return;

  try {
    fs.appendFileSync(file, formatLine(level, scope, message, context), "utf-8");
  } catch {
    // An unwritable log file turns logging off for the rest of the session
    settings = { ...settings, file: null };
  }
}

// ─── Factory ────────────────────────────────────────────────────────────────

/** Get a logger whose lines are tagged with `scope` */
export function getLogger(scope: string): Logger {
  return {
    debug: (message, context) => write("debug", scope, message, context),
    info: (message, context) => write("info", scope, message, context),
    warn: (message, context) => write("warn", scope, message, context),
    error: (message, context) => write("error", scope, message, context),
  };
}
