/**
 * Scoped stderr logger.
 *
 * Stdout belongs to the MCP stdio transport, so every level goes to stderr:
 * warnings through console.warn, everything else through console.error.
 * Lines look like `[graph] Parsed 42 files`.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export const LOG_LEVEL_ENV = "REPOGRAPH_LOG_LEVEL";

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

/**
 * Level from REPOGRAPH_LOG_LEVEL, read on every call so tests can flip it.
 */
export function currentLogLevel(): LogLevel {
  const raw = process.env[LOG_LEVEL_ENV]?.trim().toLowerCase();
  return raw && isLogLevel(raw) ? raw : "info";
}

function emit(
  scope: string,
  level: Exclude<LogLevel, "silent">,
  message: string,
  context?: LogContext
): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLogLevel()]) {
    return;
  }
  const sink = level === "warn" ? console.warn : console.error;
  const line = `[${scope}] ${message}`;
  if (context && Object.keys(context).length > 0) {
    sink(line, context);
    return;
  }
  sink(line);
}

export function createLogger(scope: string): Logger {
  return {
    debug: (message, context) => emit(scope, "debug", message, context),
    info: (message, context) => emit(scope, "info", message, context),
    warn: (message, context) => emit(scope, "warn", message, context),
    error: (message, context) => emit(scope, "error", message, context),
  };
}
