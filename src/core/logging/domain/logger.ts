export const LOG_LEVELS = ["silent", "error", "warn", "info", "debug"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LogContext {
  [key: string]: unknown;
}

export interface Logger {
  readonly level: LogLevel;

  child(context: LogContext): Logger;
  isLevelEnabled(level: LogLevel): boolean;
  error(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
}

export const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4
};

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export function normalizeLogLevel(raw?: string | null, fallback: LogLevel = "warn"): LogLevel {
  const normalized = raw?.trim().toLowerCase();
  if (normalized && isLogLevel(normalized)) {
    return normalized;
  }
  return fallback;
}

export function isLogLevelEnabled(current: LogLevel, target: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[target] <= LOG_LEVEL_PRIORITY[current];
}

/**
 * Flattens a thrown value into plain fields so JSON sinks keep the message
 * and the code of errno failures.
 */
export function describeError(error: unknown): LogContext {
  if (!(error instanceof Error)) {
    return { error: String(error) };
  }

  const described: LogContext = {
    error: error.message,
    errorName: error.name
  };
  if ("code" in error && typeof error.code === "string") {
    described.errorCode = error.code;
  }
  return described;
}
