import type { LogContext, Logger, LogLevel } from "../domain/logger.js";
import { describeError, isLogLevelEnabled } from "../domain/logger.js";

export type EmittedLogLevel = Exclude<LogLevel, "silent">;

export interface LogRecord {
  timestamp: string;
  level: EmittedLogLevel;
  message: string;
  context?: LogContext;
}

export type LogSink = (record: LogRecord) => void;

interface StructuredLoggerConfig {
  level: LogLevel;
  bindings?: LogContext;
  sink: LogSink;
  nowIso?: () => string;
}

const SCOPE_SEPARATOR = ".";

/**
 * Logger that hands plain records to a sink.
 *
 * Context is normalized before it reaches the sink: an `error` field is
 * expanded through `describeError`, any other `Error` value collapses to its
 * message, undefined fields are dropped, and a child's `scope` nests under
 * its parent's (`cli.storage`).
 */
export class StructuredLogger implements Logger {
  public readonly level: LogLevel;
  private readonly config: Required<Omit<StructuredLoggerConfig, "level">>;

  public constructor(config: StructuredLoggerConfig) {
    this.level = config.level;
    this.config = {
      bindings: { ...(config.bindings ?? {}) },
      sink: config.sink,
      nowIso: config.nowIso ?? (() => new Date().toISOString())
    };
  }

  public child(context: LogContext): Logger {
    return new StructuredLogger({
      ...this.config,
      level: this.level,
      bindings: bindChild(this.config.bindings, context)
    });
  }

  public isLevelEnabled(level: LogLevel): boolean {
    return isLogLevelEnabled(this.level, level);
  }

  public error(message: string, context?: LogContext): void {
    this.emit("error", message, context);
  }

  public warn(message: string, context?: LogContext): void {
    this.emit("warn", message, context);
  }

  public info(message: string, context?: LogContext): void {
    this.emit("info", message, context);
  }

  public debug(message: string, context?: LogContext): void {
    this.emit("debug", message, context);
  }

  private emit(level: EmittedLogLevel, message: string, context: LogContext = {}): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const normalized = normalizeContext({ ...this.config.bindings, ...context });
    this.config.sink({
      timestamp: this.config.nowIso(),
      level,
      message,
      ...(normalized ? { context: normalized } : {})
    });
  }
}

function bindChild(parent: LogContext, context: LogContext): LogContext {
  const bound: LogContext = { ...parent, ...context };
  if (typeof parent.scope === "string" && typeof context.scope === "string") {
    bound.scope = `${parent.scope}${SCOPE_SEPARATOR}${context.scope}`;
  }
  return bound;
}

function normalizeContext(context: LogContext): LogContext | undefined {
  const normalized: LogContext = {};
  for (const [key, value] of Object.entries(context)) {
    if (value === undefined) {
      continue;
    }
    if (key === "error") {
      Object.assign(normalized, describeError(value));
    } else if (value instanceof Error) {
      normalized[key] = value.message;
    } else {
      normalized[key] = value;
    }
  }
  return Object.keys(normalized).length > 0 ? normalized : undefined;
}

class NoopLogger implements Logger {
  public readonly level: LogLevel = "silent";

  public child(): Logger {
    return this;
  }

  public isLevelEnabled(): boolean {
    return false;
  }

  public error(): void {}

  public warn(): void {}

  public info(): void {}

  public debug(): void {}
}

const noopLogger = new NoopLogger();

export function createNoopLogger(): Logger {
  return noopLogger;
}
