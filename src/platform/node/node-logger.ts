import {
  StructuredLogger,
  createNoopLogger,
  normalizeLogLevel,
  type LogContext,
  type LogRecord,
  type Logger,
  type LogLevel
} from "../../core/logging/index.js";

export type NodeLogFormat = "pretty" | "json";

export interface NodeLoggerConfig {
  level?: LogLevel;
  format?: NodeLogFormat;
  stream?: NodeJS.WritableStream;
  nowIso?: () => string;
}

export function createNodeLogger(config: NodeLoggerConfig = {}): Logger {
  const level = config.level ?? normalizeLogLevel(process.env.BLOB_STORAGE_LOG_LEVEL, "warn");
  if (level === "silent") {
    return createNoopLogger();
  }

  const format = resolveLogFormat(config.format);
  const stream = config.stream ?? process.stderr;

  return new StructuredLogger({
    level,
    nowIso: config.nowIso,
    sink: (record) => {
      stream.write(renderRecord(record, format));
    }
  });
}

export function resolveLogFormat(explicit?: string): NodeLogFormat {
  const candidate = (explicit ?? process.env.BLOB_STORAGE_LOG_FORMAT)?.trim().toLowerCase();
  return candidate === "json" ? "json" : "pretty";
}

export function renderRecord(record: LogRecord, format: NodeLogFormat): string {
  if (format === "json") {
    return `${JSON.stringify(record)}\n`;
  }

  const scope = typeof record.context?.scope === "string" && record.context.scope.trim() ? ` ${record.context.scope}` : "";
  const level = record.level.toUpperCase().padEnd(5, " ");
  return `[${record.timestamp}] ${level}${scope} ${record.message}${formatDetails(record.context)}\n`;
}

function formatDetails(context: LogContext | undefined): string {
  if (!context) {
    return "";
  }

  const { scope: _scope, ...rest } = context;
  return Object.keys(rest).length > 0 ? ` ${JSON.stringify(rest)}` : "";
}
