import { stat } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { z } from "zod";
import { LOG_LEVELS, type Logger, type LogLevel } from "../../core/logging/index.js";
import { NodeStorageProvider } from "./node-storage-provider.js";
import type { NodeLogFormat } from "./node-logger.js";

export class StorageConfigError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

export interface StorageConfig {
  rootPath: string;
  caseSensitive?: boolean;
  logLevel: LogLevel;
  logFormat: NodeLogFormat;
}

function optionalSetting<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess(
    (value) => (typeof value === "string" && value.trim() === "" ? undefined : value),
    schema.optional()
  );
}

const booleanSetting = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(["true", "false", "1", "0", "yes", "no"]))
  .transform((value) => value === "true" || value === "1" || value === "yes");

const storageEnvSchema = z.object({
  BLOB_STORAGE_ROOT: optionalSetting(z.string().trim()),
  BLOB_STORAGE_CASE_SENSITIVE: optionalSetting(booleanSetting),
  BLOB_STORAGE_LOG_LEVEL: optionalSetting(z.string().trim().toLowerCase().pipe(z.enum(LOG_LEVELS))),
  BLOB_STORAGE_LOG_FORMAT: optionalSetting(z.string().trim().toLowerCase().pipe(z.enum(["pretty", "json"])))
});

const providerOptionsSchema = z.object({
  rootPath: z.string().min(1).refine((value) => path.isAbsolute(value), "must be an absolute path"),
  caseSensitive: z.boolean().optional()
});

export function resolveStorageConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
  homeDir: string = os.homedir()
): StorageConfig {
  const parsed = storageEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new StorageConfigError(`Invalid storage configuration: ${formatIssues(parsed.error)}.`);
  }

  const settings = parsed.data;
  return {
    rootPath: resolveRootPath(settings.BLOB_STORAGE_ROOT, cwd, homeDir),
    caseSensitive: settings.BLOB_STORAGE_CASE_SENSITIVE,
    logLevel: settings.BLOB_STORAGE_LOG_LEVEL ?? "warn",
    logFormat: settings.BLOB_STORAGE_LOG_FORMAT ?? "pretty"
  };
}

export async function createNodeStorageProvider(
  options: { rootPath: string; caseSensitive?: boolean },
  logger?: Logger
): Promise<NodeStorageProvider> {
  const parsed = providerOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw new StorageConfigError(`Invalid storage provider options: ${formatIssues(parsed.error)}.`);
  }

  const { rootPath, caseSensitive } = parsed.data;
  const isDirectory = await stat(rootPath).then(
    (stats) => stats.isDirectory(),
    () => false
  );
  if (!isDirectory) {
    throw new StorageConfigError(`Storage root ${rootPath} is not an existing directory.`);
  }

  return new NodeStorageProvider({ rootPath, caseSensitive, logger });
}

function resolveRootPath(raw: string | undefined, cwd: string, homeDir: string): string {
  if (!raw) {
    return path.resolve(cwd);
  }
  if (raw === "~") {
    return homeDir;
  }
  if (raw.startsWith("~/")) {
    return path.join(homeDir, raw.slice(2));
  }
  return path.resolve(cwd, raw);
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "options"} ${issue.message}`)
    .join("; ");
}
