import { describe, expect, it } from "vitest";
import {
  StructuredLogger,
  createNoopLogger,
  describeError,
  normalizeLogLevel
} from "../../src/core/logging/index.js";

describe("StructuredLogger", () => {
  it("filters messages by log level", () => {
    const records: Array<{ level: string; message: string }> = [];
    const logger = new StructuredLogger({
      level: "info",
      sink: (record) => records.push({ level: record.level, message: record.message }),
      nowIso: () => "2026-01-01T00:00:00.000Z"
    });

    logger.debug("debug");
    logger.info("info");
    logger.error("error");

    expect(records).toEqual([
      { level: "info", message: "info" },
      { level: "error", message: "error" }
    ]);
  });

  it("merges child bindings with per-call context", () => {
    const contexts: unknown[] = [];
    const logger = new StructuredLogger({
      level: "debug",
      sink: (record) => contexts.push(record.context),
      nowIso: () => "2026-01-01T00:00:00.000Z"
    });

    const child = logger.child({ scope: "storage", rootPath: "/srv/data" });
    child.debug("resolving", { path: "a/b" });
    logger.debug("bare");

    expect(contexts).toEqual([{ scope: "storage", rootPath: "/srv/data", path: "a/b" }, undefined]);
  });

  it("nests child scopes and flattens errors carried in the context", () => {
    const contexts: unknown[] = [];
    const logger = new StructuredLogger({
      level: "debug",
      sink: (record) => contexts.push(record.context),
      nowIso: () => "2026-01-01T00:00:00.000Z"
    });

    const storage = logger.child({ scope: "cli" }).child({ scope: "storage" });
    storage.warn("delete failed", {
      path: "a.txt",
      caseSensitive: undefined,
      error: Object.assign(new Error("EACCES: permission denied"), { code: "EACCES" }),
      cause: new Error("disk busy")
    });

    expect(contexts).toEqual([
      {
        scope: "cli.storage",
        path: "a.txt",
        error: "EACCES: permission denied",
        errorName: "Error",
        errorCode: "EACCES",
        cause: "disk busy"
      }
    ]);
    expect(Object.keys(contexts[0] ?? {})).not.toContain("caseSensitive");
  });

  it("returns a stable noop logger", () => {
    const noop = createNoopLogger();

    expect(noop.isLevelEnabled("error")).toBe(false);
    expect(noop.child({ scope: "anything" })).toBe(noop);
  });

  it("normalizes log levels with a fallback", () => {
    expect(normalizeLogLevel(" DEBUG ")).toBe("debug");
    expect(normalizeLogLevel("verbose", "info")).toBe("info");
    expect(normalizeLogLevel(undefined)).toBe("warn");
  });

  it("describes errno failures", () => {
    const error = Object.assign(new Error("ENOENT: no such file"), { code: "ENOENT" });

    expect(describeError(error)).toEqual({ error: "ENOENT: no such file", errorName: "Error", errorCode: "ENOENT" });
    expect(describeError(42)).toEqual({ error: "42" });
  });
});
