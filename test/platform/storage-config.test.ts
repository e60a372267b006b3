import { writeFile } from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { NodeStorageProvider } from "../../src/platform/node/node-storage-provider.js";
import {
  StorageConfigError,
  createNodeStorageProvider,
  resolveStorageConfig
} from "../../src/platform/node/storage-config.js";
import { createTempDir, removeTempDir } from "../helpers/temp-storage.js";

describe("resolveStorageConfig", () => {
  it("falls back to the working directory and default logging", () => {
    expect(resolveStorageConfig({}, "/work/project", "/home/tester")).toEqual({
      rootPath: "/work/project",
      caseSensitive: undefined,
      logLevel: "warn",
      logFormat: "pretty"
    });
  });

  it("reads and normalizes every setting", () => {
    const config = resolveStorageConfig(
      {
        BLOB_STORAGE_ROOT: "./blobs",
        BLOB_STORAGE_CASE_SENSITIVE: " YES ",
        BLOB_STORAGE_LOG_LEVEL: "Debug",
        BLOB_STORAGE_LOG_FORMAT: "JSON"
      },
      "/work/project",
      "/home/tester"
    );

    expect(config).toEqual({
      rootPath: path.resolve("/work/project", "blobs"),
      caseSensitive: true,
      logLevel: "debug",
      logFormat: "json"
    });
  });

  it("expands the home directory", () => {
    expect(resolveStorageConfig({ BLOB_STORAGE_ROOT: "~" }, "/work", "/home/tester").rootPath).toBe("/home/tester");
    expect(resolveStorageConfig({ BLOB_STORAGE_ROOT: "~/storage" }, "/work", "/home/tester").rootPath).toBe(
      path.join("/home/tester", "storage")
    );
  });

  it("treats blank values as unset", () => {
    const config = resolveStorageConfig({ BLOB_STORAGE_CASE_SENSITIVE: "  ", BLOB_STORAGE_LOG_LEVEL: "" }, "/work");

    expect(config.caseSensitive).toBeUndefined();
    expect(config.logLevel).toBe("warn");
  });

  it("names every invalid setting", () => {
    expect(() =>
      resolveStorageConfig({ BLOB_STORAGE_CASE_SENSITIVE: "maybe", BLOB_STORAGE_LOG_LEVEL: "loud" }, "/work")
    ).toThrow(/BLOB_STORAGE_CASE_SENSITIVE.*BLOB_STORAGE_LOG_LEVEL/);
  });
});

describe("createNodeStorageProvider", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTempDir("blob-config-");
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it("builds a provider for an existing directory", async () => {
    const provider = await createNodeStorageProvider({ rootPath: dir, caseSensitive: true });

    expect(provider).toBeInstanceOf(NodeStorageProvider);
    expect(provider.rootPath).toBe(dir);
  });

  it("rejects relative roots", async () => {
    await expect(createNodeStorageProvider({ rootPath: "relative/root" })).rejects.toThrow(
      "Invalid storage provider options: rootPath must be an absolute path."
    );
  });

  it("rejects roots that are missing or not directories", async () => {
    const file = path.join(dir, "file.txt");
    await writeFile(file, "x");

    await expect(createNodeStorageProvider({ rootPath: path.join(dir, "missing") })).rejects.toBeInstanceOf(
      StorageConfigError
    );
    await expect(createNodeStorageProvider({ rootPath: file })).rejects.toThrow(
      `Storage root ${file} is not an existing directory.`
    );
  });
});
