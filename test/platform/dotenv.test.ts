import { writeFile } from "node:fs/promises";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { loadDotEnv, parseDotEnv } from "../../src/platform/node/dotenv.js";
import { createTempDir, removeTempDir } from "../helpers/temp-storage.js";

const roots: string[] = [];

afterEach(async () => {
  while (roots.length > 0) {
    const root = roots.pop();
    if (root) {
      await removeTempDir(root);
    }
  }
});

describe("dotenv support", () => {
  it("parses comments, export prefixes, quotes and inline comments", () => {
    const parsed = parseDotEnv(`
# storage settings
export BLOB_STORAGE_ROOT=/srv/blobs
BLOB_STORAGE_LOG_LEVEL="debug"
BLOB_STORAGE_LOG_FORMAT='json'
BLOB_STORAGE_CASE_SENSITIVE=false # keep linux semantics
QUOTED_HASH="a # b"
EMPTY=
INVALID_LINE
`);

    expect(parsed).toEqual({
      BLOB_STORAGE_ROOT: "/srv/blobs",
      BLOB_STORAGE_LOG_LEVEL: "debug",
      BLOB_STORAGE_LOG_FORMAT: "json",
      BLOB_STORAGE_CASE_SENSITIVE: "false",
      QUOTED_HASH: "a # b",
      EMPTY: ""
    });
  });

  it("loads .env without overriding existing values and reports applied keys", async () => {
    const root = await createTempDir("blob-dotenv-");
    roots.push(root);
    await writeFile(
      path.join(root, ".env"),
      ["BLOB_STORAGE_ROOT=/from/file", "BLOB_STORAGE_LOG_LEVEL=info"].join("\n") + "\n",
      "utf8"
    );

    const env: NodeJS.ProcessEnv = { BLOB_STORAGE_LOG_LEVEL: "error" };
    const applied = await loadDotEnv({ cwd: root, env });

    expect(applied).toEqual(["BLOB_STORAGE_ROOT"]);
    expect(env.BLOB_STORAGE_ROOT).toBe("/from/file");
    expect(env.BLOB_STORAGE_LOG_LEVEL).toBe("error");
  });

  it("does nothing when the file is missing", async () => {
    const root = await createTempDir("blob-dotenv-");
    roots.push(root);

    const env: NodeJS.ProcessEnv = {};
    expect(await loadDotEnv({ cwd: root, env })).toEqual([]);
    expect(env).toEqual({});
  });
});
