import { describe, expect, it } from "vitest";
import { attempt } from "../../src/core/storage/application/attempt.js";
import { InvalidPathError } from "../../src/core/storage/errors.js";
import { createRecordingLogger } from "../helpers/temp-storage.js";

describe("attempt", () => {
  it("returns true when the operation resolves", async () => {
    const { logger, records } = createRecordingLogger();

    await expect(attempt("createFolder", "a", async () => "done", logger)).resolves.toBe(true);
    expect(records).toEqual([]);
  });

  it("maps storage errors and unexpected throws to false", async () => {
    const { logger, records } = createRecordingLogger();

    const rejected = await attempt(
      "tryCreateFolder",
      "../etc",
      async () => {
        throw new InvalidPathError("../etc");
      },
      logger
    );
    const crashed = await attempt(
      "trySaveStream",
      "a.bin",
      async () => {
        throw "boom";
      },
      logger
    );

    expect(rejected).toBe(false);
    expect(crashed).toBe(false);
    expect(records.map((record) => record.context)).toEqual([
      {
        operation: "tryCreateFolder",
        path: "../etc",
        error: 'Invalid path "../etc": resolves outside the storage root.',
        errorName: "InvalidPathError",
        errorCode: "INVALID_PATH"
      },
      { operation: "trySaveStream", path: "a.bin", error: "boom" }
    ]);
  });
});
