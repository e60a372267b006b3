import os from "node:os";
import { describe, expect, it } from "vitest";
import type { CliCommand, CliContext } from "../../src/apps/cli/framework/command.js";
import { PromptCancelledError } from "../../src/apps/cli/framework/prompter.js";
import { CommandRouter } from "../../src/apps/cli/framework/router.js";
import { EntryNotFoundError } from "../../src/core/storage/errors.js";
import { NodeStorageProvider } from "../../src/platform/node/node-storage-provider.js";
import { createStreamCapture, type StreamCapture } from "../helpers/stream-capture.js";

function createContext(): { context: CliContext; stdout: StreamCapture; stderr: StreamCapture } {
  const stdout = createStreamCapture();
  const stderr = createStreamCapture();
  return {
    context: {
      provider: new NodeStorageProvider({ rootPath: os.tmpdir() }),
      prompter: { confirm: async () => true },
      stdin: process.stdin,
      stdout: stdout.stream,
      stderr: stderr.stream
    },
    stdout,
    stderr
  };
}

function command(path: string[], run: CliCommand["run"]): CliCommand {
  return { path, usage: path.join(" "), description: `${path.join(" ")} command`, run };
}

describe("CommandRouter", () => {
  it("prints help and returns 0 for empty argv and help flags", async () => {
    for (const argv of [[], ["help"], ["--help"], ["-h"]]) {
      const { context, stdout } = createContext();
      const router = new CommandRouter([command(["ls"], async () => 0)], context);

      expect(await router.dispatch(argv)).toBe(0);
      expect(stdout.output()).toContain("Blob storage CLI");
      expect(stdout.output()).toContain(`  ${"ls".padEnd(28, " ")}ls command\n`);
    }
  });

  it("returns 1 and prints guidance for unknown commands", async () => {
    const { context, stdout, stderr } = createContext();
    const router = new CommandRouter([command(["ls"], async () => 0)], context);

    expect(await router.dispatch(["missing"])).toBe(1);
    expect(stderr.output()).toBe("Unknown command: missing\n\n");
    expect(stdout.output()).toContain("Usage:");
  });

  it("prefers the most specific matching command path and passes remaining args", async () => {
    const { context } = createContext();
    const called: Array<{ name: string; args: string[] }> = [];
    const router = new CommandRouter(
      [
        command(["folder"], async (args) => {
          called.push({ name: "generic", args });
          return 0;
        }),
        command(["folder", "create"], async (args) => {
          called.push({ name: "specific", args });
          return 0;
        })
      ],
      context
    );

    expect(await router.dispatch(["folder", "create", "a/b"])).toBe(0);
    expect(called).toEqual([{ name: "specific", args: ["a/b"] }]);
  });

  it("turns storage errors into exit code 1 with the error code", async () => {
    const { context, stderr } = createContext();
    const router = new CommandRouter(
      [
        command(["rm"], async () => {
          throw new EntryNotFoundError("file", "gone.txt");
        })
      ],
      context
    );

    expect(await router.dispatch(["rm", "gone.txt"])).toBe(1);
    expect(stderr.output()).toBe('NOT_FOUND: File "gone.txt" does not exist.\n');
  });

  it("reports cancelled prompts", async () => {
    const { context, stderr } = createContext();
    const router = new CommandRouter(
      [
        command(["rmdir"], async () => {
          throw new PromptCancelledError();
        })
      ],
      context
    );

    expect(await router.dispatch(["rmdir", "x"])).toBe(1);
    expect(stderr.output()).toBe("Prompt cancelled.\n");
  });

  it("rethrows unexpected errors", async () => {
    const { context } = createContext();
    const router = new CommandRouter(
      [
        command(["ls"], async () => {
          throw new TypeError("bug");
        })
      ],
      context
    );

    await expect(router.dispatch(["ls"])).rejects.toThrow("bug");
  });
});
