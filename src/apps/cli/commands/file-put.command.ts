import { open } from "node:fs/promises";
import type { CliCommand } from "../framework/command.js";
import { printUsage } from "./shared.js";

export const filePutCommand: CliCommand = {
  path: ["put"],
  usage: "put <path> [local-file]",
  description: "Save a local file (or stdin) as a new file.",
  async run(args, context): Promise<number> {
    const target = args[0]?.trim();
    if (!target) {
      return printUsage(context, filePutCommand.usage);
    }

    const localFile = args[1]?.trim();
    if (!localFile) {
      await context.provider.saveStream(target, context.stdin);
      context.stdout.write(`Saved ${target}\n`);
      return 0;
    }

    // Opened up front so a missing local file fails before anything is stored.
    const handle = await open(localFile, "r");
    const input = handle.createReadStream();
    try {
      await context.provider.saveStream(target, input);
    } finally {
      input.destroy();
    }
    context.stdout.write(`Saved ${target}\n`);
    return 0;
  }
};
