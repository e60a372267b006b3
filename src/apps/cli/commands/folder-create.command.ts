import type { CliCommand } from "../framework/command.js";
import { parseArgs, printUsage } from "./shared.js";

export const folderCreateCommand: CliCommand = {
  path: ["mkdir"],
  usage: "mkdir <path> [--if-missing]",
  description: "Create a folder and any missing parents.",
  async run(args, context): Promise<number> {
    const { positional, flags } = parseArgs(args);
    const target = positional[0]?.trim();
    if (!target) {
      return printUsage(context, folderCreateCommand.usage);
    }

    if (flags.has("if-missing")) {
      const created = await context.provider.tryCreateFolder(target);
      context.stdout.write(created ? `Created ${target}\n` : `Unchanged ${target}\n`);
      return 0;
    }

    await context.provider.createFolder(target);
    context.stdout.write(`Created ${target}\n`);
    return 0;
  }
};
