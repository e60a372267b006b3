import type { CliCommand } from "../framework/command.js";
import { printUsage } from "./shared.js";

export const fileDeleteCommand: CliCommand = {
  path: ["rm"],
  usage: "rm <path>",
  description: "Delete a file.",
  async run(args, context): Promise<number> {
    const target = args[0]?.trim();
    if (!target) {
      return printUsage(context, fileDeleteCommand.usage);
    }

    await context.provider.deleteFile(target);
    context.stdout.write(`Deleted ${target}\n`);
    return 0;
  }
};
