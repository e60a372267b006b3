import type { CliCommand } from "../framework/command.js";
import { printUsage } from "./shared.js";

export const fileRenameCommand: CliCommand = {
  path: ["mv"],
  usage: "mv <from> <to>",
  description: "Move a file to a path that does not exist yet.",
  async run(args, context): Promise<number> {
    const from = args[0]?.trim();
    const to = args[1]?.trim();
    if (!from || !to) {
      return printUsage(context, fileRenameCommand.usage);
    }

    await context.provider.renameFile(from, to);
    context.stdout.write(`Moved ${from} -> ${to}\n`);
    return 0;
  }
};
