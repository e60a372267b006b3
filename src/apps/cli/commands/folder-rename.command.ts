import type { CliCommand } from "../framework/command.js";
import { printUsage } from "./shared.js";

export const folderRenameCommand: CliCommand = {
  path: ["mvdir"],
  usage: "mvdir <from> <to>",
  description: "Move a folder to a path that does not exist yet.",
  async run(args, context): Promise<number> {
    const from = args[0]?.trim();
    const to = args[1]?.trim();
    if (!from || !to) {
      return printUsage(context, folderRenameCommand.usage);
    }

    await context.provider.renameFolder(from, to);
    context.stdout.write(`Moved ${from} -> ${to}\n`);
    return 0;
  }
};
