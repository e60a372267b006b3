import type { CliCommand } from "../framework/command.js";
import { parseArgs, printUsage } from "./shared.js";

export const folderDeleteCommand: CliCommand = {
  path: ["rmdir"],
  usage: "rmdir <path> [--yes]",
  description: "Delete a folder and everything inside it.",
  async run(args, context): Promise<number> {
    const { positional, flags } = parseArgs(args);
    const target = positional[0]?.trim();
    if (!target) {
      return printUsage(context, folderDeleteCommand.usage);
    }

    if (!flags.has("yes")) {
      const confirmed = await context.prompter.confirm({
        message: `Delete folder ${target} and all of its contents?`,
        initialValue: false
      });
      if (!confirmed) {
        context.stdout.write("Aborted.\n");
        return 1;
      }
    }

    await context.provider.deleteFolder(target);
    context.stdout.write(`Deleted ${target}\n`);
    return 0;
  }
};
