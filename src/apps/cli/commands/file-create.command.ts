import type { CliCommand } from "../framework/command.js";
import { parseArgs, printUsage } from "./shared.js";

export const fileCreateCommand: CliCommand = {
  path: ["touch"],
  usage: "touch <path> [--replace]",
  description: "Create an empty file, optionally replacing an existing one.",
  async run(args, context): Promise<number> {
    const { positional, flags } = parseArgs(args);
    const target = positional[0]?.trim();
    if (!target) {
      return printUsage(context, fileCreateCommand.usage);
    }

    const file = flags.has("replace")
      ? await context.provider.createOrReplaceFile(target)
      : await context.provider.createFile(target);
    context.stdout.write(`Created ${file.path}\n`);
    return 0;
  }
};
