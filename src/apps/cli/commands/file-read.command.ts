import type { CliCommand } from "../framework/command.js";
import { printUsage } from "./shared.js";

export const fileReadCommand: CliCommand = {
  path: ["cat"],
  usage: "cat <path>",
  description: "Write a file's content to stdout.",
  async run(args, context): Promise<number> {
    const target = args[0]?.trim();
    if (!target) {
      return printUsage(context, fileReadCommand.usage);
    }

    const file = await context.provider.getFile(target);
    for await (const chunk of file.openRead()) {
      context.stdout.write(chunk);
    }
    return 0;
  }
};
