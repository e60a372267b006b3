import type { CliCommand } from "../framework/command.js";
import { printUsage } from "./shared.js";

export const fileStatCommand: CliCommand = {
  path: ["stat"],
  usage: "stat <path>",
  description: "Show name, type, size and modification time of a file.",
  async run(args, context): Promise<number> {
    const target = args[0]?.trim();
    if (!target) {
      return printUsage(context, fileStatCommand.usage);
    }

    const file = await context.provider.getFile(target);
    const [size, lastUpdated] = await Promise.all([file.getSize(), file.getLastUpdated()]);

    context.stdout.write(`path\t${file.path}\n`);
    context.stdout.write(`name\t${file.name}\n`);
    context.stdout.write(`type\t${file.getFileType() || "-"}\n`);
    context.stdout.write(`size\t${size}\n`);
    context.stdout.write(`modified\t${lastUpdated.toISOString()}\n`);
    return 0;
  }
};
