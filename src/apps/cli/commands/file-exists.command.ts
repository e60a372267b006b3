import type { CliCommand } from "../framework/command.js";
import { printUsage } from "./shared.js";

export const fileExistsCommand: CliCommand = {
  path: ["exists"],
  usage: "exists <path>",
  description: "Print whether a file exists; exits 1 when it does not.",
  async run(args, context): Promise<number> {
    const target = args[0]?.trim();
    if (!target) {
      return printUsage(context, fileExistsCommand.usage);
    }

    const exists = await context.provider.fileExists(target);
    context.stdout.write(`${exists}\n`);
    return exists ? 0 : 1;
  }
};
