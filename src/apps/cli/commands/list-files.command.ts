import type { CliCommand } from "../framework/command.js";

export const listFilesCommand: CliCommand = {
  path: ["ls"],
  usage: "ls [path]",
  description: "List files directly inside a folder.",
  async run(args, context): Promise<number> {
    const files = await context.provider.listFiles(args[0] ?? "");

    for (const file of files) {
      const size = await file.getSize();
      context.stdout.write(`${file.path}\t${size}\n`);
    }

    return 0;
  }
};
