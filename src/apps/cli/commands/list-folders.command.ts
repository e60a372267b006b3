import type { CliCommand } from "../framework/command.js";

export const listFoldersCommand: CliCommand = {
  path: ["folders"],
  usage: "folders [path]",
  description: "List child folders (creates the folder when missing).",
  async run(args, context): Promise<number> {
    const folders = await context.provider.listFolders(args[0] ?? "");

    for (const folder of folders) {
      context.stdout.write(`${folder.path}/\n`);
    }

    return 0;
  }
};
