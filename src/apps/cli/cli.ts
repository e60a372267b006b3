import type { StorageProvider } from "../../core/ports/storage-provider.port.js";
import { createNodeLogger } from "../../platform/node/node-logger.js";
import { createNodeStorageProvider, resolveStorageConfig } from "../../platform/node/storage-config.js";
import { fileCreateCommand } from "./commands/file-create.command.js";
import { fileDeleteCommand } from "./commands/file-delete.command.js";
import { fileExistsCommand } from "./commands/file-exists.command.js";
import { filePutCommand } from "./commands/file-put.command.js";
import { fileReadCommand } from "./commands/file-read.command.js";
import { fileRenameCommand } from "./commands/file-rename.command.js";
import { fileStatCommand } from "./commands/file-stat.command.js";
import { folderCreateCommand } from "./commands/folder-create.command.js";
import { folderDeleteCommand } from "./commands/folder-delete.command.js";
import { folderRenameCommand } from "./commands/folder-rename.command.js";
import { listFilesCommand } from "./commands/list-files.command.js";
import { listFoldersCommand } from "./commands/list-folders.command.js";
import type { CliCommand } from "./framework/command.js";
import { createCliPrompter } from "./framework/prompter.js";
import { CommandRouter } from "./framework/router.js";

export const cliCommands: CliCommand[] = [
  listFilesCommand,
  listFoldersCommand,
  folderCreateCommand,
  folderDeleteCommand,
  folderRenameCommand,
  fileCreateCommand,
  fileDeleteCommand,
  fileRenameCommand,
  filePutCommand,
  fileReadCommand,
  fileStatCommand,
  fileExistsCommand
];

export interface RunCliOptions {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  provider?: StorageProvider;
  stdin?: NodeJS.ReadableStream;
  stdout?: NodeJS.WritableStream;
  stderr?: NodeJS.WritableStream;
}

export async function runCli(argv: string[], options: RunCliOptions = {}): Promise<number> {
  const stdin = options.stdin ?? process.stdin;
  const stdout = options.stdout ?? process.stdout;
  const stderr = options.stderr ?? process.stderr;

  const provider = options.provider ?? (await createProviderFromEnv(options.env ?? process.env, options.cwd, stderr));

  const router = new CommandRouter(cliCommands, {
    provider,
    prompter: createCliPrompter({ stdin, stdout }),
    stdin,
    stdout,
    stderr
  });

  return router.dispatch(argv);
}

async function createProviderFromEnv(
  env: NodeJS.ProcessEnv,
  cwd: string | undefined,
  stderr: NodeJS.WritableStream
): Promise<StorageProvider> {
  const config = resolveStorageConfig(env, cwd);
  const logger = createNodeLogger({ level: config.logLevel, format: config.logFormat, stream: stderr }).child({
    scope: "cli"
  });
  logger.debug("storage configuration resolved", { rootPath: config.rootPath, caseSensitive: config.caseSensitive });

  return createNodeStorageProvider({ rootPath: config.rootPath, caseSensitive: config.caseSensitive }, logger);
}
