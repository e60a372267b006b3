import type { StorageProvider } from "../../../core/ports/storage-provider.port.js";
import type { CliPrompter } from "./prompter.js";

export interface CliContext {
  provider: StorageProvider;
  prompter: CliPrompter;
  stdin: NodeJS.ReadableStream;
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
}

export interface CliCommand {
  path: string[];
  usage: string;
  description: string;
  run(args: string[], context: CliContext): Promise<number>;
}
