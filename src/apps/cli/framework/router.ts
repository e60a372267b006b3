import { isStorageError } from "../../../core/storage/errors.js";
import type { CliCommand, CliContext } from "./command.js";
import { PromptCancelledError } from "./prompter.js";

export class CommandRouter {
  private readonly commands: CliCommand[];
  private readonly context: CliContext;

  public constructor(commands: CliCommand[], context: CliContext) {
    this.commands = [...commands].sort((left, right) => right.path.length - left.path.length);
    this.context = context;
  }

  public async dispatch(argv: string[]): Promise<number> {
    if (argv.length === 0 || argv[0] === "help" || argv[0] === "--help" || argv[0] === "-h") {
      this.printHelp();
      return 0;
    }

    const match = this.commands.find((command) => isPathMatch(argv, command.path));
    if (!match) {
      this.context.stderr.write(`Unknown command: ${argv.join(" ")}\n\n`);
      this.printHelp();
      return 1;
    }

    try {
      return await match.run(argv.slice(match.path.length), this.context);
    } catch (error) {
      if (isStorageError(error)) {
        this.context.stderr.write(`${error.code}: ${error.message}\n`);
        return 1;
      }
      if (error instanceof PromptCancelledError) {
        this.context.stderr.write(`${error.message}\n`);
        return 1;
      }
      throw error;
    }
  }

  public printHelp(): void {
    this.context.stdout.write("Blob storage CLI\n\n");
    this.context.stdout.write("Usage:\n");
    this.context.stdout.write("  blobctl <command> [arguments]\n\n");
    this.context.stdout.write("Commands:\n");

    const sorted = [...this.commands].sort((left, right) => left.usage.localeCompare(right.usage));
    for (const command of sorted) {
      this.context.stdout.write(`  ${command.usage.padEnd(28, " ")}${command.description}\n`);
    }

    this.context.stdout.write("\nPaths are relative to BLOB_STORAGE_ROOT and use '/' separators.\n");
  }
}

function isPathMatch(argv: string[], path: string[]): boolean {
  if (argv.length < path.length) {
    return false;
  }

  return path.every((segment, index) => argv[index] === segment);
}
