import type { CliContext } from "../framework/command.js";

/**
 * Splits `--flag` switches from positional arguments.
 */
export function parseArgs(args: string[]): { positional: string[]; flags: Set<string> } {
  const positional: string[] = [];
  const flags = new Set<string>();

  for (const arg of args) {
    if (arg.startsWith("--")) {
      flags.add(arg.slice(2));
    } else {
      positional.push(arg);
    }
  }

  return { positional, flags };
}

export function printUsage(context: CliContext, usage: string): number {
  context.stderr.write(`Usage: blobctl ${usage}\n`);
  return 1;
}
