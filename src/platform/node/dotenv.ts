import { readFile } from "node:fs/promises";
import path from "node:path";
import { isMissingEntry } from "./path-resolver.js";

export interface LoadDotEnvParams {
  cwd?: string;
  filename?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Seeds `env` from a dotenv file. Variables already present keep their value.
 * Returns the keys that were applied.
 */
export async function loadDotEnv(params: LoadDotEnvParams = {}): Promise<string[]> {
  const envPath = path.join(params.cwd ?? process.cwd(), params.filename ?? ".env");
  const env = params.env ?? process.env;

  let content: string;
  try {
    content = await readFile(envPath, "utf8");
  } catch (error) {
    if (isMissingEntry(error)) {
      return [];
    }
    throw error;
  }

  const applied: string[] = [];
  for (const [key, value] of Object.entries(parseDotEnv(content))) {
    if (env[key] === undefined) {
      env[key] = value;
      applied.push(key);
    }
  }
  return applied;
}

export function parseDotEnv(content: string): Record<string, string> {
  const parsed: Record<string, string> = {};

  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) {
      continue;
    }

    const statement = trimmed.startsWith("export ") ? trimmed.slice("export ".length).trim() : trimmed;
    const separator = statement.indexOf("=");
    if (separator <= 0) {
      continue;
    }

    const key = statement.slice(0, separator).trim();
    if (key) {
      parsed[key] = parseValue(statement.slice(separator + 1).trim());
    }
  }

  return parsed;
}

function parseValue(raw: string): string {
  const quote = raw[0];
  if ((quote === '"' || quote === "'") && raw.length >= 2 && raw.endsWith(quote)) {
    const inner = raw.slice(1, -1);
    if (quote === "'") {
      return inner;
    }
    return inner
      .replace(/\\n/g, "\n")
      .replace(/\\t/g, "\t")
      .replace(/\\"/g, '"')
      .replace(/\\\\/g, "\\");
  }

  // Unquoted values end at an inline comment.
  const comment = raw.search(/\s#/);
  return comment === -1 ? raw : raw.slice(0, comment).trimEnd();
}
