import { lstat, readlink, realpath } from "node:fs/promises";
import path from "node:path";
import { InvalidPathError } from "../../core/storage/errors.js";
import { RELATIVE_PATH_SEPARATOR, fromNativeSeparators, splitSegments, toNativeSeparators } from "../../core/storage/domain/relative-path.js";

const MAX_LINK_HOPS = 40;

export interface ResolvedStoragePath {
  /** Canonical root the path was checked against. */
  rootPath: string;
  /** Canonical absolute location on disk; reads and writes go here. */
  absolutePath: string;
  /**
   * The directory entry the caller named, with only its parent canonicalized.
   * Deletes and renames act on it so a link is removed or moved, not its target.
   */
  entryPath: string;
  /** The caller's path, `/`-separated with `.` and `..` collapsed. */
  relativePath: string;
}

export interface PathResolverOptions {
  caseSensitive?: boolean;
}

/** Case-insensitive on Windows and macOS, whose default filesystems fold case. */
export function defaultCaseSensitivity(platform: NodeJS.Platform = process.platform): boolean {
  return platform !== "win32" && platform !== "darwin";
}

export function isWithinRoot(candidate: string, root: string, caseSensitive: boolean): boolean {
  const left = caseSensitive ? candidate : candidate.toLowerCase();
  const right = caseSensitive ? root : root.toLowerCase();
  if (left === right) {
    return true;
  }

  const prefix = right.endsWith(path.sep) ? right : `${right}${path.sep}`;
  return left.startsWith(prefix);
}

export async function resolveStoragePath(
  rootPath: string,
  relativePath: string,
  options: PathResolverOptions = {}
): Promise<ResolvedStoragePath> {
  if (relativePath.includes("\0")) {
    throw new InvalidPathError(relativePath, "contains a NUL byte");
  }

  const caseSensitive = options.caseSensitive ?? defaultCaseSensitivity();
  const lexicalRoot = path.resolve(rootPath);
  const candidate = relativePath
    ? path.resolve(lexicalRoot, toNativeSeparators(relativePath, path.sep))
    : lexicalRoot;
  if (!isWithinRoot(candidate, lexicalRoot, caseSensitive)) {
    throw new InvalidPathError(relativePath);
  }
  const identity = toRelativeIdentity(candidate, lexicalRoot);

  let canonicalRoot: string;
  let canonicalCandidate: string;
  let entryPath: string;
  try {
    canonicalRoot = await realpath(lexicalRoot);
    canonicalCandidate = await canonicalize(candidate);
    entryPath = identity
      ? path.join(await canonicalize(path.dirname(candidate)), path.basename(candidate))
      : canonicalRoot;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InvalidPathError(relativePath, `cannot be canonicalized (${reason})`);
  }

  if (
    !isWithinRoot(canonicalCandidate, canonicalRoot, caseSensitive) ||
    !isWithinRoot(entryPath, canonicalRoot, caseSensitive)
  ) {
    throw new InvalidPathError(relativePath);
  }

  return {
    rootPath: canonicalRoot,
    absolutePath: canonicalCandidate,
    entryPath,
    relativePath: identity
  };
}

export class StoragePathResolver {
  public readonly rootPath: string;
  private readonly caseSensitive: boolean;

  public constructor(rootPath: string, options: PathResolverOptions = {}) {
    this.rootPath = rootPath;
    this.caseSensitive = options.caseSensitive ?? defaultCaseSensitivity();
  }

  public resolve(relativePath: string): Promise<ResolvedStoragePath> {
    return resolveStoragePath(this.rootPath, relativePath, { caseSensitive: this.caseSensitive });
  }
}

/**
 * realpath() for locations that may not exist yet: the deepest existing
 * ancestor is canonicalized and the missing tail appended. Dangling links are
 * followed to their target so a later write cannot land outside the root.
 */
async function canonicalize(target: string): Promise<string> {
  const tail: string[] = [];
  let current = target;
  let hops = 0;

  for (;;) {
    try {
      const resolved = await realpath(current);
      return tail.length > 0 ? path.join(resolved, ...tail) : resolved;
    } catch (error) {
      if (!isMissingEntry(error)) {
        throw error;
      }
    }

    const link = await readDanglingLink(current);
    if (link !== undefined) {
      hops += 1;
      if (hops > MAX_LINK_HOPS) {
        throw new Error(`too many symbolic links at ${current}`);
      }
      current = path.resolve(path.dirname(current), link);
      continue;
    }

    const parent = path.dirname(current);
    if (parent === current) {
      throw new Error(`no existing ancestor for ${target}`);
    }
    tail.unshift(path.basename(current));
    current = parent;
  }
}

async function readDanglingLink(location: string): Promise<string | undefined> {
  try {
    const stats = await lstat(location);
    return stats.isSymbolicLink() ? await readlink(location) : undefined;
  } catch (error) {
    if (isMissingEntry(error)) {
      return undefined;
    }
    throw error;
  }
}

function toRelativeIdentity(absolutePath: string, rootPath: string): string {
  const remainder = absolutePath.slice(rootPath.length);
  return splitSegments(fromNativeSeparators(remainder, path.sep)).join(RELATIVE_PATH_SEPARATOR);
}

export function isMissingEntry(error: unknown): boolean {
  if (!(error instanceof Error) || !("code" in error)) {
    return false;
  }
  return error.code === "ENOENT" || error.code === "ENOTDIR";
}
