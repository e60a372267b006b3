import { readdir, stat } from "node:fs/promises";
import path from "node:path";
import { entryName, parentPath, toNativeSeparators } from "../../core/storage/domain/relative-path.js";
import type { StorageFolder } from "../../core/storage/domain/storage-entry.js";
import { NoParentError } from "../../core/storage/errors.js";
import type { ResolvedStoragePath } from "./path-resolver.js";

export class NodeStorageFolder implements StorageFolder {
  public readonly path: string;
  public readonly name: string;
  private readonly location: ResolvedStoragePath;

  public constructor(location: ResolvedStoragePath) {
    this.location = location;
    this.path = location.relativePath;
    this.name = location.relativePath ? entryName(location.relativePath) : path.basename(location.rootPath);
  }

  public async getSize(): Promise<number> {
    return sumFileSizes(this.location.absolutePath);
  }

  public async getLastUpdated(): Promise<Date> {
    const stats = await stat(this.location.absolutePath);
    return stats.mtime;
  }

  public getParent(): StorageFolder {
    const parent = parentPath(this.location.relativePath);
    if (parent === undefined) {
      throw new NoParentError(this.location.relativePath);
    }

    const { rootPath } = this.location;
    const location = parent ? path.join(rootPath, toNativeSeparators(parent, path.sep)) : rootPath;
    return new NodeStorageFolder({ rootPath, relativePath: parent, absolutePath: location, entryPath: location });
  }
}

async function sumFileSizes(directory: string): Promise<number> {
  const entries = await readdir(directory, { withFileTypes: true });
  let total = 0;

  for (const entry of entries) {
    const entryPath = path.join(directory, entry.name);
    if (entry.isFile()) {
      const stats = await stat(entryPath);
      total += stats.size;
    } else if (entry.isDirectory()) {
      total += await sumFileSizes(entryPath);
    }
  }

  return total;
}
