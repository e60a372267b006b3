import { mkdir, open, readdir, rename, rm, stat, unlink, writeFile } from "node:fs/promises";
import nodePath from "node:path";
import { createNoopLogger, type Logger } from "../../core/logging/index.js";
import type { StorageInput, StorageProvider } from "../../core/ports/storage-provider.port.js";
import { attempt } from "../../core/storage/application/attempt.js";
import { childPath } from "../../core/storage/domain/relative-path.js";
import type { StorageFile, StorageFolder } from "../../core/storage/domain/storage-entry.js";
import {
  EntryAlreadyExistsError,
  EntryNotFoundError,
  InvalidOperationError,
  InvalidPathError,
  StorageError,
  type StorageEntryKind
} from "../../core/storage/errors.js";
import { NodeStorageFile } from "./node-storage-file.js";
import { NodeStorageFolder } from "./node-storage-folder.js";
import { StoragePathResolver, isMissingEntry, type ResolvedStoragePath } from "./path-resolver.js";
import { copyToFileHandle } from "./stream-copy.js";

export interface NodeStorageProviderOptions {
  /** Absolute path of an existing directory. */
  rootPath: string;
  caseSensitive?: boolean;
  logger?: Logger;
}

export class NodeStorageProvider implements StorageProvider {
  /** Kept for providers that sign time-limited URLs; unused on disk. */
  public defaultSharedAccessExpiration: Date | undefined;
  public readonly rootPath: string;
  private readonly resolver: StoragePathResolver;
  private readonly logger: Logger;

  public constructor(options: NodeStorageProviderOptions) {
    this.rootPath = options.rootPath;
    this.resolver = new StoragePathResolver(options.rootPath, { caseSensitive: options.caseSensitive });
    this.logger = (options.logger ?? createNoopLogger()).child({ scope: "storage" });
  }

  public async getFile(path: string): Promise<StorageFile> {
    const target = await this.resolve("getFile", path);
    if ((await this.probe("getFile", target)) !== "file") {
      throw new EntryNotFoundError("file", path);
    }
    return new NodeStorageFile(target);
  }

  public async listFiles(path: string): Promise<StorageFile[]> {
    const target = await this.resolve("listFiles", path);
    if ((await this.probe("listFiles", target)) !== "folder") {
      return [];
    }

    const names = await this.readChildren("listFiles", target, "file");
    return names.map((name) => new NodeStorageFile(childLocation(target, name)));
  }

  public async listFolders(path: string): Promise<StorageFolder[]> {
    const target = await this.resolve("listFolders", path);
    if ((await this.probe("listFolders", target)) === undefined) {
      this.logger.debug("listing a missing folder; creating it", { path: target.relativePath });
      await this.run("listFolders", path, () => mkdir(target.absolutePath, { recursive: true }));
    }

    const names = await this.readChildren("listFolders", target, "folder");
    return names.map((name) => new NodeStorageFolder(childLocation(target, name)));
  }

  public tryCreateFolder(path: string): Promise<boolean> {
    return attempt("tryCreateFolder", path, () => this.createFolder(path), this.logger);
  }

  public async createFolder(path: string): Promise<void> {
    const target = await this.resolve("createFolder", path);
    if ((await this.probe("createFolder", target)) === "folder") {
      throw new EntryAlreadyExistsError("folder", path);
    }
    await this.run("createFolder", path, () => mkdir(target.absolutePath, { recursive: true }));
  }

  public async deleteFolder(path: string): Promise<void> {
    const target = await this.resolve("deleteFolder", path);
    if ((await this.probe("deleteFolder", target)) !== "folder") {
      throw new EntryNotFoundError("folder", path);
    }
    this.assertNotRoot("deleteFolder", target);
    await this.run("deleteFolder", path, () => rm(target.entryPath, { recursive: true }));
  }

  public async renameFolder(oldPath: string, newPath: string): Promise<void> {
    await this.move("renameFolder", "folder", oldPath, newPath);
  }

  public async deleteFile(path: string): Promise<void> {
    const target = await this.resolve("deleteFile", path);
    if ((await this.probe("deleteFile", target)) !== "file") {
      throw new EntryNotFoundError("file", path);
    }
    await this.run("deleteFile", path, () => unlink(target.entryPath));
  }

  public async renameFile(oldPath: string, newPath: string): Promise<void> {
    await this.move("renameFile", "file", oldPath, newPath);
  }

  public async createFile(path: string): Promise<StorageFile> {
    const target = await this.resolve("createFile", path);
    if ((await this.probe("createFile", target)) === "file") {
      throw new EntryAlreadyExistsError("file", path);
    }

    await this.run("createFile", path, async () => {
      await mkdir(parentDirectory(target), { recursive: true });
      await writeFile(target.absolutePath, new Uint8Array(0), { flag: "wx" });
    });
    return new NodeStorageFile(target);
  }

  public trySaveStream(path: string, input: StorageInput): Promise<boolean> {
    return attempt("trySaveStream", path, () => this.saveStream(path, input), this.logger);
  }

  public async saveStream(path: string, input: StorageInput): Promise<void> {
    await this.createFile(path);
    const target = await this.resolve("saveStream", path);

    const bytes = await this.run("saveStream", path, async () => {
      const handle = await open(target.absolutePath, "r+");
      try {
        return await copyToFileHandle(input, handle);
      } finally {
        await handle.close();
      }
    });
    this.logger.debug("stream saved", { path: target.relativePath, bytes });
  }

  public fileExists(path: string): Promise<boolean> {
    return attempt("fileExists", path, () => this.getFile(path), this.logger);
  }

  public async createOrReplaceFile(path: string): Promise<StorageFile> {
    if (await this.fileExists(path)) {
      await this.deleteFile(path);
    }
    return this.createFile(path);
  }

  private async move(
    operation: string,
    kind: StorageEntryKind,
    oldPath: string,
    newPath: string
  ): Promise<void> {
    const source = await this.resolve(operation, oldPath);
    const destination = await this.resolve(operation, newPath);

    if ((await this.probe(operation, source)) !== kind) {
      throw new EntryNotFoundError(kind, oldPath);
    }
    const existing = await this.probe(operation, destination);
    if (existing !== undefined) {
      throw new EntryAlreadyExistsError(existing, newPath);
    }
    if (kind === "folder") {
      this.assertNotRoot(operation, source);
    }

    await this.run(operation, oldPath, async () => {
      await mkdir(nodePath.dirname(destination.entryPath), { recursive: true });
      await rename(source.entryPath, destination.entryPath);
    });
  }

  private async resolve(operation: string, path: string): Promise<ResolvedStoragePath> {
    this.logger.debug("resolving storage path", { operation, path });
    try {
      return await this.resolver.resolve(path);
    } catch (error) {
      if (error instanceof InvalidPathError) {
        this.logger.warn("rejected storage path", { operation, path, reason: error.message });
      }
      throw error;
    }
  }

  private async probe(operation: string, target: ResolvedStoragePath): Promise<StorageEntryKind | undefined> {
    try {
      const stats = await stat(target.absolutePath);
      if (stats.isFile()) {
        return "file";
      }
      return stats.isDirectory() ? "folder" : undefined;
    } catch (error) {
      if (isMissingEntry(error)) {
        return undefined;
      }
      throw new InvalidOperationError(operation, target.relativePath, error);
    }
  }

  private async readChildren(
    operation: string,
    target: ResolvedStoragePath,
    kind: StorageEntryKind
  ): Promise<string[]> {
    const entries = await this.run(operation, target.relativePath, () =>
      readdir(target.absolutePath, { withFileTypes: true })
    );

    return entries
      .filter((entry) => (kind === "file" ? entry.isFile() : entry.isDirectory()))
      .map((entry) => entry.name)
      .sort(compareNames);
  }

  private assertNotRoot(operation: string, target: ResolvedStoragePath): void {
    if (target.relativePath === "") {
      throw new InvalidOperationError(
        operation,
        target.relativePath,
        new Error("the storage root cannot be moved or deleted")
      );
    }
  }

  private async run<T>(operation: string, path: string, action: () => Promise<T>): Promise<T> {
    try {
      return await action();
    } catch (error) {
      if (error instanceof StorageError) {
        throw error;
      }
      throw new InvalidOperationError(operation, path, error);
    }
  }
}

function childLocation(parent: ResolvedStoragePath, name: string): ResolvedStoragePath {
  const location = nodePath.join(parent.absolutePath, name);
  return {
    rootPath: parent.rootPath,
    relativePath: childPath(parent.relativePath, name),
    absolutePath: location,
    entryPath: location
  };
}

function parentDirectory(target: ResolvedStoragePath): string {
  return nodePath.dirname(target.absolutePath);
}

function compareNames(left: string, right: string): number {
  if (left === right) {
    return 0;
  }
  return left < right ? -1 : 1;
}
