import { createReadStream, createWriteStream } from "node:fs";
import { stat } from "node:fs/promises";
import type { Readable, Writable } from "node:stream";
import { entryName, fileExtension } from "../../core/storage/domain/relative-path.js";
import type { StorageFile } from "../../core/storage/domain/storage-entry.js";
import type { ResolvedStoragePath } from "./path-resolver.js";

export class NodeStorageFile implements StorageFile {
  public readonly path: string;
  public readonly name: string;
  private readonly absolutePath: string;

  public constructor(location: ResolvedStoragePath) {
    this.path = location.relativePath;
    this.name = entryName(location.relativePath);
    this.absolutePath = location.absolutePath;
  }

  public async getSize(): Promise<number> {
    const stats = await stat(this.absolutePath);
    return stats.size;
  }

  public async getLastUpdated(): Promise<Date> {
    const stats = await stat(this.absolutePath);
    return stats.mtime;
  }

  public getFileType(): string {
    return fileExtension(this.path);
  }

  public openRead(): Readable {
    return createReadStream(this.absolutePath);
  }

  public openWrite(): Writable {
    return createWriteStream(this.absolutePath, { flags: "r+" });
  }

  public createFile(): Writable {
    return createWriteStream(this.absolutePath, { flags: "w" });
  }
}
