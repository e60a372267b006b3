import type { Readable, Writable } from "node:stream";

export interface StorageEntry {
  /** Relative path inside the provider, `/`-separated. */
  readonly path: string;
  readonly name: string;

  getSize(): Promise<number>;
  getLastUpdated(): Promise<Date>;
}

export interface StorageFile extends StorageEntry {
  /** Extension including the dot, "" when the name has none. */
  getFileType(): string;
  openRead(): Readable;
  openWrite(): Writable;
  /** Truncates the file and returns a stream over the emptied content. */
  createFile(): Writable;
}

export interface StorageFolder extends StorageEntry {
  getParent(): StorageFolder;
}
