import type { StorageFile, StorageFolder } from "../storage/domain/storage-entry.js";

/**
 * Byte source accepted by save operations. Node readables qualify; the
 * provider never closes or destroys it.
 */
export type StorageInput = AsyncIterable<Uint8Array | string>;

export interface StorageProvider {
  defaultSharedAccessExpiration: Date | undefined;

  getFile(path: string): Promise<StorageFile>;
  listFiles(path: string): Promise<StorageFile[]>;
  /** Creates the folder first when it is missing. */
  listFolders(path: string): Promise<StorageFolder[]>;
  tryCreateFolder(path: string): Promise<boolean>;
  createFolder(path: string): Promise<void>;
  deleteFolder(path: string): Promise<void>;
  renameFolder(oldPath: string, newPath: string): Promise<void>;
  deleteFile(path: string): Promise<void>;
  renameFile(oldPath: string, newPath: string): Promise<void>;
  createFile(path: string): Promise<StorageFile>;
  trySaveStream(path: string, input: StorageInput): Promise<boolean>;
  saveStream(path: string, input: StorageInput): Promise<void>;
  fileExists(path: string): Promise<boolean>;
  createOrReplaceFile(path: string): Promise<StorageFile>;
}
