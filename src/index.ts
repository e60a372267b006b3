export type { StorageInput, StorageProvider } from "./core/ports/storage-provider.port.js";
export type { StorageEntry, StorageFile, StorageFolder } from "./core/storage/domain/storage-entry.js";
export {
  EntryAlreadyExistsError,
  EntryNotFoundError,
  InvalidOperationError,
  InvalidPathError,
  NoParentError,
  StorageError,
  isStorageError,
  type StorageEntryKind,
  type StorageErrorCode
} from "./core/storage/errors.js";
export { attempt } from "./core/storage/application/attempt.js";
export * from "./core/logging/index.js";
export { NodeStorageProvider, type NodeStorageProviderOptions } from "./platform/node/node-storage-provider.js";
export { NodeStorageFile } from "./platform/node/node-storage-file.js";
export { NodeStorageFolder } from "./platform/node/node-storage-folder.js";
export {
  StoragePathResolver,
  defaultCaseSensitivity,
  isWithinRoot,
  resolveStoragePath,
  type PathResolverOptions,
  type ResolvedStoragePath
} from "./platform/node/path-resolver.js";
export { COPY_BUFFER_SIZE, copyToFileHandle } from "./platform/node/stream-copy.js";
export { createNodeLogger, type NodeLogFormat, type NodeLoggerConfig } from "./platform/node/node-logger.js";
export { loadDotEnv, parseDotEnv } from "./platform/node/dotenv.js";
export {
  StorageConfigError,
  createNodeStorageProvider,
  resolveStorageConfig,
  type StorageConfig
} from "./platform/node/storage-config.js";
