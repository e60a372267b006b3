export type StorageErrorCode =
  | "INVALID_PATH"
  | "NOT_FOUND"
  | "ALREADY_EXISTS"
  | "INVALID_OPERATION"
  | "NO_PARENT";

export type StorageEntryKind = "file" | "folder";

export abstract class StorageError extends Error {
  public abstract readonly code: StorageErrorCode;

  public constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

export class InvalidPathError extends StorageError {
  public readonly code = "INVALID_PATH";
  public readonly path: string;

  public constructor(path: string, reason = "resolves outside the storage root") {
    super(`Invalid path "${path}": ${reason}.`);
    this.path = path;
  }
}

export class EntryNotFoundError extends StorageError {
  public readonly code = "NOT_FOUND";
  public readonly path: string;
  public readonly kind: StorageEntryKind;

  public constructor(kind: StorageEntryKind, path: string) {
    super(`${capitalize(kind)} "${path}" does not exist.`);
    this.kind = kind;
    this.path = path;
  }
}

export class EntryAlreadyExistsError extends StorageError {
  public readonly code = "ALREADY_EXISTS";
  public readonly path: string;
  public readonly kind: StorageEntryKind;

  public constructor(kind: StorageEntryKind, path: string) {
    super(`${capitalize(kind)} "${path}" already exists.`);
    this.kind = kind;
    this.path = path;
  }
}

export class InvalidOperationError extends StorageError {
  public readonly code = "INVALID_OPERATION";
  public readonly operation: string;
  public readonly path: string;

  public constructor(operation: string, path: string, cause: unknown) {
    super(`Storage operation "${operation}" failed for "${path}": ${describeCause(cause)}`, { cause });
    this.operation = operation;
    this.path = path;
  }
}

export class NoParentError extends StorageError {
  public readonly code = "NO_PARENT";
  public readonly path: string;

  public constructor(path: string) {
    super(`Folder "${path}" is the storage root and has no parent folder.`);
    this.path = path;
  }
}

export function isStorageError(error: unknown): error is StorageError {
  return error instanceof StorageError;
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  return String(cause);
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}
