export const RELATIVE_PATH_SEPARATOR = "/";

/**
 * Rewrites a `/`-separated caller path with the host separator.
 * Empty input stays empty and denotes the storage root.
 */
export function toNativeSeparators(relativePath: string, nativeSeparator: string): string {
  if (!relativePath || nativeSeparator === RELATIVE_PATH_SEPARATOR) {
    return relativePath;
  }
  return relativePath.split(RELATIVE_PATH_SEPARATOR).join(nativeSeparator);
}

export function fromNativeSeparators(nativePath: string, nativeSeparator: string): string {
  if (nativeSeparator === RELATIVE_PATH_SEPARATOR) {
    return nativePath;
  }
  return nativePath.split(nativeSeparator).join(RELATIVE_PATH_SEPARATOR);
}

export function splitSegments(relativePath: string): string[] {
  return relativePath.split(RELATIVE_PATH_SEPARATOR).filter((segment) => segment.length > 0);
}

export function entryName(relativePath: string): string {
  const segments = splitSegments(relativePath);
  return segments[segments.length - 1] ?? "";
}

/**
 * Extension of the last segment including its dot, or "" when there is none.
 * A leading-dot name such as `.env` is all extension; a trailing dot has none.
 */
export function fileExtension(relativePath: string): string {
  const name = entryName(relativePath);
  const dot = name.lastIndexOf(".");
  if (dot < 0 || dot === name.length - 1) {
    return "";
  }
  return name.slice(dot);
}

/**
 * Parent of a relative path, "" for a top-level entry and undefined for the root.
 */
export function parentPath(relativePath: string): string | undefined {
  const segments = splitSegments(relativePath);
  if (segments.length === 0) {
    return undefined;
  }
  return segments.slice(0, -1).join(RELATIVE_PATH_SEPARATOR);
}

export function childPath(relativePath: string, name: string): string {
  const base = splitSegments(relativePath).join(RELATIVE_PATH_SEPARATOR);
  return base ? `${base}${RELATIVE_PATH_SEPARATOR}${name}` : name;
}

export function isRootPath(relativePath: string): boolean {
  return splitSegments(relativePath).length === 0;
}
