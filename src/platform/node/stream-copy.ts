import type { FileHandle } from "node:fs/promises";
import type { StorageInput } from "../../core/ports/storage-provider.port.js";

export const COPY_BUFFER_SIZE = 8192;

/**
 * Drains `input` into `handle` through one reusable buffer and returns the
 * number of bytes written. The input is iterated by hand so a failed write
 * leaves it open for its owner.
 */
export async function copyToFileHandle(
  input: StorageInput,
  handle: FileHandle,
  bufferSize: number = COPY_BUFFER_SIZE
): Promise<number> {
  const buffer = Buffer.allocUnsafe(bufferSize);
  const iterator = input[Symbol.asyncIterator]();
  let filled = 0;
  let total = 0;

  for (;;) {
    const next = await iterator.next();
    if (next.done) {
      break;
    }

    const chunk = typeof next.value === "string" ? Buffer.from(next.value, "utf8") : next.value;
    let offset = 0;
    while (offset < chunk.byteLength) {
      const length = Math.min(bufferSize - filled, chunk.byteLength - offset);
      buffer.set(chunk.subarray(offset, offset + length), filled);
      filled += length;
      offset += length;

      if (filled === bufferSize) {
        await writeFully(handle, buffer, filled);
        total += filled;
        filled = 0;
      }
    }
  }

  if (filled > 0) {
    await writeFully(handle, buffer, filled);
    total += filled;
  }

  return total;
}

async function writeFully(handle: FileHandle, buffer: Buffer, length: number): Promise<void> {
  let written = 0;
  while (written < length) {
    const result = await handle.write(buffer, written, length - written);
    written += result.bytesWritten;
  }
}
