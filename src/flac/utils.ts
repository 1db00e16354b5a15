import { closeSync, openSync, readSync } from "node:fs";
import { io } from "../errors.ts";

export const FLAC_MARKER = 0x664C6143;

/**
 * Reads up to `len` bytes from the current position of `fd`. The result is
 * shorter than `len` only when the file ends first.
 */
export function readFileChunks(fd: number, len: number, path: string) {
  const blockData = new Uint8Array(len);
  let bytesRead = 0;
  while (bytesRead < len) {
    const n = io(
      "read",
      path,
      () => readSync(fd, blockData, bytesRead, len - bytesRead, null),
    );
    if (n === 0) break;
    bytesRead += n;
  }
  return blockData.subarray(0, bytesRead);
}

/** Opens `path` read-only and closes it once `fn` returns or throws. */
export function withFile<T>(path: string, fn: (fd: number) => T): T {
  const fd = io("open", path, () => openSync(path, "r"));
  try {
    return fn(fd);
  } finally {
    closeSync(fd);
  }
}

export function isFlacMarker(buf: Uint8Array) {
  return buf.length >= 4 &&
    new DataView(buf.buffer, buf.byteOffset, 4).getUint32(0) === FLAC_MARKER;
}
