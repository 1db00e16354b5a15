import { FormatError } from "../errors.ts";
import type { AudioQuality } from "../types.ts";
import { BlockType, STREAMINFO_SIZE } from "./blocks.ts";
import { isFlacMarker, readFileChunks, withFile } from "./utils.ts";

/**
 * Reads bit depth and sample rate straight from the STREAMINFO block,
 * which the format requires to be the first block after `fLaC`.
 */
export function getAudioQuality(filePath: string): AudioQuality {
  return withFile(filePath, (fd) => {
    const marker = readFileChunks(fd, 4, filePath);
    if (!isFlacMarker(marker)) {
      throw new FormatError(`${filePath} is not a FLAC file`);
    }

    // bit 7: last block, bits 0-6: type, bytes 1-3: length
    const header = readFileChunks(fd, 4, filePath);
    if (header.length < 4) {
      throw new FormatError("File ends inside the first block header");
    }
    if ((header[0] & 0x7F) !== BlockType.STREAMINFO) {
      throw new FormatError("First metadata block is not STREAMINFO");
    }

    const info = readFileChunks(fd, STREAMINFO_SIZE, filePath);
    if (info.length < STREAMINFO_SIZE) {
      throw new FormatError("File ends inside STREAMINFO");
    }
    return decodeAudioQuality(info);
  });
}

export function decodeAudioQuality(info: Uint8Array): AudioQuality {
  if (info.length < STREAMINFO_SIZE) {
    throw new FormatError(
      `STREAMINFO must be ${STREAMINFO_SIZE} bytes, got ${info.length}`,
    );
  }
  // [SSSSSSSS] [SSSSSSSS] [SSSSCCCB] [BBBBTTTT]
  const sampleRate = (info[10] << 12) | (info[11] << 4) | (info[12] >> 4);
  const bitDepth = (((info[12] & 0x01) << 4) | (info[13] >> 4)) + 1;
  return { bitDepth, sampleRate };
}
