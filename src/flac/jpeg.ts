import { FormatError } from "../errors.ts";

export interface JpegInfo {
  width: number;
  height: number;
  /** Bits per pixel: sample precision times component count. */
  depth: number;
}

const SOI = 0xd8;
const EOI = 0xd9;
const SOS = 0xda;

// SOF0-SOF15 minus DHT, JPG and DAC, which share the range
const isStartOfFrame = (marker: number) =>
  marker >= 0xc0 && marker <= 0xcf &&
  marker !== 0xc4 && marker !== 0xc8 && marker !== 0xcc;

const readU16BE = (data: Uint8Array, pos: number) =>
  (data[pos] << 8) | data[pos + 1];

/**
 * Reads the frame header of a JPEG image without decoding it.
 */
export function probeJpeg(data: Uint8Array): JpegInfo {
  if (data.length < 4 || data[0] !== 0xff || data[1] !== SOI) {
    throw new FormatError("Cover data is not a JPEG image");
  }

  let pos = 2;
  while (pos < data.length) {
    if (data[pos] !== 0xff) {
      pos++;
      continue;
    }
    while (data[pos] === 0xff) pos++;
    if (pos >= data.length) break;
    const marker = data[pos++];

    if (marker === EOI || marker === SOS) break;
    // standalone markers carry no length
    if (marker === 0x01 || (marker >= 0xd0 && marker <= SOI)) continue;
    if (pos + 2 > data.length) break;

    const length = readU16BE(data, pos);
    if (isStartOfFrame(marker)) {
      if (pos + 8 > data.length) break;
      const precision = data[pos + 2];
      const height = readU16BE(data, pos + 3);
      const width = readU16BE(data, pos + 5);
      const components = data[pos + 7];
      return { width, height, depth: precision * components };
    }
    pos += length;
  }

  throw new FormatError("JPEG image has no frame header");
}
