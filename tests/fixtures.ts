import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

const textEncoder = new TextEncoder();

export interface RawTestBlock {
  type: number;
  data: Uint8Array;
}

/** Stand-in for encoded audio frames; starts with a frame sync code. */
export const FRAMES = new Uint8Array([
  0xff, 0xf8, 0x69, 0x18, 0x00, 0x00, 0xbf, 0x03, 0x58, 0xfd, 0x03, 0x12,
  0x8b, 0xaa, 0x9a,
]);

export const buildStreamInfo = (
  sampleRate = 44100,
  channels = 2,
  bitsPerSample = 16,
  totalSamples = 441000,
): Uint8Array => {
  const payload = new Uint8Array(34);
  const view = new DataView(payload.buffer);
  view.setUint16(0, 4096);
  view.setUint16(2, 4096);
  view.setUint8(4, 0x00);
  view.setUint16(5, 0x0e12);
  view.setUint8(7, 0x01);
  view.setUint16(8, 0x2345);
  const hi = ((sampleRate & 0xfffff) << 12) |
    (((channels - 1) & 0x7) << 9) |
    (((bitsPerSample - 1) & 0x1f) << 4) |
    (Math.floor(totalSamples / 0x100000000) & 0x0f);
  view.setUint32(10, hi >>> 0);
  view.setUint32(14, totalSamples >>> 0);
  for (let i = 0; i < 16; i++) payload[18 + i] = 0xa0 + i;
  return payload;
};

export const buildVorbisComment = (
  vendor: string,
  comments: string[],
): Uint8Array => {
  const parts: number[] = [];
  const pushUint32 = (value: number) => {
    parts.push(
      value & 0xff,
      (value >> 8) & 0xff,
      (value >> 16) & 0xff,
      (value >> 24) & 0xff,
    );
  };
  const vendorBytes = textEncoder.encode(vendor);
  pushUint32(vendorBytes.length);
  parts.push(...vendorBytes);
  pushUint32(comments.length);
  for (const comment of comments) {
    const bytes = textEncoder.encode(comment);
    pushUint32(bytes.length);
    parts.push(...bytes);
  }
  return new Uint8Array(parts);
};

export const buildPicture = (
  image: Uint8Array,
  description: string | Uint8Array = "old cover",
  mime = "image/png",
): Uint8Array => {
  const mimeBytes = textEncoder.encode(mime);
  const descBytes = typeof description === "string"
    ? textEncoder.encode(description)
    : description;
  const out = new Uint8Array(32 + mimeBytes.length + descBytes.length + image.length);
  const view = new DataView(out.buffer);
  let offset = 0;
  view.setUint32(offset, 3);
  offset += 4;
  view.setUint32(offset, mimeBytes.length);
  offset += 4;
  out.set(mimeBytes, offset);
  offset += mimeBytes.length;
  view.setUint32(offset, descBytes.length);
  offset += 4;
  out.set(descBytes, offset);
  offset += descBytes.length;
  for (const value of [1, 1, 24, 0, image.length]) {
    view.setUint32(offset, value);
    offset += 4;
  }
  out.set(image, offset);
  return out;
};

export const streamInfoBlock = (payload = buildStreamInfo()): RawTestBlock => ({
  type: 0,
  data: payload,
});

export const paddingBlock = (size = 16): RawTestBlock => ({
  type: 1,
  data: new Uint8Array(size),
});

export const applicationBlock = (): RawTestBlock => ({
  type: 2,
  data: new Uint8Array([0x74, 0x65, 0x73, 0x74, 1, 2, 3, 4, 5]),
});

export const seekTableBlock = (): RawTestBlock => {
  const data = new Uint8Array(18);
  const view = new DataView(data.buffer);
  view.setBigUint64(0, 0n);
  view.setBigUint64(8, 0n);
  view.setUint16(16, 4096);
  return { type: 3, data };
};

export const vorbisBlock = (
  comments: string[],
  vendor = "reference libFLAC 1.4.3 20230623",
): RawTestBlock => ({ type: 4, data: buildVorbisComment(vendor, comments) });

export const pictureBlock = (
  image: Uint8Array,
  description?: string | Uint8Array,
): RawTestBlock => ({
  type: 6,
  data: buildPicture(image, description),
});

/**
 * Lays out `fLaC`, the blocks with correct headers (last flag on the final
 * one unless `lastFlag` is false) and the frame bytes.
 */
export function buildFlac(
  blocks: RawTestBlock[],
  frames: Uint8Array = FRAMES,
  lastFlag = true,
): Uint8Array {
  const size = 4 + blocks.reduce((sum, b) => sum + 4 + b.data.length, 0) +
    frames.length;
  const out = new Uint8Array(size);
  const view = new DataView(out.buffer);
  out.set([0x66, 0x4c, 0x61, 0x43]);
  let offset = 4;
  blocks.forEach((block, i) => {
    const isLast = lastFlag && i === blocks.length - 1;
    view.setUint32(
      offset,
      (((isLast ? 0x80 : 0) | block.type) << 24 | block.data.length) >>> 0,
    );
    out.set(block.data, offset + 4);
    offset += 4 + block.data.length;
  });
  out.set(frames, offset);
  return out;
}

/**
 * Smallest JPEG header the cover probe accepts: SOI, a JFIF APP0 segment,
 * a baseline frame header and a comment carrying `tag` so images differ.
 */
export function buildJpeg(
  width: number,
  height: number,
  tag = 0,
  components = 3,
): Uint8Array {
  const app0 = [
    0xff, 0xe0, 0x00, 0x10, 0x4a, 0x46, 0x49, 0x46, 0x00, 0x01, 0x01, 0x00,
    0x00, 0x01, 0x00, 0x01, 0x00, 0x00,
  ];
  const sofLength = 8 + components * 3;
  const sof = [
    0xff, 0xc0, sofLength >> 8, sofLength & 0xff, 0x08,
    height >> 8, height & 0xff, width >> 8, width & 0xff, components,
  ];
  for (let i = 0; i < components; i++) sof.push(i + 1, 0x11, 0x00);
  const comment = [0xff, 0xfe, 0x00, 0x03, tag & 0xff];
  return new Uint8Array([0xff, 0xd8, ...app0, ...sof, ...comment, 0xff, 0xd9]);
}

export interface TempDir {
  dir: string;
  write(name: string, data: Uint8Array): string;
  read(name: string): Uint8Array;
  cleanup(): void;
}

export function createTempDir(): TempDir {
  const dir = mkdtempSync(join(tmpdir(), "flacmeta-test-"));
  return {
    dir,
    write(name, data) {
      const path = join(dir, name);
      writeFileSync(path, data);
      return path;
    },
    read(name) {
      return new Uint8Array(readFileSync(join(dir, name)));
    },
    cleanup() {
      rmSync(dir, { recursive: true, force: true });
    },
  };
}
