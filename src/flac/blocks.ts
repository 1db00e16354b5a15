import { DecodeError, FormatError } from "../errors.ts";

export enum BlockType {
  STREAMINFO,
  PADDING,
  APPLICATION,
  SEEKTABLE,
  VORBIS_COMMENT,
  CUESHEET,
  PICTURE,
}

export enum PictureType {
  FRONT_COVER = 3,
}

export abstract class MetadataBlock {
  static readonly MAX_SIZE = 16777215 as const;
  abstract readonly TYPE: number;

  abstract write(): Uint8Array;
}

export const STREAMINFO_SIZE = 34;

// Keeps a leading U+FEFF and rejects invalid bytes so text re-encodes exactly.
const utf8 = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

function decodeText(bytes: Uint8Array, what: string): string {
  try {
    return utf8.decode(bytes);
  } catch (e) {
    if (!(e instanceof TypeError)) throw e;
    throw new DecodeError(`${what} is not valid UTF-8`, e);
  }
}

interface StreamInfoI {
  minBlockSize: number;
  maxBlockSize: number;
  minFrameSize: number;
  maxFrameSize: number;
  sampleRate: number;
  nbChannels: number;
  bitsPerSample: number;
  totalSamples: bigint;
  md5: Uint8Array;
}

export class StreamInfo extends MetadataBlock implements StreamInfoI {
  readonly TYPE = BlockType.STREAMINFO;
  minBlockSize: number;
  maxBlockSize: number;
  minFrameSize: number;
  maxFrameSize: number;
  sampleRate: number;
  nbChannels: number;
  bitsPerSample: number;
  totalSamples: bigint;
  md5: Uint8Array;

  constructor(data: StreamInfoI) {
    super();
    this.minBlockSize = data.minBlockSize;
    this.maxBlockSize = data.maxBlockSize;
    this.minFrameSize = data.minFrameSize;
    this.maxFrameSize = data.maxFrameSize;
    this.sampleRate = data.sampleRate;
    this.nbChannels = data.nbChannels;
    this.bitsPerSample = data.bitsPerSample;
    this.totalSamples = data.totalSamples;
    this.md5 = data.md5;
  }

  static load(data: Uint8Array): StreamInfo {
    if (data.length !== STREAMINFO_SIZE) {
      throw new FormatError(
        `STREAMINFO must be ${STREAMINFO_SIZE} bytes, got ${data.length}`,
      );
    }
    const view = new DataView(data.buffer, data.byteOffset, data.byteLength);

    const minBlockSize = view.getUint16(0);
    const maxBlockSize = view.getUint16(2);
    const minFrameSize = (view.getUint16(4) << 8) + view.getUint8(6);
    const maxFrameSize = (view.getUint16(7) << 8) + view.getUint8(9);

    // 20 bits sample rate, 3 bits channels, 5 bits bps, 36 bits total samples
    const sampleChannelsBpsTotal = view.getBigUint64(10);

    const sampleRate = Number(sampleChannelsBpsTotal >> 44n);
    const nbChannels = Number((sampleChannelsBpsTotal >> 41n) & 7n) + 1;
    const bitsPerSample = Number((sampleChannelsBpsTotal >> 36n) & 31n) + 1;
    const totalSamples = sampleChannelsBpsTotal & 0xFFFFFFFFFn;
    const md5 = data.slice(18, 34);

    return new StreamInfo({
      minBlockSize,
      maxBlockSize,
      minFrameSize,
      maxFrameSize,
      sampleRate,
      nbChannels,
      bitsPerSample,
      totalSamples,
      md5,
    });
  }

  write() {
    const data = new Uint8Array(STREAMINFO_SIZE);
    const view = new DataView(data.buffer);

    view.setUint16(0, this.minBlockSize);
    view.setUint16(2, this.maxBlockSize);

    view.setUint16(4, this.minFrameSize >>> 8);
    view.setUint8(6, this.minFrameSize & 0xFF);

    view.setUint16(7, this.maxFrameSize >>> 8);
    view.setUint8(9, this.maxFrameSize & 0xFF);

    const sampleChannelsBpsTotal =
      ((BigInt(this.sampleRate) & 0xFFFFFn) << 44n) |
      ((BigInt(this.nbChannels - 1) & 0b111n) << 41n) |
      ((BigInt(this.bitsPerSample - 1) & 0b11111n) << 36n) |
      (this.totalSamples & 0xFFFFFFFFFn);

    view.setBigUint64(10, sampleChannelsBpsTotal);

    data.set(this.md5.subarray(0, 16), 18);

    return data;
  }
}

export class VorbisComment extends MetadataBlock {
  readonly TYPE = BlockType.VORBIS_COMMENT;

  constructor(public vendor: string, public comments: string[]) {
    super();
  }

  static load(data: Uint8Array): VorbisComment {
    // https://xiph.org/vorbis/doc/v-comment.html
    const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
    let offset = 0;

    const readLength = (what: string) => {
      if (offset + 4 > data.length) {
        throw new DecodeError(`Vorbis comment truncated before ${what} length`);
      }
      const len = view.getUint32(offset, true);
      offset += 4;
      return len;
    };
    const readText = (len: number, what: string) => {
      if (offset + len > data.length) {
        throw new DecodeError(
          `Vorbis comment ${what} of ${len} bytes overruns the block`,
        );
      }
      const text = decodeText(
        data.subarray(offset, offset + len),
        `Vorbis comment ${what}`,
      );
      offset += len;
      return text;
    };

    const vendor = readText(readLength("vendor"), "vendor");
    const userCommentLen = readLength("comment count");

    const comments: string[] = [];
    for (let i = 0; i < userCommentLen; i++) {
      comments.push(readText(readLength(`comment #${i}`), `comment #${i}`));
    }

    return new VorbisComment(vendor, comments);
  }

  write() {
    const encoder = new TextEncoder();
    const entries = this.comments.map((comment) => encoder.encode(comment));
    const entriesDataLen = entries.reduce((sum, e) => sum + e.length, 0);

    const vendorText = encoder.encode(this.vendor);

    const blockData = new Uint8Array(
      4 + vendorText.length + 4 + (entries.length * 4) + entriesDataLen,
    );
    const blockView = new DataView(blockData.buffer);

    blockView.setUint32(0, vendorText.length, true);
    blockData.set(vendorText, 4);

    let offset = 4 + vendorText.length;
    blockView.setUint32(offset, entries.length, true);

    offset += 4;
    for (const entryData of entries) {
      blockView.setUint32(offset, entryData.length, true);
      offset += 4;
      blockData.set(entryData, offset);
      offset += entryData.length;
    }

    return blockData;
  }
}

interface PictureI {
  pictureType: number;
  mime: string;
  description: string;
  width: number;
  height: number;
  depth: number;
  colors: number;
  data: Uint8Array;
}

export class Picture extends MetadataBlock implements PictureI {
  readonly TYPE = BlockType.PICTURE;
  pictureType: number;
  mime: string;
  description: string;
  width: number;
  height: number;
  depth: number;
  colors: number;
  data: Uint8Array;

  constructor(data: PictureI) {
    super();
    this.pictureType = data.pictureType;
    this.mime = data.mime;
    this.description = data.description;
    this.width = data.width;
    this.height = data.height;
    this.depth = data.depth;
    this.colors = data.colors;
    this.data = data.data;
  }

  static load(data: Uint8Array): Picture {
    const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
    let offset = 0;

    const u32 = () => {
      if (offset + 4 > data.length) {
        throw new DecodeError("Picture block truncated");
      }
      const value = view.getUint32(offset);
      offset += 4;
      return value;
    };
    const bytes = (len: number) => {
      if (offset + len > data.length) {
        throw new DecodeError("Picture field overruns the block");
      }
      const out = data.subarray(offset, offset + len);
      offset += len;
      return out;
    };

    const pictureType = u32();
    const mime = decodeText(bytes(u32()), "Picture MIME type");
    const description = decodeText(bytes(u32()), "Picture description");
    const width = u32();
    const height = u32();
    const depth = u32();
    const colors = u32();
    const picture = bytes(u32()).slice();

    if (offset !== data.length) {
      throw new DecodeError("Picture block has trailing bytes");
    }

    return new Picture({
      pictureType,
      mime,
      description,
      width,
      height,
      depth,
      colors,
      data: picture,
    });
  }

  write() {
    const encoder = new TextEncoder();
    const mime = encoder.encode(this.mime);
    const description = encoder.encode(this.description);
    const data = new Uint8Array(
      32 + mime.length + description.length + this.data.length,
    );
    const view = new DataView(data.buffer);

    let offset = 0;
    view.setUint32(offset, this.pictureType);
    offset += 4;
    view.setUint32(offset, mime.length);
    offset += 4;
    data.set(mime, offset);
    offset += mime.length;
    view.setUint32(offset, description.length);
    offset += 4;
    data.set(description, offset);
    offset += description.length;
    view.setUint32(offset, this.width);
    offset += 4;
    view.setUint32(offset, this.height);
    offset += 4;
    view.setUint32(offset, this.depth);
    offset += 4;
    view.setUint32(offset, this.colors);
    offset += 4;
    view.setUint32(offset, this.data.length);
    offset += 4;
    data.set(this.data, offset);
    return data;
  }
}

/**
 * Any block this library does not interpret. The payload is kept verbatim.
 */
export class RawBlock extends MetadataBlock {
  constructor(readonly TYPE: number, public rawData: Uint8Array) {
    super();
  }

  static load(type: number, data: Uint8Array): RawBlock {
    return new RawBlock(type, data.slice());
  }

  write() {
    return this.rawData;
  }
}

export type Block = StreamInfo | VorbisComment | Picture | RawBlock;
