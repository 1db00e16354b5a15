import { readFileSync, writeFileSync } from "node:fs";
import { DecodeError, FormatError, io } from "../errors.ts";
import {
  type Block,
  BlockType,
  MetadataBlock,
  Picture,
  RawBlock,
  StreamInfo,
  VorbisComment,
} from "./blocks.ts";
import { FLAC_MARKER, isFlacMarker } from "./utils.ts";

export interface Found {
  block: Block;
  index: number;
}

// A picture we cannot decode is still kept, byte for byte.
function loadPicture(data: Uint8Array): Picture | RawBlock {
  try {
    return Picture.load(data);
  } catch (e) {
    if (e instanceof DecodeError) return RawBlock.load(BlockType.PICTURE, data);
    throw e;
  }
}

/**
 * A parsed FLAC container: the ordered metadata blocks plus the audio frames
 * that follow them. Frames are carried as an opaque blob.
 */
export class FLAC {
  private constructor(
    public metadata: Block[],
    readonly info: StreamInfo,
    readonly frames: Uint8Array,
  ) {}

  static parse(filePath: string): FLAC {
    const data = io("read", filePath, () => readFileSync(filePath));
    return FLAC.fromBytes(new Uint8Array(data));
  }

  // https://xiph.org/flac/format.html
  static fromBytes(data: Uint8Array): FLAC {
    if (!isFlacMarker(data)) throw new FormatError("File is not a FLAC file.");

    const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
    const blocks: Block[] = [];
    let info: StreamInfo | undefined;
    let isLast = false;
    let offset = 4;

    while (!isLast) {
      if (offset + 4 > data.length) {
        throw new FormatError("File ends before the last metadata block.");
      }
      const header = view.getUint32(offset);
      isLast = !!(header >>> 31);

      const blockType = (header >>> 24) & 0x7F;
      const blockLen = header & 0xffffff;
      offset += 4;
      if (offset + blockLen > data.length) {
        throw new FormatError(
          `Block of type ${blockType} declares ${blockLen} bytes, ` +
            `only ${data.length - offset} remain.`,
        );
      }
      const blockData = data.subarray(offset, offset + blockLen);
      offset += blockLen;

      if (blocks.length === 0 && blockType !== BlockType.STREAMINFO) {
        throw new FormatError("First metadata block is not STREAMINFO.");
      }

      let block: Block;

      switch (blockType) {
        case BlockType.STREAMINFO: {
          if (info) {
            throw new FormatError(
              "FLAC file may have only one StreamInfo block.",
            );
          }
          info = StreamInfo.load(blockData);
          block = info;
          break;
        }
        case BlockType.VORBIS_COMMENT: {
          block = VorbisComment.load(blockData);
          break;
        }
        case BlockType.PICTURE: {
          block = loadPicture(blockData);
          break;
        }
        default: {
          block = RawBlock.load(blockType, blockData);
        }
      }
      blocks.push(block);
    }

    if (!info) throw new FormatError("FLAC file has no StreamInfo block.");

    return new FLAC(blocks, info, data.slice(offset));
  }

  findFirst(type: number): Found | undefined {
    const index = this.metadata.findIndex((block) => block.TYPE === type);
    return index === -1 ? undefined : { block: this.metadata[index], index };
  }

  /** Puts `block` where the first block of its type is, or at the end. */
  replaceOrAppend(block: Block) {
    const found = this.findFirst(block.TYPE);
    if (found) {
      this.metadata[found.index] = block;
    } else {
      this.metadata.push(block);
    }
  }

  removeAll(type: number): number {
    let removed = 0;
    for (let i = this.metadata.length - 1; i >= 0; i--) {
      if (this.metadata[i].TYPE === type) {
        this.metadata.splice(i, 1);
        removed++;
      }
    }
    return removed;
  }

  toBytes(): Uint8Array {
    if (this.metadata[0]?.TYPE !== BlockType.STREAMINFO) {
      throw new FormatError("STREAMINFO must be the first metadata block.");
    }

    const blocks: [number, Uint8Array][] = [];
    let blocksLen = 0;
    for (const block of this.metadata) {
      const blockData = block.write();
      if (blockData.length > MetadataBlock.MAX_SIZE) {
        throw new FormatError(
          `Block of type ${block.TYPE} is too large (${blockData.length} bytes).`,
        );
      }
      blocksLen += blockData.length + 4;
      blocks.push([block.TYPE, blockData]);
    }

    const out = new Uint8Array(4 + blocksLen + this.frames.length);
    const view = new DataView(out.buffer);
    view.setUint32(0, FLAC_MARKER);
    let offset = 4;

    for (const [i, [type, block]] of blocks.entries()) {
      const isLast = i === blocks.length - 1;
      let blockType = type;
      if (isLast) {
        blockType |= 0x80;
      }
      view.setUint32(offset, ((blockType << 24) | block.length) >>> 0);
      out.set(block, offset + 4);
      offset += 4 + block.length;
    }

    out.set(this.frames, offset);
    return out;
  }

  save(filePath: string) {
    const bytes = this.toBytes();
    io("write", filePath, () => writeFileSync(filePath, bytes));
  }
}
