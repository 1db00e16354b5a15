export {
  embedLyrics,
  embedMetadata,
  embedMetadataWithCoverData,
  emptyMetadata,
  extractLyrics,
  getAudioQuality,
  readMetadata,
} from "./src/metadata.ts";
export { FLAC, type Found } from "./src/flac/mod.ts";
export { CommentMap } from "./src/flac/comments.ts";
export { decodeAudioQuality } from "./src/flac/quality.ts";
export { type JpegInfo, probeJpeg } from "./src/flac/jpeg.ts";
export {
  type Block,
  BlockType,
  MetadataBlock,
  Picture,
  PictureType,
  RawBlock,
  StreamInfo,
  VorbisComment,
} from "./src/flac/blocks.ts";
export {
  DecodeError,
  FlacError,
  FormatError,
  IOError,
  NotFoundError,
} from "./src/errors.ts";
export {
  consoleLogger,
  defaultConfig,
  type FlacConfig,
  type Logger,
  resolveConfig,
} from "./src/config.ts";
export type { AudioQuality, Metadata } from "./src/types.ts";
