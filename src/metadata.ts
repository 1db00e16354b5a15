import { existsSync, readFileSync } from "node:fs";
import { type FlacConfig, type Logger, resolveConfig } from "./config.ts";
import { FlacError, FormatError, IOError, io, NotFoundError } from "./errors.ts";
import {
  BlockType,
  MetadataBlock,
  Picture,
  PictureType,
  VorbisComment,
} from "./flac/blocks.ts";
import { CommentMap } from "./flac/comments.ts";
import { probeJpeg } from "./flac/jpeg.ts";
import { FLAC } from "./flac/mod.ts";
import type { Metadata } from "./types.ts";

export { getAudioQuality } from "./flac/quality.ts";

const COVER_MIME = "image/jpeg";

export function emptyMetadata(): Metadata {
  return {
    title: "",
    artist: "",
    album: "",
    albumArtist: "",
    date: "",
    trackNumber: 0,
    totalTracks: 0,
    discNumber: 0,
    isrc: "",
    description: "",
    lyrics: "",
  };
}

function vorbisOf(flac: FLAC): VorbisComment | undefined {
  const found = flac.findFirst(BlockType.VORBIS_COMMENT);
  return found?.block instanceof VorbisComment ? found.block : undefined;
}

function updateComments(
  flac: FLAC,
  config: FlacConfig,
  apply: (comments: CommentMap) => void,
) {
  const comments = CommentMap.fromBlock(vorbisOf(flac), config.vendor);
  apply(comments);
  flac.replaceOrAppend(comments.toBlock());
}

function withDefaults(metadata: Partial<Metadata>): Metadata {
  const empty = emptyMetadata();
  return {
    title: metadata.title ?? empty.title,
    artist: metadata.artist ?? empty.artist,
    album: metadata.album ?? empty.album,
    albumArtist: metadata.albumArtist ?? empty.albumArtist,
    date: metadata.date ?? empty.date,
    trackNumber: metadata.trackNumber ?? empty.trackNumber,
    totalTracks: metadata.totalTracks ?? empty.totalTracks,
    discNumber: metadata.discNumber ?? empty.discNumber,
    isrc: metadata.isrc ?? empty.isrc,
    description: metadata.description ?? empty.description,
    lyrics: metadata.lyrics ?? empty.lyrics,
  };
}

function setTags(comments: CommentMap, metadata: Partial<Metadata>) {
  const m = withDefaults(metadata);

  comments.set("TITLE", m.title);
  comments.set("ARTIST", m.artist);
  comments.set("ALBUM", m.album);
  comments.set("ALBUMARTIST", m.albumArtist);
  comments.set("DATE", m.date);

  if (m.trackNumber > 0) {
    comments.set(
      "TRACKNUMBER",
      m.totalTracks > 0
        ? `${m.trackNumber}/${m.totalTracks}`
        : `${m.trackNumber}`,
    );
  }
  if (m.discNumber > 0) comments.set("DISCNUMBER", `${m.discNumber}`);
  if (m.isrc !== "") comments.set("ISRC", m.isrc);
  if (m.description !== "") comments.set("DESCRIPTION", m.description);
  if (m.lyrics !== "") {
    comments.set("LYRICS", m.lyrics);
    comments.set("UNSYNCEDLYRICS", m.lyrics);
  }
}

function frontCover(data: Uint8Array, description: string): Picture {
  const { width, height, depth } = probeJpeg(data);
  const picture = new Picture({
    pictureType: PictureType.FRONT_COVER,
    mime: COVER_MIME,
    description,
    width,
    height,
    depth,
    colors: 0,
    data,
  });
  const size = picture.write().length;
  if (size > MetadataBlock.MAX_SIZE) {
    throw new FormatError(`Cover art is too large to embed (${size} bytes)`);
  }
  return picture;
}

/**
 * Replaces every picture block with a single front cover. A cover that
 * cannot be turned into a picture block is logged and skipped.
 */
function embedCover(flac: FLAC, data: Uint8Array, config: FlacConfig) {
  flac.removeAll(BlockType.PICTURE);

  let picture: Picture;
  try {
    picture = frontCover(data, config.coverDescription);
  } catch (e) {
    if (!(e instanceof FlacError)) throw e;
    config.logger.warn(`Failed to create picture block: ${e.message}`);
    return;
  }

  flac.replaceOrAppend(picture);
  config.logger.info(`Cover art embedded successfully (${data.length} bytes)`);
}

function readCoverFile(coverPath: string, logger: Logger) {
  if (!existsSync(coverPath)) {
    logger.warn(`Cover file does not exist: ${coverPath}`);
    return undefined;
  }
  try {
    return new Uint8Array(io("read", coverPath, () => readFileSync(coverPath)));
  } catch (e) {
    if (!(e instanceof IOError)) throw e;
    logger.warn(e.message);
    return undefined;
  }
}

/**
 * Writes `metadata` into the vorbis comments of a FLAC file and, when
 * `coverPath` is given, replaces its cover art with that JPEG.
 */
export function embedMetadata(
  filePath: string,
  metadata: Partial<Metadata>,
  coverPath = "",
  options?: Partial<FlacConfig>,
) {
  const config = resolveConfig(options);
  const flac = FLAC.parse(filePath);

  updateComments(flac, config, (comments) => setTags(comments, metadata));

  if (coverPath !== "") {
    const cover = readCoverFile(coverPath, config.logger);
    if (cover) embedCover(flac, cover, config);
  }

  flac.save(filePath);
}

/**
 * Same as {@link embedMetadata} with the cover image passed in memory, so no
 * temporary file is needed.
 */
export function embedMetadataWithCoverData(
  filePath: string,
  metadata: Partial<Metadata>,
  coverData?: Uint8Array,
  options?: Partial<FlacConfig>,
) {
  const config = resolveConfig(options);
  const flac = FLAC.parse(filePath);

  updateComments(flac, config, (comments) => setTags(comments, metadata));

  if (coverData && coverData.length > 0) {
    embedCover(flac, coverData, config);
  }

  flac.save(filePath);
}

const leadingInt = (text: string) => {
  const match = /^\s*([+-]?\d+)/.exec(text);
  return match ? Number.parseInt(match[1], 10) : 0;
};

export function readMetadata(filePath: string): Metadata {
  const metadata = emptyMetadata();
  const vorbis = vorbisOf(FLAC.parse(filePath));
  if (!vorbis) return metadata;

  const comments = CommentMap.fromBlock(vorbis, vorbis.vendor);
  metadata.title = comments.get("TITLE");
  metadata.artist = comments.get("ARTIST");
  metadata.album = comments.get("ALBUM");
  metadata.albumArtist = comments.get("ALBUMARTIST");
  metadata.date = comments.get("DATE");
  metadata.isrc = comments.get("ISRC");
  metadata.description = comments.get("DESCRIPTION");
  metadata.lyrics = comments.get("LYRICS") || comments.get("UNSYNCEDLYRICS");

  const track = comments.get("TRACKNUMBER");
  if (track !== "") {
    const [current, total = ""] = track.split("/", 2);
    metadata.trackNumber = leadingInt(current);
    metadata.totalTracks = leadingInt(total);
  }
  metadata.discNumber = leadingInt(comments.get("DISCNUMBER"));

  return metadata;
}

export function embedLyrics(
  filePath: string,
  lyrics: string,
  options?: Partial<FlacConfig>,
) {
  const config = resolveConfig(options);
  const flac = FLAC.parse(filePath);

  updateComments(flac, config, (comments) => {
    comments.set("LYRICS", lyrics);
    comments.set("UNSYNCEDLYRICS", lyrics);
  });

  flac.save(filePath);
}

export function extractLyrics(filePath: string): string {
  const vorbis = vorbisOf(FLAC.parse(filePath));
  if (vorbis) {
    const comments = CommentMap.fromBlock(vorbis, vorbis.vendor);
    const [lyrics] = comments.getAll("LYRICS");
    if (lyrics !== undefined) return lyrics;
    const [unsynced] = comments.getAll("UNSYNCEDLYRICS");
    if (unsynced !== undefined) return unsynced;
  }
  throw new NotFoundError(`No lyrics found in ${filePath}`);
}
