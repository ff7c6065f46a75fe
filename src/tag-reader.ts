import * as path from "path";
import { IAudioMetadata, parseFile } from "music-metadata";
import { CorruptMediaError, errorMessage } from "./errors";

export type ContainerKind = "flac" | "mpeg" | "mp4" | "generic";

export interface TagData {
  title?: string;
  artist?: string;
  album?: string;
  genre?: string;
  year?: string;
  comment?: string;
  bpm?: number;
  key?: string;
  duration?: number;
}

export interface TagReader {
  read(filePath: string): Promise<TagData>;
}

const CONTAINER_LABELS: Record<ContainerKind, string> = {
  flac: "Invalid FLAC file",
  mpeg: "Invalid MP3 file",
  mp4: "Invalid MP4/AAC file",
  generic: "Unable to read file format",
};

export function containerFor(filePath: string): ContainerKind {
  switch (path.extname(filePath).toLowerCase()) {
    case ".flac":
      return "flac";
    case ".mp3":
      return "mpeg";
    case ".m4a":
    case ".aac":
      return "mp4";
    default:
      return "generic";
  }
}

// music-metadata has returned comments both as plain strings and as { text } objects
function firstText(value: unknown): string | undefined {
  const first: unknown = Array.isArray(value) ? value[0] : value;
  if (typeof first === "string") return first;
  if (first !== null && typeof first === "object" && "text" in first) {
    const text: unknown = first.text;
    return typeof text === "string" ? text : undefined;
  }
  return undefined;
}

function toTagData(metadata: IAudioMetadata): TagData {
  const { common, format } = metadata;
  const bpm = typeof common.bpm === "number" ? common.bpm : Number(firstText(common.bpm));
  return {
    title: common.title,
    artist: common.artist,
    album: common.album,
    genre: firstText(common.genre),
    year: common.year !== undefined ? String(common.year) : undefined,
    comment: firstText(common.comment),
    bpm: Number.isFinite(bpm) && bpm > 0 ? bpm : undefined,
    key: firstText(common.key),
    duration: format.duration,
  };
}

/** Reads tags through music-metadata, one container kind per extension. */
export class MusicMetadataTagReader implements TagReader {
  async read(filePath: string): Promise<TagData> {
    const kind = containerFor(filePath);
    const label = CONTAINER_LABELS[kind];

    let metadata: IAudioMetadata;
    try {
      metadata = await parseFile(filePath, { duration: kind === "mpeg", skipCovers: true });
    } catch (error) {
      throw new CorruptMediaError(`${label}: ${errorMessage(error)}`, { cause: error });
    }

    // a parser that finds no audio stream leaves the format block empty
    if (metadata.format.sampleRate === undefined && metadata.format.duration === undefined) {
      throw new CorruptMediaError(`${label}: no audio stream found`);
    }
    return toTagData(metadata);
  }
}
