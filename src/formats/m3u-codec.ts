import * as path from "path";
import { fileURLToPath } from "url";
import { errorMessage } from "../errors";
import { createLogger } from "../logger";
import { createTrack, filenameStem } from "../track";
import { LibraryDocument, ReadOptions, ReadResult, SkipReason, Track } from "../types";
import { IdentityMap, LibraryCodec, readDocumentText, verifyTrackFiles, writeDocumentAtomic } from "./codec";

const log = createLogger("m3u");

// relative export paths may climb at most this many directories
export const MAX_PARENT_TRAVERSALS = 2;

interface ExtInf {
  duration?: number;
  title?: string;
  artist?: string;
}

export function parseExtInf(line: string): ExtInf {
  const body = line.slice("#EXTINF:".length);
  const comma = body.indexOf(",");
  const durationText = comma >= 0 ? body.slice(0, comma) : body;
  const display = comma >= 0 ? body.slice(comma + 1).trim() : "";

  const duration = Number(durationText.trim().split(/\s+/)[0]);
  const info: ExtInf = { duration: Number.isFinite(duration) && duration > 0 ? duration : undefined };

  const separator = display.indexOf(" - ");
  if (separator > 0) {
    info.artist = display.slice(0, separator);
    info.title = display.slice(separator + 3);
  } else if (display) {
    info.title = display;
  }
  return info;
}

/** Path as written into a playlist next to `playlistPath`. */
export function playlistEntryPath(trackPath: string, playlistPath: string): string {
  const relative = path.relative(path.dirname(path.resolve(playlistPath)), trackPath);
  if (path.isAbsolute(relative)) return trackPath;
  const climbs = relative.split(/[\\/]/).filter((segment) => segment === "..").length;
  return climbs > MAX_PARENT_TRAVERSALS ? trackPath : relative;
}

function resolveEntry(entry: string, baseDir: string): string {
  if (entry.startsWith("file://")) {
    try {
      return fileURLToPath(entry);
    } catch (error) {
      log.debug(`Unusable file URL '${entry}': ${errorMessage(error)}`);
    }
  }
  return path.isAbsolute(entry) ? entry : path.resolve(baseDir, entry);
}

function toLatin1(text: string): Buffer {
  // one byte per character, anything outside latin1 becomes '?'
  return Buffer.from(text.replace(/[^\u0000-\u00ff]/g, "?"), "latin1");
}

/**
 * Playlist-text format. `.m3u` is read and written as latin1, `.m3u8` as
 * UTF-8; the encoding is fixed per codec instance.
 */
export class M3uCodec implements LibraryCodec {
  readonly format: "m3u" | "m3u8";

  constructor(variant: "m3u" | "m3u8") {
    this.format = variant;
  }

  private get encoding(): BufferEncoding {
    return this.format === "m3u" ? "latin1" : "utf-8";
  }

  async read(filePath: string, options?: ReadOptions): Promise<ReadResult> {
    const text = await readDocumentText(filePath, this.encoding);

    const baseDir = path.dirname(path.resolve(filePath));
    const skipped: SkipReason[] = [];
    const parsed: Track[] = [];
    let pending: ExtInf | undefined;

    for (const line of text.split(/\r?\n/)) {
      const trimmed = line.trim();
      if (!trimmed) continue;
      if (trimmed.startsWith("#EXTINF:")) {
        pending = parseExtInf(trimmed);
        continue;
      }
      if (trimmed.startsWith("#")) continue;

      parsed.push(
        createTrack(resolveEntry(trimmed, baseDir), {
          title: pending?.title,
          artist: pending?.artist,
          duration: pending?.duration,
        })
      );
      pending = undefined;
    }

    const tracks = await verifyTrackFiles(parsed, options, skipped);
    log.info(`Read ${tracks.length} entries from ${path.basename(filePath)} (${skipped.length} skipped)`);
    return {
      tracks,
      playlists: [{ kind: "playlist", name: filenameStem(filePath), tracks: [...tracks] }],
      skipped,
    };
  }

  async write(filePath: string, document: LibraryDocument): Promise<IdentityMap> {
    const lines = ["#EXTM3U"];
    for (const track of document.tracks) {
      lines.push(`#EXTINF:${Math.round(track.duration)},${track.artist} - ${track.title}`);
      lines.push(playlistEntryPath(track.file_path, filePath));
    }
    const text = lines.join("\n") + "\n";
    await writeDocumentAtomic(filePath, this.format === "m3u" ? toLatin1(text) : text);
    log.info(`Wrote ${document.tracks.length} entries to ${path.basename(filePath)}`);
    return new Map();
  }
}
