import * as path from "path";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { z } from "zod";
import { DocumentError, errorMessage } from "../errors";
import { createLogger } from "../logger";
import { createTrack } from "../track";
import { LibraryDocument, ReadOptions, ReadResult, Result, SkipReason, Track } from "../types";
import { IdentityMap, LibraryCodec, readDocumentText, verifyTrackFiles, writeDocumentAtomic } from "./codec";

const log = createLogger("csv");

export const CSV_COLUMNS = ["name", "artist", "album", "genre", "bpm", "key", "path"] as const;

const PATH_ALIASES = ["path", "location", "file", "file_path"];
const TITLE_ALIASES = ["name", "title"];

const RowsSchema = z.array(z.record(z.string()));
type Row = Record<string, string>;

function pick(row: Row, aliases: string[]): string | undefined {
  for (const alias of aliases) {
    const value = row[alias];
    if (value !== undefined && value !== "") return value;
  }
  return undefined;
}

function toNumber(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function readRow(row: Row, index: number, baseDir: string): Result<Track, SkipReason> {
  const rawPath = pick(row, PATH_ALIASES);
  if (!rawPath) {
    return { ok: false, error: { code: "missing-path", message: "Row has no path", entry: index } };
  }
  const filePath = path.isAbsolute(rawPath) ? rawPath : path.resolve(baseDir, rawPath);
  return {
    ok: true,
    value: createTrack(filePath, {
      title: pick(row, TITLE_ALIASES),
      artist: row.artist,
      album: row.album,
      genre: row.genre,
      year: row.year,
      comment: row.comment,
      bpm: toNumber(row.bpm),
      key: row.key,
      duration: toNumber(row.duration),
    }),
  };
}

/** Flat one-row-per-track export. Carries no playlists and no identities. */
export class CsvCodec implements LibraryCodec {
  readonly format = "csv" as const;

  async read(filePath: string, options?: ReadOptions): Promise<ReadResult> {
    const text = await readDocumentText(filePath);

    let rows: Row[];
    try {
      const records: unknown = parse(text, {
        columns: (header: string[]) => header.map((name) => name.trim().toLowerCase()),
        bom: true,
        skip_empty_lines: true,
        trim: true,
        relax_column_count: true,
      });
      rows = RowsSchema.parse(records);
    } catch (error) {
      throw new DocumentError(filePath, errorMessage(error), { cause: error });
    }

    const skipped: SkipReason[] = [];
    const parsed: Track[] = [];
    const baseDir = path.dirname(path.resolve(filePath));
    rows.forEach((row, i) => {
      // header is line 1
      const result = readRow(row, i + 2, baseDir);
      if (result.ok) {
        parsed.push(result.value);
      } else {
        log.debug(`Skipping row ${i + 2} in ${filePath}: ${result.error.message}`);
        skipped.push(result.error);
      }
    });

    const tracks = await verifyTrackFiles(parsed, options, skipped);
    log.info(`Read ${tracks.length} tracks from ${path.basename(filePath)} (${skipped.length} skipped)`);
    return { tracks, playlists: [], skipped };
  }

  async write(filePath: string, document: LibraryDocument): Promise<IdentityMap> {
    if (document.playlists.length > 0) {
      log.warn(`CSV has no playlists; ${document.playlists.length} playlist nodes not exported`);
    }
    const rows = document.tracks.map((track) => [
      track.title,
      track.artist,
      track.album,
      track.genre,
      String(track.bpm),
      track.key,
      track.file_path,
    ]);
    const text = stringify(rows, { header: true, columns: [...CSV_COLUMNS] });
    await writeDocumentAtomic(filePath, text);
    log.info(`Wrote ${rows.length} tracks to ${path.basename(filePath)}`);
    return new Map();
  }
}
