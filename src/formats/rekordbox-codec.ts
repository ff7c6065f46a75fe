import * as path from "path";
import { DocumentError } from "../errors";
import { createLogger } from "../logger";
import { createTrack } from "../track";
import {
  CueMarker,
  CueType,
  LibraryDocument,
  PlaylistNode,
  ReadOptions,
  ReadResult,
  Result,
  SkipReason,
  Track,
} from "../types";
import {
  IdentityMap,
  LibraryCodec,
  prunePlaylists,
  readDocumentText,
  verifyTrackFiles,
  writeDocumentAtomic,
} from "./codec";
import { attr, attrs, child, children, parseXmlDocument, toNumber, XmlNode } from "./xml";

const log = createLogger("rekordbox");

const LOCATION_PREFIX = "file://localhost/";

const CUE_TYPE_BY_CODE: Record<number, CueType> = {
  0: "hot-cue",
  1: "loop",
  2: "memory-cue",
  4: "grid",
};

const CODE_BY_CUE_TYPE: Record<CueType, number> = {
  "hot-cue": 0,
  loop: 1,
  "memory-cue": 2,
  grid: 4,
  // the catalog has no separate beat marker
  beat: 4,
};

const KIND_BY_EXTENSION: Record<string, string> = {
  ".mp3": "MP3 File",
  ".flac": "FLAC File",
  ".wav": "WAV File",
  ".m4a": "M4A File",
  ".aac": "AAC File",
};

/** Percent-encodes each path segment; a leading drive such as `C:` stays as it is. */
export function toLocationUri(filePath: string): string {
  const segments = filePath.replace(/\\/g, "/").replace(/^\/+/, "").split("/");
  const encoded = segments.map((segment, i) =>
    i === 0 && /^[A-Za-z]:$/.test(segment) ? segment : encodeURIComponent(segment)
  );
  return LOCATION_PREFIX + encoded.join("/");
}

export function fromLocationUri(location: string): string {
  let rest = location;
  if (rest.startsWith(LOCATION_PREFIX)) rest = rest.slice(LOCATION_PREFIX.length);
  else if (rest.startsWith("file:///")) rest = rest.slice("file:///".length);

  try {
    rest = decodeURIComponent(rest);
  } catch {
    log.debug(`Location is not percent-encoded, using it verbatim: ${location}`);
  }

  // Windows drive paths stay as they are, everything else is rooted
  if (/^[A-Za-z]:\//.test(rest)) return rest;
  return "/" + rest.replace(/^\/+/, "");
}

function readMarks(track: XmlNode, filePath: string): CueMarker[] {
  const cues: CueMarker[] = [];
  for (const mark of children(track, "POSITION_MARK")) {
    const code = toNumber(attr(mark, "Type")) ?? 0;
    const type = CUE_TYPE_BY_CODE[code];
    if (!type) {
      log.debug(`Ignoring position mark with Type=${code} on ${filePath}`);
      continue;
    }
    cues.push({
      type,
      start_time_seconds: toNumber(attr(mark, "Start")) ?? 0,
      label: attr(mark, "Name") ?? "",
    });
  }
  return cues;
}

function readTrack(node: XmlNode, index: number): Result<Track, SkipReason> {
  const id = attr(node, "TrackID");
  const location = attr(node, "Location");
  if (!id || !location) {
    const missing = [id ? null : "TrackID", location ? null : "Location"].filter(Boolean).join(", ");
    return { ok: false, error: { code: "malformed-entry", message: `Track lacks ${missing}`, entry: index } };
  }

  const filePath = fromLocationUri(location);
  return {
    ok: true,
    value: createTrack(filePath, {
      id,
      title: attr(node, "Name"),
      artist: attr(node, "Artist"),
      album: attr(node, "Album"),
      genre: attr(node, "Genre"),
      year: attr(node, "Year"),
      comment: attr(node, "Comments"),
      duration: toNumber(attr(node, "TotalTime")),
      bpm: toNumber(attr(node, "AverageBpm")),
      key: attr(node, "Tonality"),
      cue_points: readMarks(node, filePath),
    }),
  };
}

interface TrackLookup {
  byId: Map<string, Track>;
  byLocation: Map<string, Track>;
}

function readNodes(nodes: XmlNode[], lookup: TrackLookup, skipped: SkipReason[]): PlaylistNode[] {
  const result: PlaylistNode[] = [];
  for (const node of nodes) {
    const name = attr(node, "Name") ?? "";
    const type = attr(node, "Type");
    if (type === "0") {
      result.push({ kind: "folder", name, children: readNodes(children(node, "NODE"), lookup, skipped) });
    } else if (type === "1") {
      // KeyType 1 references tracks by Location instead of TrackID
      const byLocation = attr(node, "KeyType") === "1";
      const tracks: Track[] = [];
      for (const ref of children(node, "TRACK")) {
        const key = attr(ref, "Key") ?? attr(ref, "TrackID") ?? "";
        const track = byLocation ? lookup.byLocation.get(fromLocationUri(key)) : lookup.byId.get(key);
        if (track) {
          tracks.push(track);
        } else {
          skipped.push({
            code: "unresolved-reference",
            message: `Playlist '${name}' references unknown track '${key}'`,
          });
        }
      }
      result.push({ kind: "playlist", name, tracks });
    }
  }
  return result;
}

function countEntries(node: PlaylistNode): number {
  return node.kind === "folder" ? node.children.length : node.tracks.length;
}

function writeNodes(nodes: PlaylistNode[], ids: IdentityMap, indent: string): string[] {
  const lines: string[] = [];
  for (const node of nodes) {
    if (node.kind === "folder") {
      lines.push(`${indent}<NODE ${attrs({ Type: "0", Name: node.name, Count: countEntries(node) })}>`);
      lines.push(...writeNodes(node.children, ids, indent + "  "));
      lines.push(`${indent}</NODE>`);
      continue;
    }
    const keys = node.tracks
      .map((track) => ids.get(track))
      .filter((id): id is string => id !== undefined);
    lines.push(`${indent}<NODE ${attrs({ Type: "1", Name: node.name, KeyType: "0", Entries: keys.length })}>`);
    for (const key of keys) {
      lines.push(`${indent}  <TRACK ${attrs({ Key: key })}/>`);
    }
    lines.push(`${indent}</NODE>`);
  }
  return lines;
}

function writeMarks(track: Track, indent: string): string[] {
  let hotCueNumber = 0;
  return track.cue_points.map((cue) => {
    const num = cue.type === "hot-cue" ? hotCueNumber++ : -1;
    const name = cue.type === "grid" || cue.type === "beat" ? "Grid" : cue.label;
    return `${indent}<POSITION_MARK ${attrs({
      Name: name,
      Type: CODE_BY_CUE_TYPE[cue.type],
      Start: cue.start_time_seconds.toFixed(3),
      Num: num,
    })}/>`;
  });
}

/** XML catalog library. Track identities are 1, 2, 3... and are reassigned on every export. */
export class RekordboxXmlCodec implements LibraryCodec {
  readonly format = "rekordbox-xml" as const;

  async read(filePath: string, options?: ReadOptions): Promise<ReadResult> {
    const xml = await readDocumentText(filePath);
    const document = parseXmlDocument(filePath, xml, ["TRACK", "NODE", "POSITION_MARK"]);
    const root = child(document, "DJ_PLAYLISTS");
    if (!root) {
      throw new DocumentError(filePath, "missing DJ_PLAYLISTS root element");
    }

    const skipped: SkipReason[] = [];
    const lookup: TrackLookup = { byId: new Map(), byLocation: new Map() };
    const parsed: Track[] = [];
    const collection = child(root, "COLLECTION") ?? {};
    children(collection, "TRACK").forEach((node, i) => {
      const result = readTrack(node, i + 1);
      if (!result.ok) {
        log.warn(`Skipping track ${i + 1} in ${filePath}: ${result.error.message}`);
        skipped.push(result.error);
        return;
      }
      const track = result.value;
      if (track.id !== undefined && lookup.byId.has(track.id)) {
        skipped.push({ code: "malformed-entry", message: `Duplicate TrackID '${track.id}'`, entry: i + 1 });
        return;
      }
      if (track.id !== undefined) lookup.byId.set(track.id, track);
      lookup.byLocation.set(track.file_path, track);
      parsed.push(track);
    });

    const tracks = await verifyTrackFiles(parsed, options, skipped);

    let topLevel = children(child(root, "PLAYLISTS") ?? {}, "NODE");
    if (topLevel.length === 1 && attr(topLevel[0], "Type") === "0") {
      topLevel = children(topLevel[0], "NODE");
    }
    const playlists = prunePlaylists(readNodes(topLevel, lookup, skipped), new Set(tracks));

    log.info(`Read ${tracks.length} tracks from ${path.basename(filePath)} (${skipped.length} skipped)`);
    return { tracks, playlists, skipped };
  }

  async write(filePath: string, document: LibraryDocument): Promise<IdentityMap> {
    const ids: IdentityMap = new Map();
    const lines: string[] = [
      `<?xml version="1.0" encoding="UTF-8"?>`,
      `<DJ_PLAYLISTS ${attrs({ Version: "1.0.0" })}>`,
      `  <PRODUCT ${attrs({ Name: "djlib-interchange", Version: "0.1.0", Company: "djlib" })}/>`,
      `  <COLLECTION ${attrs({ Entries: document.tracks.length })}>`,
    ];

    let nextId = 1;
    for (const track of document.tracks) {
      const id = String(nextId++);
      ids.set(track, id);
      const trackAttrs = attrs({
        TrackID: id,
        Name: track.title,
        Artist: track.artist,
        Album: track.album,
        Genre: track.genre,
        Kind: KIND_BY_EXTENSION[path.extname(track.file_path).toLowerCase()] ?? "Audio File",
        TotalTime: Math.round(track.duration),
        Year: track.year || undefined,
        AverageBpm: track.bpm.toFixed(2),
        Comments: track.comment || undefined,
        Location: toLocationUri(track.file_path),
        Tonality: track.key,
      });
      const body: string[] = [];
      if (track.bpm > 0) {
        body.push(
          `      <TEMPO ${attrs({ Inizio: "0.000", Bpm: track.bpm.toFixed(2), Metro: "4/4", Battito: "1" })}/>`
        );
      }
      body.push(...writeMarks(track, "      "));

      if (body.length === 0) {
        lines.push(`    <TRACK ${trackAttrs}/>`);
      } else {
        lines.push(`    <TRACK ${trackAttrs}>`, ...body, `    </TRACK>`);
      }
    }

    lines.push(`  </COLLECTION>`);
    lines.push(`  <PLAYLISTS>`);
    lines.push(`    <NODE ${attrs({ Type: "0", Name: "ROOT", Count: document.playlists.length })}>`);
    lines.push(...writeNodes(document.playlists, ids, "      "));
    lines.push(`    </NODE>`);
    lines.push(`  </PLAYLISTS>`);
    lines.push(`</DJ_PLAYLISTS>`);

    await writeDocumentAtomic(filePath, lines.join("\n") + "\n");
    log.info(`Wrote ${ids.size} tracks to ${path.basename(filePath)}`);
    return ids;
  }
}
