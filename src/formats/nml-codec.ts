import * as path from "path";
import { v4 as uuidv4 } from "uuid";
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
import { attr, attrs, child, children, childText, escapeXml, parseXmlDocument, toNumber, XmlNode } from "./xml";

const log = createLogger("nml");

export const NML_VERSION = "19";

const CUE_TYPE_BY_CODE: Record<number, CueType> = {
  0: "hot-cue",
  1: "loop",
  4: "grid",
  9: "beat",
};

const CODE_BY_CUE_TYPE: Partial<Record<CueType, number>> = {
  "hot-cue": 0,
  loop: 1,
  grid: 4,
  beat: 9,
};

/** Traktor-style DIR values separate segments with "/:". */
function locationPath(location: XmlNode): string | undefined {
  const file = attr(location, "FILE");
  if (!file) return undefined;
  if (path.isAbsolute(file) || /^[A-Za-z]:[\\/]/.test(file)) return file;
  const dir = attr(location, "DIR");
  if (!dir) return file;
  return path.join(dir.split("/:").join("/"), file);
}

function readCues(entry: XmlNode, filePath: string): CueMarker[] {
  const cues: CueMarker[] = [];
  for (const cue of children(entry, "CUE_V2")) {
    const code = toNumber(attr(cue, "TYPE")) ?? 0;
    const type = CUE_TYPE_BY_CODE[code];
    if (!type) {
      log.debug(`Ignoring cue with unsupported TYPE=${code} on ${filePath}`);
      continue;
    }
    cues.push({
      type,
      start_time_seconds: toNumber(attr(cue, "START")) ?? 0,
      label: attr(cue, "NAME") ?? "",
    });
  }
  return cues;
}

function readEntry(entry: XmlNode, index: number): Result<Track, SkipReason> {
  const id = attr(entry, "ID");
  const title = childText(entry, "TITLE");
  const artist = childText(entry, "ARTIST");
  const location = child(entry, "LOCATION");
  const filePath = location ? locationPath(location) : undefined;

  const missing = [
    id ? null : "ID",
    title === undefined ? "TITLE" : null,
    artist === undefined ? "ARTIST" : null,
    filePath ? null : "LOCATION",
  ].filter((name): name is string => name !== null);
  if (missing.length > 0 || !id || !filePath) {
    return {
      ok: false,
      error: { code: "malformed-entry", message: `Entry lacks ${missing.join(", ")}`, entry: index },
    };
  }

  const info = child(entry, "INFO");
  const tempo = child(entry, "TEMPO");
  const key = child(entry, "KEY");
  return {
    ok: true,
    value: createTrack(filePath, {
      id,
      title,
      artist,
      album: childText(entry, "ALBUM"),
      genre: attr(info, "GENRE"),
      comment: attr(info, "COMMENT"),
      year: attr(info, "RELEASE_DATE"),
      duration: toNumber(attr(info, "PLAYTIME_FLOAT")) ?? toNumber(attr(info, "PLAYTIME")),
      energy: toNumber(attr(info, "ENERGY")),
      bpm: toNumber(attr(tempo, "BPM")),
      key: attr(key, "VALUE"),
      cue_points: readCues(entry, filePath),
    }),
  };
}

function readNodes(
  nodes: XmlNode[],
  byId: Map<string, Track>,
  skipped: SkipReason[]
): PlaylistNode[] {
  const result: PlaylistNode[] = [];
  for (const node of nodes) {
    const type = attr(node, "TYPE");
    const name = attr(node, "NAME") ?? "";
    if (type === "FOLDER") {
      result.push({ kind: "folder", name, children: readNodes(children(node, "NODE"), byId, skipped) });
    } else if (type === "PLAYLIST") {
      const tracks: Track[] = [];
      for (const ref of children(node, "NODE")) {
        if (attr(ref, "TYPE") !== "TRACK") continue;
        const key = attr(ref, "KEY") ?? "";
        const track = byId.get(key);
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

function writeCues(track: Track, indent: string): string[] {
  const lines: string[] = [];
  for (const cue of track.cue_points) {
    const code = CODE_BY_CUE_TYPE[cue.type];
    if (code === undefined) {
      log.debug(`Dropping ${cue.type} '${cue.label}' on ${track.file_path}: no NML equivalent`);
      continue;
    }
    lines.push(
      `${indent}<CUE_V2 ${attrs({ NAME: cue.label, TYPE: code, START: cue.start_time_seconds.toFixed(3) })}/>`
    );
  }
  return lines;
}

function writeNodes(nodes: PlaylistNode[], ids: IdentityMap, indent: string): string[] {
  const lines: string[] = [];
  for (const node of nodes) {
    if (node.kind === "folder") {
      lines.push(`${indent}<NODE ${attrs({ TYPE: "FOLDER", NAME: node.name })}>`);
      lines.push(...writeNodes(node.children, ids, indent + "  "));
      lines.push(`${indent}</NODE>`);
      continue;
    }
    lines.push(`${indent}<NODE ${attrs({ TYPE: "PLAYLIST", NAME: node.name })}>`);
    for (const track of node.tracks) {
      const id = ids.get(track);
      if (id === undefined) {
        log.debug(`Playlist '${node.name}' drops unexported track ${track.file_path}`);
        continue;
      }
      lines.push(`${indent}  <NODE ${attrs({ TYPE: "TRACK", KEY: id })}/>`);
    }
    lines.push(`${indent}</NODE>`);
  }
  return lines;
}

/** Hierarchical-tag library: HEAD, COLLECTION of ENTRY, SETS tree. UUID identities. */
export class NmlCodec implements LibraryCodec {
  readonly format = "nml" as const;

  async read(filePath: string, options?: ReadOptions): Promise<ReadResult> {
    const xml = await readDocumentText(filePath);
    const document = parseXmlDocument(filePath, xml, ["ENTRY", "NODE", "CUE_V2"]);
    const root = child(document, "NML");
    if (!root) {
      throw new DocumentError(filePath, "missing NML root element");
    }

    const skipped: SkipReason[] = [];
    const byId = new Map<string, Track>();
    const parsed: Track[] = [];
    const collection = child(root, "COLLECTION") ?? {};
    children(collection, "ENTRY").forEach((entry, i) => {
      const result = readEntry(entry, i + 1);
      if (!result.ok) {
        log.warn(`Skipping entry ${i + 1} in ${filePath}: ${result.error.message}`);
        skipped.push(result.error);
        return;
      }
      const track = result.value;
      if (track.id !== undefined && byId.has(track.id)) {
        skipped.push({ code: "malformed-entry", message: `Duplicate entry ID '${track.id}'`, entry: i + 1 });
        return;
      }
      if (track.id !== undefined) byId.set(track.id, track);
      parsed.push(track);
    });

    const tracks = await verifyTrackFiles(parsed, options, skipped);
    const sets = child(root, "SETS") ?? {};
    const playlists = prunePlaylists(readNodes(children(sets, "NODE"), byId, skipped), new Set(tracks));

    log.info(`Read ${tracks.length} tracks from ${path.basename(filePath)} (${skipped.length} skipped)`);
    return { tracks, playlists, skipped };
  }

  async write(filePath: string, document: LibraryDocument): Promise<IdentityMap> {
    const ids: IdentityMap = new Map();
    const lines: string[] = [
      `<?xml version="1.0" encoding="UTF-8" standalone="no" ?>`,
      `<NML ${attrs({ VERSION: NML_VERSION })}>`,
      `  <HEAD ${attrs({ COMPANY: "djlib", PROGRAM: "djlib-interchange" })}/>`,
      `  <COLLECTION ${attrs({ ENTRIES: document.tracks.length })}>`,
    ];

    for (const track of document.tracks) {
      const id = uuidv4();
      ids.set(track, id);
      lines.push(`    <ENTRY ${attrs({ ID: id })}>`);
      lines.push(`      <TITLE>${escapeXml(track.title)}</TITLE>`);
      lines.push(`      <ARTIST>${escapeXml(track.artist)}</ARTIST>`);
      lines.push(`      <ALBUM>${escapeXml(track.album)}</ALBUM>`);
      lines.push(
        `      <LOCATION ${attrs({ DIR: path.dirname(track.file_path), FILE: track.file_path, VOLUME: "" })}/>`
      );
      lines.push(
        `      <INFO ${attrs({
          GENRE: track.genre,
          PLAYTIME: Math.round(track.duration),
          PLAYTIME_FLOAT: track.duration,
          COMMENT: track.comment || undefined,
          RELEASE_DATE: track.year || undefined,
          ENERGY: track.energy,
        })}/>`
      );
      lines.push(`      <TEMPO ${attrs({ BPM: track.bpm, BPM_QUALITY: 100 })}/>`);
      lines.push(`      <KEY ${attrs({ VALUE: track.key })}/>`);
      lines.push(...writeCues(track, "      "));
      lines.push(`    </ENTRY>`);
    }

    lines.push(`  </COLLECTION>`);
    lines.push(`  <SETS>`);
    lines.push(...writeNodes(document.playlists, ids, "    "));
    lines.push(`  </SETS>`);
    lines.push(`</NML>`);

    await writeDocumentAtomic(filePath, lines.join("\n") + "\n");
    log.info(`Wrote ${ids.size} tracks to ${path.basename(filePath)}`);
    return ids;
  }
}
