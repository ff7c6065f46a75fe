import * as path from "path";
import { toNmlCues, toRekordboxCues } from "./cue-mapping";
import { createLogger } from "./logger";
import { codecFor, countPlaylists, IdentityMap } from "./formats";
import { cloneTrack } from "./track";
import { CueMarker, LibraryDocument, LibraryFormat, PlaylistNode, SkipReason, Track } from "./types";

const log = createLogger("convert");

export type ConversionDirection = "nml-to-rekordbox" | "rekordbox-to-nml";

export interface ConversionOptions {
  mapFirstHotCueToMemory?: boolean;
  mapMemoryToHotCue?: boolean;
}

export interface ConversionReport {
  tracks: number;
  playlists: number;
  droppedReferences: number;
  skipped: SkipReason[];
  // source identity -> identity assigned by the target writer
  identities: Map<string, string>;
}

const FORMATS: Record<ConversionDirection, { source: LibraryFormat; target: LibraryFormat }> = {
  "nml-to-rekordbox": { source: "nml", target: "rekordbox-xml" },
  "rekordbox-to-nml": { source: "rekordbox-xml", target: "nml" },
};

/** Picks the cue mapping for a source/target pair, or undefined when no remap applies. */
export function cueMapperFor(
  source: LibraryFormat,
  target: LibraryFormat,
  options: ConversionOptions
): ((cues: CueMarker[]) => CueMarker[]) | undefined {
  if (source === "nml" && target === "rekordbox-xml") {
    return (cues) => toRekordboxCues(cues, { mapFirstHotCueToMemory: options.mapFirstHotCueToMemory });
  }
  if (source === "rekordbox-xml" && target === "nml") {
    return (cues) => toNmlCues(cues, { mapMemoryToHotCue: options.mapMemoryToHotCue });
  }
  return undefined;
}

/**
 * Rebuilds a playlist tree against replacement tracks. References to tracks
 * absent from `replacements` are dropped and counted.
 */
export function remapPlaylists(
  nodes: PlaylistNode[],
  replacements: Map<Track, Track>
): { playlists: PlaylistNode[]; dropped: number } {
  let dropped = 0;
  const visit = (list: PlaylistNode[]): PlaylistNode[] =>
    list.map((node): PlaylistNode => {
      if (node.kind === "folder") return { ...node, children: visit(node.children) };
      const tracks: Track[] = [];
      for (const track of node.tracks) {
        const replacement = replacements.get(track);
        if (replacement) tracks.push(replacement);
        else dropped++;
      }
      return { ...node, tracks };
    });
  return { playlists: visit(nodes), dropped };
}

/** Source id -> target id, for every written track that was read with an id. */
export function identityTable(written: IdentityMap, sourceIds: Map<Track, string | undefined>): Map<string, string> {
  const table = new Map<string, string>();
  for (const [track, targetId] of written) {
    const sourceId = sourceIds.get(track);
    if (sourceId !== undefined) table.set(sourceId, targetId);
  }
  return table;
}

/**
 * Converts a whole NML document to rekordbox XML or back. Every referenced
 * file is carried over whether or not it exists on this machine.
 */
export async function convertLibraryFile(
  sourcePath: string,
  targetPath: string,
  direction: ConversionDirection,
  options: ConversionOptions = {}
): Promise<ConversionReport> {
  const { source, target } = FORMATS[direction];
  const mapCues = cueMapperFor(source, target, options);

  const document = await codecFor(source).read(sourcePath, { verifyFiles: false });

  const replacements = new Map<Track, Track>();
  const sourceIds = new Map<Track, string | undefined>();
  const tracks = document.tracks.map((track) => {
    const converted = cloneTrack(track, {
      id: undefined,
      cue_points: mapCues ? mapCues(track.cue_points) : track.cue_points,
    });
    replacements.set(track, converted);
    sourceIds.set(converted, track.id);
    return converted;
  });

  const { playlists, dropped } = remapPlaylists(document.playlists, replacements);
  const output: LibraryDocument = { tracks, playlists };
  const written = await codecFor(target).write(targetPath, output);

  const report: ConversionReport = {
    tracks: tracks.length,
    playlists: countPlaylists(playlists),
    droppedReferences: dropped,
    skipped: document.skipped,
    identities: identityTable(written, sourceIds),
  };
  log.success(
    `Converted ${report.tracks} tracks from ${path.basename(sourcePath)} to ${path.basename(targetPath)}` +
      (report.skipped.length > 0 ? ` (${report.skipped.length} entries skipped)` : "")
  );
  return report;
}
