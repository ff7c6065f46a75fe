import * as path from "path";
import { z } from "zod";
import { CancellationToken, JobHooks } from "./cancellation";
import { FileLocator, FolderFileLocator } from "./file-locator";
import { cueMapperFor, remapPlaylists } from "./format-converter";
import { codecFor, fileIsReadable, IdentityMap, LibraryCodec } from "./formats";
import { createLogger } from "./logger";
import { cloneTrack } from "./track";
import { CueMarker, LibraryFormat, SkipReason, Track } from "./types";

const log = createLogger("migrate");

export const MAX_RETAINED_CUES = 8;

export const MigrationOptionsSchema = z.object({
  cuePoints: z.enum(["all", "first-8", "none"]).default("all"),
  missingFiles: z.enum(["skip", "include"]).default("skip"),
  locateMissing: z.boolean().default(false),
  mapFirstHotCueToMemory: z.boolean().default(false),
  mapMemoryToHotCue: z.boolean().default(false),
});

export type MigrationOptions = z.input<typeof MigrationOptionsSchema>;
type ResolvedOptions = z.output<typeof MigrationOptionsSchema>;

export type MigrationPhase = "reading" | "processing" | "writing";

export type MigrationResult =
  | { status: "completed"; tracks: Track[]; skipped: SkipReason[]; identities: IdentityMap }
  | { status: "canceled"; tracks: Track[]; phase: MigrationPhase };

export interface MigrationDependencies {
  // folders searched when locateMissing is on; ignored when a locator is given
  scanFolders?: readonly string[];
  locator?: FileLocator;
  codecs?: (format: LibraryFormat) => LibraryCodec;
}

const PHASE_START: Record<MigrationPhase, number> = { reading: 0, processing: 30, writing: 70 };

function trimCues(cues: CueMarker[], policy: ResolvedOptions["cuePoints"]): CueMarker[] {
  switch (policy) {
    case "all":
      return cues;
    case "first-8":
      return cues.slice(0, MAX_RETAINED_CUES);
    case "none":
      return [];
  }
}

/**
 * Moves a library from one document format to another:
 * reading (0-30%), processing (30-70%), writing (70-100%).
 *
 * Each track goes through missing-file resolution, then the NML/rekordbox
 * cue remap when the pair calls for one, then cue trimming. `first-8` bounds
 * the markers written, so a memory cue added by the remap takes a slot.
 * Nothing is written when the job is canceled.
 */
export class MigrationOrchestrator {
  private readonly locator: FileLocator;
  private readonly codecs: (format: LibraryFormat) => LibraryCodec;

  constructor(deps: MigrationDependencies = {}) {
    this.locator = deps.locator ?? new FolderFileLocator(deps.scanFolders ?? []);
    this.codecs = deps.codecs ?? codecFor;
  }

  async migrate(
    sourcePath: string,
    targetPath: string,
    sourceFormat: LibraryFormat,
    targetFormat: LibraryFormat,
    options: MigrationOptions = {},
    hooks: JobHooks = {}
  ): Promise<MigrationResult> {
    const settings = MigrationOptionsSchema.parse(options);
    const token = hooks.token ?? CancellationToken.none();

    let lastPercent = 0;
    const report = (percent: number, message: string, current?: number, total?: number) => {
      lastPercent = Math.max(lastPercent, Math.floor(percent));
      hooks.onProgress?.(lastPercent, message, current, total);
    };
    const canceled = (tracks: Track[], phase: MigrationPhase): MigrationResult => {
      log.warn(`Migration canceled during ${phase} (${tracks.length} tracks processed)`);
      return { status: "canceled", tracks, phase };
    };

    log.header(`Migrating ${path.basename(sourcePath)} (${sourceFormat}) -> ${path.basename(targetPath)} (${targetFormat})`);

    if (token.isCancellationRequested) return canceled([], "reading");
    report(PHASE_START.reading, `Reading ${path.basename(sourcePath)}`);
    const source = await this.codecs(sourceFormat).read(sourcePath, { verifyFiles: false });
    const skipped: SkipReason[] = [...source.skipped];
    report(PHASE_START.processing, `Read ${source.tracks.length} tracks`, 0, source.tracks.length);

    const mapCues = cueMapperFor(sourceFormat, targetFormat, settings);
    const total = source.tracks.length;
    const processed: Track[] = [];
    const replacements = new Map<Track, Track>();

    for (let i = 0; i < total; i++) {
      if (token.isCancellationRequested) return canceled(processed, "processing");

      const original = source.tracks[i];
      const resolved = await this.resolveMissing(original, settings, skipped);
      if (resolved) {
        const mapped = mapCues ? mapCues(resolved.cue_points) : resolved.cue_points;
        const track = cloneTrack(resolved, { cue_points: trimCues(mapped, settings.cuePoints) });
        processed.push(track);
        replacements.set(original, track);
      }
      report(
        PHASE_START.processing + (40 * (i + 1)) / total,
        `Processed ${path.basename(original.file_path)}`,
        i + 1,
        total
      );
    }

    if (token.isCancellationRequested) return canceled(processed, "writing");
    report(PHASE_START.writing, `Writing ${path.basename(targetPath)}`, processed.length, processed.length);

    const { playlists, dropped } = remapPlaylists(source.playlists, replacements);
    if (dropped > 0) log.debug(`${dropped} playlist entries referred to skipped tracks`);
    const identities = await this.codecs(targetFormat).write(targetPath, { tracks: processed, playlists });

    report(100, "Migration complete", processed.length, processed.length);
    log.success(`Migrated ${processed.length} of ${total} tracks (${skipped.length} skipped)`);
    return { status: "completed", tracks: processed, skipped, identities };
  }

  private async resolveMissing(
    track: Track,
    settings: ResolvedOptions,
    skipped: SkipReason[]
  ): Promise<Track | undefined> {
    if (await fileIsReadable(track.file_path)) return track;

    if (settings.locateMissing) {
      const found = await this.locator.locate(path.basename(track.file_path));
      if (found) return cloneTrack(track, { file_path: found });
    }

    if (settings.missingFiles === "include") {
      log.warn(`Including missing file: ${track.file_path}`);
      return track;
    }

    log.warn(`Skipping missing file: ${track.file_path}`);
    skipped.push({
      code: "file-missing",
      message: `Referenced file is missing or unreadable: ${track.file_path}`,
      file_path: track.file_path,
    });
    return undefined;
  }
}
