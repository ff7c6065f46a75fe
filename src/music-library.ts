import * as fs from "fs";
import * as path from "path";
import { CancellationToken, JobHooks } from "./cancellation";
import { errorMessage, InputMissingError, OperationInProgressError } from "./errors";
import { codecFor, formatFromPath, IdentityMap } from "./formats";
import { AudioMetadataResolver, MetadataResolver, MIN_AUDIO_FILE_BYTES } from "./metadata-resolver";
import { MigrationOptions, MigrationOrchestrator, MigrationResult } from "./migration";
import { createLogger } from "./logger";
import { LibraryFormat, Playlist, PlaylistNode, SkipReason, Track } from "./types";

const log = createLogger("library");

export const SUPPORTED_EXTENSIONS = [".mp3", ".wav", ".flac", ".m4a", ".aac"];

export type ScanResult =
  | { status: "completed"; tracks: Track[] }
  | { status: "canceled"; completed: Track[] };

export interface TrackFilter {
  genre?: string;
  bpmMin?: number;
  bpmMax?: number;
  key?: string;
}

class ScanCanceled extends Error {}

function byPath(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * The in-memory collection: registered scan folders, the tracks of the last
 * completed scan or import, and user playlists. Runs one long operation at a
 * time.
 */
export class MusicLibrary {
  private readonly scanFolders: string[] = [];
  private current: Track[] = [];
  private userPlaylists: PlaylistNode[] = [];
  private running: string | null = null;
  private readonly resolver: MetadataResolver;

  constructor(resolver: MetadataResolver = new AudioMetadataResolver()) {
    this.resolver = resolver;
  }

  get folders(): readonly string[] {
    return this.scanFolders;
  }

  get tracks(): readonly Track[] {
    return this.current;
  }

  get playlists(): readonly PlaylistNode[] {
    return this.userPlaylists;
  }

  addFolder(folderPath: string): void {
    const resolved = path.resolve(folderPath);
    if (!fs.existsSync(resolved) || !fs.statSync(resolved).isDirectory()) {
      log.error(`Folder does not exist: ${resolved}`);
      throw new InputMissingError(resolved, "Folder");
    }
    if (this.scanFolders.includes(resolved)) {
      log.info(`Folder already added: ${resolved}`);
      return;
    }
    this.scanFolders.push(resolved);
    log.info(`Added scan folder: ${resolved}`);
  }

  /**
   * Walks every folder, then resolves each candidate in path order. A
   * canceled scan leaves `tracks` as it was and reports what it finished.
   */
  async scan(hooks: JobHooks = {}): Promise<ScanResult> {
    return this.exclusive("scan", async (): Promise<ScanResult> => {
      const token = hooks.token ?? CancellationToken.none();
      hooks.onProgress?.(0, "Starting file discovery...");

      let candidates: string[];
      try {
        candidates = await this.discover(token, hooks);
      } catch (error) {
        if (error instanceof ScanCanceled) {
          log.warn("Scan canceled during file discovery");
          return { status: "canceled", completed: [] };
        }
        throw error;
      }

      const total = candidates.length;
      log.music(`Found ${total} music files`);
      const completed: Track[] = [];
      for (const filePath of candidates) {
        if (token.isCancellationRequested) {
          log.warn(`Scan canceled after ${completed.length} of ${total} files`);
          return { status: "canceled", completed };
        }
        completed.push(await this.resolver.resolve(filePath));
        const done = completed.length;
        hooks.onProgress?.(Math.floor((done / total) * 100), filePath, done, total);
      }

      this.current = completed;
      const corrupt = completed.filter((track) => track.is_corrupt).length;
      log.stats(`Scanned ${total} files (${corrupt} corrupt)`);
      return { status: "completed", tracks: completed };
    });
  }

  private async discover(token: CancellationToken, hooks: JobHooks): Promise<string[]> {
    const found: string[] = [];
    for (const folder of this.scanFolders) {
      if (token.isCancellationRequested) throw new ScanCanceled();
      log.processing(`Scanning folder: ${folder}`);
      hooks.onProgress?.(0, `Scanning folder: ${folder}`);
      await this.walk(folder, token, found);
    }
    return [...new Set(found)].sort(byPath);
  }

  private async walk(dir: string, token: CancellationToken, found: string[]): Promise<void> {
    if (token.isCancellationRequested) throw new ScanCanceled();

    let entries: fs.Dirent[];
    try {
      entries = await fs.promises.readdir(dir, { withFileTypes: true });
    } catch (error) {
      log.error(`Error scanning ${dir}: ${errorMessage(error)}`, error);
      return;
    }

    for (const entry of entries) {
      if (token.isCancellationRequested) throw new ScanCanceled();
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        await this.walk(fullPath, token, found);
      } else if ((entry.isFile() || entry.isSymbolicLink()) && (await this.isMusicFile(fullPath))) {
        found.push(fullPath);
      }
    }
  }

  private async isMusicFile(filePath: string): Promise<boolean> {
    if (!SUPPORTED_EXTENSIONS.includes(path.extname(filePath).toLowerCase())) return false;
    try {
      // stat follows links, so a link to a directory or a dangling link is not a file
      const stats = await fs.promises.stat(filePath);
      if (!stats.isFile()) return false;
      if (stats.size < MIN_AUDIO_FILE_BYTES) {
        log.debug(`Skipping file (too small): ${filePath}`);
        return false;
      }
      return true;
    } catch (error) {
      log.debug(`Cannot stat ${filePath}: ${errorMessage(error)}`);
      return false;
    }
  }

  filterTracks(filter: TrackFilter = {}): Track[] {
    return this.current.filter((track) => {
      if (filter.genre && track.genre.toLowerCase() !== filter.genre.toLowerCase()) return false;
      if (filter.bpmMin !== undefined && track.bpm < filter.bpmMin) return false;
      if (filter.bpmMax !== undefined && track.bpm > filter.bpmMax) return false;
      if (filter.key && track.key !== filter.key) return false;
      return true;
    });
  }

  /** Drops corrupt tracks from the library and from every playlist. Returns how many went. */
  removeCorrupt(): number {
    const before = this.current.length;
    this.current = this.current.filter((track) => !track.is_corrupt);
    this.userPlaylists = withoutCorrupt(this.userPlaylists);
    const removed = before - this.current.length;
    if (removed > 0) log.info(`Removed ${removed} corrupt tracks`);
    return removed;
  }

  createPlaylist(name: string, tracks: Track[]): Playlist {
    const playlist: Playlist = { kind: "playlist", name, tracks: [...tracks] };
    this.userPlaylists.push(playlist);
    return playlist;
  }

  /** Appends the tracks and playlists of a document. Entries whose file is gone are skipped. */
  async importFrom(filePath: string, format?: LibraryFormat): Promise<SkipReason[]> {
    return this.exclusive("import", async (): Promise<SkipReason[]> => {
      const codec = codecFor(format ?? formatFromPath(filePath));
      const document = await codec.read(filePath);
      this.current = [...this.current, ...document.tracks];
      this.userPlaylists = [...this.userPlaylists, ...document.playlists];
      log.success(`Imported ${document.tracks.length} tracks from ${path.basename(filePath)}`);
      return document.skipped;
    });
  }

  async exportTo(filePath: string, format?: LibraryFormat, playlists?: PlaylistNode[]): Promise<IdentityMap> {
    const codec = codecFor(format ?? formatFromPath(filePath));
    return codec.write(filePath, { tracks: [...this.current], playlists: playlists ?? [...this.userPlaylists] });
  }

  /** Runs a migration that can locate missing files under this library's scan folders. */
  async migrate(
    sourcePath: string,
    targetPath: string,
    options: MigrationOptions = {},
    hooks: JobHooks = {}
  ): Promise<MigrationResult> {
    return this.exclusive("migration", () =>
      new MigrationOrchestrator({ scanFolders: this.scanFolders }).migrate(
        sourcePath,
        targetPath,
        formatFromPath(sourcePath),
        formatFromPath(targetPath),
        options,
        hooks
      )
    );
  }

  private async exclusive<T>(name: string, run: () => Promise<T>): Promise<T> {
    if (this.running) throw new OperationInProgressError(this.running);
    this.running = name;
    try {
      return await run();
    } finally {
      this.running = null;
    }
  }
}

function withoutCorrupt(nodes: PlaylistNode[]): PlaylistNode[] {
  return nodes.map((node): PlaylistNode =>
    node.kind === "folder"
      ? { ...node, children: withoutCorrupt(node.children) }
      : { ...node, tracks: node.tracks.filter((track) => !track.is_corrupt) }
  );
}
