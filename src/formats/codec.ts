import * as fs from "fs";
import * as path from "path";
import { DocumentWriteError, errorMessage, InputMissingError } from "../errors";
import { createLogger } from "../logger";
import {
  LibraryDocument,
  LibraryFormat,
  Playlist,
  PlaylistNode,
  ReadOptions,
  ReadResult,
  SkipReason,
  Track,
} from "../types";

const log = createLogger("codec");

/** Assigned target identity per written track. */
export type IdentityMap = Map<Track, string>;

export interface LibraryCodec {
  readonly format: LibraryFormat;
  read(filePath: string, options?: ReadOptions): Promise<ReadResult>;
  write(filePath: string, document: LibraryDocument): Promise<IdentityMap>;
}

async function readDocumentBuffer(filePath: string): Promise<Buffer> {
  try {
    return await fs.promises.readFile(filePath);
  } catch (error) {
    if (isMissing(error)) throw new InputMissingError(filePath, "Document");
    throw error;
  }
}

export async function readDocumentText(filePath: string, encoding: BufferEncoding = "utf-8"): Promise<string> {
  const buffer = await readDocumentBuffer(filePath);
  return buffer.toString(encoding).replace(/^\uFEFF/, "");
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Writes to a sibling temp file and renames it into place, so a failed
 * export never leaves a half-written document behind.
 */
export async function writeDocumentAtomic(filePath: string, content: string | Buffer): Promise<void> {
  const dir = path.dirname(filePath);
  const tempPath = path.join(dir, `.${path.basename(filePath)}.${process.pid}.${Date.now()}.tmp`);
  try {
    await fs.promises.writeFile(tempPath, content);
    await fs.promises.rename(tempPath, filePath);
  } catch (error) {
    await fs.promises.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
      log.debug(`Could not remove temp file ${tempPath}: ${errorMessage(cleanupError)}`);
    });
    throw new DocumentWriteError(filePath, errorMessage(error), { cause: error });
  }
}

export async function fileIsReadable(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath, fs.constants.R_OK);
    const stats = await fs.promises.stat(filePath);
    return stats.isFile();
  } catch {
    return false;
  }
}

/**
 * Drops entries whose audio file is gone when verification is on. Each drop
 * is logged and reported; the remaining entries keep their order.
 */
export async function verifyTrackFiles(
  tracks: Track[],
  options: ReadOptions | undefined,
  skipped: SkipReason[]
): Promise<Track[]> {
  if (options?.verifyFiles === false) return tracks;
  const kept: Track[] = [];
  for (const track of tracks) {
    if (await fileIsReadable(track.file_path)) {
      kept.push(track);
    } else {
      log.warn(`Skipping missing or unreadable file: ${track.file_path}`);
      skipped.push({
        code: "file-missing",
        message: `Referenced file is missing or unreadable: ${track.file_path}`,
        file_path: track.file_path,
      });
    }
  }
  return kept;
}

/** Removes playlist references to tracks that did not survive the read. */
export function prunePlaylists(nodes: PlaylistNode[], surviving: Set<Track>): PlaylistNode[] {
  return nodes.map((node): PlaylistNode => {
    if (node.kind === "folder") {
      return { ...node, children: prunePlaylists(node.children, surviving) };
    }
    return { ...node, tracks: node.tracks.filter((track) => surviving.has(track)) };
  });
}

export function flattenPlaylists(nodes: PlaylistNode[]): Playlist[] {
  const result: Playlist[] = [];
  for (const node of nodes) {
    if (node.kind === "playlist") result.push(node);
    else result.push(...flattenPlaylists(node.children));
  }
  return result;
}

export function countPlaylists(nodes: PlaylistNode[]): number {
  return flattenPlaylists(nodes).length;
}
