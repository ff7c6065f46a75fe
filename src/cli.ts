#!/usr/bin/env node

import dotenv from "dotenv";
dotenv.config();

import * as path from "path";
import { CancellationToken } from "./cancellation";
import { loadConfig } from "./config";
import { errorMessage } from "./errors";
import { convertLibraryFile, ConversionDirection } from "./format-converter";
import { codecFor, countPlaylists, formatFromPath } from "./formats";
import { createLogger, setLogLevel } from "./logger";
import { AudioMetadataResolver } from "./metadata-resolver";
import { MigrationOptions, MigrationOrchestrator } from "./migration";
import { MusicLibrary } from "./music-library";
import { ProgressCallback } from "./types";

const log = createLogger("djlib");

const USAGE = `
djlib - DJ library scanner and format converter

Usage:
  djlib scan [folder...] [--out <file>]
  djlib convert <source> <target> [--hot-to-memory] [--memory-to-hot]
  djlib migrate <source> <target> [options]
  djlib inspect <document>

Formats are picked by extension: .nml, .xml (rekordbox), .csv, .m3u, .m3u8

Migrate options:
  --cues <all|first-8|none>     Cue points to keep (default: all)
  --missing <skip|include>      What to do with tracks whose file is gone (default: skip)
  --locate                      Search the scan folders for missing files by name
  --folder <path>               Extra scan folder to search (repeatable)
  --hot-to-memory               NML -> rekordbox: also store the first hot cue as a memory cue
  --memory-to-hot               rekordbox -> NML: keep memory cues as hot cues

Environment:
  DJLIB_SCAN_FOLDERS, DJLIB_LOG_LEVEL, DJLIB_MAX_DECODE_MB, DJLIB_*_WINDOW (see .env.example)

Examples:
  djlib scan ~/Music --out library.nml
  djlib convert collection.nml rekordbox.xml --hot-to-memory
  djlib migrate library.csv collection.nml --locate --cues first-8
`;

export type CliCommand =
  | { command: "help" }
  | { command: "scan"; folders: string[]; out?: string }
  | { command: "convert"; source: string; target: string; hotToMemory: boolean; memoryToHot: boolean }
  | { command: "migrate"; source: string; target: string; folders: string[]; options: MigrationOptions }
  | { command: "inspect"; document: string };

export class UsageError extends Error {}

function requireValue(args: string[], i: number, flag: string): string {
  const value = args[i];
  if (value === undefined || value.startsWith("--")) throw new UsageError(`${flag} needs a value`);
  return value;
}

function oneOf<T extends string>(value: string, allowed: readonly T[], flag: string): T {
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) throw new UsageError(`${flag} must be one of ${allowed.join(", ")}`);
  return match;
}

export function parseArgs(argv: string[]): CliCommand {
  const [command, ...args] = argv;
  if (command === undefined || command === "--help" || command === "help") return { command: "help" };

  const positional: string[] = [];
  const folders: string[] = [];
  const options: MigrationOptions = {};
  let out: string | undefined;
  let hotToMemory = false;
  let memoryToHot = false;

  for (let i = 0; i < args.length; i++) {
    switch (args[i]) {
      case "--help":
        return { command: "help" };
      case "--out":
        out = requireValue(args, ++i, "--out");
        break;
      case "--cues":
        options.cuePoints = oneOf<"all" | "first-8" | "none">(requireValue(args, ++i, "--cues"), ["all", "first-8", "none"], "--cues");
        break;
      case "--missing":
        options.missingFiles = oneOf<"skip" | "include">(requireValue(args, ++i, "--missing"), ["skip", "include"], "--missing");
        break;
      case "--locate":
        options.locateMissing = true;
        break;
      case "--folder":
        folders.push(requireValue(args, ++i, "--folder"));
        break;
      case "--hot-to-memory":
        hotToMemory = true;
        break;
      case "--memory-to-hot":
        memoryToHot = true;
        break;
      default:
        if (args[i].startsWith("--")) throw new UsageError(`Unknown option ${args[i]}`);
        positional.push(args[i]);
    }
  }

  switch (command) {
    case "scan":
      return { command: "scan", folders: positional, out };
    case "convert":
      if (positional.length !== 2) throw new UsageError("convert needs <source> <target>");
      return { command: "convert", source: positional[0], target: positional[1], hotToMemory, memoryToHot };
    case "migrate":
      if (positional.length !== 2) throw new UsageError("migrate needs <source> <target>");
      return {
        command: "migrate",
        source: positional[0],
        target: positional[1],
        folders,
        options: { ...options, mapFirstHotCueToMemory: hotToMemory, mapMemoryToHotCue: memoryToHot },
      };
    case "inspect":
      if (positional.length !== 1) throw new UsageError("inspect needs <document>");
      return { command: "inspect", document: positional[0] };
    default:
      throw new UsageError(`Unknown command ${command}`);
  }
}

export function conversionDirection(source: string, target: string): ConversionDirection {
  const from = formatFromPath(source);
  const to = formatFromPath(target);
  if (from === "nml" && to === "rekordbox-xml") return "nml-to-rekordbox";
  if (from === "rekordbox-xml" && to === "nml") return "rekordbox-to-nml";
  throw new UsageError(`convert goes between .nml and .xml; use migrate for ${from} -> ${to}`);
}

// Ctrl+C once asks the running job to stop after the current file, twice quits
function cancelOnInterrupt(): CancellationToken {
  const token = new CancellationToken();
  process.once("SIGINT", () => {
    log.warn("Received cancellation signal (Ctrl+C), finishing current file...");
    token.cancel();
    process.once("SIGINT", () => {
      log.error("Force quitting...");
      process.exit(130);
    });
  });
  return token;
}

function progressLine(): ProgressCallback {
  let last = -1;
  return (percent, message, current, total) => {
    if (percent === last) return;
    last = percent;
    const counter = current !== undefined && total !== undefined ? ` (${current}/${total})` : "";
    log.processing(`${percent}%${counter} ${message}`);
  };
}

async function main(): Promise<void> {
  let parsed: CliCommand;
  try {
    parsed = parseArgs(process.argv.slice(2));
  } catch (error) {
    log.error(errorMessage(error));
    console.log(USAGE);
    process.exit(2);
  }

  const config = loadConfig();
  setLogLevel(config.logLevel);

  switch (parsed.command) {
    case "help":
      console.log(USAGE);
      return;

    case "scan": {
      const library = new MusicLibrary(new AudioMetadataResolver({ analysis: config.analysis }));
      const folders = parsed.folders.length > 0 ? parsed.folders : config.scanFolders;
      if (folders.length === 0) throw new UsageError("No folders to scan (pass some or set DJLIB_SCAN_FOLDERS)");
      folders.forEach((folder) => library.addFolder(folder));

      log.header(`Scanning ${folders.length} folders`);
      const result = await library.scan({ token: cancelOnInterrupt(), onProgress: progressLine() });
      if (result.status === "canceled") {
        log.warn(`Scan canceled; ${result.completed.length} files were processed and discarded`);
        process.exitCode = 130;
        return;
      }
      if (parsed.out) {
        await library.exportTo(path.resolve(parsed.out));
        log.success(`Wrote ${result.tracks.length} tracks to ${parsed.out}`);
      } else {
        console.table(result.tracks.map((track) => ({
          title: track.title,
          artist: track.artist,
          bpm: track.bpm,
          key: track.key,
          energy: track.energy,
          corrupt: track.is_corrupt,
        })));
      }
      return;
    }

    case "convert": {
      const report = await convertLibraryFile(
        path.resolve(parsed.source),
        path.resolve(parsed.target),
        conversionDirection(parsed.source, parsed.target),
        { mapFirstHotCueToMemory: parsed.hotToMemory, mapMemoryToHotCue: parsed.memoryToHot }
      );
      log.stats(`${report.tracks} tracks, ${report.playlists} playlists, ${report.skipped.length} skipped`);
      return;
    }

    case "migrate": {
      const orchestrator = new MigrationOrchestrator({
        scanFolders: [...config.scanFolders, ...parsed.folders].map((folder) => path.resolve(folder)),
      });
      const result = await orchestrator.migrate(
        path.resolve(parsed.source),
        path.resolve(parsed.target),
        formatFromPath(parsed.source),
        formatFromPath(parsed.target),
        parsed.options,
        { token: cancelOnInterrupt(), onProgress: progressLine() }
      );
      if (result.status === "canceled") {
        log.warn(`Migration canceled while ${result.phase}; nothing was written`);
        process.exitCode = 130;
        return;
      }
      for (const skip of result.skipped) log.warn(`[${skip.code}] ${skip.message}`);
      return;
    }

    case "inspect": {
      const document = await codecFor(formatFromPath(parsed.document)).read(path.resolve(parsed.document));
      log.stats(
        `${document.tracks.length} tracks, ${countPlaylists(document.playlists)} playlists, ${document.skipped.length} skipped`
      );
      for (const skip of document.skipped) {
        log.warn(`[${skip.code}]${skip.entry !== undefined ? ` entry ${skip.entry}:` : ""} ${skip.message}`);
      }
      return;
    }
  }
}

if (require.main === module) {
  main().catch((error: unknown) => {
    log.error(errorMessage(error), error);
    process.exit(1);
  });
}
