import * as fs from "fs";
import { AnalysisConfig, DEFAULT_ANALYSIS_CONFIG } from "./config";
import { CorruptMediaError, errorMessage } from "./errors";
import { createLogger } from "./logger";
import { AudioFileDecoder, PcmAudio, PcmDecoder } from "./pcm-decoder";
import { analysisSpan, estimateEnergy, estimateKey, estimateTempo, excerpt } from "./signal-analysis";
import { MusicMetadataTagReader, TagData, TagReader } from "./tag-reader";
import { corruptTrack, createTrack, UNKNOWN_KEY } from "./track";
import { Track } from "./types";

const log = createLogger("resolver");

export const MIN_AUDIO_FILE_BYTES = 1024;

export interface MetadataResolver {
  resolve(filePath: string): Promise<Track>;
}

export interface ResolverDependencies {
  tagReader?: TagReader;
  decoder?: PcmDecoder;
  analysis?: AnalysisConfig;
}

function hasUsableKey(key: string | undefined): key is string {
  return key !== undefined && key.trim() !== "" && key.trim() !== UNKNOWN_KEY;
}

/**
 * Produces a Track for one file. Never rejects: unreadable or malformed media
 * comes back as a corrupt track, failed analysis leaves the field at its
 * unknown default.
 */
export class AudioMetadataResolver implements MetadataResolver {
  private readonly tagReader: TagReader;
  private readonly decoder: PcmDecoder;
  private readonly analysis: AnalysisConfig;

  constructor(deps: ResolverDependencies = {}) {
    this.analysis = deps.analysis ?? DEFAULT_ANALYSIS_CONFIG;
    this.tagReader = deps.tagReader ?? new MusicMetadataTagReader();
    this.decoder = deps.decoder ?? new AudioFileDecoder(this.analysis.maxDecodeBytes);
  }

  async resolve(filePath: string): Promise<Track> {
    try {
      const rejection = await this.cheapChecks(filePath);
      if (rejection) {
        log.warn(`${rejection}: ${filePath}`);
        return corruptTrack(filePath, rejection);
      }

      let tags: TagData;
      try {
        tags = await this.tagReader.read(filePath);
      } catch (error) {
        if (error instanceof CorruptMediaError) {
          log.warn(`${error.message} (${filePath})`);
          return corruptTrack(filePath, error.message);
        }
        throw error;
      }

      const track = createTrack(filePath, tags);
      await this.analyse(track, tags);
      log.debug(`Resolved ${filePath}: '${track.title}' by '${track.artist}', BPM=${track.bpm}`);
      return track;
    } catch (error) {
      log.error(`Error loading metadata for ${filePath}: ${errorMessage(error)}`, error);
      return corruptTrack(filePath, errorMessage(error));
    }
  }

  private async cheapChecks(filePath: string): Promise<string | null> {
    let size: number;
    try {
      const stats = await fs.promises.stat(filePath);
      if (!stats.isFile()) return "Not a regular file";
      size = stats.size;
    } catch {
      return "File does not exist";
    }

    try {
      await fs.promises.access(filePath, fs.constants.R_OK);
    } catch {
      return "File is not readable";
    }

    if (size < MIN_AUDIO_FILE_BYTES) {
      return `File is too small (${size} bytes)`;
    }
    return null;
  }

  private async analyse(track: Track, tags: TagData): Promise<void> {
    const needsBpm = !(tags.bpm !== undefined && tags.bpm > 0);
    const needsKey = !hasUsableKey(tags.key);

    const { tempoWindow, keyWindow, energyWindow } = this.analysis;
    const knownLength = tags.duration !== undefined && tags.duration > 0 ? tags.duration : undefined;

    let audio: PcmAudio | null = null;
    let decodeFailure = "";
    try {
      audio = await this.decoder.decode(track.file_path, analysisSpan([tempoWindow, keyWindow, energyWindow], knownLength));
    } catch (error) {
      decodeFailure = errorMessage(error);
    }
    // without a tag duration the decoded end stands in for the file length
    const totalSeconds = knownLength ?? (audio ? audio.startSeconds + audio.samples.length / audio.sampleRate : 0);

    if (needsBpm) {
      track.bpm = this.measure("BPM", track.file_path, decodeFailure, 0, () => {
        if (!audio) return 0;
        return estimateTempo(excerpt(audio, tempoWindow, totalSeconds), audio.sampleRate);
      });
    }

    if (needsKey) {
      track.key = this.measure("key", track.file_path, decodeFailure, UNKNOWN_KEY, () => {
        if (!audio) return UNKNOWN_KEY;
        return estimateKey(excerpt(audio, keyWindow, totalSeconds), audio.sampleRate);
      });
    }

    track.energy = this.measure("energy", track.file_path, decodeFailure, 0, () => {
      if (!audio) return 0;
      return estimateEnergy(excerpt(audio, energyWindow, totalSeconds));
    });
  }

  private measure<T>(field: string, filePath: string, decodeFailure: string, fallback: T, run: () => T): T {
    if (decodeFailure) {
      log.debug(`Skipping ${field} analysis for ${filePath}: ${decodeFailure}`);
      return fallback;
    }
    try {
      return run();
    } catch (error) {
      log.warn(`Could not calculate ${field} for ${filePath}: ${errorMessage(error)}`);
      return fallback;
    }
  }
}
