import * as path from "path";
import { CorruptTrackError } from "./errors";
import { CueMarker, Track, TrackRecord } from "./types";

export const UNKNOWN_ARTIST = "Unknown Artist";
export const UNKNOWN_ALBUM = "Unknown Album";
export const UNKNOWN_GENRE = "Unknown Genre";
export const UNKNOWN_KEY = "Unknown";

export const PITCH_CLASSES = [
  "C",
  "C#",
  "D",
  "D#",
  "E",
  "F",
  "F#",
  "G",
  "G#",
  "A",
  "A#",
  "B",
] as const;

export function filenameStem(filePath: string): string {
  const base = path.basename(filePath);
  const ext = path.extname(base);
  return ext ? base.slice(0, -ext.length) : base;
}

function text(value: string | undefined, fallback: string): string {
  if (value === undefined) return fallback;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : fallback;
}

function nonNegative(value: number | undefined): number {
  return value !== undefined && Number.isFinite(value) && value > 0 ? value : 0;
}

function clampEnergy(value: number | undefined): number {
  if (value === undefined || !Number.isFinite(value)) return 0;
  return Math.min(100, Math.max(0, Math.floor(value)));
}

/** Builds a track with every missing field replaced by its default. */
export function createTrack(filePath: string, fields: Partial<Omit<Track, "file_path">> = {}): Track {
  return {
    file_path: filePath,
    id: fields.id,
    title: text(fields.title, filenameStem(filePath)),
    artist: text(fields.artist, UNKNOWN_ARTIST),
    album: text(fields.album, UNKNOWN_ALBUM),
    genre: text(fields.genre, UNKNOWN_GENRE),
    year: text(fields.year, ""),
    comment: text(fields.comment, ""),
    bpm: nonNegative(fields.bpm),
    key: text(fields.key, UNKNOWN_KEY),
    energy: clampEnergy(fields.energy),
    duration: nonNegative(fields.duration),
    is_corrupt: fields.is_corrupt ?? false,
    error_message: fields.error_message ?? "",
    cue_points: (fields.cue_points ?? []).map((cue) => ({ ...cue })),
  };
}

export function corruptTrack(filePath: string, message: string): Track {
  return createTrack(filePath, { is_corrupt: true, error_message: message });
}

export function cloneTrack(track: Track, changes: Partial<Track> = {}): Track {
  const cues: CueMarker[] = (changes.cue_points ?? track.cue_points).map((cue) => ({ ...cue }));
  return { ...track, ...changes, cue_points: cues };
}

export function toRecord(track: Track): TrackRecord {
  return {
    id: track.id ?? "",
    file_path: track.file_path,
    title: track.title,
    artist: track.artist,
    album: track.album,
    genre: track.genre,
    year: track.year,
    comment: track.comment,
    bpm: track.bpm,
    key: track.key,
    energy: track.energy,
    duration: track.duration,
    is_corrupt: track.is_corrupt,
    error_message: track.error_message,
    cue_count: track.cue_points.length,
  };
}

export interface PlaybackSource {
  file_path: string;
  duration: number;
}

/** What the playback collaborator receives. Corrupt tracks are refused. */
export function playbackSource(track: Track): PlaybackSource {
  if (track.is_corrupt) {
    throw new CorruptTrackError(track.file_path, track.error_message || "unreadable");
  }
  return { file_path: track.file_path, duration: track.duration };
}
