export type CueType = "hot-cue" | "memory-cue" | "loop" | "grid" | "beat";

export interface CueMarker {
  type: CueType;
  start_time_seconds: number;
  label: string;
}

export interface Track {
  file_path: string;
  // identity read from a foreign document; never assigned by writers
  id?: string;
  title: string;
  artist: string;
  album: string;
  genre: string;
  year: string;
  comment: string;
  bpm: number;
  key: string;
  energy: number;
  duration: number;
  is_corrupt: boolean;
  error_message: string;
  cue_points: CueMarker[];
}

export type TrackRecord = {
  id: string;
  file_path: string;
  title: string;
  artist: string;
  album: string;
  genre: string;
  year: string;
  comment: string;
  bpm: number;
  key: string;
  energy: number;
  duration: number;
  is_corrupt: boolean;
  error_message: string;
  cue_count: number;
};

export interface Playlist {
  kind: "playlist";
  name: string;
  tracks: Track[];
}

export interface PlaylistFolder {
  kind: "folder";
  name: string;
  children: PlaylistNode[];
}

export type PlaylistNode = Playlist | PlaylistFolder;

export interface LibraryDocument {
  tracks: Track[];
  playlists: PlaylistNode[];
}

export type SkipCode =
  | "malformed-entry"
  | "file-missing"
  | "missing-path"
  | "unresolved-reference";

export interface SkipReason {
  code: SkipCode;
  message: string;
  // entry position in the source document, 1-based
  entry?: number;
  file_path?: string;
}

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export interface ReadResult extends LibraryDocument {
  skipped: SkipReason[];
}

export interface ReadOptions {
  verifyFiles?: boolean;
}

export type ProgressCallback = (
  percent: number,
  message: string,
  current?: number,
  total?: number
) => void;

export type LibraryFormat = "nml" | "rekordbox-xml" | "csv" | "m3u" | "m3u8";

export interface AnalysisWindow {
  offsetSeconds: number;
  durationSeconds: number;
}
