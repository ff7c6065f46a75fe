export * from "./types";
export * from "./errors";
export { CancellationToken } from "./cancellation";
export type { JobHooks } from "./cancellation";
export { DEFAULT_ANALYSIS_CONFIG, loadConfig } from "./config";
export type { AnalysisConfig, AppConfig } from "./config";
export { createLogger, getLogLevel, setLogLevel } from "./logger";
export type { Logger, LogLevel } from "./logger";
export {
  cloneTrack,
  corruptTrack,
  createTrack,
  filenameStem,
  playbackSource,
  PITCH_CLASSES,
  toRecord,
  UNKNOWN_ALBUM,
  UNKNOWN_ARTIST,
  UNKNOWN_GENRE,
  UNKNOWN_KEY,
} from "./track";
export type { PlaybackSource } from "./track";
export { AudioMetadataResolver, MIN_AUDIO_FILE_BYTES } from "./metadata-resolver";
export type { MetadataResolver, ResolverDependencies } from "./metadata-resolver";
export { containerFor, MusicMetadataTagReader } from "./tag-reader";
export type { ContainerKind, TagData, TagReader } from "./tag-reader";
export { AudioFileDecoder, FlacDecoder, MpegDecoder, WavDecoder } from "./pcm-decoder";
export type { DecodeSpan, PcmAudio, PcmDecoder } from "./pcm-decoder";
export { analysisSpan, estimateEnergy, estimateKey, estimateTempo, excerpt } from "./signal-analysis";
export * from "./formats";
export { toNmlCues, toRekordboxCues } from "./cue-mapping";
export type { ForwardCueOptions, ReverseCueOptions } from "./cue-mapping";
export { convertLibraryFile } from "./format-converter";
export type { ConversionDirection, ConversionOptions, ConversionReport } from "./format-converter";
export { FolderFileLocator } from "./file-locator";
export type { FileLocator } from "./file-locator";
export { MigrationOptionsSchema, MigrationOrchestrator } from "./migration";
export type { MigrationOptions, MigrationPhase, MigrationResult } from "./migration";
export { MusicLibrary, SUPPORTED_EXTENSIONS } from "./music-library";
export type { ScanResult, TrackFilter } from "./music-library";
