import { CueMarker } from "./types";

export interface ForwardCueOptions {
  mapFirstHotCueToMemory?: boolean;
}

export interface ReverseCueOptions {
  mapMemoryToHotCue?: boolean;
}

export const GRID_LABEL = "Grid";

function trailingNumber(label: string): number | undefined {
  const match = /(\d+)\s*$/.exec(label);
  return match ? Number(match[1]) : undefined;
}

// markers are compared at millisecond precision, the resolution both formats write
function samePosition(a: number, b: number): boolean {
  return Math.round(a * 1000) === Math.round(b * 1000);
}

/**
 * NML cues to rekordbox position marks.
 *
 * Hot cues stay hot cues. With `mapFirstHotCueToMemory` the first hot cue of
 * the track is also emitted, ahead of it, as a memory cue named
 * "Memory <n+1>". Loops keep their name; grid and beat markers both become
 * grid marks labelled "Grid".
 */
export function toRekordboxCues(cues: CueMarker[], options: ForwardCueOptions = {}): CueMarker[] {
  const result: CueMarker[] = [];
  let firstHotCueSeen = false;

  for (const cue of cues) {
    switch (cue.type) {
      case "hot-cue":
        if (options.mapFirstHotCueToMemory && !firstHotCueSeen) {
          result.push({
            type: "memory-cue",
            start_time_seconds: cue.start_time_seconds,
            label: `Memory ${(trailingNumber(cue.label) ?? 0) + 1}`,
          });
        }
        firstHotCueSeen = true;
        result.push({ ...cue });
        break;
      case "loop":
        result.push({ ...cue });
        break;
      case "grid":
      case "beat":
        result.push({ type: "grid", start_time_seconds: cue.start_time_seconds, label: GRID_LABEL });
        break;
      case "memory-cue":
        // NML never produces these; pass through untouched
        result.push({ ...cue });
        break;
    }
  }
  return result;
}

/**
 * rekordbox position marks to NML cues.
 *
 * Memory cues have no NML counterpart and are dropped unless
 * `mapMemoryToHotCue` is set. Even then a memory cue sitting on an existing
 * hot cue is dropped: it is the duplicate the forward mapping created.
 */
export function toNmlCues(cues: CueMarker[], options: ReverseCueOptions = {}): CueMarker[] {
  const hotCueStarts = cues.filter((cue) => cue.type === "hot-cue").map((cue) => cue.start_time_seconds);
  const result: CueMarker[] = [];

  for (const cue of cues) {
    switch (cue.type) {
      case "hot-cue":
      case "loop":
        result.push({ ...cue });
        break;
      case "grid":
        result.push({ type: "grid", start_time_seconds: cue.start_time_seconds, label: GRID_LABEL });
        break;
      case "beat":
        result.push({ ...cue });
        break;
      case "memory-cue": {
        if (!options.mapMemoryToHotCue) break;
        if (hotCueStarts.some((start) => samePosition(start, cue.start_time_seconds))) break;
        const number = trailingNumber(cue.label);
        result.push({
          type: "hot-cue",
          start_time_seconds: cue.start_time_seconds,
          label: number !== undefined ? `Hot Cue ${number}` : cue.label || "Hot Cue",
        });
        break;
      }
    }
  }
  return result;
}
