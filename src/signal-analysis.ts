import { AnalysisError } from "./errors";
import type { DecodeSpan, PcmAudio } from "./pcm-decoder";
import { PITCH_CLASSES } from "./track";
import { AnalysisWindow } from "./types";

export type Samples = Float32Array | Float64Array;

const TEMPO_HOP = 512;
const MIN_BPM = 60;
const MAX_BPM = 200;
const PRIOR_BPM = 120;

const KEY_BLOCK = 4096;
const LOWEST_NOTE = 36; // C2
const HIGHEST_NOTE = 95; // B6

const ENERGY_FRAME = 2048;
const ENERGY_HOP = 512;

// Krumhansl-Schmuckler key profiles, index 0 = tonic
const MAJOR_PROFILE = [6.35, 2.23, 3.48, 2.33, 4.38, 4.09, 2.52, 5.19, 2.39, 3.66, 2.29, 2.88];
const MINOR_PROFILE = [6.33, 2.68, 3.52, 5.38, 2.6, 3.53, 2.54, 4.75, 3.98, 2.69, 3.34, 3.17];

/**
 * The span to decode for `windows`: from the earliest offset to the furthest
 * window end, or the whole file when it ends before that.
 */
export function analysisSpan(windows: readonly AnalysisWindow[], totalSeconds?: number): DecodeSpan {
  const end = Math.max(0, ...windows.map((window) => window.offsetSeconds + window.durationSeconds));
  if (totalSeconds === undefined || totalSeconds <= 0) return { startSeconds: 0, endSeconds: end };
  if (totalSeconds < end) return { startSeconds: 0, endSeconds: totalSeconds };
  const start = windows.length > 0 ? Math.min(...windows.map((window) => window.offsetSeconds)) : 0;
  return { startSeconds: start, endSeconds: end };
}

/**
 * The samples `window` covers in a file `totalSeconds` long. When the file is
 * shorter than offset + duration the window starts at the file start instead.
 */
export function excerpt(audio: PcmAudio, window: AnalysisWindow, totalSeconds: number): Samples {
  const fileStart = window.offsetSeconds + window.durationSeconds > totalSeconds ? 0 : window.offsetSeconds;
  const start = Math.max(0, Math.round(fileStart * audio.sampleRate) - Math.round(audio.startSeconds * audio.sampleRate));
  const end = Math.min(audio.samples.length, start + Math.floor(window.durationSeconds * audio.sampleRate));
  return audio.samples.subarray(Math.min(start, end), end);
}

function onsetEnvelope(samples: Samples): number[] {
  const frames = Math.floor(samples.length / TEMPO_HOP);
  const onsets: number[] = new Array(frames);
  let previous = 0;
  for (let f = 0; f < frames; f++) {
    let energy = 0;
    const base = f * TEMPO_HOP;
    for (let i = 0; i < TEMPO_HOP; i++) {
      const x = samples[base + i];
      energy += x * x;
    }
    onsets[f] = Math.max(0, energy - previous);
    previous = energy;
  }
  return onsets;
}

function autocorrelation(values: number[], lag: number): number {
  const n = values.length - lag;
  if (lag < 1 || n <= 0) return 0;
  let sum = 0;
  for (let i = 0; i < n; i++) sum += values[i] * values[i + lag];
  return sum / n;
}

/**
 * Tempo in BPM (one decimal) from the autocorrelation of the onset envelope,
 * weighted by a log-normal prior around 120 BPM.
 */
export function estimateTempo(samples: Samples, sampleRate: number): number {
  const onsets = onsetEnvelope(samples);
  if (onsets.length < 4 || !onsets.some((value) => value > 0)) {
    throw new AnalysisError("No rhythmic content in excerpt");
  }

  const framesPerSecond = sampleRate / TEMPO_HOP;
  const minLag = Math.max(1, Math.ceil((framesPerSecond * 60) / MAX_BPM));
  const maxLag = Math.min(onsets.length - 1, Math.floor((framesPerSecond * 60) / MIN_BPM));
  if (maxLag < minLag) {
    throw new AnalysisError("Excerpt too short for tempo estimation");
  }

  let bestLag = -1;
  let bestScore = 0;
  for (let lag = minLag; lag <= maxLag; lag++) {
    const bpm = (60 * framesPerSecond) / lag;
    const octaves = Math.log2(bpm / PRIOR_BPM);
    const score = autocorrelation(onsets, lag) * Math.exp(-0.5 * octaves * octaves);
    if (score > bestScore) {
      bestScore = score;
      bestLag = lag;
    }
  }
  if (bestLag < 0) {
    throw new AnalysisError("No periodicity found in excerpt");
  }

  // parabolic refinement around the peak
  const left = autocorrelation(onsets, bestLag - 1);
  const centre = autocorrelation(onsets, bestLag);
  const right = autocorrelation(onsets, bestLag + 1);
  const denominator = left - 2 * centre + right;
  let delta = denominator !== 0 ? (0.5 * (left - right)) / denominator : 0;
  delta = Math.max(-0.5, Math.min(0.5, delta));

  const bpm = (60 * framesPerSecond) / (bestLag + delta);
  return Math.round(bpm * 10) / 10;
}

function goertzelPower(block: Float64Array, coefficient: number): number {
  let s1 = 0;
  let s2 = 0;
  for (let i = 0; i < block.length; i++) {
    const s = block[i] + coefficient * s1 - s2;
    s2 = s1;
    s1 = s;
  }
  return s1 * s1 + s2 * s2 - coefficient * s1 * s2;
}

export function chromagram(samples: Samples, sampleRate: number): number[] {
  const chroma = new Array<number>(12).fill(0);
  const window = new Float64Array(KEY_BLOCK);
  for (let i = 0; i < KEY_BLOCK; i++) {
    window[i] = 0.5 - 0.5 * Math.cos((2 * Math.PI * i) / (KEY_BLOCK - 1));
  }

  const notes: { pitchClass: number; coefficient: number }[] = [];
  for (let midi = LOWEST_NOTE; midi <= HIGHEST_NOTE; midi++) {
    const frequency = 440 * Math.pow(2, (midi - 69) / 12);
    if (frequency >= sampleRate / 2) break;
    notes.push({
      pitchClass: midi % 12,
      coefficient: 2 * Math.cos((2 * Math.PI * frequency) / sampleRate),
    });
  }

  const block = new Float64Array(KEY_BLOCK);
  for (let start = 0; start + KEY_BLOCK <= samples.length; start += KEY_BLOCK) {
    for (let i = 0; i < KEY_BLOCK; i++) block[i] = samples[start + i] * window[i];
    for (const note of notes) {
      chroma[note.pitchClass] += goertzelPower(block, note.coefficient);
    }
  }
  return chroma;
}

function pearson(a: number[], b: number[]): number {
  const n = a.length;
  const meanA = a.reduce((sum, v) => sum + v, 0) / n;
  const meanB = b.reduce((sum, v) => sum + v, 0) / n;
  let covariance = 0;
  let varianceA = 0;
  let varianceB = 0;
  for (let i = 0; i < n; i++) {
    const da = a[i] - meanA;
    const db = b[i] - meanB;
    covariance += da * db;
    varianceA += da * da;
    varianceB += db * db;
  }
  if (varianceA === 0 || varianceB === 0) return 0;
  return covariance / Math.sqrt(varianceA * varianceB);
}

/** Tonic pitch-class name of the best matching major or minor key. */
export function estimateKey(samples: Samples, sampleRate: number): string {
  if (samples.length < KEY_BLOCK) {
    throw new AnalysisError("Excerpt too short for key estimation");
  }
  const chroma = chromagram(samples, sampleRate);
  const total = chroma.reduce((sum, v) => sum + v, 0);
  if (!(total > 1e-9) || chroma.every((v) => v === chroma[0])) {
    throw new AnalysisError("No tonal content in excerpt");
  }

  let bestTonic = -1;
  let bestCorrelation = -Infinity;
  for (let tonic = 0; tonic < 12; tonic++) {
    for (const profile of [MAJOR_PROFILE, MINOR_PROFILE]) {
      const rotated = chroma.map((_, pc) => profile[(pc - tonic + 12) % 12]);
      const correlation = pearson(chroma, rotated);
      if (correlation > bestCorrelation) {
        bestCorrelation = correlation;
        bestTonic = tonic;
      }
    }
  }
  return PITCH_CLASSES[bestTonic];
}

/** Mean short-time RMS scaled to an integer 0-100. */
export function estimateEnergy(samples: Samples): number {
  if (samples.length === 0) {
    throw new AnalysisError("Empty excerpt");
  }
  const frameLength = Math.min(ENERGY_FRAME, samples.length);
  const frames = 1 + Math.floor((samples.length - frameLength) / ENERGY_HOP);

  let rmsSum = 0;
  for (let f = 0; f < frames; f++) {
    const base = f * ENERGY_HOP;
    let sumSquares = 0;
    for (let i = 0; i < frameLength; i++) {
      const x = samples[base + i];
      sumSquares += x * x;
    }
    rmsSum += Math.sqrt(sumSquares / frameLength);
  }
  const energy = Math.floor((rmsSum / frames) * 100);
  return Math.min(100, Math.max(0, energy));
}
