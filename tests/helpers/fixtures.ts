import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { WaveFile } from "wavefile";

export function makeTempDir(prefix = "djlib-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/** Writes `size` bytes of zeros, creating parent directories. */
export function writeBytes(filePath: string, size = 2048): string {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, Buffer.alloc(size));
  return filePath;
}

export function writeText(filePath: string, text: string): string {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, text, "utf-8");
  return filePath;
}

function toInt16(value: number): number {
  return Math.round(Math.max(-1, Math.min(1, value)) * 32767);
}

/** Mono 16-bit WAV from samples in [-1, 1]. */
export function writeWav(filePath: string, samples: ArrayLike<number>, sampleRate: number): string {
  const ints = Int16Array.from(samples, toInt16);
  const wav = new WaveFile();
  wav.fromScratch(1, sampleRate, "16", ints);
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, wav.toBuffer());
  return filePath;
}

function crc8(bytes: Uint8Array): number {
  let crc = 0;
  for (const byte of bytes) {
    crc ^= byte;
    for (let bit = 0; bit < 8; bit++) crc = crc & 0x80 ? ((crc << 1) ^ 0x07) & 0xff : (crc << 1) & 0xff;
  }
  return crc;
}

function crc16(bytes: Uint8Array): number {
  let crc = 0;
  for (const byte of bytes) {
    crc ^= byte << 8;
    for (let bit = 0; bit < 8; bit++) crc = crc & 0x8000 ? ((crc << 1) ^ 0x8005) & 0xffff : (crc << 1) & 0xffff;
  }
  return crc;
}

export const FLAC_SAMPLE_RATE = 16000;
export const FLAC_BLOCK_SIZE = 4096;

/**
 * Mono 16-bit FLAC at 16 kHz, stored in verbatim subframes. The sample count
 * must be a whole number of 4096-sample blocks, at most 127 of them.
 */
export function writeFlac(filePath: string, samples: ArrayLike<number>): string {
  const blocks = samples.length / FLAC_BLOCK_SIZE;
  if (!Number.isInteger(blocks) || blocks < 1 || blocks > 127) {
    throw new Error(`writeFlac needs 1-127 blocks of ${FLAC_BLOCK_SIZE} samples`);
  }

  const info = Buffer.alloc(34);
  info.writeUInt16BE(FLAC_BLOCK_SIZE, 0);
  info.writeUInt16BE(FLAC_BLOCK_SIZE, 2);
  // frame sizes (bytes 4-9) and MD5 (bytes 18-33) stay zero: unknown
  info.writeUInt8(FLAC_SAMPLE_RATE >>> 12, 10);
  info.writeUInt8((FLAC_SAMPLE_RATE >>> 4) & 0xff, 11);
  info.writeUInt8((FLAC_SAMPLE_RATE & 0x0f) << 4, 12); // then 1 channel, 16 bits per sample
  info.writeUInt8(0xf0, 13);
  info.writeUInt32BE(samples.length, 14);

  const parts: Buffer[] = [Buffer.from("fLaC", "ascii"), Buffer.from([0x80, 0, 0, info.length]), info];
  for (let n = 0; n < blocks; n++) {
    // fixed blocking, 4096-sample blocks, 16 kHz, mono, 16-bit, frame number n
    const header = Buffer.from([0xff, 0xf8, 0xc5, 0x08, n]);
    const body = Buffer.alloc(1 + FLAC_BLOCK_SIZE * 2);
    body.writeUInt8(0x02, 0); // verbatim subframe
    for (let i = 0; i < FLAC_BLOCK_SIZE; i++) {
      body.writeInt16BE(toInt16(samples[n * FLAC_BLOCK_SIZE + i]), 1 + i * 2);
    }
    const frame = Buffer.concat([header, Buffer.from([crc8(header)]), body]);
    const footer = Buffer.alloc(2);
    footer.writeUInt16BE(crc16(frame), 0);
    parts.push(frame, footer);
  }

  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, Buffer.concat(parts));
  return filePath;
}

/** A click of 64 full-scale samples every `interval` samples. */
export function clickTrack(length: number, interval: number): Float32Array {
  const samples = new Float32Array(length);
  for (let start = 0; start < length; start += interval) {
    for (let i = 0; i < 64 && start + i < length; i++) samples[start + i] = 1;
  }
  return samples;
}

export function sineMix(frequencies: number[], amplitude: number, sampleRate: number, seconds: number): Float32Array {
  const samples = new Float32Array(Math.round(sampleRate * seconds));
  for (let i = 0; i < samples.length; i++) {
    let value = 0;
    for (const frequency of frequencies) value += amplitude * Math.sin((2 * Math.PI * frequency * i) / sampleRate);
    samples[i] = value;
  }
  return samples;
}
