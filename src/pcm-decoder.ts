import * as fs from "fs";
import type { FileHandle } from "fs/promises";
import * as path from "path";
import { FLACDecoder } from "@wasm-audio-decoders/flac";
import { MPEGDecoder } from "mpg123-decoder";
import { WaveFile } from "wavefile";
import { z } from "zod";
import { AnalysisError, errorMessage } from "./errors";
import { containerFor } from "./tag-reader";

export interface PcmAudio {
  // mono, normalised to [-1, 1]
  samples: Float32Array;
  sampleRate: number;
  // file position of samples[0]
  startSeconds: number;
}

/** The part of a file to decode, in seconds from its start. */
export interface DecodeSpan {
  startSeconds: number;
  endSeconds: number;
}

export interface PcmDecoder {
  decode(filePath: string, span: DecodeSpan): Promise<PcmAudio>;
}

const RIFF_HEADER_BYTES = 12;
const CHUNK_HEADER_BYTES = 8;
const STREAM_CHUNK_BYTES = 64 * 1024;

const WavFormatSchema = z.object({
  numChannels: z.number().int().positive(),
  sampleRate: z.number().positive(),
});

function frameRange(span: DecodeSpan, sampleRate: number): [number, number] {
  return [Math.round(span.startSeconds * sampleRate), Math.round(span.endSeconds * sampleRate)];
}

function downmix(channels: readonly ArrayLike<number>[], from: number, to: number): Float32Array {
  const mono = new Float32Array(Math.max(0, to - from));
  for (let i = 0; i < mono.length; i++) {
    let sum = 0;
    for (const channel of channels) sum += channel[from + i];
    mono[i] = sum / channels.length;
  }
  return mono;
}

async function checkSize(filePath: string, maxDecodeBytes: number): Promise<number> {
  const stats = await fs.promises.stat(filePath);
  if (stats.size > maxDecodeBytes) {
    throw new AnalysisError(`File too large to decode for analysis (${stats.size} bytes > ${maxDecodeBytes})`);
  }
  return stats.size;
}

async function readBytes(handle: FileHandle, position: number, length: number): Promise<Buffer> {
  const buffer = Buffer.alloc(length);
  const { bytesRead } = await handle.read(buffer, 0, length, position);
  return buffer.subarray(0, bytesRead);
}

interface WavLayout {
  // the whole fmt chunk, header included
  fmt: Buffer;
  sampleRate: number;
  blockAlign: number;
  dataOffset: number;
  dataBytes: number;
}

async function readWavLayout(handle: FileHandle, fileSize: number): Promise<WavLayout> {
  const riff = await readBytes(handle, 0, RIFF_HEADER_BYTES);
  if (riff.length < RIFF_HEADER_BYTES || riff.toString("ascii", 0, 4) !== "RIFF" || riff.toString("ascii", 8, 12) !== "WAVE") {
    throw new Error("Not a RIFF/WAVE file");
  }

  let fmt: Buffer | undefined;
  let position = RIFF_HEADER_BYTES;
  while (position + CHUNK_HEADER_BYTES <= fileSize) {
    const header = await readBytes(handle, position, CHUNK_HEADER_BYTES);
    const id = header.toString("ascii", 0, 4);
    const size = header.readUInt32LE(4);
    if (id === "fmt ") {
      fmt = await readBytes(handle, position, CHUNK_HEADER_BYTES + Math.min(size, fileSize - position - CHUNK_HEADER_BYTES));
    } else if (id === "data") {
      if (!fmt) throw new Error("data chunk precedes fmt chunk");
      const blockAlign = fmt.readUInt16LE(CHUNK_HEADER_BYTES + 12);
      if (blockAlign === 0) throw new Error("fmt chunk has zero block alignment");
      const dataOffset = position + CHUNK_HEADER_BYTES;
      return {
        fmt,
        sampleRate: fmt.readUInt32LE(CHUNK_HEADER_BYTES + 4),
        blockAlign,
        dataOffset,
        dataBytes: Math.min(size, fileSize - dataOffset),
      };
    }
    position += CHUNK_HEADER_BYTES + size + (size % 2);
  }
  throw new Error("No data chunk");
}

/** A RIFF/WAVE buffer holding the original fmt chunk and `data`. */
function wavWithData(fmt: Buffer, data: Buffer): Buffer {
  const fmtPad = Buffer.alloc(fmt.length % 2);
  const header = Buffer.alloc(RIFF_HEADER_BYTES);
  header.write("RIFF", 0, "ascii");
  header.writeUInt32LE(4 + fmt.length + fmtPad.length + CHUNK_HEADER_BYTES + data.length, 4);
  header.write("WAVE", 8, "ascii");
  const dataHeader = Buffer.alloc(CHUNK_HEADER_BYTES);
  dataHeader.write("data", 0, "ascii");
  dataHeader.writeUInt32LE(data.length, 4);
  return Buffer.concat([header, fmt, fmtPad, dataHeader, data]);
}

/**
 * Decodes RIFF/WAVE files. Only the data bytes inside the span are read, then
 * wavefile converts them to float.
 */
export class WavDecoder implements PcmDecoder {
  constructor(private readonly maxDecodeBytes: number) {}

  async decode(filePath: string, span: DecodeSpan): Promise<PcmAudio> {
    const size = await checkSize(filePath, this.maxDecodeBytes);
    const handle = await fs.promises.open(filePath, "r");
    try {
      const layout = await readWavLayout(handle, size);
      const totalFrames = Math.floor(layout.dataBytes / layout.blockAlign);
      const [first, last] = frameRange(span, layout.sampleRate);
      const from = Math.min(first, totalFrames);
      const to = Math.min(Math.max(last, from), totalFrames);
      const data = await readBytes(handle, layout.dataOffset + from * layout.blockAlign, (to - from) * layout.blockAlign);

      const wav = new WaveFile(wavWithData(layout.fmt, data));
      const format = WavFormatSchema.parse(wav.fmt);
      wav.toBitDepth("32f");

      const raw: unknown = wav.getSamples(false, Float64Array);
      let channels: Float64Array[];
      if (raw instanceof Float64Array) {
        channels = [raw];
      } else if (Array.isArray(raw)) {
        channels = raw.filter((channel): channel is Float64Array => channel instanceof Float64Array);
      } else {
        throw new Error("Unexpected sample layout");
      }
      if (channels.length === 0) throw new Error("No audio channels");

      const length = Math.min(...channels.map((channel) => channel.length));
      return {
        samples: downmix(channels, 0, length),
        sampleRate: format.sampleRate,
        startSeconds: from / format.sampleRate,
      };
    } catch (error) {
      throw new AnalysisError(`Could not decode ${path.basename(filePath)}: ${errorMessage(error)}`, {
        cause: error,
      });
    } finally {
      await handle.close();
    }
  }
}

interface DecodedChunk {
  channelData: Float32Array[];
  samplesDecoded: number;
  sampleRate: number;
}

/** The streaming surface shared by the wasm-audio-decoders codecs. */
interface StreamCodec {
  ready: Promise<void>;
  decode(chunk: Uint8Array): Promise<DecodedChunk>;
  flush(): Promise<DecodedChunk>;
  free(): void;
}

const NOTHING_DECODED: DecodedChunk = { channelData: [], samplesDecoded: 0, sampleRate: 0 };

/** Keeps the downmixed samples that fall inside the span as chunks arrive. */
class SpanCollector {
  private readonly parts: Float32Array[] = [];
  private position = 0;
  private sampleRate = 0;

  constructor(private readonly span: DecodeSpan) {}

  get complete(): boolean {
    return this.sampleRate > 0 && this.position >= frameRange(this.span, this.sampleRate)[1];
  }

  add(chunk: DecodedChunk): void {
    if (chunk.channelData.length === 0) return;
    const length = Math.min(chunk.samplesDecoded, ...chunk.channelData.map((channel) => channel.length));
    if (length <= 0) return;
    if (this.sampleRate === 0) this.sampleRate = chunk.sampleRate;

    const [first, last] = frameRange(this.span, this.sampleRate);
    const from = Math.max(0, first - this.position);
    const to = Math.min(length, last - this.position);
    if (to > from) this.parts.push(downmix(chunk.channelData, from, to));
    this.position += length;
  }

  audio(): PcmAudio {
    if (this.sampleRate === 0) throw new Error("No audio frames decoded");
    const samples = new Float32Array(this.parts.reduce((sum, part) => sum + part.length, 0));
    let offset = 0;
    for (const part of this.parts) {
      samples.set(part, offset);
      offset += part.length;
    }
    const [first] = frameRange(this.span, this.sampleRate);
    return { samples, sampleRate: this.sampleRate, startSeconds: first / this.sampleRate };
  }
}

/** Feeds the file to a codec in chunks and stops once the span is decoded. */
abstract class StreamingDecoder implements PcmDecoder {
  constructor(private readonly maxDecodeBytes: number) {}

  protected abstract openCodec(): StreamCodec;

  async decode(filePath: string, span: DecodeSpan): Promise<PcmAudio> {
    await checkSize(filePath, this.maxDecodeBytes);
    const codec = this.openCodec();
    const collector = new SpanCollector(span);
    const stream = fs.createReadStream(filePath, { highWaterMark: STREAM_CHUNK_BYTES });
    try {
      await codec.ready;
      for await (const chunk of stream) {
        if (!(chunk instanceof Uint8Array)) continue;
        collector.add(await codec.decode(chunk));
        if (collector.complete) break;
      }
      if (!collector.complete) collector.add(await codec.flush());
      return collector.audio();
    } catch (error) {
      throw new AnalysisError(`Could not decode ${path.basename(filePath)}: ${errorMessage(error)}`, {
        cause: error,
      });
    } finally {
      stream.destroy();
      codec.free();
    }
  }
}

export class MpegDecoder extends StreamingDecoder {
  protected openCodec(): StreamCodec {
    const decoder = new MPEGDecoder();
    return {
      ready: decoder.ready,
      decode: async (chunk) => decoder.decode(chunk),
      // mpg123 hands back every complete frame as soon as it is fed
      flush: async () => NOTHING_DECODED,
      free: () => decoder.free(),
    };
  }
}

export class FlacDecoder extends StreamingDecoder {
  protected openCodec(): StreamCodec {
    const decoder = new FLACDecoder();
    return {
      ready: decoder.ready,
      decode: async (chunk) => decoder.decode(chunk),
      flush: async () => decoder.flush(),
      free: () => decoder.free(),
    };
  }
}

/**
 * Picks a decoder by container. MP4/AAC has none, so analysis reports itself
 * unavailable for those files.
 */
export class AudioFileDecoder implements PcmDecoder {
  private readonly wav: PcmDecoder;
  private readonly mpeg: PcmDecoder;
  private readonly flac: PcmDecoder;

  constructor(maxDecodeBytes: number) {
    this.wav = new WavDecoder(maxDecodeBytes);
    this.mpeg = new MpegDecoder(maxDecodeBytes);
    this.flac = new FlacDecoder(maxDecodeBytes);
  }

  async decode(filePath: string, span: DecodeSpan): Promise<PcmAudio> {
    const ext = path.extname(filePath).toLowerCase();
    switch (containerFor(filePath)) {
      case "flac":
        return this.flac.decode(filePath, span);
      case "mpeg":
        return this.mpeg.decode(filePath, span);
      case "mp4":
        break;
      case "generic":
        if (ext === ".wav") return this.wav.decode(filePath, span);
        break;
    }
    throw new AnalysisError(`No PCM decoder for ${ext || "extensionless"} files`);
  }
}
