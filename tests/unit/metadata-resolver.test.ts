import * as path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { AnalysisError, CorruptMediaError } from "../../src/errors";
import { AudioMetadataResolver } from "../../src/metadata-resolver";
import { DecodeSpan, PcmAudio, PcmDecoder } from "../../src/pcm-decoder";
import { containerFor, TagData, TagReader } from "../../src/tag-reader";
import { clickTrack, FLAC_BLOCK_SIZE, makeTempDir, removeDir, writeBytes, writeFlac, writeWav } from "../helpers/fixtures";

class StubTags implements TagReader {
  constructor(private readonly tags: TagData | Error) {}

  async read(): Promise<TagData> {
    if (this.tags instanceof Error) throw this.tags;
    return this.tags;
  }
}

class StubDecoder implements PcmDecoder {
  readonly spans: DecodeSpan[] = [];

  constructor(private readonly audio: PcmAudio | Error) {}

  async decode(_filePath: string, span: DecodeSpan): Promise<PcmAudio> {
    this.spans.push(span);
    if (this.audio instanceof Error) throw this.audio;
    return this.audio;
  }
}

const clicksAt120: PcmAudio = { samples: clickTrack(102400, 5120), sampleRate: 10240, startSeconds: 0 };

describe("AudioMetadataResolver", () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  it("marks a nonexistent path corrupt with defaults", async () => {
    const track = await new AudioMetadataResolver().resolve(path.join(dir, "Lost Song.mp3"));
    expect(track).toMatchObject({
      is_corrupt: true,
      error_message: "File does not exist",
      bpm: 0,
      title: "Lost Song",
      artist: "Unknown Artist",
    });
  });

  it("rejects files under 1 KiB before reading tags", async () => {
    const tags = new StubTags(new Error("should not be read"));
    const track = await new AudioMetadataResolver({ tagReader: tags }).resolve(
      writeBytes(path.join(dir, "tiny.mp3"), 100)
    );
    expect(track.is_corrupt).toBe(true);
    expect(track.error_message).toBe("File is too small (100 bytes)");
  });

  it("keeps a tag BPM over the estimate", async () => {
    const decoder = new StubDecoder({ samples: new Float32Array(22050).fill(0.25), sampleRate: 22050, startSeconds: 0 });
    const resolver = new AudioMetadataResolver({
      tagReader: new StubTags({ title: "Tagged", bpm: 128, key: "Am" }),
      decoder,
    });
    const track = await resolver.resolve(writeBytes(path.join(dir, "tagged.mp3")));
    expect(track).toMatchObject({ title: "Tagged", bpm: 128, key: "Am", energy: 25, is_corrupt: false });
    expect(decoder.spans).toEqual([{ startSeconds: 0, endSeconds: 60 }]);
  });

  it("estimates BPM when the tag has none", async () => {
    const resolver = new AudioMetadataResolver({
      tagReader: new StubTags({ title: "Untagged", key: "C" }),
      decoder: new StubDecoder(clicksAt120),
    });
    const track = await resolver.resolve(writeBytes(path.join(dir, "untagged.mp3")));
    expect(track.bpm).toBe(120);
    expect(track.key).toBe("C");
  });

  it("decodes only the windows of a long file", async () => {
    // a click every half second, decoded from 30 s in
    const decoder = new StubDecoder({ ...clicksAt120, samples: clickTrack(307200, 5120), startSeconds: 30 });
    const resolver = new AudioMetadataResolver({
      tagReader: new StubTags({ title: "Long", key: "D", duration: 240 }),
      decoder,
    });
    const track = await resolver.resolve(writeBytes(path.join(dir, "long.mp3")));
    expect(decoder.spans).toEqual([{ startSeconds: 30, endSeconds: 60 }]);
    expect(track.bpm).toBe(120);
  });

  it("downgrades fields when decoding is unavailable", async () => {
    const resolver = new AudioMetadataResolver({
      tagReader: new StubTags({ title: "No PCM", key: "Unknown" }),
      decoder: new StubDecoder(new AnalysisError("No PCM decoder for .mp3 files")),
    });
    const track = await resolver.resolve(writeBytes(path.join(dir, "nopcm.mp3")));
    expect(track).toMatchObject({ title: "No PCM", bpm: 0, key: "Unknown", energy: 0, is_corrupt: false });
  });

  it("records container parse failures on the track", async () => {
    const resolver = new AudioMetadataResolver({
      tagReader: new StubTags(new CorruptMediaError("Invalid MP3 file: bad frame")),
      decoder: new StubDecoder(clicksAt120),
    });
    const track = await resolver.resolve(writeBytes(path.join(dir, "bad.mp3")));
    expect(track.is_corrupt).toBe(true);
    expect(track.error_message).toBe("Invalid MP3 file: bad frame");
  });

  it("reads a real WAV file and finds its tempo", async () => {
    const file = writeWav(path.join(dir, "beat.wav"), clickTrack(102400, 5120), 10240);
    const track = await new AudioMetadataResolver().resolve(file);
    expect(track.is_corrupt).toBe(false);
    expect(track.title).toBe("beat");
    expect(track.bpm).toBe(120);
    expect(track.duration).toBe(10);
  });

  it("estimates the tempo of an untagged FLAC file", async () => {
    // 40 blocks at 16 kHz is 10.24 s; a click every 7680 samples is 125 BPM
    const file = writeFlac(path.join(dir, "beat.flac"), clickTrack(40 * FLAC_BLOCK_SIZE, 7680));
    const track = await new AudioMetadataResolver().resolve(file);
    expect(track.is_corrupt).toBe(false);
    expect(track.duration).toBe(10.24);
    expect(track.bpm).toBe(125);
  });

  it("labels an unparseable FLAC file", async () => {
    const track = await new AudioMetadataResolver().resolve(writeBytes(path.join(dir, "broken.flac")));
    expect(track.is_corrupt).toBe(true);
    expect(track.error_message.startsWith("Invalid FLAC file: ")).toBe(true);
  });
});

describe("containerFor", () => {
  it("dispatches on extension", () => {
    expect(["a.FLAC", "b.mp3", "c.m4a", "d.aac", "e.wav"].map(containerFor)).toEqual([
      "flac",
      "mpeg",
      "mp4",
      "mp4",
      "generic",
    ]);
  });
});
