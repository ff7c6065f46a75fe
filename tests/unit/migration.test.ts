import * as fs from "fs";
import * as path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { CancellationToken } from "../../src/cancellation";
import { InputMissingError } from "../../src/errors";
import { NmlCodec } from "../../src/formats/nml-codec";
import { RekordboxXmlCodec } from "../../src/formats/rekordbox-codec";
import { MigrationOptionsSchema, MigrationOrchestrator } from "../../src/migration";
import { createTrack } from "../../src/track";
import { CueMarker } from "../../src/types";
import { makeTempDir, removeDir, writeBytes, writeText } from "../helpers/fixtures";

function hotCues(count: number): CueMarker[] {
  return Array.from({ length: count }, (_, i) => ({
    type: "hot-cue" as const,
    start_time_seconds: i * 10,
    label: `Cue ${i + 1}`,
  }));
}

describe("MigrationOrchestrator", () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  function csvWithMissingRow(): string {
    return writeText(path.join(dir, "source.csv"), `name,artist,path\nGone,Someone,${path.join(dir, "old", "song.mp3")}\n`);
  }

  it("drops a missing file under the skip policy", async () => {
    const target = path.join(dir, "out.nml");
    const result = await new MigrationOrchestrator().migrate(csvWithMissingRow(), target, "csv", "nml", {
      missingFiles: "skip",
    });

    if (result.status !== "completed") throw new Error("expected completion");
    expect(result.tracks).toEqual([]);
    expect(result.skipped.map((skip) => skip.code)).toEqual(["file-missing"]);
    const written = await new NmlCodec().read(target, { verifyFiles: false });
    expect(written.tracks).toEqual([]);
  });

  it("relocates a missing file found in a scan folder", async () => {
    const located = writeBytes(path.join(dir, "library", "sub", "song.mp3"));
    writeBytes(path.join(dir, "elsewhere", "song.mp3"));
    const orchestrator = new MigrationOrchestrator({
      scanFolders: [path.join(dir, "library"), path.join(dir, "elsewhere")],
    });

    const result = await orchestrator.migrate(csvWithMissingRow(), path.join(dir, "out.m3u8"), "csv", "m3u8", {
      missingFiles: "skip",
      locateMissing: true,
    });

    if (result.status !== "completed") throw new Error("expected completion");
    expect(result.tracks).toHaveLength(1);
    expect(result.tracks[0].file_path).toBe(located);
    expect(result.tracks[0].title).toBe("Gone");
    expect(result.skipped).toEqual([]);
  });

  it("still drops the track when locating finds nothing and the policy is skip", async () => {
    const orchestrator = new MigrationOrchestrator({ scanFolders: [dir] });
    const result = await orchestrator.migrate(csvWithMissingRow(), path.join(dir, "out.csv"), "csv", "csv", {
      locateMissing: true,
    });
    expect(result.status === "completed" ? result.tracks : null).toEqual([]);
  });

  it("keeps a missing file under the include policy", async () => {
    const result = await new MigrationOrchestrator().migrate(
      csvWithMissingRow(),
      path.join(dir, "out.csv"),
      "csv",
      "csv",
      { missingFiles: "include" }
    );
    if (result.status !== "completed") throw new Error("expected completion");
    expect(result.tracks.map((track) => track.file_path)).toEqual([path.join(dir, "old", "song.mp3")]);
  });

  it("reports non-decreasing progress through every phase", async () => {
    const rows = ["name,path"];
    for (const name of ["a", "b", "c"]) rows.push(`${name},${writeBytes(path.join(dir, `${name}.mp3`))}`);
    const source = writeText(path.join(dir, "source.csv"), rows.join("\n") + "\n");

    const percents: number[] = [];
    const counters: string[] = [];
    await new MigrationOrchestrator().migrate(source, path.join(dir, "out.m3u"), "csv", "m3u", {}, {
      onProgress: (percent, _message, current, total) => {
        percents.push(percent);
        counters.push(`${current ?? "-"}/${total ?? "-"}`);
      },
    });

    expect(percents).toEqual([0, 30, 43, 56, 70, 70, 100]);
    expect(counters).toEqual(["-/-", "0/3", "1/3", "2/3", "3/3", "3/3", "3/3"]);
  });

  it("returns what was processed when canceled and writes nothing", async () => {
    const rows = ["name,path"];
    for (let i = 0; i < 5; i++) rows.push(`t${i},${writeBytes(path.join(dir, `t${i}.mp3`))}`);
    const source = writeText(path.join(dir, "source.csv"), rows.join("\n") + "\n");
    const target = path.join(dir, "out.nml");
    const token = new CancellationToken();

    const result = await new MigrationOrchestrator().migrate(source, target, "csv", "nml", {}, {
      token,
      onProgress: (_percent, _message, current) => {
        if (current === 2) token.cancel();
      },
    });

    expect(result.status).toBe("canceled");
    if (result.status !== "canceled") return;
    expect(result.phase).toBe("processing");
    expect(result.tracks.map((track) => track.title)).toEqual(["t0", "t1"]);
    expect(fs.existsSync(target)).toBe(false);
  });

  it("caps the remapped cues written to rekordbox at eight", async () => {
    const audio = writeBytes(path.join(dir, "cued.mp3"));
    const source = path.join(dir, "source.nml");
    const track = createTrack(audio, { title: "Cued", cue_points: hotCues(10) });
    await new NmlCodec().write(source, {
      tracks: [track],
      playlists: [{ kind: "playlist", name: "Set", tracks: [track] }],
    });
    const target = path.join(dir, "rekordbox.xml");

    const result = await new MigrationOrchestrator().migrate(source, target, "nml", "rekordbox-xml", {
      cuePoints: "first-8",
      mapFirstHotCueToMemory: true,
    });

    if (result.status !== "completed") throw new Error("expected completion");
    const cues = result.tracks[0].cue_points;
    expect(cues).toHaveLength(8);
    expect(cues[0]).toEqual({ type: "memory-cue", start_time_seconds: 0, label: "Memory 2" });
    expect(cues[1].label).toBe("Cue 1");
    expect(cues[7].label).toBe("Cue 7");
    expect(result.identities.get(result.tracks[0])).toBe("1");

    const written = await new RekordboxXmlCodec().read(target);
    expect(written.tracks[0].cue_points).toHaveLength(8);
    const playlist = written.playlists[0];
    expect(playlist.kind === "playlist" ? playlist.tracks.map((t) => t.title) : []).toEqual(["Cued"]);
  });

  it("drops every cue under the none policy", async () => {
    const audio = writeBytes(path.join(dir, "cued.mp3"));
    const source = path.join(dir, "source.nml");
    await new NmlCodec().write(source, { tracks: [createTrack(audio, { cue_points: hotCues(3) })], playlists: [] });

    const result = await new MigrationOrchestrator().migrate(source, path.join(dir, "out.xml"), "nml", "rekordbox-xml", {
      cuePoints: "none",
      mapFirstHotCueToMemory: true,
    });
    expect(result.status === "completed" ? result.tracks[0].cue_points : null).toEqual([]);
  });

  it("validates options and rejects a missing source document", async () => {
    expect(MigrationOptionsSchema.safeParse({ locateMissing: "yes" }).success).toBe(false);
    expect(MigrationOptionsSchema.parse({})).toEqual({
      cuePoints: "all",
      missingFiles: "skip",
      locateMissing: false,
      mapFirstHotCueToMemory: false,
      mapMemoryToHotCue: false,
    });
    await expect(
      new MigrationOrchestrator().migrate(path.join(dir, "absent.csv"), path.join(dir, "out.csv"), "csv", "csv")
    ).rejects.toBeInstanceOf(InputMissingError);
  });
});
