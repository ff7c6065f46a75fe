import * as fs from "fs";
import * as path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { CsvCodec } from "../../src/formats/csv-codec";
import { createTrack } from "../../src/track";
import { makeTempDir, removeDir, writeBytes, writeText } from "../helpers/fixtures";

describe("CsvCodec", () => {
  let dir: string;
  const codec = new CsvCodec();

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  it("writes the fixed header and quotes where needed", async () => {
    const target = path.join(dir, "out.csv");
    await codec.write(target, {
      tracks: [createTrack("/music/a.mp3", { title: "Hello, World", artist: "Band", bpm: 120.5, key: "G" })],
      playlists: [],
    });
    expect(fs.readFileSync(target, "utf-8").split("\n")).toEqual([
      "name,artist,album,genre,bpm,key,path",
      '"Hello, World",Band,Unknown Album,Unknown Genre,120.5,G,/music/a.mp3',
      "",
    ]);
  });

  it("reads header aliases and resolves relative paths", async () => {
    writeBytes(path.join(dir, "tracks", "one.mp3"));
    const source = writeText(
      path.join(dir, "in.csv"),
      "\uFEFFTitle,Artist,BPM,Location,Year\nOne,Someone,98,tracks/one.mp3,2001\nNo path,Nobody,100,,\n"
    );

    const result = await codec.read(source);
    expect(result.playlists).toEqual([]);
    expect(result.tracks).toHaveLength(1);
    expect(result.tracks[0]).toMatchObject({
      title: "One",
      artist: "Someone",
      bpm: 98,
      year: "2001",
      file_path: path.join(dir, "tracks", "one.mp3"),
    });
    expect(result.skipped).toEqual([{ code: "missing-path", message: "Row has no path", entry: 3 }]);
  });

  it("reports rows whose file is missing", async () => {
    const source = writeText(path.join(dir, "in.csv"), "name,path\nGhost,/does/not/exist.mp3\n");
    const result = await codec.read(source);
    expect(result.tracks).toEqual([]);
    expect(result.skipped.map((skip) => skip.code)).toEqual(["file-missing"]);

    const unverified = await codec.read(source, { verifyFiles: false });
    expect(unverified.tracks.map((track) => track.title)).toEqual(["Ghost"]);
  });
});
