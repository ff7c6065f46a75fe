import { describe, expect, it } from "vitest";
import { conversionDirection, parseArgs, UsageError } from "../../src/cli";

describe("parseArgs", () => {
  it("shows help without a command", () => {
    expect(parseArgs([])).toEqual({ command: "help" });
    expect(parseArgs(["scan", "--help"])).toEqual({ command: "help" });
  });

  it("parses scan folders and output", () => {
    expect(parseArgs(["scan", "/music", "/more", "--out", "lib.nml"])).toEqual({
      command: "scan",
      folders: ["/music", "/more"],
      out: "lib.nml",
    });
  });

  it("parses migrate options", () => {
    expect(
      parseArgs(["migrate", "in.csv", "out.nml", "--cues", "first-8", "--locate", "--folder", "/music", "--memory-to-hot"])
    ).toEqual({
      command: "migrate",
      source: "in.csv",
      target: "out.nml",
      folders: ["/music"],
      options: {
        cuePoints: "first-8",
        locateMissing: true,
        mapFirstHotCueToMemory: false,
        mapMemoryToHotCue: true,
      },
    });
  });

  it("rejects bad input", () => {
    expect(() => parseArgs(["migrate", "in.csv", "out.nml", "--cues", "some"])).toThrow(
      "--cues must be one of all, first-8, none"
    );
    expect(() => parseArgs(["convert", "only-one.nml"])).toThrow(UsageError);
    expect(() => parseArgs(["inspect", "a.nml", "--out"])).toThrow("--out needs a value");
    expect(() => parseArgs(["dance"])).toThrow("Unknown command dance");
  });
});

describe("conversionDirection", () => {
  it("only converts between NML and rekordbox XML", () => {
    expect(conversionDirection("a.nml", "b.xml")).toBe("nml-to-rekordbox");
    expect(conversionDirection("a.XML", "b.nml")).toBe("rekordbox-to-nml");
    expect(() => conversionDirection("a.csv", "b.nml")).toThrow("use migrate for csv -> nml");
  });
});
