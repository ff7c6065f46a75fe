import * as path from "path";
import { describe, expect, it } from "vitest";
import { DEFAULT_ANALYSIS_CONFIG, loadConfig } from "../../src/config";

describe("loadConfig", () => {
  it("uses defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      logLevel: "info",
      scanFolders: [],
      analysis: DEFAULT_ANALYSIS_CONFIG,
    });
  });

  it("parses folders, decode limit and analysis windows", () => {
    const config = loadConfig({
      DJLIB_LOG_LEVEL: "debug",
      DJLIB_SCAN_FOLDERS: ["/music/a", " ", "/music/b "].join(path.delimiter),
      DJLIB_MAX_DECODE_MB: "1.5",
      DJLIB_KEY_WINDOW: "10:5.5",
      DJLIB_TEMPO_WINDOW: "",
    });
    expect(config.logLevel).toBe("debug");
    expect(config.scanFolders).toEqual(["/music/a", "/music/b"]);
    expect(config.analysis.maxDecodeBytes).toBe(1572864);
    expect(config.analysis.keyWindow).toEqual({ offsetSeconds: 10, durationSeconds: 5.5 });
    expect(config.analysis.tempoWindow).toEqual({ offsetSeconds: 30, durationSeconds: 30 });
  });

  it("names every invalid variable", () => {
    expect(() => loadConfig({ DJLIB_LOG_LEVEL: "loud", DJLIB_ENERGY_WINDOW: "30" })).toThrow(
      /^Invalid configuration: DJLIB_LOG_LEVEL: .*; DJLIB_ENERGY_WINDOW: expected <offset>:<duration> in seconds$/
    );
  });
});
