import * as path from "path";
import { z } from "zod";
import { AnalysisWindow } from "./types";

const LogLevelSchema = z.enum(["debug", "info", "warn", "error", "silent"]);

const WindowSchema = z
  .string()
  .regex(/^\d+(\.\d+)?:\d+(\.\d+)?$/, "expected <offset>:<duration> in seconds")
  .transform((value): AnalysisWindow => {
    const [offset, duration] = value.split(":");
    return { offsetSeconds: Number(offset), durationSeconds: Number(duration) };
  });

const EnvSchema = z.object({
  DJLIB_LOG_LEVEL: LogLevelSchema.default("info"),
  DJLIB_SCAN_FOLDERS: z
    .string()
    .default("")
    .transform((value) =>
      value
        .split(path.delimiter)
        .map((folder) => folder.trim())
        .filter((folder) => folder.length > 0)
    ),
  DJLIB_MAX_DECODE_MB: z.coerce.number().positive().default(200),
  DJLIB_TEMPO_WINDOW: WindowSchema.default("30:30"),
  DJLIB_KEY_WINDOW: WindowSchema.default("30:20"),
  DJLIB_ENERGY_WINDOW: WindowSchema.default("30:15"),
});

export interface AnalysisConfig {
  tempoWindow: AnalysisWindow;
  keyWindow: AnalysisWindow;
  energyWindow: AnalysisWindow;
  maxDecodeBytes: number;
}

export interface AppConfig {
  logLevel: z.infer<typeof LogLevelSchema>;
  scanFolders: string[];
  analysis: AnalysisConfig;
}

export const DEFAULT_ANALYSIS_CONFIG: AnalysisConfig = {
  tempoWindow: { offsetSeconds: 30, durationSeconds: 30 },
  keyWindow: { offsetSeconds: 30, durationSeconds: 20 },
  energyWindow: { offsetSeconds: 30, durationSeconds: 15 },
  maxDecodeBytes: 200 * 1024 * 1024,
};

/**
 * Reads DJLIB_* variables. Empty strings count as unset so a blank line in
 * .env falls back to the default.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const relevant: Record<string, string> = {};
  for (const name of Object.keys(EnvSchema.shape)) {
    const value = env[name];
    if (value !== undefined && value.trim() !== "") {
      relevant[name] = value.trim();
    }
  }

  const parsed = EnvSchema.safeParse(relevant);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${details}`);
  }

  const data = parsed.data;
  return {
    logLevel: data.DJLIB_LOG_LEVEL,
    scanFolders: data.DJLIB_SCAN_FOLDERS,
    analysis: {
      tempoWindow: data.DJLIB_TEMPO_WINDOW,
      keyWindow: data.DJLIB_KEY_WINDOW,
      energyWindow: data.DJLIB_ENERGY_WINDOW,
      maxDecodeBytes: Math.round(data.DJLIB_MAX_DECODE_MB * 1024 * 1024),
    },
  };
}
