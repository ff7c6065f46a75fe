// ANSI color codes
const colors = {
  reset: "\x1b[0m",
  bright: "\x1b[1m",
  dim: "\x1b[2m",

  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  magenta: "\x1b[35m",
  cyan: "\x1b[36m",
  white: "\x1b[37m",
  gray: "\x1b[90m",
};

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

const envLevel = process.env.DJLIB_LOG_LEVEL;
let currentLevel: LogLevel = isLogLevel(envLevel) ? envLevel : "info";

const useColor = process.stdout.isTTY === true && process.env.NO_COLOR === undefined;

function paint(color: string, text: string): string {
  return useColor ? `${color}${text}${colors.reset}` : text;
}

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function enabled(level: Exclude<LogLevel, "silent">): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
  success(message: string): void;
  processing(message: string): void;
  music(message: string): void;
  stats(message: string): void;
  header(message: string): void;
}

export function createLogger(scope: string): Logger {
  const tag = paint(colors.gray, `[${scope}]`);

  return {
    debug: (msg) => {
      if (enabled("debug")) console.debug(`${tag} ${paint(colors.dim + colors.gray, msg)}`);
    },
    info: (msg) => {
      if (enabled("info")) console.log(`${tag} ${paint(colors.blue, `ℹ️  ${msg}`)}`);
    },
    warn: (msg) => {
      if (enabled("warn")) console.warn(`${tag} ${paint(colors.yellow, `⚠️  ${msg}`)}`);
    },
    error: (msg, error) => {
      if (!enabled("error")) return;
      console.error(`${tag} ${paint(colors.red, `❌ ${msg}`)}`);
      if (error instanceof Error && error.stack && enabled("debug")) {
        console.error(paint(colors.dim, error.stack));
      }
    },
    success: (msg) => {
      if (enabled("info")) console.log(`${tag} ${paint(colors.green, `✅ ${msg}`)}`);
    },
    processing: (msg) => {
      if (enabled("info")) console.log(`${tag} ${paint(colors.cyan, `🔄 ${msg}`)}`);
    },
    music: (msg) => {
      if (enabled("info")) console.log(`${tag} ${paint(colors.magenta, `🎵 ${msg}`)}`);
    },
    stats: (msg) => {
      if (enabled("info")) console.log(`${tag} ${paint(colors.bright + colors.white, `📊 ${msg}`)}`);
    },
    header: (msg) => {
      if (enabled("info")) console.log(paint(colors.bright + colors.cyan, msg));
    },
  };
}
