/**
 * packages/node/src/config.ts — Command-line flags and environment settings.
 */

import { CellTermError, type GlyphName } from "@cellterm/core";

export type CliOptions = {
  width?: number;
  height?: number;
  delayMs?: number;
  seed?: number;
  glyph: GlyphName;
  empty: boolean;
  paused: boolean;
  help: boolean;
};

export const LOG_LEVELS = ["error", "warn", "info", "http", "verbose", "debug", "silly"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export type EnvConfig = Readonly<{
  logFile: string | undefined;
  logLevel: LogLevel;
}>;

type IntegerFlag = "--width" | "--height" | "--delay" | "--seed";

const INTEGER_FLAGS: readonly IntegerFlag[] = ["--width", "--height", "--delay", "--seed"];

function isIntegerFlag(flag: string): flag is IntegerFlag {
  return INTEGER_FLAGS.some((candidate) => candidate === flag);
}

function parseInteger(flag: string, raw: string | undefined): number {
  if (raw === undefined || raw.length === 0) {
    throw new CellTermError("INVALID_ARGUMENT", `Missing value for ${flag}`);
  }
  const trimmed = raw.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    throw new CellTermError("INVALID_ARGUMENT", `${flag} expects an integer, got "${raw}"`);
  }
  return Number.parseInt(trimmed, 10);
}

function applyIntegerFlag(options: CliOptions, flag: IntegerFlag, value: number): void {
  if (flag === "--width") options.width = value;
  else if (flag === "--height") options.height = value;
  else if (flag === "--delay") options.delayMs = value;
  else options.seed = value;
}

export function parseArgs(argv: readonly string[]): CliOptions {
  const options: CliOptions = {
    glyph: "unicode",
    empty: false,
    paused: false,
    help: false,
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? "";
    if (arg === "--help" || arg === "-h") {
      options.help = true;
      continue;
    }
    if (arg === "--ascii") {
      options.glyph = "ascii";
      continue;
    }
    if (arg === "--empty") {
      options.empty = true;
      continue;
    }
    if (arg === "--paused") {
      options.paused = true;
      continue;
    }
    if (isIntegerFlag(arg)) {
      applyIntegerFlag(options, arg, parseInteger(arg, argv[i + 1]));
      i++;
      continue;
    }
    const eq = arg.indexOf("=");
    if (eq > 0) {
      const flag = arg.slice(0, eq);
      if (isIntegerFlag(flag)) {
        applyIntegerFlag(options, flag, parseInteger(flag, arg.slice(eq + 1)));
        continue;
      }
    }
    if (arg.startsWith("-")) {
      throw new CellTermError("INVALID_ARGUMENT", `Unknown option: ${arg}`);
    }
    throw new CellTermError("INVALID_ARGUMENT", `Unexpected argument: ${arg}`);
  }

  return options;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function readEnvConfig(env: Readonly<Record<string, string | undefined>>): EnvConfig {
  const file = env["CELLTERM_LOG"]?.trim();
  const rawLevel = env["CELLTERM_LOG_LEVEL"]?.trim().toLowerCase() ?? "";

  if (rawLevel.length > 0 && !isLogLevel(rawLevel)) {
    throw new CellTermError(
      "INVALID_ARGUMENT",
      `CELLTERM_LOG_LEVEL must be one of ${LOG_LEVELS.join(", ")} (got "${rawLevel}")`,
    );
  }

  return Object.freeze({
    logFile: file === undefined || file.length === 0 ? undefined : file,
    logLevel: rawLevel.length > 0 && isLogLevel(rawLevel) ? rawLevel : "info",
  });
}

export const USAGE = [
  "cellterm: Conway's Game of Life in the terminal",
  "",
  "Usage:",
  "  cellterm [options]",
  "",
  "Options:",
  "  --width <n>     Board width (default: fill the terminal)",
  "  --height <n>    Board height (default: fill the terminal)",
  "  --delay <ms>    Initial frame delay in milliseconds",
  "  --seed <n>      Seed for reproducible randomization",
  "  --ascii         Draw live cells with '#'",
  "  --empty         Start with an empty board",
  "  --paused        Start paused",
  "  --help, -h      Show this help",
  "",
  "Environment:",
  "  CELLTERM_LOG        Write a log file to this path",
  "  CELLTERM_LOG_LEVEL  error | warn | info | http | verbose | debug | silly",
  "",
].join("\n");
