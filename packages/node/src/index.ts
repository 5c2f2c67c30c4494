export { type CellTermIo, type CellTermRunOptions, restoreTerminal, runCellTerm } from "./app.js";
export {
  type CliOptions,
  type EnvConfig,
  LOG_LEVELS,
  type LogLevel,
  USAGE,
  parseArgs,
  readEnvConfig,
} from "./config.js";
export { type DecodeResult, UNKNOWN_KEY, decodeKeys, flushStaleKeys } from "./input/keyDecoder.js";
export {
  type RawInputStream,
  type StdinInputOptions,
  type StdinInputSource,
  createStdinInputSource,
} from "./input/stdinInput.js";
export { closeLogger, createLogger, toSessionLogger } from "./logger.js";
export {
  ANSI,
  type AnsiDisplay,
  type AnsiDisplayOptions,
  type DisplayStream,
  createAnsiDisplay,
} from "./output/ansiDisplay.js";
export {
  type SizedStream,
  type TerminalSizeFn,
  createViewportProbe,
  readViewport,
} from "./viewport.js";
