import assert from "node:assert/strict";
import test from "node:test";
import { parseArgs, readEnvConfig } from "../config.js";

test("parseArgs: defaults", () => {
  assert.deepEqual(parseArgs([]), {
    glyph: "unicode",
    empty: false,
    paused: false,
    help: false,
  });
});

test("parseArgs: every flag, in both value forms", () => {
  const options = parseArgs([
    "--width",
    "40",
    "--height=12",
    "--delay",
    "50",
    "--seed",
    "-5",
    "--ascii",
    "--empty",
    "--paused",
  ]);
  assert.deepEqual(options, {
    width: 40,
    height: 12,
    delayMs: 50,
    seed: -5,
    glyph: "ascii",
    empty: true,
    paused: true,
    help: false,
  });
  assert.equal(parseArgs(["-h"]).help, true);
  assert.equal(parseArgs(["--help"]).help, true);
});

test("parseArgs: rejects malformed input", () => {
  assert.throws(() => parseArgs(["--width"]), {
    code: "INVALID_ARGUMENT",
    message: "Missing value for --width",
  });
  assert.throws(() => parseArgs(["--delay="]), {
    code: "INVALID_ARGUMENT",
    message: "Missing value for --delay",
  });
  assert.throws(() => parseArgs(["--width", "abc"]), {
    code: "INVALID_ARGUMENT",
    message: '--width expects an integer, got "abc"',
  });
  assert.throws(() => parseArgs(["--height=1.5"]), {
    message: '--height expects an integer, got "1.5"',
  });
  assert.throws(() => parseArgs(["--fast"]), { message: "Unknown option: --fast" });
  assert.throws(() => parseArgs(["glider"]), { message: "Unexpected argument: glider" });
});

test("readEnvConfig: defaults to no log file at info", () => {
  assert.deepEqual(readEnvConfig({}), { logFile: undefined, logLevel: "info" });
  assert.deepEqual(readEnvConfig({ CELLTERM_LOG: "   " }), {
    logFile: undefined,
    logLevel: "info",
  });
});

test("readEnvConfig: trims the path and normalizes the level", () => {
  assert.deepEqual(
    readEnvConfig({ CELLTERM_LOG: " /tmp/cellterm.log ", CELLTERM_LOG_LEVEL: " DEBUG " }),
    { logFile: "/tmp/cellterm.log", logLevel: "debug" },
  );
});

test("readEnvConfig: rejects unknown levels", () => {
  assert.throws(() => readEnvConfig({ CELLTERM_LOG_LEVEL: "loud" }), {
    code: "INVALID_ARGUMENT",
    message:
      'CELLTERM_LOG_LEVEL must be one of error, warn, info, http, verbose, debug, silly (got "loud")',
  });
});
