import assert from "node:assert/strict";
import test from "node:test";
import { createRecordingLogger } from "@cellterm/testkit";
import { ANSI, createAnsiDisplay } from "../output/ansiDisplay.js";
import { FakeTtyOutput } from "./fakes.js";

test("moveTo converts 0-based coordinates to 1-based CUP", () => {
  assert.equal(ANSI.moveTo(0, 0), "\u001b[1;1H");
  assert.equal(ANSI.moveTo(4, 2), "\u001b[3;5H");
  assert.equal(ANSI.moveTo(-3, -1), "\u001b[1;1H");
});

test("calls are batched into one write per flush", () => {
  const out = new FakeTtyOutput();
  const display = createAnsiDisplay(out);

  display.clear();
  display.writeAt(0, 0, "hi");
  display.moveCursor(4, 2);
  display.setCursorVisible(false);
  assert.equal(out.chunks.length, 0);

  display.flush();
  assert.deepEqual(out.chunks, ["\u001b[2J\u001b[1;1Hhi\u001b[3;5H\u001b[?25l"]);
  assert.equal(display.pending(), "");
});

test("flush without pending output writes nothing", () => {
  const out = new FakeTtyOutput();
  const display = createAnsiDisplay(out);
  display.flush();
  assert.equal(out.chunks.length, 0);
});

test("stream errors are logged and dropped", () => {
  const out = new FakeTtyOutput();
  const logger = createRecordingLogger();
  const display = createAnsiDisplay(out, { logger });

  out.emit("error", new Error("EPIPE"));
  assert.deepEqual(logger.lines(), ["debug: stdout error, output dropped: EPIPE"]);

  display.dispose();
  assert.equal(out.listenerCount("error"), 0);
});
