import {
  assert,
  boardFromRows,
  createInstantSleep,
  createRecordingDisplay,
  createRecordingLogger,
  createScriptedInput,
  createSeededRng,
  describe,
  test,
} from "@cellterm/testkit";
import { createBoard } from "../board.js";
import { computeTick, runSession } from "../session/loop.js";
import { createSessionState } from "../session/state.js";

const BLINKER = [
  { x: 1, y: 2 },
  { x: 2, y: 2 },
  { x: 3, y: 2 },
];

function ports(script: Parameters<typeof createScriptedInput>[0]) {
  return {
    input: createScriptedInput(script),
    display: createRecordingDisplay(),
    sleep: createInstantSleep(),
    rng: createSeededRng(3),
    logger: createRecordingLogger(),
  };
}

describe("runSession", () => {
  test("draws the frame, one tick and the exit sequence when quit arrives first", async () => {
    const p = ports(["quit"]);
    const state = createSessionState({ board: createBoard(28, 4), paused: true });
    const summary = await runSession(state, p);

    assert.deepEqual(summary, { ticks: 1, generations: 0, population: 0 });
    assert.deepEqual(p.sleep.requested(), []);

    const calls = p.display.calls();
    assert.deepEqual(calls.slice(0, 2), [
      { op: "setCursorVisible", visible: false },
      { op: "clear" },
    ]);
    assert.equal(calls.length, 27);
    assert.deepEqual(calls.slice(-7), [
      { op: "writeAt", col: 2, row: 16, text: "delay:  30 ms            " },
      { op: "moveCursor", col: 1, row: 1 },
      { op: "setCursorVisible", visible: true },
      { op: "flush" },
      { op: "moveCursor", col: 0, row: 18 },
      { op: "setCursorVisible", visible: true },
      { op: "flush" },
    ]);
    assert.equal(p.display.batches().length, 2);
  });

  test("autoplay advances once per tick and sleeps between ticks", async () => {
    const p = ports([undefined, undefined, "quit"]);
    const state = createSessionState({ board: createBoard(28, 5, BLINKER) });
    const summary = await runSession(state, p);

    assert.deepEqual(summary, { ticks: 3, generations: 3, population: 3 });
    assert.deepEqual(p.sleep.requested(), [30, 30]);

    const screen = p.display.screen();
    assert.equal(screen[1], `║${" ".repeat(28)}║`);
    assert.equal(screen[2], `║  ■${" ".repeat(25)}║`);
    assert.equal(screen[3], `║  ■${" ".repeat(25)}║`);
    assert.equal(screen[4], `║  ■${" ".repeat(25)}║`);
  });

  test("redraws the delay readout only when it changes", async () => {
    const p = ports(["increase-delay", "increase-delay", undefined, "decrease-delay", "quit"]);
    const state = createSessionState({ board: createBoard(28, 4), paused: true });
    await runSession(state, p);

    const readouts = p.display
      .calls()
      .filter((c) => c.op === "writeAt" && c.col === 2 && c.row === 16)
      .map((c) => (c.op === "writeAt" ? c.text.trimEnd() : ""));
    assert.deepEqual(readouts, ["delay:  31 ms", "delay:  32 ms", "delay:  31 ms"]);
    assert.deepEqual(p.sleep.requested(), [31, 32, 32, 31]);

    const boardRowWrites = p.display
      .calls()
      .filter((c) => c.op === "writeAt" && c.col === 0 && c.row === 1);
    assert.equal(boardRowWrites.length, 1);
  });

  test("cursor moves are clamped and cells toggle under it", async () => {
    const p = ports(["move-up", "move-left", "toggle-cell", "move-right", "toggle-cell", "quit"]);
    const state = createSessionState({ board: createBoard(28, 4), paused: true });
    const summary = await runSession(state, p);

    assert.equal(summary.population, 2);
    const moves = p.display
      .calls()
      .filter((c) => c.op === "moveCursor")
      .map((c) => (c.op === "moveCursor" ? [c.col, c.row] : []));
    assert.deepEqual(moves, [
      [1, 1],
      [1, 1],
      [1, 1],
      [2, 1],
      [2, 1],
      [2, 1],
      [0, 18],
    ]);
    assert.equal(p.display.screen()[1], `║■■${" ".repeat(26)}║`);
  });

  test("cursor visibility follows the flag and is restored on exit", async () => {
    const p = ports(["toggle-cursor-visibility", "quit"]);
    const state = createSessionState({ board: createBoard(28, 4), paused: true });
    await runSession(state, p);

    const visibility = p.display
      .calls()
      .filter((c) => c.op === "setCursorVisible")
      .map((c) => (c.op === "setCursorVisible" ? c.visible : undefined));
    assert.deepEqual(visibility, [false, false, false, true]);
  });

  test("display failures are logged and the session keeps going", async () => {
    const p = ports([undefined, "quit"]);
    p.display.failOn("writeAt");
    const state = createSessionState({ board: createBoard(28, 4) });
    const summary = await runSession(state, p);

    assert.equal(summary.ticks, 2);
    assert.deepEqual(p.sleep.requested(), [30]);
    assert.equal(p.display.calls().filter((c) => c.op === "flush").length, 3);
    assert.equal(
      p.logger.lines()[0],
      "debug: display writeAt failed, frame output dropped: Error: simulated writeAt failure",
    );
  });

  test("step-once adds a generation only while paused", async () => {
    const paused = ports(["step-once", "quit"]);
    const pausedSummary = await runSession(
      createSessionState({ board: createBoard(28, 5, BLINKER), paused: true }),
      paused,
    );
    assert.equal(pausedSummary.generations, 1);

    const running = ports(["step-once", "quit"]);
    const runningSummary = await runSession(
      createSessionState({ board: createBoard(28, 5, BLINKER) }),
      running,
    );
    assert.equal(runningSummary.generations, 2);
  });
});

test("computeTick advances before applying input", () => {
  const board = boardFromRows([".....", ".###.", "....."]);
  const tick = computeTick(
    createSessionState({ board }),
    createScriptedInput(["toggle-pause"]),
    createSeededRng(5),
  );
  assert.equal(tick.state.paused, true);
  assert.equal(tick.state.generation, 1);
  assert.equal(tick.boardChanged, true);
  assert.equal(tick.delayChanged, false);
});
