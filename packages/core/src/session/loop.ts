/**
 * packages/core/src/session/loop.ts — The per-tick control loop.
 *
 * One cooperative loop owns the session state. Each tick advances the board
 * (unless paused), applies at most one input symbol, clamps the cursor,
 * emits only what changed, flushes once and then sleeps for the current
 * frame delay. The sleep is not interrupted by input.
 *
 * Display failures are contained per call: a throwing emit is logged and
 * dropped and the tick carries on. A lost frame is preferable to ending an
 * interactive session.
 */

import { populationOf } from "../board.js";
import { type FrameLayout, cellToScreen, computeLayout } from "../layout.js";
import {
  type DisplaySink,
  type InputSource,
  NOOP_LOGGER,
  type SessionLogger,
  type Sleep,
} from "../ports.js";
import { renderBoard } from "../renderer/board.js";
import { renderDelayReadout, renderFrame } from "../renderer/frame.js";
import type { Rng } from "../rng.js";
import { advanceSession, clampCursor, reduceSession } from "./state.js";
import type { SessionState, SessionSummary } from "./types.js";

export type SessionPorts = Readonly<{
  input: InputSource;
  display: DisplaySink;
  sleep: Sleep;
  rng: Rng;
  logger?: SessionLogger;
}>;

function describeError(err: unknown): string {
  return err instanceof Error ? `${err.name}: ${err.message}` : String(err);
}

/** Wraps every display call so a failing write never escapes the tick. */
export function guardDisplay(display: DisplaySink, logger: SessionLogger): DisplaySink {
  const guard = (op: string, fn: () => void): void => {
    try {
      fn();
    } catch (err) {
      logger.debug(`display ${op} failed, frame output dropped: ${describeError(err)}`);
    }
  };

  return {
    writeAt: (col, row, text) => guard("writeAt", () => display.writeAt(col, row, text)),
    clear: () => guard("clear", () => display.clear()),
    setCursorVisible: (visible) =>
      guard("setCursorVisible", () => display.setCursorVisible(visible)),
    moveCursor: (col, row) => guard("moveCursor", () => display.moveCursor(col, row)),
    flush: () => guard("flush", () => display.flush()),
  };
}

function drawStaticFrame(display: DisplaySink, layout: FrameLayout): void {
  display.setCursorVisible(false);
  display.clear();
  for (const line of renderFrame(layout)) {
    display.writeAt(line.col, line.row, line.text);
  }
}

function drawBoard(display: DisplaySink, layout: FrameLayout, state: SessionState): void {
  const rows = renderBoard(state.board, state.glyph);
  rows.forEach((text, index) => {
    display.writeAt(layout.boardOrigin.col, layout.boardOrigin.row + index, text);
  });
}

function drawCursor(display: DisplaySink, layout: FrameLayout, state: SessionState): void {
  const point = cellToScreen(layout, state.cursor.x, state.cursor.y);
  display.moveCursor(point.col, point.row);
  display.setCursorVisible(state.cursorVisible);
}

function restoreScreen(display: DisplaySink, layout: FrameLayout): void {
  display.moveCursor(0, layout.exitRow);
  display.setCursorVisible(true);
  display.flush();
}

export type TickResult = Readonly<{
  state: SessionState;
  boardChanged: boolean;
  delayChanged: boolean;
}>;

/** Steps 1-3 of a tick: autoplay, one input symbol, cursor clamp. */
export function computeTick(previous: SessionState, input: InputSource, rng: Rng): TickResult {
  let state = previous;
  let boardChanged = false;
  let delayChanged = false;

  if (!state.paused) {
    state = advanceSession(state);
    boardChanged = true;
  }

  const symbol = input.poll();
  if (symbol !== undefined) {
    const transition = reduceSession(state, symbol, rng);
    state = transition.state;
    boardChanged = boardChanged || transition.boardChanged;
    delayChanged = delayChanged || transition.delayChanged;
  }

  return { state: clampCursor(state), boardChanged, delayChanged };
}

export async function runSession(
  initial: SessionState,
  ports: SessionPorts,
): Promise<SessionSummary> {
  const logger = ports.logger ?? NOOP_LOGGER;
  const display = guardDisplay(ports.display, logger);
  const layout = computeLayout(initial.board.width, initial.board.height);

  drawStaticFrame(display, layout);

  let state = initial;
  let ticks = 0;

  while (state.running) {
    const tick = computeTick(state, ports.input, ports.rng);
    state = tick.state;

    const firstTick = ticks === 0;
    if (tick.boardChanged || firstTick) drawBoard(display, layout, state);
    if (tick.delayChanged || firstTick) {
      const readout = renderDelayReadout(state.delayMs);
      display.writeAt(layout.delayReadout.col, layout.delayReadout.row, readout);
    }
    drawCursor(display, layout, state);
    display.flush();
    ticks++;

    if (!state.running) break;
    await ports.sleep(state.delayMs);
  }

  restoreScreen(display, layout);

  return Object.freeze({
    ticks,
    generations: state.generation,
    population: populationOf(state.board),
  });
}
