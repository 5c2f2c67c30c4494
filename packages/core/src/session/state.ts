import { cell } from "../cells.js";
import { advance } from "../engine/advance.js";
import { clearBoard, randomize, toggleAt } from "../engine/edit.js";
import type { InputSymbol } from "../ports.js";
import { nextGlyph } from "../renderer/glyphs.js";
import type { Rng } from "../rng.js";
import type { SessionOptions, SessionState, SessionTransition } from "./types.js";

export const MIN_DELAY_MS = 1;
export const MAX_DELAY_MS = 250;
export const DEFAULT_DELAY_MS = 30;
export const DELAY_STEP_MS = 1;

function clamp(value: number, min: number, max: number): number {
  if (value < min) return min;
  if (value > max) return max;
  return value;
}

export function clampDelay(delayMs: number): number {
  if (!Number.isFinite(delayMs)) return DEFAULT_DELAY_MS;
  return clamp(Math.round(delayMs), MIN_DELAY_MS, MAX_DELAY_MS);
}

export function createSessionState(options: SessionOptions): SessionState {
  return Object.freeze({
    board: options.board,
    generation: 0,
    running: true,
    paused: options.paused ?? false,
    cursor: cell(0, 0),
    cursorVisible: options.cursorVisible ?? true,
    glyph: options.glyph ?? "unicode",
    delayMs: clampDelay(options.delayMs ?? DEFAULT_DELAY_MS),
  });
}

function unchanged(state: SessionState): SessionTransition {
  return { state, boardChanged: false, delayChanged: false };
}

function boardChange(state: SessionState): SessionTransition {
  return { state, boardChanged: true, delayChanged: false };
}

export function advanceSession(previous: SessionState): SessionState {
  return Object.freeze({
    ...previous,
    board: advance(previous.board),
    generation: previous.generation + 1,
  });
}

function moveCursor(previous: SessionState, dx: number, dy: number): SessionState {
  return Object.freeze({
    ...previous,
    cursor: cell(previous.cursor.x + dx, previous.cursor.y + dy),
  });
}

function adjustDelay(previous: SessionState, delta: number): SessionTransition {
  const delayMs = clamp(previous.delayMs + delta, MIN_DELAY_MS, MAX_DELAY_MS);
  return {
    state: Object.freeze({ ...previous, delayMs }),
    boardChanged: false,
    delayChanged: true,
  };
}

/**
 * Applies one input symbol. The cursor is left unclamped; `clampCursor`
 * runs once per tick after input handling.
 */
export function reduceSession(
  previous: SessionState,
  symbol: InputSymbol,
  rng: Rng,
): SessionTransition {
  if (symbol === "quit") {
    return unchanged(Object.freeze({ ...previous, running: false }));
  }

  if (symbol === "toggle-pause") {
    return unchanged(Object.freeze({ ...previous, paused: !previous.paused }));
  }

  if (symbol === "randomize") {
    return boardChange(Object.freeze({ ...previous, board: randomize(previous.board, rng) }));
  }

  if (symbol === "clear") {
    return boardChange(Object.freeze({ ...previous, board: clearBoard(previous.board) }));
  }

  if (symbol === "step-once") {
    if (!previous.paused) return unchanged(previous);
    return boardChange(advanceSession(previous));
  }

  if (symbol === "move-up") return unchanged(moveCursor(previous, 0, -1));
  if (symbol === "move-down") return unchanged(moveCursor(previous, 0, 1));
  if (symbol === "move-left") return unchanged(moveCursor(previous, -1, 0));
  if (symbol === "move-right") return unchanged(moveCursor(previous, 1, 0));

  if (symbol === "toggle-cell") {
    const { x, y } = previous.cursor;
    return boardChange(Object.freeze({ ...previous, board: toggleAt(previous.board, x, y) }));
  }

  if (symbol === "toggle-cursor-visibility") {
    return unchanged(Object.freeze({ ...previous, cursorVisible: !previous.cursorVisible }));
  }

  if (symbol === "toggle-glyph") {
    return boardChange(Object.freeze({ ...previous, glyph: nextGlyph(previous.glyph) }));
  }

  if (symbol === "increase-delay") return adjustDelay(previous, DELAY_STEP_MS);
  if (symbol === "decrease-delay") return adjustDelay(previous, -DELAY_STEP_MS);

  return unchanged(previous);
}

export function clampCursor(previous: SessionState): SessionState {
  const { width, height } = previous.board;
  const x = clamp(previous.cursor.x, 0, width - 1);
  const y = clamp(previous.cursor.y, 0, height - 1);
  if (x === previous.cursor.x && y === previous.cursor.y) return previous;
  return Object.freeze({ ...previous, cursor: cell(x, y) });
}
