import type { Board } from "../board.js";
import type { Cell } from "../cells.js";
import type { GlyphName } from "../renderer/glyphs.js";

export type SessionState = Readonly<{
  board: Board;
  /** Generations computed so far, by autoplay or single-step. */
  generation: number;
  running: boolean;
  paused: boolean;
  /** May sit outside the board between a move and the end-of-tick clamp. */
  cursor: Cell;
  cursorVisible: boolean;
  glyph: GlyphName;
  delayMs: number;
}>;

export type SessionOptions = Readonly<{
  board: Board;
  paused?: boolean;
  cursorVisible?: boolean;
  glyph?: GlyphName;
  delayMs?: number;
}>;

/** New state plus the per-tick redraw flags it implies. */
export type SessionTransition = Readonly<{
  state: SessionState;
  boardChanged: boolean;
  delayChanged: boolean;
}>;

export type SessionSummary = Readonly<{
  ticks: number;
  generations: number;
  population: number;
}>;
