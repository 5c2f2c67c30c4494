/**
 * packages/core/src/ports.ts — Collaborators the session loop drives.
 *
 * The core never touches a terminal directly. Input, output, sizing and
 * pacing arrive through these interfaces; `@cellterm/node` implements them
 * for a real TTY and `@cellterm/testkit` implements them in memory.
 */

import type { Viewport } from "./layout.js";

export type InputSymbol =
  | "quit"
  | "toggle-pause"
  | "randomize"
  | "clear"
  | "step-once"
  | "move-up"
  | "move-down"
  | "move-left"
  | "move-right"
  | "toggle-cell"
  | "toggle-cursor-visibility"
  | "toggle-glyph"
  | "increase-delay"
  | "decrease-delay"
  | "unrecognized";

export interface InputSource {
  /**
   * Returns the next pending symbol, or `undefined` when none is queued.
   * MUST NOT block.
   */
  poll(): InputSymbol | undefined;
}

/**
 * Output target addressed in 0-based screen columns and rows.
 * Calls before `flush()` may be buffered; only `flush()` is expected to
 * reach the screen.
 */
export interface DisplaySink {
  writeAt(col: number, row: number, text: string): void;
  clear(): void;
  setCursorVisible(visible: boolean): void;
  moveCursor(col: number, row: number): void;
  flush(): void;
}

export interface ViewportProbe {
  read(): Viewport;
}

export type Sleep = (ms: number) => Promise<void>;

export type SessionLogger = Readonly<{
  debug: (message: string) => void;
  warn: (message: string) => void;
}>;

export const NOOP_LOGGER: SessionLogger = Object.freeze({
  debug: () => {},
  warn: () => {},
});
