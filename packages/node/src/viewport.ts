import type { Viewport, ViewportProbe } from "@cellterm/core";
import terminalSize from "terminal-size";

const FALLBACK_COLS = 80;
const FALLBACK_ROWS = 24;

export type SizedStream = Readonly<{
  columns?: number;
  rows?: number;
}>;

export type TerminalSizeFn = () => Readonly<{ columns: number; rows: number }>;

function toPositiveIntOr(v: unknown, fallback: number): number {
  if (typeof v !== "number" || !Number.isFinite(v) || !Number.isInteger(v) || v <= 0) {
    return fallback;
  }
  return v;
}

/**
 * Reads the viewport from the stream first, then from `terminal-size`,
 * then falls back to 80x24.
 */
export function readViewport(
  stream: SizedStream,
  sizeFn: TerminalSizeFn = terminalSize,
): Viewport {
  let cols = toPositiveIntOr(stream.columns, 0);
  let rows = toPositiveIntOr(stream.rows, 0);

  if (cols === 0 || rows === 0) {
    try {
      const size = sizeFn();
      if (cols === 0) cols = toPositiveIntOr(size.columns, FALLBACK_COLS);
      if (rows === 0) rows = toPositiveIntOr(size.rows, FALLBACK_ROWS);
    } catch {
      if (cols === 0) cols = FALLBACK_COLS;
      if (rows === 0) rows = FALLBACK_ROWS;
    }
  }

  return Object.freeze({ cols, rows });
}

export function createViewportProbe(
  stream: SizedStream,
  sizeFn: TerminalSizeFn = terminalSize,
): ViewportProbe {
  return { read: () => readViewport(stream, sizeFn) };
}
