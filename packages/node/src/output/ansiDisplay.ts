/**
 * packages/node/src/output/ansiDisplay.ts — DisplaySink over ANSI escape sequences.
 *
 * Every call appends to a pending buffer; `flush()` hands the whole batch to
 * the stream in a single `write`. Stream `error` events are reported to the
 * logger and otherwise dropped.
 */

import type { EventEmitter } from "node:events";
import { type DisplaySink, NOOP_LOGGER, type SessionLogger } from "@cellterm/core";

const CSI = "\u001b[";

function toOneBased(value: number): string {
  return String(Math.max(0, Math.floor(value)) + 1);
}

export const ANSI = Object.freeze({
  clearScreen: `${CSI}2J`,
  hideCursor: `${CSI}?25l`,
  showCursor: `${CSI}?25h`,
  /** 0-based column and row to the 1-based CUP sequence. */
  moveTo: (col: number, row: number): string => `${CSI}${toOneBased(row)};${toOneBased(col)}H`,
});

/** The part of `process.stdout` the sink relies on. */
export type DisplayStream = EventEmitter &
  Readonly<{
    write: (chunk: string) => boolean;
  }>;

export type AnsiDisplay = DisplaySink &
  Readonly<{
    /** Bytes queued since the last flush. */
    pending: () => string;
    /** Detaches the error listener. Pending output is discarded. */
    dispose: () => void;
  }>;

export type AnsiDisplayOptions = Readonly<{
  logger?: SessionLogger;
}>;

export function createAnsiDisplay(
  stream: DisplayStream,
  opts: AnsiDisplayOptions = {},
): AnsiDisplay {
  const logger = opts.logger ?? NOOP_LOGGER;
  let pending = "";

  const onError = (err: unknown): void => {
    const detail = err instanceof Error ? err.message : String(err);
    logger.debug(`stdout error, output dropped: ${detail}`);
  };
  stream.on("error", onError);

  return {
    writeAt: (col, row, text) => {
      pending += ANSI.moveTo(col, row) + text;
    },
    clear: () => {
      pending += ANSI.clearScreen;
    },
    setCursorVisible: (visible) => {
      pending += visible ? ANSI.showCursor : ANSI.hideCursor;
    },
    moveCursor: (col, row) => {
      pending += ANSI.moveTo(col, row);
    },
    flush: () => {
      if (pending.length === 0) return;
      const out = pending;
      pending = "";
      stream.write(out);
    },
    pending: () => pending,
    dispose: () => {
      stream.off("error", onError);
      pending = "";
    },
  };
}
