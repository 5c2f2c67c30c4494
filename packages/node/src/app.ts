/**
 * packages/node/src/app.ts — Wires the terminal adapters to the session loop.
 *
 * Board size is decided from the viewport before the terminal is touched, so
 * a piped stdin or a too-small terminal fails without ever entering raw mode. Once raw mode is
 * on, it is restored on every exit path.
 */

import { setTimeout as delay } from "node:timers/promises";
import {
  CellTermError,
  NOOP_LOGGER,
  type SessionLogger,
  type SessionSummary,
  type Sleep,
  type ViewportProbe,
  createBoard,
  createMathRng,
  createSeededRng,
  createSessionState,
  fitBoardToViewport,
  randomize,
  runSession,
} from "@cellterm/core";
import type { CliOptions } from "./config.js";
import { type RawInputStream, createStdinInputSource } from "./input/stdinInput.js";
import { ANSI, type DisplayStream, createAnsiDisplay } from "./output/ansiDisplay.js";
import { type SizedStream, createViewportProbe } from "./viewport.js";

export type CellTermIo = Readonly<{
  stdin: RawInputStream;
  stdout: DisplayStream & SizedStream;
  viewport?: ViewportProbe;
  sleep?: Sleep;
}>;

export type CellTermRunOptions = Readonly<{
  logger?: SessionLogger;
  /** Aborting queues a quit; the session ends at the next tick. */
  signal?: AbortSignal;
}>;

const realSleep: Sleep = async (ms) => {
  await delay(ms);
};

export async function runCellTerm(
  options: CliOptions,
  io: CellTermIo,
  run: CellTermRunOptions = {},
): Promise<SessionSummary> {
  const logger = run.logger ?? NOOP_LOGGER;
  if (io.stdin.isTTY !== true) {
    throw new CellTermError("NOT_A_TTY", "cellterm needs an interactive terminal on stdin");
  }

  const probe = io.viewport ?? createViewportProbe(io.stdout);
  const viewport = probe.read();
  const size = fitBoardToViewport(viewport, { width: options.width, height: options.height });

  const rng = options.seed === undefined ? createMathRng() : createSeededRng(options.seed);
  const blank = createBoard(size.width, size.height);
  const board = options.empty ? blank : randomize(blank, rng);

  const state = createSessionState({
    board,
    paused: options.paused,
    glyph: options.glyph,
    delayMs: options.delayMs,
  });

  const viewportText = `${String(viewport.cols)}x${String(viewport.rows)}`;
  const boardText = `${String(size.width)}x${String(size.height)}`;
  logger.debug(
    `viewport ${viewportText}, board ${boardText}, ${String(board.occupied.size)} live cells`,
  );

  const input = createStdinInputSource(io.stdin, { logger });
  const display = createAnsiDisplay(io.stdout, { logger });
  const onAbort = (): void => input.push("quit");

  input.start();
  run.signal?.addEventListener("abort", onAbort, { once: true });
  if (run.signal?.aborted) onAbort();

  try {
    return await runSession(state, {
      input,
      display,
      sleep: io.sleep ?? realSleep,
      rng,
      logger,
    });
  } finally {
    run.signal?.removeEventListener("abort", onAbort);
    input.dispose();
    display.dispose();
  }
}

/** Last-resort terminal restore for crashes outside the session loop. */
export function restoreTerminal(stdin: RawInputStream, stdout: DisplayStream): void {
  if (stdin.isTTY === true && typeof stdin.setRawMode === "function") {
    stdin.setRawMode(false);
  }
  stdout.write(ANSI.showCursor);
}
