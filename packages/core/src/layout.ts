/**
 * packages/core/src/layout.ts — Screen geometry around the board.
 *
 * Screen coordinates are 0-based columns and rows. The board sits inside a
 * one-cell border with its first cell at column 1, row 1. The instructions
 * panel hangs below the bottom border, attached at its left edge.
 *
 * ```
 * ╔══════════════════════════════╗
 * ║ board rows                   ║
 * ╠═══════════════════════════╦══╝
 * ║ space:  play/pause        ║
 * ...
 * ╚═══════════════════════════╝
 * ```
 */

import { CellTermError } from "./errors.js";

export type Viewport = Readonly<{
  cols: number;
  rows: number;
}>;

export type ScreenPoint = Readonly<{
  col: number;
  row: number;
}>;

export type InstructionEntry = Readonly<{
  keys: string;
  action: string;
}>;

export const INSTRUCTIONS: readonly InstructionEntry[] = Object.freeze([
  { keys: "space", action: "play/pause" },
  { keys: "f", action: "forward 1 frame" },
  { keys: "r", action: "randomize" },
  { keys: "c", action: "clear" },
  { keys: "arrows", action: "move cursor" },
  { keys: "enter", action: "toggle cell" },
  { keys: "v", action: "show/hide cursor" },
  { keys: "g", action: "switch glyph" },
  { keys: "+/-", action: "frame delay" },
  { keys: "q", action: "quit" },
]);

export const PANEL_KEY_WIDTH = 8;
export const PANEL_ACTION_WIDTH = 17;
/** Border, space, key column, action column, space, border. */
export const PANEL_WIDTH = 1 + 1 + PANEL_KEY_WIDTH + PANEL_ACTION_WIDTH + 1 + 1;
/** Instruction rows, the delay readout row and the closing border. */
export const PANEL_HEIGHT = INSTRUCTIONS.length + 2;

/** The panel's right edge joins the board's bottom border, so it must fit under it. */
export const MIN_BOARD_WIDTH = PANEL_WIDTH - 1;
export const MIN_BOARD_HEIGHT = 4;

export type FrameLayout = Readonly<{
  boardWidth: number;
  boardHeight: number;
  /** Where each rendered board row starts (its left border). */
  boardOrigin: ScreenPoint;
  bottomBorderRow: number;
  panelTopRow: number;
  delayReadout: ScreenPoint;
  panelBottomRow: number;
  /** First row below everything drawn; the cursor parks here on exit. */
  exitRow: number;
  required: Viewport;
}>;

export function requiredViewport(boardWidth: number, boardHeight: number): Viewport {
  return Object.freeze({
    cols: Math.max(boardWidth + 2, PANEL_WIDTH),
    rows: boardHeight + 2 + PANEL_HEIGHT,
  });
}

export function computeLayout(boardWidth: number, boardHeight: number): FrameLayout {
  const bottomBorderRow = boardHeight + 1;
  const panelTopRow = bottomBorderRow + 1;
  const delayRow = panelTopRow + INSTRUCTIONS.length;
  const panelBottomRow = delayRow + 1;

  return Object.freeze({
    boardWidth,
    boardHeight,
    boardOrigin: Object.freeze({ col: 0, row: 1 }),
    bottomBorderRow,
    panelTopRow,
    delayReadout: Object.freeze({ col: 2, row: delayRow }),
    panelBottomRow,
    exitRow: panelBottomRow + 1,
    required: requiredViewport(boardWidth, boardHeight),
  });
}

export function cellToScreen(layout: FrameLayout, x: number, y: number): ScreenPoint {
  return Object.freeze({
    col: layout.boardOrigin.col + 1 + x,
    row: layout.boardOrigin.row + y,
  });
}

export type RequestedSize = Readonly<{
  width?: number | undefined;
  height?: number | undefined;
}>;

/**
 * Picks board dimensions for the available viewport. Requested dimensions
 * are clipped to what fits; missing ones fill the viewport.
 */
export function fitBoardToViewport(
  viewport: Viewport,
  requested: RequestedSize = {},
): Readonly<{ width: number; height: number }> {
  if (requested.width !== undefined && requested.width < MIN_BOARD_WIDTH) {
    throw new CellTermError(
      "INVALID_ARGUMENT",
      `Board width must be at least ${String(MIN_BOARD_WIDTH)} (got ${String(requested.width)})`,
    );
  }
  if (requested.height !== undefined && requested.height < MIN_BOARD_HEIGHT) {
    throw new CellTermError(
      "INVALID_ARGUMENT",
      `Board height must be at least ${String(MIN_BOARD_HEIGHT)} (got ${String(requested.height)})`,
    );
  }

  const maxWidth = viewport.cols - 2;
  const maxHeight = viewport.rows - 2 - PANEL_HEIGHT;

  if (maxWidth < MIN_BOARD_WIDTH || maxHeight < MIN_BOARD_HEIGHT) {
    const needed = requiredViewport(MIN_BOARD_WIDTH, MIN_BOARD_HEIGHT);
    throw new CellTermError(
      "VIEWPORT_TOO_SMALL",
      `Terminal is ${String(viewport.cols)}x${String(viewport.rows)}; at least ${String(needed.cols)}x${String(needed.rows)} is needed`,
    );
  }

  return Object.freeze({
    width: Math.min(requested.width ?? maxWidth, maxWidth),
    height: Math.min(requested.height ?? maxHeight, maxHeight),
  });
}
