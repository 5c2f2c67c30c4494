import { type Board, isInBounds, withOccupied } from "../board.js";
import { type Cell, type CellKey, cell, cellKey, emptyCellSet, toggleCell } from "../cells.js";
import type { Rng } from "../rng.js";

export const RANDOM_DENSITY_DIVISOR = 4;

export function randomTrialCount(width: number, height: number): number {
  return Math.floor((width * height) / RANDOM_DENSITY_DIVISOR);
}

/**
 * Replaces the board with uniformly drawn cells. Draws are with replacement,
 * so repeated coordinates collapse and the live count may fall short of the
 * trial count.
 */
export function randomize(board: Board, rng: Rng): Board {
  const { width, height } = board;
  const occupied = new Map<CellKey, Cell>();
  const trials = randomTrialCount(width, height);

  for (let i = 0; i < trials; i++) {
    const x = rng.nextInt(width);
    const y = rng.nextInt(height);
    if (!isInBounds(width, height, x, y)) continue;
    occupied.set(cellKey(x, y), cell(x, y));
  }

  return withOccupied(board, occupied);
}

export function clearBoard(board: Board): Board {
  return withOccupied(board, emptyCellSet());
}

/** Flips one cell. Coordinates outside the board leave it unchanged. */
export function toggleAt(board: Board, x: number, y: number): Board {
  if (!isInBounds(board.width, board.height, x, y)) return board;
  return withOccupied(board, toggleCell(board.occupied, x, y));
}
