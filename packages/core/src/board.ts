import { type Cell, type CellSet, cellSetOf, emptyCellSet, hasCell } from "./cells.js";
import { CellTermError } from "./errors.js";

export type Board = Readonly<{
  width: number;
  height: number;
  occupied: CellSet;
}>;

function isPositiveInt(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

/**
 * Creates a board of fixed dimensions. Seed cells outside the board are
 * dropped so the in-bounds invariant holds from the start.
 */
export function createBoard(width: number, height: number, seed: Iterable<Cell> = []): Board {
  if (!isPositiveInt(width) || !isPositiveInt(height)) {
    throw new CellTermError(
      "INVALID_DIMENSIONS",
      `Board dimensions must be positive integers (got ${String(width)}x${String(height)})`,
    );
  }

  const inBounds: Cell[] = [];
  for (const c of seed) {
    if (isInBounds(width, height, c.x, c.y)) inBounds.push(c);
  }

  return Object.freeze({
    width,
    height,
    occupied: inBounds.length === 0 ? emptyCellSet() : cellSetOf(inBounds),
  });
}

export function isInBounds(width: number, height: number, x: number, y: number): boolean {
  return x >= 0 && x < width && y >= 0 && y < height;
}

export function withOccupied(board: Board, occupied: CellSet): Board {
  return Object.freeze({ width: board.width, height: board.height, occupied });
}

export function isAlive(board: Board, x: number, y: number): boolean {
  return hasCell(board.occupied, x, y);
}

export function populationOf(board: Board): number {
  return board.occupied.size;
}
