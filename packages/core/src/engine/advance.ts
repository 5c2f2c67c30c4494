/**
 * packages/core/src/engine/advance.ts — Next-generation computation.
 *
 * Only coordinates within one step of a live cell are ever visited, so the
 * cost of a generation follows the live population rather than board area.
 * Edges are hard: a boundary cell has fewer than eight neighbors.
 */

import { type Board, withOccupied } from "../board.js";
import { type Cell, type CellKey, cell, cellKey } from "../cells.js";

const NEIGHBOR_OFFSETS: readonly (readonly [number, number])[] = Object.freeze([
  [-1, -1],
  [0, -1],
  [1, -1],
  [-1, 0],
  [1, 0],
  [-1, 1],
  [0, 1],
  [1, 1],
]);

export type NeighborTally = {
  count: number;
  cell: Cell;
};

/**
 * Counts, for every coordinate adjacent to at least one live cell, how many
 * live cells it touches. Coordinates absent from the result have count 0.
 */
export function countNeighbors(board: Board): ReadonlyMap<CellKey, Readonly<NeighborTally>> {
  const { width, height } = board;
  const tallies = new Map<CellKey, NeighborTally>();

  for (const live of board.occupied.values()) {
    for (const [dx, dy] of NEIGHBOR_OFFSETS) {
      const nx = live.x + dx;
      const ny = live.y + dy;
      if (nx < 0 || nx >= width || ny < 0 || ny >= height) continue;

      const key = cellKey(nx, ny);
      const tally = tallies.get(key);
      if (tally) {
        tally.count++;
      } else {
        tallies.set(key, { count: 1, cell: cell(nx, ny) });
      }
    }
  }

  return tallies;
}

function survives(alive: boolean, neighbors: number): boolean {
  if (alive) return neighbors === 2 || neighbors === 3;
  return neighbors === 3;
}

export function advance(board: Board): Board {
  const next = new Map<CellKey, Cell>();

  for (const [key, tally] of countNeighbors(board)) {
    if (survives(board.occupied.has(key), tally.count)) {
      next.set(key, tally.cell);
    }
  }

  return withOccupied(board, next);
}

export function advanceBy(board: Board, generations: number): Board {
  let current = board;
  for (let i = 0; i < generations; i++) {
    current = advance(current);
  }
  return current;
}
