import { type Board, createBoard, sortedCells } from "@cellterm/core";

/**
 * Builds a board from rows of text, `#` or `O` for live cells and anything
 * else for dead ones. Width is the longest row unless given.
 */
export function boardFromRows(rows: readonly string[], width?: number, height?: number): Board {
  const seed: { x: number; y: number }[] = [];
  rows.forEach((row, y) => {
    [...row].forEach((ch, x) => {
      if (ch === "#" || ch === "O") seed.push({ x, y });
    });
  });
  const longest = rows.reduce((max, row) => Math.max(max, [...row].length), 0);
  return createBoard(width ?? longest, height ?? rows.length, seed);
}

/** Live cells as sorted `[x, y]` pairs, convenient for deepEqual. */
export function liveCells(board: Board): readonly (readonly [number, number])[] {
  return sortedCells(board.occupied).map((c) => [c.x, c.y] as const);
}
