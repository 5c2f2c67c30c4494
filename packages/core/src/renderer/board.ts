import type { Board } from "../board.js";
import { DEAD_CELL, type GlyphName, glyphChar } from "./glyphs.js";

export const SIDE_BORDER = "║";

/**
 * Renders `height` rows, each the side border, `width` cells and the side
 * border again. Pure function of the occupied set, dimensions and glyph.
 */
export function renderBoard(board: Board, glyph: GlyphName): readonly string[] {
  const live = glyphChar(glyph);
  const grid: string[][] = [];
  for (let y = 0; y < board.height; y++) {
    grid.push(new Array<string>(board.width).fill(DEAD_CELL));
  }

  for (const c of board.occupied.values()) {
    const row = grid[c.y];
    if (row === undefined || c.x < 0 || c.x >= board.width) continue;
    row[c.x] = live;
  }

  return Object.freeze(grid.map((row) => `${SIDE_BORDER}${row.join("")}${SIDE_BORDER}`));
}
