/**
 * packages/core/src/cells.ts — Cell coordinates and the sparse cell set.
 *
 * A cell set maps the canonical key of a coordinate to the coordinate itself,
 * so membership is a key lookup and iteration yields coordinates directly.
 * Sets are never mutated after construction; helpers return new sets.
 */

export type Cell = Readonly<{
  x: number;
  y: number;
}>;

/** Canonical "x,y" key; two cells share a key iff both components match. */
export type CellKey = `${number},${number}`;

export type CellSet = ReadonlyMap<CellKey, Cell>;

const EMPTY: CellSet = new Map<CellKey, Cell>();

export function cell(x: number, y: number): Cell {
  return Object.freeze({ x, y });
}

export function cellKey(x: number, y: number): CellKey {
  return `${x},${y}`;
}

export function emptyCellSet(): CellSet {
  return EMPTY;
}

export function cellSetOf(cells: Iterable<Cell>): CellSet {
  const out = new Map<CellKey, Cell>();
  for (const c of cells) {
    out.set(cellKey(c.x, c.y), cell(c.x, c.y));
  }
  return out;
}

export function hasCell(set: CellSet, x: number, y: number): boolean {
  return set.has(cellKey(x, y));
}

export function withCell(set: CellSet, x: number, y: number): CellSet {
  const key = cellKey(x, y);
  if (set.has(key)) return set;
  const out = new Map(set);
  out.set(key, cell(x, y));
  return out;
}

export function withoutCell(set: CellSet, x: number, y: number): CellSet {
  const key = cellKey(x, y);
  if (!set.has(key)) return set;
  const out = new Map(set);
  out.delete(key);
  return out;
}

export function toggleCell(set: CellSet, x: number, y: number): CellSet {
  return hasCell(set, x, y) ? withoutCell(set, x, y) : withCell(set, x, y);
}

/** Cells sorted row-major; handy for stable comparisons and debug output. */
export function sortedCells(set: CellSet): readonly Cell[] {
  return [...set.values()].sort((a, b) => a.y - b.y || a.x - b.x);
}
