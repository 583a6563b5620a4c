// Shape geometry types

// ============= Basic Types =============

export interface Cell {
  row: number;
  col: number;
}

// Cell key format: "row,col"
export type CellKey = string;

// Footprint key format: sorted cell keys joined by "|"
export type FootprintKey = string;

export type CellSet = ReadonlySet<CellKey>;

// ============= Placement Types =============

// flips is kept mod 2 and rotations mod 4 by the shape's placement setter
export interface Placement {
  flips: number;
  rotations: number;
  location: Cell;
}

// A frozen candidate cell-set, comparable by key
export interface Footprint {
  key: FootprintKey;
  cells: CellSet;
}

export const ORIGIN: Cell = { row: 0, col: 0 };

export const IDENTITY_PLACEMENT: Placement = { flips: 0, rotations: 0, location: ORIGIN };

// ============= Utility Functions =============

export function cellKey(row: number, col: number): CellKey {
  return `${row},${col}`;
}

export function parseCell(key: CellKey): Cell {
  const [row, col] = key.split(',').map(Number);
  return { row, col };
}

export function placement(flips: number, rotations: number, location: Cell = ORIGIN): Placement {
  return { flips, rotations, location: { ...location } };
}

export function footprintKey(cells: Iterable<CellKey>): FootprintKey {
  return [...cells].sort(compareCellKeys).join('|');
}

export function toFootprint(cells: Iterable<CellKey>): Footprint {
  const frozen = new Set(cells);
  return { key: footprintKey(frozen), cells: frozen };
}

export function compareCellKeys(a: CellKey, b: CellKey): number {
  const ca = parseCell(a);
  const cb = parseCell(b);
  return ca.row - cb.row || ca.col - cb.col;
}

// Smallest row and smallest column of a cell-set (not necessarily a member)
export function minCorner(cells: Iterable<CellKey>): Cell {
  let row = Infinity;
  let col = Infinity;
  for (const key of cells) {
    const cell = parseCell(key);
    if (cell.row < row) row = cell.row;
    if (cell.col < col) col = cell.col;
  }
  return { row, col };
}

export function isSubset(cells: Iterable<CellKey>, of: CellSet): boolean {
  for (const key of cells) {
    if (!of.has(key)) return false;
  }
  return true;
}

export function isDisjoint(cells: Iterable<CellKey>, from: CellSet): boolean {
  for (const key of cells) {
    if (from.has(key)) return false;
  }
  return true;
}

export function sameCells(a: CellSet, b: CellSet): boolean {
  return a.size === b.size && isSubset(a, b);
}

export function difference(a: Iterable<CellKey>, b: CellSet): Set<CellKey> {
  const result = new Set<CellKey>();
  for (const key of a) {
    if (!b.has(key)) result.add(key);
  }
  return result;
}
