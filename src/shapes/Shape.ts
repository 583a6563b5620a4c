import { InvalidGeometryError } from '../errors';
import { Piece, flippedVertically, isValidCell } from './Piece';
import type { Cell, CellKey, CellSet, Placement } from './types';
import { IDENTITY_PLACEMENT, cellKey, footprintKey } from './types';

interface NormalizedPattern {
  cells: CellSet;
  height: number;
  width: number;
}

// Validates the cells and translates them so the smallest row and column are 0
function normalizePattern(name: string, cells: Iterable<Cell>): NormalizedPattern {
  const list = [...cells];
  if (list.length === 0) {
    throw new InvalidGeometryError(`Shape ${name} has no cells`);
  }
  const invalid = list.find(cell => !isValidCell(cell));
  if (invalid) {
    throw new InvalidGeometryError(
      `Shape ${name}: cells must be non-negative integer pairs, got (${invalid.row}, ${invalid.col})`
    );
  }

  const minRow = Math.min(...list.map(c => c.row));
  const minCol = Math.min(...list.map(c => c.col));
  const normalized = new Set<CellKey>(list.map(c => cellKey(c.row - minRow, c.col - minCol)));

  return {
    cells: normalized,
    height: Math.max(...list.map(c => c.row)) - minRow + 1,
    width: Math.max(...list.map(c => c.col)) - minCol + 1
  };
}

/**
 * A rigid shape that can be flipped, rotated and moved. Its identity is the
 * canonical pattern, so two shapes with the same pattern are equal.
 */
export class Shape extends Piece {
  private readonly pattern: CellSet;

  constructor(name: string, cells: Iterable<Cell>, initialPlacement: Placement = IDENTITY_PLACEMENT) {
    const normalized = normalizePattern(name, cells);
    super(name, footprintKey(normalized.cells), normalized.height, normalized.width, initialPlacement);
    this.pattern = normalized.cells;
  }

  get canonicalCells(): CellSet {
    return this.pattern;
  }

  protected sidePattern(flips: number): CellSet {
    return flips % 2 ? flippedVertically(this.pattern, this.height) : this.pattern;
  }

  configured(p: Placement): Set<CellKey> {
    return this.transformed(p);
  }
}
