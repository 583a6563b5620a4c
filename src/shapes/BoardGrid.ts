import { InvalidGeometryError } from '../errors';
import { Piece, isValidCell } from './Piece';
import type { Cell, CellKey, CellSet, Placement } from './types';
import { IDENTITY_PLACEMENT, cellKey, footprintKey, difference } from './types';

export type GridSide = 'front' | 'back';

// Grids are square, so rotating one never changes the box it covers
export const GRID_SIZE = 4;

function toClosedSet(name: string, cells: Iterable<Cell>): Set<CellKey> {
  const result = new Set<CellKey>();
  for (const cell of cells) {
    if (!isValidCell(cell) || cell.row >= GRID_SIZE || cell.col >= GRID_SIZE) {
      throw new InvalidGeometryError(
        `Grid ${name}: closed cells must satisfy 0 <= row, col < ${GRID_SIZE}, ` +
        `got (${cell.row}, ${cell.col})`
      );
    }
    result.add(cellKey(cell.row, cell.col));
  }
  return result;
}

/**
 * A two-sided board tile. Wherever it is placed it covers its whole bounding
 * box; the closed cells of the side facing up cannot be covered by shapes.
 * Flipping shows the other side's pattern, which is not mirrored.
 */
export class BoardGrid extends Piece {
  private readonly closedFront: CellSet;
  private readonly closedBack: CellSet;

  constructor(
    name: string,
    closedFront: Iterable<Cell>,
    closedBack: Iterable<Cell>,
    initialPlacement: Placement = IDENTITY_PLACEMENT
  ) {
    const front = toClosedSet(name, closedFront);
    const back = toClosedSet(name, closedBack);
    super(name, `${footprintKey(front)}/${footprintKey(back)}`, GRID_SIZE, GRID_SIZE, initialPlacement);
    this.closedFront = front;
    this.closedBack = back;
  }

  get activeSide(): GridSide {
    return this.placement.flips ? 'back' : 'front';
  }

  get closedCells(): Set<CellKey> {
    return this.closedCellsAt(this.placement);
  }

  get openCells(): Set<CellKey> {
    return this.openCellsAt(this.placement);
  }

  closedCellsAt(p: Placement): Set<CellKey> {
    return this.transformed(p);
  }

  openCellsAt(p: Placement): Set<CellKey> {
    return difference(this.configured(p), this.closedCellsAt(p));
  }

  protected sidePattern(flips: number): CellSet {
    return flips % 2 ? this.closedBack : this.closedFront;
  }

  configured(p: Placement): Set<CellKey> {
    const cells = new Set<CellKey>();
    for (let row = p.location.row; row < p.location.row + GRID_SIZE; row++) {
      for (let col = p.location.col; col < p.location.col + GRID_SIZE; col++) {
        cells.add(cellKey(row, col));
      }
    }
    return cells;
  }
}
