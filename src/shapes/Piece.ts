// Placeable dot patterns: immutable identity plus a mutable placement
//
// A piece's identity (`key`) is fixed at construction and is the only thing
// consulted by `equals`. The placement changes only through the `placement`
// setter, which keeps flips in [0, 2) and rotations in [0, 4).

import { InvalidPlacementError } from '../errors';
import type { Cell, CellKey, CellSet, Placement } from './types';
import { cellKey, parseCell, placement, minCorner, sameCells } from './types';

const FLIPS = [0, 1];
const ROTATIONS = [0, 1, 2, 3];

function mod(n: number, m: number): number {
  return ((n % m) + m) % m;
}

function normalizePlacement(p: Placement): Placement {
  return placement(mod(p.flips, 2), mod(p.rotations, 4), p.location);
}

// ============= Transforms =============
// All reflections happen inside the height x width bounding box of the
// untransformed pattern, so every result is anchored at the origin.

function mapCells(cells: Iterable<CellKey>, fn: (cell: Cell) => Cell): Set<CellKey> {
  const result = new Set<CellKey>();
  for (const key of cells) {
    const { row, col } = fn(parseCell(key));
    result.add(cellKey(row, col));
  }
  return result;
}

export function flippedVertically(cells: Iterable<CellKey>, height: number): Set<CellKey> {
  return mapCells(cells, ({ row, col }) => ({ row: height - 1 - row, col }));
}

function rotatedClockwise(
  cells: Iterable<CellKey>,
  times: number,
  height: number,
  width: number
): Set<CellKey> {
  switch (mod(times, 4)) {
    case 1:
      return mapCells(cells, ({ row, col }) => ({ row: col, col: height - 1 - row }));
    case 2:
      return mapCells(cells, ({ row, col }) => ({ row: height - 1 - row, col: width - 1 - col }));
    case 3:
      return mapCells(cells, ({ row, col }) => ({ row: width - 1 - col, col: row }));
    default:
      return new Set(cells);
  }
}

function moved(cells: Iterable<CellKey>, delta: Cell): Set<CellKey> {
  return mapCells(cells, ({ row, col }) => ({ row: row + delta.row, col: col + delta.col }));
}

export function isValidCell(cell: Cell): boolean {
  return Number.isInteger(cell.row) && Number.isInteger(cell.col) && cell.row >= 0 && cell.col >= 0;
}

// ============= Piece =============

export abstract class Piece {
  readonly name: string;
  readonly key: string;
  readonly height: number;
  readonly width: number;

  private readonly initialPlacement: Placement;
  private current: Placement;
  private occupied: CellSet | null = null;
  // Distinct flip/rotation combinations at the origin, computed on first use
  private uniqueConfigs: Placement[] | null = null;

  protected constructor(name: string, key: string, height: number, width: number, initialPlacement: Placement) {
    this.name = name;
    this.key = key;
    this.height = height;
    this.width = width;
    this.initialPlacement = normalizePlacement(initialPlacement);
    this.current = this.initialPlacement;
  }

  // The untransformed pattern for the side selected by the flip parity
  protected abstract sidePattern(flips: number): CellSet;

  // Cells occupied by this piece at a placement
  abstract configured(p: Placement): Set<CellKey>;

  // Flip, then rotate, then translate
  protected transformed(p: Placement): Set<CellKey> {
    const side = this.sidePattern(mod(p.flips, 2));
    const rotated = rotatedClockwise(side, p.rotations, this.height, this.width);
    return moved(rotated, p.location);
  }

  get placement(): Placement {
    return this.current;
  }

  set placement(p: Placement) {
    this.current = normalizePlacement(p);
    this.occupied = null;
  }

  get cells(): CellSet {
    if (!this.occupied) {
      this.occupied = this.configured(this.current);
    }
    return this.occupied;
  }

  get size(): number {
    return this.cells.size;
  }

  has(key: CellKey): boolean {
    return this.cells.has(key);
  }

  equals(other: Piece): boolean {
    return other.constructor === this.constructor && other.key === this.key;
  }

  reset(): void {
    this.placement = this.initialPlacement;
  }

  flip(): void {
    const { flips, rotations, location } = this.current;
    this.placement = placement(flips + 1, -rotations, location);
  }

  rotate(clockwise: boolean): void {
    const { flips, rotations, location } = this.current;
    this.placement = placement(flips, rotations + (clockwise ? 1 : -1), location);
  }

  move(delta: Cell): void {
    const { flips, rotations, location } = this.current;
    this.placement = placement(flips, rotations, {
      row: location.row + delta.row,
      col: location.col + delta.col
    });
  }

  /**
   * Placements at `location` that produce distinct patterns. There are
   * 8 / |symmetry group| of them: 8, 4, 2 or 1.
   */
  getUniqueConfigsAt(location: Cell): Placement[] {
    if (!this.uniqueConfigs) {
      this.uniqueConfigs = this.computeUniqueConfigs();
    }
    return this.uniqueConfigs.map(p => placement(p.flips, p.rotations, location));
  }

  private computeUniqueConfigs(): Placement[] {
    const configs: Placement[] = [];
    const seen: CellSet[] = [];

    for (const flips of FLIPS) {
      for (const rotations of ROTATIONS) {
        const config = placement(flips, rotations);
        const cells = this.configured(config);
        if (seen.some(other => sameCells(other, cells))) continue;
        seen.push(cells);
        configs.push(config);
      }
    }

    return configs;
  }

  /**
   * Moves the piece onto exactly `cells`.
   * Throws InvalidPlacementError when no canonical configuration matches.
   */
  setCells(cells: Iterable<CellKey>): void {
    const target = new Set(cells);
    if (target.size > 0) {
      for (const config of this.getUniqueConfigsAt(minCorner(target))) {
        if (sameCells(this.configured(config), target)) {
          this.placement = config;
          return;
        }
      }
    }
    throw new InvalidPlacementError(`The given cells do not correspond to ${this.name}`);
  }

  toString(): string {
    return `${this.constructor.name}(${this.name})`;
  }
}
