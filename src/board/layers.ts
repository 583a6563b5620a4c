// Per-kind pick/release rules for grids and shapes
//
// Each layer tracks which of its items are picked. Picked items may move
// freely; releasing validates their new placements against the released
// items of both layers.

import { IllegalPickError, IllegalReleaseError, InitialConfigurationError } from '../errors';
import type { BoardGrid } from '../shapes/BoardGrid';
import type { Piece } from '../shapes/Piece';
import type { Shape } from '../shapes/Shape';
import type { CellKey } from '../shapes/types';
import { parseCell } from '../shapes/types';

export interface DotSpace {
  rows: number;
  cols: number;
}

export class BoardLayer<T extends Piece> {
  protected picked: Set<T>;

  constructor(
    protected readonly space: DotSpace,
    protected readonly items: readonly T[]
  ) {
    this.picked = new Set(items);
  }

  // Puts every item back at its initial placement and releases them all
  reset(): void {
    for (const item of this.items) {
      item.reset();
    }
    try {
      this.release();
    } catch (err) {
      if (err instanceof IllegalReleaseError) {
        throw new InitialConfigurationError('Initial configuration of items are not legal!', { cause: err });
      }
      throw err;
    }
  }

  release(): void {
    if (!this.isReleasePossible()) {
      throw new IllegalReleaseError(
        'It is not possible to release the picked items with their current configuration!'
      );
    }
    this.picked = new Set();
  }

  pick(items: Iterable<T>): void {
    const selection = [...items];
    if (!this.arePickable(selection)) {
      throw new IllegalPickError('It is not possible to pick the selected items!');
    }
    this.picked = new Set(selection);
  }

  getAt(key: CellKey): T | null {
    return this.releasedItems.find(item => item.has(key)) ?? null;
  }

  isReleasePossible(): boolean {
    const picked = this.pickedItems;
    return picked.every(item => this.isOnBoard(item) && !this.isOverlappingReleasedItems(item))
      && this.areSeparated(picked);
  }

  arePickable(_items: readonly T[]): boolean {
    return true;
  }

  isOnBoard(item: Piece): boolean {
    for (const key of item.cells) {
      const { row, col } = parseCell(key);
      if (row < 0 || row >= this.space.rows || col < 0 || col >= this.space.cols) return false;
    }
    return true;
  }

  isOverlappingReleasedItems(item: Piece): boolean {
    const released = this.releasedCells;
    for (const key of item.cells) {
      if (released.has(key)) return true;
    }
    return false;
  }

  protected areSeparated(items: readonly T[]): boolean {
    const seen = new Set<CellKey>();
    for (const item of items) {
      for (const key of item.cells) {
        if (seen.has(key)) return false;
        seen.add(key);
      }
    }
    return true;
  }

  get pickedItems(): T[] {
    return [...this.picked];
  }

  get releasedItems(): T[] {
    return this.items.filter(item => !this.picked.has(item));
  }

  get releasedCells(): Set<CellKey> {
    const cells = new Set<CellKey>();
    for (const item of this.releasedItems) {
      for (const key of item.cells) cells.add(key);
    }
    return cells;
  }
}

export class GridLayer extends BoardLayer<BoardGrid> {
  constructor(space: DotSpace, grids: readonly BoardGrid[], private readonly shapeLayer: () => ShapeLayer) {
    super(space, grids);
  }

  // Grids cannot be released under shapes that are already in place
  isReleasePossible(): boolean {
    return super.isReleasePossible()
      && !this.pickedItems.some(grid => this.shapeLayer().isOverlappingReleasedItems(grid));
  }

  arePickable(grids: readonly BoardGrid[]): boolean {
    return grids.every(grid => this.picked.has(grid))
      || !grids.some(grid => this.shapeLayer().isOverlappingReleasedItems(grid));
  }

  isOnReleasedOpenCells(item: Piece): boolean {
    const open = this.releasedOpenCells;
    for (const key of item.cells) {
      if (!open.has(key)) return false;
    }
    return true;
  }

  get releasedOpenCells(): Set<CellKey> {
    const cells = new Set<CellKey>();
    for (const grid of this.releasedItems) {
      for (const key of grid.openCells) cells.add(key);
    }
    return cells;
  }
}

export class ShapeLayer extends BoardLayer<Shape> {
  constructor(space: DotSpace, shapes: readonly Shape[], private readonly gridLayer: () => GridLayer) {
    super(space, shapes);
  }

  // A shape either sits entirely on open grid cells or stays clear of the grids
  isReleasePossible(): boolean {
    const grids = this.gridLayer();
    return super.isReleasePossible()
      && this.pickedItems.every(shape => grids.isOnReleasedOpenCells(shape) || !grids.isOverlappingReleasedItems(shape));
  }

  // Released shapes lying outside every released grid
  get releasedUnplacedShapes(): Shape[] {
    const grids = this.gridLayer();
    return this.releasedItems.filter(shape => !grids.isOverlappingReleasedItems(shape));
  }
}
