import { InconsistentStateError, IllegalPickError, IllegalReleaseError, InvalidInventoryError, InvalidStateError, NoItemError } from '../errors';
import type { SolvableBoard } from '../puzzle/adapter/PuzzleConstraintAdapter';
import type { FeasibilityRules } from '../puzzle/adapter/feasibility';
import { BoardGrid } from '../shapes/BoardGrid';
import type { Inventory } from '../shapes/inventory';
import { loadDefaultInventory } from '../shapes/inventory';
import type { Piece } from '../shapes/Piece';
import { Shape } from '../shapes/Shape';
import type { Cell, CellKey, Placement } from '../shapes/types';
import { cellKey, difference, placement } from '../shapes/types';
import type { DotSpace } from './layers';
import { GridLayer, ShapeLayer } from './layers';

// Notified whenever the board settles into a new released state
export interface BoardView {
  update(): void;
}

// Item name -> placement
export type SavedLayout = Record<string, Placement>;

interface Pieces {
  grids: BoardGrid[];
  shapes: Shape[];
}

interface Layers {
  grids: GridLayer;
  shapes: ShapeLayer;
}

interface Momento {
  item: Piece;
  placement: Placement;
}

function createPieces(inventory: Inventory, layout: SavedLayout = {}): Pieces {
  const known = new Set([...inventory.grids, ...inventory.shapes].map(item => item.name));
  const unknown = Object.keys(layout).filter(name => !known.has(name));
  if (unknown.length > 0) {
    throw new InvalidInventoryError(`Layout refers to unknown items: ${unknown.join(', ')}`);
  }

  const grids = inventory.grids.map(spec =>
    new BoardGrid(spec.name, spec.closedFront, spec.closedBack, layout[spec.name] ?? spec.placement)
  );
  const shapes = inventory.shapes.map(spec =>
    new Shape(spec.name, spec.cells, layout[spec.name] ?? spec.placement)
  );

  shapes.forEach((shape, i) => {
    const twin = shapes.slice(0, i).find(other => other.equals(shape));
    if (twin) {
      throw new InvalidInventoryError(`Shape ${shape.name} duplicates the pattern of ${twin.name}`);
    }
  });

  return { grids, shapes };
}

// Fresh layers start with everything picked; resetting them validates the initial placements
function createLayers(space: DotSpace, pieces: Pieces): Layers {
  let shapes: ShapeLayer;
  const grids = new GridLayer(space, pieces.grids, () => shapes);
  shapes = new ShapeLayer(space, pieces.shapes, () => grids);

  grids.reset();
  shapes.reset();
  return { grids, shapes };
}

/**
 * The playing surface: a dot space holding grids and shapes. Items must be
 * picked before they move and released afterwards; releasing validates the
 * new placements.
 */
export class Board implements SolvableBoard {
  readonly rows: number;
  readonly cols: number;
  readonly rules: FeasibilityRules;

  private readonly inventory: Inventory;
  private pieces: Pieces;
  private layers: Layers;
  private picked = false;
  private momentos: Momento[] = [];
  private views: BoardView[] = [];

  constructor(inventory: Inventory, layout?: SavedLayout) {
    this.inventory = inventory;
    this.rows = inventory.rows;
    this.cols = inventory.cols;
    this.rules = inventory.rules;
    this.pieces = createPieces(inventory, layout);
    this.layers = createLayers(this, this.pieces);
  }

  static createDefault(): Board {
    return new Board(loadDefaultInventory());
  }

  // Returns every item to its initial placement
  reset(): void {
    this.layers = createLayers(this, this.pieces);
    this.picked = false;
    this.momentos = [];
    this.notify();
  }

  /**
   * Must be called before any item can be moved.
   * Throws InvalidStateError while other items are picked.
   */
  pick(items: Iterable<Piece>): void {
    if (this.picked) {
      throw new InvalidStateError('Cannot pick before releasing already picked items!');
    }

    const selection = new Set(items);
    const shapes = this.pieces.shapes.filter(shape => selection.has(shape));
    const grids = this.pieces.grids.filter(grid => selection.has(grid));

    try {
      this.layers.shapes.pick(shapes);
      this.layers.grids.pick(grids);
    } catch (err) {
      if (err instanceof IllegalPickError) {
        // The shapes have not moved, so releasing them again cannot fail
        this.layers.shapes.release();
      }
      throw err;
    }

    this.momentos = [...shapes, ...grids].map(item => ({ item, placement: item.placement }));
    this.picked = true;
  }

  // Must be called after the picked items are moved to their new placements
  release(): void {
    if (!this.picked) {
      throw new InvalidStateError('Cannot release while no picked items!');
    }

    const pickedGrids = this.layers.grids.pickedItems;
    try {
      this.layers.grids.release();
      this.layers.shapes.release();
    } catch (err) {
      if (err instanceof IllegalReleaseError) {
        this.layers.grids.pick(pickedGrids);
      }
      throw err;
    }

    this.picked = false;
    this.notify();
  }

  // Returns the picked items to where they were when picked
  unpick(): void {
    if (!this.picked) {
      throw new InvalidStateError('Cannot unpick while no picked items!');
    }

    for (const { item, placement: saved } of this.momentos) {
      item.placement = saved;
    }
    try {
      this.release();
    } catch (err) {
      if (err instanceof IllegalReleaseError) {
        throw new InconsistentStateError('Momentos were not captured at legal configurations', { cause: err });
      }
      throw err;
    }
  }

  // The visible item at a cell: a released shape first, then a released grid
  getAt(cell: Cell): Piece {
    const key = cellKey(cell.row, cell.col);
    const item = this.layers.shapes.getAt(key) ?? this.layers.grids.getAt(key);
    if (!item) {
      throw new NoItemError(`There is no item at (${cell.row}, ${cell.col})`);
    }
    return item;
  }

  isWon(): boolean {
    return !this.picked && this.releasedEmptyCells.size === 0;
  }

  subscribe(view: BoardView): void {
    this.views.push(view);
  }

  saveLayout(): SavedLayout {
    const layout: SavedLayout = {};
    for (const item of [...this.pieces.grids, ...this.pieces.shapes]) {
      const { flips, rotations, location } = item.placement;
      layout[item.name] = placement(flips, rotations, location);
    }
    return layout;
  }

  // Replaces the items with ones starting at the saved placements
  loadLayout(layout: SavedLayout): void {
    const pieces = createPieces(this.inventory, layout);
    const layers = createLayers(this, pieces);
    this.pieces = pieces;
    this.layers = layers;
    this.picked = false;
    this.momentos = [];
    this.notify();
  }

  get isPicked(): boolean {
    return this.picked;
  }

  get shapes(): readonly Shape[] {
    return this.pieces.shapes;
  }

  get grids(): readonly BoardGrid[] {
    return this.pieces.grids;
  }

  get releasedGrids(): BoardGrid[] {
    return this.layers.grids.releasedItems;
  }

  get releasedShapes(): Shape[] {
    return this.layers.shapes.releasedItems;
  }

  // Released shapes that are not on any released grid
  get releasedUnplacedShapes(): Shape[] {
    return this.layers.shapes.releasedUnplacedShapes;
  }

  // Open cells of released grids not covered by released shapes
  get releasedEmptyCells(): Set<CellKey> {
    return difference(this.layers.grids.releasedOpenCells, this.layers.shapes.releasedCells);
  }

  private notify(): void {
    for (const view of this.views) {
      view.update();
    }
  }
}
