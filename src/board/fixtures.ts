// Small inventories shared by the board and solver tests

import { DEFAULT_RULES } from '../puzzle/adapter/feasibility';
import type { Inventory, ShapeSpec } from '../shapes/inventory';
import type { Cell } from '../shapes/types';
import { placement } from '../shapes/types';

export function cells(...pairs: [number, number][]): Cell[] {
  return pairs.map(([row, col]) => ({ row, col }));
}

export const CORNER = cells([0, 0], [0, 1], [0, 2], [1, 2], [2, 2]);
export const SQUARE = cells([0, 0], [0, 1], [1, 0], [1, 1]);
export const BAR = cells([0, 0], [0, 1], [0, 2], [0, 3], [0, 4]);

export function shape(name: string, pattern: Cell[], row: number, col: number): ShapeSpec {
  return { name, cells: pattern, placement: placement(0, 0, { row, col }) };
}

/**
 * One 4x4 grid in the corner of a 4x10 dot space whose front leaves the
 * top-left 3x3 block open, with a corner and a square waiting to its right.
 */
export function smallInventory(shapes: ShapeSpec[] = [
  shape('corner', CORNER, 0, 5),
  shape('square', SQUARE, 0, 8)
]): Inventory {
  return {
    rows: 4,
    cols: 10,
    rules: DEFAULT_RULES,
    grids: [{
      name: 'grid',
      closedFront: cells([0, 3], [1, 3], [2, 3], [3, 0], [3, 1], [3, 2], [3, 3]),
      closedBack: cells([0, 0]),
      placement: placement(0, 0)
    }],
    shapes
  };
}
