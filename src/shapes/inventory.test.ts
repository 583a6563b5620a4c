import { describe, expect, it } from 'vitest';
import { Board } from '../board/Board';
import { InvalidGeometryError, InvalidInventoryError } from '../errors';
import { loadDefaultInventory, parseInventory } from './inventory';

const MINIMAL = `
space: { rows: 4, cols: 10 }
grids:
  only:
    front: [[3, 3]]
shapes:
  pair:
    cells: [[0, 0], [0, 1]]
    placement: { flips: 1, rotations: 5, location: [0, 6] }
`;

describe('parseInventory', () => {
  it('reads grids, shapes and placements', () => {
    const inventory = parseInventory(MINIMAL);

    expect(inventory.rows).toBe(4);
    expect(inventory.cols).toBe(10);
    expect(inventory.grids).toEqual([{
      name: 'only',
      closedFront: [{ row: 3, col: 3 }],
      closedBack: [],
      placement: { flips: 0, rotations: 0, location: { row: 0, col: 0 } }
    }]);
    expect(inventory.shapes[0].placement).toEqual({ flips: 1, rotations: 5, location: { row: 0, col: 6 } });
  });

  it('falls back to the default rules', () => {
    expect(parseInventory(MINIMAL).rules).toEqual({ unitSize: 5, partialSizes: [4, 3], smallComponentSize: 5 });
  });

  it('reads custom rules', () => {
    const inventory = parseInventory(`${MINIMAL}\nrules: { unitSize: 2, partialSizes: [] }\n`);

    expect(inventory.rules).toEqual({ unitSize: 2, partialSizes: [], smallComponentSize: 5 });
  });

  it('requires a dot space', () => {
    expect(() => parseInventory('grids: {}\nshapes: {}\n')).toThrow(InvalidInventoryError);
    expect(() => parseInventory('space: { rows: 0, cols: 3 }\ngrids: {}\nshapes: {}\n'))
      .toThrow(InvalidInventoryError);
  });

  it('rejects bad cells', () => {
    const text = 'space: { rows: 4, cols: 4 }\ngrids: {}\nshapes:\n  bad:\n    cells: [[-1, 0]]\n';
    expect(() => parseInventory(text)).toThrow(InvalidGeometryError);
  });

  it('rejects shapes without cells', () => {
    const text = 'space: { rows: 4, cols: 4 }\ngrids: {}\nshapes:\n  none:\n    cells: []\n';
    expect(() => parseInventory(text)).toThrow(InvalidGeometryError);
  });

  it('rejects names shared by a grid and a shape', () => {
    const text = 'space: { rows: 4, cols: 4 }\ngrids:\n  same: {}\nshapes:\n  same:\n    cells: [[0, 0]]\n';
    expect(() => parseInventory(text)).toThrow(InvalidInventoryError);
  });
});

describe('loadDefaultInventory', () => {
  it('describes an eight by eight board and twelve shapes', () => {
    const inventory = loadDefaultInventory();

    expect(inventory.rows).toBe(10);
    expect(inventory.cols).toBe(24);
    expect(inventory.grids).toHaveLength(4);
    expect(inventory.shapes).toHaveLength(12);
    expect(inventory.shapes.reduce((total, spec) => total + spec.cells.length, 0)).toBe(57);
  });

  it('starts a board with every shape unplaced', () => {
    const board = Board.createDefault();

    expect(board.releasedEmptyCells.size).toBe(57);
    expect(board.releasedUnplacedShapes).toHaveLength(12);
    expect(board.isWon()).toBe(false);
  });
});
