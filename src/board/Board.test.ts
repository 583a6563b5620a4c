import { beforeEach, describe, expect, it, vi } from 'vitest';
import {
  IllegalPickError,
  IllegalReleaseError,
  InconsistentStateError,
  InitialConfigurationError,
  InvalidInventoryError,
  InvalidStateError,
  NoItemError
} from '../errors';
import type { Shape } from '../shapes/Shape';
import { Board } from './Board';
import { CORNER, SQUARE, shape, smallInventory } from './fixtures';

function find(board: Board, name: string): Shape {
  const found = board.shapes.find(s => s.name === name);
  if (!found) throw new Error(`no shape ${name}`);
  return found;
}

describe('Board', () => {
  let board: Board;
  let corner: Shape;
  let square: Shape;

  beforeEach(() => {
    board = new Board(smallInventory());
    corner = find(board, 'corner');
    square = find(board, 'square');
  });

  it('starts with every shape waiting beside the grid', () => {
    expect(board.releasedEmptyCells.size).toBe(9);
    expect(board.releasedUnplacedShapes.map(s => s.name)).toEqual(['corner', 'square']);
    expect(board.isPicked).toBe(false);
    expect(board.isWon()).toBe(false);
  });

  it('places a picked shape on open cells', () => {
    board.pick([square]);
    square.move({ row: 0, col: -8 });
    board.release();

    expect(board.isPicked).toBe(false);
    expect(board.releasedEmptyCells.size).toBe(5);
    expect(board.releasedUnplacedShapes).toEqual([corner]);
  });

  it('refuses to release a shape on a closed cell', () => {
    board.pick([square]);
    square.move({ row: 2, col: -6 });

    expect(() => board.release()).toThrow(IllegalReleaseError);
    expect(board.isPicked).toBe(true);

    board.unpick();
    expect(board.isPicked).toBe(false);
    expect(square.placement.location).toEqual({ row: 0, col: 8 });
  });

  it('refuses to release a shape off the dot space or onto another shape', () => {
    board.pick([square]);
    square.move({ row: 0, col: 1 });
    expect(() => board.release()).toThrow(IllegalReleaseError);

    square.move({ row: 0, col: -4 });
    expect(() => board.release()).toThrow(IllegalReleaseError);

    board.unpick();
  });

  it('reports an inconsistent state when the saved placements cannot be released', () => {
    board.pick([square]);
    square.move({ row: 0, col: -8 });
    vi.spyOn(board, 'release').mockImplementationOnce(() => {
      throw new IllegalReleaseError('blocked');
    });

    let error: unknown;
    try {
      board.unpick();
    } catch (err) {
      error = err;
    }

    expect(error).toBeInstanceOf(InconsistentStateError);
    expect(error).toHaveProperty('cause', expect.any(IllegalReleaseError));
    expect(square.placement.location).toEqual({ row: 0, col: 8 });
  });

  it('keeps one selection at a time', () => {
    expect(() => board.release()).toThrow(InvalidStateError);
    expect(() => board.unpick()).toThrow(InvalidStateError);

    board.pick([square]);
    expect(() => board.pick([corner])).toThrow(InvalidStateError);
  });

  it('cannot pick a grid with shapes on it', () => {
    board.pick([square]);
    square.move({ row: 0, col: -8 });
    board.release();

    expect(() => board.pick(board.grids)).toThrow(IllegalPickError);
    expect(board.isPicked).toBe(false);

    board.pick([square]);
    expect(board.isPicked).toBe(true);
  });

  it('flips an empty grid to its other side', () => {
    board.pick(board.grids);
    board.grids[0].flip();
    board.release();

    expect(board.grids[0].activeSide).toBe('back');
    expect(board.releasedEmptyCells.size).toBe(15);
  });

  it('finds the shape on top before the grid below', () => {
    expect(board.getAt({ row: 0, col: 5 })).toBe(corner);
    expect(board.getAt({ row: 0, col: 0 })).toBe(board.grids[0]);
    expect(() => board.getAt({ row: 3, col: 9 })).toThrow(NoItemError);
  });

  it('is won once every open cell is covered', () => {
    board.pick([corner, square]);
    corner.move({ row: 0, col: -5 });
    square.move({ row: 1, col: -8 });
    board.release();

    expect(board.isWon()).toBe(true);
    expect(board.releasedUnplacedShapes).toEqual([]);
  });

  it('notifies views after each settled change', () => {
    const update = vi.fn();
    board.subscribe({ update });

    board.pick([square]);
    square.move({ row: 2, col: -6 });
    expect(() => board.release()).toThrow(IllegalReleaseError);
    expect(update).not.toHaveBeenCalled();

    board.unpick();
    expect(update).toHaveBeenCalledTimes(1);

    board.reset();
    expect(update).toHaveBeenCalledTimes(2);
  });

  it('resets every item to its initial placement', () => {
    board.pick([square]);
    square.move({ row: 0, col: -8 });
    board.release();

    board.reset();

    expect(square.placement.location).toEqual({ row: 0, col: 8 });
    expect(board.releasedEmptyCells.size).toBe(9);
  });

  it('saves a layout and starts over from it', () => {
    board.pick([square]);
    square.move({ row: 0, col: -8 });
    board.release();
    const layout = board.saveLayout();

    board.reset();
    board.loadLayout(layout);

    expect(find(board, 'square').placement.location).toEqual({ row: 0, col: 0 });
    board.reset();
    expect(find(board, 'square').placement.location).toEqual({ row: 0, col: 0 });
    expect(board.releasedEmptyCells.size).toBe(5);
  });

  it('rejects layouts naming unknown items', () => {
    expect(() => board.loadLayout({ ghost: square.placement })).toThrow(InvalidInventoryError);
  });

  it('rejects illegal initial placements', () => {
    const inventory = smallInventory([shape('square', SQUARE, 2, 2)]);

    expect(() => new Board(inventory)).toThrow(InitialConfigurationError);
  });

  it('rejects two shapes with the same pattern', () => {
    const inventory = smallInventory([shape('corner', CORNER, 0, 5), shape('twin', CORNER, 0, 5)]);

    expect(() => new Board(inventory)).toThrow(InvalidInventoryError);
  });
});
