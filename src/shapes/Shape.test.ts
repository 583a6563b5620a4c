import { describe, expect, it } from 'vitest';
import { InvalidGeometryError, InvalidPlacementError } from '../errors';
import { BoardGrid } from './BoardGrid';
import { Shape } from './Shape';
import type { Cell } from './types';
import { cellKey, placement } from './types';

function cells(...pairs: [number, number][]): Cell[] {
  return pairs.map(([row, col]) => ({ row, col }));
}

function keys(...pairs: [number, number][]): Set<string> {
  return new Set(pairs.map(([row, col]) => cellKey(row, col)));
}

// L tetromino: three down, foot to the right
const HOOK = cells([0, 0], [1, 0], [2, 0], [2, 1]);
// Y pentomino, no symmetry at all
const FLAG = cells([0, 1], [1, 0], [1, 1], [2, 1], [3, 1]);
// S tetromino, symmetric under a half turn only
const SKEW = cells([0, 1], [0, 2], [1, 0], [1, 1]);

describe('Shape', () => {
  it('normalizes its canonical pattern to the origin', () => {
    const shape = new Shape('domino', cells([2, 3], [2, 4]));

    expect(shape.canonicalCells).toEqual(keys([0, 0], [0, 1]));
    expect(shape.height).toBe(1);
    expect(shape.width).toBe(2);
  });

  it('rejects malformed cells', () => {
    expect(() => new Shape('empty', [])).toThrow(InvalidGeometryError);
    expect(() => new Shape('negative', cells([-1, 0]))).toThrow(InvalidGeometryError);
    expect(() => new Shape('fraction', cells([0, 1.5]))).toThrow(InvalidGeometryError);
  });

  it('keeps the cell count under every flip, rotation and translation', () => {
    const shape = new Shape('flag', FLAG);
    for (const flips of [0, 1]) {
      for (const rotations of [0, 1, 2, 3]) {
        const result = shape.configured(placement(flips, rotations, { row: 7, col: 3 }));
        expect(result.size).toBe(5);
      }
    }
  });

  it('flips, then rotates, then translates', () => {
    const shape = new Shape('hook', HOOK);

    expect(shape.configured(placement(0, 1, { row: 2, col: 3 }))).toEqual(keys([2, 3], [2, 4], [2, 5], [3, 3]));
    expect(shape.configured(placement(1, 0))).toEqual(keys([0, 0], [0, 1], [1, 0], [2, 0]));
    expect(shape.configured(placement(1, 1))).toEqual(keys([0, 0], [0, 1], [0, 2], [1, 2]));
    expect(shape.configured(placement(0, 2))).toEqual(keys([0, 0], [0, 1], [1, 1], [2, 1]));
  });

  it('normalizes flips and rotations through the placement setter', () => {
    const shape = new Shape('hook', HOOK);

    shape.rotate(false);
    expect(shape.placement.rotations).toBe(3);

    shape.rotate(true);
    shape.rotate(true);
    expect(shape.placement.rotations).toBe(1);

    shape.flip();
    expect(shape.placement).toEqual(placement(1, 3));

    shape.flip();
    expect(shape.placement).toEqual(placement(0, 1));
  });

  it('returns to the same cells after flipping twice', () => {
    const shape = new Shape('flag', FLAG, placement(0, 1, { row: 4, col: 4 }));
    const before = new Set(shape.cells);

    shape.flip();
    expect(shape.cells).not.toEqual(before);
    shape.flip();
    expect(shape.cells).toEqual(before);
  });

  it('moves by a delta and resets to the initial placement', () => {
    const shape = new Shape('hook', HOOK, placement(0, 0, { row: 1, col: 1 }));

    shape.move({ row: 2, col: -1 });
    expect(shape.placement.location).toEqual({ row: 3, col: 0 });
    expect(shape.cells).toEqual(keys([3, 0], [4, 0], [5, 0], [5, 1]));

    shape.reset();
    expect(shape.placement.location).toEqual({ row: 1, col: 1 });
  });

  it('counts unique configurations by symmetry', () => {
    expect(new Shape('flag', FLAG).getUniqueConfigsAt({ row: 0, col: 0 })).toHaveLength(8);
    expect(new Shape('hook', HOOK).getUniqueConfigsAt({ row: 0, col: 0 })).toHaveLength(8);
    expect(new Shape('skew', SKEW).getUniqueConfigsAt({ row: 0, col: 0 })).toHaveLength(4);
    expect(new Shape('bar', cells([0, 0], [0, 1], [0, 2], [0, 3], [0, 4])).getUniqueConfigsAt({ row: 0, col: 0 }))
      .toHaveLength(2);
    expect(new Shape('cross', cells([0, 1], [1, 0], [1, 1], [1, 2], [2, 1])).getUniqueConfigsAt({ row: 0, col: 0 }))
      .toHaveLength(1);
    expect(new Shape('dot', cells([0, 0])).getUniqueConfigsAt({ row: 0, col: 0 })).toHaveLength(1);
  });

  it('anchors unique configurations at the requested location every time', () => {
    const shape = new Shape('skew', SKEW);
    const first = shape.getUniqueConfigsAt({ row: 2, col: 5 });
    const second = shape.getUniqueConfigsAt({ row: 2, col: 5 });

    expect(second).toEqual(first);
    expect(first.every(p => p.location.row === 2 && p.location.col === 5)).toBe(true);
  });

  it('finds the placement that reproduces a cell-set', () => {
    const shape = new Shape('hook', HOOK);
    const target = keys([4, 5], [4, 6], [4, 7], [5, 7]);

    shape.setCells(target);

    expect(shape.cells).toEqual(target);
    expect(shape.placement).toEqual(placement(1, 1, { row: 4, col: 5 }));
  });

  it('rejects cell-sets that are not a placement of the shape', () => {
    const shape = new Shape('hook', HOOK);

    expect(() => shape.setCells(keys([0, 0], [0, 1], [1, 0], [1, 1]))).toThrow(InvalidPlacementError);
    expect(() => shape.setCells([])).toThrow(InvalidPlacementError);
  });

  it('compares by canonical pattern only', () => {
    const a = new Shape('a', HOOK);
    const b = new Shape('b', cells([5, 5], [6, 5], [7, 5], [7, 6]), placement(1, 3, { row: 9, col: 9 }));
    const grid = new BoardGrid('grid', [], []);

    expect(a.equals(b)).toBe(true);
    expect(a.key).toBe(b.key);
    expect(a.equals(new Shape('flag', FLAG))).toBe(false);
    expect(a.equals(grid)).toBe(false);
  });
});
