import type { CellKey, CellSet } from '../../shapes/types';
import { cellKey, parseCell } from '../../shapes/types';
import { UnionFind } from './UnionFind';

/**
 * Splits a cell-set into maximal regions connected horizontally or
 * vertically (never diagonally).
 */
export function connectedComponents(cells: CellSet): Set<CellKey>[] {
  const uf = new UnionFind<CellKey>();

  for (const key of cells) {
    uf.add(key);
    const { row, col } = parseCell(key);
    // Linking each cell to its lower and right neighbours covers every edge once
    for (const neighbor of [cellKey(row + 1, col), cellKey(row, col + 1)]) {
      if (cells.has(neighbor)) {
        uf.union(key, neighbor);
      }
    }
  }

  return uf.groups().map(component => new Set(component));
}
