// Counting rules that decide whether an empty region can still be tiled

import type { Cell, CellKey, CellSet } from '../../shapes/types';
import { parseCell } from '../../shapes/types';
import { connectedComponents } from '../utils/components';

/**
 * Sizes the inventory can produce. Most shapes have `unitSize` cells; each
 * entry of `partialSizes` is one shape with fewer cells. Components of at most
 * `smallComponentSize` cells must be filled by a single shape.
 */
export interface FeasibilityRules {
  unitSize: number;
  partialSizes: number[];
  smallComponentSize: number;
}

export const DEFAULT_RULES: FeasibilityRules = {
  unitSize: 5,
  partialSizes: [4, 3],
  smallComponentSize: 5
};

export interface RegionCheck {
  valid: boolean;
  // Components no larger than rules.smallComponentSize
  smallComponents: Set<CellKey>[];
}

function mod(n: number, m: number): number {
  return ((n % m) + m) % m;
}

function sum(values: readonly number[]): number {
  return values.reduce((acc, v) => acc + v, 0);
}

// Every sub-multiset of `values`, each entry used at most once
export function subsets(values: readonly number[]): number[][] {
  let result: number[][] = [[]];
  for (const value of values) {
    result = result.concat(result.map(subset => [...subset, value]));
  }
  return result;
}

// Partial-shape combinations that could account for `total` empty cells
export function admissibleSubsets(total: number, rules: FeasibilityRules): number[][] {
  return subsets(rules.partialSizes).filter(subset => mod(total - sum(subset), rules.unitSize) === 0);
}

/**
 * True when the region sizes can be split into unit-size shapes plus the
 * partial shapes: some admissible subset of partial sizes has to leave every
 * component a multiple of the unit size after taking part of that subset.
 */
export function isValidRegionSizes(total: number, componentSizes: readonly number[], rules: FeasibilityRules): boolean {
  for (const subset of admissibleSubsets(total, rules)) {
    const partialSums = subsets(subset).map(sum);
    const fits = componentSizes.every(size =>
      partialSums.some(s => size >= s && mod(size - s, rules.unitSize) === 0)
    );
    if (fits) return true;
  }
  return false;
}

export function checkRegion(emptyCells: CellSet, rules: FeasibilityRules): RegionCheck {
  if (admissibleSubsets(emptyCells.size, rules).length === 0) {
    return { valid: false, smallComponents: [] };
  }

  const components = connectedComponents(emptyCells);
  const sizes = components.map(component => component.size);
  if (!isValidRegionSizes(emptyCells.size, sizes, rules)) {
    return { valid: false, smallComponents: [] };
  }

  return {
    valid: true,
    smallComponents: components.filter(component => component.size <= rules.smallComponentSize)
  };
}

// Every anchor in the bounding rectangle of the cells
export function boundingRectangle(cells: Iterable<CellKey>): Cell[] {
  let minRow = Infinity, minCol = Infinity, maxRow = -Infinity, maxCol = -Infinity;
  for (const key of cells) {
    const { row, col } = parseCell(key);
    if (row < minRow) minRow = row;
    if (col < minCol) minCol = col;
    if (row > maxRow) maxRow = row;
    if (col > maxCol) maxCol = col;
  }

  const anchors: Cell[] = [];
  for (let row = minRow; row <= maxRow; row++) {
    for (let col = minCol; col <= maxCol; col++) {
      anchors.push({ row, col });
    }
  }
  return anchors;
}
