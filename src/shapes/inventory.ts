// Puzzle inventory: dot space, grids, shapes and counting rules, read from YAML

import { readFileSync } from 'node:fs';
import YAML from 'yaml';
import { InvalidGeometryError, InvalidInventoryError } from '../errors';
import type { FeasibilityRules } from '../puzzle/adapter/feasibility';
import { DEFAULT_RULES } from '../puzzle/adapter/feasibility';
import type { Cell, Placement } from './types';
import { IDENTITY_PLACEMENT, placement } from './types';

export interface ShapeSpec {
  name: string;
  cells: Cell[];
  placement: Placement;
}

export interface GridSpec {
  name: string;
  closedFront: Cell[];
  closedBack: Cell[];
  placement: Placement;
}

export interface Inventory {
  rows: number;
  cols: number;
  rules: FeasibilityRules;
  grids: GridSpec[];
  shapes: ShapeSpec[];
}

const DEFAULT_INVENTORY_URL = new URL('./default-inventory.yaml', import.meta.url);

type Raw = Record<string, unknown>;

function isRecord(value: unknown): value is Raw {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireRecord(value: unknown, what: string): Raw {
  if (!isRecord(value)) {
    throw new InvalidInventoryError(`${what} must be a mapping`);
  }
  return value;
}

function requirePositiveInt(value: unknown, what: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    throw new InvalidInventoryError(`${what} must be a positive integer`);
  }
  return value;
}

function parseCell(value: unknown, what: string): Cell {
  if (!Array.isArray(value) || value.length !== 2) {
    throw new InvalidGeometryError(`${what}: cells must be [row, col] pairs`);
  }
  const [row, col] = value;
  if (typeof row !== 'number' || typeof col !== 'number' || !Number.isInteger(row) || !Number.isInteger(col)
      || row < 0 || col < 0) {
    throw new InvalidGeometryError(`${what}: cells must be non-negative integers, got ${JSON.stringify(value)}`);
  }
  return { row, col };
}

function parseCells(value: unknown, what: string): Cell[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    throw new InvalidInventoryError(`${what} must be a list of cells`);
  }
  return value.map(cell => parseCell(cell, what));
}

function parseInteger(value: unknown, what: string): number {
  if (value === undefined) return 0;
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new InvalidInventoryError(`${what} must be an integer`);
  }
  return value;
}

function parsePlacement(value: unknown, what: string): Placement {
  if (value === undefined) return IDENTITY_PLACEMENT;
  const raw = requireRecord(value, `${what} placement`);
  const location = raw.location === undefined ? { row: 0, col: 0 } : parseCell(raw.location, `${what} location`);
  return placement(
    parseInteger(raw.flips, `${what} flips`),
    parseInteger(raw.rotations, `${what} rotations`),
    location
  );
}

function parseRules(value: unknown): FeasibilityRules {
  if (value === undefined) return DEFAULT_RULES;
  const raw = requireRecord(value, 'rules');
  const partialSizes = raw.partialSizes ?? [];
  if (!Array.isArray(partialSizes)) {
    throw new InvalidInventoryError('rules.partialSizes must be a list');
  }
  return {
    unitSize: requirePositiveInt(raw.unitSize ?? DEFAULT_RULES.unitSize, 'rules.unitSize'),
    partialSizes: partialSizes.map((size, i) => requirePositiveInt(size, `rules.partialSizes[${i}]`)),
    smallComponentSize: requirePositiveInt(
      raw.smallComponentSize ?? DEFAULT_RULES.smallComponentSize,
      'rules.smallComponentSize'
    )
  };
}

function parseGrids(value: unknown): GridSpec[] {
  return Object.entries(requireRecord(value, 'grids')).map(([name, entry]) => {
    const raw = requireRecord(entry, `grid ${name}`);
    return {
      name,
      closedFront: parseCells(raw.front, `grid ${name} front`),
      closedBack: parseCells(raw.back, `grid ${name} back`),
      placement: parsePlacement(raw.placement, `grid ${name}`)
    };
  });
}

function parseShapes(value: unknown): ShapeSpec[] {
  return Object.entries(requireRecord(value, 'shapes')).map(([name, entry]) => {
    const raw = requireRecord(entry, `shape ${name}`);
    const cells = parseCells(raw.cells, `shape ${name}`);
    if (cells.length === 0) {
      throw new InvalidGeometryError(`shape ${name} has no cells`);
    }
    return { name, cells, placement: parsePlacement(raw.placement, `shape ${name}`) };
  });
}

export function parseInventory(text: string): Inventory {
  const raw = requireRecord(YAML.parse(text), 'Inventory');
  const space = requireRecord(raw.space, 'space');

  const inventory: Inventory = {
    rows: requirePositiveInt(space.rows, 'space.rows'),
    cols: requirePositiveInt(space.cols, 'space.cols'),
    rules: parseRules(raw.rules),
    grids: parseGrids(raw.grids),
    shapes: parseShapes(raw.shapes)
  };

  // Saved layouts address items by name, so names must not collide across kinds
  const names = new Set<string>();
  for (const item of [...inventory.grids, ...inventory.shapes]) {
    if (names.has(item.name)) {
      throw new InvalidInventoryError(`Duplicate item name: ${item.name}`);
    }
    names.add(item.name);
  }

  return inventory;
}

export function loadInventory(path: string | URL): Inventory {
  return parseInventory(readFileSync(path, 'utf-8'));
}

export function loadDefaultInventory(): Inventory {
  return loadInventory(DEFAULT_INVENTORY_URL);
}
