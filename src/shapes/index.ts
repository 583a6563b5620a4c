// Shapes, grids and inventory

export type { Cell, CellKey, CellSet, Footprint, FootprintKey, Placement } from './types';
export { cellKey, parseCell, placement, toFootprint, footprintKey, compareCellKeys } from './types';

export { Piece } from './Piece';
export { Shape } from './Shape';
export { BoardGrid, GRID_SIZE } from './BoardGrid';
export type { GridSide } from './BoardGrid';

export { parseInventory, loadInventory, loadDefaultInventory } from './inventory';
export type { Inventory, ShapeSpec, GridSpec } from './inventory';
