// Puzzle System - Constraint contract, solver and board adapter

export type { Assignments, Domains, ConstraintProblem } from './csp/ConstraintProblem';

// Solver API
export { solve } from './solver';
export type { SolverOptions, SolverResult, SolveTrace } from './solver';

// Board adapter API
export { PuzzleConstraintAdapter } from './adapter/PuzzleConstraintAdapter';
export type { AdapterOptions, SolvableBoard, ShapeAssignments } from './adapter/PuzzleConstraintAdapter';
export { DEFAULT_RULES, checkRegion, isValidRegionSizes, boundingRectangle } from './adapter/feasibility';
export type { FeasibilityRules, RegionCheck } from './adapter/feasibility';

export { connectedComponents } from './utils/components';
