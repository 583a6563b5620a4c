// Solver exports
export { solve } from './Backtracker';
export type { SolverOptions, SolverResult, SolveTrace } from './Backtracker';
