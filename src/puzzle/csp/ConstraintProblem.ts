// Contract between a constraint problem and the generic search engine

export type Assignments<V, D> = Map<V, D>;
export type Domains<V, D> = Map<V, D[]>;

/**
 * A constraint satisfaction problem as seen by the backtracking solver.
 * The solver knows nothing about what variables and values stand for.
 */
export interface ConstraintProblem<V, D> {
  // Every variable a complete assignment has to cover
  readonly variables: ReadonlySet<V>;

  // Initial, node-consistent candidate values of each variable
  readonly domains: Domains<V, D>;

  /**
   * Registers the committed assignments and runs whatever inference the
   * problem supports. Inferred assignments are added to `assignments`.
   * Returns false when no solution can extend the assignments.
   */
  registerCurrentAssignments(assignments: Assignments<V, D>, domains: ReadonlyMap<V, readonly D[]>): boolean;

  /**
   * True when giving `value` to `variable` conflicts with none of the
   * assignments registered last. `variable` is never one of them.
   */
  isConsistentAssignment(variable: V, value: D): boolean;
}
