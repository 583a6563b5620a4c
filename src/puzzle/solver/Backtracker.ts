// Backtracking search with MRV (Minimum Remaining Values) heuristic and forward checking
//
// The search never depends on the iteration order of variables or values for
// correctness; order only changes how fast a solution is found.

import type { Assignments, ConstraintProblem, Domains } from '../csp/ConstraintProblem';

export interface SolverOptions {
  trace?: boolean;
  debug?: boolean;
}

export interface SolveTrace {
  nodesExplored: number;
  totalBacktracks: number;
  maxDepth: number;
  inferenceCalls: number;
}

export interface SolverResult<V, D> {
  // null when the search exhausted every branch
  assignments: Assignments<V, D> | null;
  trace?: SolveTrace;
}

interface SearchContext<V, D> {
  problem: ConstraintProblem<V, D>;
  trace: SolveTrace;
  currentDepth: number;
}

// Select the unassigned variable with the fewest remaining values (MRV heuristic)
function selectMRV<V, D>(
  assignments: Assignments<V, D>,
  domains: ReadonlyMap<V, readonly D[]>
): { variable: V; domain: readonly D[] } | null {
  let best: { variable: V; domain: readonly D[] } | null = null;

  for (const [variable, domain] of domains) {
    if (assignments.has(variable)) continue;
    if (!best || domain.length < best.domain.length) {
      best = { variable, domain };
    }
  }

  return best;
}

/**
 * Registers the assignments with the problem (which may infer more of them),
 * then keeps only the values of unassigned variables that stay consistent.
 * Returns null as soon as a contradiction shows up.
 */
function forwardCheck<V, D>(
  assignments: Assignments<V, D>,
  domains: ReadonlyMap<V, readonly D[]>,
  ctx: SearchContext<V, D>
): Domains<V, D> | null {
  ctx.trace.inferenceCalls++;
  if (!ctx.problem.registerCurrentAssignments(assignments, domains)) {
    return null;
  }

  const next: Domains<V, D> = new Map();
  for (const [variable, domain] of domains) {
    if (assignments.has(variable)) continue;

    const remaining = domain.filter(value => ctx.problem.isConsistentAssignment(variable, value));
    if (remaining.length === 0) {
      return null;
    }
    next.set(variable, remaining);
  }

  return next;
}

// Remove the keys added since `before` was captured, inferred ones included
function undo<V, D>(assignments: Assignments<V, D>, before: ReadonlySet<V>): void {
  for (const variable of [...assignments.keys()]) {
    if (!before.has(variable)) {
      assignments.delete(variable);
    }
  }
}

// Recursive backtracking search; leaves a complete assignment in `assignments` on success
function search<V, D>(
  assignments: Assignments<V, D>,
  domains: ReadonlyMap<V, readonly D[]>,
  ctx: SearchContext<V, D>
): boolean {
  ctx.trace.nodesExplored++;

  if (assignments.size === ctx.problem.variables.size) {
    return true;
  }

  const selection = selectMRV(assignments, domains);
  if (!selection) {
    return false;
  }

  const { variable, domain } = selection;
  const before = new Set(assignments.keys());

  ctx.currentDepth++;
  ctx.trace.maxDepth = Math.max(ctx.trace.maxDepth, ctx.currentDepth);

  for (const value of domain) {
    assignments.set(variable, value);

    const nextDomains = forwardCheck(assignments, domains, ctx);
    if (nextDomains && search(assignments, nextDomains, ctx)) {
      ctx.currentDepth--;
      return true;
    }

    undo(assignments, before);
    ctx.trace.totalBacktracks++;
  }

  ctx.currentDepth--;
  return false;
}

// Main solve function
export function solve<V, D>(problem: ConstraintProblem<V, D>, options: SolverOptions = {}): SolverResult<V, D> {
  const defaultOptions: SolverOptions = {
    trace: false,
    debug: false,
    ...options
  };

  const ctx: SearchContext<V, D> = {
    problem,
    trace: {
      nodesExplored: 0,
      totalBacktracks: 0,
      maxDepth: 0,
      inferenceCalls: 0
    },
    currentDepth: 0
  };

  const domains = problem.domains;

  // Every variable needs at least one candidate before searching at all
  let assignments: Assignments<V, D> | null = null;
  const emptyDomain = [...problem.variables].some(variable => (domains.get(variable)?.length ?? 0) === 0);

  if (!emptyDomain) {
    const candidate: Assignments<V, D> = new Map();
    if (search(candidate, domains, ctx)) {
      assignments = candidate;
    }
  }

  if (defaultOptions.debug) {
    console.log(`solve: ${assignments ? 'solution found' : 'no solution'}`, ctx.trace);
  }

  return {
    assignments,
    trace: defaultOptions.trace ? ctx.trace : undefined
  };
}
