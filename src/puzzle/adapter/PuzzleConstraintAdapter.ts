// Constraint problem built from a board: shapes are variables, cell-sets are values

import { IllegalReleaseError, InvalidPlacementError, InvalidStateError, NoSolutionError } from '../../errors';
import type { Piece } from '../../shapes/Piece';
import type { Shape } from '../../shapes/Shape';
import type { CellKey, Footprint } from '../../shapes/types';
import { difference, footprintKey, isDisjoint, isSubset, toFootprint } from '../../shapes/types';
import type { Assignments, ConstraintProblem, Domains } from '../csp/ConstraintProblem';
import type { SolveTrace } from '../solver/Backtracker';
import { solve as search } from '../solver/Backtracker';
import type { FeasibilityRules } from './feasibility';
import { DEFAULT_RULES, boundingRectangle, checkRegion } from './feasibility';

/**
 * What the adapter needs from a board. Picking the variables locks them for
 * the duration of a solve, which also keeps a second solve out.
 */
export interface SolvableBoard {
  readonly shapes: readonly Shape[];
  readonly releasedUnplacedShapes: readonly Shape[];
  readonly releasedEmptyCells: ReadonlySet<CellKey>;
  readonly rules?: FeasibilityRules;
  pick(items: Iterable<Piece>): void;
  release(): void;
  unpick(): void;
  isWon(): boolean;
}

export interface AdapterOptions {
  rules?: FeasibilityRules;
  debug?: boolean;
}

export type ShapeAssignments = Assignments<Shape, Footprint>;

export class PuzzleConstraintAdapter implements ConstraintProblem<Shape, Footprint> {
  private readonly rules: FeasibilityRules;
  private readonly debug: boolean;

  // Shape identity key -> cells of the last full solution
  private solution = new Map<string, Footprint>();
  private searchCount = 0;
  private trace: SolveTrace | null = null;

  // State of the solve in progress
  private currentVariables = new Set<Shape>();
  private currentDomains: Domains<Shape, Footprint> = new Map();
  private emptyCells: ReadonlySet<CellKey> = new Set();
  private committedCells = new Set<CellKey>();

  constructor(private readonly board: SolvableBoard, options: AdapterOptions = {}) {
    const { rules, debug } = {
      rules: board.rules ?? DEFAULT_RULES,
      debug: false,
      ...options
    };
    this.rules = rules;
    this.debug = debug;
  }

  /** Moves every unplaced shape to its place in a solution. */
  solve(): void {
    const solution = this.getSolution();
    this.commit([...solution]);
  }

  /** Moves one unplaced shape to its place in a solution and returns it. */
  help(): Shape {
    const solution = this.getSolution();
    const [hint] = solution;
    this.commit([hint]);
    return hint[0];
  }

  get variables(): ReadonlySet<Shape> {
    return this.currentVariables;
  }

  get domains(): Domains<Shape, Footprint> {
    return this.currentDomains;
  }

  get hasCachedSolution(): boolean {
    return this.solution.size > 0;
  }

  // Number of searches run so far; cached answers do not count
  get searches(): number {
    return this.searchCount;
  }

  get lastTrace(): SolveTrace | null {
    return this.trace;
  }

  registerCurrentAssignments(
    assignments: ShapeAssignments,
    domains: ReadonlyMap<Shape, readonly Footprint[]>
  ): boolean {
    this.committedCells = new Set();
    for (const footprint of assignments.values()) {
      for (const key of footprint.cells) this.committedCells.add(key);
    }

    const region = checkRegion(difference(this.emptyCells, this.committedCells), this.rules);
    return region.valid && this.inferSmallComponents(region.smallComponents, assignments, domains);
  }

  isConsistentAssignment(_variable: Shape, value: Footprint): boolean {
    return isDisjoint(value.cells, this.committedCells);
  }

  /**
   * Every small empty component has to be exactly one shape. When each of
   * them matches a value of a distinct unassigned variable those assignments
   * are inferred; otherwise the branch is dead.
   */
  private inferSmallComponents(
    components: ReadonlySet<CellKey>[],
    assignments: ShapeAssignments,
    domains: ReadonlyMap<Shape, readonly Footprint[]>
  ): boolean {
    if (components.length === 0) return true;

    const found: ShapeAssignments = new Map();
    for (const component of components) {
      const target = footprintKey(component);
      for (const [variable, domain] of domains) {
        if (assignments.has(variable) || found.has(variable)) continue;
        const match = domain.find(footprint => footprint.key === target);
        if (match) {
          found.set(variable, match);
          break;
        }
      }
    }

    if (found.size !== components.length) return false;

    for (const [variable, footprint] of found) {
      assignments.set(variable, footprint);
      for (const key of footprint.cells) this.committedCells.add(key);
    }
    return true;
  }

  // Searches for a new solution only when the cached one no longer fits
  private getSolution(): ShapeAssignments {
    if (this.board.isWon()) {
      throw new InvalidStateError('The game is already solved!');
    }

    this.currentVariables = new Set(this.board.releasedUnplacedShapes);
    this.emptyCells = new Set(this.board.releasedEmptyCells);

    try {
      this.board.pick(this.currentVariables);
    } catch (err) {
      if (err instanceof InvalidStateError) {
        throw new InvalidStateError('Cannot solve while items are picked.', { cause: err });
      }
      throw err;
    }

    if (this.currentVariables.size === 0) {
      this.board.unpick();
      throw new NoSolutionError('No unplaced shapes are left to cover the empty cells.');
    }

    if (!this.isNewSolutionNeeded()) {
      return this.adaptSolution();
    }

    const startTime = Date.now();
    this.currentDomains = this.extractDomains();
    const result = search(this, { trace: true });
    this.searchCount++;
    this.trace = result.trace ?? null;

    if (this.debug) {
      console.log(`search finished in ${Date.now() - startTime}ms`, result.trace);
    }

    if (!result.assignments) {
      this.board.unpick();
      throw new NoSolutionError('The current state of the game has no solution.');
    }

    this.cacheSolution(result.assignments);
    return result.assignments;
  }

  // Applies the footprints and releases the board, rolling back on failure
  private commit(entries: [Shape, Footprint][]): void {
    try {
      for (const [shape, footprint] of entries) {
        shape.setCells(footprint.cells);
      }
      this.board.release();
    } catch (err) {
      if (err instanceof IllegalReleaseError || err instanceof InvalidPlacementError) {
        this.board.unpick();
      }
      throw err;
    }
  }

  private isNewSolutionNeeded(): boolean {
    if (this.solution.size === 0) return true;

    for (const shape of this.currentVariables) {
      const cached = this.solution.get(shape.key);
      if (!cached || !isSubset(cached.cells, this.emptyCells)) {
        return true;
      }
    }
    return false;
  }

  // Snapshot of every shape's cells, with the solved shapes at their solution
  private cacheSolution(assignments: ShapeAssignments): void {
    const solution = new Map<string, Footprint>();
    for (const shape of this.board.shapes) {
      solution.set(shape.key, toFootprint(shape.cells));
    }
    for (const [shape, footprint] of assignments) {
      solution.set(shape.key, footprint);
    }
    this.solution = solution;
  }

  // The part of the cached solution covering the current variables
  private adaptSolution(): ShapeAssignments {
    const assignments: ShapeAssignments = new Map();
    for (const shape of this.currentVariables) {
      const cached = this.solution.get(shape.key);
      if (cached) {
        assignments.set(shape, cached);
      }
    }
    return assignments;
  }

  /**
   * Candidate cell-sets of every variable: each unique configuration anchored
   * anywhere in the bounding rectangle of the empty cells, kept when it lies on
   * empty cells and leaves a region that can still be filled.
   */
  private extractDomains(): Domains<Shape, Footprint> {
    const domains: Domains<Shape, Footprint> = new Map();

    if (!checkRegion(this.emptyCells, this.rules).valid) {
      for (const variable of this.currentVariables) {
        domains.set(variable, []);
      }
      return domains;
    }

    const anchors = boundingRectangle(this.emptyCells);
    for (const variable of this.currentVariables) {
      const domain = new Map<string, Footprint>();
      for (const anchor of anchors) {
        for (const config of variable.getUniqueConfigsAt(anchor)) {
          const cells = variable.configured(config);
          if (!isSubset(cells, this.emptyCells)) continue;
          if (!checkRegion(difference(this.emptyCells, cells), this.rules).valid) continue;
          const footprint = toFootprint(cells);
          domain.set(footprint.key, footprint);
        }
      }
      domains.set(variable, [...domain.values()]);
    }

    return domains;
  }
}
