import type { Arc, Assignment, Domains, Slot } from "@/utils/cross/types";
import type { Puzzle } from "@/utils/cross/puzzle";
import { ac3, revise } from "@/lib/csp/ac3";
import {
  backtrack,
  createSearchStats,
  isAssignmentComplete,
  isConsistent,
  orderDomainValues,
  selectUnassignedSlot,
  type SearchStats,
} from "@/lib/csp/backtrack";
import { createDomainStore, enforceNodeConsistency } from "@/lib/csp/domains";
import { logDebug } from "@/lib/log";

export interface SolveOptions {
  inference?: boolean;
}

export type SolveStats = SearchStats;

export interface SolveResult {
  assignment: Assignment | null;
  domains: Domains;
  stats: SolveStats;
}

/**
 * One solve attempt over a puzzle. Owns its domain store; the puzzle itself
 * is never modified.
 */
export class CrosswordSolver {
  readonly domains: Domains;
  readonly stats: SolveStats = createSearchStats();

  constructor(
    readonly puzzle: Puzzle,
    private readonly options: SolveOptions = {},
  ) {
    this.domains = createDomainStore(puzzle);
  }

  enforceNodeConsistency(): void {
    enforceNodeConsistency(this.puzzle, this.domains);
  }

  revise(x: Slot, y: Slot): boolean {
    return revise(this.puzzle, this.domains, x, y);
  }

  ac3(arcs?: Iterable<Arc>): boolean {
    const counter = { revisions: 0 };
    const ok = ac3(this.puzzle, this.domains, arcs, counter);
    this.stats.ac3Revisions += counter.revisions;
    return ok;
  }

  isAssignmentComplete(assignment: Assignment): boolean {
    return isAssignmentComplete(this.puzzle, assignment);
  }

  isConsistent(assignment: Assignment): boolean {
    return isConsistent(this.puzzle, assignment);
  }

  selectUnassignedSlot(assignment: Assignment): Slot | null {
    return selectUnassignedSlot(this.puzzle, this.domains, assignment);
  }

  orderDomainValues(slot: Slot, assignment: Assignment): string[] {
    return orderDomainValues(this.puzzle, this.domains, slot, assignment);
  }

  backtrack(assignment: Assignment = new Map()): Assignment | null {
    return backtrack(this.puzzle, this.domains, assignment, {
      inference: this.options.inference,
      stats: this.stats,
    });
  }

  solve(): Assignment | null {
    this.enforceNodeConsistency();
    if (!this.ac3()) {
      logDebug(`ac3: empty domain after ${this.stats.ac3Revisions} revisions`);
      return null;
    }
    logDebug(`ac3: consistent after ${this.stats.ac3Revisions} revisions`);

    const assignment = this.backtrack();
    logDebug(
      `search: ${assignment ? "solved" : "no solution"}, ` +
        `${this.stats.nodesExplored} nodes, ${this.stats.backtracks} backtracks`,
    );
    return assignment;
  }
}

export function solve(puzzle: Puzzle, options: SolveOptions = {}): SolveResult {
  const solver = new CrosswordSolver(puzzle, options);
  const assignment = solver.solve();
  return { assignment, domains: solver.domains, stats: solver.stats };
}
