import type { Assignment, Domains, Slot } from "@/utils/cross/types";
import type { Puzzle } from "@/utils/cross/puzzle";
import { ac3 } from "@/lib/csp/ac3";
import { cloneDomains } from "@/lib/csp/domains";
import { lettersOf } from "@/lib/word-normalize";

export interface SearchStats {
  nodesExplored: number;
  backtracks: number;
  ac3Revisions: number;
}

export interface SearchOptions {
  // run AC-3 on a copy of the domains after every consistent assignment
  inference?: boolean;
  stats?: SearchStats;
}

export function createSearchStats(): SearchStats {
  return { nodesExplored: 0, backtracks: 0, ac3Revisions: 0 };
}

const assignedIds = (assignment: Assignment) => new Set([...assignment.keys()].map((slot) => slot.id));

export function isAssignmentComplete(puzzle: Puzzle, assignment: Assignment): boolean {
  const assigned = assignedIds(assignment);
  return puzzle.slots.every((slot) => assigned.has(slot.id));
}

/** Distinct words, and every pair of assigned crossing slots agrees on the shared letter. */
export function isConsistent(puzzle: Puzzle, assignment: Assignment): boolean {
  if (new Set(assignment.values()).size !== assignment.size) return false;

  const entries = [...assignment].map(([slot, word]) => [slot, lettersOf(word)] as const);
  for (let a = 0; a < entries.length; a++) {
    const [slotA, lettersA] = entries[a];
    for (let b = a + 1; b < entries.length; b++) {
      const [slotB, lettersB] = entries[b];
      const overlap = puzzle.overlap(slotA, slotB);
      if (overlap === null) continue;
      const [i, j] = overlap;
      if (lettersA[i] !== lettersB[j]) return false;
    }
  }
  return true;
}

/**
 * Minimum remaining values, then highest degree; remaining ties go to the
 * first slot in puzzle order. Null once every slot is assigned.
 */
export function selectUnassignedSlot(puzzle: Puzzle, domains: Domains, assignment: Assignment): Slot | null {
  const assigned = assignedIds(assignment);
  let best: Slot | null = null;
  let bestSize = Infinity;
  let bestDegree = -1;
  for (const slot of puzzle.slots) {
    if (assigned.has(slot.id)) continue;
    const size = domains.get(slot.id)?.size ?? 0;
    const degree = puzzle.neighbors(slot).length;
    if (size < bestSize || (size === bestSize && degree > bestDegree)) {
      best = slot;
      bestSize = size;
      bestDegree = degree;
    }
  }
  return best;
}

/**
 * Least constraining value first. A candidate's cost is, summed over the
 * unassigned crossing neighbors, how many of the neighbor's words differ from
 * the candidate. Equal costs keep domain order.
 */
export function orderDomainValues(puzzle: Puzzle, domains: Domains, slot: Slot, assignment: Assignment): string[] {
  const assigned = assignedIds(assignment);
  const open = puzzle
    .neighbors(slot)
    .filter((neighbor) => !assigned.has(neighbor.id) && puzzle.overlap(slot, neighbor) !== null);

  const scored = [...(domains.get(slot.id) ?? [])].map((value) => {
    let ruledOut = 0;
    for (const neighbor of open) {
      for (const word of domains.get(neighbor.id) ?? []) {
        if (word !== value) ruledOut++;
      }
    }
    return { value, ruledOut };
  });

  scored.sort((a, b) => a.ruledOut - b.ruledOut);
  return scored.map(({ value }) => value);
}

function infer(
  puzzle: Puzzle,
  domains: Domains,
  slot: Slot,
  value: string,
  assignment: Assignment,
  stats?: SearchStats,
): Domains | null {
  const assigned = assignedIds(assignment);
  const narrowed = cloneDomains(domains);
  narrowed.set(slot.id, new Set([value]));
  const arcs = puzzle
    .neighbors(slot)
    .filter((neighbor) => !assigned.has(neighbor.id))
    .map((neighbor) => [neighbor, slot] as const);
  const counter = { revisions: 0 };
  const ok = ac3(puzzle, narrowed, arcs, counter);
  if (stats) stats.ac3Revisions += counter.revisions;
  return ok ? narrowed : null;
}

// Re-keys entries on the puzzle's own slot instances, in place.
function adoptSlots(puzzle: Puzzle, assignment: Assignment): void {
  for (const [slot, word] of [...assignment]) {
    const own = puzzle.resolve(slot);
    if (own === null) throw new Error(`slot ${slot.id} is not part of this puzzle`);
    if (own === slot) continue;
    assignment.delete(slot);
    assignment.set(own, word);
  }
}

function search(puzzle: Puzzle, domains: Domains, assignment: Assignment, options: SearchOptions): Assignment | null {
  const { stats } = options;
  if (stats) stats.nodesExplored++;

  if (isAssignmentComplete(puzzle, assignment)) return assignment;

  const slot = selectUnassignedSlot(puzzle, domains, assignment);
  if (slot === null) return null;

  for (const value of orderDomainValues(puzzle, domains, slot, assignment)) {
    assignment.set(slot, value);

    if (isConsistent(puzzle, assignment)) {
      const next = options.inference ? infer(puzzle, domains, slot, value, assignment, stats) : domains;
      if (next !== null) {
        const result = search(puzzle, next, assignment, options);
        if (result !== null) return result;
      }
    }

    assignment.delete(slot);
  }

  if (stats) stats.backtracks++;
  return null;
}

/**
 * Depth-first search over `assignment`, which is extended in place and
 * restored on failure. Returns the first complete consistent assignment,
 * or null when no value works for some slot on every branch.
 */
export function backtrack(
  puzzle: Puzzle,
  domains: Domains,
  assignment: Assignment = new Map(),
  options: SearchOptions = {},
): Assignment | null {
  adoptSlots(puzzle, assignment);
  return search(puzzle, domains, assignment, options);
}
