import type { Arc, Domains, Slot } from "@/utils/cross/types";
import type { Puzzle } from "@/utils/cross/puzzle";
import { lettersOf } from "@/lib/word-normalize";

export interface Ac3Stats {
  revisions: number;
}

/**
 * Makes `x` arc consistent with `y`: removes each word of x's domain that
 * has no word in y's domain carrying the same letter on the shared cell.
 * Returns whether anything was removed.
 */
export function revise(puzzle: Puzzle, domains: Domains, x: Slot, y: Slot): boolean {
  const overlap = puzzle.overlap(x, y);
  if (overlap === null) return false;
  const domainX = domains.get(x.id);
  const domainY = domains.get(y.id);
  if (!domainX || !domainY) return false;

  const [i, j] = overlap;
  const supported = new Set<string>();
  for (const word of domainY) {
    const letter = lettersOf(word)[j];
    if (letter !== undefined) supported.add(letter);
  }

  let revised = false;
  for (const word of [...domainX]) {
    const letter = lettersOf(word)[i];
    if (letter === undefined || !supported.has(letter)) {
      domainX.delete(word);
      revised = true;
    }
  }
  return revised;
}

export function allArcs(puzzle: Puzzle): Arc[] {
  const arcs: Arc[] = [];
  for (const x of puzzle.slots) {
    for (const y of puzzle.neighbors(x)) arcs.push([x, y]);
  }
  return arcs;
}

/**
 * AC-3 over a FIFO worklist. Starts from `arcs`, or from every overlapping
 * pair in both directions. Returns false as soon as a domain empties.
 */
export function ac3(puzzle: Puzzle, domains: Domains, arcs?: Iterable<Arc>, stats?: Ac3Stats): boolean {
  const queue: Arc[] = arcs ? [...arcs] : allArcs(puzzle);
  let head = 0;

  while (head < queue.length) {
    const [x, y] = queue[head++];
    if (!revise(puzzle, domains, x, y)) continue;
    if (stats) stats.revisions++;

    if ((domains.get(x.id)?.size ?? 0) === 0) return false;

    for (const z of puzzle.neighbors(x)) {
      if (z.id !== y.id) queue.push([z, x]);
    }
  }
  return true;
}
