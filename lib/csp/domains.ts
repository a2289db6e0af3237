import type { Domains } from "@/utils/cross/types";
import type { Puzzle } from "@/utils/cross/puzzle";
import { wordLength } from "@/lib/word-normalize";

// Every slot starts with the whole vocabulary, in vocabulary order.
export function createDomainStore(puzzle: Puzzle): Domains {
  const domains: Domains = new Map();
  for (const slot of puzzle.slots) domains.set(slot.id, new Set(puzzle.words));
  return domains;
}

/** Drops every candidate whose length differs from its slot's length. */
export function enforceNodeConsistency(puzzle: Puzzle, domains: Domains): void {
  for (const slot of puzzle.slots) {
    const domain = domains.get(slot.id);
    if (!domain) continue;
    for (const word of [...domain]) {
      if (wordLength(word) !== slot.length) domain.delete(word);
    }
  }
}

export function cloneDomains(domains: Domains): Domains {
  const copy: Domains = new Map();
  for (const [id, domain] of domains) copy.set(id, new Set(domain));
  return copy;
}
