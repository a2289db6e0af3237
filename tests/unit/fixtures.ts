import { createPuzzle, type Puzzle } from "@/utils/cross/puzzle";
import type { Slot } from "@/utils/cross/types";

// Across length 3 on row 0; down length 3 from its middle cell.
export const CROSSING = ["___", "#_#", "#_#"].join("\n");

// Two across slots of length 3 that never meet.
export const PARALLEL = ["___", "###", "___"].join("\n");

// One across word whose ends start two downs; the first across candidate dead-ends.
export const HOOKS = ["___", "_#_", "_#_"].join("\n");
export const HOOKS_WORDS = ["CAT", "SIT", "SUN", "TEN"];

export const SAMPLE = ["#___#", "#_##_", "#_##_", "#_#__", "#____"].join("\n");
export const SAMPLE_WORDS = [
  "cat",
  "crane",
  "echo",
  "oh",
  "on",
  "mono",
  "dog",
  "bird",
  "go",
  "so",
  "tree",
  "plant",
  "stone",
  "lamp",
  "at",
  "it",
  "hello",
  "sun",
  "moon",
].join("\n");

export function puzzleOf(structure: string, words: string[]): Puzzle {
  return createPuzzle(structure, words.join("\n"));
}

export function slotById(puzzle: Puzzle, id: string): Slot {
  const slot = puzzle.slots.find((s) => s.id === id);
  if (!slot) throw new Error(`no slot ${id}`);
  return slot;
}
