export type { Arc, Assignment, Direction, Domains, Grid, Overlap, Slot } from "@/utils/cross/types";
export { parseStructure, scanSlots, sameSlot, slotId, lengthStats } from "@/utils/cross/grid";
export { Puzzle, createPuzzle } from "@/utils/cross/puzzle";
export { letterGrid, renderSvg, renderText } from "@/utils/cross/render";
export { parseWords, normalizeWordText, lettersOf, wordLength } from "@/lib/word-normalize";
export { createDomainStore, enforceNodeConsistency } from "@/lib/csp/domains";
export { ac3, allArcs, revise } from "@/lib/csp/ac3";
export {
  backtrack,
  isAssignmentComplete,
  isConsistent,
  orderDomainValues,
  selectUnassignedSlot,
} from "@/lib/csp/backtrack";
export { CrosswordSolver, solve } from "@/lib/csp/solver";
export type { SolveOptions, SolveResult, SolveStats } from "@/lib/csp/solver";
