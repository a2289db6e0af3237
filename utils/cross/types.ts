export type Direction = "across" | "down";

export const DIRS = {
  across: { dr: 0, dc: 1 },
  down: { dr: 1, dc: 0 },
} as const satisfies Record<Direction, { dr: number; dc: number }>;

export interface Grid {
  rows: number;
  cols: number;
  // true = fillable
  structure: boolean[][];
}

export interface Slot {
  readonly id: string;
  readonly row: number;
  readonly col: number;
  readonly direction: Direction;
  readonly length: number;
  readonly cells: ReadonlyArray<readonly [number, number]>;
}

// [index into word A, index into word B]
export type Overlap = readonly [number, number];

export type Arc = readonly [Slot, Slot];

// Slots compare by id; keys need not be the puzzle's own instances.
export type Assignment = Map<Slot, string>;

// keyed by slot id
export type Domains = Map<string, Set<string>>;
