import { parseStructure, scanSlots, validate } from "@/utils/cross/grid";
import type { Grid, Overlap, Slot } from "@/utils/cross/types";
import { parseWords } from "@/lib/word-normalize";

/**
 * Immutable crossword description: grid geometry, the slots derived from it,
 * the vocabulary and the pairwise overlap relation between slots.
 */
export class Puzzle {
  readonly height: number;
  readonly width: number;
  readonly structure: ReadonlyArray<ReadonlyArray<boolean>>;
  readonly slots: ReadonlyArray<Slot>;
  readonly words: ReadonlyArray<string>;

  private readonly overlaps = new Map<string, Overlap>();
  private readonly neighborsById = new Map<string, Slot[]>();
  private readonly slotsById = new Map<string, Slot>();

  constructor(grid: Grid, words: Iterable<string>) {
    validate(grid);
    this.height = grid.rows;
    this.width = grid.cols;
    this.structure = grid.structure.map((row) => [...row]);
    this.slots = scanSlots(grid);
    this.words = [...new Set(words)];

    const cellIndex = new Map<string, Array<{ slot: Slot; index: number }>>();
    for (const slot of this.slots) {
      this.slotsById.set(slot.id, slot);
      this.neighborsById.set(slot.id, []);
      slot.cells.forEach(([r, c], index) => {
        const key = `${r},${c}`;
        const bucket = cellIndex.get(key);
        if (bucket) bucket.push({ slot, index });
        else cellIndex.set(key, [{ slot, index }]);
      });
    }

    // a cell is shared by at most one across and one down slot
    for (const bucket of cellIndex.values()) {
      for (const a of bucket) {
        for (const b of bucket) {
          if (a.slot.id === b.slot.id) continue;
          this.overlaps.set(pairKey(a.slot, b.slot), [a.index, b.index]);
        }
      }
    }

    for (const slot of this.slots) {
      const list = this.neighborsById.get(slot.id) ?? [];
      for (const other of this.slots) {
        if (other.id !== slot.id && this.overlaps.has(pairKey(slot, other))) list.push(other);
      }
    }
  }

  overlap(a: Slot, b: Slot): Overlap | null {
    return this.overlaps.get(pairKey(a, b)) ?? null;
  }

  /** The puzzle's own instance of a slot equal to `slot`, if it has one. */
  resolve(slot: Slot): Slot | null {
    return this.slotsById.get(slot.id) ?? null;
  }

  neighbors(slot: Slot): ReadonlyArray<Slot> {
    return this.neighborsById.get(slot.id) ?? [];
  }

  isFillable(row: number, col: number): boolean {
    return this.structure[row]?.[col] === true;
  }
}

function pairKey(a: Slot, b: Slot): string {
  return `${a.id}|${b.id}`;
}

export function createPuzzle(structureText: string, wordsText: string): Puzzle {
  return new Puzzle(parseStructure(structureText), parseWords(wordsText));
}
