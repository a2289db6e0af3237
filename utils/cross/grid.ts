import { z } from "zod";
import type { Direction, Grid, Slot } from "@/utils/cross/types";
import { DIRS } from "@/utils/cross/types";

export const OPEN_CELL = "_";

const gridSchema = z
  .object({
    rows: z.number().int().positive(),
    cols: z.number().int().positive(),
    structure: z.array(z.array(z.boolean())),
  })
  .superRefine((grid, ctx) => {
    if (grid.structure.length !== grid.rows) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `bad row count: ${grid.structure.length} (expect ${grid.rows})`,
      });
    }
    grid.structure.forEach((row, i) => {
      if (row.length !== grid.cols) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["structure", i],
          message: `row ${i} length ${row.length} (expect ${grid.cols})`,
        });
      }
    });
  });

export function validate(grid: Grid): void {
  const parsed = gridSchema.safeParse(grid);
  if (!parsed.success) {
    throw new Error(`invalid grid: ${parsed.error.issues.map((issue) => issue.message).join("; ")}`);
  }
}

export function parseStructure(text: string): Grid {
  const lines = text.replace(/\r\n?/g, "\n").split("\n");
  // trailing newline
  if (lines.length > 0 && lines[lines.length - 1] === "") lines.pop();
  if (lines.length === 0) throw new Error("structure is empty");

  const chars = lines.map((line) => [...line]);
  const rows = chars.length;
  const cols = Math.max(...chars.map((line) => line.length));
  if (cols === 0) throw new Error("structure has no columns");

  const structure = chars.map((line) => Array.from({ length: cols }, (_, c) => line[c] === OPEN_CELL));
  return { rows, cols, structure };
}

export function slotId(row: number, col: number, direction: Direction, length: number): string {
  return `${row},${col},${direction},${length}`;
}

const isStart = (open: (r: number, c: number) => boolean, r: number, c: number, direction: Direction) => {
  if (direction === "across") return c === 0 || !open(r, c - 1);
  return r === 0 || !open(r - 1, c);
};

export function scanSlots(grid: Grid): Slot[] {
  const { rows: ROWS, cols: COLS, structure } = grid;
  const open = (r: number, c: number) => structure[r]?.[c] === true;
  const slots: Slot[] = [];
  for (let r = 0; r < ROWS; r++) {
    for (let c = 0; c < COLS; c++) {
      if (!open(r, c)) continue;
      for (const direction of ["across", "down"] as const) {
        if (!isStart(open, r, c, direction)) continue;
        const dir = DIRS[direction];
        const cells: [number, number][] = [[r, c]];
        for (let nr = r + dir.dr, nc = c + dir.dc; open(nr, nc); nr += dir.dr, nc += dir.dc) {
          cells.push([nr, nc]);
        }
        if (cells.length > 1) {
          slots.push({
            id: slotId(r, c, direction, cells.length),
            row: r,
            col: c,
            direction,
            length: cells.length,
            cells,
          });
        }
      }
    }
  }
  return slots;
}

export function sameSlot(a: Slot, b: Slot): boolean {
  return a.row === b.row && a.col === b.col && a.direction === b.direction && a.length === b.length;
}

export function lengthStats(slots: ReadonlyArray<Slot>): Record<string, number> {
  const stats: Record<string, number> = { total: slots.length };
  for (const { length } of slots) stats[length] = (stats[length] ?? 0) + 1;
  return stats;
}
