import type { Assignment } from "@/utils/cross/types";
import { DIRS } from "@/utils/cross/types";
import type { Puzzle } from "@/utils/cross/puzzle";
import { lettersOf } from "@/lib/word-normalize";

export const BLOCK = "█";

const CELL_SIZE = 100;
const CELL_BORDER = 2;
const FONT_SIZE = 80;

export function letterGrid(puzzle: Puzzle, assignment: Assignment): (string | null)[][] {
  const letters: (string | null)[][] = Array.from({ length: puzzle.height }, () =>
    Array<string | null>(puzzle.width).fill(null),
  );
  for (const [slot, word] of assignment) {
    const dir = DIRS[slot.direction];
    lettersOf(word).forEach((letter, k) => {
      letters[slot.row + k * dir.dr][slot.col + k * dir.dc] = letter;
    });
  }
  return letters;
}

export function renderText(puzzle: Puzzle, assignment: Assignment): string {
  const letters = letterGrid(puzzle, assignment);
  return letters
    .map((row, r) => row.map((ch, c) => (puzzle.isFillable(r, c) ? (ch ?? " ") : BLOCK)).join(""))
    .join("\n");
}

const escapeXml = (s: string) =>
  s.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;").replace(/"/g, "&quot;");

export function renderSvg(puzzle: Puzzle, assignment: Assignment): string {
  const letters = letterGrid(puzzle, assignment);
  const width = puzzle.width * CELL_SIZE;
  const height = puzzle.height * CELL_SIZE;
  const inner = CELL_SIZE - 2 * CELL_BORDER;
  const out: string[] = [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">`,
    `<rect width="${width}" height="${height}" fill="black"/>`,
  ];

  for (let r = 0; r < puzzle.height; r++) {
    for (let c = 0; c < puzzle.width; c++) {
      if (!puzzle.isFillable(r, c)) continue;
      const x = c * CELL_SIZE + CELL_BORDER;
      const y = r * CELL_SIZE + CELL_BORDER;
      out.push(`<rect x="${x}" y="${y}" width="${inner}" height="${inner}" fill="white"/>`);
      const ch = letters[r][c];
      if (ch) {
        out.push(
          `<text x="${x + inner / 2}" y="${y + inner / 2}" font-family="sans-serif" font-size="${FONT_SIZE}" ` +
            `text-anchor="middle" dominant-baseline="central" fill="black">${escapeXml(ch)}</text>`,
        );
      }
    }
  }

  out.push("</svg>");
  return out.join("\n");
}
