const SPACE_RE = /\s+/g;
const LINE_RE = /\r\n?|\n/;

export function normalizeWordText(value: string): string {
  return value.trim().replace(SPACE_RE, "").toUpperCase();
}

/**
 * One candidate per line. Blank lines are skipped and duplicates keep their
 * first position, so the vocabulary order is the file order.
 */
export function parseWords(text: string): string[] {
  const seen = new Set<string>();
  for (const line of text.split(LINE_RE)) {
    const word = normalizeWordText(line);
    if (word) seen.add(word);
  }
  return [...seen];
}

// Letters are code points, so a character outside the BMP fills one cell.
export function lettersOf(word: string): string[] {
  return Array.from(word);
}

export function wordLength(word: string): number {
  return lettersOf(word).length;
}
