import fs from "node:fs";
import path from "node:path";
import { solve } from "@/lib/csp/solver";
import { env } from "@/lib/env";
import { logDebug, logError } from "@/lib/log";
import { lengthStats } from "@/utils/cross/grid";
import { createPuzzle, type Puzzle } from "@/utils/cross/puzzle";
import { renderSvg, renderText } from "@/utils/cross/render";

export const USAGE = "Usage: generate structure words [output]";
export const NO_SOLUTION = "No solution.";

export const OUTPUT_EXTENSIONS = [".svg", ".txt"] as const;

type OutputFormat = "svg" | "text";

function outputFormat(file: string): OutputFormat | null {
  const ext = path.extname(file).toLowerCase();
  if (ext === ".svg") return "svg";
  if (ext === ".txt") return "text";
  return null;
}

export interface GenerateIO {
  out: (line: string) => void;
  err: (line: string) => void;
}

const consoleIO: GenerateIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

export interface GenerateOptions {
  inference?: boolean;
}

/** Load → solve → print. Returns the process exit code. */
export function runGenerate(
  args: string[],
  io: GenerateIO = consoleIO,
  options: GenerateOptions = { inference: env.CROSSWORD_INFERENCE },
): number {
  if (args.length !== 2 && args.length !== 3) {
    io.err(USAGE);
    return 2;
  }
  const [structurePath, wordsPath, outputPath] = args;
  const format = outputPath ? outputFormat(outputPath) : null;
  if (outputPath && format === null) {
    logError(`Unsupported output file ${outputPath}: expected ${OUTPUT_EXTENSIONS.join(" or ")}`);
    return 1;
  }

  let puzzle: Puzzle;
  try {
    puzzle = createPuzzle(fs.readFileSync(structurePath, "utf8"), fs.readFileSync(wordsPath, "utf8"));
  } catch (e) {
    logError("Failed to load puzzle", e);
    return 1;
  }
  logDebug(`slots: ${JSON.stringify(lengthStats(puzzle.slots))}, words: ${puzzle.words.length}`);

  const { assignment } = solve(puzzle, { inference: options.inference });
  if (assignment === null) {
    io.out(NO_SOLUTION);
    return 0;
  }

  io.out(renderText(puzzle, assignment));
  if (outputPath) {
    const body = format === "text" ? renderText(puzzle, assignment) : renderSvg(puzzle, assignment);
    try {
      fs.writeFileSync(outputPath, `${body}\n`, "utf8");
    } catch (e) {
      logError(`Failed to write ${outputPath}`, e);
      return 1;
    }
  }
  return 0;
}
