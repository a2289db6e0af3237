import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { NO_SOLUTION, USAGE, runGenerate, type GenerateIO } from "@/lib/generate";
import { CROSSING, PARALLEL } from "./fixtures";

const projectRoot = path.resolve(process.cwd());

function captureIO() {
  const out: string[] = [];
  const err: string[] = [];
  const io: GenerateIO = { out: (line) => out.push(line), err: (line) => err.push(line) };
  return { io, out, err };
}

describe("generate", () => {
  let dir: string;
  const write = (name: string, body: string) => {
    const file = path.join(dir, name);
    fs.writeFileSync(file, body, "utf8");
    return file;
  };

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "crossword-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it("prints usage for a wrong argument count", () => {
    const { io, out, err } = captureIO();
    expect(runGenerate(["only-one"], io, { inference: false })).toBe(2);
    expect(runGenerate(["a", "b", "c", "d"], io, { inference: false })).toBe(2);
    expect(err).toEqual([USAGE, USAGE]);
    expect(out).toEqual([]);
  });

  it("fails when an input file cannot be read", () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const { io, out } = captureIO();
    const words = write("words.txt", "CAT\n");

    expect(runGenerate([path.join(dir, "missing.txt"), words], io, { inference: false })).toBe(1);
    expect(out).toEqual([]);
    expect(errorSpy).toHaveBeenCalledTimes(2);
    expect(errorSpy).toHaveBeenNthCalledWith(1, "Failed to load puzzle");
  });

  it("refuses output files that are neither svg nor text", () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const { io, out } = captureIO();
    const structure = write("structure.txt", CROSSING);
    const words = write("words.txt", "CAT\nART\n");
    const png = path.join(dir, "out.png");

    expect(runGenerate([structure, words, png], io, { inference: false })).toBe(1);
    expect(out).toEqual([]);
    expect(fs.existsSync(png)).toBe(false);
    expect(errorSpy).toHaveBeenCalledWith(`Unsupported output file ${png}: expected .svg or .txt`);
  });

  it("prints the filled grid", () => {
    const { io, out } = captureIO();
    const structure = write("structure.txt", `${CROSSING}\n`);
    const words = write("words.txt", "cat\nart\ntie\n");

    expect(runGenerate([structure, words], io, { inference: false })).toBe(0);
    expect(out).toEqual(["CAT\n█R█\n█T█"]);
  });

  it("prints a fixed message when there is no solution", () => {
    const { io, out } = captureIO();
    const structure = write("structure.txt", PARALLEL);
    const words = write("words.txt", "CAT\nHOUSE\n");

    expect(runGenerate([structure, words], io, { inference: false })).toBe(0);
    expect(out).toEqual([NO_SOLUTION]);
  });

  it("writes text or svg output files", () => {
    const { io } = captureIO();
    const structure = write("structure.txt", CROSSING);
    const words = write("words.txt", "CAT\nART\nTIE\n");
    const txt = path.join(dir, "out.txt");
    const svg = path.join(dir, "out.svg");

    expect(runGenerate([structure, words, txt], io, { inference: false })).toBe(0);
    expect(fs.readFileSync(txt, "utf8")).toBe("CAT\n█R█\n█T█\n");

    expect(runGenerate([structure, words, svg], io, { inference: true })).toBe(0);
    expect(fs.readFileSync(svg, "utf8").startsWith("<svg")).toBe(true);
  });

  it("solves the bundled sample", () => {
    const { io, out } = captureIO();
    const structure = path.join(projectRoot, "data/structure0.txt");
    const words = path.join(projectRoot, "data/words0.txt");

    expect(runGenerate([structure, words], io, { inference: false })).toBe(0);
    expect(out).toEqual(["█CAT█\n█R██M\n█A██O\n█N█ON\n█ECHO"]);
  });
});
