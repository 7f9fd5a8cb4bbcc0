// src/lr/convertTool.ts
import path from "node:path";
import { mkdir, readFile, writeFile } from "node:fs/promises";

import { LrError } from "./errors.js";
import {
  parsePuzzleJsonV1,
  parseTableauJsonV1,
  puzzleToJsonV1,
  stringifyPuzzleJsonV1,
  stringifyTableauJsonV1,
  tableauToJsonV1,
} from "./lrJsonV1.js";
import type { PuzzleFilling } from "./puzzle.js";
import { puzzleToTableau } from "./puzzleToTableau.js";
import { solvePuzzles } from "./solver.js";
import { parseTableau } from "./tableau.js";
import type { SkewTableau } from "./tableau.js";
import { tableauToPuzzle } from "./tableauToPuzzle.js";

export type SolveToolOptions = Readonly<{
  output?: string;
  tableaux?: boolean;
  limit?: number;
}>;

export type ToPuzzleToolOptions = Readonly<{
  output?: string;
  size?: number;
}>;

export type RoundTripFailure = Readonly<{
  index: number;
  tableau: string;
  reason: string;
}>;

export type RoundTripReport = Readonly<{
  total: number;
  failures: ReadonlyArray<RoundTripFailure>;
}>;

function isJsonPath(p: string): boolean {
  return p.toLowerCase().endsWith(".json");
}

async function ensureParentDir(p: string): Promise<void> {
  await mkdir(path.dirname(p), { recursive: true });
}

async function writeOutput(text: string, output: string | undefined): Promise<void> {
  if (!output) {
    process.stdout.write(text);
    return;
  }
  await ensureParentDir(output);
  await writeFile(output, text, "utf8");
  console.log(`Wrote ${output}`);
}

export function parseCountOption(value: string, name: string): number {
  if (!/^[0-9]+$/.test(value)) throw new Error(`Invalid ${name} '${value}': expected a non-negative integer`);
  return Number(value);
}

export async function readTableauArg(arg: string): Promise<SkewTableau> {
  if (!isJsonPath(arg)) return parseTableau(arg);
  const text = await readFile(arg, "utf8");
  const parsed: unknown = JSON.parse(text);
  return parseTableauJsonV1(parsed);
}

export async function readPuzzleFile(inputPath: string): Promise<PuzzleFilling> {
  const text = await readFile(inputPath, "utf8");
  const parsed: unknown = JSON.parse(text);
  return parsePuzzleJsonV1(parsed);
}

export function formatPuzzles(puzzles: ReadonlyArray<PuzzleFilling>, tableaux: boolean): string {
  if (tableaux) return puzzles.map((p) => puzzleToTableau(p).toString() + "\n").join("");
  return JSON.stringify(puzzles.map(puzzleToJsonV1), null, 2) + "\n";
}

export function checkRoundTrip(northWest: string, northEast: string): RoundTripReport {
  const puzzles = solvePuzzles(northWest, northEast);
  const failures: RoundTripFailure[] = [];

  puzzles.forEach((puzzle, index) => {
    let label = "?";
    try {
      const tableau = puzzleToTableau(puzzle);
      label = tableau.toString();
      const back = tableauToPuzzle(tableau, { size: puzzle.size });
      if (!puzzleToTableau(back).equals(tableau)) {
        failures.push({ index, tableau: label, reason: "tableau differs" });
        return;
      }
      // Rows traced empty are dropped, so only a full tableau pins down the puzzle.
      const paths = puzzle.northEastLabels().filter((l) => l === "1").length;
      if (tableau.rowCount === paths && !back.equals(puzzle)) {
        failures.push({ index, tableau: label, reason: "puzzle differs" });
      }
    } catch (err: unknown) {
      if (!(err instanceof LrError)) throw err;
      failures.push({ index, tableau: label, reason: `${err.name}: ${err.message}` });
    }
  });

  return { total: puzzles.length, failures };
}

export async function runSolveTool(
  northWest: string,
  northEast: string,
  opts: SolveToolOptions,
): Promise<number> {
  const solveOpts = opts.limit === undefined ? {} : { limit: opts.limit };
  const puzzles = solvePuzzles(northWest, northEast, solveOpts);
  await writeOutput(formatPuzzles(puzzles, opts.tableaux === true), opts.output);
  if (opts.output) console.log(`Puzzles: ${puzzles.length}`);
  return puzzles.length;
}

export type ToTableauToolOptions = Readonly<{
  output?: string;
  json?: boolean;
}>;

export function formatTableau(tableau: SkewTableau, json: boolean): string {
  if (json) return stringifyTableauJsonV1(tableauToJsonV1(tableau));
  return tableau.toString() + "\n";
}

export async function runToTableauTool(inputPath: string, opts: ToTableauToolOptions): Promise<void> {
  const puzzle = await readPuzzleFile(inputPath);
  const tableau = puzzleToTableau(puzzle);
  await writeOutput(formatTableau(tableau, opts.json === true), opts.output);
}

export async function runToPuzzleTool(tableauArg: string, opts: ToPuzzleToolOptions): Promise<void> {
  const tableau = await readTableauArg(tableauArg);
  const puzzle = tableauToPuzzle(tableau, {
    ...(opts.size === undefined ? {} : { size: opts.size }),
    warn: (m) => console.warn(m),
  });
  await writeOutput(stringifyPuzzleJsonV1(puzzleToJsonV1(puzzle)), opts.output);
}

export function runCheckTool(northWest: string, northEast: string): RoundTripReport {
  const report = checkRoundTrip(northWest, northEast);
  for (const f of report.failures) {
    console.warn(`Mismatch #${f.index} ${f.tableau}: ${f.reason}`);
  }
  console.log(`Checked ${report.total} puzzle(s), ${report.failures.length} mismatch(es)`);
  if (report.failures.length > 0) process.exitCode = 1;
  return report;
}
