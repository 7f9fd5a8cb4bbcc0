// src/lr/tableauToPuzzle.ts
import { padPartition, partitionToAbacus } from "./abacus.js";
import { InternalConsistencyError, NoCandidateError, SizeError } from "./errors.js";
import type { WarnFn } from "./errors.js";
import { createCohomologyCatalog, deltaCandidates, rhombusCandidates } from "./pieces.js";
import type { EdgeConstraints, EdgeLabel, EdgeName, PieceCatalog, PuzzlePiece } from "./pieces.js";
import { PuzzleFilling, coordKey, inGrid, kinkOrder, parseLabelWord } from "./puzzle.js";
import type { Coord } from "./puzzle.js";
import type { SkewTableau } from "./tableau.js";

export type TableauToPuzzleOptions = Readonly<{
  size?: number;
  catalog?: PieceCatalog;
  warn?: WarnFn;
}>;

export type BoundaryWords = Readonly<{
  northWest: string;
  northEast: string;
  south: string;
}>;

export type BluePair = Readonly<{
  row: number;
  value: number;
  run: number;
  delta: Coord;
  nabla: Coord;
}>;

export type BluePositions = Readonly<{
  pairs: ReadonlyArray<BluePair>;
  deltaBluePositions: ReadonlyArray<Coord>;
  nablaBluePositions: ReadonlyArray<Coord>;
}>;

function reverse(s: string): string {
  return s.split("").reverse().join("");
}

function onePositions(word: string): number[] {
  const out: number[] = [];
  for (let k = 0; k < word.length; k++) if (word[k] === "1") out.push(k + 1);
  return out;
}

export function minimumPuzzleSize(tableau: SkewTableau): number {
  const rows = tableau.rowCount;
  const w = tableau.weight();
  const outer = tableau.outerShape();
  // Contents above the row count widen the north-west word.
  const weightWord = Math.max(rows, w.length) + Math.max(0, ...w);
  return Math.max((w[0] ?? 0) + rows, (outer[0] ?? 0) + rows, weightWord);
}

export function resolvePuzzleSize(tableau: SkewTableau, size?: number): number {
  const minimum = minimumPuzzleSize(tableau);
  if (size === undefined) return minimum;
  if (!Number.isInteger(size) || size < minimum) {
    throw new SizeError(`Puzzle size ${size} is too small: need at least ${minimum}`, size, minimum);
  }
  return size;
}

export function boundaryWords(tableau: SkewTableau, n: number): BoundaryWords {
  const rows = tableau.rowCount;
  const weight = padPartition(tableau.weight(), rows);
  const complement = tableau.outerShape().map((r) => n - rows - r);
  const inner = padPartition(tableau.innerShape(), rows);

  return {
    northWest: reverse(partitionToAbacus(weight, n)),
    northEast: reverse(partitionToAbacus(complement, n)),
    south: partitionToAbacus(inner, n),
  };
}

/**
 * Walks anti-diagonals of (row, value) pairs outward from the bottom row's 1s. Each
 * pair meets the next free strip on the north-west side (`chosenRows`) with the next
 * free column on the south side (`chosenCols`); the run of the pair's value in its
 * row places the matching nabla, which then frees a strip and a column for the next
 * anti-diagonal.
 */
export function computeBluePositions(tableau: SkewTableau, words: BoundaryWords): BluePositions {
  const rows = tableau.rowCount;
  const chosenRows = onePositions(words.northWest);
  const chosenCols = onePositions(words.south);

  const pairs: BluePair[] = [];

  for (let col = 0; col < rows; col++) {
    const nextRows: number[] = [];
    const nextCols: number[] = [];

    for (let row = 0; row <= col; row++) {
      const j = chosenRows[row];
      const i = chosenCols[col - row];
      if (j === undefined || i === undefined) {
        throw new InternalConsistencyError(
          `Boundary words carry too few 1s for ${rows} rows (diagonal ${col})`,
        );
      }

      const tableauRow = rows - col + row - 1;
      const value = row + 1;
      const run = tableau.countInRow(tableauRow, value);

      pairs.push({
        row: tableauRow,
        value,
        run,
        delta: [i, j],
        nabla: [i + run, j + run + 1],
      });
      nextRows.push(j + run + 1);
      nextCols.push(i + run);
    }

    nextRows.sort((a, b) => a - b);
    nextCols.sort((a, b) => a - b);
    chosenRows.splice(0, col + 1, ...nextRows);
    chosenCols.splice(0, col + 1, ...nextCols);
  }

  return {
    pairs,
    deltaBluePositions: pairs.map((p) => p.delta),
    nablaBluePositions: pairs.map((p) => p.nabla),
  };
}

class ConstraintMap {
  private readonly cells = new Map<string, EdgeConstraints>();

  public constructor(public readonly n: number) {
    for (const [i, j] of kinkOrder(n)) this.cells.set(coordKey(i, j), {});
  }

  public paint(i: number, j: number, edge: EdgeName, label: EdgeLabel): void {
    this.setOne(i, j, edge, label);
    switch (edge) {
      case "northEast":
        this.setOne(i, j + 1, "southWest", label);
        break;
      case "southWest":
        this.setOne(i, j - 1, "northEast", label);
        break;
      case "northWest":
        this.setOne(i - 1, j, "southEast", label);
        break;
      case "southEast":
        this.setOne(i + 1, j, "northWest", label);
        break;
      case "south":
        break;
    }
  }

  public snapshot(): Map<string, EdgeConstraints> {
    return new Map([...this.cells].map(([k, v]) => [k, { ...v }]));
  }

  private setOne(i: number, j: number, edge: EdgeName, label: EdgeLabel): void {
    if (!inGrid(this.n, i, j)) return;
    // Rhombi have no south edge, triangles no south-east or south-west edge.
    const diagonal = i === j;
    if (edge === "south" && !diagonal) return;
    if (diagonal && (edge === "southEast" || edge === "southWest")) return;

    const key = coordKey(i, j);
    const c = this.cells.get(key) ?? {};
    const have = c[edge];
    if (have !== undefined && have !== label) {
      throw new NoCandidateError(
        `Conflicting ${edge} edge at (${i}, ${j}): '${have}' vs '${label}'`,
        i,
        j,
      );
    }
    c[edge] = label;
    this.cells.set(key, c);
  }
}

export function edgeConstraints(
  n: number,
  words: BoundaryWords,
  blue: BluePositions,
): Map<string, EdgeConstraints> {
  const map = new ConstraintMap(n);
  const nablaBlue = new Set(blue.nablaBluePositions.map(([i, j]) => coordKey(i, j)));

  for (const { delta, run } of blue.pairs) {
    const [i, j] = delta;

    map.paint(i, j, "northWest", "1");

    // West run: 1s on the north-east edges, 10s where each step crosses into the next cell.
    for (let s = 0; s <= run; s++) map.paint(i + s, j + s, "northEast", "1");
    for (let s = 1; s <= run; s++) map.paint(i + s, j + s, "northWest", "10");

    const [ni, nj] = [i + run, j + run + 1];
    map.paint(ni, nj, "southEast", "1");

    // South run down to the next nabla of the same path, or to the south edge.
    let jj = j;
    while (jj > i && !nablaBlue.has(coordKey(i, jj))) {
      map.paint(i, jj, "southWest", "10");
      map.paint(i, jj, "southEast", "0");
      jj--;
    }
    if (jj === i) map.paint(i, i, "south", "1");
  }

  const nw = parseLabelWord(words.northWest, "northWest");
  const ne = parseLabelWord(words.northEast, "northEast");
  const south = parseLabelWord(words.south, "south");
  for (let k = 1; k <= n; k++) {
    map.paint(1, k, "northWest", nw[k - 1] ?? "0");
    map.paint(k, n, "northEast", ne[k - 1] ?? "0");
    map.paint(k, k, "south", south[k - 1] ?? "0");
  }

  return map.snapshot();
}

function merge(
  known: EdgeConstraints,
  edge: EdgeName,
  label: EdgeLabel,
  i: number,
  j: number,
): EdgeConstraints {
  const have = known[edge];
  if (have !== undefined && have !== label) {
    throw new NoCandidateError(
      `Conflicting ${edge} edge at (${i}, ${j}): constraint '${have}', neighbour '${label}'`,
      i,
      j,
    );
  }
  const out: EdgeConstraints = { ...known };
  out[edge] = label;
  return out;
}

function describeEdges(c: EdgeConstraints): string {
  const parts = Object.entries(c).map(([k, v]) => `${k}=${String(v)}`);
  return parts.length > 0 ? parts.join(" ") : "no known edges";
}

export function tableauToPuzzle(
  tableau: SkewTableau,
  opts: TableauToPuzzleOptions = {},
): PuzzleFilling {
  const catalog = opts.catalog ?? createCohomologyCatalog();
  const warn = opts.warn ?? (() => {});
  if (!tableau.isLittlewoodRichardson()) {
    warn(`Tableau ${tableau.toString()} is not Littlewood-Richardson; its puzzle may not exist`);
  }
  const n = resolvePuzzleSize(tableau, opts.size);
  const words = boundaryWords(tableau, n);
  const blue = computeBluePositions(tableau, words);
  const constraints = edgeConstraints(n, words, blue);

  const puzzle = new PuzzleFilling(
    parseLabelWord(words.northWest, "northWest"),
    parseLabelWord(words.northEast, "northEast"),
  );

  while (!puzzle.isCompleted()) {
    const [i, j] = puzzle.kinkCoordinates();
    let known = constraints.get(coordKey(i, j)) ?? {};
    known = merge(known, "northWest", puzzle.northWestLabelOfKink(), i, j);
    known = merge(known, "northEast", puzzle.northEastLabelOfKink(), i, j);

    const candidates: PuzzlePiece[] =
      i === j ? deltaCandidates(catalog, known) : rhombusCandidates(catalog, known);
    const piece = candidates[0];
    if (!piece) {
      throw new NoCandidateError(`No piece fits (${i}, ${j}) with ${describeEdges(known)}`, i, j);
    }
    puzzle.addPiece(piece);
  }

  return puzzle;
}
