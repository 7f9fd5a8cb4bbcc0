// src/lr/solver.ts
import { createCohomologyCatalog, deltaCandidates, rhombusCandidates } from "./pieces.js";
import type { EdgeConstraints, EdgeLabel, PieceCatalog, PuzzlePiece } from "./pieces.js";
import { PuzzleFilling, parseLabelWord } from "./puzzle.js";
import { FormatError } from "./errors.js";

export type SolveOptions = Readonly<{
  catalog?: PieceCatalog;
  limit?: number;
}>;

function candidatesAtKink(puzzle: PuzzleFilling, catalog: PieceCatalog): PuzzlePiece[] {
  const [i, j] = puzzle.kinkCoordinates();
  const known: EdgeConstraints = {
    northWest: puzzle.northWestLabelOfKink(),
    northEast: puzzle.northEastLabelOfKink(),
  };

  if (i !== j) return rhombusCandidates(catalog, known);

  const forbidden = new Set<EdgeLabel>(catalog.forbiddenBoundaryLabels);
  return deltaCandidates(catalog, known).filter((p) => !forbidden.has(p.south));
}

function checkBoundary(word: ReadonlyArray<EdgeLabel>, catalog: PieceCatalog, name: string): void {
  const forbidden = new Set<EdgeLabel>(catalog.forbiddenBoundaryLabels);
  for (let k = 0; k < word.length; k++) {
    const l = word[k];
    if (l !== undefined && forbidden.has(l)) {
      throw new FormatError(`Label '${l}' may not appear on the boundary (${name}[${k}])`);
    }
  }
}

export function solvePuzzles(
  northWest: string | ReadonlyArray<string>,
  northEast: string | ReadonlyArray<string>,
  opts: SolveOptions = {},
): PuzzleFilling[] {
  const catalog = opts.catalog ?? createCohomologyCatalog();
  const limit = opts.limit ?? Number.POSITIVE_INFINITY;

  const nw = parseLabelWord(northWest, "northWest");
  const ne = parseLabelWord(northEast, "northEast");
  checkBoundary(nw, catalog, "northWest");
  checkBoundary(ne, catalog, "northEast");

  const out: PuzzleFilling[] = [];

  const visit = (partial: PuzzleFilling): void => {
    if (out.length >= limit) return;
    if (partial.isCompleted()) {
      out.push(partial);
      return;
    }
    for (const piece of candidatesAtKink(partial, catalog)) {
      const next = partial.copy();
      next.addPiece(piece);
      visit(next);
    }
  };

  visit(new PuzzleFilling(nw, ne));
  return out;
}

export function countPuzzles(
  northWest: string | ReadonlyArray<string>,
  northEast: string | ReadonlyArray<string>,
  opts: SolveOptions = {},
): number {
  return solvePuzzles(northWest, northEast, opts).length;
}
