// src/lr/puzzleToTableau.ts
import { abacusToPartition, padPartition } from "./abacus.js";
import { InternalConsistencyError, PreconditionError } from "./errors.js";
import { isAllOnes, northPiece } from "./pieces.js";
import type { DeltaPiece } from "./pieces.js";
import type { PuzzleFilling } from "./puzzle.js";
import { SkewTableau } from "./tableau.js";
import type { TableauCell } from "./tableau.js";

type Heading = "WEST" | "SOUTH";

// North piece of a west step: its north-west edge pairs with the nabla to the west.
function isWestStep(p: DeltaPiece): boolean {
  return p.northWest === "10" && p.northEast === "1" && p.south === "0";
}

/**
 * Follows the 1-path entering the puzzle at north-east position `coord` (1-indexed)
 * down to the south boundary and returns the contents of one tableau row, left to
 * right. Every west step records a cell; every turn south raises the cells recorded
 * so far by one.
 */
export function traceRow(puzzle: PuzzleFilling, coord: number): number[] {
  const n = puzzle.size;
  if (!Number.isInteger(coord) || coord < 1 || coord > n) {
    throw new PreconditionError(`North-east position ${coord} outside 1..${n}`);
  }
  const label = puzzle.northEastLabels()[coord - 1];
  if (label !== "1") {
    throw new PreconditionError(`North-east label at ${coord} is '${label}', expected '1'`);
  }

  const row: number[] = [];
  let i = coord;
  let j = n;
  let heading: Heading = "WEST";

  while (j > 0) {
    if (i < 1 || i > j) {
      throw new InternalConsistencyError(`Path from ${coord} left the grid at (${i}, ${j})`);
    }

    if (heading === "WEST") {
      const north = northPiece(puzzle.get(i, j));
      if (isAllOnes(north)) {
        heading = "SOUTH";
        for (let k = 0; k < row.length; k++) row[k] = (row[k] ?? 0) + 1;
      } else if (isWestStep(north)) {
        row.unshift(0);
        i -= 1;
        j -= 1;
      } else {
        throw new InternalConsistencyError(
          `Path from ${coord} heading west met an unexpected piece at (${i}, ${j})`,
        );
      }
      continue;
    }

    if (j - i < 1) return row;

    const cell = puzzle.get(i, j);
    if (cell.kind !== "rhombus") {
      throw new InternalConsistencyError(`Expected a rhombus at (${i}, ${j})`);
    }
    if (isAllOnes(cell.nabla)) heading = "WEST";
    j -= 1;
  }

  throw new InternalConsistencyError(`Path from ${coord} ran off the grid before the south edge`);
}

export function puzzleToTableau(puzzle: PuzzleFilling): SkewTableau {
  const ne = puzzle.northEastLabels();
  const south = puzzle.southLabels();

  let k = ne.filter((l) => l === "1").length;
  const parts = abacusToPartition(south);
  const lambda = padPartition(parts, parts.length + k);

  const rows: TableauCell[][] = [];
  for (let i = 0; i < ne.length; i++) {
    if (ne[i] !== "1") continue;
    k -= 1;
    const skipped: TableauCell[] = new Array<TableauCell>(lambda[k] ?? 0).fill(null);
    rows.unshift([...skipped, ...traceRow(puzzle, i + 1)]);
  }

  return new SkewTableau(rows.filter((r) => r.length > 0));
}
