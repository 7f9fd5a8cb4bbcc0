import { describe, expect, it } from "vitest";

import { LrError, NoCandidateError, PreconditionError, SizeError } from "../src/lr/errors.js";
import { deltaPiece } from "../src/lr/pieces.js";
import { puzzleToTableau } from "../src/lr/puzzleToTableau.js";
import { solvePuzzles } from "../src/lr/solver.js";
import { parseTableau } from "../src/lr/tableau.js";
import {
  boundaryWords,
  computeBluePositions,
  minimumPuzzleSize,
  tableauToPuzzle,
} from "../src/lr/tableauToPuzzle.js";

const A = parseTableau("[[_,_,_],[1,1],[2]]");
const C = parseTableau("[[_,_,1],[_,2],[1]]");
const ONE = parseTableau("[[1]]");

describe("boundary words", () => {
  it("encodes weight, outer and inner shape", () => {
    expect(minimumPuzzleSize(A)).toBe(6);
    expect(boundaryWords(A, 6)).toEqual({
      northWest: "010101",
      northEast: "010101",
      south: "110001",
    });
    expect(boundaryWords(C, 6).south).toBe("101010");
  });

  it("fits a single box in a size-2 puzzle", () => {
    expect(minimumPuzzleSize(ONE)).toBe(2);
    expect(boundaryWords(ONE, 2)).toEqual({ northWest: "10", northEast: "01", south: "10" });
    expect(boundaryWords(ONE, 3)).toEqual({ northWest: "010", northEast: "010", south: "100" });
  });

  it("places the blue triangles of a single box", () => {
    const blue = computeBluePositions(ONE, boundaryWords(ONE, 2));
    expect(blue.pairs).toEqual([{ row: 0, value: 1, run: 1, delta: [1, 1], nabla: [2, 3] }]);
    expect(blue.deltaBluePositions).toEqual([[1, 1]]);
  });
});

describe("tableauToPuzzle", () => {
  it("rejects a size below the minimum", () => {
    let caught: unknown;
    try {
      tableauToPuzzle(ONE, { size: 1 });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(SizeError);
    expect(caught).toBeInstanceOf(PreconditionError);
    expect(caught).toBeInstanceOf(LrError);
    if (caught instanceof SizeError) {
      expect(caught.requested).toBe(1);
      expect(caught.minimum).toBe(2);
    }
  });

  it("builds the size-2 puzzle of [[1]]", () => {
    const p = tableauToPuzzle(ONE);
    expect(p.isCompleted()).toBe(true);
    expect(p.southLabels()).toEqual(["1", "0"]);
    expect(p.get(2, 2)).toEqual(deltaPiece("10", "1", "0"));
    expect(p.get(1, 1)).toEqual(deltaPiece("1", "1", "1"));
    expect(p.equals(solvePuzzles("10", "01")[0] ?? p.copy())).toBe(true);
  });

  it("picks the expected pieces along the paths", () => {
    const p = tableauToPuzzle(A);
    const top = p.get(1, 6);
    expect(top.kind).toBe("rhombus");
    if (top.kind === "rhombus") {
      expect(top.delta).toEqual(deltaPiece("1", "0", "10"));
      expect([top.nabla.north, top.nabla.southEast, top.nabla.southWest]).toEqual(["10", "1", "0"]);
    }
    expect(p.get(1, 1)).toEqual(deltaPiece("0", "10", "1"));
  });

  it("inverts puzzleToTableau on every puzzle of a boundary", () => {
    const puzzles = solvePuzzles("010101", "010101");
    expect(puzzles).toHaveLength(4);
    for (const p of puzzles) {
      const t = puzzleToTableau(p);
      expect(tableauToPuzzle(t, { size: 6 }).equals(p)).toBe(true);
      expect(tableauToPuzzle(t).equals(p)).toBe(true);
    }
  });

  it("round-trips a tableau through a larger puzzle", () => {
    const p = tableauToPuzzle(ONE, { size: 3 });
    expect(p.size).toBe(3);
    expect(p.southLabels()).toEqual(["1", "0", "0"]);
    expect(puzzleToTableau(p).toString()).toBe("[[1]]");
  });

  it("warns about tableaux that are not Littlewood-Richardson", () => {
    const warnings: string[] = [];
    expect(() =>
      tableauToPuzzle(parseTableau("[[1,2]]"), { warn: (m) => warnings.push(m) }),
    ).toThrow(NoCandidateError);
    expect(warnings).toEqual([
      "Tableau [[1,2]] is not Littlewood-Richardson; its puzzle may not exist",
    ]);
  });

  it("sizes the puzzle for contents beyond the row count", () => {
    const t = parseTableau("[[2]]");
    expect(minimumPuzzleSize(t)).toBe(3);
    expect(boundaryWords(t, 3)).toEqual({ northWest: "101", northEast: "010", south: "100" });
    expect(() => tableauToPuzzle(t)).toThrow(NoCandidateError);
  });
});
