import { describe, expect, it } from "vitest";

import { InternalConsistencyError, PreconditionError } from "../src/lr/errors.js";
import { deltaPiece } from "../src/lr/pieces.js";
import { PuzzleFilling } from "../src/lr/puzzle.js";
import { puzzleToTableau, traceRow } from "../src/lr/puzzleToTableau.js";
import { solvePuzzles } from "../src/lr/solver.js";

function puzzleWithSouth(puzzles: PuzzleFilling[], south: string): PuzzleFilling {
  const p = puzzles.find((q) => q.southLabels().join("") === south);
  if (!p) throw new Error(`No puzzle with south ${south}`);
  return p;
}

describe("puzzleToTableau", () => {
  const puzzles = solvePuzzles("010101", "010101");

  it("gives one Littlewood-Richardson tableau per puzzle", () => {
    const tableaux = puzzles.map((p) => puzzleToTableau(p));
    expect(tableaux.map((t) => t.toString()).sort()).toEqual([
      "[[_,1,1],[_,2],[_]]",
      "[[_,_,1],[_,1],[2]]",
      "[[_,_,1],[_,2],[1]]",
      "[[_,_,_],[1,1],[2]]",
    ]);
    for (const t of tableaux) {
      expect(t.isLittlewoodRichardson()).toBe(true);
      expect(t.weight()).toEqual([2, 1]);
    }
  });

  it("reads the inner shape off the south boundary", () => {
    const c = puzzleWithSouth(puzzles, "101010");
    expect(puzzleToTableau(c).toString()).toBe("[[_,_,1],[_,2],[1]]");
  });

  it("returns an empty tableau when no path turns west", () => {
    const [p] = solvePuzzles("01", "10");
    expect(p && puzzleToTableau(p).rowCount).toBe(0);
  });

  it("reads [[1]] off the size-2 puzzle with a 10 edge", () => {
    const [p] = solvePuzzles("10", "01");
    expect(p && puzzleToTableau(p).toString()).toBe("[[1]]");
  });
});

describe("traceRow", () => {
  const a = puzzleWithSouth(solvePuzzles("010101", "010101"), "110001");

  it("follows each north-east 1 to its row", () => {
    expect(traceRow(a, 2)).toEqual([2]);
    expect(traceRow(a, 4)).toEqual([1, 1]);
    expect(traceRow(a, 6)).toEqual([]);
  });

  it("rejects positions that carry no path", () => {
    expect(() => traceRow(a, 3)).toThrow(PreconditionError);
    expect(() => traceRow(a, 0)).toThrow(PreconditionError);
    expect(() => traceRow(a, 7)).toThrow(PreconditionError);
  });

  it("traces the fifth filling of a size-7 boundary", () => {
    const p = solvePuzzles("0101011", "0101101")[4];
    if (!p) throw new Error("expected at least five puzzles");
    expect(p.southLabels().join("")).toBe("1100101");
    expect(traceRow(p, 2)).toEqual([2]);
    expect(traceRow(p, 4)).toEqual([1, 1]);
    expect(() => traceRow(p, 3)).toThrow(PreconditionError);
  });

  it("fails on a piece the walk has no rule for", () => {
    const p = new PuzzleFilling(["1"], ["1"]);
    p.addPiece(deltaPiece("0", "0", "0"));
    expect(() => traceRow(p, 1)).toThrow(InternalConsistencyError);
  });
});
