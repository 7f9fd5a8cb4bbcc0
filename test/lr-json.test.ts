import { describe, expect, it } from "vitest";

import { FormatError } from "../src/lr/errors.js";
import {
  PUZZLE_SCHEMA,
  TABLEAU_SCHEMA,
  parsePuzzleJsonV1,
  parseTableauJsonV1,
  puzzleToJsonV1,
  stringifyPuzzleJsonV1,
  stringifyTableauJsonV1,
  tableauToJsonV1,
} from "../src/lr/lrJsonV1.js";
import { solvePuzzles } from "../src/lr/solver.js";
import { parseTableau } from "../src/lr/tableau.js";

describe("puzzle JSON v1", () => {
  const [p] = solvePuzzles("10", "01");

  it("lists cells in kink order", () => {
    if (!p) throw new Error("expected a puzzle");
    const doc = puzzleToJsonV1(p);
    expect(doc.schema).toBe(PUZZLE_SCHEMA);
    expect(doc.size).toBe(2);
    expect(doc.south).toBe("10");
    expect(doc.cells).toEqual([
      {
        i: 1,
        j: 2,
        piece: { northWest: "0", northEast: "0", inner: "0", southEast: "10", southWest: "1" },
      },
      { i: 2, j: 2, piece: { northWest: "10", northEast: "1", south: "0" } },
      { i: 1, j: 1, piece: { northWest: "1", northEast: "1", south: "1" } },
    ]);
  });

  it("round-trips every puzzle of a boundary", () => {
    for (const q of solvePuzzles("010101", "010101")) {
      const text = stringifyPuzzleJsonV1(puzzleToJsonV1(q));
      expect(text.endsWith("\n")).toBe(true);
      const parsed: unknown = JSON.parse(text);
      expect(parsePuzzleJsonV1(parsed).equals(q)).toBe(true);
    }
  });

  it("rejects pieces that disagree with the boundary", () => {
    if (!p) throw new Error("expected a puzzle");
    const doc = { ...puzzleToJsonV1(p), northWest: "01" };
    expect(() => parsePuzzleJsonV1(doc)).toThrow(FormatError);
  });

  it("rejects a wrong schema and malformed cells", () => {
    if (!p) throw new Error("expected a puzzle");
    const doc = puzzleToJsonV1(p);
    expect(() => parsePuzzleJsonV1({ ...doc, schema: "other" })).toThrow(FormatError);
    expect(() => parsePuzzleJsonV1({ ...doc, cells: [{ i: 1, j: 3, piece: {} }] })).toThrow(
      FormatError,
    );
    expect(() => parsePuzzleJsonV1({ ...doc, south: "01" })).toThrow(FormatError);
  });

  it("keeps a partial filling", () => {
    if (!p) throw new Error("expected a puzzle");
    const doc = puzzleToJsonV1(p);
    const partial = parsePuzzleJsonV1({ ...doc, cells: doc.cells.slice(0, 1), south: undefined });
    expect(partial.isCompleted()).toBe(false);
    expect(partial.kinkCoordinates()).toEqual([2, 2]);
  });
});

describe("tableau JSON v1", () => {
  it("round-trips through the document", () => {
    const t = parseTableau("[[_,_,1],[_,2],[1]]");
    const doc = tableauToJsonV1(t);
    expect(doc).toEqual({ schema: TABLEAU_SCHEMA, rows: [[null, null, 1], [null, 2], [1]] });
    const parsed: unknown = JSON.parse(stringifyTableauJsonV1(doc));
    expect(parseTableauJsonV1(parsed).equals(t)).toBe(true);
  });

  it("accepts bare rows", () => {
    expect(parseTableauJsonV1([[null, 1], [2]]).toString()).toBe("[[_,1],[2]]");
    expect(() => parseTableauJsonV1({ schema: "other", rows: [] })).toThrow(FormatError);
  });
});
