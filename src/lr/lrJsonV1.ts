// src/lr/lrJsonV1.ts
import { FormatError } from "./errors.js";
import { deltaPiece, nablaPiece, parseEdgeLabel, rhombusPiece } from "./pieces.js";
import type { EdgeLabel, PuzzlePiece } from "./pieces.js";
import { PuzzleFilling, coordKey, kinkOrder, parseLabelWord } from "./puzzle.js";
import { parseTableauRows } from "./tableau.js";
import type { SkewTableau } from "./tableau.js";

export const PUZZLE_SCHEMA = "lrpuzzle.puzzle.json.v1";
export const TABLEAU_SCHEMA = "lrpuzzle.tableau.json.v1";

export type PieceJsonV1 =
  | {
      northWest: EdgeLabel;
      northEast: EdgeLabel;
      south: EdgeLabel;
    }
  | {
      northWest: EdgeLabel;
      northEast: EdgeLabel;
      inner: EdgeLabel;
      southEast: EdgeLabel;
      southWest: EdgeLabel;
    };

export type PuzzleJsonV1 = {
  schema: typeof PUZZLE_SCHEMA;
  size: number;
  northWest: string;
  northEast: string;
  south?: string;
  cells: Array<{ i: number; j: number; piece: PieceJsonV1 }>;
};

export type TableauJsonV1 = {
  schema: typeof TABLEAU_SCHEMA;
  rows: Array<Array<number | null>>;
};

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null;
}

function pieceToJson(piece: PuzzlePiece): PieceJsonV1 {
  if (piece.kind === "delta") {
    return { northWest: piece.northWest, northEast: piece.northEast, south: piece.south };
  }
  return {
    northWest: piece.northWest,
    northEast: piece.northEast,
    inner: piece.delta.south,
    southEast: piece.southEast,
    southWest: piece.southWest,
  };
}

function parsePieceJson(v: unknown, name: string): PuzzlePiece {
  if (!isRecord(v)) throw new FormatError(`Invalid ${name}: expected object`);
  const nw = parseEdgeLabel(v.northWest, `${name}.northWest`);
  const ne = parseEdgeLabel(v.northEast, `${name}.northEast`);

  if (v.south !== undefined) return deltaPiece(nw, ne, parseEdgeLabel(v.south, `${name}.south`));

  const inner = parseEdgeLabel(v.inner, `${name}.inner`);
  const se = parseEdgeLabel(v.southEast, `${name}.southEast`);
  const sw = parseEdgeLabel(v.southWest, `${name}.southWest`);
  return rhombusPiece(deltaPiece(nw, ne, inner), nablaPiece(inner, se, sw));
}

function parseCount(v: unknown, name: string): number {
  if (typeof v !== "number" || !Number.isInteger(v) || v < 0) {
    throw new FormatError(`Invalid ${name}: expected non-negative integer`);
  }
  return v;
}

export function puzzleToJsonV1(puzzle: PuzzleFilling): PuzzleJsonV1 {
  const out: PuzzleJsonV1 = {
    schema: PUZZLE_SCHEMA,
    size: puzzle.size,
    northWest: puzzle.northWestLabels().join(""),
    northEast: puzzle.northEastLabels().join(""),
    cells: puzzle.cells().map(({ i, j, piece }) => ({ i, j, piece: pieceToJson(piece) })),
  };
  if (puzzle.isCompleted()) out.south = puzzle.southLabels().join("");
  return out;
}

// Cells must form a kink-order prefix.
export function parsePuzzleJsonV1(input: unknown): PuzzleFilling {
  if (!isRecord(input)) throw new FormatError("Invalid JSON: expected object");
  if (input.schema !== PUZZLE_SCHEMA) throw new FormatError("Invalid schema");

  const size = parseCount(input.size, "size");
  if (typeof input.northWest !== "string") throw new FormatError("Invalid northWest: expected string");
  if (typeof input.northEast !== "string") throw new FormatError("Invalid northEast: expected string");

  const nw = parseLabelWord(input.northWest, "northWest");
  const ne = parseLabelWord(input.northEast, "northEast");
  if (nw.length !== size || ne.length !== size) {
    throw new FormatError(`Boundary words must have length ${size}`);
  }

  if (!Array.isArray(input.cells)) throw new FormatError("Invalid cells: expected array");
  const byKey = new Map<string, PuzzlePiece>();
  for (let k = 0; k < input.cells.length; k++) {
    const item: unknown = input.cells[k];
    if (!isRecord(item)) throw new FormatError(`Invalid cells[${k}]: expected object`);
    const i = parseCount(item.i, `cells[${k}].i`);
    const j = parseCount(item.j, `cells[${k}].j`);
    byKey.set(coordKey(i, j), parsePieceJson(item.piece, `cells[${k}].piece`));
  }

  const puzzle = new PuzzleFilling(nw, ne);
  for (const [i, j] of kinkOrder(size)) {
    const piece = byKey.get(coordKey(i, j));
    if (!piece) break;
    if (piece.northWest !== puzzle.northWestLabelOfKink()) {
      throw new FormatError(`Cell (${i}, ${j}): north-west edge does not match its neighbour`);
    }
    if (piece.northEast !== puzzle.northEastLabelOfKink()) {
      throw new FormatError(`Cell (${i}, ${j}): north-east edge does not match its neighbour`);
    }
    puzzle.addPiece(piece);
    byKey.delete(coordKey(i, j));
  }

  if (byKey.size > 0) {
    throw new FormatError(`Cells out of kink order or outside the grid: ${[...byKey.keys()].join(" ")}`);
  }

  if (typeof input.south === "string" && puzzle.isCompleted()) {
    if (puzzle.southLabels().join("") !== input.south) {
      throw new FormatError("south does not match the pieces on the south boundary");
    }
  }

  return puzzle;
}

export function stringifyPuzzleJsonV1(doc: PuzzleJsonV1): string {
  return JSON.stringify(doc, null, 2) + "\n";
}

export function tableauToJsonV1(tableau: SkewTableau): TableauJsonV1 {
  return { schema: TABLEAU_SCHEMA, rows: tableau.toJSON() };
}

export function parseTableauJsonV1(input: unknown): SkewTableau {
  if (Array.isArray(input)) return parseTableauRows(input);
  if (!isRecord(input)) throw new FormatError("Invalid JSON: expected object or array");
  if (input.schema !== TABLEAU_SCHEMA) throw new FormatError("Invalid schema");
  return parseTableauRows(input.rows);
}

export function stringifyTableauJsonV1(doc: TableauJsonV1): string {
  return JSON.stringify(doc, null, 2) + "\n";
}
