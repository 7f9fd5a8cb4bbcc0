// src/lr/pieces.ts
//
// Puzzle pieces for ordinary cohomology of Grassmannians. Triangles carry the labels
// 0, 1 and 10; the 10 edge only ever occurs inside the puzzle, where it glues two
// triangles into a rhombus with opposite sides equal.

import { FormatError } from "./errors.js";

export type EdgeLabel = "0" | "1" | "10";

export type DeltaPiece = Readonly<{
  kind: "delta";
  northWest: EdgeLabel;
  northEast: EdgeLabel;
  south: EdgeLabel;
}>;

export type NablaPiece = Readonly<{
  kind: "nabla";
  north: EdgeLabel;
  southEast: EdgeLabel;
  southWest: EdgeLabel;
}>;

export type RhombusPiece = Readonly<{
  kind: "rhombus";
  delta: DeltaPiece;
  nabla: NablaPiece;
  northWest: EdgeLabel;
  northEast: EdgeLabel;
  southEast: EdgeLabel;
  southWest: EdgeLabel;
}>;

export type PuzzlePiece = DeltaPiece | RhombusPiece;

export type EdgeConstraints = {
  northWest?: EdgeLabel;
  northEast?: EdgeLabel;
  southEast?: EdgeLabel;
  southWest?: EdgeLabel;
  south?: EdgeLabel;
};

export type EdgeName = keyof EdgeConstraints;

export function isEdgeLabel(v: unknown): v is EdgeLabel {
  return v === "0" || v === "1" || v === "10";
}

export function parseEdgeLabel(v: unknown, name: string): EdgeLabel {
  if (!isEdgeLabel(v)) throw new FormatError(`Invalid ${name}: expected "0", "1" or "10"`);
  return v;
}

export function deltaPiece(northWest: EdgeLabel, northEast: EdgeLabel, south: EdgeLabel): DeltaPiece {
  return Object.freeze({ kind: "delta", northWest, northEast, south });
}

export function nablaPiece(north: EdgeLabel, southEast: EdgeLabel, southWest: EdgeLabel): NablaPiece {
  return Object.freeze({ kind: "nabla", north, southEast, southWest });
}

export function rhombusPiece(delta: DeltaPiece, nabla: NablaPiece): RhombusPiece {
  if (delta.south !== nabla.north) {
    throw new FormatError(
      `Rhombus halves disagree: delta south '${delta.south}' vs nabla north '${nabla.north}'`,
    );
  }
  return Object.freeze({
    kind: "rhombus",
    delta,
    nabla,
    northWest: delta.northWest,
    northEast: delta.northEast,
    southEast: nabla.southEast,
    southWest: nabla.southWest,
  });
}

export function northPiece(piece: PuzzlePiece): DeltaPiece {
  return piece.kind === "delta" ? piece : piece.delta;
}

export function borderLabels(piece: PuzzlePiece): EdgeLabel[] {
  if (piece.kind === "delta") return [piece.northWest, piece.northEast, piece.south];
  return [piece.northWest, piece.northEast, piece.southEast, piece.southWest];
}

export function isAllOnes(piece: DeltaPiece | NablaPiece): boolean {
  if (piece.kind === "delta") {
    return piece.northWest === "1" && piece.northEast === "1" && piece.south === "1";
  }
  return piece.north === "1" && piece.southEast === "1" && piece.southWest === "1";
}

export function pieceKey(piece: PuzzlePiece): string {
  if (piece.kind === "delta") return `${piece.northWest}/\\${piece.northEast} ${piece.south}`;
  return `${piece.northWest}/\\${piece.northEast} ${piece.delta.south} \\/${piece.southEast}${piece.southWest}`;
}

function edgeOf(piece: PuzzlePiece, edge: EdgeName): EdgeLabel | undefined {
  switch (edge) {
    case "northWest":
      return piece.northWest;
    case "northEast":
      return piece.northEast;
    case "southEast":
      return piece.kind === "rhombus" ? piece.southEast : undefined;
    case "southWest":
      return piece.kind === "rhombus" ? piece.southWest : undefined;
    case "south":
      return piece.kind === "delta" ? piece.south : undefined;
  }
}

const EDGE_NAMES: ReadonlyArray<EdgeName> = [
  "northWest",
  "northEast",
  "southEast",
  "southWest",
  "south",
];

export function matchesEdges(piece: PuzzlePiece, constraints: EdgeConstraints): boolean {
  for (const e of EDGE_NAMES) {
    const want = constraints[e];
    if (want === undefined) continue;
    if (edgeOf(piece, e) !== want) return false;
  }
  return true;
}

function zeroCount(piece: PuzzlePiece): number {
  return borderLabels(piece).filter((l) => l === "0").length;
}

export function comparePieces(a: PuzzlePiece, b: PuzzlePiece): number {
  const dz = zeroCount(b) - zeroCount(a);
  if (dz !== 0) return dz;
  const ka = borderLabels(a).join(",");
  const kb = borderLabels(b).join(",");
  return ka < kb ? -1 : ka > kb ? 1 : 0;
}

export type PieceCatalog = Readonly<{
  deltas: ReadonlyArray<DeltaPiece>;
  nablas: ReadonlyArray<NablaPiece>;
  rhombi: ReadonlyArray<RhombusPiece>;
  forbiddenBoundaryLabels: ReadonlyArray<EdgeLabel>;
}>;

// Clockwise from the north-west edge of a delta (north edge of a nabla).
const CLOCKWISE_TRIANGLES: ReadonlyArray<readonly [EdgeLabel, EdgeLabel, EdgeLabel]> = [
  ["0", "0", "0"],
  ["1", "1", "1"],
  ["10", "1", "0"],
  ["0", "10", "1"],
  ["1", "0", "10"],
];

export function createCatalog(
  triangles: ReadonlyArray<readonly [EdgeLabel, EdgeLabel, EdgeLabel]>,
  forbiddenBoundaryLabels: ReadonlyArray<EdgeLabel>,
): PieceCatalog {
  const deltas = triangles.map(([a, b, c]) => deltaPiece(a, b, c)).sort(comparePieces);
  const nablas = triangles.map(([a, b, c]) => nablaPiece(a, b, c));

  const rhombi: RhombusPiece[] = [];
  for (const d of deltas) {
    for (const n of nablas) {
      if (d.south === n.north) rhombi.push(rhombusPiece(d, n));
    }
  }
  rhombi.sort(comparePieces);

  return Object.freeze({
    deltas: Object.freeze(deltas),
    nablas: Object.freeze(nablas),
    rhombi: Object.freeze(rhombi),
    forbiddenBoundaryLabels: Object.freeze([...forbiddenBoundaryLabels]),
  });
}

export function createCohomologyCatalog(): PieceCatalog {
  return createCatalog(CLOCKWISE_TRIANGLES, ["10"]);
}

export function deltaCandidates(catalog: PieceCatalog, constraints: EdgeConstraints): DeltaPiece[] {
  return catalog.deltas.filter((p) => matchesEdges(p, constraints));
}

export function rhombusCandidates(
  catalog: PieceCatalog,
  constraints: EdgeConstraints,
): RhombusPiece[] {
  return catalog.rhombi.filter((p) => matchesEdges(p, constraints));
}
