// src/lr/puzzle.ts
import { FormatError, PreconditionError } from "./errors.js";
import { isEdgeLabel, pieceKey } from "./pieces.js";
import type { EdgeLabel, PuzzlePiece } from "./pieces.js";

export type Coord = readonly [i: number, j: number];

export function coordKey(i: number, j: number): string {
  return `${i},${j}`;
}

export function inGrid(n: number, i: number, j: number): boolean {
  return Number.isInteger(i) && Number.isInteger(j) && 1 <= i && i <= j && j <= n;
}

export function kinkOrder(n: number): Coord[] {
  const out: Coord[] = [];
  for (let j = n; j >= 1; j--) {
    for (let i = 1; i <= j; i++) out.push([i, j]);
  }
  return out;
}

export function parseLabelWord(word: string | ReadonlyArray<string>, name: string): EdgeLabel[] {
  const items = typeof word === "string" ? word.split("") : [...word];
  return items.map((v, idx) => {
    if (!isEdgeLabel(v)) throw new FormatError(`Invalid ${name}[${idx}]: ${JSON.stringify(v)}`);
    return v;
  });
}

/**
 * A (partial) filling of the triangular grid of size n.
 *
 * Cell (i, j), 1 <= i <= j <= n: the north-west boundary is read along the cells
 * (1, j), the north-east boundary along (i, n), the south boundary along (i, i).
 * A rhombus at (i, j) shares its south-west edge with (i, j - 1) and its south-east
 * edge with (i + 1, j). Pieces are added at the kink, column by column from j = n.
 */
export class PuzzleFilling {
  private readonly squares = new Map<string, PuzzlePiece>();
  private kink: [number, number];
  private readonly nw: ReadonlyArray<EdgeLabel>;
  private readonly ne: ReadonlyArray<EdgeLabel>;

  public constructor(northWest: ReadonlyArray<EdgeLabel>, northEast: ReadonlyArray<EdgeLabel>) {
    if (northWest.length !== northEast.length) {
      throw new FormatError(
        `Boundary words differ in length: north-west ${northWest.length}, north-east ${northEast.length}`,
      );
    }
    this.nw = Object.freeze([...northWest]);
    this.ne = Object.freeze([...northEast]);
    this.kink = [1, this.nw.length];
  }

  public get size(): number {
    return this.nw.length;
  }

  public northWestLabels(): EdgeLabel[] {
    return [...this.nw];
  }

  public northEastLabels(): EdgeLabel[] {
    return [...this.ne];
  }

  public southLabels(): EdgeLabel[] {
    const out: EdgeLabel[] = [];
    for (let i = 1; i <= this.size; i++) {
      const p = this.squares.get(coordKey(i, i));
      if (!p || p.kind !== "delta") {
        throw new PreconditionError(`South boundary incomplete: no triangle at (${i}, ${i})`);
      }
      out.push(p.south);
    }
    return out;
  }

  public kinkCoordinates(): Coord {
    return [this.kink[0], this.kink[1]];
  }

  public isCompleted(): boolean {
    return this.kink[1] === 0;
  }

  public northWestLabelOfKink(): EdgeLabel {
    const [i, j] = this.kink;
    if (i === 1) return this.boundaryLabel(this.nw, j, "north-west");
    const above = this.get(i - 1, j);
    if (above.kind !== "rhombus") throw new PreconditionError(`No rhombus at (${i - 1}, ${j})`);
    return above.southEast;
  }

  public northEastLabelOfKink(): EdgeLabel {
    const [i, j] = this.kink;
    if (j === this.size) return this.boundaryLabel(this.ne, i, "north-east");
    const right = this.get(i, j + 1);
    if (right.kind !== "rhombus") throw new PreconditionError(`No rhombus at (${i}, ${j + 1})`);
    return right.southWest;
  }

  public addPiece(piece: PuzzlePiece): void {
    if (this.isCompleted()) throw new PreconditionError("Puzzle is already complete");
    const [i, j] = this.kink;
    const wantDelta = i === j;
    if (wantDelta !== (piece.kind === "delta")) {
      throw new PreconditionError(
        `Cell (${i}, ${j}) takes a ${wantDelta ? "triangle" : "rhombus"}, got ${piece.kind}`,
      );
    }
    this.squares.set(coordKey(i, j), piece);
    this.kink = i === j ? [1, j - 1] : [i + 1, j];
  }

  public get(i: number, j: number): PuzzlePiece {
    const p = this.squares.get(coordKey(i, j));
    if (!p) throw new PreconditionError(`No piece at (${i}, ${j})`);
    return p;
  }

  public cells(): Array<{ i: number; j: number; piece: PuzzlePiece }> {
    const out: Array<{ i: number; j: number; piece: PuzzlePiece }> = [];
    for (const [i, j] of kinkOrder(this.size)) {
      const piece = this.squares.get(coordKey(i, j));
      if (piece) out.push({ i, j, piece });
    }
    return out;
  }

  public copy(): PuzzleFilling {
    const out = new PuzzleFilling(this.nw, this.ne);
    for (const [k, v] of this.squares) out.squares.set(k, v);
    out.kink = [this.kink[0], this.kink[1]];
    return out;
  }

  public equals(other: PuzzleFilling): boolean {
    if (this.size !== other.size) return false;
    if (this.nw.join(",") !== other.nw.join(",")) return false;
    if (this.ne.join(",") !== other.ne.join(",")) return false;
    if (this.squares.size !== other.squares.size) return false;
    for (const [k, v] of this.squares) {
      const w = other.squares.get(k);
      if (!w || pieceKey(w) !== pieceKey(v)) return false;
    }
    return true;
  }

  private boundaryLabel(word: ReadonlyArray<EdgeLabel>, index: number, side: string): EdgeLabel {
    const label = word[index - 1];
    if (label === undefined) throw new PreconditionError(`No ${side} label at ${index}`);
    return label;
  }
}
