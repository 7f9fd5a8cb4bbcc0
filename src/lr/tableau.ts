// src/lr/tableau.ts
import { FormatError } from "./errors.js";

/** `null` marks a cell of the inner shape. */
export type TableauCell = number | null;
export type TableauRow = ReadonlyArray<TableauCell>;

function isPartition(parts: ReadonlyArray<number>): boolean {
  for (let k = 1; k < parts.length; k++) {
    if (parts[k - 1]! < parts[k]!) return false;
  }
  return true;
}

function trimZeros(parts: number[]): number[] {
  let end = parts.length;
  while (end > 0 && parts[end - 1] === 0) end--;
  return parts.slice(0, end);
}

export class SkewTableau {
  public readonly rows: ReadonlyArray<TableauRow>;

  public constructor(rows: ReadonlyArray<ReadonlyArray<TableauCell>>) {
    this.rows = Object.freeze(rows.map((r) => Object.freeze([...r])));
    this.validate();
  }

  public get rowCount(): number {
    return this.rows.length;
  }

  public outerShape(): number[] {
    return this.rows.map((r) => r.length);
  }

  public innerShape(): number[] {
    return this.rows.map((r) => r.filter((c) => c === null).length);
  }

  public weight(): number[] {
    const out: number[] = [];
    for (const r of this.rows) {
      for (const c of r) {
        if (c === null) continue;
        while (out.length < c) out.push(0);
        out[c - 1] = (out[c - 1] ?? 0) + 1;
      }
    }
    return out;
  }

  public size(): number {
    return this.weight().reduce((a, b) => a + b, 0);
  }

  public countInRow(row: number, value: number): number {
    const r = this.rows[row];
    if (!r) return 0;
    return r.filter((c) => c === value).length;
  }

  public readingWord(): number[] {
    const out: number[] = [];
    for (const r of this.rows) {
      for (let k = r.length - 1; k >= 0; k--) {
        const c = r[k];
        if (c !== null && c !== undefined) out.push(c);
      }
    }
    return out;
  }

  /** Every prefix of the reading word holds at least as many c as c + 1. */
  public isLittlewoodRichardson(): boolean {
    const seen: number[] = [];
    for (const c of this.readingWord()) {
      while (seen.length < c) seen.push(0);
      const count = (seen[c - 1] ?? 0) + 1;
      seen[c - 1] = count;
      if (c > 1 && count > (seen[c - 2] ?? 0)) return false;
    }
    return true;
  }

  public equals(other: SkewTableau): boolean {
    return this.toString() === other.toString();
  }

  public toString(): string {
    const rows = this.rows.map((r) => `[${r.map((c) => (c === null ? "_" : String(c))).join(",")}]`);
    return `[${rows.join(",")}]`;
  }

  public toJSON(): Array<Array<number | null>> {
    return this.rows.map((r) => [...r]);
  }

  private validate(): void {
    for (let r = 0; r < this.rows.length; r++) {
      const row = this.rows[r]!;
      let seenContent = false;
      let prev = 0;
      for (let k = 0; k < row.length; k++) {
        const c = row[k];
        if (c === null) {
          if (seenContent) throw new FormatError(`Row ${r}: skipped cell after content at ${k}`);
          continue;
        }
        if (typeof c !== "number" || !Number.isInteger(c) || c < 1) {
          throw new FormatError(`Row ${r}, cell ${k}: expected a positive integer or null`);
        }
        if (c < prev) throw new FormatError(`Row ${r}: entries decrease at ${k}`);
        seenContent = true;
        prev = c;
      }
    }

    if (!isPartition(this.outerShape())) throw new FormatError("Outer shape is not a partition");
    if (!isPartition(this.innerShape())) throw new FormatError("Inner shape is not a partition");

    for (let r = 1; r < this.rows.length; r++) {
      const above = this.rows[r - 1]!;
      const row = this.rows[r]!;
      for (let k = 0; k < row.length; k++) {
        const c = row[k];
        const a = above[k];
        if (c === null || c === undefined || a === null || a === undefined) continue;
        if (a >= c) throw new FormatError(`Column ${k}: entries do not increase at row ${r}`);
      }
    }
  }
}

export function innerPartition(t: SkewTableau): number[] {
  return trimZeros(t.innerShape());
}

export function outerPartition(t: SkewTableau): number[] {
  return trimZeros(t.outerShape());
}

export function parseTableau(text: string): SkewTableau {
  const s = text.replace(/\s+/g, "");
  if (!s.startsWith("[") || !s.endsWith("]")) {
    throw new FormatError(`Invalid tableau '${text}': expected [[...],...]`);
  }
  const body = s.slice(1, -1);
  if (body === "") return new SkewTableau([]);

  const rowTexts = body.match(/\[[^[\]]*\]/g) ?? [];
  if (rowTexts.join(",") !== body) throw new FormatError(`Invalid tableau '${text}'`);

  const rows = rowTexts.map((rt) => {
    const inner = rt.slice(1, -1);
    if (inner === "") return [];
    return inner.split(",").map((cell): TableauCell => {
      if (cell === "_" || cell === ".") return null;
      if (!/^[0-9]+$/.test(cell)) throw new FormatError(`Invalid tableau cell '${cell}'`);
      return Number(cell);
    });
  });

  return new SkewTableau(rows);
}

export function parseTableauRows(input: unknown, name = "rows"): SkewTableau {
  if (!Array.isArray(input)) throw new FormatError(`Invalid ${name}: expected array`);
  const rows: TableauCell[][] = [];
  for (let r = 0; r < input.length; r++) {
    const row: unknown = input[r];
    if (!Array.isArray(row)) throw new FormatError(`Invalid ${name}[${r}]: expected array`);
    rows.push(
      row.map((c: unknown, k): TableauCell => {
        if (c === null) return null;
        if (typeof c === "number") return c;
        throw new FormatError(`Invalid ${name}[${r}][${k}]: expected number or null`);
      }),
    );
  }
  return new SkewTableau(rows);
}
