// src/lr/abacus.ts
import { FormatError } from "./errors.js";

export type AbacusBit = 0 | 1 | "0" | "1";
export type AbacusInput = string | ReadonlyArray<AbacusBit | number | string>;

function bitAt(abacus: AbacusInput, i: number): 0 | 1 {
  const v = typeof abacus === "string" ? abacus.charAt(i) : abacus[i];
  if (v === 0 || v === "0") return 0;
  if (v === 1 || v === "1") return 1;
  throw new FormatError(`Invalid abacus symbol at ${i}: ${JSON.stringify(v)} (expected 0 or 1)`);
}

/**
 * Reads a partition off an abacus: every bead (`1`) becomes a part equal to the
 * number of gaps (`0`) to its left. Parts are returned largest first, zeros dropped.
 */
export function abacusToPartition(abacus: AbacusInput): number[] {
  const out: number[] = [];
  let beads = 0;

  for (let i = 0; i < abacus.length; i++) {
    if (bitAt(abacus, i) === 0) continue;
    const part = i - beads;
    if (part > 0) out.unshift(part);
    beads++;
  }

  return out;
}

export function partitionToAbacus(parts: ReadonlyArray<number>, minSize = 0): string {
  for (const p of parts) {
    if (!Number.isInteger(p) || p < 0) throw new FormatError(`Invalid partition part: ${p}`);
  }

  const ascending = [...parts].sort((a, b) => a - b);
  let out = "";
  let gaps = 0;

  for (const p of ascending) {
    out += "0".repeat(p - gaps) + "1";
    gaps = p;
  }

  return out.length < minSize ? out + "0".repeat(minSize - out.length) : out;
}

export function padPartition(parts: ReadonlyArray<number>, length: number): number[] {
  const out = [...parts];
  while (out.length < length) out.push(0);
  return out;
}
