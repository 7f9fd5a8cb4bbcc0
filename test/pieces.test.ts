import { describe, expect, it } from "vitest";

import { FormatError } from "../src/lr/errors.js";
import {
  borderLabels,
  createCohomologyCatalog,
  deltaCandidates,
  deltaPiece,
  isAllOnes,
  matchesEdges,
  nablaPiece,
  rhombusCandidates,
  rhombusPiece,
} from "../src/lr/pieces.js";

describe("cohomology catalog", () => {
  const catalog = createCohomologyCatalog();

  it("holds five triangles of each orientation and nine rhombi", () => {
    expect(catalog.deltas).toHaveLength(5);
    expect(catalog.nablas).toHaveLength(5);
    expect(catalog.rhombi).toHaveLength(9);
    expect(catalog.forbiddenBoundaryLabels).toEqual(["10"]);
  });

  it("orders deltas with the most 0 edges first", () => {
    expect(catalog.deltas.map((d) => borderLabels(d).join(","))).toEqual([
      "0,0,0",
      "0,10,1",
      "1,0,10",
      "10,1,0",
      "1,1,1",
    ]);
  });

  it("glues rhombi only along equal inner edges", () => {
    for (const r of catalog.rhombi) expect(r.delta.south).toBe(r.nabla.north);
    expect(catalog.rhombi.map((r) => borderLabels(r).join(","))[0]).toBe("0,0,0,0");
  });

  it("filters candidates by the known edges", () => {
    const ds = deltaCandidates(catalog, { northWest: "1", northEast: "0" });
    expect(ds.map((d) => d.south)).toEqual(["10"]);

    const rs = rhombusCandidates(catalog, { northWest: "1", northEast: "1" });
    expect(rs.map((r) => [r.southEast, r.southWest])).toEqual([
      ["0", "10"],
      ["1", "1"],
    ]);
  });
});

describe("pieces", () => {
  it("rejects a rhombus whose halves disagree", () => {
    expect(() => rhombusPiece(deltaPiece("0", "0", "0"), nablaPiece("1", "1", "1"))).toThrow(
      FormatError,
    );
  });

  it("recognises the all-ones triangles", () => {
    expect(isAllOnes(deltaPiece("1", "1", "1"))).toBe(true);
    expect(isAllOnes(nablaPiece("1", "1", "1"))).toBe(true);
    expect(isAllOnes(deltaPiece("10", "1", "0"))).toBe(false);
  });

  it("ignores edges a piece does not have", () => {
    const d = deltaPiece("0", "10", "1");
    expect(matchesEdges(d, { northWest: "0", south: "1" })).toBe(true);
    expect(matchesEdges(d, { south: "0" })).toBe(false);
    expect(matchesEdges(d, {})).toBe(true);
  });
});
