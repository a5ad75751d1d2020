import { describe, it, expect } from "vitest";
import type { RankedCandidate, SupportingNode } from "@transit-vibes/types";
import { InvalidInputError } from "../errors/index.js";
import { assemble, formatCandidate } from "./context-assembler.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

function support(kind: "stop" | "route" | "poi", id: string, name: string, weight: number): SupportingNode {
  return { ref: { kind, id }, name, cumulativeWeight: weight, hops: 1 };
}

function candidate(id: string, name: string, supporting: SupportingNode[] = []): RankedCandidate {
  return {
    node: {
      kind: "poi",
      id,
      name,
      location: { lat: 60.17, lng: 24.94 },
      tags: ["books", "coffee"],
      description: name,
      category: "cafe",
    },
    semanticScore: 0.9,
    graphScore: 0.5,
    combinedScore: 0.78,
    supporting,
  };
}

// ─── formatCandidate ────────────────────────────────────────────────────────

describe("formatCandidate", () => {
  it("renders a POI with category, tags, nearby transit and score", () => {
    const line = formatCandidate(
      candidate("A", "Cozy Book Cafe", [
        support("stop", "S1", "Kamppi", 0.1),
        support("route", "R4", "Line 4", 0.3),
      ]),
      1,
    );
    expect(line).toBe(
      "1. Cozy Book Cafe | cafe | tags: books, coffee | near: Kamppi (stop, 0.10), Line 4 (route) | match 0.78",
    );
  });

  it("lists at most three supporting nodes", () => {
    const line = formatCandidate(
      candidate("A", "Cafe", [
        support("stop", "S1", "One", 0.1),
        support("stop", "S2", "Two", 0.2),
        support("stop", "S3", "Three", 0.3),
        support("stop", "S4", "Four", 0.4),
        support("stop", "S5", "Five", 0.5),
      ]),
      2,
    );
    expect(line).toBe(
      "2. Cafe | cafe | tags: books, coffee | near: One (stop, 0.10), Two (stop, 0.20), Three (stop, 0.30) +2 more | match 0.78",
    );
  });

  it("describes stops as transit stops", () => {
    const stopCandidate: RankedCandidate = {
      node: { kind: "stop", id: "S1", name: "Kamppi", location: { lat: 60.17, lng: 24.93 } },
      semanticScore: 0,
      graphScore: 0.5,
      combinedScore: 0.15,
      supporting: [],
    };
    expect(formatCandidate(stopCandidate, 3)).toBe("3. Kamppi | transit stop | match 0.15");
  });
});

// ─── assemble ───────────────────────────────────────────────────────────────

describe("assemble", () => {
  const a = candidate("A", "Alpha");
  const b = candidate("B", "Beta");
  const c = candidate("C", "Gamma");
  const lineA = "1. Alpha | cafe | tags: books, coffee | match 0.78";
  const lineB = "2. Beta | cafe | tags: books, coffee | match 0.78";

  it("joins every entry when the budget allows", () => {
    const result = assemble([a, b], 1000);
    expect(result).toEqual({ text: `${lineA}\n${lineB}`, includedCount: 2, droppedCount: 0 });
  });

  it("counts separators against the budget", () => {
    const exact = lineA.length + 1 + lineB.length;
    expect(assemble([a, b], exact).includedCount).toBe(2);
    expect(assemble([a, b], exact - 1)).toEqual({ text: lineA, includedCount: 1, droppedCount: 1 });
  });

  it("stops at the first entry that overflows", () => {
    const result = assemble([a, b, c], lineA.length + 1 + lineB.length);
    expect(result.includedCount + result.droppedCount).toBe(3);
    expect(result.droppedCount).toBe(1);
    expect(result.text.length).toBeLessThanOrEqual(lineA.length + 1 + lineB.length);
  });

  it("drops everything when even the top entry does not fit", () => {
    expect(assemble([a], 10)).toEqual({ text: "", includedCount: 0, droppedCount: 1 });
  });

  it("returns empty text for no candidates", () => {
    expect(assemble([], 100)).toEqual({ text: "", includedCount: 0, droppedCount: 0 });
  });

  it("rejects a negative budget", () => {
    expect(() => assemble([a], -1)).toThrow(InvalidInputError);
  });
});
