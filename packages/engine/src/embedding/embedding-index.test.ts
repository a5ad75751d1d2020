import { describe, it, expect, beforeEach, vi } from "vitest";
import { InvalidInputError } from "../errors/index.js";
import { InMemoryEmbeddingIndex, compareHits } from "./embedding-index.js";
import { cosineSimilarity, l2Normalize } from "./similarity.js";

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
});

// ─── Similarity ─────────────────────────────────────────────────────────────

describe("cosineSimilarity", () => {
  it("returns 1 for parallel vectors", () => {
    expect(cosineSimilarity([1, 2], [2, 4])).toBeCloseTo(1, 10);
  });

  it("returns 0 for orthogonal vectors", () => {
    expect(cosineSimilarity([1, 0], [0, 3])).toBe(0);
  });

  it("returns 0 when either vector is all zeros", () => {
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
  });
});

describe("l2Normalize", () => {
  it("scales to unit length", () => {
    expect(l2Normalize([3, 4])).toEqual([0.6, 0.8]);
  });
});

// ─── InMemoryEmbeddingIndex ─────────────────────────────────────────────────

describe("InMemoryEmbeddingIndex", () => {
  it("returns an empty list when nothing is indexed", async () => {
    const index = new InMemoryEmbeddingIndex(2);
    expect(await index.query([1, 0], 5)).toEqual([]);
  });

  it("returns the k nearest vectors in descending similarity", async () => {
    const index = new InMemoryEmbeddingIndex();
    await index.upsert("a", [1, 0]);
    await index.upsert("b", [0, 1]);
    await index.upsert("c", [1, 1]);

    const hits = await index.query([1, 0], 2);
    expect(hits.map((h) => h.nodeId)).toEqual(["a", "c"]);
    expect(hits[0]?.similarity).toBeCloseTo(1, 10);
    expect(hits[1]?.similarity).toBeCloseTo(Math.SQRT1_2, 10);
  });

  it("breaks similarity ties by ascending node id", async () => {
    const index = new InMemoryEmbeddingIndex();
    await index.upsert("zeta", [1, 0]);
    await index.upsert("alpha", [2, 0]);

    const hits = await index.query([1, 0], 2);
    expect(hits.map((h) => h.nodeId)).toEqual(["alpha", "zeta"]);
  });

  it("returns everything when k exceeds the index size", async () => {
    const index = new InMemoryEmbeddingIndex();
    await index.upsert("a", [1, 0]);
    expect(await index.query([1, 0], 10)).toHaveLength(1);
  });

  it("rejects a query vector of the wrong dimension", async () => {
    const index = new InMemoryEmbeddingIndex();
    await index.upsert("a", [1, 0, 0]);
    await expect(index.query([1, 0], 1)).rejects.toBeInstanceOf(InvalidInputError);
  });

  it("rejects a non-positive k", async () => {
    const index = new InMemoryEmbeddingIndex();
    await expect(index.query([1, 0], 0)).rejects.toBeInstanceOf(InvalidInputError);
  });

  it("rejects vectors with non-finite values", async () => {
    const index = new InMemoryEmbeddingIndex();
    await expect(index.upsert("a", [1, Number.NaN])).rejects.toBeInstanceOf(InvalidInputError);
  });

  it("treats a repeated identical upsert as a no-op", async () => {
    const index = new InMemoryEmbeddingIndex();
    await index.upsert("a", [1, 0]);
    const version = index.version();
    await index.upsert("a", [1, 0]);
    expect(index.version()).toBe(version);
    expect(index.size()).toBe(1);
  });

  it("replaces a vector on upsert with new values", async () => {
    const index = new InMemoryEmbeddingIndex();
    await index.upsert("a", [1, 0]);
    await index.upsert("a", [0, 1]);
    const hits = await index.query([0, 1], 1);
    expect(hits[0]?.similarity).toBeCloseTo(1, 10);
    expect(index.version()).toBe(2);
  });

  it("replaceAll swaps the whole set and bumps the version once", async () => {
    const index = new InMemoryEmbeddingIndex();
    await index.upsert("old", [1, 0]);
    await index.replaceAll([
      { nodeId: "x", vector: [1, 0] },
      { nodeId: "y", vector: [0, 1] },
    ]);
    expect(index.version()).toBe(2);
    expect(index.has("old")).toBe(false);
    expect(index.size()).toBe(2);
  });

  it("replaceAll rejects duplicate node ids and keeps the old snapshot", async () => {
    const index = new InMemoryEmbeddingIndex();
    await index.upsert("old", [1, 0]);
    await expect(
      index.replaceAll([
        { nodeId: "x", vector: [1, 0] },
        { nodeId: "x", vector: [0, 1] },
      ]),
    ).rejects.toBeInstanceOf(InvalidInputError);
    expect(index.has("old")).toBe(true);
    expect(index.version()).toBe(1);
  });

  it("keeps serving a query's captured snapshot across a swap", async () => {
    const index = new InMemoryEmbeddingIndex();
    await index.upsert("a", [1, 0]);
    const pending = index.query([1, 0], 1);
    await index.replaceAll([{ nodeId: "b", vector: [1, 0] }]);
    expect((await pending)[0]?.nodeId).toBe("a");
  });

  it("answers every query through a view from the snapshot it pinned", async () => {
    const index = new InMemoryEmbeddingIndex();
    await index.upsert("a", [1, 0]);
    const view = index.view();
    await index.replaceAll([{ nodeId: "b", vector: [1, 0] }]);

    expect(view.version()).toBe(1);
    expect((await view.query([1, 0], 5)).map((h) => h.nodeId)).toEqual(["a"]);
    expect(index.version()).toBe(2);
    expect((await index.query([1, 0], 5)).map((h) => h.nodeId)).toEqual(["b"]);
  });
});

describe("compareHits", () => {
  it("orders by similarity before id", () => {
    const sorted = [
      { nodeId: "a", similarity: 0.1 },
      { nodeId: "b", similarity: 0.9 },
    ].sort(compareHits);
    expect(sorted.map((h) => h.nodeId)).toEqual(["b", "a"]);
  });
});
