/**
 * Embedding index: one vector per POI, queried by cosine similarity.
 *
 * The in-memory implementation keeps an immutable snapshot (a frozen Map
 * plus a version number). Writers build a new snapshot and swap the
 * reference, so a query that captured the old snapshot keeps a
 * consistent view until it finishes.
 */

import type { EmbeddingRecord } from "@transit-vibes/types";
import { InvalidInputError } from "../errors/index.js";
import { cosineSimilarity, isFiniteVector } from "./similarity.js";

/** One nearest-neighbour hit */
export interface SimilarityHit {
  nodeId: string;
  /** Raw cosine similarity in [-1, 1] */
  similarity: number;
}

/** Read access to one index snapshot */
export interface EmbeddingIndexView {
  /**
   * The k nearest vectors, descending by similarity, ties by ascending
   * nodeId. Empty index → empty array.
   */
  query(vector: number[], k: number, signal?: AbortSignal): Promise<SimilarityHit[]>;
  /** Incremented on every committed write */
  version(): number;
}

/** Contract every index backend satisfies */
export interface EmbeddingIndex extends EmbeddingIndexView {
  /** Vector dimension, or null while the index is empty and untyped */
  readonly dimension: number | null;
  /** Store or replace one vector. Identical repeated input is a no-op. */
  upsert(nodeId: string, vector: number[]): Promise<void>;
  /** Pin the current snapshot for a sequence of reads */
  view(): EmbeddingIndexView;
  /** Atomically replace every record with a new complete set */
  replaceAll(records: EmbeddingRecord[]): Promise<void>;
  size(): number;
  has(nodeId: string): boolean;
}

interface IndexSnapshot {
  readonly version: number;
  readonly dimension: number | null;
  readonly vectors: ReadonlyMap<string, readonly number[]>;
}

function sameVector(a: readonly number[], b: readonly number[]): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

/** Descending similarity, then ascending nodeId */
export function compareHits(a: SimilarityHit, b: SimilarityHit): number {
  if (b.similarity !== a.similarity) return b.similarity - a.similarity;
  return a.nodeId < b.nodeId ? -1 : a.nodeId > b.nodeId ? 1 : 0;
}

function search(
  snap: IndexSnapshot,
  vector: number[],
  k: number,
  signal?: AbortSignal,
): SimilarityHit[] {
  if (!Number.isInteger(k) || k <= 0) {
    throw new InvalidInputError(`k must be a positive integer, got ${k}`);
  }
  if (snap.vectors.size === 0) return [];
  if (snap.dimension !== null && vector.length !== snap.dimension) {
    throw new InvalidInputError(
      `query vector has dimension ${vector.length}, index expects ${snap.dimension}`,
    );
  }

  const hits: SimilarityHit[] = [];
  for (const [nodeId, stored] of snap.vectors) {
    hits.push({ nodeId, similarity: cosineSimilarity(vector, stored) });
  }
  signal?.throwIfAborted();
  hits.sort(compareHits);
  return hits.slice(0, k);
}

export class InMemoryEmbeddingIndex implements EmbeddingIndex {
  private snapshot: IndexSnapshot;

  /**
   * @param dimension - Fixed vector dimension; inferred from the first
   *   vector when omitted
   */
  constructor(dimension?: number) {
    if (dimension !== undefined && (!Number.isInteger(dimension) || dimension <= 0)) {
      throw new InvalidInputError(`dimension must be a positive integer, got ${dimension}`);
    }
    this.snapshot = { version: 0, dimension: dimension ?? null, vectors: new Map() };
  }

  get dimension(): number | null {
    return this.snapshot.dimension;
  }

  async upsert(nodeId: string, vector: number[]): Promise<void> {
    const current = this.snapshot;
    this.checkVector(nodeId, vector, current.dimension);

    const existing = current.vectors.get(nodeId);
    if (existing && sameVector(existing, vector)) return;

    const vectors = new Map(current.vectors);
    vectors.set(nodeId, Object.freeze([...vector]));
    this.snapshot = {
      version: current.version + 1,
      dimension: current.dimension ?? vector.length,
      vectors,
    };
  }

  async query(vector: number[], k: number, signal?: AbortSignal): Promise<SimilarityHit[]> {
    return search(this.snapshot, vector, k, signal);
  }

  view(): EmbeddingIndexView {
    const snap = this.snapshot;
    return {
      query: async (vector, k, signal) => search(snap, vector, k, signal),
      version: () => snap.version,
    };
  }

  async replaceAll(records: EmbeddingRecord[]): Promise<void> {
    const dimension = records[0]?.vector.length ?? this.snapshot.dimension;
    const vectors = new Map<string, readonly number[]>();
    for (const record of records) {
      this.checkVector(record.nodeId, record.vector, dimension);
      if (vectors.has(record.nodeId)) {
        throw new InvalidInputError(`duplicate embedding for node ${record.nodeId}`);
      }
      vectors.set(record.nodeId, Object.freeze([...record.vector]));
    }
    this.snapshot = {
      version: this.snapshot.version + 1,
      dimension,
      vectors,
    };
    console.log(
      `[index] Snapshot v${this.snapshot.version} committed: ${vectors.size.toLocaleString()} vectors`,
    );
  }

  size(): number {
    return this.snapshot.vectors.size;
  }

  version(): number {
    return this.snapshot.version;
  }

  has(nodeId: string): boolean {
    return this.snapshot.vectors.has(nodeId);
  }

  private checkVector(nodeId: string, vector: number[], dimension: number | null): void {
    if (!nodeId) {
      throw new InvalidInputError("nodeId is required");
    }
    if (vector.length === 0 || !isFiniteVector(vector)) {
      throw new InvalidInputError(`vector for ${nodeId} must be a non-empty array of finite numbers`);
    }
    if (dimension !== null && vector.length !== dimension) {
      throw new InvalidInputError(
        `vector for ${nodeId} has dimension ${vector.length}, index expects ${dimension}`,
      );
    }
  }
}
