/**
 * Deterministic feature-hashing encoder.
 *
 * Words, adjacent word pairs and character trigrams are hashed into a
 * fixed number of signed buckets, then the vector is L2-normalised. The
 * same text always yields the same vector, and nothing is fetched.
 */

import { InvalidInputError } from "../errors/index.js";
import { l2Normalize } from "../embedding/similarity.js";
import type { QueryEncoder } from "./query-encoder.js";
import { charTrigrams, tokenize } from "./tokenize.js";

export const DEFAULT_HASHING_DIMENSION = 256;

/** Feature weights */
const WORD_WEIGHT = 1.0;
const BIGRAM_WEIGHT = 0.5;
const TRIGRAM_WEIGHT = 0.25;

export interface HashingEncoderOptions {
  dimension?: number;
  /** Hash seed; vectors from different seeds are not comparable */
  seed?: number;
}

/** 32-bit FNV-1a */
export function fnv1a(value: string, seed: number): number {
  let hash = (0x811c9dc5 ^ seed) >>> 0;
  for (let i = 0; i < value.length; i++) {
    hash ^= value.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash;
}

export class HashingQueryEncoder implements QueryEncoder {
  readonly dimension: number;
  private readonly seed: number;

  constructor(options: HashingEncoderOptions = {}) {
    const dimension = options.dimension ?? DEFAULT_HASHING_DIMENSION;
    if (!Number.isInteger(dimension) || dimension <= 0) {
      throw new InvalidInputError(`dimension must be a positive integer, got ${dimension}`);
    }
    this.dimension = dimension;
    this.seed = options.seed ?? 17;
  }

  async encode(text: string): Promise<number[]> {
    return this.encodeSync(text);
  }

  encodeSync(text: string): number[] {
    if (typeof text !== "string" || text.trim().length === 0) {
      throw new InvalidInputError("query text must be a non-empty string");
    }

    const vector = new Array<number>(this.dimension).fill(0);
    const tokens = tokenize(text);

    for (let i = 0; i < tokens.length; i++) {
      const token = tokens[i] ?? "";
      this.add(vector, `w:${token}`, WORD_WEIGHT);
      const next = tokens[i + 1];
      if (next !== undefined) this.add(vector, `b:${token}_${next}`, BIGRAM_WEIGHT);
      for (const gram of charTrigrams(token)) {
        this.add(vector, `c:${gram}`, TRIGRAM_WEIGHT);
      }
    }

    return l2Normalize(vector);
  }

  private add(vector: number[], feature: string, weight: number): void {
    const hash = fnv1a(feature, this.seed);
    const bucket = hash % this.dimension;
    // Top bit picks the sign so collisions tend to cancel rather than pile up
    const sign = hash & 0x80000000 ? -1 : 1;
    vector[bucket] = (vector[bucket] ?? 0) + sign * weight;
  }
}
