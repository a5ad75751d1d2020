/**
 * Vector math shared by the index and the encoders.
 */

/** Cosine similarity in [-1, 1]; 0 for mismatched lengths or zero vectors. */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length || a.length === 0) return 0;
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / Math.sqrt(normA * normB);
}

/** Scale a vector to unit length (zero vectors are returned unchanged). */
export function l2Normalize(vector: readonly number[]): number[] {
  let sumSq = 0;
  for (const v of vector) sumSq += v * v;
  if (sumSq === 0) return [...vector];
  const norm = Math.sqrt(sumSq);
  return vector.map((v) => v / norm);
}

export function clamp01(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

export function isFiniteVector(vector: readonly unknown[]): vector is number[] {
  return vector.every((v) => typeof v === "number" && Number.isFinite(v));
}
