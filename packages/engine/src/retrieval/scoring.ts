/**
 * Hybrid scoring: semantic similarity blended with graph proximity.
 *
 * combinedScore = α·semantic + (1 − α)·graph, every term in [0, 1].
 */

import { nodeKey, type RankedCandidate } from "@transit-vibes/types";
import { clamp01 } from "../embedding/similarity.js";

/** Graph proximity of a path: 1 for a free path, falling toward 0 with cost. */
export function graphScoreFromWeight(cumulativeWeight: number): number {
  if (!Number.isFinite(cumulativeWeight) || cumulativeWeight < 0) return 0;
  return 1 / (1 + cumulativeWeight);
}

/** Cosine similarity mapped onto [0, 1] by clamping (negatives → 0). */
export function semanticScoreFromSimilarity(similarity: number): number {
  return clamp01(similarity);
}

export function combineScores(semanticScore: number, graphScore: number, alpha: number): number {
  return clamp01(alpha * semanticScore + (1 - alpha) * graphScore);
}

/**
 * Ranking order: combinedScore desc, then semanticScore desc, then node
 * key ascending. Identical inputs always produce the same order.
 */
export function compareCandidates(a: RankedCandidate, b: RankedCandidate): number {
  if (b.combinedScore !== a.combinedScore) return b.combinedScore - a.combinedScore;
  if (b.semanticScore !== a.semanticScore) return b.semanticScore - a.semanticScore;
  const ka = nodeKey(a.node);
  const kb = nodeKey(b.node);
  return ka < kb ? -1 : ka > kb ? 1 : 0;
}
