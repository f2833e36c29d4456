import type { RankedMatch, WeightVector } from "../types";
import { InvalidTopKError } from "../errors";
import { sortByScoreDesc } from "../utils/shared";

/**
 * Cosine similarity of two L2-normalized vectors (their dot product).
 * Zero or empty vectors score 0. Clamped to [0, 1] against rounding drift.
 */
export function cosineSimilarity(a: WeightVector, b: WeightVector): number {
    const n = Math.min(a.length, b.length);
    let dot = 0;
    for (let i = 0; i < n; i++) {
        dot += (a[i] ?? 0) * (b[i] ?? 0);
    }
    if (!Number.isFinite(dot) || dot <= 0) return 0;
    return Math.min(dot, 1);
}

/**
 * Score every corpus vector against the query and keep the best `k`.
 * Equal scores keep ascending corpus order.
 */
export function rankBySimilarity(
    queryVector: WeightVector,
    corpusVectors: readonly WeightVector[],
    k: number
): RankedMatch[] {
    if (!Number.isInteger(k) || k < 1) {
        throw new InvalidTopKError(k);
    }

    const scored = corpusVectors.map((vector, corpusIndex) => ({
        corpusIndex,
        score: cosineSimilarity(queryVector, vector),
    }));

    return sortByScoreDesc(scored).slice(0, k);
}
