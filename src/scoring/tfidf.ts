import type { Vocabulary, WeightMatrix } from "../types";
import { buildVocabulary } from "./vocabulary";

/**
 * Count, per vocabulary index, how many documents contain the term
 */
export function computeDocumentFrequencies(
    tokenDocs: ReadonlyArray<readonly string[]>,
    vocabulary: Vocabulary
): number[] {
    const df = new Array<number>(vocabulary.size).fill(0);

    for (const tokens of tokenDocs) {
        for (const term of new Set(tokens)) {
            const idx = vocabulary.indexOf.get(term);
            if (idx !== undefined) {
                df[idx] = (df[idx] ?? 0) + 1;
            }
        }
    }

    return df;
}

/**
 * Smoothed IDF: ln((1 + N) / (1 + df)) + 1
 * Acts as if one extra document contained every term, so df = N stays positive.
 */
export function calculateIdf(df: number, totalDocs: number): number {
    return Math.log((1 + totalDocs) / (1 + df)) + 1;
}

/**
 * Scale a vector to unit Euclidean length. Zero vectors are returned as-is.
 */
export function l2Normalize(vector: readonly number[]): number[] {
    let sumSq = 0;
    for (const v of vector) sumSq += v * v;
    if (sumSq === 0) return [...vector];

    const norm = Math.sqrt(sumSq);
    return vector.map(v => v / norm);
}

/**
 * Fit TF-IDF over every document passed in and return one weight vector each.
 *
 * The caller passes corpus and query together; IDF statistics come from that
 * combined set, not from the corpus alone.
 */
export function buildWeightMatrix(tokenDocs: ReadonlyArray<readonly string[]>): WeightMatrix {
    const vocabulary = buildVocabulary(tokenDocs);
    const df = computeDocumentFrequencies(tokenDocs, vocabulary);
    const idf = df.map(d => calculateIdf(d, tokenDocs.length));

    const vectors = tokenDocs.map(tokens => {
        const raw = new Array<number>(vocabulary.size).fill(0);
        for (const term of tokens) {
            const idx = vocabulary.indexOf.get(term);
            if (idx !== undefined) {
                raw[idx] = (raw[idx] ?? 0) + 1;
            }
        }
        return l2Normalize(raw.map((count, i) => count * (idf[i] ?? 0)));
    });

    return { vocabulary, idf, vectors };
}
