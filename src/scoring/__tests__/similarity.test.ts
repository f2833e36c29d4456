import { describe, it, expect } from "vitest";
import { cosineSimilarity, rankBySimilarity } from "../similarity";
import { InvalidTopKError } from "../../errors";

describe("cosineSimilarity", () => {
    it("is 1 for identical unit vectors", () => {
        expect(cosineSimilarity([0.6, 0.8], [0.6, 0.8])).toBeCloseTo(1, 12);
    });

    it("is 0 for orthogonal vectors", () => {
        expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
    });

    it("is 0 when either vector is zero or empty", () => {
        expect(cosineSimilarity([0, 0], [1, 0])).toBe(0);
        expect(cosineSimilarity([], [])).toBe(0);
    });

    it("never exceeds 1", () => {
        expect(cosineSimilarity([1.0000001, 0], [1, 0])).toBe(1);
    });
});

describe("rankBySimilarity", () => {
    const query = [1, 0];
    const corpus = [[0, 1], [1, 0], [1, 0], [0.6, 0.8]];

    it("orders by descending score with ties in corpus order", () => {
        expect(rankBySimilarity(query, corpus, 4)).toEqual([
            { corpusIndex: 1, score: 1 },
            { corpusIndex: 2, score: 1 },
            { corpusIndex: 3, score: 0.6 },
            { corpusIndex: 0, score: 0 },
        ]);
    });

    it("truncates to k", () => {
        expect(rankBySimilarity(query, corpus, 2).map(m => m.corpusIndex)).toEqual([1, 2]);
    });

    it("never pads beyond the corpus size", () => {
        expect(rankBySimilarity(query, corpus, 10)).toHaveLength(4);
    });

    it("returns nothing for an empty corpus", () => {
        expect(rankBySimilarity(query, [], 3)).toEqual([]);
    });

    it("rejects k below 1 or non-integer k", () => {
        expect(() => rankBySimilarity(query, corpus, 0)).toThrow(InvalidTopKError);
        expect(() => rankBySimilarity(query, corpus, 1.5)).toThrow(InvalidTopKError);
    });

    it("does not mutate its inputs", () => {
        const vectors = corpus.map(v => [...v]);
        rankBySimilarity(query, vectors, 2);
        expect(vectors).toEqual(corpus);
    });
});
