import type { Corpus, RankedTitle, RiskThresholds, SimilarityResult } from "./types";
import { tokenize, normalizeTitle, type TokenizeOptions } from "./preprocessing/tokenize";
import { buildWeightMatrix } from "./scoring/tfidf";
import { rankBySimilarity } from "./scoring/similarity";
import { classifyRisk, DEFAULT_RISK_THRESHOLDS, validateThresholds } from "./scoring/risk";
import { InvalidQueryError, InvalidTopKError } from "./errors";
import Logger from "./utils/logger";

export interface PipelineConfig {
    tokenizer?: TokenizeOptions;
    thresholds?: RiskThresholds;
    debug?: boolean;
}

const logger = Logger.getInstance();

/**
 * Normalize a query title and extract its terms.
 *
 * @throws InvalidQueryError when no terms remain
 */
export function prepareQuery(
    queryTitle: string,
    tokenizer: TokenizeOptions = {}
): { query: string; queryTokens: string[] } {
    const query = normalizeTitle(queryTitle);
    const queryTokens = logger.time("tokenize:query", () => tokenize(query, tokenizer));
    if (queryTokens.length === 0) {
        throw new InvalidQueryError(queryTitle);
    }
    return { query, queryTokens };
}

/**
 * Rank a candidate title against every corpus title.
 *
 * Each call builds its own vocabulary and IDF table from the corpus plus the
 * query, so adding or editing a corpus title shifts every score on the next
 * call. Nothing is cached between calls.
 *
 * @throws InvalidQueryError when the query has no terms after normalization
 * @throws InvalidTopKError when topK is not an integer >= 1
 */
export function rankSimilarity<M>(
    corpus: Corpus<M>,
    queryTitle: string,
    topK: number,
    config: PipelineConfig = {}
): SimilarityResult<M> {
    const { tokenizer = {}, debug = false } = config;
    const thresholds = validateThresholds(config.thresholds ?? DEFAULT_RISK_THRESHOLDS);

    if (!Number.isInteger(topK) || topK < 1) {
        throw new InvalidTopKError(topK);
    }

    const { query, queryTokens } = prepareQuery(queryTitle, tokenizer);

    if (corpus.length === 0) {
        logger.debug("rankSimilarity: empty corpus, nothing to compare");
        return { query, queryTokens, ranked: [] };
    }

    const corpusTokens = logger.time("tokenize:corpus", () =>
        corpus.map(entry => tokenize(entry.title, tokenizer))
    );

    // Query is fitted together with the corpus, last position
    const matrix = logger.time("weight", () => buildWeightMatrix([...corpusTokens, queryTokens]));
    const queryVector = matrix.vectors[matrix.vectors.length - 1] ?? [];
    const corpusVectors = matrix.vectors.slice(0, -1);

    const matches = logger.time("rank", () => rankBySimilarity(queryVector, corpusVectors, topK));

    const ranked: RankedTitle<M>[] = [];
    for (const match of matches) {
        const entry = corpus[match.corpusIndex];
        if (!entry) continue;
        ranked.push({
            ...match,
            title: entry.title,
            ...(entry.metadata !== undefined && { metadata: entry.metadata }),
        });
    }

    const bestScore = ranked[0]?.score ?? 0;
    const result: SimilarityResult<M> = {
        query,
        queryTokens,
        ranked,
        bestScore,
        tier: classifyRisk(bestScore, thresholds),
    };

    logger.debug(
        `rankSimilarity: ${corpus.length} titles, vocabulary ${matrix.vocabulary.size}, best ${bestScore.toFixed(4)}`
    );

    if (debug) {
        result.debug = {
            vocabularySize: matrix.vocabulary.size,
            corpusSize: corpus.length,
            zeroVectorCount: corpusVectors.filter(v => v.every(w => w === 0)).length,
        };
    }

    return result;
}
