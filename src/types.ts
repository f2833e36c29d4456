export interface TermFrequencyMap {
    [term: string]: number;
}

/** A prior title plus whatever the caller wants back alongside it */
export interface CorpusEntry<M = TitleMetadata> {
    title: string;
    metadata?: M;
}

export type Corpus<M = TitleMetadata> = ReadonlyArray<CorpusEntry<M>>;

/** Display fields recognised in a source table */
export interface TitleMetadata {
    studentName?: string;
    program?: string;
    year?: string;
    supervisor?: string;
    /** Every cell of the source row, keyed by trimmed header */
    extra: Record<string, string>;
}

export type WeightVector = readonly number[];

export interface Vocabulary {
    /** Terms in index order */
    terms: string[];
    indexOf: Map<string, number>;
    size: number;
}

export interface WeightMatrix {
    vocabulary: Vocabulary;
    /** IDF per vocabulary index */
    idf: number[];
    /** One unit-length (or zero) vector per document, in input order */
    vectors: WeightVector[];
}

export interface RankedMatch {
    corpusIndex: number;
    score: number; // cosine similarity in [0, 1]
}

export interface RankedTitle<M = TitleMetadata> extends RankedMatch {
    title: string;
    metadata?: M;
}

export type RiskTier = "HIGH" | "MEDIUM" | "LOW";

export interface RiskThresholds {
    /** Scores strictly above this are HIGH */
    high: number;
    /** Scores strictly above this (and not HIGH) are MEDIUM */
    medium: number;
}

export interface SimilarityDebugInfo {
    vocabularySize: number;
    corpusSize: number;
    zeroVectorCount: number;
}

export interface SimilarityResult<M = TitleMetadata> {
    query: string;
    queryTokens: string[];
    ranked: RankedTitle<M>[];
    /** Absent exactly when the corpus is empty */
    bestScore?: number;
    tier?: RiskTier;
    debug?: SimilarityDebugInfo;
}
