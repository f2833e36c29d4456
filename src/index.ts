export * from "./types";
export * from "./errors";
export { rankSimilarity, prepareQuery, type PipelineConfig } from "./pipeline";
export { tokenize, normalizeTitle, buildTermFrequencyMap, STOP_WORDS, type TokenizeOptions } from "./preprocessing/tokenize";
export { buildVocabulary } from "./scoring/vocabulary";
export { buildWeightMatrix, calculateIdf, computeDocumentFrequencies, l2Normalize } from "./scoring/tfidf";
export { cosineSimilarity, rankBySimilarity } from "./scoring/similarity";
export { classifyRisk, describeRisk, validateThresholds, DEFAULT_RISK_THRESHOLDS } from "./scoring/risk";
export { COLUMN_ALIASES, resolveColumns, rowsToCorpus, type CanonicalField, type ColumnMap } from "./ingestion/columns";
export { parseCsvTable, type RawTable } from "./ingestion/csv";
export { parseHtmlTable } from "./ingestion/html";
export { loadCorpus, loadCorpusOrDefault, parseTable, type LoadedCorpus, type SourceOptions } from "./ingestion/source";
export { DEFAULT_TITLES, defaultCorpus } from "./ingestion/defaults";
export { computeInsights, formatInsights, type CorpusInsights } from "./insights/dashboard";
export { formatRanking } from "./output/report";
export { loadConfig, MAX_TOP_K, type AppConfig } from "./config";
