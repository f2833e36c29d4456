import { stemmer } from "stemmer";
import stopWordList from "./stopwords.json";
import type { TermFrequencyMap } from "../types";

// English function words dropped before weighting
export const STOP_WORDS: ReadonlySet<string> = new Set(stopWordList);

/** Runs of letters, digits and underscore */
const WORD_PATTERN = /[\p{L}\p{N}_]+/gu;

export interface TokenizeOptions {
    removeStopWords?: boolean;
    applyStemming?: boolean;
    minLength?: number;
}

/**
 * Collapse whitespace for display, keeping the original casing
 */
export function normalizeTitle(text: string): string {
    return text.replace(/\s+/g, " ").trim();
}

/**
 * Tokenize a title into normalized terms.
 *
 * Lowercases, extracts word runs of at least `minLength` characters, then
 * drops stop words. Stemming is applied last and is off by default so that
 * "systems" and "system" stay distinct terms.
 */
export function tokenize(text: string, options: TokenizeOptions = {}): string[] {
    const {
        removeStopWords = true,
        applyStemming = false,
        minLength = 2,
    } = options;

    let tokens = (text.toLowerCase().match(WORD_PATTERN) ?? [])
        .filter(t => t.length >= minLength);

    if (removeStopWords) {
        tokens = tokens.filter(t => !STOP_WORDS.has(t));
    }

    if (applyStemming) {
        tokens = tokens.map(stemmer);
    }

    return tokens;
}

/**
 * Build a term frequency map from tokens
 */
export function buildTermFrequencyMap(tokens: readonly string[]): TermFrequencyMap {
    const tf: TermFrequencyMap = {};
    for (const token of tokens) {
        tf[token] = (tf[token] ?? 0) + 1;
    }
    return tf;
}
