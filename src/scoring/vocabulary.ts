import type { Vocabulary } from "../types";

/**
 * Build the shared vocabulary for one request.
 *
 * Every distinct term across all documents gets a dense index; indices follow
 * sorted term order so the same input always yields the same layout.
 */
export function buildVocabulary(tokenDocs: ReadonlyArray<readonly string[]>): Vocabulary {
    const unique = new Set<string>();
    for (const tokens of tokenDocs) {
        for (const token of tokens) {
            unique.add(token);
        }
    }

    const terms = [...unique].sort();
    const indexOf = new Map<string, number>();
    terms.forEach((term, i) => indexOf.set(term, i));

    return { terms, indexOf, size: terms.length };
}
