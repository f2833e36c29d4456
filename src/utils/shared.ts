/**
 * Shared utility functions used across the codebase
 */

// =============================================================================
// Sorting utilities
// =============================================================================

/**
 * Interface for items that can be sorted by score with deterministic tie-breaking
 */
export interface Scoreable {
    score: number;
    corpusIndex: number;
}

/**
 * Sort items by score descending with deterministic tie-break by corpusIndex ascending
 * Returns a new sorted array (does not mutate input)
 */
export function sortByScoreDesc<T extends Scoreable>(items: readonly T[]): T[] {
    return [...items].sort((a, b) => {
        const scoreDiff = b.score - a.score;
        if (scoreDiff !== 0) return scoreDiff;
        return a.corpusIndex - b.corpusIndex;
    });
}

/**
 * Count occurrences of each key, most frequent first, ties by key ascending
 */
export function countBy(values: Iterable<string>): Array<[string, number]> {
    const counts = new Map<string, number>();
    for (const value of values) {
        counts.set(value, (counts.get(value) ?? 0) + 1);
    }
    return [...counts.entries()].sort((a, b) => b[1] - a[1] || (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0));
}

// =============================================================================
// String utilities
// =============================================================================

/**
 * Truncate text to maxLen characters, adding ellipsis if truncated
 */
export function truncateText(text: string, maxLen: number = 100): string {
    if (text.length <= maxLen) return text;
    return text.slice(0, maxLen) + "...";
}

/**
 * Format a [0, 1] score as a percentage with two decimals, e.g. 0.6344 -> "63.44%"
 */
export function formatPercent(score: number): string {
    return `${(score * 100).toFixed(2)}%`;
}

/**
 * Trim a cell value; empty strings become undefined
 */
export function cleanCell(value: string | undefined): string | undefined {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
}
