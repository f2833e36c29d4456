import type { SimilarityResult, TitleMetadata } from "../types";
import { describeRisk } from "../scoring/risk";
import { formatPercent, truncateText } from "../utils/shared";

export interface ReportConfig {
    maxTitleChars?: number;
}

const DEFAULT_CONFIG: Required<ReportConfig> = {
    maxTitleChars: 120,
};

const NA = "N/A";

function formatMetadata(meta: TitleMetadata | undefined): string {
    return [
        `Student: ${meta?.studentName ?? NA}`,
        `Program: ${meta?.program ?? NA}`,
        `Year: ${meta?.year ?? NA}`,
        `Supervisor: ${meta?.supervisor ?? NA}`,
    ].join(" | ");
}

/**
 * Format a ranking for terminal or tool output.
 * An empty ranking has no best match, so no advisory line is printed.
 */
export function formatRanking(
    result: SimilarityResult<TitleMetadata>,
    config: ReportConfig = {}
): string {
    const { maxTitleChars = DEFAULT_CONFIG.maxTitleChars } = config;

    if (result.ranked.length === 0) {
        return "No titles available to compare.";
    }

    const lines: string[] = [`Top similar titles for "${result.query}"`, ""];

    result.ranked.forEach((match, i) => {
        const title = match.title === "" ? NA : truncateText(match.title, maxTitleChars);
        lines.push(`${i + 1}. ${title} — ${formatPercent(match.score)} similarity`);
        lines.push(`   ${formatMetadata(match.metadata)}`);
    });

    if (result.tier !== undefined) {
        lines.push("");
        lines.push(`[${result.tier}] ${describeRisk(result.tier)}`);
    }

    return lines.join("\n");
}
