import type { Corpus, TitleMetadata } from "../types";
import { countBy } from "../utils/shared";

export interface InsightsConfig {
    topSupervisors?: number;
    barWidth?: number;
}

export interface CorpusInsights {
    totalProjects: number;
    distinctSupervisors: number;
    /** Most projects first, ties alphabetical */
    byProgram: Array<[string, number]>;
    /** Ascending by year; rows without a numeric year are left out */
    byYear: Array<[number, number]>;
    topSupervisors: Array<[string, number]>;
}

const DEFAULT_CONFIG: Required<InsightsConfig> = {
    topSupervisors: 10,
    barWidth: 30,
};

const DECIMAL = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;

/** Decimal years only; hex, binary and exponent forms are dropped */
function parseYear(value: string | undefined): number | undefined {
    const trimmed = value?.trim();
    return trimmed !== undefined && DECIMAL.test(trimmed) ? Number(trimmed) : undefined;
}

export function computeInsights(
    corpus: Corpus<TitleMetadata>,
    config: InsightsConfig = {}
): CorpusInsights {
    const { topSupervisors = DEFAULT_CONFIG.topSupervisors } = config;

    const supervisors: string[] = [];
    const programs: string[] = [];
    const years = new Map<number, number>();

    for (const entry of corpus) {
        const meta = entry.metadata;
        if (meta?.supervisor) supervisors.push(meta.supervisor);
        if (meta?.program) programs.push(meta.program);
        const year = parseYear(meta?.year);
        if (year !== undefined) years.set(year, (years.get(year) ?? 0) + 1);
    }

    const supervisorCounts = countBy(supervisors);

    return {
        totalProjects: corpus.length,
        distinctSupervisors: supervisorCounts.length,
        byProgram: countBy(programs),
        byYear: [...years.entries()].sort((a, b) => a[0] - b[0]),
        topSupervisors: supervisorCounts.slice(0, topSupervisors),
    };
}

function renderBars(rows: ReadonlyArray<readonly [string, number]>, barWidth: number): string[] {
    if (rows.length === 0) return ["  (no data)"];

    const max = Math.max(...rows.map(r => r[1]));
    const labelWidth = Math.max(...rows.map(r => r[0].length));

    return rows.map(([label, count]) => {
        const len = max > 0 ? Math.max(1, Math.round((count / max) * barWidth)) : 0;
        return `  ${label.padEnd(labelWidth)} ${"#".repeat(len)} ${count}`;
    });
}

/**
 * Render insights as a plain-text report with horizontal bar charts
 */
export function formatInsights(insights: CorpusInsights, config: InsightsConfig = {}): string {
    const { barWidth = DEFAULT_CONFIG.barWidth } = config;

    if (insights.totalProjects === 0) {
        return "No data found to display dashboard insights.";
    }

    const lines = [
        `Total projects: ${insights.totalProjects}`,
        `Total supervisors: ${insights.distinctSupervisors}`,
        "",
        "Projects per program",
        ...renderBars(insights.byProgram, barWidth),
        "",
        "Projects per year",
        ...renderBars(insights.byYear.map(([year, count]) => [String(year), count] as const), barWidth),
        "",
        "Top supervisors by project count",
        ...renderBars(insights.topSupervisors, barWidth),
    ];

    return lines.join("\n");
}
