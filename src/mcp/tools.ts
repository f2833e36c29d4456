/**
 * Tool handlers shared by the MCP server. Kept free of transport code so they
 * can be called directly.
 */

import type { AppConfig } from "../config";
import type { Corpus, TitleMetadata } from "../types";
import { loadCorpusOrDefault } from "../ingestion/source";
import { prepareQuery, rankSimilarity } from "../pipeline";
import { formatRanking } from "../output/report";
import { computeInsights, formatInsights } from "../insights/dashboard";
import { isTitleOverlapError } from "../errors";

export interface ToolResult {
    text: string;
    isError: boolean;
}

export interface CheckTitleArgs {
    title: string;
    topK?: number;
    source?: string;
}

export type CorpusLoader = (source: string | undefined) => Promise<{ corpus: Corpus<TitleMetadata>; warning?: string }>;

export function defaultLoader(config: AppConfig): CorpusLoader {
    return (source) => loadCorpusOrDefault(source ?? config.source, { timeoutMs: config.fetchTimeoutMs });
}

function toErrorResult(error: unknown): ToolResult {
    if (isTitleOverlapError(error)) {
        return { text: `${error.code}: ${error.message}`, isError: true };
    }
    throw error;
}

export async function checkTitleOverlap(
    args: CheckTitleArgs,
    config: AppConfig,
    load: CorpusLoader = defaultLoader(config)
): Promise<ToolResult> {
    try {
        const tokenizer = { applyStemming: config.stemming };
        prepareQuery(args.title, tokenizer);

        const { corpus, warning } = await load(args.source);
        const result = rankSimilarity(corpus, args.title, args.topK ?? config.topK, {
            tokenizer,
            thresholds: config.thresholds,
        });

        const text = formatRanking(result);
        return { text: warning ? `Warning: ${warning}\n\n${text}` : text, isError: false };
    } catch (error) {
        return toErrorResult(error);
    }
}

export async function titleInsights(
    args: { source?: string },
    config: AppConfig,
    load: CorpusLoader = defaultLoader(config)
): Promise<ToolResult> {
    try {
        const { corpus } = await load(args.source);
        return { text: formatInsights(computeInsights(corpus)), isError: false };
    } catch (error) {
        return toErrorResult(error);
    }
}
