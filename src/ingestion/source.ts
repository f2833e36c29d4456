/**
 * Corpus loading from a published sheet URL or a local CSV/HTML file
 */

import { readFile } from "fs/promises";
import type { Corpus, TitleMetadata } from "../types";
import { parseCsvTable, type RawTable } from "./csv";
import { parseHtmlTable } from "./html";
import { rowsToCorpus } from "./columns";
import { defaultCorpus } from "./defaults";
import { SourceLoadError } from "../errors";
import Logger from "../utils/logger";

const logger = Logger.getInstance();

export interface SourceOptions {
    timeoutMs?: number;
    userAgent?: string;
}

export interface LoadedCorpus {
    corpus: Corpus<TitleMetadata>;
    origin: "source" | "default";
    warning?: string;
}

const DEFAULT_TIMEOUT_MS = 10000;
const DEFAULT_USER_AGENT = "title-overlap/0.1 (+csv)";

export function isUrl(source: string): boolean {
    return /^https?:\/\//i.test(source.trim());
}

function looksLikeHtml(body: string, contentType: string | null): boolean {
    if (contentType?.toLowerCase().includes("html")) return true;
    return body.trimStart().startsWith("<");
}

/**
 * Parse a fetched or read body into a raw table, choosing CSV or HTML
 */
export function parseTable(body: string, source: string, contentType: string | null = null): RawTable {
    return looksLikeHtml(body, contentType)
        ? parseHtmlTable(body, source)
        : parseCsvTable(body, source);
}

async function fetchText(
    url: string,
    options: SourceOptions
): Promise<{ body: string; contentType: string | null }> {
    const { timeoutMs = DEFAULT_TIMEOUT_MS, userAgent = DEFAULT_USER_AGENT } = options;

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
        const response = await fetch(url, {
            signal: controller.signal,
            headers: {
                "User-Agent": userAgent,
                "Accept": "text/csv,text/html;q=0.9,*/*;q=0.5",
            },
        });

        if (!response.ok) {
            throw new SourceLoadError(url, `HTTP ${response.status}: ${response.statusText}`);
        }

        return { body: await response.text(), contentType: response.headers.get("content-type") };
    } catch (error) {
        if (error instanceof SourceLoadError) throw error;
        if (error instanceof Error && error.name === "AbortError") {
            throw new SourceLoadError(url, `request timed out after ${timeoutMs}ms`, error);
        }
        throw new SourceLoadError(url, error instanceof Error ? error.message : String(error), error);
    } finally {
        clearTimeout(timeoutId);
    }
}

async function readLocal(path: string): Promise<string> {
    try {
        return await readFile(path, "utf8");
    } catch (error) {
        throw new SourceLoadError(path, error instanceof Error ? error.message : String(error), error);
    }
}

/**
 * Load a corpus from a URL or file path.
 *
 * @throws SourceLoadError when the source cannot be fetched, read or parsed,
 * or has no header row
 * @throws MissingTitleColumnError when no header matches a title alias
 */
export async function loadCorpus(source: string, options: SourceOptions = {}): Promise<Corpus<TitleMetadata>> {
    const location = source.trim();

    const { body, contentType } = isUrl(location)
        ? await logger.timeAsync("source:fetch", () => fetchText(location, options))
        : { body: await readLocal(location), contentType: /\.html?$/i.test(location) ? "text/html" : null };

    const table = logger.time("source:parse", () => parseTable(body, location, contentType));
    if (table.headers.every(h => h.trim() === "")) {
        throw new SourceLoadError(location, "empty table");
    }
    return rowsToCorpus(table.headers, table.rows);
}

/**
 * Load a corpus, falling back to the built-in titles when the source is
 * absent or unreachable. A table without a title column is still an error.
 */
export async function loadCorpusOrDefault(
    source: string | undefined,
    options: SourceOptions = {}
): Promise<LoadedCorpus> {
    if (source === undefined || source.trim() === "") {
        return { corpus: defaultCorpus(), origin: "default" };
    }

    try {
        const corpus = await loadCorpus(source, options);
        logger.log(`Loaded ${corpus.length} titles from ${source}`);
        return { corpus, origin: "source" };
    } catch (error) {
        if (!(error instanceof SourceLoadError)) throw error;
        const warning = `${error.message}. Using default dataset instead.`;
        logger.warn(warning);
        return { corpus: defaultCorpus(), origin: "default", warning };
    }
}
