#!/usr/bin/env node

import { loadConfig, type AppConfig } from "./config";
import { parseCheckOptions } from "./cliOptions";
import { loadCorpusOrDefault } from "./ingestion/source";
import { prepareQuery, rankSimilarity } from "./pipeline";
import { formatRanking } from "./output/report";
import { computeInsights, formatInsights } from "./insights/dashboard";
import { isTitleOverlapError } from "./errors";
import Logger from "./utils/logger";

const logger = Logger.getInstance();

const HELP_TEXT = `
title-overlap - Check a capstone title against past project titles

Ranks prior titles by TF-IDF cosine similarity to your title and flags the
overlap risk of the closest match (HIGH > 80%, MEDIUM > 50%, otherwise LOW).

COMMANDS:
  check --title "<title>" [options]   Rank similar titles
    --top <n>          Number of matches to show, 1-10 (default: 3)
    --source <s>       CSV/HTML URL or file path (default: built-in titles)
    --stem             Stem terms before matching
    --timing, -t       Show per-stage timing
    --debug            Show debug information

  insights [--source <s>]             Projects per program, year and supervisor
  mcp                                 Start the MCP server (stdio)
  help, --help                        Show this help message

ENVIRONMENT:
  TITLE_OVERLAP_SOURCE, TITLE_OVERLAP_TOP_K, TITLE_OVERLAP_HIGH_THRESHOLD,
  TITLE_OVERLAP_MEDIUM_THRESHOLD, TITLE_OVERLAP_FETCH_TIMEOUT_MS,
  TITLE_OVERLAP_STEMMING

EXAMPLES:
  title-overlap check --title "Machine Learning in Healthcare Systems"
  title-overlap check --title "IoT for Smart Cities" --top 5 --source titles.csv
  title-overlap insights --source "https://example.com/sheet.csv"
`;

async function runCheck(args: string[], config: AppConfig): Promise<number> {
    const options = parseCheckOptions(args, config);
    logger.setDebugEnabled(options.debug);
    if (options.timing) {
        logger.setTimingEnabled(true);
    }

    // Reject an empty title before a possibly slow source fetch
    prepareQuery(options.title, { applyStemming: options.stemming });

    const { corpus } = await loadCorpusOrDefault(options.source, { timeoutMs: config.fetchTimeoutMs });
    logger.log(`Comparing against ${corpus.length} past titles`);

    const result = rankSimilarity(corpus, options.title, options.topK, {
        tokenizer: { applyStemming: options.stemming },
        thresholds: config.thresholds,
        debug: options.debug,
    });

    if (options.timing) {
        logger.printTimings();
    }
    if (result.debug) {
        logger.debug(`Vocabulary size: ${result.debug.vocabularySize}`);
        logger.debug(`Titles without terms: ${result.debug.zeroVectorCount}`);
        logger.debug(`Query tokens: ${JSON.stringify(result.queryTokens)}`);
    }

    console.log("\n" + formatRanking(result));
    return 0;
}

async function runInsights(args: string[], config: AppConfig): Promise<number> {
    const options = parseCheckOptions(args, config);
    const { corpus } = await loadCorpusOrDefault(options.source, { timeoutMs: config.fetchTimeoutMs });
    console.log("\n" + formatInsights(computeInsights(corpus)));
    return 0;
}

async function main(): Promise<number> {
    const args = process.argv.slice(2).filter((a) => a !== "--");
    const command = args[0];
    const config = loadConfig();

    switch (command) {
        case "check":
            return runCheck(args.slice(1), config);

        case "insights":
            return runInsights(args.slice(1), config);

        case "mcp": {
            const { startServer } = await import("./mcp/server");
            await startServer(config);
            return 0;
        }

        case "--help":
        case "-h":
        case "help":
        case undefined:
            console.log(HELP_TEXT);
            return 0;

        default:
            console.log(`Unknown command: ${command}`);
            console.log("Run 'title-overlap --help' for usage.\n");
            return 1;
    }
}

main()
    .then((code) => {
        if (code !== 0) process.exit(code);
    })
    .catch((err: unknown) => {
        if (isTitleOverlapError(err)) {
            logger.error(err.message);
        } else {
            logger.error(`Unexpected error: ${err}`);
        }
        process.exit(1);
    });
