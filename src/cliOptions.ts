import { TopKSchema, type AppConfig } from "./config";
import { ConfigError } from "./errors";

export interface CheckOptions {
    title: string;
    topK: number;
    source?: string;
    stemming: boolean;
    timing: boolean;
    debug: boolean;
}

function parseTopK(raw: string): number {
    const parsed = TopKSchema.safeParse(raw);
    if (!parsed.success) {
        throw new ConfigError(parsed.error.issues.map(issue => `--top: ${issue.message}`));
    }
    return parsed.data;
}

/**
 * Parse `check`/`insights` flags over config defaults
 *
 * @throws ConfigError when `--top` is not an integer in 1..MAX_TOP_K
 */
export function parseCheckOptions(args: readonly string[], config: AppConfig): CheckOptions {
    const options: CheckOptions = {
        title: "",
        topK: config.topK,
        stemming: config.stemming,
        timing: false,
        debug: false,
        ...(config.source !== undefined && { source: config.source }),
    };

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        const nextArg = args[i + 1];
        if ((arg === "--title" || arg === "-q") && nextArg !== undefined) {
            options.title = nextArg;
            i++;
        } else if (arg === "--top" && nextArg !== undefined) {
            options.topK = parseTopK(nextArg);
            i++;
        } else if (arg === "--source" && nextArg !== undefined) {
            options.source = nextArg;
            i++;
        } else if (arg === "--stem") {
            options.stemming = true;
        } else if (arg === "--timing" || arg === "-t") {
            options.timing = true;
        } else if (arg === "--debug") {
            options.debug = true;
        }
    }

    return options;
}
