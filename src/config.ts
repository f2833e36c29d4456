import { z } from "zod";
import { ConfigError } from "./errors";
import type { RiskThresholds } from "./types";

const booleanFlag = z
    .enum(["true", "false", "1", "0"])
    .transform(v => v === "true" || v === "1");

export const MAX_TOP_K = 10;

/** Result count accepted from the environment and the CLI */
export const TopKSchema = z.coerce.number().int().min(1).max(MAX_TOP_K);

const EnvSchema = z
    .object({
        TITLE_OVERLAP_SOURCE: z.string().trim().min(1).optional(),
        TITLE_OVERLAP_TOP_K: TopKSchema.default(3),
        TITLE_OVERLAP_HIGH_THRESHOLD: z.coerce.number().min(0).max(1).default(0.8),
        TITLE_OVERLAP_MEDIUM_THRESHOLD: z.coerce.number().min(0).max(1).default(0.5),
        TITLE_OVERLAP_FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
        TITLE_OVERLAP_STEMMING: booleanFlag.default("false"),
    })
    .refine(env => env.TITLE_OVERLAP_MEDIUM_THRESHOLD < env.TITLE_OVERLAP_HIGH_THRESHOLD, {
        message: "TITLE_OVERLAP_MEDIUM_THRESHOLD must be below TITLE_OVERLAP_HIGH_THRESHOLD",
        path: ["TITLE_OVERLAP_MEDIUM_THRESHOLD"],
    });

export interface AppConfig {
    source?: string;
    topK: number;
    thresholds: RiskThresholds;
    fetchTimeoutMs: number;
    stemming: boolean;
}

/**
 * Read configuration from environment variables.
 * Empty variables count as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const present = Object.fromEntries(
        Object.entries(env).filter(([key, value]) => key.startsWith("TITLE_OVERLAP_") && value !== "")
    );

    const parsed = EnvSchema.safeParse(present);
    if (!parsed.success) {
        throw new ConfigError(
            parsed.error.issues.map(issue => `${issue.path.join(".") || "env"}: ${issue.message}`)
        );
    }

    const e = parsed.data;
    return {
        ...(e.TITLE_OVERLAP_SOURCE !== undefined && { source: e.TITLE_OVERLAP_SOURCE }),
        topK: e.TITLE_OVERLAP_TOP_K,
        thresholds: {
            high: e.TITLE_OVERLAP_HIGH_THRESHOLD,
            medium: e.TITLE_OVERLAP_MEDIUM_THRESHOLD,
        },
        fetchTimeoutMs: e.TITLE_OVERLAP_FETCH_TIMEOUT_MS,
        stemming: e.TITLE_OVERLAP_STEMMING,
    };
}
