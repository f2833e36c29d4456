import type { RiskThresholds, RiskTier } from "../types";
import { ConfigError } from "../errors";

export const DEFAULT_RISK_THRESHOLDS: Readonly<RiskThresholds> = {
    high: 0.8,
    medium: 0.5,
};

const RISK_MESSAGES: Record<RiskTier, string> = {
    HIGH: "High overlap! Please consider modifying your topic (best match > 80%).",
    MEDIUM: "Medium overlap detected (best match between 50-80%). Review your title focus.",
    LOW: "Low overlap (best match <= 50%). Your topic seems unique!",
};

export function validateThresholds(thresholds: RiskThresholds): RiskThresholds {
    const { high, medium } = thresholds;
    if (!(medium >= 0 && medium < high && high <= 1)) {
        throw new ConfigError([`thresholds must satisfy 0 <= medium < high <= 1 (got medium=${medium}, high=${high})`]);
    }
    return thresholds;
}

/**
 * Map a best-match score to an overlap tier. Both bounds are strict:
 * exactly 0.80 is MEDIUM and exactly 0.50 is LOW with the defaults.
 */
export function classifyRisk(
    score: number,
    thresholds: RiskThresholds = DEFAULT_RISK_THRESHOLDS
): RiskTier {
    if (score > thresholds.high) return "HIGH";
    if (score > thresholds.medium) return "MEDIUM";
    return "LOW";
}

export function describeRisk(tier: RiskTier): string {
    return RISK_MESSAGES[tier];
}
