import { describe, it, expect } from "vitest";
import { classifyRisk, describeRisk, validateThresholds, DEFAULT_RISK_THRESHOLDS } from "../risk";
import { ConfigError } from "../../errors";

describe("classifyRisk", () => {
    it("uses 0.80 / 0.50 by default", () => {
        expect(DEFAULT_RISK_THRESHOLDS).toEqual({ high: 0.8, medium: 0.5 });
    });

    it("classifies above 0.80 as HIGH", () => {
        expect(classifyRisk(0.81)).toBe("HIGH");
        expect(classifyRisk(1)).toBe("HIGH");
    });

    it("classifies exactly 0.80 as MEDIUM", () => {
        expect(classifyRisk(0.8)).toBe("MEDIUM");
    });

    it("classifies just above 0.50 as MEDIUM", () => {
        expect(classifyRisk(0.5000001)).toBe("MEDIUM");
    });

    it("classifies exactly 0.50 and below as LOW", () => {
        expect(classifyRisk(0.5)).toBe("LOW");
        expect(classifyRisk(0)).toBe("LOW");
    });

    it("accepts custom thresholds", () => {
        const thresholds = { high: 0.9, medium: 0.3 };
        expect(classifyRisk(0.85, thresholds)).toBe("MEDIUM");
        expect(classifyRisk(0.95, thresholds)).toBe("HIGH");
        expect(classifyRisk(0.3, thresholds)).toBe("LOW");
    });
});

describe("validateThresholds", () => {
    it("accepts ordered thresholds", () => {
        expect(validateThresholds({ high: 0.7, medium: 0.2 })).toEqual({ high: 0.7, medium: 0.2 });
    });

    it("rejects medium >= high or values outside [0, 1]", () => {
        expect(() => validateThresholds({ high: 0.5, medium: 0.5 })).toThrow(ConfigError);
        expect(() => validateThresholds({ high: 1.2, medium: 0.5 })).toThrow(ConfigError);
        expect(() => validateThresholds({ high: 0.8, medium: -0.1 })).toThrow(ConfigError);
    });
});

describe("describeRisk", () => {
    it("returns the advisory for each tier", () => {
        expect(describeRisk("HIGH")).toBe("High overlap! Please consider modifying your topic (best match > 80%).");
        expect(describeRisk("LOW")).toBe("Low overlap (best match <= 50%). Your topic seems unique!");
    });
});
