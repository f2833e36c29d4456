import { describe, it, expect, vi } from "vitest";
import { checkTitleOverlap, titleInsights, type CorpusLoader } from "../tools";
import { createServer } from "../server";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { MissingTitleColumnError } from "../../errors";
import type { AppConfig } from "../../config";
import type { CorpusEntry, TitleMetadata } from "../../types";

const config: AppConfig = {
    topK: 3,
    thresholds: { high: 0.8, medium: 0.5 },
    fetchTimeoutMs: 1000,
    stemming: false,
};

const corpus: CorpusEntry<TitleMetadata>[] = [
    { title: "Machine Learning Applications in Healthcare", metadata: { program: "MSc", extra: {} } },
    { title: "AI and Blockchain in Supply Chain Management", metadata: { program: "MBA", extra: {} } },
];

const load: CorpusLoader = async () => ({ corpus });

describe("checkTitleOverlap", () => {
    it("returns the formatted ranking", async () => {
        const res = await checkTitleOverlap({ title: "Machine Learning in Healthcare Systems", topK: 1 }, config, load);

        expect(res.isError).toBe(false);
        expect(res.text.split("\n")[2]).toBe("1. Machine Learning Applications in Healthcare — 63.44% similarity");
        expect(res.text.split("\n")).toHaveLength(6);
    });

    it("passes the requested source to the loader", async () => {
        const spy = vi.fn<CorpusLoader>(async () => ({ corpus }));

        await checkTitleOverlap({ title: "Blockchain", source: "titles.csv" }, config, spy);

        expect(spy).toHaveBeenCalledWith("titles.csv");
    });

    it("prefixes loader warnings", async () => {
        const res = await checkTitleOverlap(
            { title: "Blockchain" },
            config,
            async () => ({ corpus, warning: "source unreachable" })
        );

        expect(res.text.startsWith("Warning: source unreachable\n\n")).toBe(true);
    });

    it("maps library errors to error results", async () => {
        const invalid = await checkTitleOverlap({ title: "the of" }, config, load);
        expect(invalid).toEqual({
            text: "INVALID_QUERY: Please enter a title with at least one meaningful word.",
            isError: true,
        });

        const missing = await checkTitleOverlap({ title: "Blockchain" }, config, async () => {
            throw new MissingTitleColumnError(["Name"], ["title"]);
        });
        expect(missing).toEqual({
            text: 'MISSING_TITLE_COLUMN: No title column found. Expected one of: "title"',
            isError: true,
        });
    });

    it("rejects an empty title without loading the source", async () => {
        const loader = vi.fn<CorpusLoader>(load);

        const res = await checkTitleOverlap({ title: "   ", source: "https://example.test/sheet.csv" }, config, loader);

        expect(res.isError).toBe(true);
        expect(loader).not.toHaveBeenCalled();
    });

    it("rethrows unexpected errors", async () => {
        await expect(
            checkTitleOverlap({ title: "Blockchain" }, config, async () => {
                throw new Error("boom");
            })
        ).rejects.toThrow("boom");
    });
});

describe("titleInsights", () => {
    it("formats insights for the loaded corpus", async () => {
        const res = await titleInsights({}, config, load);

        expect(res.isError).toBe(false);
        expect(res.text.split("\n").slice(0, 2)).toEqual(["Total projects: 2", "Total supervisors: 0"]);
    });
});

describe("createServer", () => {
    it("builds an MCP server without connecting", () => {
        expect(createServer(config)).toBeInstanceOf(McpServer);
    });
});
