/**
 * MCP server entry point
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";
import { MAX_TOP_K, type AppConfig } from "../config";
import { checkTitleOverlap, titleInsights } from "./tools";
import Logger from "../utils/logger";

const logger = Logger.getInstance();

export function createServer(config: AppConfig): McpServer {
    const server = new McpServer({
        name: "title_overlap",
        version: "0.1.0",
    });

    server.tool(
        "check_title_overlap",
        `Compare a proposed capstone or thesis title with past project titles.

Ranks past titles by lexical TF-IDF cosine similarity and reports the overlap risk of the best match:
- HIGH: best match above 80%
- MEDIUM: best match above 50%
- LOW: otherwise

RETURNS: Numbered list of similar titles with similarity percentages, student/program/year/supervisor, and the risk advisory.`,
        {
            title: z.string().describe("The proposed title to check"),
            topK: z.number().int().min(1).max(MAX_TOP_K).optional().describe("How many similar titles to return (default: 3)"),
            source: z.string().optional().describe("CSV or published-sheet URL, or a local file path. Defaults to the configured source."),
        },
        async ({ title, topK, source }) => {
            const result = await checkTitleOverlap(
                {
                    title,
                    ...(topK !== undefined && { topK }),
                    ...(source !== undefined && { source }),
                },
                config
            );

            return {
                content: [{ type: "text", text: result.text }],
                isError: result.isError,
            };
        }
    );

    server.tool(
        "title_insights",
        "Summarize the past-title table: total projects, supervisors, and projects per program, year and supervisor.",
        {
            source: z.string().optional().describe("CSV or published-sheet URL, or a local file path"),
        },
        async ({ source }) => {
            const result = await titleInsights({ ...(source !== undefined && { source }) }, config);
            return {
                content: [{ type: "text", text: result.text }],
                isError: result.isError,
            };
        }
    );

    return server;
}

export async function startServer(config: AppConfig): Promise<void> {
    // stdout carries protocol frames
    logger.setStderrOnly(true);

    const server = createServer(config);
    const transport = new StdioServerTransport();
    await server.connect(transport);
    logger.log("title-overlap MCP server listening on stdio");
}
