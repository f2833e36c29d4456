import { describe, it, expect } from "vitest";
import { parseCsvTable } from "../csv";
import { SourceLoadError } from "../../errors";

describe("parseCsvTable", () => {
    it("splits header and rows, honoring quotes and skipping blank lines", () => {
        const text = 'Project Title,Student Name\n"AI, Ethics and Law",Bo\n\nCloud Security,Cy\n';

        expect(parseCsvTable(text)).toEqual({
            headers: ["Project Title", "Student Name"],
            rows: [
                ["AI, Ethics and Law", "Bo"],
                ["Cloud Security", "Cy"],
            ],
        });
    });

    it("strips a byte order mark", () => {
        expect(parseCsvTable("\uFEFFtitle\nEdge AI").headers).toEqual(["title"]);
    });

    it("returns an empty table for empty input", () => {
        expect(parseCsvTable("")).toEqual({ headers: [], rows: [] });
    });

    it("rejects unterminated quotes", () => {
        expect(() => parseCsvTable('title\n"never closed', "titles.csv")).toThrow(SourceLoadError);
    });
});
