import { describe, it, expect } from "vitest";
import { parseHtmlTable } from "../html";
import { SourceLoadError } from "../../errors";

describe("parseHtmlTable", () => {
    it("reads a plain table", () => {
        const html = `
            <table>
                <tr><th>Project Title</th><th>Year</th></tr>
                <tr><td>Edge   AI</td><td>2024</td></tr>
            </table>`;

        expect(parseHtmlTable(html)).toEqual({
            headers: ["Project Title", "Year"],
            rows: [["Edge AI", "2024"]],
        });
    });

    it("drops the column-letter row, row numbers and spacer rows of a published sheet", () => {
        const html = `
            <html><body><div id="sheets-viewport"><table class="waffle">
                <thead><tr><th></th><th>A</th><th>B</th></tr></thead>
                <tbody>
                    <tr><th>1</th><td>Project Title</td><td>Supervisor</td></tr>
                    <tr><th></th><td></td><td></td></tr>
                    <tr><th>2</th><td>Cloud Robotics</td><td>Dr. Lee</td></tr>
                </tbody>
            </table></div></body></html>`;

        expect(parseHtmlTable(html)).toEqual({
            headers: ["Project Title", "Supervisor"],
            rows: [["Cloud Robotics", "Dr. Lee"]],
        });
    });

    it("uses only the first table", () => {
        const html = "<table><tr><td>title</td></tr><tr><td>One</td></tr></table><table><tr><td>Other</td></tr></table>";

        expect(parseHtmlTable(html).rows).toEqual([["One"]]);
    });

    it("fails when the page has no table", () => {
        expect(() => parseHtmlTable("<p>Sign in required</p>", "https://example.test/sheet")).toThrow(SourceLoadError);
    });
});
