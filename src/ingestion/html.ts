import * as cheerio from "cheerio";
import type { RawTable } from "./csv";
import { SourceLoadError } from "../errors";

/** Spreadsheet column letters ("A", "B", ... "AA") */
const COLUMN_LETTER = /^[A-Z]{1,3}$/;
const ROW_NUMBER = /^\d+$/;

function isColumnLetterRow(row: readonly string[]): boolean {
    const filled = row.filter(c => c !== "");
    return filled.length > 0 && filled.every(c => COLUMN_LETTER.test(c));
}

/**
 * Read the first <table> of a page, e.g. a published spreadsheet.
 *
 * Published sheets add a column-letter row on top and a row-number column on
 * the left; both are dropped. Rows without any text are skipped, and the first
 * remaining row is the header.
 */
export function parseHtmlTable(html: string, source: string = "html"): RawTable {
    const $ = cheerio.load(html);
    const table = $("table").first();
    if (table.length === 0) {
        throw new SourceLoadError(source, "no <table> found in page");
    }

    let rows: string[][] = [];
    table.find("tr").each((_, tr) => {
        const cells = $(tr)
            .children("td, th")
            .map((_i, cell) => $(cell).text().replace(/\s+/g, " ").trim())
            .get();
        if (cells.some(c => c.length > 0)) {
            rows.push(cells);
        }
    });

    while (rows[0] !== undefined && isColumnLetterRow(rows[0])) {
        rows = rows.slice(1);
    }

    if (rows.length > 0 && rows.every(r => ROW_NUMBER.test(r[0] ?? ""))) {
        rows = rows.map(r => r.slice(1));
    }

    const [headers = [], ...dataRows] = rows;
    return { headers, rows: dataRows };
}
