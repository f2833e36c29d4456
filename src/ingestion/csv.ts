import Papa from "papaparse";
import { SourceLoadError } from "../errors";

export interface RawTable {
    headers: string[];
    rows: string[][];
}

/**
 * Parse CSV text into a header row and data rows.
 * Blank lines are skipped; quoted fields may contain commas and newlines.
 */
export function parseCsvTable(text: string, source: string = "csv"): RawTable {
    const parsed = Papa.parse<string[]>(text.replace(/^\uFEFF/, ""), {
        skipEmptyLines: "greedy",
    });

    const fatal = parsed.errors.find(e => e.type === "Quotes");
    if (fatal) {
        throw new SourceLoadError(source, `malformed CSV at row ${fatal.row ?? "?"}: ${fatal.message}`);
    }

    const [headers = [], ...rows] = parsed.data;
    return { headers, rows };
}
