import type { Corpus, TitleMetadata } from "../types";
import { MissingTitleColumnError } from "../errors";
import { cleanCell } from "../utils/shared";

export type CanonicalField = "title" | "studentName" | "program" | "year" | "supervisor";

/**
 * Accepted header spellings per canonical field, in priority order.
 * Lookup ignores case and treats spaces, hyphens and underscores alike.
 */
export const COLUMN_ALIASES: Readonly<Record<CanonicalField, readonly string[]>> = {
    title: ["Project Title", "title", "project_title", "project"],
    studentName: ["Student Name", "student", "student_name", "name"],
    program: ["Program", "programme", "degree"],
    year: ["Year", "academic_year"],
    supervisor: ["Supervisor", "supervisor_name", "advisor"],
};

/** Column index per canonical field; title is always present */
export type ColumnMap = { title: number } & Partial<Record<Exclude<CanonicalField, "title">, number>>;

export function headerKey(header: string): string {
    return header.trim().toLowerCase().replace(/[\s_-]+/g, "_");
}

/**
 * Resolve header cells to canonical fields.
 * The first alias (in priority order) that matches any header wins.
 */
export function resolveColumns(headers: readonly string[]): ColumnMap {
    const keys = headers.map(headerKey);

    const find = (field: CanonicalField): number | undefined => {
        for (const alias of COLUMN_ALIASES[field]) {
            const idx = keys.indexOf(headerKey(alias));
            if (idx >= 0) return idx;
        }
        return undefined;
    };

    const title = find("title");
    if (title === undefined) {
        throw new MissingTitleColumnError([...headers], COLUMN_ALIASES.title);
    }

    const map: ColumnMap = { title };
    for (const field of ["studentName", "program", "year", "supervisor"] as const) {
        const idx = find(field);
        if (idx !== undefined && idx !== title) {
            map[field] = idx;
        }
    }
    return map;
}

/**
 * Turn a header row plus data rows into a corpus.
 * Missing title cells become "", so row order is preserved for display.
 */
export function rowsToCorpus(
    headers: readonly string[],
    rows: ReadonlyArray<readonly string[]>
): Corpus<TitleMetadata> {
    const trimmedHeaders = headers.map(h => h.trim());
    const columns = resolveColumns(trimmedHeaders);

    return rows.map(row => {
        const extra: Record<string, string> = {};
        trimmedHeaders.forEach((header, i) => {
            if (header) extra[header] = (row[i] ?? "").trim();
        });

        const metadata: TitleMetadata = { extra };
        for (const field of ["studentName", "program", "year", "supervisor"] as const) {
            const idx = columns[field];
            const value = idx !== undefined ? cleanCell(row[idx]) : undefined;
            if (value !== undefined) metadata[field] = value;
        }

        return {
            title: (row[columns.title] ?? "").trim(),
            metadata,
        };
    });
}
