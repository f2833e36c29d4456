/**
 * Error types raised by the library. Each carries a stable `code` so the CLI
 * and MCP layers can map failures without matching on messages.
 */

export type ErrorCode =
    | "INVALID_QUERY"
    | "INVALID_TOP_K"
    | "MISSING_TITLE_COLUMN"
    | "SOURCE_LOAD_FAILED"
    | "INVALID_CONFIG";

export class TitleOverlapError extends Error {
    readonly code: ErrorCode;

    constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
        this.code = code;
    }
}

/** Query has no terms left after normalization */
export class InvalidQueryError extends TitleOverlapError {
    constructor(readonly query: string) {
        super("INVALID_QUERY", "Please enter a title with at least one meaningful word.");
    }
}

export class InvalidTopKError extends TitleOverlapError {
    constructor(readonly topK: number) {
        super("INVALID_TOP_K", `topK must be an integer >= 1 (got ${topK})`);
    }
}

export class MissingTitleColumnError extends TitleOverlapError {
    constructor(readonly headers: string[], accepted: readonly string[]) {
        super(
            "MISSING_TITLE_COLUMN",
            `No title column found. Expected one of: ${accepted.map(a => `"${a}"`).join(", ")}`
        );
    }
}

export class SourceLoadError extends TitleOverlapError {
    constructor(readonly source: string, message: string, cause?: unknown) {
        super("SOURCE_LOAD_FAILED", `Could not load ${source}: ${message}`, { cause });
    }
}

export class ConfigError extends TitleOverlapError {
    constructor(readonly issues: string[]) {
        super("INVALID_CONFIG", `Invalid configuration: ${issues.join("; ")}`);
    }
}

export function isTitleOverlapError(error: unknown): error is TitleOverlapError {
    return error instanceof TitleOverlapError;
}
