import { createLogger } from "../../utils/logger";

const logger = createLogger("ImportStatus");

/**
 * Per-row outcome persisted in the `status` column of the import CSV.
 */
export type ImportStatus =
    | "success"
    | "already_monitored"
    | "artist_added"
    | "pending_refresh"
    | "pending_import"
    | "skip_no_musicbrainz"
    | "skip_no_artist_match"
    | "skip_album_mb_noresults"
    | "skip_api_error"
    // Permanent skips found in older progress files; never assigned now
    | "skip_artist_exists"
    | "skip"
    | "error_connection"
    | "error_timeout"
    | "error_invalid_data"
    | "error_unknown"
    | "dry_run";

export type StatusClass = "success" | "pending" | "skip" | "error" | "dry_run";

export const IMPORT_STATUSES: readonly ImportStatus[] = [
    "success",
    "already_monitored",
    "artist_added",
    "pending_refresh",
    "pending_import",
    "skip_no_musicbrainz",
    "skip_no_artist_match",
    "skip_album_mb_noresults",
    "skip_api_error",
    "skip_artist_exists",
    "skip",
    "error_connection",
    "error_timeout",
    "error_invalid_data",
    "error_unknown",
    "dry_run",
];

const STATUS_LOOKUP: ReadonlySet<string> = new Set(IMPORT_STATUSES);

export function isImportStatus(value: string): value is ImportStatus {
    return STATUS_LOOKUP.has(value);
}

export function statusClass(status: ImportStatus): StatusClass {
    switch (status) {
        case "success":
        case "already_monitored":
        case "artist_added":
            return "success";
        case "pending_refresh":
        case "pending_import":
            return "pending";
        case "skip_no_musicbrainz":
        case "skip_no_artist_match":
        case "skip_album_mb_noresults":
        case "skip_api_error":
        case "skip_artist_exists":
        case "skip":
            return "skip";
        case "error_connection":
        case "error_timeout":
        case "error_invalid_data":
        case "error_unknown":
            return "error";
        case "dry_run":
            return "dry_run";
    }
}

/** Rows in a terminal status are not reprocessed unless asked to. */
export function isTerminal(status: ImportStatus): boolean {
    const cls = statusClass(status);
    return cls === "success" || cls === "skip";
}

export function isRetryable(status: ImportStatus): boolean {
    const cls = statusClass(status);
    return cls === "error" || cls === "pending";
}

/**
 * Reads a status cell. Blank cells and values this version does not know
 * yield null (unknown values are logged).
 */
export function parseImportStatus(raw: string | undefined): ImportStatus | null {
    const value = raw?.trim().toLowerCase() ?? "";
    if (!value) {
        return null;
    }
    if (isImportStatus(value)) {
        return value;
    }
    logger.warn(`Unknown status "${raw}" treated as blank`);
    return null;
}

const BLANK_TOKENS = new Set(["new", "blank", "none", "empty"]);
const RETRYABLE_TOKENS = new Set(["failed", "fail", "failure", "retry"]);
const CLASS_TOKENS: ReadonlySet<string> = new Set<StatusClass>(["success", "skip", "error"]);

export type StatusPredicate = (status: ImportStatus | null) => boolean;

function tokenPredicate(token: string): StatusPredicate {
    if (BLANK_TOKENS.has(token)) {
        return (status) => status === null;
    }
    if (RETRYABLE_TOKENS.has(token)) {
        return (status) => status !== null && isRetryable(status);
    }
    if (CLASS_TOKENS.has(token)) {
        return (status) => status !== null && statusClass(status) === token;
    }
    return (status) => status === token;
}

/**
 * Compiles a comma-separated, case-insensitive status filter
 * ("failed,new", "pending_refresh", "skip") into a predicate that matches
 * when any token matches. Returns null for an empty filter.
 */
export function compileStatusFilter(filter: string | undefined): StatusPredicate | null {
    const tokens = (filter ?? "")
        .split(",")
        .map((token) => token.trim().toLowerCase())
        .filter((token) => token.length > 0);

    if (tokens.length === 0) {
        return null;
    }

    const predicates = tokens.map(tokenPredicate);
    return (status) => predicates.some((matches) => matches(status));
}
