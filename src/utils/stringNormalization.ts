/**
 * Normalize typographic quotes/apostrophes to ASCII equivalents.
 * Backticks and acute accents used as apostrophes become `'` as well.
 */
export function normalizeQuotes(str: string): string {
    return str
        .replace(/[\u2018\u2019\u201B\u02BC\u02BB\u0060\u00B4]/g, "'")
        .replace(/[\u201C\u201D\u201E\u201F]/g, '"');
}

/**
 * Remove zero-width/invisible characters and non-whitespace control characters.
 */
export function stripInvisible(str: string): string {
    return str
        .replace(/[\u200B-\u200D\u2060\uFEFF\u00AD]/g, "")
        .replace(/[\u0000-\u0008\u000E-\u001F\u007F]/g, "");
}

/**
 * Collapse whitespace runs (including tabs and newlines) to single spaces.
 */
export function collapseWhitespace(str: string): string {
    return str.replace(/\s+/g, " ").trim();
}
