/**
 * Parses a base-10 integer from an env var, using `fallback` when the value is empty.
 */
export function parseEnvInt(value: string | undefined, fallback: number): number {
    const source =
        typeof value === "string" && value.trim().length > 0
            ? value
            : String(fallback);
    return Number.parseInt(source, 10);
}

/**
 * Parses a decimal number (seconds, ratios) from an env var, using `fallback` when empty.
 */
export function parseEnvFloat(value: string | undefined, fallback: number): number {
    const source =
        typeof value === "string" && value.trim().length > 0
            ? value
            : String(fallback);
    return Number.parseFloat(source);
}
