import { guessDelimiter, normalizeHeader, splitCsvLine } from "./csvRows";
import { FormatKind } from "./types";

/**
 * Input format detection. Only the first DETECTION_SAMPLE_LINES lines are
 * inspected; the rules run in a fixed order and the first match wins.
 */

export const DETECTION_SAMPLE_LINES = 25;

export const ARTIST_COLUMN_NAMES: ReadonlySet<string> = new Set([
    "artist",
    "artists",
    "artist name",
    "artist name(s)",
    "album artist",
    "album artist name",
    "album artist name(s)",
    "band",
    "performer",
]);

export const ALBUM_COLUMN_NAMES: ReadonlySet<string> = new Set([
    "album",
    "album name",
    "album title",
    "title",
    "release",
    "release title",
    "record",
]);

const OTHER_COLUMN_NAMES = [
    "track",
    "track name",
    "song",
    "song name",
    "year",
    "status",
    "row id",
    "album search",
    "mb artist id",
    "mb release id",
    "spotify id",
];

const KNOWN_COLUMN_NAMES: ReadonlySet<string> = new Set([
    ...ARTIST_COLUMN_NAMES,
    ...ALBUM_COLUMN_NAMES,
    ...OTHER_COLUMN_NAMES,
]);

export type ColumnOrder = "artist_album" | "album_artist";

export interface TokenPair {
    left: string;
    right: string;
}

/** Splits on the first " - "; both sides must be non-empty and tab-free. */
export function splitDash(line: string): TokenPair | null {
    const index = line.indexOf(" - ");
    if (index < 0) {
        return null;
    }
    return pairOf(line.slice(0, index), line.slice(index + 3));
}

/** Splits "Album by Artist" on the last " by " (any case). */
export function splitBy(line: string): TokenPair | null {
    const index = line.toLowerCase().lastIndexOf(" by ");
    if (index < 0) {
        return null;
    }
    return pairOf(line.slice(0, index), line.slice(index + 4));
}

/** Splits on the first tab. */
export function splitTab(line: string): TokenPair | null {
    const index = line.indexOf("\t");
    if (index < 0) {
        return null;
    }
    return pairOf(line.slice(0, index), line.slice(index + 1).split("\t")[0] ?? "");
}

function pairOf(left: string, right: string): TokenPair | null {
    const l = left.trim();
    const r = right.trim();
    if (!l || !r || l.includes("\t") || r.includes("\t")) {
        return null;
    }
    return { left: l, right: r };
}

export function sampleLines(text: string, limit = DETECTION_SAMPLE_LINES): string[] {
    const lines: string[] = [];
    for (const raw of text.replace(/^\uFEFF/, "").split(/\r?\n/)) {
        if (raw.trim().length === 0) {
            continue;
        }
        lines.push(raw);
        if (lines.length >= limit) {
            break;
        }
    }
    return lines;
}

function headerCells(line: string): string[] {
    return splitCsvLine(line, guessDelimiter(line)).map(normalizeHeader);
}

export function isSpotifyHeader(line: string): boolean {
    const cells = headerCells(line);
    return (
        cells.some((cell) => cell.includes("track name")) &&
        cells.some((cell) => cell.includes("artist name"))
    );
}

export function isArtistAlbumHeader(line: string): boolean {
    const cells = headerCells(line);
    return (
        cells.some((cell) => ARTIST_COLUMN_NAMES.has(cell)) &&
        cells.some((cell) => ALBUM_COLUMN_NAMES.has(cell))
    );
}

function looksLikeName(value: string): boolean {
    return /[\p{L}\p{N}]/u.test(value);
}

function isHeaderlessCsvLine(line: string): boolean {
    if (line.includes("\t") || line.includes(" - ")) {
        return false;
    }
    const fields = splitCsvLine(line).map((field) => field.trim());
    if (fields.length < 2) {
        return false;
    }
    const [first, second] = fields;
    return (
        first !== undefined &&
        second !== undefined &&
        looksLikeName(first) &&
        looksLikeName(second) &&
        fields.every((field) => !KNOWN_COLUMN_NAMES.has(normalizeHeader(field)))
    );
}

function isMajority(lines: string[], test: (line: string) => boolean): boolean {
    if (lines.length === 0) {
        return false;
    }
    const matching = lines.filter(test).length;
    return matching * 2 >= lines.length;
}

/**
 * Classifies the input from its first lines. Deterministic for a given sample.
 */
export function detectFormat(lines: string[]): FormatKind {
    const sample = lines
        .filter((line) => line.trim().length > 0)
        .slice(0, DETECTION_SAMPLE_LINES);
    const [first] = sample;
    if (first === undefined) {
        return "unknown";
    }

    if (isSpotifyHeader(first)) {
        return "spotify_csv";
    }
    if (isArtistAlbumHeader(first)) {
        return "simple_csv_headered";
    }

    if (isHeaderlessCsvLine(first)) {
        return "simple_csv_headerless";
    }
    if (isMajority(sample, (line) => splitDash(line) !== null)) {
        return "text_dash";
    }
    if (isMajority(sample, (line) => splitBy(line) !== null)) {
        return "text_by";
    }
    if (isMajority(sample, (line) => splitTab(line) !== null)) {
        return "tsv";
    }
    return "unknown";
}

const ALBUM_MARKERS: RegExp[] = [
    /\b(?:ep|lp|deluxe|edition|remaster(?:ed)?|vol\.?|volume|live|soundtrack|ost|mixtape|anthology|collection|greatest hits)\b/i,
    /[()[\]]/,
    /\b(?:19|20)\d{2}\b/,
];

function albumMarkerScore(value: string): number {
    return ALBUM_MARKERS.filter((marker) => marker.test(value)).length;
}

function repeatedValues(values: string[]): number {
    const lowered = values.map((value) => value.toLowerCase());
    return lowered.length - new Set(lowered).size;
}

/**
 * Guesses which headerless CSV column holds the artist.
 *
 * 1. The column with more repeated values is the artist column.
 * 2. Otherwise the column with more album markers (editions, EP, volumes,
 *    brackets, years) is the album column.
 * 3. Otherwise artist,album.
 */
export function detectColumnOrder(lines: string[]): ColumnOrder {
    const pairs = lines
        .slice(0, DETECTION_SAMPLE_LINES)
        .map((line) => splitCsvLine(line).map((field) => field.trim()))
        .filter((fields) => fields.length >= 2 && fields[0] && fields[1]);

    const left = pairs.map((fields) => fields[0] ?? "");
    const right = pairs.map((fields) => fields[1] ?? "");

    const leftRepeats = repeatedValues(left);
    const rightRepeats = repeatedValues(right);
    if (leftRepeats !== rightRepeats) {
        return leftRepeats > rightRepeats ? "artist_album" : "album_artist";
    }

    const leftScore = left.reduce((sum, value) => sum + albumMarkerScore(value), 0);
    const rightScore = right.reduce((sum, value) => sum + albumMarkerScore(value), 0);
    if (leftScore > rightScore) {
        return "album_artist";
    }

    return "artist_album";
}
