import { ErrorCode, ValidationError } from "../../utils/errors";
import { guessDelimiter, normalizeHeader, parseCsvRows, splitCsvLine } from "./csvRows";
import { EntryCollector } from "./entryCollector";
import {
    ALBUM_COLUMN_NAMES,
    ARTIST_COLUMN_NAMES,
    TokenPair,
    detectColumnOrder,
    sampleLines,
    splitBy,
    splitDash,
    splitTab,
} from "./formatDetector";
import { parseSpotifyExport } from "./spotifyExport";
import { AlbumEntry, FormatKind, ParseOptions, ParseResult, createEntry } from "./types";

interface ArtistAlbum {
    artist: string;
    album: string;
}

type LineParser = (line: string) => ArtistAlbum | null;

const artistFirst = (pair: TokenPair | null): ArtistAlbum | null =>
    pair && { artist: pair.left, album: pair.right };

const albumFirst = (pair: TokenPair | null): ArtistAlbum | null =>
    pair && { artist: pair.right, album: pair.left };

const parseDashLine: LineParser = (line) => artistFirst(splitDash(line));
const parseByLine: LineParser = (line) => albumFirst(splitBy(line));
const parseTabLine: LineParser = (line) => artistFirst(splitTab(line));

function parseCommaLine(line: string): ArtistAlbum | null {
    const [artist, album] = splitCsvLine(line).map((field) => field.trim());
    return artist && album ? { artist, album } : null;
}

/** Unrecognized layouts: each line tries dash, by, tab, then comma. */
const parseAnyLine: LineParser = (line) =>
    parseDashLine(line) ?? parseByLine(line) ?? parseTabLine(line) ?? parseCommaLine(line);

const LINE_PARSERS: Record<"text_dash" | "text_by" | "tsv" | "unknown", LineParser> = {
    text_dash: parseDashLine,
    text_by: parseByLine,
    tsv: parseTabLine,
    unknown: parseAnyLine,
};

/**
 * Wraps an EntryCollector so that `maxItems` counts distinct artist/album
 * pairs; repeats of a held pair are kept for the deduplicator to merge.
 */
class PairCollector {
    private readonly held = new Set<string>();
    readonly collector: EntryCollector;

    constructor(options: ParseOptions) {
        this.collector = new EntryCollector(options);
    }

    collect(
        artist: string,
        album: string,
        sourceFormat: FormatKind,
        extra: Partial<AlbumEntry> = {}
    ): void {
        const key = `${artist.toLowerCase()}|${album.toLowerCase()}`;
        if (!this.held.has(key)) {
            if (!this.collector.accepts(artist, album, this.held.size)) {
                return;
            }
            this.held.add(key);
        }
        this.collector.add(createEntry(artist, album, sourceFormat, extra));
    }
}

function contentLines(text: string): string[] {
    return text
        .replace(/^\uFEFF/, "")
        .split(/\r?\n/)
        .filter((line) => line.trim().length > 0);
}

function parseLines(text: string, kind: keyof typeof LINE_PARSERS, options: ParseOptions): ParseResult {
    const pairs = new PairCollector(options);
    const { stats } = pairs.collector;
    const parseLine = LINE_PARSERS[kind];

    for (const line of contentLines(text)) {
        stats.rawEntries += 1;
        const parsed = parseLine(line);
        if (!parsed) {
            stats.unparsed += 1;
            continue;
        }
        pairs.collect(parsed.artist, parsed.album, kind);
    }

    return pairs.collector.result();
}

function findNamedColumn(header: string[], names: ReadonlySet<string>): number {
    for (const name of names) {
        const index = header.indexOf(name);
        if (index >= 0) {
            return index;
        }
    }
    return -1;
}

function optionalCell(row: string[], index: number): string | undefined {
    if (index < 0) {
        return undefined;
    }
    const value = row[index]?.trim();
    return value ? value : undefined;
}

function parseHeaderedCsv(text: string, options: ParseOptions): ParseResult {
    const [firstLine = ""] = contentLines(text);
    const [rawHeader, ...rows] = parseCsvRows(text, guessDelimiter(firstLine));
    const header = (rawHeader ?? []).map(normalizeHeader);

    const artistIndex = findNamedColumn(header, ARTIST_COLUMN_NAMES);
    const albumIndex = findNamedColumn(header, ALBUM_COLUMN_NAMES);
    const yearIndex = header.indexOf("year");
    const mbArtistIndex = header.indexOf("mb artist id");
    const mbReleaseIndex = header.indexOf("mb release id");

    const pairs = new PairCollector(options);
    const { stats } = pairs.collector;

    for (const row of rows) {
        stats.rawEntries += 1;
        const artist = optionalCell(row, artistIndex);
        const album = optionalCell(row, albumIndex);
        if (!artist || !album) {
            stats.unparsed += 1;
            continue;
        }
        pairs.collect(artist, album, "simple_csv_headered", {
            year: optionalCell(row, yearIndex),
            mbArtistId: optionalCell(row, mbArtistIndex),
            mbReleaseId: optionalCell(row, mbReleaseIndex),
        });
    }

    return pairs.collector.result();
}

function parseHeaderlessCsv(text: string, options: ParseOptions): ParseResult {
    const order = detectColumnOrder(sampleLines(text));
    const pairs = new PairCollector(options);
    const { stats } = pairs.collector;

    for (const row of parseCsvRows(text)) {
        stats.rawEntries += 1;
        const [first, second] = row.map((field) => field.trim());
        if (!first || !second) {
            stats.unparsed += 1;
            continue;
        }
        const [artist, album] = order === "artist_album" ? [first, second] : [second, first];
        pairs.collect(artist, album, "simple_csv_headerless");
    }

    return pairs.collector.result();
}

/**
 * Parses `text` as the given format. Malformed rows are skipped and counted
 * in `stats.unparsed`; only an empty input throws.
 */
export function parseInput(kind: FormatKind, text: string, options: ParseOptions = {}): ParseResult {
    if (text.replace(/^\uFEFF/, "").trim().length === 0) {
        throw new ValidationError(ErrorCode.EMPTY_INPUT, "Input contains no data");
    }

    switch (kind) {
        case "spotify_csv":
            return parseSpotifyExport(text, options);
        case "simple_csv_headered":
            return parseHeaderedCsv(text, options);
        case "simple_csv_headerless":
            return parseHeaderlessCsv(text, options);
        case "text_dash":
        case "text_by":
        case "tsv":
        case "unknown":
            return parseLines(text, kind, options);
    }
}
