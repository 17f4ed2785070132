import { CsvRecord, RowIdAllocator, writeCsvAtomic } from "../../utils/csvFile";
import { createLogger } from "../../utils/logger";
import { ROW_ID_COLUMN, STATUS_COLUMN } from "../import/csvStore";
import { AlbumEntry } from "./types";

const logger = createLogger("OutputWriter");

export interface OutputOptions {
    /** Write the MusicBrainz id columns even when no entry has an id yet */
    includeMusicBrainz?: boolean;
    includeRiskInfo?: boolean;
    skipRisky?: boolean;
}

export interface OutputSummary {
    written: number;
    skippedRisky: number;
    columns: string[];
}

function hasDistinctSearchTitle(entry: AlbumEntry): boolean {
    return entry.albumSearch.length > 0 && entry.albumSearch !== entry.album;
}

/**
 * Gives every entry without a row id the next free `r00001`-style id.
 * Ids already assigned are kept so rewrites during enrichment stay stable.
 */
export function assignRowIds(entries: AlbumEntry[]): void {
    const allocator = new RowIdAllocator();
    for (const entry of entries) {
        if (entry.rowId) {
            allocator.reserve(entry.rowId);
        }
    }
    for (const entry of entries) {
        if (!entry.rowId) {
            entry.rowId = allocator.allocate();
        }
    }
}

export function outputColumns(entries: AlbumEntry[], options: OutputOptions = {}): string[] {
    const columns = [ROW_ID_COLUMN, "artist", "album"];
    if (entries.some(hasDistinctSearchTitle)) {
        columns.push("album_search");
    }
    if (options.includeMusicBrainz || entries.some((entry) => entry.mbArtistId || entry.mbReleaseId)) {
        columns.push("mb_artist_id", "mb_release_id");
    }
    if (options.includeRiskInfo) {
        columns.push("matching_risk", "risk_reason");
    }
    columns.push(STATUS_COLUMN);
    return columns;
}

export function toOutputRecord(entry: AlbumEntry): CsvRecord {
    return {
        [ROW_ID_COLUMN]: entry.rowId ?? "",
        artist: entry.artist,
        album: entry.album,
        album_search: hasDistinctSearchTitle(entry) ? entry.albumSearch : "",
        mb_artist_id: entry.mbArtistId ?? "",
        mb_release_id: entry.mbReleaseId ?? "",
        matching_risk: entry.matchingRisk ? "TRUE" : "FALSE",
        risk_reason: entry.riskReason ?? "",
        [STATUS_COLUMN]: "",
    };
}

/**
 * Writes the import CSV in entry order. Column set depends on the data:
 * `album_search` only when some title was edition-stripped, MusicBrainz ids
 * when any entry carries one (or enrichment was requested).
 */
export async function writeAlbumCsv(
    filePath: string,
    entries: AlbumEntry[],
    options: OutputOptions = {}
): Promise<OutputSummary> {
    assignRowIds(entries);
    const selected = options.skipRisky ? entries.filter((entry) => !entry.matchingRisk) : entries;
    const skippedRisky = entries.length - selected.length;
    if (skippedRisky > 0) {
        logger.info(`Skipped ${skippedRisky} risky entries`);
    }

    const columns = outputColumns(selected, options);
    await writeCsvAtomic(filePath, columns, selected.map(toOutputRecord));
    logger.debug(`Wrote ${selected.length} entries to ${filePath}`);

    return { written: selected.length, skippedRisky, columns };
}
