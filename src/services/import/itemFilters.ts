import { ImportRow } from "./csvStore";
import { compileStatusFilter, isTerminal } from "./status";

export interface ItemFilterOptions {
    /** Reprocess rows that already reached a terminal status */
    noSkipCompleted?: boolean;
    /** Case-insensitive substring of the artist */
    artist?: string;
    /** Case-insensitive substring of the album */
    album?: string;
    /** Comma-separated status tokens to keep */
    status?: string;
    /** Comma-separated status tokens to drop */
    notStatus?: string;
    /** Drop rows whose artist is already in Lidarr */
    skipExisting?: boolean;
    existingArtistNames?: Iterable<string>;
    maxItems?: number;
}

export interface FilterCounts {
    completed: number;
    artist: number;
    album: number;
    status: number;
    notStatus: number;
    existing: number;
    maxItems: number;
}

export interface FilterResult {
    rows: ImportRow[];
    removed: FilterCounts;
}

function containsIgnoreCase(value: string, needle: string): boolean {
    return value.toLowerCase().includes(needle.toLowerCase());
}

/**
 * Selects the rows to process. Filters apply in a fixed order (completed,
 * artist, album, status, not-status, existing artist, max items) and keep
 * the input order.
 */
export function applyItemFilters(rows: ImportRow[], options: ItemFilterOptions = {}): FilterResult {
    const removed: FilterCounts = {
        completed: 0,
        artist: 0,
        album: 0,
        status: 0,
        notStatus: 0,
        existing: 0,
        maxItems: 0,
    };

    const keep = (current: ImportRow[], key: keyof FilterCounts, test: (row: ImportRow) => boolean) => {
        const kept = current.filter(test);
        removed[key] += current.length - kept.length;
        return kept;
    };

    let selected = rows;

    if (!options.noSkipCompleted) {
        selected = keep(selected, "completed", (row) => row.status === null || !isTerminal(row.status));
    }

    const { artist, album } = options;
    if (artist) {
        selected = keep(selected, "artist", (row) => containsIgnoreCase(row.artist, artist));
    }
    if (album) {
        selected = keep(selected, "album", (row) => containsIgnoreCase(row.album, album));
    }

    const wanted = compileStatusFilter(options.status);
    if (wanted) {
        selected = keep(selected, "status", (row) => wanted(row.status));
    }

    const unwanted = compileStatusFilter(options.notStatus);
    if (unwanted) {
        selected = keep(selected, "notStatus", (row) => !unwanted(row.status));
    }

    if (options.skipExisting) {
        const existing = new Set(
            Array.from(options.existingArtistNames ?? [], (name) => name.trim().toLowerCase())
        );
        selected = keep(selected, "existing", (row) => !existing.has(row.artist.trim().toLowerCase()));
    }

    if (options.maxItems !== undefined && options.maxItems >= 0 && selected.length > options.maxItems) {
        removed.maxItems = selected.length - options.maxItems;
        selected = selected.slice(0, options.maxItems);
    }

    return { rows: selected, removed };
}
