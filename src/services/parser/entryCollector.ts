import {
    AlbumEntry,
    ParseOptions,
    ParseResult,
    ParseStats,
    emptyParseStats,
} from "./types";

function includesIgnoreCase(haystack: string, needle: string | undefined): boolean {
    if (!needle) {
        return true;
    }
    return haystack.toLowerCase().includes(needle.toLowerCase());
}

/**
 * Accumulates parsed entries while applying the artist/album substring
 * filters and the `maxItems` cap.
 */
export class EntryCollector {
    readonly entries: AlbumEntry[] = [];
    readonly stats: ParseStats = emptyParseStats();

    constructor(private readonly options: ParseOptions = {}) {}

    /**
     * Whether a new artist/album pair may be collected. `heldCount` is the
     * number of pairs already held (defaults to the collected entries).
     */
    accepts(artist: string, album: string, heldCount: number = this.entries.length): boolean {
        const { artistFilter, albumFilter, maxItems } = this.options;

        if (
            !includesIgnoreCase(artist, artistFilter) ||
            !includesIgnoreCase(album, albumFilter)
        ) {
            this.stats.filteredBySelection += 1;
            return false;
        }

        if (maxItems !== undefined && maxItems > 0 && heldCount >= maxItems) {
            this.stats.filteredBySelection += 1;
            return false;
        }

        return true;
    }

    add(entry: AlbumEntry): void {
        this.entries.push(entry);
    }

    result(): ParseResult {
        return { entries: this.entries, stats: this.stats };
    }
}
