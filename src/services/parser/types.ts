export type FormatKind =
    | "spotify_csv"
    | "simple_csv_headered"
    | "simple_csv_headerless"
    | "text_dash"
    | "text_by"
    | "tsv"
    | "unknown";

export interface AlbumEntry {
    /** Assigned when the entry is first written to an import CSV */
    rowId?: string;
    artist: string;
    album: string;
    /** Edition-stripped title used for MusicBrainz/Lidarr lookups */
    albumSearch: string;
    /** Number of source rows (tracks for Spotify exports) merged into this entry */
    trackCount: number;
    sourceFormat: FormatKind;
    year?: string;
    spotifyAlbumId?: string;
    mbArtistId?: string;
    mbReleaseId?: string;
    matchingRisk?: boolean;
    riskReason?: string;
}

export interface ParseStats {
    rawEntries: number;
    unparsed: number;
    filteredArtists: number;
    filteredAlbums: number;
    filteredBySelection: number;
}

export interface ParseResult {
    entries: AlbumEntry[];
    stats: ParseStats;
}

export interface ParseOptions {
    minArtistSongs?: number;
    minAlbumSongs?: number;
    /** Case-insensitive substring filter on the artist */
    artistFilter?: string;
    /** Case-insensitive substring filter on the album */
    albumFilter?: string;
    /** Stop collecting new artist/album pairs once this many are held */
    maxItems?: number;
}

export function emptyParseStats(): ParseStats {
    return {
        rawEntries: 0,
        unparsed: 0,
        filteredArtists: 0,
        filteredAlbums: 0,
        filteredBySelection: 0,
    };
}

export function createEntry(
    artist: string,
    album: string,
    sourceFormat: FormatKind,
    extra: Partial<AlbumEntry> = {}
): AlbumEntry {
    return {
        artist,
        album,
        albumSearch: album,
        trackCount: 1,
        sourceFormat,
        ...extra,
    };
}
