import { normalizeHeader, parseCsvRows } from "./csvRows";
import { EntryCollector } from "./entryCollector";
import { ParseOptions, ParseResult, createEntry } from "./types";

/**
 * Spotify library/playlist exports (Exportify-style CSV, or streaming
 * history flattened to CSV) list one row per track. Rows are aggregated into
 * artist/album pairs and filtered by how many tracks back each artist and
 * album.
 */

export const DEFAULT_MIN_ARTIST_SONGS = 3;
export const DEFAULT_MIN_ALBUM_SONGS = 2;

interface SpotifyColumns {
    album: number;
    albumArtist?: number;
    trackArtist?: number;
    albumUri?: number;
    releaseDate?: number;
}

interface AlbumAggregate {
    artist: string;
    album: string;
    trackCount: number;
    spotifyAlbumId?: string;
    year?: string;
}

function findColumn(
    header: string[],
    predicate: (cell: string) => boolean
): number | undefined {
    const index = header.findIndex(predicate);
    return index >= 0 ? index : undefined;
}

export function locateSpotifyColumns(rawHeader: string[]): SpotifyColumns | null {
    const header = rawHeader.map(normalizeHeader);

    const albumArtist =
        findColumn(header, (cell) => cell.includes("album artist name")) ??
        findColumn(header, (cell) => cell === "album artist");
    const trackArtist =
        findColumn(
            header,
            (cell) => cell.includes("artist name") && !cell.includes("album artist")
        ) ??
        findColumn(
            header,
            (cell) =>
                cell.includes("artist") &&
                !cell.includes("album artist") &&
                !cell.includes("uri") &&
                !/\bids?\b/.test(cell)
        );
    const album =
        findColumn(header, (cell) => cell.includes("album name")) ??
        findColumn(
            header,
            (cell) =>
                cell.includes("album") &&
                !/artist|uri|url|\bids?\b|date|type|image/.test(cell)
        );

    if (album === undefined || (albumArtist === undefined && trackArtist === undefined)) {
        return null;
    }

    return {
        album,
        albumArtist,
        trackArtist,
        albumUri: findColumn(header, (cell) => /album (?:uri|url|id)\b/.test(cell)),
        releaseDate: findColumn(header, (cell) => cell.includes("release date")),
    };
}

/**
 * Accepts `spotify:album:ID`, `https://open.spotify.com/album/ID?si=...`,
 * any URL with an `/album/ID` path, or a bare alphanumeric id.
 */
export function normalizeSpotifyAlbumId(value: string | undefined): string | undefined {
    const trimmed = value?.trim();
    if (!trimmed) {
        return undefined;
    }

    const uriMatch = trimmed.match(/^spotify:album:([A-Za-z0-9]+)$/);
    if (uriMatch) {
        return uriMatch[1];
    }

    const pathMatch = trimmed.match(/\/album\/([A-Za-z0-9]+)/);
    if (pathMatch) {
        return pathMatch[1];
    }

    if (/^[A-Za-z0-9]{8,}$/.test(trimmed)) {
        return trimmed;
    }

    return undefined;
}

function cell(row: string[], index: number | undefined): string {
    return index === undefined ? "" : (row[index] ?? "").trim();
}

function firstListedArtist(value: string): string {
    const [first] = value.split(",");
    return (first ?? "").trim();
}

function releaseYear(value: string): string | undefined {
    return value.match(/^\d{4}/)?.[0];
}

function aggregateKey(value: string): string {
    return value.replace(/\s+/g, " ").trim().toLowerCase();
}

export function parseSpotifyExport(text: string, options: ParseOptions = {}): ParseResult {
    const minArtistSongs = options.minArtistSongs ?? DEFAULT_MIN_ARTIST_SONGS;
    const minAlbumSongs = options.minAlbumSongs ?? DEFAULT_MIN_ALBUM_SONGS;
    const collector = new EntryCollector(options);
    const { stats } = collector;

    const [header, ...rows] = parseCsvRows(text);
    const columns = header ? locateSpotifyColumns(header) : null;

    const aggregates = new Map<string, AlbumAggregate>();
    const artistTotals = new Map<string, number>();

    for (const row of rows) {
        stats.rawEntries += 1;

        if (!columns) {
            stats.unparsed += 1;
            continue;
        }

        const artist = firstListedArtist(
            cell(row, columns.albumArtist) || cell(row, columns.trackArtist)
        );
        const album = cell(row, columns.album);
        if (!artist || !album) {
            stats.unparsed += 1;
            continue;
        }

        const key = `${aggregateKey(artist)}\u0000${aggregateKey(album)}`;
        const existing = aggregates.get(key);
        if (existing) {
            existing.trackCount += 1;
            if (!existing.spotifyAlbumId) {
                existing.spotifyAlbumId = normalizeSpotifyAlbumId(cell(row, columns.albumUri));
            }
            if (!existing.year) {
                existing.year = releaseYear(cell(row, columns.releaseDate));
            }
        } else {
            if (!collector.accepts(artist, album, aggregates.size)) {
                continue;
            }
            aggregates.set(key, {
                artist,
                album,
                trackCount: 1,
                spotifyAlbumId: normalizeSpotifyAlbumId(cell(row, columns.albumUri)),
                year: releaseYear(cell(row, columns.releaseDate)),
            });
        }

        const artistKey = aggregateKey(artist);
        artistTotals.set(artistKey, (artistTotals.get(artistKey) ?? 0) + 1);
    }

    for (const aggregate of aggregates.values()) {
        const artistTotal = artistTotals.get(aggregateKey(aggregate.artist)) ?? 0;
        if (artistTotal < minArtistSongs) {
            stats.filteredArtists += 1;
            continue;
        }
        if (aggregate.trackCount < minAlbumSongs) {
            stats.filteredAlbums += 1;
            continue;
        }

        collector.add(
            createEntry(aggregate.artist, aggregate.album, "spotify_csv", {
                trackCount: aggregate.trackCount,
                spotifyAlbumId: aggregate.spotifyAlbumId,
                year: aggregate.year,
            })
        );
    }

    return collector.result();
}
