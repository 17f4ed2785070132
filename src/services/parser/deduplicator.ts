import * as fuzz from "fuzzball";
import { normalizeArtistName } from "../../utils/artistNormalization";
import {
    cleanText,
    getAlbumTitleVariations,
    normalize,
    normalizeAlbumTitleForMatching,
} from "../../utils/textNormalizer";
import { AlbumEntry } from "./types";

export const DEFAULT_FUZZY_THRESHOLD = 85;
/** Artist names at or above this token-sort score share a cluster. */
export const ARTIST_MATCH_THRESHOLD = 90;
/** Fuzzy merges scoring below this are flagged for review. */
export const CONFIDENT_MERGE_SCORE = 95;

export interface DedupeOptions {
    /** 0-100; 100 disables fuzzy merging */
    fuzzyThreshold?: number;
    /** Apply text normalization before comparing (default true) */
    normalize?: boolean;
}

export interface DedupeStats {
    exact: number;
    fuzzy: number;
    /** Entries whose artist or album was empty after normalization */
    dropped: number;
}

export interface DedupeResult {
    entries: AlbumEntry[];
    stats: DedupeStats;
}

interface ArtistCluster {
    key: string;
    members: AlbumEntry[];
}

function normalizeEntry(entry: AlbumEntry): AlbumEntry {
    return {
        ...entry,
        artist: normalize(entry.artist, "artist"),
        album: cleanText(entry.album),
        albumSearch: normalize(entry.album, "album"),
    };
}

/** Folds `source` into `target`; optional fields only fill gaps. */
function mergeInto(target: AlbumEntry, source: AlbumEntry): void {
    target.trackCount += source.trackCount;
    target.year = target.year || source.year;
    target.spotifyAlbumId = target.spotifyAlbumId || source.spotifyAlbumId;
    target.mbArtistId = target.mbArtistId || source.mbArtistId;
    target.mbReleaseId = target.mbReleaseId || source.mbReleaseId;
    if (!target.matchingRisk && source.matchingRisk) {
        target.matchingRisk = true;
        target.riskReason = source.riskReason;
    }
}

function matchingTitles(entry: AlbumEntry): string[] {
    const titles = new Set<string>();
    for (const variation of [...getAlbumTitleVariations(entry.album), entry.albumSearch]) {
        const title = normalizeAlbumTitleForMatching(variation);
        if (title) {
            titles.add(title);
        }
    }
    return Array.from(titles);
}

/**
 * Best token-sort ratio over every pair of title variations of the two
 * entries.
 */
export function albumSimilarity(a: AlbumEntry, b: AlbumEntry): number {
    let best = 0;
    for (const left of matchingTitles(a)) {
        for (const right of matchingTitles(b)) {
            const score = left === right ? 100 : fuzz.token_sort_ratio(left, right);
            if (score > best) {
                best = score;
            }
            if (best === 100) {
                return best;
            }
        }
    }
    return best;
}

function findCluster(clusters: ArtistCluster[], key: string): ArtistCluster | undefined {
    return (
        clusters.find((cluster) => cluster.key === key) ??
        clusters.find(
            (cluster) => fuzz.token_sort_ratio(cluster.key, key) >= ARTIST_MATCH_THRESHOLD
        )
    );
}

function exactMerge(entries: AlbumEntry[], stats: DedupeStats): AlbumEntry[] {
    const byKey = new Map<string, AlbumEntry>();
    const survivors: AlbumEntry[] = [];

    for (const entry of entries) {
        const key = `${entry.artist}\u0000${entry.album}`;
        const existing = byKey.get(key);
        if (existing) {
            mergeInto(existing, entry);
            stats.exact += 1;
            continue;
        }
        byKey.set(key, entry);
        survivors.push(entry);
    }

    return survivors;
}

function fuzzyMerge(entries: AlbumEntry[], threshold: number, stats: DedupeStats): AlbumEntry[] {
    const clusters: ArtistCluster[] = [];
    const survivors: AlbumEntry[] = [];

    for (const entry of entries) {
        const key = normalizeArtistName(entry.artist);
        let cluster = findCluster(clusters, key);
        if (!cluster) {
            cluster = { key, members: [] };
            clusters.push(cluster);
        }

        let target: AlbumEntry | undefined;
        let targetScore = 0;
        for (const member of cluster.members) {
            const score = albumSimilarity(member, entry);
            if (score >= threshold && (target === undefined || score > targetScore)) {
                target = member;
                targetScore = score;
            }
        }

        if (!target) {
            cluster.members.push(entry);
            survivors.push(entry);
            continue;
        }

        mergeInto(target, entry);
        stats.fuzzy += 1;
        if (targetScore < CONFIDENT_MERGE_SCORE) {
            const reason = `Low fuzzy match: ${targetScore}`;
            target.matchingRisk = true;
            target.riskReason = target.riskReason ? `${target.riskReason}; ${reason}` : reason;
        }
    }

    return survivors;
}

/**
 * Normalizes, then merges exact duplicates and near-duplicate titles of the
 * same artist. The first-seen entry of each group survives, in input order.
 */
export function dedupe(entries: AlbumEntry[], options: DedupeOptions = {}): DedupeResult {
    const threshold = options.fuzzyThreshold ?? DEFAULT_FUZZY_THRESHOLD;
    const stats: DedupeStats = { exact: 0, fuzzy: 0, dropped: 0 };

    const prepared: AlbumEntry[] = [];
    for (const entry of entries) {
        const candidate = options.normalize === false ? { ...entry } : normalizeEntry(entry);
        if (!candidate.artist || !candidate.album) {
            stats.dropped += 1;
            continue;
        }
        prepared.push(candidate);
    }

    const unique = exactMerge(prepared, stats);
    if (threshold >= 100) {
        return { entries: unique, stats };
    }

    return { entries: fuzzyMerge(unique, threshold, stats), stats };
}
