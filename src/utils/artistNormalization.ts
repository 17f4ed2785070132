import * as fuzz from "fuzzball";
import { normalizeForComparison } from "./textNormalizer";

/**
 * Utility functions for comparing artist names across list exports,
 * MusicBrainz credits and the Lidarr library.
 */

/**
 * Alternate spellings that the library and MusicBrainz use for the same
 * artist. Keys and values are in normalized comparison form.
 */
export const ARTIST_ALIASES: Readonly<Record<string, readonly string[]>> = {
    "kanye west": ["ye", "kanye"],
    "travis scott": ["travi$ scott"],
    "a$ap rocky": ["asap rocky"],
    "mø": ["mo", "mö"],
};

/**
 * Normalize an artist name for comparison
 * - Lowercases, strips diacritics and punctuation that varies between sources
 * - Normalizes "&" to "and" (Of Mice & Men → of mice and men)
 */
export function normalizeArtistName(name: string): string {
    return normalizeForComparison(name.replace(/\s*&\s*/g, " and "));
}

/**
 * "[bsd.u]" → "bsd.u"; names without surrounding brackets are returned trimmed.
 */
export function stripBrackets(name: string): string {
    const trimmed = name.trim();
    if (trimmed.startsWith("[") && trimmed.endsWith("]")) {
        return trimmed.slice(1, -1).trim();
    }
    return trimmed;
}

/**
 * Every normalized spelling the artist may appear under: the name itself,
 * its known aliases, and the bracket-stripped name.
 */
export function getArtistNameCandidates(name: string): string[] {
    const lower = name.trim().toLowerCase();
    const normalized = normalizeArtistName(name);
    const aliases = ARTIST_ALIASES[lower] ?? ARTIST_ALIASES[normalized] ?? [];

    return Array.from(
        new Set([
            normalized,
            ...aliases.map(normalizeArtistName),
            normalizeArtistName(stripBrackets(name)),
        ])
    ).filter((candidate) => candidate.length > 0);
}

/**
 * Check if two artist names are similar enough to be considered the same
 * @param threshold Similarity threshold (0-100), default 95
 */
export function areArtistNamesSimilar(
    name1: string,
    name2: string,
    threshold: number = 95
): boolean {
    const normalized1 = normalizeArtistName(name1);
    const normalized2 = normalizeArtistName(name2);

    if (normalized1 === normalized2) {
        return true;
    }

    return fuzz.ratio(normalized1, normalized2) >= threshold;
}

/**
 * Whether a MusicBrainz artist-credit phrase belongs to `artist`: direct
 * containment, an alias, or token-set similarity of at least 70.
 */
export function isArtistCreditMatch(
    creditPhrase: string,
    artist: string,
    aliases: readonly string[] = []
): boolean {
    if (!creditPhrase.trim() || !artist.trim()) {
        return false;
    }

    const credit = normalizeArtistName(creditPhrase);
    const target = normalizeArtistName(artist);

    if (credit.includes(target)) {
        return true;
    }

    const knownAliases = [
        ...aliases,
        ...(ARTIST_ALIASES[artist.trim().toLowerCase()] ?? []),
    ];
    if (knownAliases.some((alias) => credit.includes(normalizeArtistName(alias)))) {
        return true;
    }

    return fuzz.token_set_ratio(target, credit) >= 70;
}
