import {
    collapseWhitespace,
    normalizeQuotes,
    stripInvisible,
} from "./stringNormalization";

/**
 * Text normalization for artist names and album titles coming from
 * free-form lists (CSV exports, pasted text).
 *
 * `normalize` is idempotent: normalize(normalize(x)) === normalize(x).
 */

export type TextRole = "artist" | "album";

interface ProfanityPattern {
    pattern: RegExp;
    word: string;
}

const PROFANITY_PATTERNS: ProfanityPattern[] = [
    { pattern: /\bf(?:[*\-_]+ck|[*\-_]{2}k)/gi, word: "fuck" },
    { pattern: /\bs(?:h[*\-_]+t|[*\-_]{2}t)/gi, word: "shit" },
    { pattern: /\bb[*\-_]+tch/gi, word: "bitch" },
    { pattern: /\bd[*\-_]+mn\b/gi, word: "damn" },
    { pattern: /\ba[*\-_]+s\b/gi, word: "ass" },
    { pattern: /\bh[*\-_]+ll\b/gi, word: "hell" },
];

// Order matters: "Title (Deluxe) - EP" loses " - EP" first, then "(Deluxe)".
const ALBUM_SUFFIX_PATTERNS: RegExp[] = [
    /(?:\s*-\s*|\s+)EP\s*$/i,
    /(?:\s*-\s*|\s+)Single\s*$/i,
    /\s*\([^)]*&[^)]*\)\s*$/,
    /\s*\((?:feat|ft\.)[^)]*\)\s*$/i,
    /\s*\(with\b[^)]*\)\s*$/i,
    /\s*\(deluxe[^)]*\)\s*$/i,
    /\s*\(explicit[^)]*\)\s*$/i,
    /\s*\(clean[^)]*\)\s*$/i,
    /\s*\(remaster[^)]*\)\s*$/i,
    /\s*\(collector'?s[^)]*\)\s*$/i,
    /\s*\(anniversary[^)]*\)\s*$/i,
    /\s*\(special[^)]*\)\s*$/i,
    /\s*\(bonus[^)]*\)\s*$/i,
    /\s*\[[^\]]*\]\s*$/,
];

const EDITION_VARIANTS: string[] = [
    " (deluxe)",
    " (deluxe edition)",
    " - deluxe edition",
    " [deluxe]",
    " (expanded)",
    " (expanded edition)",
    " - expanded edition",
    " [expanded]",
    " (remastered)",
    " (remaster)",
    " - remastered",
    " [remastered]",
    " (special edition)",
    " - special edition",
    " [special edition]",
    " (anniversary edition)",
    " - anniversary edition",
    " [anniversary edition]",
    " (collector's edition)",
    " - collector's edition",
    " [collector's edition]",
    " (bonus track version)",
    " - bonus track version",
    " [bonus track version]",
];

function matchCase(source: string, word: string): string {
    const letters = source.replace(/[^A-Za-z]/g, "");
    if (letters.length > 1 && letters === letters.toUpperCase()) {
        return word.toUpperCase();
    }
    const first = letters.charAt(0);
    if (first && first === first.toUpperCase()) {
        return word.charAt(0).toUpperCase() + word.slice(1);
    }
    return word;
}

/**
 * Restores censored profanity ("F*ck", "SH*T", "b_tch") keeping the
 * Title/UPPER/lower case pattern of the censored word.
 */
export function decensorProfanity(text: string): string {
    let result = text;
    for (const { pattern, word } of PROFANITY_PATTERNS) {
        result = result.replace(pattern, (match) => matchCase(match, word));
    }
    return result;
}

/**
 * Strips trailing edition/format markers ("- EP", "(Deluxe Edition)",
 * "(feat. X)", "[Explicit]"). The ordered pattern list is re-applied until
 * nothing changes; a strip that would leave an empty title is skipped.
 */
export function stripAlbumSuffixes(title: string): string {
    let current = title.trim();

    for (;;) {
        let changed = false;
        for (const pattern of ALBUM_SUFFIX_PATTERNS) {
            const stripped = current.replace(pattern, "").trim();
            if (stripped !== current && stripped.length > 0) {
                current = stripped;
                changed = true;
            }
        }
        if (!changed) {
            return current;
        }
    }
}

/**
 * Whitespace, Unicode, quote and profanity cleanup shared by both roles.
 * Album edition markers are left in place.
 */
export function cleanText(text: string): string {
    const unified = normalizeQuotes(text).normalize("NFKC");
    const visible = normalizeQuotes(stripInvisible(unified));
    return decensorProfanity(collapseWhitespace(visible)).trim();
}

export function normalize(text: string, role: TextRole): string {
    const cleaned = cleanText(text);
    return role === "album" ? stripAlbumSuffixes(cleaned) : cleaned;
}

/**
 * Comparison key for artist names: compatibility-decomposed, lowercased,
 * without diacritics, quotes, hyphens, periods or underscores.
 *
 * "Ol' Burger Beats" -> "ol burger beats", "[bsd.u]" -> "[bsdu]"
 */
export function normalizeForComparison(name: string): string {
    const decomposed = name.normalize("NFKD").toLowerCase();
    return collapseWhitespace(
        normalizeQuotes(decomposed)
            .replace(/[\u0300-\u036f]/g, "")
            .replace(/['"\-._]/g, "")
    );
}

/**
 * Lowercases and removes a single known edition suffix, so that
 * "Album (Deluxe Edition)" and "Album" compare equal.
 */
export function normalizeAlbumTitleForMatching(title: string): string {
    const normalized = title.toLowerCase().trim();
    for (const variant of EDITION_VARIANTS) {
        if (normalized.endsWith(variant)) {
            return normalized.slice(0, -variant.length).trim();
        }
    }
    return normalized;
}

/**
 * Original, decensored, suffix-stripped, and decensored+stripped forms of a
 * title, without duplicates, in that order.
 */
export function getAlbumTitleVariations(title: string): string[] {
    const decensored = decensorProfanity(title);
    return Array.from(
        new Set([
            title,
            decensored,
            stripAlbumSuffixes(title),
            stripAlbumSuffixes(decensored),
        ])
    );
}
