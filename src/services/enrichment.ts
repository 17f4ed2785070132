import { collapseWhitespace } from "../utils/stringNormalization";

/**
 * Outcome of resolving an artist/album pair to MusicBrainz identifiers.
 * Not finding something is a result, not an error.
 */
export type EnrichmentResult =
    | {
          kind: "found";
          mbArtistId: string;
          /** Release-group id */
          mbReleaseId: string;
          matchedTitle: string;
          /** MusicBrainz search score, 0-100 */
          score: number;
      }
    | { kind: "album_not_found"; mbArtistId: string }
    | { kind: "artist_not_found" };

export interface EnrichmentClient {
    lookup(artist: string, album: string): Promise<EnrichmentResult>;
}

function toTitleCase(value: string): string {
    return value.replace(/\b\p{L}/gu, (letter) => letter.toUpperCase());
}

/**
 * Alternative spellings of an album title to search for, most literal first:
 * the title, without a leading "EP"/"Single"/"The"/"A", title-cased (when
 * all lowercase), upper-cased (short titles), "&" spelled "and", and without
 * punctuation.
 */
export function generateTitleVariations(title: string): string[] {
    const original = title.trim();
    const variations = [original];

    variations.push(original.replace(/^(?:ep|single|the|a)\s+/i, ""));

    if (/\p{L}/u.test(original) && original === original.toLowerCase()) {
        variations.push(toTitleCase(original));
    }

    if (original.length <= 6 && original !== original.toUpperCase()) {
        variations.push(original.toUpperCase());
    }

    if (original.includes("&")) {
        variations.push(collapseWhitespace(original.replace(/&/g, " and ")));
    }

    variations.push(collapseWhitespace(original.replace(/[^\p{L}\p{N}\s]/gu, " ")));

    return Array.from(new Set(variations.map((variation) => variation.trim()))).filter(
        (variation) => variation.length > 0
    );
}
