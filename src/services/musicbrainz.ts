import axios, { AxiosInstance } from "axios";
import * as fuzz from "fuzzball";
import { z } from "zod";
import { MusicBrainzConfig } from "../config";
import { isArtistCreditMatch, normalizeArtistName, stripBrackets } from "../utils/artistNormalization";
import { MusicBrainzApiError } from "../utils/errors";
import { readHttpFailure } from "../utils/httpFailure";
import { createLogger } from "../utils/logger";
import { normalizeAlbumTitleForMatching } from "../utils/textNormalizer";
import { EnrichmentClient, EnrichmentResult, generateTitleVariations } from "./enrichment";
import { RateLimiter } from "./rateLimiter";

const logger = createLogger("MusicBrainz");

export const MUSICBRAINZ_BASE_URL = "https://musicbrainz.org/ws/2";

const MIN_ARTIST_SIMILARITY = 70;
const RELAXED_ARTIST_SIMILARITY = 60;
const QUALIFIER_PREFIXES = new Set(["dj", "the", "mc"]);
const VOLUME_PATTERN = /\bvol(?:\.|ume)?\s*#?:?\s*(\d+)\b/i;

const scoreSchema = z.coerce.number().catch(0);

const artistSearchSchema = z.object({
    artists: z
        .array(
            z.object({
                id: z.string(),
                name: z.string().default(""),
                score: scoreSchema.default(100),
            })
        )
        .default([]),
});

const releaseGroupSearchSchema = z.object({
    "release-groups": z
        .array(
            z.object({
                id: z.string(),
                title: z.string().default(""),
                score: scoreSchema.default(100),
                "artist-credit": z
                    .array(
                        z.object({
                            name: z.string().optional(),
                            joinphrase: z.string().optional(),
                            artist: z
                                .object({ id: z.string(), name: z.string().optional() })
                                .optional(),
                        })
                    )
                    .default([]),
            })
        )
        .default([]),
});

type RawReleaseGroup = z.infer<typeof releaseGroupSearchSchema>["release-groups"][number];

export interface ArtistCandidate {
    id: string;
    name: string;
    /** MusicBrainz search score */
    score: number;
    /** fuzz.ratio against the searched name */
    similarity: number;
    /** Returned by the quoted (phrase) query */
    quoted: boolean;
}

export interface ReleaseGroupCandidate {
    id: string;
    title: string;
    score: number;
    creditPhrase: string;
    /** First credited artist */
    artistId?: string;
}

export interface ReleaseGroupSearchOptions {
    artistMbid?: string;
    aliases?: readonly string[];
    limit?: number;
}

/**
 * Escape special characters for Lucene query syntax
 * MusicBrainz uses Lucene, which requires escaping: + - && || ! ( ) { } [ ] ^ " ~ * ? : \ /
 */
export function escapeLucene(str: string): string {
    return str.replace(/([+\-&|!(){}[\]^"~*?:\\/])/g, "\\$1");
}

function volumeOf(title: string): string | undefined {
    return title.match(VOLUME_PATTERN)?.[1];
}

function toCandidate(group: RawReleaseGroup): ReleaseGroupCandidate {
    const credits = group["artist-credit"];
    return {
        id: group.id,
        title: group.title,
        score: group.score,
        creditPhrase: credits
            .map((credit) => `${credit.name ?? credit.artist?.name ?? ""}${credit.joinphrase ?? ""}`)
            .join("")
            .trim(),
        artistId: credits[0]?.artist?.id,
    };
}

const byScore = (a: ReleaseGroupCandidate, b: ReleaseGroupCandidate) => b.score - a.score;

/**
 * Orders artist-filtered candidates for one searched title: exact title
 * matches first; a requested "Vol. N" only accepts the same volume;
 * otherwise by title similarity, then MusicBrainz score.
 */
export function rankReleaseGroups(
    title: string,
    candidates: ReleaseGroupCandidate[]
): ReleaseGroupCandidate[] {
    const wanted = title.trim().toLowerCase();
    const exact = candidates.filter((rg) => rg.title.trim().toLowerCase() === wanted);
    if (exact.length > 0) {
        return exact.sort(byScore);
    }

    const wantedVolume = volumeOf(title);
    if (wantedVolume) {
        return candidates.filter((rg) => volumeOf(rg.title) === wantedVolume).sort(byScore);
    }

    const target = normalizeAlbumTitleForMatching(title);
    return candidates
        .map((rg) => ({
            rg,
            similarity: fuzz.token_set_ratio(target, normalizeAlbumTitleForMatching(rg.title)),
        }))
        .sort((a, b) => b.similarity - a.similarity || b.rg.score - a.rg.score)
        .map(({ rg }) => rg);
}

function buildArtistQueries(artist: string, title: string): string[] {
    const quotedTitle = `releasegroup:"${escapeLucene(title)}"`;

    if (artist.includes("[") && artist.includes("]")) {
        const inner = stripBrackets(artist);
        return [
            `artist:"${escapeLucene(artist)}" AND ${quotedTitle}`,
            `artist:"${escapeLucene(inner)}" AND ${quotedTitle}`,
            `artist:${escapeLucene(artist)} AND ${quotedTitle}`,
            `artist:${escapeLucene(inner)} releasegroup:${escapeLucene(title)}`,
        ];
    }

    const cleaned = artist.replace(/!/g, "I").replace(/\$/g, "S");
    const queries = [`artist:"${escapeLucene(artist)}" AND ${quotedTitle}`];
    if (cleaned !== artist) {
        queries.push(`artist:"${escapeLucene(cleaned)}" AND ${quotedTitle}`);
    }
    queries.push(`artist:${escapeLucene(artist)} AND ${quotedTitle}`);
    if (cleaned !== artist) {
        queries.push(`artist:${escapeLucene(cleaned)} releasegroup:${escapeLucene(title)}`);
    }
    return queries;
}

export class MusicBrainzService implements EnrichmentClient {
    private client: AxiosInstance;

    constructor(
        config: MusicBrainzConfig,
        private readonly limiter: RateLimiter
    ) {
        this.client = axios.create({
            baseURL: MUSICBRAINZ_BASE_URL,
            timeout: config.timeoutMs,
            headers: {
                "User-Agent": config.userAgent,
                Accept: "application/json",
            },
        });
    }

    private async search<S extends z.ZodTypeAny>(
        entity: "artist" | "release-group",
        query: string,
        limit: number,
        schema: S
    ): Promise<z.infer<S>> {
        try {
            const response = await this.limiter.execute("musicbrainz", () =>
                this.client.get(`/${entity}`, {
                    params: { query, limit, fmt: "json" },
                })
            );
            const parsed = schema.safeParse(response.data);
            if (!parsed.success) {
                throw new MusicBrainzApiError(`Unexpected ${entity} search response`);
            }
            return parsed.data;
        } catch (error) {
            if (error instanceof MusicBrainzApiError) {
                throw error;
            }
            const failure = readHttpFailure(error);
            throw new MusicBrainzApiError(
                `MusicBrainz ${entity} search failed: ${failure.message}`,
                failure.status,
                failure.code,
                { query }
            );
        }
    }

    /**
     * Runs each query in turn, skipping failed requests. Throws the last
     * failure only when no query could be answered at all.
     */
    private async runQueries<T>(
        queries: string[],
        run: (query: string) => Promise<T | null>
    ): Promise<T | null> {
        let answered = false;
        let lastError: unknown;

        for (const query of queries) {
            try {
                const result = await run(query);
                answered = true;
                if (result !== null) {
                    return result;
                }
            } catch (error) {
                lastError = error;
                logger.debug(`Query failed: ${query}`, { error });
            }
        }

        if (!answered && lastError !== undefined) {
            throw lastError;
        }
        return null;
    }

    /**
     * Artist candidates from a quoted and an unquoted `artist:` query,
     * keeping those with similarity >= 70 (relaxed to 60 when none qualify).
     * Quoted hits, then names keeping a leading "dj"/"the"/"mc", then
     * similarity, then MusicBrainz score come first.
     */
    async searchArtists(artist: string, limit = 5): Promise<ArtistCandidate[]> {
        const searchName = stripBrackets(artist);
        const searchTerm = searchName.toLowerCase();
        const collected = new Map<string, ArtistCandidate>();

        await this.runQueries(
            [`artist:"${escapeLucene(searchName)}"`, `artist:${escapeLucene(searchName)}`],
            async (query) => {
                const quoted = query.includes('"');
                const data = await this.search("artist", query, limit, artistSearchSchema);
                for (const found of data.artists) {
                    const similarity = fuzz.ratio(searchTerm, found.name.toLowerCase());
                    const existing = collected.get(found.id);
                    if (existing) {
                        existing.similarity = Math.max(existing.similarity, similarity);
                        existing.quoted = existing.quoted || quoted;
                        existing.score = Math.max(existing.score, found.score);
                    } else {
                        collected.set(found.id, {
                            id: found.id,
                            name: found.name,
                            score: found.score,
                            similarity,
                            quoted,
                        });
                    }
                }
                // Both queries always run so their candidates can be merged.
                return null;
            }
        );

        const candidates = Array.from(collected.values());
        let filtered = candidates.filter((c) => c.similarity >= MIN_ARTIST_SIMILARITY);
        if (filtered.length === 0) {
            filtered = candidates.filter((c) => c.similarity >= RELAXED_ARTIST_SIMILARITY);
        }

        const [firstToken] = searchTerm.split(/\s+/);
        const prefix = firstToken && QUALIFIER_PREFIXES.has(firstToken) ? firstToken : null;
        const rank = (candidate: ArtistCandidate): number =>
            (candidate.quoted ? 2000 : 0) +
            (prefix && normalizeArtistName(candidate.name).startsWith(prefix) ? 1000 : 0) +
            candidate.similarity;

        filtered.sort((a, b) => rank(b) - rank(a) || b.score - a.score);

        logger.debug(
            `Artist search for "${searchName}": ${candidates.length} raw, ${filtered.length} kept`
        );
        return filtered;
    }

    /**
     * Release groups for `title` credited to `artist`. Every title variation
     * is tried with `arid:` queries (when the artist id is known) or
     * artist-name queries, then title-only queries as a last resort.
     */
    async searchReleaseGroups(
        artist: string,
        title: string,
        options: ReleaseGroupSearchOptions = {}
    ): Promise<ReleaseGroupCandidate[]> {
        const limit = options.limit ?? 5;
        const aliases = options.aliases ?? [];
        const variations = generateTitleVariations(title);

        const credited = async (query: string): Promise<ReleaseGroupCandidate[]> => {
            const data = await this.search("release-group", query, limit, releaseGroupSearchSchema);
            return data["release-groups"]
                .map(toCandidate)
                .filter((rg) => isArtistCreditMatch(rg.creditPhrase, artist, aliases));
        };

        const queries: Array<{ query: string; variant: string }> = [];
        for (const variant of variations) {
            const forVariant = options.artistMbid
                ? [
                      `arid:${options.artistMbid} AND releasegroup:"${escapeLucene(variant)}"`,
                      `arid:${options.artistMbid} AND releasegroup:${escapeLucene(variant)}`,
                  ]
                : buildArtistQueries(artist, variant);
            queries.push(...forVariant.map((query) => ({ query, variant })));
        }

        const variantFor = new Map(queries.map(({ query, variant }) => [query, variant]));
        const primary = await this.runQueries(
            queries.map(({ query }) => query),
            async (query) => {
                const matches = await credited(query);
                if (matches.length === 0) {
                    return null;
                }
                return rankReleaseGroups(variantFor.get(query) ?? title, matches);
            }
        );
        if (primary) {
            return primary;
        }

        const fallback = await this.runQueries(
            variations.map((variant) => `releasegroup:"${escapeLucene(variant)}"`),
            async (query) => {
                const matches = await credited(query);
                return matches.length > 0 ? matches : null;
            }
        );
        if (!fallback) {
            return [];
        }

        const exact = fallback.filter((rg) =>
            variations.some((variant) => variant.toLowerCase() === rg.title.trim().toLowerCase())
        );
        logger.debug(`Title-only fallback found ${fallback.length} candidate(s) for ${artist}`);
        return exact.length > 0 ? exact.sort(byScore) : fallback;
    }

    async lookup(artist: string, album: string): Promise<EnrichmentResult> {
        const [bestArtist] = await this.searchArtists(artist);
        const [bestRelease] = await this.searchReleaseGroups(artist, album, {
            artistMbid: bestArtist?.id,
        });

        const mbArtistId = bestArtist?.id ?? bestRelease?.artistId;
        if (bestRelease && mbArtistId) {
            return {
                kind: "found",
                mbArtistId,
                mbReleaseId: bestRelease.id,
                matchedTitle: bestRelease.title,
                score: bestRelease.score,
            };
        }

        if (bestArtist) {
            return { kind: "album_not_found", mbArtistId: bestArtist.id };
        }
        return { kind: "artist_not_found" };
    }
}
