import { readTextFile } from "../../utils/csvFile";
import { createLogger } from "../../utils/logger";
import { EnrichmentClient } from "../enrichment";
import { DedupeOptions, dedupe } from "./deduplicator";
import { detectFormat, sampleLines } from "./formatDetector";
import { parseInput } from "./formatParsers";
import { OutputOptions, writeAlbumCsv } from "./outputWriter";
import { AlbumEntry, FormatKind, ParseOptions } from "./types";

const logger = createLogger("UniversalParser");

/** Release matches scoring below this are flagged for review. */
export const LOW_MB_SCORE = 85;

export interface UniversalParseOptions extends ParseOptions, DedupeOptions, OutputOptions {
    /** MusicBrainz lookups are skipped when absent */
    enrichment?: EnrichmentClient;
    /** Output CSV; nothing is written when absent (dry run) */
    outputPath?: string;
}

export interface EnrichmentStats {
    mbEnriched: number;
    mbArtistMatches: number;
    mbFailed: number;
}

export interface UniversalParseStats extends EnrichmentStats {
    format: FormatKind;
    rawEntries: number;
    unparsed: number;
    filteredArtists: number;
    filteredAlbums: number;
    filteredBySelection: number;
    exactDuplicates: number;
    fuzzyDuplicates: number;
    /** Entries empty after normalization */
    dropped: number;
    unique: number;
    risky: number;
    /** Rows in the output CSV; null when nothing was written */
    written: number | null;
}

export interface UniversalParseResult {
    entries: AlbumEntry[];
    stats: UniversalParseStats;
}

export function appendRiskReason(existing: string | undefined, reason: string): string {
    return existing ? `${existing}; ${reason}` : reason;
}

/**
 * Detects the format of `text`, parses it and deduplicates the result.
 * No I/O; enrichment and output happen in `runUniversalParser`.
 */
export function parseText(text: string, options: UniversalParseOptions = {}): UniversalParseResult {
    const format = detectFormat(sampleLines(text));
    logger.info(`Detected format: ${format}`);

    const parsed = parseInput(format, text, options);
    const deduped = dedupe(parsed.entries, {
        fuzzyThreshold: options.fuzzyThreshold,
        normalize: options.normalize,
    });

    if (parsed.stats.unparsed > 0) {
        logger.warn(`${parsed.stats.unparsed} line(s) could not be parsed and were skipped`);
    }

    return {
        entries: deduped.entries,
        stats: {
            format,
            ...parsed.stats,
            exactDuplicates: deduped.stats.exact,
            fuzzyDuplicates: deduped.stats.fuzzy,
            dropped: deduped.stats.dropped,
            unique: deduped.entries.length,
            risky: deduped.entries.filter((entry) => entry.matchingRisk).length,
            mbEnriched: 0,
            mbArtistMatches: 0,
            mbFailed: 0,
            written: null,
        },
    };
}

/**
 * Resolves MusicBrainz ids for each entry in place, looking up the
 * edition-stripped title. A failed lookup is logged and counted; the run
 * continues. `afterEach` runs after every entry (used to checkpoint the CSV).
 */
export async function enrichEntries(
    entries: AlbumEntry[],
    client: EnrichmentClient,
    afterEach?: (entry: AlbumEntry, index: number) => Promise<void>
): Promise<EnrichmentStats> {
    let mbFailed = 0;
    logger.info(`Enriching ${entries.length} entries with MusicBrainz metadata`);

    for (const [index, entry] of entries.entries()) {
        const searchTitle = entry.albumSearch || entry.album;
        try {
            const result = await client.lookup(entry.artist, searchTitle);
            switch (result.kind) {
                case "found":
                    entry.mbArtistId = result.mbArtistId;
                    entry.mbReleaseId = result.mbReleaseId;
                    logger.info(
                        `${entry.artist} - ${entry.album} → ${result.matchedTitle} (${result.mbReleaseId}, score ${result.score})`
                    );
                    if (result.score < LOW_MB_SCORE) {
                        entry.matchingRisk = true;
                        entry.riskReason = appendRiskReason(
                            entry.riskReason,
                            `Low MB match score: ${result.score}`
                        );
                    }
                    break;
                case "album_not_found":
                    entry.mbArtistId = result.mbArtistId;
                    logger.info(`${entry.artist} - ${entry.album}: artist matched, no release`);
                    break;
                case "artist_not_found":
                    mbFailed += 1;
                    logger.info(`${entry.artist} - ${entry.album}: no MusicBrainz match`);
                    break;
            }
        } catch (error) {
            mbFailed += 1;
            logger.error(`MusicBrainz lookup failed for ${entry.artist} - ${entry.album}`, error);
        }

        if (afterEach) {
            await afterEach(entry, index);
        }
    }

    const stats: EnrichmentStats = {
        mbEnriched: entries.filter((entry) => entry.mbReleaseId).length,
        mbArtistMatches: entries.filter((entry) => entry.mbArtistId && !entry.mbReleaseId).length,
        mbFailed,
    };
    logger.info(
        `Enrichment complete: ${stats.mbEnriched}/${entries.length} with release ids, ${stats.mbArtistMatches} artist only, ${stats.mbFailed} failed`
    );
    return stats;
}

/**
 * Reads `inputPath`, parses and deduplicates it, optionally enriches it and
 * writes the import CSV. With an output path the CSV is rewritten after
 * every lookup so an interrupted enrichment keeps its progress.
 */
export async function runUniversalParser(
    inputPath: string,
    options: UniversalParseOptions = {}
): Promise<UniversalParseResult> {
    const text = await readTextFile(inputPath);
    const result = parseText(text, options);
    const { entries, stats } = result;
    const { outputPath } = options;

    if (entries.length === 0) {
        logger.warn(`No valid entries found in ${inputPath}`);
    }

    if (options.enrichment && entries.length > 0) {
        const checkpoint = outputPath
            ? async () => {
                  try {
                      await writeAlbumCsv(outputPath, entries, {
                          includeMusicBrainz: true,
                          includeRiskInfo: options.includeRiskInfo,
                      });
                  } catch (error) {
                      logger.warn(`Could not checkpoint ${outputPath}`, { error });
                  }
              }
            : undefined;
        Object.assign(stats, await enrichEntries(entries, options.enrichment, checkpoint));
        stats.risky = entries.filter((entry) => entry.matchingRisk).length;
    }

    if (outputPath) {
        const summary = await writeAlbumCsv(outputPath, entries, {
            includeMusicBrainz: options.enrichment !== undefined || options.includeMusicBrainz,
            includeRiskInfo: options.includeRiskInfo,
            skipRisky: options.skipRisky,
        });
        stats.written = summary.written;
        logger.info(`Wrote ${summary.written} entries to ${outputPath}`);
    }

    return result;
}
