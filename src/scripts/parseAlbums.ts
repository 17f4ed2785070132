#!/usr/bin/env node
/**
 * Parses an album list (Spotify export, CSV, TSV or text) into an import CSV.
 *
 * Usage:
 *   parse-albums <input> [-o albums.csv] [--dry-run] [--fuzzy-threshold 85]
 *                [--no-normalize] [--min-artist-songs 3] [--min-album-songs 2]
 *                [--max-items N] [--artist TEXT] [--album TEXT]
 *                [--include-risk-info] [--skip-risky]
 *                [--no-enrich-musicbrainz] [--mb-delay 2.0] [-v]
 */

import { loadConfig, MIN_MUSICBRAINZ_DELAY_SECONDS } from "../config";
import { MusicBrainzService } from "../services/musicbrainz";
import { DEFAULT_FUZZY_THRESHOLD } from "../services/parser/deduplicator";
import { DEFAULT_MIN_ALBUM_SONGS, DEFAULT_MIN_ARTIST_SONGS } from "../services/parser/spotifyExport";
import { runUniversalParser, UniversalParseStats } from "../services/parser/universalParser";
import { buildServiceConfig, RateLimiter } from "../services/rateLimiter";
import { AppError } from "../utils/errors";
import { createLogger, setLogLevel } from "../utils/logger";

const logger = createLogger("parse-albums");

export interface ParseAlbumsArgs {
    input: string;
    output: string;
    dryRun: boolean;
    fuzzyThreshold: number;
    normalize: boolean;
    minArtistSongs: number;
    minAlbumSongs: number;
    verbose: boolean;
    maxItems?: number;
    artist?: string;
    album?: string;
    includeRiskInfo: boolean;
    skipRisky: boolean;
    enrichMusicBrainz: boolean;
    /** Seconds between MusicBrainz requests */
    mbDelay?: number;
}

export const PARSE_USAGE =
    "Usage: parse-albums <input> [-o albums.csv] [--dry-run] [--fuzzy-threshold 0-100] [--no-normalize] " +
    "[--min-artist-songs N] [--min-album-songs N] [--max-items N] [--artist TEXT] [--album TEXT] " +
    "[--include-risk-info] [--skip-risky] [--no-enrich-musicbrainz] [--mb-delay SECONDS] [-v]";

function requireValue(argv: string[], index: number, flag: string): string {
    const value = argv[index + 1];
    if (value === undefined || value.startsWith("--")) {
        throw new Error(`Missing value for ${flag}`);
    }
    return value;
}

function toNumber(value: string, flag: string, integer: boolean): number {
    const parsed = Number(value);
    if (!Number.isFinite(parsed) || parsed < 0 || (integer && !Number.isInteger(parsed))) {
        throw new Error(`Invalid value for ${flag}: ${value}`);
    }
    return parsed;
}

export function parseArgs(argv: string[]): ParseAlbumsArgs {
    const args: ParseAlbumsArgs = {
        input: "",
        output: "albums.csv",
        dryRun: false,
        fuzzyThreshold: DEFAULT_FUZZY_THRESHOLD,
        normalize: true,
        minArtistSongs: DEFAULT_MIN_ARTIST_SONGS,
        minAlbumSongs: DEFAULT_MIN_ALBUM_SONGS,
        verbose: false,
        includeRiskInfo: false,
        skipRisky: false,
        enrichMusicBrainz: true,
    };

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        switch (arg) {
            case "-o":
            case "--output":
                args.output = requireValue(argv, i++, arg);
                break;
            case "--dry-run":
                args.dryRun = true;
                break;
            case "--fuzzy-threshold": {
                const threshold = toNumber(requireValue(argv, i++, arg), arg, true);
                if (threshold > 100) {
                    throw new Error(`Invalid value for ${arg}: ${threshold} (expected 0-100)`);
                }
                args.fuzzyThreshold = threshold;
                break;
            }
            case "--no-normalize":
                args.normalize = false;
                break;
            case "--min-artist-songs":
                args.minArtistSongs = toNumber(requireValue(argv, i++, arg), arg, true);
                break;
            case "--min-album-songs":
                args.minAlbumSongs = toNumber(requireValue(argv, i++, arg), arg, true);
                break;
            case "-v":
            case "--verbose":
                args.verbose = true;
                break;
            case "--max-items":
                args.maxItems = toNumber(requireValue(argv, i++, arg), arg, true);
                break;
            case "--artist":
                args.artist = requireValue(argv, i++, arg);
                break;
            case "--album":
                args.album = requireValue(argv, i++, arg);
                break;
            case "--include-risk-info":
                args.includeRiskInfo = true;
                break;
            case "--skip-risky":
                args.skipRisky = true;
                break;
            case "--no-enrich-musicbrainz":
                args.enrichMusicBrainz = false;
                break;
            case "--mb-delay":
                args.mbDelay = toNumber(requireValue(argv, i++, arg), arg, false);
                break;
            default:
                if (arg === undefined || arg.startsWith("-")) {
                    throw new Error(`Unknown option: ${arg}`);
                }
                if (args.input) {
                    throw new Error(`Unexpected argument: ${arg}`);
                }
                args.input = arg;
        }
    }

    if (!args.input) {
        throw new Error("Missing input file");
    }
    return args;
}

function printStats(stats: UniversalParseStats): void {
    console.log("=".repeat(60));
    console.log("PARSING STATISTICS");
    console.log("=".repeat(60));
    console.log(`Format detected:       ${stats.format}`);
    console.log(`Raw entries parsed:    ${stats.rawEntries}`);
    console.log(`Unparsed lines:        ${stats.unparsed}`);
    console.log(`Exact duplicates:      ${stats.exactDuplicates}`);
    console.log(`Fuzzy duplicates:      ${stats.fuzzyDuplicates}`);
    if (stats.format === "spotify_csv") {
        console.log(`Filtered artists:      ${stats.filteredArtists}`);
        console.log(`Filtered albums:       ${stats.filteredAlbums}`);
    }
    if (stats.filteredBySelection > 0) {
        console.log(`Filtered by selection: ${stats.filteredBySelection}`);
    }
    if (stats.mbEnriched > 0 || stats.mbArtistMatches > 0 || stats.mbFailed > 0) {
        console.log(`MusicBrainz releases:  ${stats.mbEnriched}`);
        console.log(`MusicBrainz artists:   ${stats.mbArtistMatches}`);
        console.log(`MusicBrainz failures:  ${stats.mbFailed}`);
    }
    console.log(`Final unique pairs:    ${stats.unique}`);
    if (stats.risky > 0) {
        console.log(`Risky entries:         ${stats.risky}`);
    }
    console.log(`Written:               ${stats.written ?? "none (dry run)"}`);
    console.log("=".repeat(60));
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
    let args: ParseAlbumsArgs;
    try {
        args = parseArgs(argv);
    } catch (error) {
        console.error(error instanceof Error ? error.message : String(error));
        console.error(PARSE_USAGE);
        return 1;
    }

    if (args.verbose) {
        setLogLevel("debug");
    }

    try {
        const config = loadConfig();
        let enrichment: MusicBrainzService | undefined;
        if (args.enrichMusicBrainz) {
            if (args.mbDelay !== undefined) {
                config.musicbrainz.delayMs = Math.round(
                    Math.max(args.mbDelay, MIN_MUSICBRAINZ_DELAY_SECONDS) * 1000
                );
            }
            const limiter = new RateLimiter(buildServiceConfig(config));
            enrichment = new MusicBrainzService(config.musicbrainz, limiter);
        }

        const { stats } = await runUniversalParser(args.input, {
            outputPath: args.dryRun ? undefined : args.output,
            fuzzyThreshold: args.fuzzyThreshold,
            normalize: args.normalize,
            minArtistSongs: args.minArtistSongs,
            minAlbumSongs: args.minAlbumSongs,
            maxItems: args.maxItems,
            artistFilter: args.artist,
            albumFilter: args.album,
            includeRiskInfo: args.includeRiskInfo,
            skipRisky: args.skipRisky,
            enrichment,
        });
        printStats(stats);
        return 0;
    } catch (error) {
        if (error instanceof AppError) {
            logger.error(`${error.code}: ${error.message}`, error.details);
        } else {
            logger.error("Parsing failed", error);
        }
        return 1;
    }
}

if (require.main === module) {
    process.once("SIGINT", () => {
        logger.warn("Interrupted; the output CSV keeps the lookups finished so far");
        process.exit(130);
    });
    main()
        .then((code) => process.exit(code))
        .catch((error) => {
            logger.error("Unexpected failure", error);
            process.exit(1);
        });
}
