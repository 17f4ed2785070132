#!/usr/bin/env node
/**
 * Imports the albums of a parser CSV into Lidarr, recording each row's
 * outcome in the CSV's status column so the run can be resumed.
 *
 * Usage:
 *   import-albums <csv> [--dry-run] [--max-items N] [--status failed,new]
 *                 [--not-status skip] [--skip-existing] [--no-skip-completed]
 *                 [--batch-size 10] [--no-batch-pause] [--progress-interval 50]
 *                 [--artist TEXT] [--album TEXT] [--log-file PATH] [-v]
 */

import { loadConfig } from "../config";
import { AlbumImporter, ImportSummary } from "../services/import/albumImporter";
import { LidarrService } from "../services/lidarr";
import { buildServiceConfig, RateLimiter } from "../services/rateLimiter";
import { AppError } from "../utils/errors";
import { attachLogFile, createLogger, setLogLevel } from "../utils/logger";

const logger = createLogger("import-albums");

export const EXIT_INTERRUPTED = 130;

export interface ImportAlbumsArgs {
    csvPath: string;
    dryRun: boolean;
    maxItems?: number;
    status?: string;
    notStatus?: string;
    skipExisting: boolean;
    noSkipCompleted: boolean;
    batchSize?: number;
    noBatchPause: boolean;
    progressInterval?: number;
    logFile?: string;
    artist?: string;
    album?: string;
    verbose: boolean;
}

export const IMPORT_USAGE =
    "Usage: import-albums <csv> [--dry-run] [--max-items N] [--status TOKENS] [--not-status TOKENS] " +
    "[--skip-existing] [--no-skip-completed] [--batch-size N] [--no-batch-pause] [--progress-interval N] " +
    "[--artist TEXT] [--album TEXT] [--log-file PATH] [-v]";

function requireValue(argv: string[], index: number, flag: string): string {
    const value = argv[index + 1];
    if (value === undefined || value.startsWith("--")) {
        throw new Error(`Missing value for ${flag}`);
    }
    return value;
}

function toCount(value: string, flag: string, min: number): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < min) {
        throw new Error(`Invalid value for ${flag}: ${value}`);
    }
    return parsed;
}

export function parseArgs(argv: string[]): ImportAlbumsArgs {
    const args: ImportAlbumsArgs = {
        csvPath: "",
        dryRun: false,
        skipExisting: false,
        noSkipCompleted: false,
        noBatchPause: false,
        verbose: false,
    };

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        switch (arg) {
            case "--dry-run":
                args.dryRun = true;
                break;
            case "--max-items":
                args.maxItems = toCount(requireValue(argv, i++, arg), arg, 0);
                break;
            case "--status":
                args.status = requireValue(argv, i++, arg);
                break;
            case "--not-status":
                args.notStatus = requireValue(argv, i++, arg);
                break;
            case "--skip-existing":
                args.skipExisting = true;
                break;
            case "--no-skip-completed":
                args.noSkipCompleted = true;
                break;
            case "--batch-size":
                args.batchSize = toCount(requireValue(argv, i++, arg), arg, 1);
                break;
            case "--no-batch-pause":
                args.noBatchPause = true;
                break;
            case "--progress-interval":
                args.progressInterval = toCount(requireValue(argv, i++, arg), arg, 1);
                break;
            case "--log-file":
                args.logFile = requireValue(argv, i++, arg);
                break;
            case "--artist":
                args.artist = requireValue(argv, i++, arg);
                break;
            case "--album":
                args.album = requireValue(argv, i++, arg);
                break;
            case "-v":
            case "--verbose":
                args.verbose = true;
                break;
            default:
                if (arg === undefined || arg.startsWith("-")) {
                    throw new Error(`Unknown option: ${arg}`);
                }
                if (args.csvPath) {
                    throw new Error(`Unexpected argument: ${arg}`);
                }
                args.csvPath = arg;
        }
    }

    if (!args.csvPath) {
        throw new Error("Missing CSV path");
    }
    return args;
}

function printSummary(summary: ImportSummary): void {
    console.log("=".repeat(60));
    console.log(summary.interrupted ? "IMPORT INTERRUPTED" : "IMPORT COMPLETE");
    console.log("=".repeat(60));
    console.log(`Selected rows:     ${summary.selected}`);
    console.log(`Processed rows:    ${summary.processed}`);
    console.log(`Skipped (filters): ${summary.skippedByFilters}`);
    if (summary.invalidRows > 0) {
        console.log(`Invalid rows:      ${summary.invalidRows}`);
    }
    for (const [status, count] of Object.entries(summary.counts)) {
        console.log(`  ${status.padEnd(24)} ${count}`);
    }
    console.log(`Duration:          ${(summary.durationMs / 1000).toFixed(1)}s`);
    console.log("=".repeat(60));
}

/**
 * Runs the import. `onImporter` receives the importer before the first row
 * so a signal handler can stop it.
 */
export async function main(
    argv: string[] = process.argv.slice(2),
    onImporter?: (importer: AlbumImporter) => void
): Promise<number> {
    let args: ImportAlbumsArgs;
    try {
        args = parseArgs(argv);
    } catch (error) {
        console.error(error instanceof Error ? error.message : String(error));
        console.error(IMPORT_USAGE);
        return 1;
    }

    if (args.verbose) {
        setLogLevel("debug");
    }

    try {
        if (args.logFile) {
            attachLogFile(args.logFile);
        }

        const config = loadConfig(process.env, { requireLidarrApiKey: true });
        const limiter = new RateLimiter(buildServiceConfig(config));
        const importer = new AlbumImporter(new LidarrService(config.lidarr, limiter), config.pacing);
        onImporter?.(importer);

        const summary = await importer.run(args.csvPath, {
            dryRun: args.dryRun,
            maxItems: args.maxItems,
            status: args.status,
            notStatus: args.notStatus,
            skipExisting: args.skipExisting,
            noSkipCompleted: args.noSkipCompleted,
            batchSize: args.batchSize,
            noBatchPause: args.noBatchPause,
            progressInterval: args.progressInterval,
            artist: args.artist,
            album: args.album,
        });
        printSummary(summary);
        return summary.interrupted ? EXIT_INTERRUPTED : 0;
    } catch (error) {
        if (error instanceof AppError) {
            logger.error(`${error.code}: ${error.message}`, error.details);
        } else {
            logger.error("Import failed", error);
        }
        return 1;
    }
}

if (require.main === module) {
    main(process.argv.slice(2), (importer) => {
        process.once("SIGINT", () => {
            logger.warn("Interrupt received; finishing the current row");
            importer.stop();
            process.once("SIGINT", () => process.exit(EXIT_INTERRUPTED));
        });
    })
        .then((code) => process.exit(code))
        .catch((error) => {
            logger.error("Unexpected failure", error);
            process.exit(1);
        });
}
