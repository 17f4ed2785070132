import * as fuzz from "fuzzball";
import { PacingConfig } from "../../config";
import { getArtistNameCandidates, normalizeArtistName } from "../../utils/artistNormalization";
import { chunkArray, sleep } from "../../utils/async";
import { ErrorCode, ValidationError } from "../../utils/errors";
import { createLogger } from "../../utils/logger";
import { normalizeAlbumTitleForMatching } from "../../utils/textNormalizer";
import {
    LidarrAlbum,
    LidarrArtist,
    LidarrService,
    classifyLidarrError,
    isAlreadyExistsError,
} from "../lidarr";
import { ImportCsvStore, ImportRow } from "./csvStore";
import { FilterCounts, ItemFilterOptions, applyItemFilters } from "./itemFilters";
import { ImportStatus, statusClass } from "./status";

const logger = createLogger("AlbumImporter");

export const DEFAULT_PROGRESS_INTERVAL = 50;
/** Minimum token-sort score for a title-only album match */
export const ALBUM_TITLE_MATCH_THRESHOLD = 85;

export type LidarrGateway = Pick<
    LidarrService,
    | "listArtists"
    | "lookupArtist"
    | "addArtist"
    | "listAlbums"
    | "lookupAlbum"
    | "addAlbum"
    | "setAlbumMonitored"
    | "runCommand"
>;

export interface ImportRunOptions extends Omit<ItemFilterOptions, "existingArtistNames"> {
    dryRun?: boolean;
    batchSize?: number;
    noBatchPause?: boolean;
    progressInterval?: number;
}

export interface ImportSummary {
    counts: Partial<Record<ImportStatus, number>>;
    processed: number;
    selected: number;
    skippedByFilters: number;
    removed: FilterCounts;
    invalidRows: number;
    interrupted: boolean;
    durationMs: number;
}

interface MonitorContext {
    row: ImportRow;
    releaseId: string;
    /** The artist was added by this row */
    isNew: boolean;
    dryRun: boolean;
}

function isTransportStatus(status: ImportStatus): boolean {
    return status === "error_connection" || status === "error_timeout";
}

/**
 * Drives Lidarr row by row: resolve or add the artist, then monitor only
 * the requested release group. Row failures become statuses; only setup
 * failures (unreadable CSV, no MusicBrainz columns, Lidarr unreachable
 * before the first row) reject `run`.
 */
export class AlbumImporter {
    private artists: LidarrArtist[] = [];
    private stopRequested = false;

    constructor(
        private readonly lidarr: LidarrGateway,
        private readonly pacing: PacingConfig,
        private readonly wait: (ms: number) => Promise<void> = sleep
    ) {}

    /** Finishes the in-flight row, then ends the run. */
    stop(): void {
        this.stopRequested = true;
    }

    async refreshArtists(): Promise<LidarrArtist[]> {
        this.artists = await this.lidarr.listArtists();
        return this.artists;
    }

    /**
     * Existing Lidarr artist for the row: by MusicBrainz id, then by
     * normalized name, aliases and the bracket-stripped name.
     */
    findExistingArtist(row: Pick<ImportRow, "artist" | "mbArtistId">): LidarrArtist | undefined {
        if (row.mbArtistId) {
            const byId = this.artists.find((artist) => artist.foreignArtistId === row.mbArtistId);
            if (byId) {
                return byId;
            }
        }

        for (const candidate of getArtistNameCandidates(row.artist)) {
            const byName = this.artists.find(
                (artist) => normalizeArtistName(artist.artistName) === candidate
            );
            if (byName) {
                return byName;
            }
        }
        return undefined;
    }

    async processRow(row: ImportRow, options: { dryRun?: boolean } = {}): Promise<ImportStatus> {
        const dryRun = options.dryRun ?? false;
        const { mbArtistId } = row;
        if (!mbArtistId) {
            return "skip_no_musicbrainz";
        }

        await this.wait(this.pacing.requestDelayMs);

        try {
            const status = await this.resolveRow(row, mbArtistId, dryRun);
            if (dryRun && statusClass(status) !== "skip") {
                return "dry_run";
            }
            return status;
        } catch (error) {
            const status = classifyLidarrError(error);
            logger.warn(`${row.artist} - ${row.album}: ${status}`, { error });
            return status;
        }
    }

    private async resolveRow(
        row: ImportRow,
        mbArtistId: string,
        dryRun: boolean
    ): Promise<ImportStatus> {
        const existing = this.findExistingArtist(row);
        if (existing) {
            logger.debug(`Artist ${row.artist} already in Lidarr (id ${existing.id})`);
            if (!row.mbReleaseId) {
                return "skip_album_mb_noresults";
            }
            return this.monitorRelease(existing, { row, releaseId: row.mbReleaseId, isNew: false, dryRun });
        }

        const lookups = await this.lidarr.lookupArtist(mbArtistId);
        const lookup = lookups.find((item) => item.foreignArtistId === mbArtistId) ?? lookups[0];
        if (!lookup) {
            return "skip_no_artist_match";
        }

        if (dryRun) {
            return row.mbReleaseId ? "artist_added" : "skip_album_mb_noresults";
        }

        let added: LidarrArtist;
        try {
            added = await this.lidarr.addArtist(lookup, {
                monitored: false,
                searchForMissingAlbums: false,
            });
        } catch (error) {
            if (!isAlreadyExistsError(error)) {
                throw error;
            }
            return this.resolveAddRace(row, mbArtistId);
        }

        this.artists.push(added);
        logger.info(`Added artist ${added.artistName}`);

        if (!row.mbReleaseId) {
            return "skip_album_mb_noresults";
        }
        return this.monitorRelease(added, { row, releaseId: row.mbReleaseId, isNew: true, dryRun });
    }

    /** Another client added the artist between our lookup and our POST. */
    private async resolveAddRace(row: ImportRow, mbArtistId: string): Promise<ImportStatus> {
        logger.debug(`Artist ${row.artist} was added concurrently; reloading artists`);
        await this.refreshArtists();
        const existing = this.findExistingArtist({ artist: row.artist, mbArtistId });
        if (!existing) {
            return "pending_refresh";
        }
        if (!row.mbReleaseId) {
            return "skip_album_mb_noresults";
        }
        return this.monitorRelease(existing, { row, releaseId: row.mbReleaseId, isNew: false, dryRun: false });
    }

    private findTargetAlbum(albums: LidarrAlbum[], row: ImportRow, releaseId: string): LidarrAlbum | undefined {
        const byId = albums.find((album) => album.foreignAlbumId === releaseId);
        if (byId) {
            return byId;
        }

        const wanted = normalizeAlbumTitleForMatching(row.albumSearch ?? row.album);
        let best: LidarrAlbum | undefined;
        let bestScore = 0;
        for (const album of albums) {
            const score = fuzz.token_sort_ratio(wanted, normalizeAlbumTitleForMatching(album.title));
            if (score >= ALBUM_TITLE_MATCH_THRESHOLD && score > bestScore) {
                best = album;
                bestScore = score;
            }
        }
        return best;
    }

    private async unmonitorAll(albums: LidarrAlbum[]): Promise<void> {
        for (const album of albums) {
            if (album.monitored) {
                await this.lidarr.setAlbumMonitored(album, false);
            }
        }
    }

    /**
     * Selective monitoring: the requested release group ends up the only
     * monitored album of the artist.
     */
    private async monitorRelease(artist: LidarrArtist, context: MonitorContext): Promise<ImportStatus> {
        const { row, releaseId, isNew, dryRun } = context;
        const done: ImportStatus = isNew ? "artist_added" : "success";
        const albums = await this.lidarr.listAlbums(artist.id);
        const target = this.findTargetAlbum(albums, row, releaseId);

        if (target) {
            if (dryRun) {
                return target.monitored ? "already_monitored" : done;
            }
            await this.unmonitorAll(albums.filter((album) => album.id !== target.id));
            if (target.monitored && !isNew) {
                return "already_monitored";
            }
            if (!target.monitored) {
                await this.lidarr.setAlbumMonitored(target, true);
            }
            await this.lidarr.runCommand("AlbumSearch", { albumIds: [target.id] });
            return done;
        }

        const lookups = await this.lidarr.lookupAlbum(releaseId);
        const lookup = lookups.find((album) => album.foreignAlbumId === releaseId) ?? lookups[0];
        if (!lookup) {
            if (isNew || albums.length === 0) {
                if (!dryRun) {
                    await this.lidarr.runCommand("RefreshArtist", { artistId: artist.id });
                }
                return "pending_refresh";
            }
            return "skip_album_mb_noresults";
        }

        if (dryRun) {
            return done;
        }

        await this.unmonitorAll(albums);
        try {
            const added = await this.lidarr.addAlbum(lookup, artist, {
                monitored: true,
                searchForMissingAlbums: true,
            });
            return added.id === undefined ? "pending_import" : done;
        } catch (error) {
            if (isAlreadyExistsError(error)) {
                return "already_monitored";
            }
            throw error;
        }
    }

    async run(csvPath: string, options: ImportRunOptions = {}): Promise<ImportSummary> {
        const startedAt = Date.now();
        const batchSize = Math.max(1, options.batchSize ?? this.pacing.batchSize);
        const progressInterval = Math.max(1, options.progressInterval ?? DEFAULT_PROGRESS_INTERVAL);
        this.stopRequested = false;

        const store = await ImportCsvStore.load(csvPath);
        if (!store.hasMusicBrainzColumns()) {
            throw new ValidationError(
                ErrorCode.MISSING_MUSICBRAINZ_IDS,
                `${csvPath} has no mb_artist_id / mb_release_id columns. Re-run the parser with MusicBrainz enrichment or add the ids.`
            );
        }

        const invalidLines = store.invalidLines();
        if (invalidLines.length > 0) {
            logger.warn(
                `Skipping ${invalidLines.length} row(s) without artist or album (lines ${invalidLines.join(", ")})`
            );
        }

        const allRows = store.rows();
        await this.refreshArtists();
        const { rows, removed } = applyItemFilters(allRows, {
            ...options,
            existingArtistNames: this.artists.map((artist) => artist.artistName),
        });

        logger.info(
            `Processing ${rows.length} of ${allRows.length} rows${options.dryRun ? " (dry run)" : ""}`
        );

        const counts: Partial<Record<ImportStatus, number>> = {};
        let processed = 0;
        const batches = chunkArray(rows, batchSize);

        for (const [batchIndex, batch] of batches.entries()) {
            for (const row of batch) {
                if (this.stopRequested) {
                    break;
                }

                const status = await this.processRow(row, { dryRun: options.dryRun });
                counts[status] = (counts[status] ?? 0) + 1;
                processed += 1;
                await store.updateStatus(row.rowId, status);
                logger.info(`[${processed}/${rows.length}] ${row.artist} - ${row.album}: ${status}`);

                if (processed % progressInterval === 0) {
                    logger.info(`Progress: ${processed}/${rows.length} rows processed`, counts);
                }
                if (isTransportStatus(status)) {
                    await this.wait(this.pacing.apiErrorDelayMs);
                }
            }

            if (this.stopRequested) {
                logger.warn(`Stopped after ${processed} rows; rerun to resume`);
                break;
            }
            const isLastBatch = batchIndex === batches.length - 1;
            if (!isLastBatch && !options.noBatchPause && this.pacing.batchPauseMs > 0) {
                logger.debug(`Batch ${batchIndex + 1}/${batches.length} done; pausing ${this.pacing.batchPauseMs}ms`);
                await this.wait(this.pacing.batchPauseMs);
            }
        }

        return {
            counts,
            processed,
            selected: rows.length,
            skippedByFilters: allRows.length - rows.length,
            removed,
            invalidRows: invalidLines.length,
            interrupted: this.stopRequested,
            durationMs: Date.now() - startedAt,
        };
    }
}
