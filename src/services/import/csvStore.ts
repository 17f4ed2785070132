import { CsvRecord, RowIdAllocator, readTextFile, writeCsvAtomic } from "../../utils/csvFile";
import { ErrorCode, ValidationError } from "../../utils/errors";
import { createLogger } from "../../utils/logger";
import { parseCsvTable } from "../parser/csvRows";
import { ImportStatus, parseImportStatus } from "./status";

const logger = createLogger("ImportCsv");

export const ROW_ID_COLUMN = "row_id";
export const STATUS_COLUMN = "status";
/** Header given to cells beyond the last named column: extra_1, extra_2, ... */
export const EXTRA_COLUMN_PREFIX = "extra_";

export interface ImportRow {
    /** Stable row identity; see ImportCsvStore.updateStatus */
    rowId: string;
    artist: string;
    album: string;
    albumSearch?: string;
    mbArtistId?: string;
    mbReleaseId?: string;
    status: ImportStatus | null;
    /** 1-based line of the record in the file, header excluded */
    line: number;
}

export function legacyRowKey(artist: string, album: string): string {
    return `${artist}|${album}`;
}

function canonical(name: string): string {
    return name.trim().toLowerCase();
}

function readTable(text: string, filePath: string): string[][] {
    try {
        return parseCsvTable(text);
    } catch (error) {
        throw new ValidationError(
            ErrorCode.INVALID_INPUT,
            `Cannot read ${filePath} as CSV; fix the file before resuming`,
            { filePath, reason: error instanceof Error ? error.message : String(error) }
        );
    }
}

/** Names every cell position, adding extra_N headers for overflow cells. */
function widenHeader(header: string[], rows: string[][]): string[] {
    const columns = [...header];
    const width = Math.max(columns.length, ...rows.map((cells) => cells.length));
    let extra = 1;
    while (columns.length < width) {
        const name = `${EXTRA_COLUMN_PREFIX}${extra++}`;
        if (!columns.some((column) => canonical(column) === name)) {
            columns.push(name);
        }
    }
    return columns;
}

/**
 * The import CSV held in memory. Unknown columns, cells beyond the header
 * and rows without an artist or album are preserved on every rewrite. A
 * file with a record csv-parse cannot read is refused rather than rewritten.
 */
export class ImportCsvStore {
    private constructor(
        readonly filePath: string,
        private readonly columns: string[],
        private readonly records: CsvRecord[],
        private readonly legacy: boolean
    ) {}

    static async load(filePath: string): Promise<ImportCsvStore> {
        const text = await readTextFile(filePath);
        const [rawHeader, ...rawRows] = readTable(text, filePath);
        if (!rawHeader || rawHeader.every((cell) => !cell.trim())) {
            throw new ValidationError(ErrorCode.EMPTY_INPUT, `CSV has no header: ${filePath}`);
        }

        const columns = widenHeader(
            rawHeader.map((cell) => cell.trim()),
            rawRows
        );
        const records = rawRows.map((cells) => {
            const record: CsvRecord = {};
            columns.forEach((column, index) => {
                record[column] = cells[index] ?? "";
            });
            return record;
        });

        const legacy = !columns.some((column) => canonical(column) === ROW_ID_COLUMN);
        const store = new ImportCsvStore(filePath, columns, records, legacy);
        store.assignRowIds();
        logger.debug(`Loaded ${records.length} rows from ${filePath}`, { legacy });
        return store;
    }

    private column(name: string): string | undefined {
        return this.columns.find((column) => canonical(column) === name);
    }

    private cell(record: CsvRecord, name: string): string {
        const column = this.column(name);
        return column ? (record[column] ?? "").trim() : "";
    }

    private ensureColumn(name: string, position: "first" | "last"): string {
        const existing = this.column(name);
        if (existing) {
            return existing;
        }
        if (position === "first") {
            this.columns.unshift(name);
        } else {
            this.columns.push(name);
        }
        return name;
    }

    private assignRowIds(): void {
        const rowIdColumn = this.ensureColumn(ROW_ID_COLUMN, "first");
        const allocator = new RowIdAllocator();
        const seen = new Set<string>();

        for (const record of this.records) {
            const id = (record[rowIdColumn] ?? "").trim();
            if (id) {
                allocator.reserve(id);
            }
        }
        for (const record of this.records) {
            const id = (record[rowIdColumn] ?? "").trim();
            if (!id || seen.has(id)) {
                record[rowIdColumn] = allocator.allocate();
            }
            seen.add(record[rowIdColumn] ?? "");
        }
    }

    /** Whether the file predates the row_id column. */
    get isLegacy(): boolean {
        return this.legacy;
    }

    get header(): readonly string[] {
        return this.columns;
    }

    hasMusicBrainzColumns(): boolean {
        return this.column("mb_artist_id") !== undefined || this.column("mb_release_id") !== undefined;
    }

    /** Rows with both an artist and an album, in file order. */
    rows(): ImportRow[] {
        const rows: ImportRow[] = [];
        this.records.forEach((record, index) => {
            const artist = this.cell(record, "artist");
            const album = this.cell(record, "album");
            if (!artist || !album) {
                return;
            }
            rows.push({
                rowId: this.cell(record, ROW_ID_COLUMN),
                artist,
                album,
                albumSearch: this.cell(record, "album_search") || undefined,
                mbArtistId: this.cell(record, "mb_artist_id") || undefined,
                mbReleaseId: this.cell(record, "mb_release_id") || undefined,
                status: parseImportStatus(this.cell(record, STATUS_COLUMN)),
                line: index + 1,
            });
        });
        return rows;
    }

    /** Lines (1-based, header excluded) missing an artist or album. */
    invalidLines(): number[] {
        const lines: number[] = [];
        this.records.forEach((record, index) => {
            if (!this.cell(record, "artist") || !this.cell(record, "album")) {
                lines.push(index + 1);
            }
        });
        return lines;
    }

    private findRecords(rowKey: string): CsvRecord[] {
        const byId = this.records.filter(
            (record) => this.cell(record, ROW_ID_COLUMN) === rowKey
        );
        if (byId.length > 0) {
            return byId;
        }
        return this.records.filter(
            (record) =>
                legacyRowKey(this.cell(record, "artist"), this.cell(record, "album")) === rowKey
        );
    }

    /**
     * Sets the status of the row whose row_id (or, for rows written before
     * row ids existed, whose `artist|album`) equals `rowKey`, and rewrites
     * the file.
     */
    async updateStatus(rowKey: string, status: ImportStatus): Promise<void> {
        const matches = this.findRecords(rowKey);
        if (matches.length === 0) {
            logger.warn(`No CSV row matches ${rowKey}; status ${status} not saved`);
            return;
        }

        const statusColumn = this.ensureColumn(STATUS_COLUMN, "last");
        for (const record of matches) {
            record[statusColumn] = status;
        }
        await this.save();
    }

    async save(): Promise<void> {
        await writeCsvAtomic(this.filePath, this.columns, this.records);
    }

    /** Count of rows per status value; blank statuses are counted under "". */
    statusSummary(): Record<string, number> {
        const summary: Record<string, number> = {};
        for (const row of this.rows()) {
            const key = row.status ?? "";
            summary[key] = (summary[key] ?? 0) + 1;
        }
        return summary;
    }
}
