import * as fs from "fs/promises";
import { stringify } from "csv-stringify/sync";
import { wrapNodeError } from "./errors";

export type CsvRecord = Record<string, string>;

/**
 * Writes `records` under `columns` to a sibling temp file, then renames it
 * over `filePath` so readers never see a half-written CSV.
 */
export async function writeCsvAtomic(
    filePath: string,
    columns: string[],
    records: CsvRecord[]
): Promise<void> {
    const body = stringify(records, { header: true, columns });
    const content = body.length > 0 ? body : stringify([columns]);
    const tempPath = `${filePath}.tmp`;

    try {
        await fs.writeFile(tempPath, content, "utf-8");
        await fs.rename(tempPath, filePath);
    } catch (err) {
        await fs.rm(tempPath, { force: true });
        throw wrapNodeError(err, filePath, "write");
    }
}

export async function readTextFile(filePath: string): Promise<string> {
    try {
        return await fs.readFile(filePath, "utf-8");
    } catch (err) {
        throw wrapNodeError(err, filePath, "read");
    }
}

export function formatRowId(sequence: number): string {
    return `r${String(sequence).padStart(5, "0")}`;
}

/**
 * Hands out `r00001`-style row ids that do not collide with ids already
 * present in a file.
 */
export class RowIdAllocator {
    private readonly used = new Set<string>();
    private next = 1;

    reserve(id: string): void {
        this.used.add(id);
    }

    allocate(): string {
        let id = formatRowId(this.next++);
        while (this.used.has(id)) {
            id = formatRowId(this.next++);
        }
        this.used.add(id);
        return id;
    }
}
