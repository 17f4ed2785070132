import { parse } from "csv-parse/sync";
import { z } from "zod";

export type CsvDelimiter = "," | "\t";

const rowsSchema = z.array(z.array(z.string()));

/**
 * Parses delimited text into rows of cells. Records csv-parse cannot read are
 * skipped; blank lines are dropped.
 */
export function parseCsvRows(text: string, delimiter: CsvDelimiter = ","): string[][] {
    const records: unknown = parse(text, {
        delimiter,
        bom: true,
        relax_column_count: true,
        relax_quotes: true,
        skip_empty_lines: true,
        skip_records_with_error: true,
    });
    return rowsSchema.parse(records);
}

/**
 * Parses delimited text keeping every record and every cell, however many
 * cells a record has. Throws csv-parse's error when a record cannot be read.
 */
export function parseCsvTable(text: string, delimiter: CsvDelimiter = ","): string[][] {
    const records: unknown = parse(text, {
        delimiter,
        bom: true,
        relax_column_count: true,
        relax_quotes: true,
        skip_empty_lines: true,
    });
    return rowsSchema.parse(records);
}

/**
 * Splits a single line into cells, falling back to a plain split when the
 * line is not valid CSV (e.g. an unbalanced quote).
 */
export function splitCsvLine(line: string, delimiter: CsvDelimiter = ","): string[] {
    try {
        return parseCsvRows(line, delimiter)[0] ?? [];
    } catch {
        return line.split(delimiter);
    }
}

export function guessDelimiter(headerLine: string): CsvDelimiter {
    return headerLine.includes("\t") && !headerLine.includes(",") ? "\t" : ",";
}

/**
 * "Artist_Name", "artistName" and " ARTIST  NAME " all become "artist name".
 */
export function normalizeHeader(cell: string): string {
    return cell
        .replace(/^\uFEFF/, "")
        .replace(/([a-z])([A-Z])/g, "$1 $2")
        .replace(/_/g, " ")
        .replace(/\s+/g, " ")
        .trim()
        .toLowerCase();
}
