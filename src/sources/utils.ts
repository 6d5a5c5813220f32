import { readFileSync } from 'node:fs';
import { ConfigError } from '../errors.js';
import { getLogger } from '../utils/logger.js';

/**
 * Strip DOI prefix URLs to get just the DOI identifier.
 * "https://doi.org/10.1234/test" → "10.1234/test"
 */
export function stripDoiPrefix(doi: string | null | undefined): string | null {
    if (!doi) return null;
    return doi
        .trim()
        .replace(/^https?:\/\/(dx\.)?doi\.org\//i, '')
        .trim() || null;
}

/**
 * Split CSV text into rows. Handles quoted fields, doubled quotes and
 * newlines inside quotes.
 */
export function parseCsv(text: string): string[][] {
    const rows: string[][] = [];
    let row: string[] = [];
    let field = '';
    let inQuotes = false;

    for (let i = 0; i < text.length; i++) {
        const ch = text[i];

        if (inQuotes) {
            if (ch === '"') {
                if (text[i + 1] === '"') {
                    field += '"';
                    i++;
                } else {
                    inQuotes = false;
                }
            } else {
                field += ch;
            }
            continue;
        }

        if (ch === '"') {
            inQuotes = true;
        } else if (ch === ',') {
            row.push(field);
            field = '';
        } else if (ch === '\n' || ch === '\r') {
            if (ch === '\r' && text[i + 1] === '\n') i++;
            row.push(field);
            rows.push(row);
            row = [];
            field = '';
        } else {
            field += ch;
        }
    }

    if (field.length > 0 || row.length > 0) {
        row.push(field);
        rows.push(row);
    }

    return rows;
}

/**
 * Read DOIs from one column of a CSV file with a header row.
 * Blank values are dropped.
 */
export function readDoisFromCsv(csvFile: string, column = 'doi'): string[] {
    const text = readFileSync(csvFile, 'utf-8').replace(/^\uFEFF/, '');
    const [header, ...rows] = parseCsv(text);

    const columnIndex = header?.indexOf(column) ?? -1;
    if (columnIndex < 0) {
        throw new ConfigError(`Column "${column}" not found in ${csvFile}`);
    }

    const dois: string[] = [];
    for (const row of rows) {
        const doi = stripDoiPrefix(row[columnIndex]);
        if (doi) dois.push(doi);
    }

    getLogger().info({ count: dois.length, csvFile }, 'Read DOIs from CSV');
    return dois;
}

export interface DoiInput {
    dois?: string[];
    csv?: string;
    column?: string;
    limit?: number;
}

/**
 * DOIs from the command line, else from a CSV file, truncated to `limit`.
 */
export function collectDois(input: DoiInput): string[] {
    let dois: string[];

    if (input.dois?.length) {
        dois = input.dois.map(stripDoiPrefix).filter((d): d is string => d !== null);
    } else if (input.csv) {
        dois = readDoisFromCsv(input.csv, input.column);
    } else {
        throw new ConfigError('Must provide --doi or --csv');
    }

    if (input.limit !== undefined && input.limit > 0) {
        dois = dois.slice(0, input.limit);
    }

    return dois;
}
