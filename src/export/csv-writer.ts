import { once } from 'events';
import { createWriteStream, mkdirSync, WriteStream } from 'fs';
import * as path from 'path';
import type { JoinedVariantRow } from '../db/variant-store.js';

export type CsvCell = string | number | null | undefined;

/** Column order of every CSV this tool writes. */
export const EXPORT_COLUMNS = [
    ['patient_id', 'patientId'],
    ['variant_number', 'variantNumber'],
    ['chrom', 'chrom'],
    ['pos', 'pos'],
    ['id', 'id'],
    ['ref', 'ref'],
    ['alt', 'alt'],
    ['hgvs', 'hgvs'],
    ['clinvar_id', 'clinvarId'],
    ['clinical_significance', 'clinicalSignificance'],
    ['star_rating', 'starRating'],
    ['review_status', 'reviewStatus'],
    ['conditions_assoc', 'conditionsAssoc'],
    ['transcript', 'transcript'],
    ['ref_seq_id', 'refSeqId'],
    ['hgnc_id', 'hgncId'],
    ['omim_id', 'omimId'],
    ['gene_symbol', 'geneSymbol'],
    ['g_change', 'gChange'],
    ['c_change', 'cChange'],
    ['p_change', 'pChange'],
] as const satisfies ReadonlyArray<readonly [string, keyof JoinedVariantRow]>;

export type ExportRow = Omit<JoinedVariantRow, 'analysedAt'>;

export function escapeCsvCell(value: CsvCell): string {
    if (value === null || value === undefined) return '';
    const textValue = String(value);
    return /[",\r\n]/.test(textValue) ? `"${textValue.replace(/"/g, '""')}"` : textValue;
}

export function formatCsvLine(cells: CsvCell[]): string {
    return `${cells.map(escapeCsvCell).join(',')}\n`;
}

export function csvHeader(): string {
    return formatCsvLine(EXPORT_COLUMNS.map(([header]) => header));
}

export function csvLine(row: ExportRow): string {
    return formatCsvLine(EXPORT_COLUMNS.map(([, key]) => row[key]));
}

export function toCsv(rows: ExportRow[]): string {
    return csvHeader() + rows.map(csvLine).join('');
}

/**
 * Streams rows to a CSV file; the header is written on open. A stream error
 * (unwritable path, full disk) is kept and rethrown by the next `writeRow` or
 * `close`.
 */
export class CsvFileWriter {
    private readonly stream: WriteStream;
    private failure: Error | null = null;
    private rowCount = 0;

    constructor(readonly filePath: string) {
        mkdirSync(path.dirname(path.resolve(filePath)), { recursive: true });
        this.stream = createWriteStream(filePath, { encoding: 'utf8' });
        this.stream.on('error', error => {
            this.failure = error;
        });
        this.stream.write(csvHeader());
    }

    async writeRow(row: ExportRow): Promise<void> {
        this.throwIfFailed();
        if (!this.stream.write(csvLine(row))) {
            await once(this.stream, 'drain');
        }
        this.rowCount++;
    }

    get rowsWritten(): number {
        return this.rowCount;
    }

    async close(): Promise<void> {
        this.throwIfFailed();
        await new Promise<void>((resolve, reject) => {
            this.stream.once('error', reject);
            this.stream.once('finish', () => resolve());
            this.stream.end();
        });
    }

    private throwIfFailed(): void {
        if (this.failure) {
            throw this.failure;
        }
    }
}
