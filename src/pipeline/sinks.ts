import type { VariantStore } from '../db/variant-store.js';
import { CsvFileWriter, ExportRow } from '../export/csv-writer.js';
import { EnrichedOutputRow, OutputSink, toOutputRecord } from './enrichment-pipeline.js';

export function toExportRow(row: EnrichedOutputRow): ExportRow {
    const { patientId, variantNumber, ...output } = toOutputRecord(row);
    return {
        ...row.record,
        ...output,
        patientId,
        variantNumber,
    };
}

/** Upserts into `outputs`; re-running a variant overwrites its previous row. */
export class DatabaseSink implements OutputSink {
    constructor(private readonly store: VariantStore) {}

    write(row: EnrichedOutputRow): void {
        this.store.upsertOutput(toOutputRecord(row));
    }
}

export class CsvSink implements OutputSink {
    private readonly writer: CsvFileWriter;

    constructor(filePath: string) {
        this.writer = new CsvFileWriter(filePath);
    }

    async write(row: EnrichedOutputRow): Promise<void> {
        await this.writer.writeRow(toExportRow(row));
    }

    async close(): Promise<void> {
        await this.writer.close();
    }
}
