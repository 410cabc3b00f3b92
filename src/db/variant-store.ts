import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import * as path from 'path';
import { DROP_TABLES_SQL, SCHEMA_SQL } from './schema.js';

/** One row of `inputs`, keyed by (patientId, variantNumber). */
export interface VariantRecord {
    patientId: number;
    variantNumber: number;
    chrom: string;
    pos: number;
    id: string | null;
    ref: string;
    alt: string;
}

/** One row of `outputs`. */
export interface OutputRecord {
    patientId: number;
    variantNumber: number;
    hgvs: string | null;
    clinvarId: string | null;
    clinicalSignificance: string;
    starRating: string;
    reviewStatus: string;
    conditionsAssoc: string;
    transcript: string | null;
    refSeqId: string | null;
    hgncId: string | null;
    omimId: string | null;
    geneSymbol: string | null;
    gChange: string | null;
    cChange: string | null;
    pChange: string | null;
}

type OutputFields = Omit<OutputRecord, 'patientId' | 'variantNumber'>;

/** inputs LEFT JOIN outputs: output columns are null until a variant is enriched. */
export type JoinedVariantRow = VariantRecord & { [K in keyof OutputFields]: OutputFields[K] | null } & {
    analysedAt: string | null;
};

export interface VariantSource {
    listInputs(patientId?: number): VariantRecord[];
}

const INPUT_COLUMNS = `
    patient_id AS patientId,
    variant_number AS variantNumber,
    chrom, pos, id, ref, alt`;

const JOINED_SELECT = `
    SELECT
        i.patient_id AS patientId,
        i.variant_number AS variantNumber,
        i.chrom, i.pos, i.id, i.ref, i.alt,
        o.hgvs,
        o.clinvar_id AS clinvarId,
        o.clinical_significance AS clinicalSignificance,
        o.star_rating AS starRating,
        o.review_status AS reviewStatus,
        o.conditions_assoc AS conditionsAssoc,
        o.transcript,
        o.ref_seq_id AS refSeqId,
        o.hgnc_id AS hgncId,
        o.omim_id AS omimId,
        o.gene_symbol AS geneSymbol,
        o.g_change AS gChange,
        o.c_change AS cChange,
        o.p_change AS pChange,
        o.analysed_at AS analysedAt
    FROM inputs AS i
    LEFT JOIN outputs AS o
        ON i.patient_id = o.patient_id
       AND i.variant_number = o.variant_number`;

/**
 * SQLite persistence for ingested variants and their enrichment results.
 * Inputs are append-only; outputs are upserted.
 */
export class VariantStore implements VariantSource {
    constructor(private readonly db: Database.Database) {
        this.db.pragma('foreign_keys = ON');
    }

    static open(databasePath: string): VariantStore {
        if (databasePath !== ':memory:') {
            mkdirSync(path.dirname(path.resolve(databasePath)), { recursive: true });
        }
        return new VariantStore(new Database(databasePath));
    }

    initSchema(options: { reset?: boolean } = {}): void {
        if (options.reset) {
            this.db.exec(DROP_TABLES_SQL);
        }
        this.db.exec(SCHEMA_SQL);
    }

    hasInput(patientId: number, variantNumber: number): boolean {
        const row = this.db
            .prepare<[number, number], { present: number }>(
                'SELECT 1 AS present FROM inputs WHERE patient_id = ? AND variant_number = ?'
            )
            .get(patientId, variantNumber);
        return row !== undefined;
    }

    insertInput(record: VariantRecord): void {
        this.db
            .prepare<[number, number, string, number, string | null, string, string]>(
                `INSERT INTO inputs (patient_id, variant_number, chrom, pos, id, ref, alt)
                 VALUES (?, ?, ?, ?, ?, ?, ?)`
            )
            .run(
                record.patientId,
                record.variantNumber,
                record.chrom,
                record.pos,
                record.id,
                record.ref,
                record.alt
            );
    }

    /** Manual entry of one input row; refuses to overwrite an existing key. */
    addInput(record: VariantRecord): void {
        if (this.hasInput(record.patientId, record.variantNumber)) {
            throw new Error(
                `Variant ${record.variantNumber} already exists for patient ${record.patientId}`
            );
        }
        this.insertInput(record);
    }

    getInput(patientId: number, variantNumber: number): VariantRecord | undefined {
        return this.db
            .prepare<[number, number], VariantRecord>(
                `SELECT ${INPUT_COLUMNS} FROM inputs WHERE patient_id = ? AND variant_number = ?`
            )
            .get(patientId, variantNumber);
    }

    listInputs(patientId?: number): VariantRecord[] {
        const filter = patientId ?? null;
        return this.db
            .prepare<[number | null, number | null], VariantRecord>(
                `SELECT ${INPUT_COLUMNS} FROM inputs
                 WHERE (? IS NULL OR patient_id = ?)
                 ORDER BY patient_id, variant_number`
            )
            .all(filter, filter);
    }

    upsertOutput(output: OutputRecord): void {
        this.db
            .prepare(
                `INSERT INTO outputs (
                    patient_id, variant_number, hgvs, clinvar_id, clinical_significance,
                    star_rating, review_status, conditions_assoc, transcript, ref_seq_id,
                    hgnc_id, omim_id, gene_symbol, g_change, c_change, p_change
                 ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
                 ON CONFLICT (patient_id, variant_number) DO UPDATE SET
                    hgvs = excluded.hgvs,
                    clinvar_id = excluded.clinvar_id,
                    clinical_significance = excluded.clinical_significance,
                    star_rating = excluded.star_rating,
                    review_status = excluded.review_status,
                    conditions_assoc = excluded.conditions_assoc,
                    transcript = excluded.transcript,
                    ref_seq_id = excluded.ref_seq_id,
                    hgnc_id = excluded.hgnc_id,
                    omim_id = excluded.omim_id,
                    gene_symbol = excluded.gene_symbol,
                    g_change = excluded.g_change,
                    c_change = excluded.c_change,
                    p_change = excluded.p_change,
                    analysed_at = CURRENT_TIMESTAMP`
            )
            .run(
                output.patientId,
                output.variantNumber,
                output.hgvs,
                output.clinvarId,
                output.clinicalSignificance,
                output.starRating,
                output.reviewStatus,
                output.conditionsAssoc,
                output.transcript,
                output.refSeqId,
                output.hgncId,
                output.omimId,
                output.geneSymbol,
                output.gChange,
                output.cChange,
                output.pChange
            );
    }

    listJoined(patientId?: number): JoinedVariantRow[] {
        const filter = patientId ?? null;
        return this.db
            .prepare<[number | null, number | null], JoinedVariantRow>(
                `${JOINED_SELECT}
                 WHERE (? IS NULL OR i.patient_id = ?)
                 ORDER BY i.patient_id, i.variant_number`
            )
            .all(filter, filter);
    }

    getJoined(patientId: number, variantNumber: number): JoinedVariantRow | undefined {
        return this.db
            .prepare<[number, number], JoinedVariantRow>(
                `${JOINED_SELECT} WHERE i.patient_id = ? AND i.variant_number = ?`
            )
            .get(patientId, variantNumber);
    }

    countInputs(): number {
        const row = this.db.prepare<[], { total: number }>('SELECT COUNT(*) AS total FROM inputs').get();
        return row?.total ?? 0;
    }

    countOutputs(): number {
        const row = this.db.prepare<[], { total: number }>('SELECT COUNT(*) AS total FROM outputs').get();
        return row?.total ?? 0;
    }

    close(): void {
        this.db.close();
    }
}
