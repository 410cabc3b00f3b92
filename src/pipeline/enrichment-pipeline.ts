import { EventEmitter } from 'events';
import type { ClinicalAnnotation } from '../clinvar/summary-extractor.js';
import { notFoundAnnotation } from '../clinvar/summary-extractor.js';
import type { OutputRecord, VariantRecord, VariantSource } from '../db/variant-store.js';
import type { CoordinateQuery, HgvsResolution } from '../hgvs/hgvs-resolver.js';
import { describeVariant } from '../hgvs/hgvs-resolver.js';
import { variantChanges } from '../hgvs/notation.js';
import { describeError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';

export interface CoordinateResolver {
    resolve(query: CoordinateQuery): Promise<HgvsResolution | null>;
}

export interface AnnotationResolver {
    annotate(hgvs: string | null): Promise<ClinicalAnnotation>;
}

export interface OutputSink {
    write(row: EnrichedOutputRow): void | Promise<void>;
    close?(): void | Promise<void>;
}

/** Input identity + HGVS resolution + ClinVar annotation for one variant. */
export interface EnrichedOutputRow {
    record: VariantRecord;
    variantDescription: string;
    resolution: HgvsResolution | null;
    annotation: ClinicalAnnotation;
}

export interface EnrichmentStats {
    total: number;
    written: number;
    notFound: number;
    failed: number;
    elapsedTime: number;
}

export interface VariantFailureEvent {
    record: VariantRecord;
    variantDescription: string;
    error: unknown;
}

export interface EnrichmentPipelineOptions {
    resolver: CoordinateResolver;
    annotator: AnnotationResolver;
    logger: Logger;
    genomeBuild?: string;
}

export function toOutputRecord(row: EnrichedOutputRow): OutputRecord {
    const { record, resolution, annotation } = row;
    const hgvs = resolution?.hgvsGenomic ?? null;
    const maneSelect = resolution?.maneSelectTranscript ?? null;
    const changes = variantChanges(hgvs, resolution?.transcriptProtein ?? null, maneSelect);

    return {
        patientId: record.patientId,
        variantNumber: record.variantNumber,
        hgvs,
        clinvarId: annotation.clinvarId,
        clinicalSignificance: annotation.clinicalSignificance,
        starRating: annotation.starRating,
        reviewStatus: annotation.reviewStatus,
        conditionsAssoc: annotation.conditionsAssoc,
        transcript: annotation.transcript ?? maneSelect,
        refSeqId: annotation.refSeqId,
        hgncId: annotation.hgncId,
        omimId: annotation.omimId,
        geneSymbol: annotation.geneSymbol,
        gChange: changes.gChange,
        cChange: changes.cChange,
        pChange: changes.pChange,
    };
}

/**
 * Runs each stored variant through HGVS resolution and ClinVar annotation,
 * one at a time, and hands the merged row to every sink. A failing variant
 * is logged and skipped (no row written); the run carries on.
 *
 * Events: 'start' ({ total }), 'variant' (EnrichedOutputRow),
 * 'variant-error' (VariantFailureEvent), 'complete' (EnrichmentStats).
 */
export class EnrichmentPipeline extends EventEmitter {
    constructor(private readonly options: EnrichmentPipelineOptions) {
        super();
    }

    async enrichRecord(record: VariantRecord): Promise<EnrichedOutputRow> {
        const query: CoordinateQuery = {
            chrom: record.chrom,
            pos: record.pos,
            ref: record.ref,
            alt: record.alt,
            genomeBuild: this.options.genomeBuild,
        };
        const variantDescription = describeVariant(query);

        const resolution = await this.options.resolver.resolve(query);
        const hgvs = resolution?.hgvsGenomic ?? null;

        // No HGVS name means nothing to search ClinVar for
        const annotation = hgvs
            ? await this.options.annotator.annotate(hgvs)
            : notFoundAnnotation(null);

        return { record, variantDescription, resolution, annotation };
    }

    async run(source: VariantSource, sinks: OutputSink[], patientId?: number): Promise<EnrichmentStats> {
        const startTime = Date.now();
        const records = source.listInputs(patientId);
        const stats: EnrichmentStats = { total: records.length, written: 0, notFound: 0, failed: 0, elapsedTime: 0 };
        const { logger } = this.options;

        this.emit('start', { total: records.length });
        logger.info(`Enriching ${records.length} variants` + (patientId !== undefined ? ` for Patient ${patientId}` : ''));

        try {
            for (const record of records) {
                let row: EnrichedOutputRow;
                try {
                    row = await this.enrichRecord(record);
                } catch (error) {
                    stats.failed++;
                    const variantDescription = describeVariant(record);
                    logger.error(`Failed to enrich variant: ${describeError(error)}`, {
                        patientId: record.patientId,
                        variantNumber: record.variantNumber,
                        variant: variantDescription,
                    });
                    const event: VariantFailureEvent = { record, variantDescription, error };
                    this.emit('variant-error', event);
                    continue;
                }

                for (const sink of sinks) {
                    await sink.write(row);
                }
                stats.written++;
                if (!row.annotation.found) {
                    stats.notFound++;
                }
                this.emit('variant', row);
            }
        } finally {
            for (const sink of sinks) {
                await sink.close?.();
            }
        }

        stats.elapsedTime = Date.now() - startTime;
        logger.info(
            `Enrichment finished: ${stats.written} written, ${stats.notFound} not found in ClinVar, ${stats.failed} failed`
        );
        this.emit('complete', stats);
        return stats;
    }
}
