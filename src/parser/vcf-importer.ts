import { EventEmitter } from 'events';
import { promises as fs } from 'fs';
import * as path from 'path';
import { VCFParser, MalformedLineEvent, VariantLineEvent } from './vcf-parser.js';
import type { VariantStore } from '../db/variant-store.js';
import type { Logger } from '../utils/logger.js';

export interface ImportStats {
    filePath: string;
    patientId: number | null;
    rejected: boolean;
    inserted: number;
    skipped: number;
    malformed: number;
}

export interface SkippedVariantEvent {
    patientId: number;
    variantNumber: number;
    lineNumber: number;
}

const PATIENT_STEM = /^patient(\d+)$/i;
const VCF_EXTENSIONS = ['.vcf', '.vcf.gz'];

/**
 * Patient id encoded in a file name such as "Patient7.vcf". The stem must be
 * "patient" followed by digits and nothing else; anything else yields null.
 */
export function patientIdFromFilename(filePath: string): number | null {
    const base = path.basename(filePath).replace(/\.gz$/i, '');
    const stem = path.parse(base).name;
    const match = PATIENT_STEM.exec(stem);
    if (!match) return null;

    const patientId = parseInt(match[1], 10);
    return patientId > 0 ? patientId : null;
}

export function isVCFFile(fileName: string): boolean {
    const lower = fileName.toLowerCase();
    return VCF_EXTENSIONS.some(ext => lower.endsWith(ext));
}

/**
 * Loads per-patient pseudo-VCF files into the inputs table. Rows already
 * present for (patient, ordinal) are skipped, never rewritten.
 *
 * Events: 'rejected' (ImportStats), 'skip' (SkippedVariantEvent),
 * 'malformed' (MalformedLineEvent), 'complete' (ImportStats).
 */
export class VCFImporter extends EventEmitter {
    constructor(
        private readonly store: VariantStore,
        private readonly logger: Logger
    ) {
        super();
    }

    async importFile(filePath: string): Promise<ImportStats> {
        const patientId = patientIdFromFilename(filePath);
        const stats: ImportStats = {
            filePath,
            patientId,
            rejected: patientId === null,
            inserted: 0,
            skipped: 0,
            malformed: 0,
        };

        if (patientId === null) {
            this.logger.warn(`Skipping non-patient VCF: ${filePath}`);
            this.emit('rejected', stats);
            return stats;
        }

        this.logger.info(`Loading variants for Patient ${patientId} from ${filePath}`);

        const parser = new VCFParser();
        parser.on('record', ({ ordinal, lineNumber, record }: VariantLineEvent) => {
            if (this.store.hasInput(patientId, ordinal)) {
                stats.skipped++;
                this.logger.info(`Skipping duplicate: Patient ${patientId}, Variant ${ordinal}`);
                const event: SkippedVariantEvent = { patientId, variantNumber: ordinal, lineNumber };
                this.emit('skip', event);
                return;
            }

            this.store.insertInput({
                patientId,
                variantNumber: ordinal,
                chrom: record.chrom,
                pos: record.pos,
                id: record.id,
                ref: record.ref,
                alt: record.alt,
            });
            stats.inserted++;
        });

        parser.on('malformed', (event: MalformedLineEvent) => {
            stats.malformed++;
            this.logger.warn(`Skipping malformed line in ${filePath}: ${event.error.message}`, {
                patientId,
                variantNumber: event.ordinal,
            });
            this.emit('malformed', event);
        });

        await parser.parseFile(filePath);

        this.logger.info(
            `Finished Patient ${patientId}: ${stats.inserted} inserted, ${stats.skipped} skipped` +
            (stats.malformed > 0 ? `, ${stats.malformed} malformed` : '') + '.'
        );
        this.emit('complete', stats);
        return stats;
    }

    /** Every .vcf / .vcf.gz file directly inside a directory, in name order. */
    async importDirectory(directory: string): Promise<ImportStats[]> {
        const entries = await fs.readdir(directory, { withFileTypes: true });
        const files = entries
            .filter(entry => entry.isFile() && isVCFFile(entry.name))
            .map(entry => entry.name)
            .sort();

        const results: ImportStats[] = [];
        for (const name of files) {
            results.push(await this.importFile(path.join(directory, name)));
        }
        return results;
    }

    async importPaths(paths: string[]): Promise<ImportStats[]> {
        const results: ImportStats[] = [];
        for (const target of paths) {
            const info = await fs.stat(target);
            if (info.isDirectory()) {
                results.push(...await this.importDirectory(target));
            } else {
                results.push(await this.importFile(target));
            }
        }
        return results;
    }
}
