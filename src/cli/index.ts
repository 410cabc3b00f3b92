#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { config } from '../config/index.js';
import { VariantStore } from '../db/variant-store.js';
import { CsvFileWriter, ExportRow } from '../export/csv-writer.js';
import { describeVariant } from '../hgvs/hgvs-resolver.js';
import { VariantMCPServer } from '../mcp-server/server.js';
import { VCFImporter, ImportStats } from '../parser/vcf-importer.js';
import { EnrichedOutputRow, EnrichmentStats, OutputSink, VariantFailureEvent } from '../pipeline/enrichment-pipeline.js';
import { createEnrichmentPipeline } from '../pipeline/factory.js';
import { CsvSink, DatabaseSink, toExportRow } from '../pipeline/sinks.js';
import { describeError } from '../utils/errors.js';
import { ConsoleLogger } from '../utils/logger.js';
import { EnrichmentProgress } from '../utils/progress.js';

const logger = new ConsoleLogger(config.logging.level);

function parsePositiveInt(value: string): number {
    if (!/^\d+$/.test(value) || parseInt(value, 10) <= 0) {
        throw new InvalidArgumentError('Expected a positive integer.');
    }
    return parseInt(value, 10);
}

function fail(prefix: string, error: unknown): never {
    console.error(chalk.red(`❌ ${prefix}:`), describeError(error));
    process.exit(1);
}

/** Opens the configured database, makes sure the schema exists, and always closes it. */
async function withStore<T>(action: (store: VariantStore) => Promise<T> | T): Promise<T> {
    const store = VariantStore.open(config.database.path);
    try {
        store.initSchema();
        return await action(store);
    } finally {
        store.close();
    }
}

function printRow(row: ExportRow): void {
    console.log(chalk.green(`Patient ${row.patientId} #${row.variantNumber}  ${describeVariant(row)}`));
    if (row.hgvs === null && row.clinicalSignificance === null) {
        console.log(chalk.gray('  not analysed yet'));
        return;
    }
    console.log(chalk.gray(`  HGVS: ${row.hgvs ?? 'N/A'}`));
    console.log(`  Clinical significance: ${chalk.yellow(row.clinicalSignificance ?? 'N/A')} (${row.starRating ?? 'N/A'}★)`);
    console.log(chalk.gray(`  Review status: ${row.reviewStatus ?? 'N/A'}`));
    console.log(chalk.gray(`  Conditions: ${row.conditionsAssoc ?? 'N/A'}`));
    console.log(chalk.gray(`  Gene: ${row.geneSymbol ?? 'N/A'}  Transcript: ${row.transcript ?? 'N/A'}`));
    console.log(chalk.gray(`  Changes: ${[row.gChange, row.cChange, row.pChange].filter(Boolean).join(' | ') || 'N/A'}`));
}

function printImportSummary(results: ImportStats[]): void {
    const accepted = results.filter(r => !r.rejected);
    const inserted = accepted.reduce((sum, r) => sum + r.inserted, 0);
    const skipped = accepted.reduce((sum, r) => sum + r.skipped, 0);
    const malformed = accepted.reduce((sum, r) => sum + r.malformed, 0);

    console.log(chalk.green(`✅ Loaded ${accepted.length} patient file(s)`));
    console.log(chalk.gray(`📊 Inserted: ${inserted}, duplicates skipped: ${skipped}, malformed lines: ${malformed}`));
    if (accepted.length < results.length) {
        console.log(chalk.yellow(`⚠️  ${results.length - accepted.length} file(s) ignored (not Patient<N>.vcf)`));
    }
}

const program = new Command();

program
    .name('variant-annotator')
    .description('Load per-patient variants, resolve HGVS names and annotate them from ClinVar')
    .version('1.0.0');

program
    .command('init-db')
    .description('Create the inputs/outputs tables')
    .option('--reset', 'Drop existing tables first')
    .action(async (options: { reset?: boolean }) => {
        try {
            const store = VariantStore.open(config.database.path);
            try {
                store.initSchema({ reset: options.reset === true });
            } finally {
                store.close();
            }
            console.log(chalk.green(`✅ Database ready: ${config.database.path}`));
        } catch (error) {
            fail('Error', error);
        }
    });

program
    .command('load')
    .description('Load Patient<N>.vcf files (or directories of them) into the inputs table')
    .argument('<paths...>', 'VCF files or directories')
    .action(async (paths: string[]) => {
        try {
            console.log(chalk.blue('🧬 Loading variant files...'));
            const results = await withStore(store => {
                const importer = new VCFImporter(store, logger);
                return importer.importPaths(paths);
            });
            printImportSummary(results);
        } catch (error) {
            fail('Load failed', error);
        }
    });

program
    .command('annotate')
    .description('Resolve HGVS and ClinVar annotations for stored variants')
    .option('-p, --patient <id>', 'Only this patient', parsePositiveInt)
    .option('--csv <file>', 'Also write results to a CSV file')
    .option('--no-db', 'Do not write results to the outputs table')
    .action(async (options: { patient?: number; csv?: string; db: boolean }) => {
        try {
            const stats = await withStore(async store => {
                const sinks: OutputSink[] = [];
                if (options.db) sinks.push(new DatabaseSink(store));
                if (options.csv) sinks.push(new CsvSink(options.csv));
                if (sinks.length === 0) {
                    throw new Error('Nothing to write: pass --csv <file> or drop --no-db');
                }

                const pipeline = createEnrichmentPipeline(config, logger);
                const progress = new EnrichmentProgress({
                    title: 'Annotating',
                    showEta: true,
                    showRate: true,
                    showPercentage: true,
                });

                pipeline.on('start', ({ total }: { total: number }) => progress.start(total));
                pipeline.on('variant', (row: EnrichedOutputRow) => progress.advance(row.variantDescription));
                pipeline.on('variant-error', (event: VariantFailureEvent) =>
                    progress.advance(event.variantDescription, true)
                );
                pipeline.on('complete', () => progress.complete());

                return pipeline.run(store, sinks, options.patient);
            });

            printEnrichmentSummary(stats, options.csv);
        } catch (error) {
            fail('Annotation failed', error);
        }
    });

function printEnrichmentSummary(stats: EnrichmentStats, csvPath?: string): void {
    console.log(chalk.green(`✅ Annotated ${stats.written}/${stats.total} variants`));
    console.log(chalk.gray(`🔍 Not in ClinVar: ${stats.notFound}`));
    if (stats.failed > 0) {
        console.log(chalk.yellow(`⚠️  Failed: ${stats.failed} (see log)`));
    }
    if (csvPath) {
        console.log(chalk.gray(`📁 CSV: ${csvPath}`));
    }
    console.log(chalk.gray(`⏱️  Time: ${Math.round(stats.elapsedTime / 1000)}s`));
}

program
    .command('export')
    .description('Write stored inputs joined with their annotations to CSV')
    .argument('<file>', 'Output CSV path')
    .option('-p, --patient <id>', 'Only this patient', parsePositiveInt)
    .action(async (file: string, options: { patient?: number }) => {
        try {
            const count = await withStore(async store => {
                const writer = new CsvFileWriter(file);
                try {
                    for (const row of store.listJoined(options.patient)) {
                        await writer.writeRow(row);
                    }
                } finally {
                    await writer.close();
                }
                return writer.rowsWritten;
            });
            console.log(chalk.green(`✅ Exported ${count} rows to ${file}`));
        } catch (error) {
            fail('Export failed', error);
        }
    });

program
    .command('show')
    .description('Print stored variants with their annotations')
    .option('-p, --patient <id>', 'Only this patient', parsePositiveInt)
    .action(async (options: { patient?: number }) => {
        try {
            await withStore(store => {
                const rows = store.listJoined(options.patient);
                console.log(chalk.blue(`📋 ${rows.length} variants`));
                console.log('─'.repeat(60));
                for (const row of rows) {
                    printRow(row);
                }
            });
        } catch (error) {
            fail('Error', error);
        }
    });

program
    .command('lookup')
    .description('Resolve and annotate a single coordinate without touching the database')
    .requiredOption('-c, --chrom <chromosome>', 'Chromosome (e.g. "17", "X")')
    .requiredOption('-p, --pos <position>', 'Position', parsePositiveInt)
    .requiredOption('-r, --ref <allele>', 'Reference allele')
    .requiredOption('-a, --alt <allele>', 'Alternate allele')
    .option('-b, --build <build>', 'Genome build', config.variantValidator.genomeBuild)
    .action(async (options: { chrom: string; pos: number; ref: string; alt: string; build: string }) => {
        try {
            const pipeline = createEnrichmentPipeline(
                { ...config, variantValidator: { ...config.variantValidator, genomeBuild: options.build } },
                logger
            );
            const record = {
                patientId: 0,
                variantNumber: 0,
                chrom: options.chrom,
                pos: options.pos,
                id: null,
                ref: options.ref,
                alt: options.alt,
            };
            console.log(chalk.blue(`🔍 Looking up ${describeVariant(record)} (${options.build})...`));

            const row = await pipeline.enrichRecord(record);
            const { annotation, resolution } = row;
            if (!resolution?.hgvsGenomic) {
                console.log(chalk.yellow('❌ No HGVS resolution for this variant'));
                return;
            }

            printRow(toExportRow(row));
            if (annotation.found) {
                console.log(chalk.gray(`  ClinVar: ${annotation.clinvarId} ${annotation.accession ?? ''}`.trimEnd()));
                console.log(chalk.gray(`  Location: chr${annotation.chrom ?? '?'}:${annotation.pos ?? '?'} ${annotation.ref ?? '?'}>${annotation.alt ?? '?'}`));
                console.log(chalk.gray(`  RefSeq: ${annotation.refSeqId ?? 'N/A'}  OMIM: ${annotation.omimId ?? 'N/A'}  ${annotation.hgncId ?? ''}`.trimEnd()));
            }
        } catch (error) {
            fail('Lookup failed', error);
        }
    });

program
    .command('mcp-server')
    .description('Start the MCP stdio server over the variant database')
    .action(async () => {
        try {
            const store = VariantStore.open(config.database.path);
            store.initSchema();
            const server = new VariantMCPServer(store, createEnrichmentPipeline(config, logger), logger);
            await server.start();
        } catch (error) {
            fail('Error starting MCP server', error);
        }
    });

program.configureOutput({
    outputError: (str, write) => write(chalk.red(str)),
});

program.parseAsync().catch((error: unknown) => fail('Error', error));
