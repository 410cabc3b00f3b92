// Main exports for the variant annotator library
export { VCFParser, parseVariantLine, isCommentLine } from './parser/vcf-parser.js';
export type { ParsedVariantLine, VariantLineEvent, MalformedLineEvent, ParseSummary } from './parser/vcf-parser.js';
export { VCFImporter, patientIdFromFilename, isVCFFile } from './parser/vcf-importer.js';
export type { ImportStats, SkippedVariantEvent } from './parser/vcf-importer.js';

export { VariantStore } from './db/variant-store.js';
export type { VariantRecord, OutputRecord, JoinedVariantRow, VariantSource } from './db/variant-store.js';

export { HgvsResolver, describeVariant, maneSelectFrom } from './hgvs/hgvs-resolver.js';
export type { CoordinateQuery, HgvsResolution, TranscriptProteinInfo } from './hgvs/hgvs-resolver.js';
export { variantChanges, changePart } from './hgvs/notation.js';
export type { VariantChanges } from './hgvs/notation.js';

export { ClinVarClient } from './clinvar/clinvar-client.js';
export { extractClinicalAnnotation, notFoundAnnotation, decodeSpdi } from './clinvar/summary-extractor.js';
export type { ClinicalAnnotation } from './clinvar/summary-extractor.js';
export { reviewStatusToStars, STAR_RATINGS } from './clinical/star-rating.js';
export type { StarRating } from './clinical/star-rating.js';

export { EnrichmentPipeline, toOutputRecord } from './pipeline/enrichment-pipeline.js';
export type { EnrichedOutputRow, EnrichmentStats, OutputSink } from './pipeline/enrichment-pipeline.js';
export { createEnrichmentPipeline } from './pipeline/factory.js';
export { CsvSink, DatabaseSink, toExportRow } from './pipeline/sinks.js';
export { CsvFileWriter, EXPORT_COLUMNS, toCsv } from './export/csv-writer.js';

export { VariantMCPServer } from './mcp-server/server.js';
export { loadConfig } from './config/index.js';
export type { Config } from './config/index.js';
export { ConsoleLogger } from './utils/logger.js';
export type { Logger, LogLevel } from './utils/logger.js';
export { MalformedRecordError, UpstreamUnavailableError } from './utils/errors.js';
