import type { Config } from '../config/index.js';
import { ClinVarClient } from '../clinvar/clinvar-client.js';
import { HgvsResolver } from '../hgvs/hgvs-resolver.js';
import type { FetchLike } from '../utils/http.js';
import type { Logger } from '../utils/logger.js';
import { EnrichmentPipeline } from './enrichment-pipeline.js';

/** Wires the VariantValidator and ClinVar clients from configuration. */
export function createEnrichmentPipeline(config: Config, logger: Logger, fetchImpl?: FetchLike): EnrichmentPipeline {
    const vv = config.variantValidator;

    const resolver = new HgvsResolver({
        baseUrl: vv.baseUrl,
        genomeBuild: vv.genomeBuild,
        transcriptModel: vv.transcriptModel,
        selectTranscripts: vv.selectTranscripts,
        checkOnly: vv.checkOnly,
        liftover: vv.liftover,
        minDelayMs: vv.minDelayMs,
        timeoutMs: config.http.timeoutMs,
        logger,
        fetchImpl,
    });

    const annotator = new ClinVarClient({
        baseUrl: config.clinvar.baseUrl,
        apiKey: config.clinvar.apiKey,
        timeoutMs: config.http.timeoutMs,
        logger,
        fetchImpl,
    });

    return new EnrichmentPipeline({ resolver, annotator, logger, genomeBuild: vv.genomeBuild });
}
