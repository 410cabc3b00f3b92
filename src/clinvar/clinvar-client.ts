import { XMLParser } from 'fast-xml-parser';
import { UpstreamUnavailableError, describeError } from '../utils/errors.js';
import { FetchLike, requestText } from '../utils/http.js';
import type { Logger } from '../utils/logger.js';
import { TreeValue, isPresent, toTree } from '../utils/tree.js';
import {
    ClinicalAnnotation,
    extractClinicalAnnotation,
    notFoundAnnotation,
    searchIds,
    summaryDocument,
} from './summary-extractor.js';

export interface ClinVarClientOptions {
    baseUrl: string;
    timeoutMs: number;
    logger: Logger;
    apiKey?: string;
    fetchImpl?: FetchLike;
}

/**
 * ClinVar lookups through NCBI E-utilities: esearch by exact variant name,
 * then esummary for the first hit.
 */
export class ClinVarClient {
    private readonly xml = new XMLParser({
        ignoreAttributes: false,
        attributeNamePrefix: '@_',
        parseTagValue: false,
        parseAttributeValue: false,
        trimValues: true,
    });

    constructor(private readonly options: ClinVarClientOptions) {}

    searchUrl(hgvs: string): string {
        return this.url('esearch.fcgi', {
            db: 'clinvar',
            term: `"${hgvs}"[variant name]`,
            retmode: 'xml',
        });
    }

    summaryUrl(clinvarId: string): string {
        return this.url('esummary.fcgi', {
            db: 'clinvar',
            id: clinvarId,
            retmode: 'xml',
        });
    }

    /** ClinVar variation ids for an HGVS name, in the order the service returns them. */
    async search(hgvs: string): Promise<string[]> {
        const document = await this.getXml(this.searchUrl(hgvs));
        return searchIds(document);
    }

    async fetchSummary(clinvarId: string): Promise<TreeValue> {
        const document = await this.getXml(this.summaryUrl(clinvarId));
        return summaryDocument(document);
    }

    /**
     * Clinical annotation for an HGVS string. A missing HGVS name or an empty
     * search result gives the not-found annotation without further calls.
     */
    async annotate(hgvs: string | null): Promise<ClinicalAnnotation> {
        if (!hgvs) {
            return notFoundAnnotation(null);
        }

        const ids = await this.search(hgvs);
        if (ids.length === 0) {
            this.options.logger.warn(`No ClinVar variants found for HGVS: ${hgvs}`);
            return notFoundAnnotation(hgvs);
        }

        const [clinvarId] = ids;
        if (ids.length > 1) {
            this.options.logger.debug(`ClinVar returned ${ids.length} ids for ${hgvs}, using ${clinvarId}`);
        }

        const summary = await this.fetchSummary(clinvarId);
        if (!isPresent(summary)) {
            this.options.logger.warn(`ClinVar summary for ${clinvarId} has no DocumentSummary`, { hgvs });
        }
        return extractClinicalAnnotation(hgvs, clinvarId, summary, this.options.logger);
    }

    private url(endpoint: string, params: Record<string, string>): string {
        const search = new URLSearchParams(params);
        if (this.options.apiKey) {
            search.set('api_key', this.options.apiKey);
        }
        return `${this.options.baseUrl}/${endpoint}?${search.toString()}`;
    }

    private async getXml(url: string): Promise<TreeValue> {
        const body = await requestText(url, {
            service: 'ClinVar',
            timeoutMs: this.options.timeoutMs,
            fetchImpl: this.options.fetchImpl,
        });
        try {
            return toTree(this.xml.parse(body));
        } catch (error) {
            throw new UpstreamUnavailableError(
                `ClinVar returned unreadable XML: ${describeError(error)}`,
                'ClinVar',
                200,
                url
            );
        }
    }
}
