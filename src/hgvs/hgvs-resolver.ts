import type { Liftover } from '../config/index.js';
import { UpstreamUnavailableError } from '../utils/errors.js';
import { FetchLike, requestText, sleep } from '../utils/http.js';
import type { Logger } from '../utils/logger.js';
import { TreeMapping, TreeValue, asMapping, field, keys, text, textAt, toTree } from '../utils/tree.js';

export interface CoordinateQuery {
    chrom: string;
    pos: number;
    ref: string;
    alt: string;
    genomeBuild?: string;
}

/**
 * hgvs_t_and_p comes back either as a plain string or as a mapping keyed by
 * transcript, depending on the request mode.
 */
export type TranscriptProteinInfo =
    | { kind: 'plain'; text: string }
    | { kind: 'structured'; node: TreeMapping };

export interface HgvsResolution {
    variantDescription: string;
    hgvsGenomic: string | null;
    transcriptProtein: TranscriptProteinInfo | null;
    selectedBuild: string | null;
    maneSelectTranscript: string | null;
}

export interface HgvsResolverOptions {
    baseUrl: string;
    genomeBuild: string;
    transcriptModel: string;
    selectTranscripts: string;
    checkOnly: boolean;
    liftover: Liftover;
    minDelayMs: number;
    timeoutMs: number;
    logger: Logger;
    fetchImpl?: FetchLike;
    sleep?: (ms: number) => Promise<void>;
}

const REFSEQ_TRANSCRIPT = /(NM_\d+\.\d+)/;

export function describeVariant(query: CoordinateQuery): string {
    return `${query.chrom}:${query.pos}:${query.ref}:${query.alt}`;
}

function flag(value: boolean | 'primary'): string {
    if (value === 'primary') return 'primary';
    return value ? 'True' : 'False';
}

export function readTranscriptProtein(node: TreeValue): TranscriptProteinInfo | null {
    const mapping = asMapping(node);
    if (mapping) {
        return { kind: 'structured', node: mapping };
    }
    const value = text(node);
    return value !== undefined ? { kind: 'plain', text: value } : null;
}

/** Best-effort MANE Select transcript from the transcript/protein field. */
export function maneSelectFrom(info: TranscriptProteinInfo | null): string | null {
    if (!info) return null;
    switch (info.kind) {
        case 'structured':
            return text(field(info.node, 'mane_select')) ?? null;
        case 'plain':
            return REFSEQ_TRANSCRIPT.exec(info.text)?.[1] ?? null;
    }
}

/**
 * Maps genomic coordinates to HGVS through the VariantValidator LOVD
 * endpoint. Every call is followed by a fixed pause so batch runs stay
 * under the service's rate limit.
 */
export class HgvsResolver {
    private readonly pause: (ms: number) => Promise<void>;

    constructor(private readonly options: HgvsResolverOptions) {
        this.pause = options.sleep ?? sleep;
    }

    buildUrl(query: CoordinateQuery): string {
        const build = query.genomeBuild ?? this.options.genomeBuild;
        const { transcriptModel, selectTranscripts, checkOnly, liftover } = this.options;
        return (
            `${this.options.baseUrl}/${build}/${describeVariant(query)}/` +
            `${transcriptModel}/${selectTranscripts}/${flag(checkOnly)}/${flag(liftover)}` +
            '?content-type=application/json'
        );
    }

    /** Raw response document. Waits minDelayMs afterwards, whether or not the call succeeded. */
    async query(query: CoordinateQuery): Promise<TreeValue> {
        const url = this.buildUrl(query);
        try {
            const body = await requestText(url, {
                service: 'VariantValidator',
                timeoutMs: this.options.timeoutMs,
                headers: { Accept: 'application/json' },
                fetchImpl: this.options.fetchImpl,
            });
            try {
                return toTree(JSON.parse(body));
            } catch {
                throw new UpstreamUnavailableError(
                    'VariantValidator returned a body that is not JSON',
                    'VariantValidator',
                    200,
                    url
                );
            }
        } finally {
            await this.pause(this.options.minDelayMs);
        }
    }

    /**
     * Returns null when the response holds no usable variant entry. Transport
     * and HTTP failures propagate as UpstreamUnavailableError.
     */
    async resolve(query: CoordinateQuery): Promise<HgvsResolution | null> {
        const variantDescription = describeVariant(query);
        const document = await this.query(query);
        const info = this.variantEntry(document);

        if (!info) {
            this.logger.warn(`No HGVS resolution for ${variantDescription}`);
            return null;
        }

        const transcriptProtein = readTranscriptProtein(field(info, 'hgvs_t_and_p'));
        const resolution: HgvsResolution = {
            variantDescription,
            hgvsGenomic: textAt(info, 'g_hgvs') ?? null,
            transcriptProtein,
            selectedBuild: textAt(info, 'selected_build') ?? null,
            maneSelectTranscript: maneSelectFrom(transcriptProtein),
        };

        this.logger.debug(`Resolved ${variantDescription}`, {
            hgvs: resolution.hgvsGenomic,
            build: resolution.selectedBuild,
        });
        return resolution;
    }

    async getHgvs(query: CoordinateQuery): Promise<string | null> {
        const resolution = await this.resolve(query);
        return resolution?.hgvsGenomic ?? null;
    }

    /**
     * The service nests the payload under the variant key twice:
     * { "17:45983420:G:T": { "17:45983420:G:T": { g_hgvs, ... } }, "metadata": {...} }
     */
    private variantEntry(document: TreeValue): TreeMapping | undefined {
        const variantKey = keys(document).find(key => key !== 'metadata' && key.includes(':'));
        if (variantKey === undefined) return undefined;

        const outer = field(document, variantKey);
        const nested = asMapping(field(outer, variantKey));
        if (nested) return nested;

        const [firstInner] = keys(outer);
        return firstInner !== undefined ? asMapping(field(outer, firstInner)) : undefined;
    }

    private get logger(): Logger {
        return this.options.logger;
    }
}
