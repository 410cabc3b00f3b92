import { StarRating, reviewStatusToStars } from '../clinical/star-rating.js';
import { describeError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import { TreeValue, field, first, isPresent, items, path, text, textAt } from '../utils/tree.js';

export const NOT_FOUND = 'Not found';
export const UNKNOWN = 'Unknown';

export interface ClinicalAnnotation {
    found: boolean;
    hgvs: string | null;
    clinvarId: string | null;
    accession: string | null;
    clinicalSignificance: string;
    reviewStatus: string;
    starRating: StarRating;
    conditionsAssoc: string;
    transcript: string | null;
    refSeqId: string | null;
    geneSymbol: string | null;
    hgncId: string | null;
    omimId: string | null;
    chrom: string | null;
    pos: string | null;
    ref: string | null;
    alt: string | null;
}

function emptyAnnotation(hgvs: string | null, clinvarId: string | null): ClinicalAnnotation {
    return {
        found: clinvarId !== null,
        hgvs,
        clinvarId,
        accession: null,
        clinicalSignificance: UNKNOWN,
        reviewStatus: UNKNOWN,
        starRating: 'N/A',
        conditionsAssoc: UNKNOWN,
        transcript: null,
        refSeqId: null,
        geneSymbol: null,
        hgncId: null,
        omimId: null,
        chrom: null,
        pos: null,
        ref: null,
        alt: null,
    };
}

/** Annotation for a variant ClinVar has no record of (or that never got an HGVS name). */
export function notFoundAnnotation(hgvs: string | null): ClinicalAnnotation {
    return {
        ...emptyAnnotation(hgvs, null),
        clinicalSignificance: NOT_FOUND,
    };
}

/**
 * Newer esummary documents carry germline_classification; older ones a
 * clinical_significance block with the same description/review_status fields.
 */
function classificationBlock(summary: TreeValue): TreeValue {
    const germline = field(summary, 'germline_classification');
    return isPresent(germline) ? germline : field(summary, 'clinical_significance');
}

function applyClassification(result: ClinicalAnnotation, classification: TreeValue): void {
    if (!isPresent(classification)) return;

    result.clinicalSignificance = textAt(classification, 'description') ?? UNKNOWN;
    result.reviewStatus = textAt(classification, 'review_status') ?? UNKNOWN;
    result.starRating = reviewStatusToStars(result.reviewStatus);

    const conditions: string[] = [];
    for (const trait of items(path(classification, 'trait_set', 'trait'))) {
        const name = textAt(trait, 'trait_name');
        if (name) {
            conditions.push(name);
        }
        for (const xref of items(path(trait, 'trait_xrefs', 'trait_xref'))) {
            if (textAt(xref, 'db_source') === 'OMIM') {
                result.omimId = textAt(xref, 'db_id') ?? result.omimId;
            }
        }
    }
    if (conditions.length > 0) {
        result.conditionsAssoc = conditions.join('; ');
    }
}

export interface SpdiParts {
    refSeqId: string;
    pos: string;
    ref: string;
    alt: string;
}

/** "NC_000017.11:45983419:G:T" -> 1-based position "45983420". */
export function decodeSpdi(spdi: string): SpdiParts | null {
    const parts = spdi.split(':');
    if (parts.length < 4) return null;

    const [refSeqId, rawPos, ref, alt] = parts;
    const pos = /^\d+$/.test(rawPos) ? String(parseInt(rawPos, 10) + 1) : rawPos;
    return { refSeqId, pos, ref, alt };
}

function applyLocation(result: ClinicalAnnotation, summary: TreeValue): void {
    const variation = first(path(summary, 'variation_set', 'variation'));
    if (!isPresent(variation)) return;

    const spdi = textAt(variation, 'canonical_spdi');
    const decoded = spdi ? decodeSpdi(spdi) : null;
    if (decoded) {
        result.refSeqId = decoded.refSeqId;
        result.pos = decoded.pos;
        result.ref = decoded.ref;
        result.alt = decoded.alt;
    }

    const assemblies = items(path(variation, 'variation_loc', 'assembly_set'));
    const assembly = assemblies.find(entry => textAt(entry, 'status')?.toLowerCase() === 'current') ?? assemblies[0];
    if (assembly) {
        result.chrom = textAt(assembly, 'chr') ?? null;
        if (!result.pos) {
            result.pos = textAt(assembly, 'start') ?? null;
        }
    }
}

function applyGene(result: ClinicalAnnotation, summary: TreeValue): void {
    const gene = first(path(summary, 'genes', 'gene'));
    if (gene.kind !== 'mapping') return;

    result.geneSymbol = textAt(gene, 'symbol') ?? null;
    const geneId = textAt(gene, 'GeneID');
    if (geneId) {
        result.hgncId = `GeneID:${geneId}`;
    }
}

/**
 * Pulls clinical fields out of one esummary DocumentSummary. Each section is
 * read independently; a failure part-way keeps whatever was already set and
 * leaves the rest at their defaults.
 */
export function extractClinicalAnnotation(
    hgvs: string,
    clinvarId: string,
    summary: TreeValue,
    logger: Logger
): ClinicalAnnotation {
    const result = emptyAnnotation(hgvs, clinvarId);

    try {
        result.accession = textAt(summary, 'accession') ?? null;

        const title = textAt(summary, 'title');
        if (title) {
            const transcript = title.split('(')[0].trim();
            result.transcript = transcript === '' ? null : transcript;
        }

        applyClassification(result, classificationBlock(summary));
        applyLocation(result, summary);
        applyGene(result, summary);
    } catch (error) {
        logger.warn(`Error extracting ClinVar details: ${describeError(error)}`, { hgvs, clinvarId });
    }

    return result;
}

export function summaryDocument(document: TreeValue): TreeValue {
    return first(path(document, 'eSummaryResult', 'DocumentSummarySet', 'DocumentSummary'));
}

export function searchIds(document: TreeValue): string[] {
    return items(path(document, 'eSearchResult', 'IdList', 'Id'))
        .map(id => text(id))
        .filter((id): id is string => id !== undefined);
}
