import type { TranscriptProteinInfo } from './hgvs-resolver.js';
import { asMapping, field, keys, textAt, TreeMapping } from '../utils/tree.js';

export interface VariantChanges {
    gChange: string | null;
    cChange: string | null;
    pChange: string | null;
}

const C_CHANGE = /(c\.[^\s,;]+)/;
const P_CHANGE = /(p\.[^\s,;]+)/;

/** "NC_000017.11:g.45983420G>T" -> "g.45983420G>T" */
export function changePart(hgvs: string | null | undefined): string | null {
    if (!hgvs) return null;
    const separator = hgvs.indexOf(':');
    const change = separator >= 0 ? hgvs.slice(separator + 1) : hgvs;
    return change.trim() === '' ? null : change.trim();
}

function transcriptEntry(node: TreeMapping, maneSelect: string | null): TreeMapping | undefined {
    if (maneSelect) {
        const preferred = asMapping(field(node, maneSelect));
        if (preferred) return preferred;
    }
    for (const key of keys(node)) {
        const entry = asMapping(field(node, key));
        if (entry) return entry;
    }
    return undefined;
}

export function variantChanges(
    hgvsGenomic: string | null,
    transcriptProtein: TranscriptProteinInfo | null,
    maneSelect: string | null
): VariantChanges {
    const changes: VariantChanges = {
        gChange: changePart(hgvsGenomic),
        cChange: null,
        pChange: null,
    };
    if (!transcriptProtein) return changes;

    if (transcriptProtein.kind === 'plain') {
        changes.cChange = C_CHANGE.exec(transcriptProtein.text)?.[1] ?? null;
        changes.pChange = P_CHANGE.exec(transcriptProtein.text)?.[1] ?? null;
        return changes;
    }

    const entry = transcriptEntry(transcriptProtein.node, maneSelect);
    if (entry) {
        changes.cChange = changePart(textAt(entry, 't_hgvs'));
        changes.pChange = changePart(textAt(entry, 'p_hgvs_tlc') ?? textAt(entry, 'p_hgvs_slc'));
    }
    return changes;
}
