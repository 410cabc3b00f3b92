/**
 * Read-only view over parsed JSON/XML documents whose shape varies between
 * service versions. Every accessor is total: a missing or mistyped step
 * yields `absent` (or undefined for leaf reads) instead of throwing.
 */

export type Scalar = string | number | boolean;

export type TreeValue =
    | { kind: 'absent' }
    | { kind: 'scalar'; value: Scalar }
    | { kind: 'list'; items: TreeValue[] }
    | { kind: 'mapping'; entries: Map<string, TreeValue> };

export type TreeMapping = Extract<TreeValue, { kind: 'mapping' }>;

export const ABSENT: TreeValue = { kind: 'absent' };

// fast-xml-parser puts element text here when the element also has attributes
const TEXT_KEY = '#text';

export function toTree(raw: unknown): TreeValue {
    if (raw === null || raw === undefined) return ABSENT;
    if (typeof raw === 'string' || typeof raw === 'number' || typeof raw === 'boolean') {
        return { kind: 'scalar', value: raw };
    }
    if (Array.isArray(raw)) {
        return { kind: 'list', items: raw.map(item => toTree(item)) };
    }
    if (typeof raw === 'object') {
        const entries = new Map<string, TreeValue>();
        for (const [key, value] of Object.entries(raw)) {
            entries.set(key, toTree(value));
        }
        return { kind: 'mapping', entries };
    }
    return ABSENT;
}

export function isPresent(node: TreeValue): boolean {
    return node.kind !== 'absent';
}

export function field(node: TreeValue, key: string): TreeValue {
    if (node.kind !== 'mapping') return ABSENT;
    return node.entries.get(key) ?? ABSENT;
}

export function path(node: TreeValue, ...keys: string[]): TreeValue {
    return keys.reduce<TreeValue>((current, key) => field(current, key), node);
}

/**
 * Repeated XML elements parse to a list, a single one to a mapping or scalar.
 * This flattens both to a list.
 */
export function items(node: TreeValue): TreeValue[] {
    switch (node.kind) {
        case 'absent':
            return [];
        case 'list':
            return node.items;
        default:
            return [node];
    }
}

export function first(node: TreeValue): TreeValue {
    return items(node)[0] ?? ABSENT;
}

export function keys(node: TreeValue): string[] {
    return node.kind === 'mapping' ? [...node.entries.keys()] : [];
}

export function asMapping(node: TreeValue): TreeMapping | undefined {
    return node.kind === 'mapping' ? node : undefined;
}

/** Scalar text of a node; empty strings count as missing. */
export function text(node: TreeValue): string | undefined {
    if (node.kind === 'scalar') {
        const value = String(node.value).trim();
        return value === '' ? undefined : value;
    }
    if (node.kind === 'mapping') {
        const inner = node.entries.get(TEXT_KEY);
        return inner ? text(inner) : undefined;
    }
    return undefined;
}

export function textAt(node: TreeValue, ...keys: string[]): string | undefined {
    return text(path(node, ...keys));
}
