export type UpstreamService = 'VariantValidator' | 'ClinVar';

/**
 * A pseudo-VCF data line that cannot be turned into a variant record.
 * Callers decide whether to skip the line or abort the file.
 */
export class MalformedRecordError extends Error {
    constructor(
        message: string,
        public readonly lineNumber?: number,
        public readonly line?: string
    ) {
        super(lineNumber !== undefined ? `Line ${lineNumber}: ${message}` : message);
        this.name = 'MalformedRecordError';
    }
}

/**
 * Transport or HTTP failure while talking to an external service.
 * statusCode is 0 when no response was received (network error, timeout).
 */
export class UpstreamUnavailableError extends Error {
    constructor(
        message: string,
        public readonly service: UpstreamService,
        public readonly statusCode: number,
        public readonly url: string
    ) {
        super(message);
        this.name = 'UpstreamUnavailableError';
    }
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
