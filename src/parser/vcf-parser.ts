import { createReadStream } from 'fs';
import { createGunzip } from 'zlib';
import { Readable, Transform, Writable } from 'stream';
import { pipeline } from 'stream/promises';
import { StringDecoder } from 'string_decoder';
import { EventEmitter } from 'events';
import { MalformedRecordError } from '../utils/errors.js';

/** The five leading columns of a pseudo-VCF data line. */
export interface ParsedVariantLine {
    chrom: string;
    pos: number;
    id: string;
    ref: string;
    alt: string;
}

export interface VariantLineEvent {
    ordinal: number;
    lineNumber: number;
    record: ParsedVariantLine;
}

export interface MalformedLineEvent {
    ordinal: number;
    lineNumber: number;
    error: MalformedRecordError;
}

export interface ParseSummary {
    totalLines: number;
    records: number;
    malformed: number;
}

const REQUIRED_FIELDS = 5;

export function isCommentLine(line: string): boolean {
    return line.startsWith('#');
}

export function parseVariantLine(line: string, lineNumber?: number): ParsedVariantLine {
    const columns = line.replace(/\r?\n$/, '').split('\t');

    if (columns.length < REQUIRED_FIELDS) {
        throw new MalformedRecordError(
            `expected at least ${REQUIRED_FIELDS} tab-separated fields, found ${columns.length}`,
            lineNumber,
            line
        );
    }

    const [chrom, rawPos, id, ref, alt] = columns.map(column => column.trim());

    if (!/^\d+$/.test(rawPos)) {
        throw new MalformedRecordError(`position is not an integer: "${rawPos}"`, lineNumber, line);
    }
    if (chrom === '' || ref === '' || alt === '') {
        throw new MalformedRecordError('chromosome and alleles must not be empty', lineNumber, line);
    }

    return {
        chrom,
        pos: parseInt(rawPos, 10),
        id,
        ref,
        alt,
    };
}

/**
 * Streams a pseudo-VCF file (optionally gzipped) and emits one event per
 * data line. Ordinals start at 1 and advance on every non-comment line,
 * malformed ones included, so they match the line's position among the
 * file's variants.
 *
 * Events: 'start', 'record' (VariantLineEvent), 'malformed' (MalformedLineEvent),
 * 'complete' (ParseSummary).
 */
export class VCFParser extends EventEmitter {
    private lineNumber = 0;
    private ordinal = 0;
    private recordCount = 0;
    private malformedCount = 0;

    async parseFile(filePath: string): Promise<ParseSummary> {
        const source = createReadStream(filePath);
        return filePath.endsWith('.gz')
            ? this.parseStages(source, createGunzip())
            : this.parseStages(source);
    }

    async parseStream(source: Readable): Promise<ParseSummary> {
        return this.parseStages(source);
    }

    private async parseStages(source: Readable, decompress?: Transform): Promise<ParseSummary> {
        this.lineNumber = 0;
        this.ordinal = 0;
        this.recordCount = 0;
        this.malformedCount = 0;

        let lineBuffer = '';
        const decoder = new StringDecoder('utf8');
        const lineTransform = new Transform({
            readableObjectMode: true,
            transform(chunk: Buffer | string, _encoding, callback) {
                lineBuffer += typeof chunk === 'string' ? chunk : decoder.write(chunk);
                const lines = lineBuffer.split('\n');

                // Keep the last partial line in the buffer
                lineBuffer = lines.pop() ?? '';

                for (const line of lines) {
                    this.push(line);
                }
                callback();
            },
            flush(callback) {
                lineBuffer += decoder.end();
                if (lineBuffer.length > 0) {
                    this.push(lineBuffer);
                }
                callback();
            }
        });

        const lineSink = new Writable({
            objectMode: true,
            write: (line: string, _encoding, callback) => {
                try {
                    this.processLine(line);
                    callback();
                } catch (error) {
                    callback(error instanceof Error ? error : new Error(String(error)));
                }
            }
        });

        this.emit('start');
        if (decompress) {
            await pipeline(source, decompress, lineTransform, lineSink);
        } else {
            await pipeline(source, lineTransform, lineSink);
        }

        const summary: ParseSummary = {
            totalLines: this.lineNumber,
            records: this.recordCount,
            malformed: this.malformedCount,
        };
        this.emit('complete', summary);
        return summary;
    }

    private processLine(rawLine: string): void {
        this.lineNumber++;
        const line = rawLine.replace(/\r$/, '');

        if (isCommentLine(line) || line.trim() === '') {
            return;
        }

        this.ordinal++;
        let record: ParsedVariantLine;
        try {
            record = parseVariantLine(line, this.lineNumber);
        } catch (error) {
            if (!(error instanceof MalformedRecordError)) throw error;
            this.malformedCount++;
            const event: MalformedLineEvent = { ordinal: this.ordinal, lineNumber: this.lineNumber, error };
            this.emit('malformed', event);
            return;
        }

        this.recordCount++;
        const event: VariantLineEvent = { ordinal: this.ordinal, lineNumber: this.lineNumber, record };
        this.emit('record', event);
    }

    getRecordCount(): number {
        return this.recordCount;
    }
}
