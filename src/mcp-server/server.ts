import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
    CallToolRequestSchema,
    ListResourcesRequestSchema,
    ListToolsRequestSchema,
    ReadResourceRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { VariantStore } from '../db/variant-store.js';
import type { EnrichmentPipeline } from '../pipeline/enrichment-pipeline.js';
import { DatabaseSink } from '../pipeline/sinks.js';
import { describeError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';

export const SUMMARY_RESOURCE_URI = 'variants://summary';

const ListVariantsSchema = z.object({
    patient_id: z.number().int().positive().optional().describe('Restrict to one patient'),
    limit: z.number().int().positive().optional().describe('Maximum number of rows (default: 100)'),
});

const VariantKeySchema = z.object({
    patient_id: z.number().int().positive().describe('Patient id'),
    variant_number: z.number().int().positive().describe('Variant ordinal within the patient file'),
});

const AddVariantSchema = VariantKeySchema.extend({
    chrom: z.string().min(1).describe('Chromosome (e.g., "17", "X")'),
    pos: z.number().int().positive().describe('1-based position'),
    id: z.string().min(1).nullable().optional().describe('Variant identifier, e.g. an rsID'),
    ref: z.string().min(1).describe('Reference allele'),
    alt: z.string().min(1).describe('Alternate allele'),
});

export type ToolResponse = {
    content: Array<{ type: 'text'; text: string }>;
    isError?: boolean;
};

export type ResourceResponse = {
    contents: Array<{ uri: string; mimeType: string; text: string }>;
};

function jsonResponse(value: unknown): ToolResponse {
    return { content: [{ type: 'text', text: JSON.stringify(value, null, 2) }] };
}

function errorResponse(message: string): ToolResponse {
    return { content: [{ type: 'text', text: message }], isError: true };
}

/**
 * Stdio MCP server over the variant database: read access to inputs joined
 * with their annotations, manual input entry, and on-demand annotation of a
 * single stored variant.
 */
export class VariantMCPServer {
    private readonly server: Server;

    constructor(
        private readonly store: VariantStore,
        private readonly pipeline: EnrichmentPipeline,
        private readonly logger: Logger
    ) {
        this.server = new Server(
            {
                name: 'variant-annotator',
                version: '1.0.0',
            },
            {
                capabilities: {
                    resources: {},
                    tools: {},
                },
            }
        );

        this.setupHandlers();
    }

    private setupHandlers(): void {
        this.server.setRequestHandler(ListToolsRequestSchema, async () => ({
            tools: [
                {
                    name: 'list_variants',
                    description: 'List stored variants joined with their ClinVar annotations, ordered by patient and variant number',
                    inputSchema: {
                        type: 'object',
                        properties: {
                            patient_id: { type: 'number', description: 'Restrict to one patient' },
                            limit: { type: 'number', description: 'Maximum number of rows (default: 100)' },
                        },
                    },
                },
                {
                    name: 'get_variant',
                    description: 'Get one stored variant and its annotation',
                    inputSchema: {
                        type: 'object',
                        properties: {
                            patient_id: { type: 'number', description: 'Patient id' },
                            variant_number: { type: 'number', description: 'Variant ordinal within the patient file' },
                        },
                        required: ['patient_id', 'variant_number'],
                    },
                },
                {
                    name: 'add_variant',
                    description: 'Add one input variant by hand. Fails if the (patient_id, variant_number) key already exists',
                    inputSchema: {
                        type: 'object',
                        properties: {
                            patient_id: { type: 'number', description: 'Patient id' },
                            variant_number: { type: 'number', description: 'Variant ordinal within the patient' },
                            chrom: { type: 'string', description: 'Chromosome (e.g., "17", "X")' },
                            pos: { type: 'number', description: '1-based position' },
                            id: { type: 'string', description: 'Variant identifier, e.g. an rsID' },
                            ref: { type: 'string', description: 'Reference allele' },
                            alt: { type: 'string', description: 'Alternate allele' },
                        },
                        required: ['patient_id', 'variant_number', 'chrom', 'pos', 'ref', 'alt'],
                    },
                },
                {
                    name: 'annotate_variant',
                    description: 'Resolve HGVS and ClinVar annotation for one stored variant and save the result',
                    inputSchema: {
                        type: 'object',
                        properties: {
                            patient_id: { type: 'number', description: 'Patient id' },
                            variant_number: { type: 'number', description: 'Variant ordinal within the patient file' },
                        },
                        required: ['patient_id', 'variant_number'],
                    },
                },
            ],
        }));

        this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
            const { name, arguments: args } = request.params;
            return this.callTool(name, args);
        });

        this.server.setRequestHandler(ListResourcesRequestSchema, async () => ({
            resources: [
                {
                    uri: SUMMARY_RESOURCE_URI,
                    name: 'Variant Summary',
                    description: 'Counts of stored and annotated variants per patient and clinical significance',
                    mimeType: 'application/json',
                },
            ],
        }));

        this.server.setRequestHandler(ReadResourceRequestSchema, async (request) => this.readResource(request.params.uri));
    }

    async callTool(name: string, args: unknown): Promise<ToolResponse> {
        try {
            switch (name) {
                case 'list_variants':
                    return this.listVariants(args);
                case 'get_variant':
                    return this.getVariant(args);
                case 'add_variant':
                    return this.addVariant(args);
                case 'annotate_variant':
                    return await this.annotateVariant(args);
                default:
                    return errorResponse(`Unknown tool: ${name}`);
            }
        } catch (error) {
            this.logger.error(`Tool ${name} failed: ${describeError(error)}`);
            return errorResponse(`Error executing tool ${name}: ${describeError(error)}`);
        }
    }

    readResource(uri: string): ResourceResponse {
        if (uri !== SUMMARY_RESOURCE_URI) {
            return {
                contents: [{ uri, mimeType: 'text/plain', text: `Unknown resource: ${uri}` }],
            };
        }
        return {
            contents: [{ uri, mimeType: 'application/json', text: JSON.stringify(this.summary(), null, 2) }],
        };
    }

    private listVariants(args: unknown): ToolResponse {
        const input = ListVariantsSchema.parse(args ?? {});
        const rows = this.store.listJoined(input.patient_id);
        const limit = input.limit ?? 100;
        return jsonResponse({
            total: rows.length,
            returned: Math.min(limit, rows.length),
            variants: rows.slice(0, limit),
        });
    }

    private getVariant(args: unknown): ToolResponse {
        const input = VariantKeySchema.parse(args);
        const row = this.store.getJoined(input.patient_id, input.variant_number);
        if (!row) {
            return errorResponse(`Variant ${input.variant_number} not found for patient ${input.patient_id}`);
        }
        return jsonResponse(row);
    }

    private addVariant(args: unknown): ToolResponse {
        const input = AddVariantSchema.parse(args);
        this.store.addInput({
            patientId: input.patient_id,
            variantNumber: input.variant_number,
            chrom: input.chrom,
            pos: input.pos,
            id: input.id ?? null,
            ref: input.ref,
            alt: input.alt,
        });
        this.logger.info(`Added variant ${input.variant_number} for patient ${input.patient_id}`);
        return jsonResponse(this.store.getJoined(input.patient_id, input.variant_number));
    }

    private async annotateVariant(args: unknown): Promise<ToolResponse> {
        const input = VariantKeySchema.parse(args);
        const record = this.store.getInput(input.patient_id, input.variant_number);
        if (!record) {
            return errorResponse(`Variant ${input.variant_number} not found for patient ${input.patient_id}`);
        }

        const row = await this.pipeline.enrichRecord(record);
        new DatabaseSink(this.store).write(row);
        return jsonResponse(this.store.getJoined(input.patient_id, input.variant_number));
    }

    private summary() {
        const rows = this.store.listJoined();
        const patients = new Map<number, { variants: number; annotated: number }>();
        const significance: Record<string, number> = {};

        for (const row of rows) {
            const entry = patients.get(row.patientId) ?? { variants: 0, annotated: 0 };
            entry.variants++;
            if (row.clinicalSignificance !== null) {
                entry.annotated++;
                significance[row.clinicalSignificance] = (significance[row.clinicalSignificance] ?? 0) + 1;
            }
            patients.set(row.patientId, entry);
        }

        return {
            total_inputs: this.store.countInputs(),
            total_outputs: this.store.countOutputs(),
            patients: [...patients].map(([patientId, counts]) => ({ patient_id: patientId, ...counts })),
            clinical_significance: significance,
        };
    }

    async start(): Promise<void> {
        const transport = new StdioServerTransport();
        await this.server.connect(transport);
        this.logger.info('Variant MCP server started on stdio');
    }
}
