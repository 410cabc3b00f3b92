/**
 * Unit tests for the MCP tool and resource handlers
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { notFoundAnnotation } from '../../src/clinvar/summary-extractor.js';
import { VariantStore } from '../../src/db/variant-store.js';
import { EnrichmentPipeline } from '../../src/pipeline/enrichment-pipeline.js';
import { SUMMARY_RESOURCE_URI, ToolResponse, VariantMCPServer } from '../../src/mcp-server/server.js';
import { CapturingLogger } from '../helpers.js';

function payload(response: ToolResponse): unknown {
  return JSON.parse(response.content[0].text);
}

describe('VariantMCPServer', () => {
  let store: VariantStore;
  let server: VariantMCPServer;

  beforeEach(() => {
    store = VariantStore.open(':memory:');
    store.initSchema();
    const logger = new CapturingLogger();
    const pipeline = new EnrichmentPipeline({
      resolver: {
        resolve: async query => ({
          variantDescription: `${query.chrom}:${query.pos}:${query.ref}:${query.alt}`,
          hgvsGenomic: `NC_000017.11:g.${query.pos}${query.ref}>${query.alt}`,
          transcriptProtein: null,
          selectedBuild: 'GRCh38',
          maneSelectTranscript: null,
        }),
      },
      annotator: {
        annotate: async hgvs => ({
          ...notFoundAnnotation(hgvs),
          found: true,
          clinvarId: '900001',
          clinicalSignificance: 'Uncertain significance',
          reviewStatus: 'criteria provided, single submitter',
          starRating: '1',
        }),
      },
      logger,
    });
    server = new VariantMCPServer(store, pipeline, logger);
  });

  afterEach(() => {
    store.close();
  });

  const addArgs = { patient_id: 1, variant_number: 1, chrom: '17', pos: 45983420, ref: 'G', alt: 'T' };

  it('should add a variant and return the joined row', async () => {
    const response = await server.callTool('add_variant', addArgs);

    expect(response.isError).toBeUndefined();
    expect(payload(response)).toMatchObject({ patientId: 1, variantNumber: 1, id: null, hgvs: null });
    expect(store.countInputs()).toBe(1);
  });

  it('should refuse to add a duplicate key', async () => {
    await server.callTool('add_variant', addArgs);
    const response = await server.callTool('add_variant', { ...addArgs, chrom: '4' });

    expect(response.isError).toBe(true);
    expect(response.content[0].text).toBe(
      'Error executing tool add_variant: Variant 1 already exists for patient 1'
    );
  });

  it('should reject arguments that fail validation', async () => {
    const response = await server.callTool('add_variant', { ...addArgs, pos: -1 });

    expect(response.isError).toBe(true);
    expect(store.countInputs()).toBe(0);
  });

  it('should annotate a stored variant and save the result', async () => {
    await server.callTool('add_variant', addArgs);

    const response = await server.callTool('annotate_variant', { patient_id: 1, variant_number: 1 });

    expect(payload(response)).toMatchObject({
      hgvs: 'NC_000017.11:g.45983420G>T',
      clinvarId: '900001',
      clinicalSignificance: 'Uncertain significance',
      starRating: '1',
      gChange: 'g.45983420G>T',
    });
    expect(store.countOutputs()).toBe(1);
  });

  it('should report unknown variants and tools as errors', async () => {
    const missing = await server.callTool('get_variant', { patient_id: 4, variant_number: 2 });
    const unknown = await server.callTool('drop_tables', {});

    expect(missing).toEqual({
      content: [{ type: 'text', text: 'Variant 2 not found for patient 4' }],
      isError: true,
    });
    expect(unknown.content[0].text).toBe('Unknown tool: drop_tables');
  });

  it('should list variants with a limit', async () => {
    await server.callTool('add_variant', addArgs);
    await server.callTool('add_variant', { ...addArgs, variant_number: 2 });

    const response = await server.callTool('list_variants', { limit: 1 });

    expect(payload(response)).toMatchObject({ total: 2, returned: 1 });
  });

  it('should summarise inputs per patient and significance', async () => {
    await server.callTool('add_variant', addArgs);
    await server.callTool('add_variant', { ...addArgs, variant_number: 2 });
    await server.callTool('annotate_variant', { patient_id: 1, variant_number: 1 });

    const resource = server.readResource(SUMMARY_RESOURCE_URI);

    expect(JSON.parse(resource.contents[0].text)).toEqual({
      total_inputs: 2,
      total_outputs: 1,
      patients: [{ patient_id: 1, variants: 2, annotated: 1 }],
      clinical_significance: { 'Uncertain significance': 1 },
    });
  });
});
