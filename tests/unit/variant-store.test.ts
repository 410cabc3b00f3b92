/**
 * Unit tests for the SQLite variant store
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { OutputRecord, VariantRecord, VariantStore } from '../../src/db/variant-store.js';

const input = (overrides: Partial<VariantRecord> = {}): VariantRecord => ({
  patientId: 1,
  variantNumber: 1,
  chrom: '17',
  pos: 45983420,
  id: null,
  ref: 'G',
  alt: 'T',
  ...overrides,
});

const output = (overrides: Partial<OutputRecord> = {}): OutputRecord => ({
  patientId: 1,
  variantNumber: 1,
  hgvs: 'NC_000017.11:g.45983420G>T',
  clinvarId: '900001',
  clinicalSignificance: 'Pathogenic',
  starRating: '3',
  reviewStatus: 'criteria provided, multiple submitters, no conflicts',
  conditionsAssoc: 'Parkinson disease',
  transcript: 'NM_005910.6',
  refSeqId: 'NC_000017.11',
  hgncId: 'GeneID:4137',
  omimId: '168600',
  geneSymbol: 'MAPT',
  gChange: 'g.45983420G>T',
  cChange: 'c.1234G>T',
  pChange: 'p.(Gly412Cys)',
  ...overrides,
});

describe('VariantStore', () => {
  let store: VariantStore;

  beforeEach(() => {
    store = VariantStore.open(':memory:');
    store.initSchema();
  });

  afterEach(() => {
    store.close();
  });

  describe('inputs', () => {
    it('should report whether a key exists', () => {
      store.insertInput(input());

      expect(store.hasInput(1, 1)).toBe(true);
      expect(store.hasInput(1, 2)).toBe(false);
      expect(store.hasInput(2, 1)).toBe(false);
    });

    it('should list inputs ordered by patient then variant number', () => {
      store.insertInput(input({ patientId: 2, variantNumber: 1 }));
      store.insertInput(input({ patientId: 1, variantNumber: 2 }));
      store.insertInput(input({ patientId: 1, variantNumber: 1 }));

      expect(store.listInputs().map(r => [r.patientId, r.variantNumber])).toEqual([[1, 1], [1, 2], [2, 1]]);
      expect(store.listInputs(1)).toHaveLength(2);
      expect(store.listInputs(3)).toEqual([]);
    });

    it('should refuse a manual entry whose key already exists', () => {
      store.addInput(input());

      expect(() => store.addInput(input({ chrom: '4' }))).toThrow('Variant 1 already exists for patient 1');
      expect(store.getInput(1, 1)?.chrom).toBe('17');
    });

    it('should return undefined for an unknown key', () => {
      expect(store.getInput(9, 9)).toBeUndefined();
    });
  });

  describe('outputs', () => {
    it('should overwrite an existing output row on upsert', () => {
      store.insertInput(input());
      store.upsertOutput(output());
      store.upsertOutput(output({ clinicalSignificance: 'Likely pathogenic', starRating: '1' }));

      const row = store.getJoined(1, 1);
      expect(store.countOutputs()).toBe(1);
      expect(row?.clinicalSignificance).toBe('Likely pathogenic');
      expect(row?.starRating).toBe('1');
      expect(row?.analysedAt).not.toBeNull();
    });

    it('should store N/A star ratings as text', () => {
      store.insertInput(input());
      store.upsertOutput(output({ starRating: 'N/A' }));

      expect(store.getJoined(1, 1)?.starRating).toBe('N/A');
    });

    it('should not accept an output for a missing input', () => {
      expect(() => store.upsertOutput(output({ patientId: 7 }))).toThrow();
    });

    it('should leave output columns null in the joined view until annotated', () => {
      store.insertInput(input());
      store.insertInput(input({ variantNumber: 2 }));
      store.upsertOutput(output());

      const rows = store.listJoined();
      expect(rows).toHaveLength(2);
      expect(rows[0]).toMatchObject({ variantNumber: 1, geneSymbol: 'MAPT', pChange: 'p.(Gly412Cys)' });
      expect(rows[1]).toMatchObject({
        variantNumber: 2,
        hgvs: null,
        clinicalSignificance: null,
        starRating: null,
        analysedAt: null,
      });
    });
  });

  describe('initSchema', () => {
    it('should keep data when run again without reset', () => {
      store.insertInput(input());
      store.initSchema();

      expect(store.countInputs()).toBe(1);
    });

    it('should drop both tables on reset', () => {
      store.insertInput(input());
      store.upsertOutput(output());
      store.initSchema({ reset: true });

      expect(store.countInputs()).toBe(0);
      expect(store.countOutputs()).toBe(0);
    });
  });
});
