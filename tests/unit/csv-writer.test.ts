/**
 * Unit tests for CSV export
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { readFileSync } from 'fs';
import * as path from 'path';
import { CsvFileWriter, ExportRow, csvHeader, escapeCsvCell, toCsv } from '../../src/export/csv-writer.js';
import { makeTempDir, removeTempDir } from '../helpers.js';

const HEADER =
  'patient_id,variant_number,chrom,pos,id,ref,alt,hgvs,clinvar_id,clinical_significance,star_rating,' +
  'review_status,conditions_assoc,transcript,ref_seq_id,hgnc_id,omim_id,gene_symbol,g_change,c_change,p_change\n';

const row = (overrides: Partial<ExportRow> = {}): ExportRow => ({
  patientId: 1,
  variantNumber: 2,
  chrom: '17',
  pos: 45983420,
  id: null,
  ref: 'G',
  alt: 'T',
  hgvs: 'NC_000017.11:g.45983420G>T',
  clinvarId: '900001',
  clinicalSignificance: 'Pathogenic',
  starRating: '3',
  reviewStatus: 'criteria provided, multiple submitters, no conflicts',
  conditionsAssoc: 'Parkinson disease; Dystonia',
  transcript: 'NM_005910.6',
  refSeqId: 'NC_000017.11',
  hgncId: 'GeneID:4137',
  omimId: '128100',
  geneSymbol: 'MAPT',
  gChange: 'g.45983420G>T',
  cChange: 'c.1234G>T',
  pChange: 'p.(Gly412Cys)',
  ...overrides,
});

describe('escapeCsvCell', () => {
  it('should write null and undefined as empty cells', () => {
    expect(escapeCsvCell(null)).toBe('');
    expect(escapeCsvCell(undefined)).toBe('');
  });

  it('should leave plain values unquoted', () => {
    expect(escapeCsvCell('Pathogenic')).toBe('Pathogenic');
    expect(escapeCsvCell(42)).toBe('42');
  });

  it('should quote cells containing commas, quotes or line breaks', () => {
    expect(escapeCsvCell('a,b')).toBe('"a,b"');
    expect(escapeCsvCell('say "hi"')).toBe('"say ""hi"""');
    expect(escapeCsvCell('two\nlines')).toBe('"two\nlines"');
    expect(escapeCsvCell('cr\rhere')).toBe('"cr\rhere"');
  });
});

describe('toCsv', () => {
  it('should write the header in the fixed column order', () => {
    expect(csvHeader()).toBe(HEADER);
  });

  it('should write one line per row', () => {
    expect(toCsv([row()])).toBe(
      HEADER +
        '1,2,17,45983420,,G,T,NC_000017.11:g.45983420G>T,900001,Pathogenic,3,' +
        '"criteria provided, multiple submitters, no conflicts",Parkinson disease; Dystonia,NM_005910.6,' +
        'NC_000017.11,GeneID:4137,128100,MAPT,g.45983420G>T,c.1234G>T,p.(Gly412Cys)\n'
    );
  });

  it('should write only the header when there are no rows', () => {
    expect(toCsv([])).toBe(HEADER);
  });
});

describe('CsvFileWriter', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeTempDir(dir);
  });

  it('should create missing directories and stream rows to disk', async () => {
    const filePath = path.join(dir, 'nested', 'out.csv');
    const writer = new CsvFileWriter(filePath);
    await writer.writeRow(row({ variantNumber: 1, hgvs: null, clinvarId: null, clinicalSignificance: 'Not found' }));
    await writer.writeRow(row());
    await writer.close();

    const lines = readFileSync(filePath, 'utf8').split('\n');
    expect(writer.rowsWritten).toBe(2);
    expect(lines).toHaveLength(4);
    expect(lines[1].startsWith('1,1,17,45983420,,G,T,,,Not found,3,')).toBe(true);
    expect(lines[3]).toBe('');
  });

  it('should write every row when the stream has to wait for drain', async () => {
    const filePath = path.join(dir, 'large.csv');
    const writer = new CsvFileWriter(filePath);
    for (let i = 1; i <= 2000; i++) {
      await writer.writeRow(row({ variantNumber: i }));
    }
    await writer.close();

    const lines = readFileSync(filePath, 'utf8').split('\n');
    expect(writer.rowsWritten).toBe(2000);
    expect(lines).toHaveLength(2002);
    expect(lines[2000].startsWith('1,2000,17,')).toBe(true);
  });

  it('should reject on close when the file cannot be opened', async () => {
    const writer = new CsvFileWriter(dir);

    await expect(writer.close()).rejects.toThrow('EISDIR');
  });

  it('should rethrow an earlier stream error from the next row', async () => {
    const writer = new CsvFileWriter(dir);
    await expect(writer.close()).rejects.toThrow('EISDIR');

    await expect(writer.writeRow(row())).rejects.toThrow('EISDIR');
    expect(writer.rowsWritten).toBe(0);
  });
});
