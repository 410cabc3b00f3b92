/**
 * Unit tests for environment configuration
 */

import { describe, it, expect } from '@jest/globals';
import { loadConfig } from '../../src/config/index.js';

describe('loadConfig', () => {
  it('should fall back to defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      database: { path: 'instance/variants.db' },
      variantValidator: {
        baseUrl: 'https://rest.variantvalidator.org/LOVD/lovd',
        genomeBuild: 'GRCh38',
        transcriptModel: 'all',
        selectTranscripts: 'mane',
        checkOnly: true,
        liftover: true,
        minDelayMs: 250,
      },
      clinvar: {
        baseUrl: 'https://eutils.ncbi.nlm.nih.gov/entrez/eutils',
        apiKey: undefined,
      },
      http: { timeoutMs: 30000 },
      logging: { level: 'info' },
    });
  });

  it('should parse flags, numbers and the liftover mode', () => {
    const config = loadConfig({
      GENOME_BUILD: 'GRCh37',
      CHECK_ONLY: 'False',
      LIFTOVER: 'primary',
      MIN_CALL_DELAY_MS: '0',
      HTTP_TIMEOUT_MS: '5000',
      NCBI_API_KEY: 'test-secret',
      LOG_LEVEL: 'debug',
    });

    expect(config.variantValidator).toMatchObject({
      genomeBuild: 'GRCh37',
      checkOnly: false,
      liftover: 'primary',
      minDelayMs: 0,
    });
    expect(config.http.timeoutMs).toBe(5000);
    expect(config.clinvar.apiKey).toBe('test-secret');
    expect(config.logging.level).toBe('debug');
  });

  it('should strip trailing slashes from service URLs', () => {
    const config = loadConfig({
      VARIANT_VALIDATOR_BASE_URL: 'https://vv.test/LOVD/lovd//',
      CLINVAR_BASE_URL: 'https://eutils.test/entrez/eutils/',
    });

    expect(config.variantValidator.baseUrl).toBe('https://vv.test/LOVD/lovd');
    expect(config.clinvar.baseUrl).toBe('https://eutils.test/entrez/eutils');
  });

  it('should name every invalid key', () => {
    expect(() => loadConfig({ GENOME_BUILD: 'GRCh36', MIN_CALL_DELAY_MS: '-5' })).toThrow(
      /^Invalid configuration: GENOME_BUILD: .+; MIN_CALL_DELAY_MS: .+$/
    );
  });
});
