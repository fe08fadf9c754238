import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { ZodError } from 'zod';
import { loadConfig } from '../Config.js';

describe('loadConfig', () => {
  it('should apply defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config.server.port).toBe(4000);
    expect(config.pipeline).toEqual({ timeWindows: ['30d', '180d'], asOf: undefined });
    expect(config.matching).toEqual({ educationMin: 3, educationMax: 5, offerMax: 3 });
    expect(path.basename(config.data.catalogDir)).toBe('catalog');
    expect(config.data.ledgerSeedPath?.endsWith(path.join('data', 'demo', 'ledger.json'))).toBe(true);
  });

  it('should parse and de-duplicate configured windows', () => {
    const config = loadConfig({ PIPELINE_TIME_WINDOWS: ' 180d, 30d ,180d', PIPELINE_AS_OF: '2026-06-30', PORT: '8080' });

    expect(config.pipeline).toEqual({ timeWindows: ['180d', '30d'], asOf: '2026-06-30' });
    expect(config.server.port).toBe(8080);
  });

  it('should disable seeding with an empty seed path', () => {
    expect(loadConfig({ LEDGER_SEED_PATH: '' }).data.ledgerSeedPath).toBeNull();
  });

  it('should reject unknown windows', () => {
    expect(() => loadConfig({ PIPELINE_TIME_WINDOWS: '7d' })).toThrow(ZodError);
  });

  it('should reject a malformed as-of date', () => {
    expect(() => loadConfig({ PIPELINE_AS_OF: '06/30/2026' })).toThrow('PIPELINE_AS_OF must be YYYY-MM-DD');
  });

  it('should reject an education minimum above the maximum', () => {
    expect(() => loadConfig({ EDUCATION_MIN_ITEMS: '6', EDUCATION_MAX_ITEMS: '5' })).toThrow(
      'EDUCATION_MIN_ITEMS cannot exceed EDUCATION_MAX_ITEMS',
    );
  });
});
