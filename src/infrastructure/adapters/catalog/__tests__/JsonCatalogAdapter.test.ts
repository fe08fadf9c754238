import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { EducationItem } from '../../../../domain/entities/CatalogItem.js';
import type { CreditAccountUtilization } from '../../../../domain/entities/Signal.js';
import { generateRationale } from '../../../../domain/services/recommendations/RationaleGenerator.js';
import { checkTone } from '../../../../domain/services/recommendations/ToneGuardrail.js';
import { EDUCATION_FILE, JsonCatalogAdapter, PARTNER_OFFERS_FILE } from '../JsonCatalogAdapter.js';
import { createBundle } from '../../../../__tests__/factories.js';

const CATALOG_DIR = fileURLToPath(new URL('../../../../../data/catalog', import.meta.url));

const card: CreditAccountUtilization = {
  accountId: 'acc_card',
  subtype: 'credit card',
  mask: '4523',
  balance: 3400,
  limit: 5000,
  utilization: 68,
  utilizationLevel: 'high',
  interestCharged: 42.1,
  minimumPaymentOnly: true,
};

const populatedSignals = createBundle({
  subscriptions: { recurringMerchants: ['Netflix', 'Spotify', 'Gym'], monthlyRecurring: 64.97, subscriptionShare: 12 },
  creditUtilization: { totalUtilization: 68, accounts: [card], interestCharged: 42.1 },
  savingsBehavior: { totalSavings: 2500, growthRate: 3.2 },
  incomeStability: { medianPayGap: 52, cashFlowBuffer: 0.6 },
});

function createEducationItem(contentId: string): EducationItem {
  return {
    contentId,
    type: 'education',
    title: 'Title',
    category: 'credit',
    personas: ['general_wellness'],
    triggerSignals: [],
    summary: 'Summary',
    rationaleTemplate: 'Rationale',
  };
}

describe('JsonCatalogAdapter', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('bundled catalog', () => {
    it('should load every education item and partner offer', async () => {
      const catalog = await JsonCatalogAdapter.fromDirectory(CATALOG_DIR);

      expect(catalog.listEducation()).toHaveLength(20);
      expect(catalog.listOffers()).toHaveLength(18);
      expect(catalog.listEducation().every((item) => item.type === 'education')).toBe(true);
      expect(catalog.listOffers().every((item) => item.type === 'partner_offer')).toBe(true);
    });

    it('should cover every persona with at least three education items', async () => {
      const catalog = await JsonCatalogAdapter.fromDirectory(CATALOG_DIR);
      const personas = ['high_utilization', 'variable_income', 'subscription_heavy', 'savings_builder', 'general_wellness'] as const;

      for (const persona of personas) {
        const count = catalog.listEducation().filter((item) => item.personas.includes(persona)).length;
        expect(count, persona).toBeGreaterThanOrEqual(3);
      }
    });

    it('should render every template without leftover placeholders or tone violations', async () => {
      const catalog = await JsonCatalogAdapter.fromDirectory(CATALOG_DIR);
      const templates = [...catalog.listEducation(), ...catalog.listOffers()].map((item) => item.rationaleTemplate);

      for (const template of templates) {
        const { text, strippedPlaceholders } = generateRationale(template, populatedSignals);
        expect(strippedPlaceholders, template).toEqual([]);
        expect(text).not.toMatch(/[{}]/);
        expect(checkTone(text).violations, text).toEqual([]);
      }
    });

    it('should find items of either kind by id', async () => {
      const catalog = await JsonCatalogAdapter.fromDirectory(CATALOG_DIR);

      expect(catalog.findById('edu_credit_util_101')?.type).toBe('education');
      expect(catalog.findById('missing')).toBeNull();
    });
  });

  describe('validation', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(path.join(os.tmpdir(), 'catalog-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('should reject files that do not match the schema', async () => {
      await writeFile(path.join(dir, EDUCATION_FILE), JSON.stringify([{ contentId: 'edu_1' }]));
      await writeFile(path.join(dir, PARTNER_OFFERS_FILE), '[]');

      await expect(JsonCatalogAdapter.fromDirectory(dir)).rejects.toThrow(/Invalid catalog file .*education\.json/);
    });

    it('should reject duplicate ids across the catalog', () => {
      expect(() => new JsonCatalogAdapter([createEducationItem('dup'), createEducationItem('dup')], [])).toThrow(
        'Duplicate catalog id: dup',
      );
    });

    it('should not let callers mutate the loaded lists', () => {
      const source = [createEducationItem('edu_1')];
      const catalog = new JsonCatalogAdapter(source, []);

      source.push(createEducationItem('edu_2'));

      expect(catalog.listEducation()).toHaveLength(1);
      expect(Object.isFrozen(catalog.listEducation())).toBe(true);
    });
  });
});
