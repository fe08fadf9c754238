import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { SIGNAL_TYPES } from '../../../domain/entities/Signal.js';
import { DEFAULT_MATCH_BOUNDS } from '../../../domain/services/recommendations/RecommendationMatcher.js';
import { JsonCatalogAdapter } from '../../../infrastructure/adapters/catalog/JsonCatalogAdapter.js';
import { InMemoryStorageAdapter } from '../../../infrastructure/adapters/storage/InMemoryStorageAdapter.js';
import { PersonaService } from '../PersonaService.js';
import { PipelineService } from '../PipelineService.js';
import { RecommendationService } from '../RecommendationService.js';
import { SignalService } from '../SignalService.js';
import { createAccount } from '../../../__tests__/factories.js';
import { createEducationItem, createOffer, fixedClock } from './fixtures.js';

const catalog = new JsonCatalogAdapter(
  [
    createEducationItem({ contentId: 'e1', triggerSignals: ['credit_utilization_high'] }),
    createEducationItem({ contentId: 'g1', personas: ['general_wellness'] }),
    createEducationItem({ contentId: 'g2', personas: ['general_wellness'] }),
    createEducationItem({ contentId: 'g3', personas: ['general_wellness'] }),
  ],
  [createOffer({ offerId: 'o1' })],
);

async function createPipeline() {
  const storage = new InMemoryStorageAdapter();
  await storage.seedLedger({
    accounts: [
      createAccount({ accountId: 'acc_a_checking', userId: 'user_a' }),
      createAccount({
        accountId: 'acc_a_card',
        userId: 'user_a',
        type: 'credit',
        subtype: 'credit card',
        balance: 6800,
        limit: 10000,
        mask: '4523',
      }),
      createAccount({ accountId: 'acc_b_checking', userId: 'user_b' }),
    ],
    transactions: [],
  });

  const signals = new SignalService(storage, fixedClock);
  const personas = new PersonaService(storage, fixedClock);
  const recommendations = new RecommendationService(storage, catalog, DEFAULT_MATCH_BOUNDS, fixedClock);
  const pipeline = new PipelineService(
    storage,
    signals,
    personas,
    recommendations,
    { timeWindows: ['30d', '180d'] },
    fixedClock,
  );

  return { storage, signals, personas, pipeline };
}

describe('PipelineService', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should run signals, personas and recommendations for every window', async () => {
    const { pipeline } = await createPipeline();

    const summary = await pipeline.run({ asOf: '2026-06-30' });

    expect(summary.asOf).toBe('2026-06-30');
    expect(summary.windows.map((window) => window.timeWindow)).toEqual(['30d', '180d']);
    for (const window of summary.windows) {
      expect(window.usersProcessed).toBe(2);
      expect(window.signalsStored).toBe(2 * SIGNAL_TYPES.length);
      expect(window.personaCounts).toEqual({
        high_utilization: 1,
        variable_income: 0,
        subscription_heavy: 0,
        savings_builder: 0,
        general_wellness: 1,
      });
      expect(window.recommendationsCreated).toBe(6);
      expect(window.skipped).toEqual([]);
      expect(window.flagged).toEqual([]);
    }
  });

  it('should store one persona and four signal records per user and window', async () => {
    const { pipeline, personas, signals } = await createPipeline();

    await pipeline.run({ asOf: '2026-06-30' });

    expect((await personas.current('user_a', '30d'))?.primaryPersona).toBe('high_utilization');
    expect((await personas.current('user_b', '180d'))?.primaryPersona).toBe('general_wellness');
    const stored = await signals.loadBundle('user_a', '30d');
    expect(stored?.signals.creditUtilization.totalUtilization).toBe(68);
    expect(stored?.computedAt).toBe('2026-06-30T12:00:00.000Z');
    expect(await signals.loadBundle('user_missing', '30d')).toBeNull();
  });

  it('should replace signals but append recommendations on a rerun', async () => {
    const { pipeline, storage } = await createPipeline();

    await pipeline.run({ asOf: '2026-06-30' });
    await pipeline.run({ asOf: '2026-06-30' });

    expect(await storage.loadSignals('user_a', '30d')).toHaveLength(SIGNAL_TYPES.length);
    const history = await storage.listRecommendations('user_b');
    expect(history).toHaveLength(16);
    expect(history.filter((rec) => rec.timeWindow === '30d')).toHaveLength(8);
  });

  it('should honour requested users and windows', async () => {
    const { pipeline } = await createPipeline();

    const summary = await pipeline.run({ asOf: '2026-06-30', timeWindows: ['30d', '30d'], userIds: ['user_b'] });

    expect(summary.windows).toHaveLength(1);
    expect(summary.windows[0]?.usersProcessed).toBe(1);
    expect(summary.windows[0]?.personaCounts.general_wellness).toBe(1);
  });

  it('should default the as-of date to the clock', async () => {
    const { pipeline } = await createPipeline();

    expect((await pipeline.run()).asOf).toBe('2026-06-30');
  });
});
