import { describe, expect, it } from 'vitest';
import { detectedBehaviors, percentage, personaDistribution } from '../EvaluationMetrics.js';
import { createBundle } from '../../../../__tests__/factories.js';

describe('detectedBehaviors', () => {
  it('should find nothing in an empty bundle', () => {
    expect(detectedBehaviors(createBundle())).toEqual([]);
  });

  it('should list every signal type with data', () => {
    const bundle = createBundle({
      subscriptions: { recurringMerchants: ['Streamly'] },
      creditUtilization: {
        accounts: [
          {
            accountId: 'acc_card',
            subtype: 'credit card',
            mask: null,
            balance: 100,
            limit: 1000,
            utilization: 10,
            utilizationLevel: 'low',
            interestCharged: 0,
            minimumPaymentOnly: false,
          },
        ],
      },
      savingsBehavior: { accounts: [{ accountId: 'acc_savings', subtype: 'savings', balance: 500, netInflow: 0 }] },
      incomeStability: { medianPayGap: 14 },
    });

    expect(detectedBehaviors(bundle)).toEqual([
      'subscriptions',
      'credit_utilization',
      'savings_behavior',
      'income_stability',
    ]);
  });
});

describe('percentage', () => {
  it('should round to two decimals', () => {
    expect(percentage(1, 3)).toBe(33.33);
    expect(percentage(2, 2)).toBe(100);
  });

  it('should return 0 when the total is 0', () => {
    expect(percentage(0, 0)).toBe(0);
  });
});

describe('personaDistribution', () => {
  it('should count and share every persona', () => {
    expect(personaDistribution(['high_utilization', 'high_utilization', 'general_wellness', 'savings_builder'])).toEqual({
      high_utilization: { count: 2, percentage: 50 },
      variable_income: { count: 0, percentage: 0 },
      subscription_heavy: { count: 0, percentage: 0 },
      savings_builder: { count: 1, percentage: 25 },
      general_wellness: { count: 1, percentage: 25 },
    });
  });

  it('should report zeros for no users', () => {
    expect(personaDistribution([]).general_wellness).toEqual({ count: 0, percentage: 0 });
  });
});
