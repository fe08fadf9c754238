import { describe, expect, it } from 'vitest';
import { PERSONA_IDS } from '../../../entities/Persona.js';
import type { CreditAccountUtilization } from '../../../entities/Signal.js';
import { classifyPersona, classifyPersonaBatch, rankByMatch, toPersonaAssignment } from '../PersonaClassifier.js';
import { PERSONA_RULES, ruleFor } from '../PersonaRules.js';
import { createBundle } from '../../../../__tests__/factories.js';

function createCardUtilization(utilization: number): CreditAccountUtilization {
  return {
    accountId: 'acc_card',
    subtype: 'credit card',
    mask: '4523',
    balance: utilization * 100,
    limit: 10000,
    utilization,
    utilizationLevel: utilization >= 50 ? 'high' : utilization >= 30 ? 'medium' : 'low',
    interestCharged: 0,
    minimumPaymentOnly: false,
  };
}

const highUtilization = createBundle({
  creditUtilization: { totalUtilization: 68, utilizationLevel: 'high', accounts: [createCardUtilization(68)] },
});

const irregularIncome = createBundle({
  incomeStability: { medianPayGap: 35, irregularFrequency: true, cashFlowBuffer: 0.4, avgMonthlyExpenses: 2000 },
});

const heavySubscriptions = createBundle({
  subscriptions: { recurringMerchants: ['A', 'B', 'C'], monthlyRecurring: 30, subscriptionShare: 12 },
});

const growingSavings = createBundle({
  savingsBehavior: { growthRate: 5, netInflow: 600, totalSavings: 6000 },
  creditUtilization: { totalUtilization: 10, accounts: [createCardUtilization(10)] },
});

describe('PERSONA_RULES', () => {
  it('should be a frozen table in priority order', () => {
    expect(PERSONA_RULES.map((rule) => rule.id)).toEqual([...PERSONA_IDS]);
    expect(PERSONA_RULES.map((rule) => rule.priority)).toEqual([1, 2, 3, 4, 5]);
    expect(Object.isFrozen(PERSONA_RULES)).toBe(true);
  });

  it('should give general_wellness the inputs of every other rule', () => {
    expect(ruleFor('general_wellness').signalFields).toContain('creditUtilization.totalUtilization');
    expect(ruleFor('general_wellness').signalFields).toContain('incomeStability.cashFlowBuffer');
    expect(ruleFor('general_wellness').signalFields).toContain('subscriptions.monthlyRecurring');
    expect(ruleFor('general_wellness').signalFields).toContain('savingsBehavior.growthRate');
  });
});

describe('classifyPersona', () => {
  it('should assign high_utilization at 68% utilization', () => {
    const result = classifyPersona(highUtilization);

    expect(result.primaryPersona).toBe('high_utilization');
    expect(result.criteriaMet).toEqual([ruleFor('high_utilization').criteria]);
    expect(result.matches).toEqual({
      high_utilization: 68,
      variable_income: 0,
      subscription_heavy: 0,
      savings_builder: 0,
      general_wellness: 32,
    });
  });

  it('should pick the first satisfied rule, not the highest match', () => {
    const result = classifyPersona(
      createBundle({
        creditUtilization: { totalUtilization: 55, accounts: [createCardUtilization(55)] },
        subscriptions: { recurringMerchants: ['A', 'B', 'C', 'D'], monthlyRecurring: 80, subscriptionShare: 20 },
      }),
    );

    expect(result.primaryPersona).toBe('high_utilization');
    expect(result.matches.high_utilization).toBe(55);
    expect(result.matches.subscription_heavy).toBe(100);
  });

  it('should use the highest single card when it exceeds the total', () => {
    const result = classifyPersona(
      createBundle({ creditUtilization: { totalUtilization: 40, accounts: [createCardUtilization(60)] } }),
    );

    expect(result.primaryPersona).toBe('high_utilization');
    expect(result.matches.high_utilization).toBe(60);
  });

  it('should raise the high_utilization match for each distress flag, capped at 100', () => {
    const interestOnly = classifyPersona(
      createBundle({ creditUtilization: { totalUtilization: 10, interestCharged: 20 } }),
    );
    const everything = classifyPersona(
      createBundle({
        creditUtilization: { totalUtilization: 95, interestCharged: 20, minimumPaymentOnly: true, isOverdue: true },
      }),
    );

    expect(interestOnly.primaryPersona).toBe('high_utilization');
    expect(interestOnly.matches.high_utilization).toBe(25);
    expect(everything.matches.high_utilization).toBe(100);
  });

  it('should assign variable_income for irregular pay and a thin buffer', () => {
    const result = classifyPersona(irregularIncome);

    expect(result.primaryPersona).toBe('variable_income');
    expect(result.matches.variable_income).toBe(84);
  });

  it('should score a thin buffer on a regular payroll without matching', () => {
    const result = classifyPersona(
      createBundle({ incomeStability: { medianPayGap: 14, irregularFrequency: false, cashFlowBuffer: 0.5 } }),
    );

    expect(result.primaryPersona).toBe('general_wellness');
    expect(result.matches.variable_income).toBe(20);
  });

  it('should assign subscription_heavy on share alone when spend is low', () => {
    const result = classifyPersona(heavySubscriptions);

    expect(result.primaryPersona).toBe('subscription_heavy');
    expect(result.matches.subscription_heavy).toBe(100);
  });

  it('should not assign subscription_heavy below both spend thresholds', () => {
    const result = classifyPersona(
      createBundle({ subscriptions: { recurringMerchants: ['A', 'B', 'C'], monthlyRecurring: 30, subscriptionShare: 6 } }),
    );

    expect(result.primaryPersona).toBe('general_wellness');
    expect(result.matches.subscription_heavy).toBe(80);
  });

  it('should assign savings_builder for growing savings and low utilization', () => {
    const result = classifyPersona(growingSavings);

    expect(result.primaryPersona).toBe('savings_builder');
    expect(result.matches.savings_builder).toBe(100);
  });

  it('should block savings_builder when any card is at 30% or more', () => {
    const result = classifyPersona(
      createBundle({
        savingsBehavior: { growthRate: 5, netInflow: 600 },
        creditUtilization: { totalUtilization: 20, accounts: [createCardUtilization(40)] },
      }),
    );

    expect(result.primaryPersona).toBe('general_wellness');
    expect(result.matches.savings_builder).toBe(70);
  });

  it('should give partial savings credit below the thresholds', () => {
    const result = classifyPersona(createBundle({ savingsBehavior: { growthRate: 1, netInflow: 100 } }));

    expect(result.primaryPersona).toBe('general_wellness');
    expect(result.matches.savings_builder).toBe(65);
    expect(result.matches.general_wellness).toBe(35);
  });

  it('should fall back to general_wellness for an empty bundle', () => {
    const result = classifyPersona(createBundle());

    expect(result).toEqual({
      primaryPersona: 'general_wellness',
      criteriaMet: [],
      matches: {
        high_utilization: 0,
        variable_income: 0,
        subscription_heavy: 0,
        savings_builder: 0,
        general_wellness: 100,
      },
    });
  });
});

describe('classifyPersonaBatch', () => {
  const bundles = [
    highUtilization,
    irregularIncome,
    heavySubscriptions,
    growingSavings,
    createBundle(),
    createBundle({ savingsBehavior: { growthRate: -4, netInflow: -300 } }),
    createBundle({ creditUtilization: { totalUtilization: 140, accounts: [createCardUtilization(140)] } }),
  ];

  it('should return exactly what row-by-row classification returns', () => {
    expect(classifyPersonaBatch(bundles)).toEqual(bundles.map(classifyPersona));
  });

  it('should keep every match percentage within 0 and 100', () => {
    for (const result of classifyPersonaBatch(bundles)) {
      for (const id of PERSONA_IDS) {
        expect(result.matches[id]).toBeGreaterThanOrEqual(0);
        expect(result.matches[id]).toBeLessThanOrEqual(100);
      }
    }
  });

  it('should handle an empty batch', () => {
    expect(classifyPersonaBatch([])).toEqual([]);
  });
});

describe('toPersonaAssignment', () => {
  it('should flatten matches into assignment columns', () => {
    const assignment = toPersonaAssignment('user_1', '30d', classifyPersona(highUtilization), '2026-06-30T00:00:00.000Z');

    expect(assignment).toEqual({
      userId: 'user_1',
      timeWindow: '30d',
      persona: 'high_utilization',
      primaryPersona: 'high_utilization',
      matchHighUtilization: 68,
      matchVariableIncome: 0,
      matchSubscriptionHeavy: 0,
      matchSavingsBuilder: 0,
      matchGeneralWellness: 32,
      criteriaMet: [ruleFor('high_utilization').criteria],
      assignedAt: '2026-06-30T00:00:00.000Z',
    });
  });
});

describe('rankByMatch', () => {
  it('should order by match and keep priority order on ties', () => {
    expect(rankByMatch(classifyPersona(createBundle()).matches)).toEqual([
      'general_wellness',
      'high_utilization',
      'variable_income',
      'subscription_heavy',
      'savings_builder',
    ]);
  });
});
