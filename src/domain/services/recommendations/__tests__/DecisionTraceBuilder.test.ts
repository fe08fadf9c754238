import { describe, expect, it } from 'vitest';
import type { EligibilityCheck } from '../../../entities/DecisionTrace.js';
import { buildDecisionTrace, type DecisionTraceInput } from '../DecisionTraceBuilder.js';

const TIMESTAMP = '2026-06-30T12:00:00.000Z';

function createInput(overrides: Partial<DecisionTraceInput> = {}): DecisionTraceInput {
  return {
    persona: 'high_utilization',
    personaSignalFields: ['creditUtilization.totalUtilization', 'creditUtilization.isOverdue'],
    timeWindow: '30d',
    contentId: 'edu_credit_101',
    contentType: 'education',
    matchReason: 'trigger',
    tone: { passed: true, violations: [] },
    timestamp: TIMESTAMP,
    ...overrides,
  };
}

describe('buildDecisionTrace', () => {
  it('should merge and sort every signal field used', () => {
    const trace = buildDecisionTrace(
      createInput({
        triggersMatched: ['credit_utilization_high'],
        matchSignalFields: ['creditUtilization.totalUtilization'],
        rationaleSignalFields: ['creditUtilization.accounts.balance', 'creditUtilization.accounts.limit'],
      }),
    );

    expect(trace.signalsUsed).toEqual([
      'creditUtilization.accounts.balance',
      'creditUtilization.accounts.limit',
      'creditUtilization.isOverdue',
      'creditUtilization.totalUtilization',
    ]);
    expect(trace.triggersMatched).toEqual(['credit_utilization_high']);
    expect(trace.personaMatch).toBe('high_utilization');
    expect(trace.timestamp).toBe(TIMESTAMP);
  });

  it('should pass the eligibility guardrail when there are no checks', () => {
    const trace = buildDecisionTrace(createInput());

    expect(trace.guardrailsPassed).toEqual({ toneCheck: true, eligibilityCheck: true });
    expect(trace.eligibilityChecks).toEqual([]);
    expect(trace.triggersMatched).toEqual([]);
  });

  it('should carry eligibility checks and their fields into the trace', () => {
    const checks: EligibilityCheck[] = [
      {
        field: 'savings_balance',
        signalField: 'savingsBehavior.totalSavings',
        constraint: { min: 100 },
        actual: 50,
        passed: false,
      },
    ];

    const trace = buildDecisionTrace(
      createInput({ contentId: 'offer_hysa', contentType: 'partner_offer', matchReason: 'eligibility', eligibilityChecks: checks }),
    );

    expect(trace.guardrailsPassed.eligibilityCheck).toBe(false);
    expect(trace.signalsUsed).toContain('savingsBehavior.totalSavings');
    expect(trace.eligibilityChecks).toEqual(checks);
    expect(trace.eligibilityChecks[0]).not.toBe(checks[0]);
  });

  it('should record tone violations', () => {
    const trace = buildDecisionTrace(createInput({ tone: { passed: false, violations: ['wasteful'] } }));

    expect(trace.guardrailsPassed.toneCheck).toBe(false);
    expect(trace.toneViolations).toEqual(['wasteful']);
  });
});
