import type { TriggerSignal } from '../../entities/CatalogItem.js';
import type { SignalBundle } from '../../entities/Signal.js';

interface TriggerDefinition {
  signalFields: string[];
  fires: (signals: SignalBundle) => boolean;
}

export const TRIGGER_DEFINITIONS: Record<TriggerSignal, TriggerDefinition> = {
  credit_utilization_high: {
    signalFields: ['creditUtilization.totalUtilization'],
    fires: (s) => s.creditUtilization.totalUtilization >= 50,
  },
  minimum_payment_only: {
    signalFields: ['creditUtilization.minimumPaymentOnly'],
    fires: (s) => s.creditUtilization.minimumPaymentOnly,
  },
  interest_charged: {
    signalFields: ['creditUtilization.interestCharged'],
    fires: (s) => s.creditUtilization.interestCharged > 0,
  },
  is_overdue: {
    signalFields: ['creditUtilization.isOverdue'],
    fires: (s) => s.creditUtilization.isOverdue,
  },
  irregular_frequency: {
    signalFields: ['incomeStability.irregularFrequency'],
    fires: (s) => s.incomeStability.irregularFrequency,
  },
  median_pay_gap_high: {
    signalFields: ['incomeStability.medianPayGap'],
    fires: (s) => s.incomeStability.medianPayGap > 45,
  },
  cash_flow_buffer_low: {
    signalFields: ['incomeStability.cashFlowBuffer'],
    fires: (s) => s.incomeStability.cashFlowBuffer < 1,
  },
  subscription_count_high: {
    signalFields: ['subscriptions.recurringMerchants'],
    fires: (s) => s.subscriptions.recurringMerchants.length >= 3,
  },
  monthly_recurring_high: {
    signalFields: ['subscriptions.monthlyRecurring'],
    fires: (s) => s.subscriptions.monthlyRecurring >= 50,
  },
  savings_growth_rate_positive: {
    signalFields: ['savingsBehavior.growthRate'],
    fires: (s) => s.savingsBehavior.growthRate > 0,
  },
  emergency_fund_adequate: {
    signalFields: ['savingsBehavior.emergencyFundCoverage'],
    fires: (s) => s.savingsBehavior.emergencyFundCoverage >= 3,
  },
  savings_balance_positive: {
    signalFields: ['savingsBehavior.totalSavings'],
    fires: (s) => s.savingsBehavior.totalSavings > 0,
  },
};

export interface TriggerEvaluation {
  matched: boolean;
  triggersMatched: TriggerSignal[];
  signalFields: string[];
}

/**
 * Trigger lists are OR-ed; an empty list always matches. `signalFields` lists
 * what was read to decide, fired or not.
 */
export const evaluateTriggers = (triggers: TriggerSignal[], signals: SignalBundle): TriggerEvaluation => {
  if (triggers.length === 0) {
    return { matched: true, triggersMatched: [], signalFields: [] };
  }

  const triggersMatched = triggers.filter((trigger) => TRIGGER_DEFINITIONS[trigger].fires(signals));
  const signalFields = triggers.flatMap((trigger) => TRIGGER_DEFINITIONS[trigger].signalFields);

  return { matched: triggersMatched.length > 0, triggersMatched, signalFields };
};
