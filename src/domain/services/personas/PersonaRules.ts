import type { PersonaId } from '../../entities/Persona.js';
import type { SignalBundle } from '../../entities/Signal.js';
import { HIGH_UTILIZATION, MEDIUM_UTILIZATION } from '../signals/CreditUtilizationDetector.js';
import { clamp, roundTo } from '../IntervalMath.js';

/** The flat view of a signal bundle that persona rules are written against. */
export interface PersonaFeatures {
  totalUtilization: number;
  peakUtilization: number;
  interestCharged: number;
  minimumPaymentOnly: boolean;
  isOverdue: boolean;
  medianPayGap: number;
  irregularFrequency: boolean;
  cashFlowBuffer: number;
  subscriptionCount: number;
  monthlyRecurring: number;
  subscriptionShare: number;
  growthRate: number;
  netInflow: number;
}

export const extractFeatures = (bundle: SignalBundle): PersonaFeatures => {
  const credit = bundle.creditUtilization;
  return {
    totalUtilization: credit.totalUtilization,
    peakUtilization: Math.max(credit.totalUtilization, ...credit.accounts.map((account) => account.utilization)),
    interestCharged: credit.interestCharged,
    minimumPaymentOnly: credit.minimumPaymentOnly,
    isOverdue: credit.isOverdue,
    medianPayGap: bundle.incomeStability.medianPayGap,
    irregularFrequency: bundle.incomeStability.irregularFrequency,
    cashFlowBuffer: bundle.incomeStability.cashFlowBuffer,
    subscriptionCount: bundle.subscriptions.recurringMerchants.length,
    monthlyRecurring: bundle.subscriptions.monthlyRecurring,
    subscriptionShare: bundle.subscriptions.subscriptionShare,
    growthRate: bundle.savingsBehavior.growthRate,
    netInflow: bundle.savingsBehavior.netInflow,
  };
};

export interface PersonaRule {
  id: PersonaId;
  priority: number;
  criteria: string;
  /** Bundle paths the predicate reads; copied into decision traces. */
  signalFields: string[];
  matches: (features: PersonaFeatures) => boolean;
  /** Match percentage in [0, 100], independent of which persona wins. */
  score: (features: PersonaFeatures) => number;
}

const LONG_PAY_GAP_DAYS = 45;
const LOW_BUFFER_MONTHS = 1;
const MIN_SUBSCRIPTIONS = 3;
const MIN_MONTHLY_RECURRING = 50;
const MIN_SUBSCRIPTION_SHARE = 10;
const MIN_GROWTH_RATE = 2;
const MIN_NET_INFLOW = 200;
const SECONDARY_FLAG_WEIGHT = 15;

const ratio = (value: number, threshold: number): number => clamp(value / threshold, 0, 1);

const secondaryCreditFlags = (f: PersonaFeatures): number =>
  [f.interestCharged > 0, f.minimumPaymentOnly, f.isOverdue].filter(Boolean).length;

const hasIrregularIncome = (f: PersonaFeatures): boolean =>
  f.medianPayGap > LONG_PAY_GAP_DAYS || f.irregularFrequency;

const savingsActivity = (f: PersonaFeatures): number =>
  Math.max(ratio(f.growthRate, MIN_GROWTH_RATE), ratio(f.netInflow, MIN_NET_INFLOW));

const highUtilization: PersonaRule = {
  id: 'high_utilization',
  priority: 1,
  criteria: 'credit_utilization >= 50% OR interest_charged > 0 OR minimum_payment_only OR is_overdue',
  signalFields: [
    'creditUtilization.totalUtilization',
    'creditUtilization.accounts.utilization',
    'creditUtilization.interestCharged',
    'creditUtilization.minimumPaymentOnly',
    'creditUtilization.isOverdue',
  ],
  matches: (f) => f.peakUtilization >= HIGH_UTILIZATION || secondaryCreditFlags(f) > 0,
  // linear in utilization, nudged up by each secondary distress flag
  score: (f) => roundTo(clamp(f.peakUtilization + SECONDARY_FLAG_WEIGHT * secondaryCreditFlags(f), 0, 100)),
};

const variableIncome: PersonaRule = {
  id: 'variable_income',
  priority: 2,
  criteria: '(median_pay_gap > 45 days OR irregular_frequency) AND cash_flow_buffer < 1.0',
  signalFields: [
    'incomeStability.medianPayGap',
    'incomeStability.irregularFrequency',
    'incomeStability.cashFlowBuffer',
  ],
  matches: (f) => hasIrregularIncome(f) && f.cashFlowBuffer < LOW_BUFFER_MONTHS,
  score: (f) => {
    if (f.medianPayGap === 0 && !f.irregularFrequency) {
      return 0;
    }
    const incomeComponent = hasIrregularIncome(f) ? 60 : 0;
    const bufferComponent = 40 * clamp(LOW_BUFFER_MONTHS - f.cashFlowBuffer, 0, 1);
    return roundTo(incomeComponent + bufferComponent);
  },
};

const subscriptionHeavy: PersonaRule = {
  id: 'subscription_heavy',
  priority: 3,
  criteria: 'recurring_merchants >= 3 AND (monthly_recurring >= 50 OR subscription_share >= 10%)',
  signalFields: [
    'subscriptions.recurringMerchants',
    'subscriptions.monthlyRecurring',
    'subscriptions.subscriptionShare',
  ],
  matches: (f) =>
    f.subscriptionCount >= MIN_SUBSCRIPTIONS &&
    (f.monthlyRecurring >= MIN_MONTHLY_RECURRING || f.subscriptionShare >= MIN_SUBSCRIPTION_SHARE),
  score: (f) =>
    roundTo(
      50 * ratio(f.subscriptionCount, MIN_SUBSCRIPTIONS) +
        50 * Math.max(ratio(f.monthlyRecurring, MIN_MONTHLY_RECURRING), ratio(f.subscriptionShare, MIN_SUBSCRIPTION_SHARE)),
    ),
};

const savingsBuilder: PersonaRule = {
  id: 'savings_builder',
  priority: 4,
  criteria: '(growth_rate >= 2% OR net_inflow >= 200) AND credit_utilization < 30%',
  signalFields: [
    'savingsBehavior.growthRate',
    'savingsBehavior.netInflow',
    'creditUtilization.totalUtilization',
    'creditUtilization.accounts.utilization',
  ],
  matches: (f) =>
    (f.growthRate >= MIN_GROWTH_RATE || f.netInflow >= MIN_NET_INFLOW) && f.peakUtilization < MEDIUM_UTILIZATION,
  score: (f) => {
    const activity = savingsActivity(f);
    if (activity === 0) {
      return 0;
    }
    return roundTo(70 * activity + (f.peakUtilization < MEDIUM_UTILIZATION ? 30 : 0));
  },
};

const SPECIFIC_RULES = [highUtilization, variableIncome, subscriptionHeavy, savingsBuilder];

const generalWellness: PersonaRule = {
  id: 'general_wellness',
  priority: 5,
  criteria: 'no higher-priority persona matched',
  // assigned because every other predicate failed, so it rests on their inputs
  signalFields: [...new Set(SPECIFIC_RULES.flatMap((rule) => rule.signalFields))],
  matches: () => true,
  score: (f) => roundTo(100 - Math.max(...SPECIFIC_RULES.map((rule) => rule.score(f)))),
};

/** Evaluated in this order; the first rule whose predicate holds is the primary persona. */
export const PERSONA_RULES: readonly PersonaRule[] = Object.freeze([...SPECIFIC_RULES, generalWellness]);

export const ruleFor = (id: PersonaId): PersonaRule => {
  const rule = PERSONA_RULES.find((candidate) => candidate.id === id);
  if (!rule) {
    throw new Error(`Unknown persona: ${id}`);
  }
  return rule;
};
