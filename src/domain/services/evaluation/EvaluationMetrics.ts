import type { PersonaId } from '../../entities/Persona.js';
import type { SignalBundle, SignalType } from '../../entities/Signal.js';
import { roundTo } from '../IntervalMath.js';

export const MIN_BEHAVIORS = 3;

/** Signal types that found something for the user, in SIGNAL_TYPES order. */
export const detectedBehaviors = (bundle: SignalBundle): SignalType[] => {
  const detected: SignalType[] = [];
  if (bundle.subscriptions.recurringMerchants.length > 0) {
    detected.push('subscriptions');
  }
  if (bundle.creditUtilization.accounts.length > 0) {
    detected.push('credit_utilization');
  }
  if (bundle.savingsBehavior.accounts.length > 0) {
    detected.push('savings_behavior');
  }
  if (bundle.incomeStability.medianPayGap > 0) {
    detected.push('income_stability');
  }
  return detected;
};

/** Share of `total` as a percentage with two decimals; 0 when there is nothing to measure. */
export const percentage = (part: number, total: number): number => (total === 0 ? 0 : roundTo((part / total) * 100));

export interface PersonaShare {
  count: number;
  percentage: number;
}

export const personaDistribution = (personas: PersonaId[]): Record<PersonaId, PersonaShare> => {
  const count = (id: PersonaId): number => personas.filter((persona) => persona === id).length;
  const share = (id: PersonaId): PersonaShare => ({ count: count(id), percentage: percentage(count(id), personas.length) });

  return {
    high_utilization: share('high_utilization'),
    variable_income: share('variable_income'),
    subscription_heavy: share('subscription_heavy'),
    savings_builder: share('savings_builder'),
    general_wellness: share('general_wellness'),
  };
};
