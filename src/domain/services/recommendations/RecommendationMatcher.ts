import type { EducationItem, PartnerOffer, TriggerSignal } from '../../entities/CatalogItem.js';
import type { EligibilityCheck, MatchReason } from '../../entities/DecisionTrace.js';
import type { PersonaId } from '../../entities/Persona.js';
import type { SignalBundle } from '../../entities/Signal.js';
import { checkEligibility } from './OfferEligibility.js';
import { evaluateTriggers } from './TriggerEvaluator.js';

export interface MatchBounds {
  educationMin: number;
  educationMax: number;
  offerMax: number;
}

export const DEFAULT_MATCH_BOUNDS: MatchBounds = {
  educationMin: 3,
  educationMax: 5,
  offerMax: 3,
};

export interface EducationMatch {
  item: EducationItem;
  matchReason: Extract<MatchReason, 'trigger' | 'persona_fallback' | 'persona_top_up'>;
  triggersMatched: TriggerSignal[];
  signalFields: string[];
}

export interface OfferMatch {
  item: PartnerOffer;
  matchReason: Extract<MatchReason, 'eligibility'>;
  eligibilityChecks: EligibilityCheck[];
  signalFields: string[];
}

/**
 * Persona-tagged items whose triggers fire, in catalog order. With no trigger
 * hit the first `educationMax` persona items are used instead; with fewer hits
 * than `educationMin` the list is topped up from the remaining persona items.
 */
export const matchEducation = (
  persona: PersonaId,
  signals: SignalBundle,
  catalog: readonly EducationItem[],
  bounds: MatchBounds = DEFAULT_MATCH_BOUNDS,
): EducationMatch[] => {
  const evaluated = catalog
    .filter((item) => item.personas.includes(persona))
    .map((item) => ({ item, evaluation: evaluateTriggers(item.triggerSignals, signals) }));

  const triggered = evaluated.filter(({ evaluation }) => evaluation.matched);

  if (triggered.length === 0) {
    return evaluated.slice(0, bounds.educationMax).map(({ item, evaluation }) => ({
      item,
      matchReason: 'persona_fallback',
      triggersMatched: [],
      signalFields: evaluation.signalFields,
    }));
  }

  const selected: EducationMatch[] = triggered.slice(0, bounds.educationMax).map(({ item, evaluation }) => ({
    item,
    matchReason: 'trigger',
    triggersMatched: evaluation.triggersMatched,
    signalFields: evaluation.signalFields,
  }));

  for (const { item, evaluation } of evaluated) {
    if (selected.length >= bounds.educationMin) {
      break;
    }
    if (!evaluation.matched) {
      selected.push({ item, matchReason: 'persona_top_up', triggersMatched: [], signalFields: evaluation.signalFields });
    }
  }

  return selected.slice(0, bounds.educationMax);
};

/** Eligible offers in catalog order, capped at `offerMax`. */
export const matchOffers = (
  signals: SignalBundle,
  catalog: readonly PartnerOffer[],
  bounds: MatchBounds = DEFAULT_MATCH_BOUNDS,
): OfferMatch[] => {
  const matches: OfferMatch[] = [];

  for (const item of catalog) {
    if (matches.length >= bounds.offerMax) {
      break;
    }
    const { eligible, checks } = checkEligibility(item.eligibilityCriteria, signals);
    if (eligible) {
      matches.push({
        item,
        matchReason: 'eligibility',
        eligibilityChecks: checks,
        signalFields: checks.map((check) => check.signalField),
      });
    }
  }

  return matches;
};
