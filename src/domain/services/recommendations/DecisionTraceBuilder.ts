import type { TriggerSignal } from '../../entities/CatalogItem.js';
import type { DecisionTrace, EligibilityCheck, MatchReason } from '../../entities/DecisionTrace.js';
import type { PersonaId } from '../../entities/Persona.js';
import type { TimeWindow } from '../../entities/Signal.js';
import { compareCodePoints } from '../IntervalMath.js';
import type { ToneCheckResult } from './ToneGuardrail.js';

export interface DecisionTraceInput {
  persona: PersonaId;
  personaSignalFields: string[];
  timeWindow: TimeWindow;
  contentId: string;
  contentType: 'education' | 'partner_offer';
  matchReason: MatchReason;
  triggersMatched?: TriggerSignal[];
  matchSignalFields?: string[];
  rationaleSignalFields?: string[];
  eligibilityChecks?: EligibilityCheck[];
  tone: ToneCheckResult;
  timestamp: string;
}

export const buildDecisionTrace = (input: DecisionTraceInput): DecisionTrace => {
  const eligibilityChecks = input.eligibilityChecks ?? [];
  const signalsUsed = [
    ...new Set([
      ...input.personaSignalFields,
      ...(input.matchSignalFields ?? []),
      ...(input.rationaleSignalFields ?? []),
      ...eligibilityChecks.map((check) => check.signalField),
    ]),
  ].sort(compareCodePoints);

  return {
    personaMatch: input.persona,
    timeWindow: input.timeWindow,
    contentId: input.contentId,
    contentType: input.contentType,
    matchReason: input.matchReason,
    triggersMatched: [...(input.triggersMatched ?? [])],
    signalsUsed,
    eligibilityChecks: eligibilityChecks.map((check) => ({ ...check, constraint: { ...check.constraint } })),
    guardrailsPassed: {
      toneCheck: input.tone.passed,
      eligibilityCheck: eligibilityChecks.every((check) => check.passed),
    },
    toneViolations: [...input.tone.violations],
    timestamp: input.timestamp,
  };
};
