import type { PersonaId } from './Persona.js';
import type { TimeWindow } from './Signal.js';
import type { TriggerSignal } from './CatalogItem.js';

export type MatchReason = 'trigger' | 'persona_fallback' | 'persona_top_up' | 'eligibility';

export interface EligibilityCheck {
  field: string;
  signalField: string;
  constraint: { min?: number; max?: number; equals?: boolean };
  actual: number | boolean;
  passed: boolean;
}

export interface DecisionTrace {
  personaMatch: PersonaId;
  timeWindow: TimeWindow;
  contentId: string;
  contentType: 'education' | 'partner_offer';
  matchReason: MatchReason;
  triggersMatched: TriggerSignal[];
  signalsUsed: string[];
  eligibilityChecks: EligibilityCheck[];
  guardrailsPassed: {
    toneCheck: boolean;
    eligibilityCheck: boolean;
  };
  toneViolations: string[];
  timestamp: string; // ISO timestamp
}
