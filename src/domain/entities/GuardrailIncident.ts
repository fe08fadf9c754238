import type { TimeWindow } from './Signal.js';

/** A rationale the tone guardrail kept from reaching the user. */
export interface GuardrailIncident {
  incidentId: string;
  userId: string;
  timeWindow: TimeWindow;
  contentId: string;
  violations: string[];
  rationale: string;
  detectedAt: string; // ISO timestamp
}
