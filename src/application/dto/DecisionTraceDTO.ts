import { z } from 'zod';
import { TRIGGER_SIGNALS } from '../../domain/entities/CatalogItem.js';
import { PERSONA_IDS } from '../../domain/entities/Persona.js';
import { TIME_WINDOWS } from '../../domain/entities/Signal.js';

const EligibilityCheckSchema = z.object({
  field: z.string().min(1),
  signalField: z.string().min(1),
  constraint: z.object({
    min: z.number().optional(),
    max: z.number().optional(),
    equals: z.boolean().optional(),
  }),
  actual: z.union([z.number(), z.boolean()]),
  passed: z.boolean(),
});

/** Shape a stored decision trace must have to count as auditable. */
export const DecisionTraceSchema = z.object({
  personaMatch: z.enum(PERSONA_IDS),
  timeWindow: z.enum(TIME_WINDOWS),
  contentId: z.string().min(1),
  contentType: z.enum(['education', 'partner_offer']),
  matchReason: z.enum(['trigger', 'persona_fallback', 'persona_top_up', 'eligibility']),
  triggersMatched: z.array(z.enum(TRIGGER_SIGNALS)),
  signalsUsed: z.array(z.string()),
  eligibilityChecks: z.array(EligibilityCheckSchema),
  guardrailsPassed: z.object({
    toneCheck: z.boolean(),
    eligibilityCheck: z.boolean(),
  }),
  toneViolations: z.array(z.string()),
  timestamp: z.string().datetime(),
});
