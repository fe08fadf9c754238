import { z } from 'zod';
import { TRIGGER_SIGNALS } from '../../domain/entities/CatalogItem.js';
import { PERSONA_IDS } from '../../domain/entities/Persona.js';

const RangeConstraintSchema = z
  .object({
    min: z.number().finite().optional(),
    max: z.number().finite().optional(),
  })
  .strict()
  .refine((range) => range.min !== undefined || range.max !== undefined, 'A range needs min or max')
  .refine((range) => range.min === undefined || range.max === undefined || range.min <= range.max, 'min exceeds max');

export const EligibilityCriteriaSchema = z
  .object({
    credit_utilization: RangeConstraintSchema.optional(),
    subscription_count: RangeConstraintSchema.optional(),
    savings_balance: RangeConstraintSchema.optional(),
    monthly_recurring: RangeConstraintSchema.optional(),
    is_overdue: z.object({ equals: z.boolean() }).strict().optional(),
  })
  .strict();

export const EducationItemSchema = z
  .object({
    contentId: z.string().min(1),
    type: z.literal('education').default('education'),
    title: z.string().min(1),
    category: z.string().min(1),
    personas: z.array(z.enum(PERSONA_IDS)).min(1),
    triggerSignals: z.array(z.enum(TRIGGER_SIGNALS)),
    summary: z.string(),
    rationaleTemplate: z.string().min(1),
  })
  .strict();

export const PartnerOfferSchema = z
  .object({
    offerId: z.string().min(1),
    type: z.literal('partner_offer').default('partner_offer'),
    title: z.string().min(1),
    partner: z.string().min(1),
    summary: z.string(),
    eligibilityCriteria: EligibilityCriteriaSchema.default({}),
    rationaleTemplate: z.string().min(1),
    metadata: z.record(z.string()).optional(),
  })
  .strict();

export const EducationCatalogSchema = z.array(EducationItemSchema);
export const PartnerOfferCatalogSchema = z.array(PartnerOfferSchema);
