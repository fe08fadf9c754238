import type { PersonaId } from './Persona.js';

export const TRIGGER_SIGNALS = [
  'credit_utilization_high',
  'minimum_payment_only',
  'interest_charged',
  'is_overdue',
  'irregular_frequency',
  'median_pay_gap_high',
  'cash_flow_buffer_low',
  'subscription_count_high',
  'monthly_recurring_high',
  'savings_growth_rate_positive',
  'emergency_fund_adequate',
  'savings_balance_positive',
] as const;

export type TriggerSignal = (typeof TRIGGER_SIGNALS)[number];

export interface EducationItem {
  contentId: string;
  type: 'education';
  title: string;
  category: string;
  personas: PersonaId[];
  triggerSignals: TriggerSignal[];
  summary: string;
  rationaleTemplate: string;
}

export interface RangeConstraint {
  min?: number;
  max?: number;
}

export interface EqualsConstraint {
  equals: boolean;
}

export interface EligibilityCriteria {
  credit_utilization?: RangeConstraint;
  subscription_count?: RangeConstraint;
  savings_balance?: RangeConstraint;
  monthly_recurring?: RangeConstraint;
  is_overdue?: EqualsConstraint;
}

export interface PartnerOffer {
  offerId: string;
  type: 'partner_offer';
  title: string;
  partner: string;
  summary: string;
  eligibilityCriteria: EligibilityCriteria;
  rationaleTemplate: string;
  metadata?: Record<string, string>;
}

export type CatalogItem = EducationItem | PartnerOffer;

export const catalogItemId = (item: CatalogItem): string =>
  item.type === 'education' ? item.contentId : item.offerId;
