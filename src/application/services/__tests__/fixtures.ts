import type { EducationItem, PartnerOffer } from '../../../domain/entities/CatalogItem.js';
import type { Clock } from '../Clock.js';

export const NOW = '2026-06-30T12:00:00.000Z';

export const fixedClock: Clock = () => new Date(NOW);

export function createEducationItem(overrides: Partial<EducationItem> = {}): EducationItem {
  return {
    contentId: 'edu_item',
    type: 'education',
    title: 'Education Item',
    category: 'credit',
    personas: ['high_utilization'],
    triggerSignals: [],
    summary: 'Summary',
    rationaleTemplate: 'Rationale.',
    ...overrides,
  };
}

export function createOffer(overrides: Partial<PartnerOffer> = {}): PartnerOffer {
  return {
    offerId: 'offer_item',
    type: 'partner_offer',
    title: 'Offer',
    partner: 'Partner',
    summary: 'Summary',
    eligibilityCriteria: {},
    rationaleTemplate: 'An option worth a look.',
    ...overrides,
  };
}
