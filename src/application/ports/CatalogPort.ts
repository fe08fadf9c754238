import type { CatalogItem, EducationItem, PartnerOffer } from '../../domain/entities/CatalogItem.js';

/** Read-only content tables, loaded once and never mutated by matching. */
export interface CatalogPort {
  listEducation(): readonly EducationItem[];
  listOffers(): readonly PartnerOffer[];
  findById(contentId: string): CatalogItem | null;
}
