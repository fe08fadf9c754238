import { readFile } from 'node:fs/promises';
import path from 'node:path';
import type { z } from 'zod';
import type { CatalogPort } from '../../../application/ports/CatalogPort.js';
import { EducationCatalogSchema, PartnerOfferCatalogSchema } from '../../../application/dto/CatalogDTO.js';
import { catalogItemId, type CatalogItem, type EducationItem, type PartnerOffer } from '../../../domain/entities/CatalogItem.js';

export const EDUCATION_FILE = 'education.json';
export const PARTNER_OFFERS_FILE = 'partner_offers.json';

const readJson = async <T extends z.ZodTypeAny>(filePath: string, schema: T): Promise<z.output<T>> => {
  const raw: unknown = JSON.parse(await readFile(filePath, 'utf8'));
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new Error(`Invalid catalog file ${filePath}: ${issues}`);
  }
  return parsed.data;
};

/** Education and partner-offer tables, frozen after load. */
export class JsonCatalogAdapter implements CatalogPort {
  private readonly education: readonly EducationItem[];
  private readonly offers: readonly PartnerOffer[];
  private readonly byId = new Map<string, CatalogItem>();

  constructor(education: EducationItem[], offers: PartnerOffer[]) {
    this.education = Object.freeze([...education]);
    this.offers = Object.freeze([...offers]);

    for (const item of [...this.education, ...this.offers]) {
      const id = catalogItemId(item);
      if (this.byId.has(id)) {
        throw new Error(`Duplicate catalog id: ${id}`);
      }
      this.byId.set(id, item);
    }
  }

  static async fromDirectory(catalogDir: string): Promise<JsonCatalogAdapter> {
    const [education, offers] = await Promise.all([
      readJson(path.join(catalogDir, EDUCATION_FILE), EducationCatalogSchema),
      readJson(path.join(catalogDir, PARTNER_OFFERS_FILE), PartnerOfferCatalogSchema),
    ]);

    console.log(`📚 Catalog loaded: ${education.length} education items, ${offers.length} partner offers`);
    return new JsonCatalogAdapter(education, offers);
  }

  listEducation(): readonly EducationItem[] {
    return this.education;
  }

  listOffers(): readonly PartnerOffer[] {
    return this.offers;
  }

  findById(contentId: string): CatalogItem | null {
    return this.byId.get(contentId) ?? null;
  }
}
