import { ContentStore } from '../../db/content.store.js';
import { FieldIssue, NotFoundError, ValidationError } from '../../errors.js';
import { CatalogRecord, ContentFilters, fitsInt4, Page } from '../../types/models.js';

export const DEFAULT_LIMIT = 20;
export const MAX_LIMIT = 100;

/**
 * Apply pagination defaults and bounds: limit in [1, MAX_LIMIT], offset >= 0.
 */
export function resolvePage(page: Partial<Page> = {}): Page {
  const limit = page.limit ?? DEFAULT_LIMIT;
  const offset = page.offset ?? 0;
  const issues: FieldIssue[] = [];

  if (!Number.isInteger(limit) || limit < 1 || limit > MAX_LIMIT) {
    issues.push({ field: 'limit', message: `must be an integer between 1 and ${MAX_LIMIT}` });
  }
  if (!Number.isInteger(offset) || offset < 0) {
    issues.push({ field: 'offset', message: 'must be a non-negative integer' });
  }
  if (issues.length > 0) {
    throw new ValidationError('Invalid pagination parameters', issues);
  }

  return { limit, offset };
}

export class ContentQueryService {
  constructor(private readonly store: ContentStore) {}

  /**
   * A release_year of 0 is treated as no year filter. Years outside the
   * INTEGER range cannot match any stored record.
   */
  async list(filters: ContentFilters = {}, page?: Partial<Page>): Promise<CatalogRecord[]> {
    const resolved = resolvePage(page);
    const { release_year, ...rest } = filters;

    if (release_year === undefined || release_year === 0) {
      return this.store.findMany(rest, resolved);
    }
    if (!fitsInt4(release_year)) {
      return [];
    }
    return this.store.findMany({ ...rest, release_year }, resolved);
  }

  async search(text: string, page?: Partial<Page>): Promise<CatalogRecord[]> {
    if (text.length === 0) {
      throw new ValidationError('Search query is required', [
        { field: 'q', message: 'must not be empty' },
      ]);
    }
    return this.store.search(text, resolvePage(page));
  }

  async getById(id: number): Promise<CatalogRecord> {
    // ids are SERIAL: never below 1 or above the INTEGER range
    const record = fitsInt4(id) && id > 0 ? await this.store.findById(id) : null;
    if (!record) {
      throw new NotFoundError('Content not found');
    }
    return record;
  }

  async byRating(rating: string, page?: Partial<Page>): Promise<CatalogRecord[]> {
    return this.store.findMany({ rating }, resolvePage(page));
  }

  async byCategory(category: string, page?: Partial<Page>): Promise<CatalogRecord[]> {
    return this.store.findMany({ category }, resolvePage(page));
  }
}
