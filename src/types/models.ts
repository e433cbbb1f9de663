/**
 * Core domain types for the catalog service.
 */

export interface CatalogRecord {
  id: number;
  show_id: string;
  type: string | null;
  title: string | null;
  director: string | null;
  cast: string | null;
  country: string | null;
  date_added: string | null;
  release_year: number | null;
  rating: string | null;
  duration: string | null;
  listed_in: string | null;
  description: string | null;
}

export type NewCatalogRecord = Omit<CatalogRecord, 'id'>;

/** Comma-joined columns that hold several tokens per record */
/** Largest value a PostgreSQL INTEGER column (`id`, `release_year`) holds */
export const INT4_MAX = 2147483647;

export const fitsInt4 = (value: number): boolean =>
  Number.isInteger(value) && value >= -INT4_MAX - 1 && value <= INT4_MAX;

export type MultiValuedColumn = 'cast' | 'country' | 'listed_in';

export const CONTENT_COLUMNS = [
  'show_id',
  'type',
  'title',
  'director',
  'cast',
  'country',
  'date_added',
  'release_year',
  'rating',
  'duration',
  'listed_in',
  'description',
] as const satisfies readonly (keyof NewCatalogRecord)[];

export interface ContentFilters {
  type?: string;
  rating?: string;
  release_year?: number;
  country?: string;
  category?: string;
  title?: string;
  director?: string;
  cast?: string;
}

export interface Page {
  limit: number;
  offset: number;
}

export interface RatingCount {
  rating: string;
  count: number;
}

export interface CategoryCount {
  category: string;
  count: number;
}

export interface ContentStats {
  total_content: number;
  movies: number;
  tv_shows: number;
  by_rating: RatingCount[];
  by_category: CategoryCount[];
}

export interface FilterValues {
  ratings: string[];
  countries: string[];
  categories: string[];
}

export interface ImportResult {
  status: 'success';
  records_processed: number;
  records_inserted: number;
  /** Always 0: existing records are skipped, never updated */
  records_updated: number;
  records_skipped: number;
  statistics: ContentStats;
}

export interface User {
  id: number;
  username: string;
  email: string | null;
  isActive: boolean;
  createdAt: Date;
}

export interface UserWithHash extends User {
  passwordHash: string;
}
