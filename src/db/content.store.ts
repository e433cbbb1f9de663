import { Database, Queryable } from './client.js';
import {
  CatalogRecord,
  CONTENT_COLUMNS,
  ContentFilters,
  MultiValuedColumn,
  NewCatalogRecord,
  Page,
  RatingCount,
} from '../types/models.js';

/** Writes available inside one import batch transaction */
export interface ContentWriter {
  existsByShowId(showId: string): Promise<boolean>;
  insert(record: NewCatalogRecord): Promise<void>;
}

export interface ContentStore {
  findMany(filters: ContentFilters, page: Page): Promise<CatalogRecord[]>;
  /** Substring match against title, director, cast or description */
  search(text: string, page: Page): Promise<CatalogRecord[]>;
  findById(id: number): Promise<CatalogRecord | null>;
  count(filters?: Pick<ContentFilters, 'type'>): Promise<number>;
  countByRating(): Promise<RatingCount[]>;
  distinctRatings(): Promise<string[]>;
  /** Every non-empty value of a comma-joined column, one entry per record */
  columnValues(column: MultiValuedColumn): Promise<string[]>;
  transaction<T>(fn: (writer: ContentWriter) => Promise<T>): Promise<T>;
}

/** Escape LIKE wildcards so the needle matches literally */
export function likePattern(needle: string): string {
  return `%${needle.replace(/[\\%_]/g, (ch) => `\\${ch}`)}%`;
}

// "cast" is a reserved word in PostgreSQL
const quoteColumn = (column: string): string => (column === 'cast' ? '"cast"' : column);

const SELECT_COLUMNS = ['id', ...CONTENT_COLUMNS].map(quoteColumn).join(', ');

interface WhereClause {
  sql: string;
  params: unknown[];
}

export function buildFilterClause(filters: ContentFilters): WhereClause {
  const conditions: string[] = [];
  const params: unknown[] = [];
  let paramIndex = 1;

  const exact = (column: string, value: unknown) => {
    conditions.push(`${quoteColumn(column)} = $${paramIndex++}`);
    params.push(value);
  };
  const contains = (column: string, value: string) => {
    conditions.push(`${quoteColumn(column)} ILIKE $${paramIndex++} ESCAPE '\\'`);
    params.push(likePattern(value));
  };

  if (filters.type) exact('type', filters.type);
  if (filters.rating) exact('rating', filters.rating);
  if (filters.release_year !== undefined) exact('release_year', filters.release_year);
  if (filters.country) contains('country', filters.country);
  if (filters.category) contains('listed_in', filters.category);
  if (filters.title) contains('title', filters.title);
  if (filters.director) contains('director', filters.director);
  if (filters.cast) contains('cast', filters.cast);

  return {
    sql: conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '',
    params,
  };
}

interface CountRow {
  count: string;
}

export class PgContentStore implements ContentStore {
  constructor(private readonly db: Database) {}

  async findMany(filters: ContentFilters, page: Page): Promise<CatalogRecord[]> {
    const where = buildFilterClause(filters);
    const n = where.params.length;

    const result = await this.db.query<CatalogRecord>(
      `SELECT ${SELECT_COLUMNS} FROM catalog_content
       ${where.sql}
       ORDER BY id ASC
       LIMIT $${n + 1} OFFSET $${n + 2}`,
      [...where.params, page.limit, page.offset]
    );
    return result.rows;
  }

  async search(text: string, page: Page): Promise<CatalogRecord[]> {
    const result = await this.db.query<CatalogRecord>(
      `SELECT ${SELECT_COLUMNS} FROM catalog_content
       WHERE title ILIKE $1 ESCAPE '\\'
          OR director ILIKE $1 ESCAPE '\\'
          OR "cast" ILIKE $1 ESCAPE '\\'
          OR description ILIKE $1 ESCAPE '\\'
       ORDER BY id ASC
       LIMIT $2 OFFSET $3`,
      [likePattern(text), page.limit, page.offset]
    );
    return result.rows;
  }

  async findById(id: number): Promise<CatalogRecord | null> {
    const result = await this.db.query<CatalogRecord>(
      `SELECT ${SELECT_COLUMNS} FROM catalog_content WHERE id = $1`,
      [id]
    );
    return result.rows[0] ?? null;
  }

  async count(filters: Pick<ContentFilters, 'type'> = {}): Promise<number> {
    const where = buildFilterClause(filters);
    const result = await this.db.query<CountRow>(
      `SELECT COUNT(*) AS count FROM catalog_content ${where.sql}`,
      where.params
    );
    return parseInt(result.rows[0]?.count ?? '0', 10);
  }

  async countByRating(): Promise<RatingCount[]> {
    const result = await this.db.query<{ rating: string; count: string }>(
      `SELECT rating, COUNT(*) AS count FROM catalog_content
       WHERE rating IS NOT NULL AND rating <> ''
       GROUP BY rating`
    );
    return result.rows.map((row) => ({ rating: row.rating, count: parseInt(row.count, 10) }));
  }

  async distinctRatings(): Promise<string[]> {
    const result = await this.db.query<{ rating: string }>(
      `SELECT DISTINCT rating FROM catalog_content
       WHERE rating IS NOT NULL AND rating <> ''`
    );
    return result.rows.map((row) => row.rating);
  }

  async columnValues(column: MultiValuedColumn): Promise<string[]> {
    const col = quoteColumn(column);
    const result = await this.db.query<{ value: string }>(
      `SELECT ${col} AS value FROM catalog_content
       WHERE ${col} IS NOT NULL AND ${col} <> ''`
    );
    return result.rows.map((row) => row.value);
  }

  async transaction<T>(fn: (writer: ContentWriter) => Promise<T>): Promise<T> {
    return this.db.transaction((client) => fn(new PgContentWriter(client)));
  }
}

class PgContentWriter implements ContentWriter {
  constructor(private readonly client: Queryable) {}

  async existsByShowId(showId: string): Promise<boolean> {
    const result = await this.client.query(
      'SELECT 1 FROM catalog_content WHERE show_id = $1 LIMIT 1',
      [showId]
    );
    return result.rows.length > 0;
  }

  async insert(record: NewCatalogRecord): Promise<void> {
    const placeholders = CONTENT_COLUMNS.map((_, i) => `$${i + 1}`).join(', ');
    await this.client.query(
      `INSERT INTO catalog_content (${CONTENT_COLUMNS.map(quoteColumn).join(', ')})
       VALUES (${placeholders})`,
      CONTENT_COLUMNS.map((column) => record[column])
    );
  }
}
