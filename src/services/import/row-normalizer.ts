import { ImportError } from '../../errors.js';
import { CONTENT_COLUMNS, INT4_MAX, NewCatalogRecord } from '../../types/models.js';

type ContentColumn = (typeof CONTENT_COLUMNS)[number];

// Alternative header names accepted in import files
const HEADER_ALIASES: Record<string, ContentColumn> = {
  id: 'show_id',
  kind: 'type',
  categories: 'listed_in',
};

export type ColumnIndex = ReadonlyMap<ContentColumn, number>;

function isContentColumn(name: string): name is ContentColumn {
  return CONTENT_COLUMNS.some((column) => column === name);
}

/**
 * Map each catalog column to its position in the header row.
 * Header names are matched case-insensitively, aliases included.
 */
export function resolveColumns(header: string[]): ColumnIndex {
  const positions = new Map<ContentColumn, number>();

  header.forEach((raw, i) => {
    const name = raw.trim().toLowerCase();
    const column = isContentColumn(name) ? name : HEADER_ALIASES[name];
    if (column && !positions.has(column)) {
      positions.set(column, i);
    }
  });

  const missing = CONTENT_COLUMNS.filter((column) => !positions.has(column));
  if (missing.length > 0) {
    throw new ImportError(`Import file is missing required columns: ${missing.join(', ')}`);
  }

  return positions;
}

function textOrNull(value: string | undefined): string | null {
  if (value === undefined) return null;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

const DECIMAL_YEAR = /^\d+(\.\d+)?$/;

/**
 * Plain decimal years are truncated to integers; anything else, or a year
 * that is not positive or does not fit an INTEGER column, is stored as null.
 */
export function parseReleaseYear(value: string | undefined): number | null {
  const text = textOrNull(value);
  if (text === null || !DECIMAL_YEAR.test(text)) return null;

  const year = Math.trunc(Number(text));
  return year > 0 && year <= INT4_MAX ? year : null;
}

/**
 * Build a record from one data row. `rowNumber` is 1-based, counting data rows.
 */
export function normalizeRow(cells: string[], columns: ColumnIndex, rowNumber: number): NewCatalogRecord {
  const cell = (column: ContentColumn): string | undefined => {
    const position = columns.get(column);
    return position === undefined ? undefined : cells[position];
  };

  const showId = textOrNull(cell('show_id'));
  if (showId === null) {
    throw new ImportError(`Row ${rowNumber} has no show_id`);
  }

  return {
    show_id: showId,
    type: textOrNull(cell('type')),
    title: textOrNull(cell('title')),
    director: textOrNull(cell('director')),
    cast: textOrNull(cell('cast')),
    country: textOrNull(cell('country')),
    date_added: textOrNull(cell('date_added')),
    release_year: parseReleaseYear(cell('release_year')),
    rating: textOrNull(cell('rating')),
    duration: textOrNull(cell('duration')),
    listed_in: textOrNull(cell('listed_in')),
    description: textOrNull(cell('description')),
  };
}
