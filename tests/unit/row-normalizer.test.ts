import {
  normalizeRow,
  parseReleaseYear,
  resolveColumns,
} from '../../src/services/import/row-normalizer';
import { parseCatalogCsv } from '../../src/services/import/catalog-import.service';
import { ImportError } from '../../src/errors';

const HEADER = [
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
];

describe('row normalizer', () => {
  describe('parseReleaseYear', () => {
    it.each([
      ['2019', 2019],
      ['2019.0', 2019],
      [' 1999 ', 1999],
      ['1987.9', 1987],
    ])('should parse %p as %p', (input, expected) => {
      expect(parseReleaseYear(input)).toBe(expected);
    });

    it.each(['', '   ', 'abc', '0', '-5', '0.4', 'NaN', '0x7CF', '1e3', '2019.', '+2019'])(
      'should store %p as null',
      (input) => {
        expect(parseReleaseYear(input)).toBeNull();
      }
    );

    it('should store years beyond the INTEGER range as null', () => {
      expect(parseReleaseYear('2147483647')).toBe(2147483647);
      expect(parseReleaseYear('2147483648')).toBeNull();
      expect(parseReleaseYear('10000000000')).toBeNull();
    });

    it('should store a missing cell as null', () => {
      expect(parseReleaseYear(undefined)).toBeNull();
    });
  });

  describe('resolveColumns', () => {
    it('should map canonical headers to their positions', () => {
      const columns = resolveColumns(HEADER);
      expect(columns.get('show_id')).toBe(0);
      expect(columns.get('description')).toBe(11);
    });

    it('should accept aliases and ignore case and extra columns', () => {
      const header = ['Extra', 'ID', 'Kind', ...HEADER.slice(2, 10), 'Categories', 'Description'];
      const columns = resolveColumns(header);
      expect(columns.get('show_id')).toBe(1);
      expect(columns.get('type')).toBe(2);
      expect(columns.get('listed_in')).toBe(11);
    });

    it('should name every missing column', () => {
      expect(() => resolveColumns(['show_id', 'type', 'title'])).toThrow(
        'Import file is missing required columns: director, cast, country, date_added, release_year, rating, duration, listed_in, description'
      );
    });
  });

  describe('normalizeRow', () => {
    const columns = resolveColumns(HEADER);

    it('should store blank cells as null', () => {
      const record = normalizeRow(
        ['81145628', 'Movie', 'Title', '', '  ', '', '', '', '', '', '', ''],
        columns,
        1
      );

      expect(record).toEqual({
        show_id: '81145628',
        type: 'Movie',
        title: 'Title',
        director: null,
        cast: null,
        country: null,
        date_added: null,
        release_year: null,
        rating: null,
        duration: null,
        listed_in: null,
        description: null,
      });
    });

    it('should treat cells beyond a short row as missing', () => {
      const record = normalizeRow(['s9', 'TV Show'], columns, 4);
      expect(record.type).toBe('TV Show');
      expect(record.description).toBeNull();
    });

    it('should reject a row without show_id', () => {
      expect(() => normalizeRow(['', 'Movie'], columns, 7)).toThrow('Row 7 has no show_id');
    });
  });

  describe('parseCatalogCsv', () => {
    it('should parse quoted multi-valued cells', () => {
      const csv = [
        HEADER.join(','),
        's1,Movie,Dark Harbor,Ana Reyes,"Lee Park, Mia Chen","United States, Canada","September 25, 2021",2020,PG-13,95 min,"Dramas, Thrillers",A fisherman.',
      ].join('\n');

      const [record] = parseCatalogCsv(csv);

      expect(record.cast).toBe('Lee Park, Mia Chen');
      expect(record.country).toBe('United States, Canada');
      expect(record.date_added).toBe('September 25, 2021');
      expect(record.release_year).toBe(2020);
      expect(record.listed_in).toBe('Dramas, Thrillers');
    });

    it('should strip a byte order mark from the header', () => {
      const csv = `\uFEFF${HEADER.join(',')}\ns1,Movie,,,,,,,,,,`;
      expect(parseCatalogCsv(csv)).toHaveLength(1);
    });

    it('should raise ImportError for an empty file', () => {
      expect(() => parseCatalogCsv('')).toThrow(ImportError);
    });

    it('should raise ImportError for rows with the wrong number of cells', () => {
      const csv = `${HEADER.join(',')}\ns1,Movie`;
      expect(() => parseCatalogCsv(csv)).toThrow(ImportError);
    });
  });
});
