import {
  compareText,
  countTokens,
  rankByCount,
  splitTokens,
  uniqueTokens,
} from '../../src/services/catalog/tokens';

describe('tokens', () => {
  describe('splitTokens', () => {
    it('should trim tokens and preserve case', () => {
      expect(splitTokens('A, b ,C')).toEqual(['A', 'b', 'C']);
    });

    it('should drop empty tokens', () => {
      expect(splitTokens(' , Dramas,, ,Comedies ,')).toEqual(['Dramas', 'Comedies']);
    });

    it('should return an empty list for null, undefined and empty strings', () => {
      expect(splitTokens(null)).toEqual([]);
      expect(splitTokens(undefined)).toEqual([]);
      expect(splitTokens('')).toEqual([]);
    });

    it('should keep duplicates', () => {
      expect(splitTokens('Dramas, Dramas')).toEqual(['Dramas', 'Dramas']);
    });
  });

  describe('compareText', () => {
    it('should order by code unit, uppercase before lowercase', () => {
      expect(['b', 'B', 'a', 'A'].sort(compareText)).toEqual(['A', 'B', 'a', 'b']);
    });
  });

  describe('uniqueTokens', () => {
    it('should return the sorted union of tokens across values', () => {
      expect(uniqueTokens(['United States, Canada', 'France, United States', 'Canada'])).toEqual([
        'Canada',
        'France',
        'United States',
      ]);
    });

    it('should treat tokens differing only in case as distinct', () => {
      expect(uniqueTokens(['dramas', 'Dramas'])).toEqual(['Dramas', 'dramas']);
    });
  });

  describe('countTokens', () => {
    it('should count every token occurrence', () => {
      const counts = countTokens(['Dramas, Comedies', 'Dramas', 'Dramas, Dramas']);
      expect(Object.fromEntries(counts)).toEqual({ Dramas: 4, Comedies: 1 });
    });
  });

  describe('rankByCount', () => {
    it('should order by count descending then label ascending', () => {
      const ranked = rankByCount([
        ['R', 2],
        ['PG', 5],
        ['G', 2],
        ['TV-MA', 5],
      ]);
      expect(ranked).toEqual([
        ['PG', 5],
        ['TV-MA', 5],
        ['G', 2],
        ['R', 2],
      ]);
    });

    it('should keep only the first limit entries', () => {
      const ranked = rankByCount(
        [
          ['a', 1],
          ['b', 3],
          ['c', 2],
        ],
        2
      );
      expect(ranked).toEqual([
        ['b', 3],
        ['c', 2],
      ]);
    });
  });
});
