import { ContentStore } from '../../db/content.store.js';
import { ContentStats, FilterValues } from '../../types/models.js';
import { compareText, countTokens, rankByCount, uniqueTokens } from './tokens.js';

export const TOP_CATEGORIES = 20;

/**
 * Filter values and statistics over the whole catalog. Multi-valued columns
 * are stored comma-joined, so every call scans the column and tokenizes it.
 */
export class FacetService {
  constructor(private readonly store: ContentStore) {}

  async getRatings(): Promise<string[]> {
    const ratings = await this.store.distinctRatings();
    return [...new Set(ratings.filter((rating) => rating.length > 0))].sort(compareText);
  }

  async getCountries(): Promise<string[]> {
    return uniqueTokens(await this.store.columnValues('country'));
  }

  async getCategories(): Promise<string[]> {
    return uniqueTokens(await this.store.columnValues('listed_in'));
  }

  async getUniqueValues(): Promise<FilterValues> {
    const [ratings, countries, categories] = await Promise.all([
      this.getRatings(),
      this.getCountries(),
      this.getCategories(),
    ]);
    return { ratings, countries, categories };
  }

  async getStatistics(): Promise<ContentStats> {
    const [total, movies, tvShows, ratingCounts, categoryValues] = await Promise.all([
      this.store.count(),
      this.store.count({ type: 'Movie' }),
      this.store.count({ type: 'TV Show' }),
      this.store.countByRating(),
      this.store.columnValues('listed_in'),
    ]);

    const byRating = rankByCount(ratingCounts.map((r): [string, number] => [r.rating, r.count]));
    const byCategory = rankByCount(countTokens(categoryValues), TOP_CATEGORIES);

    return {
      total_content: total,
      movies,
      tv_shows: tvShows,
      by_rating: byRating.map(([rating, count]) => ({ rating, count })),
      by_category: byCategory.map(([category, count]) => ({ category, count })),
    };
  }
}
