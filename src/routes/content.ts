import { Router, RequestHandler } from 'express';
import { asyncHandler } from '../middleware/async-handler.js';
import { ContentQueryService } from '../services/catalog/content-query.service.js';
import { FacetService } from '../services/catalog/facet.service.js';
import {
  contentIdSchema,
  contentListSchema,
  paginationSchema,
  parseInput,
  searchSchema,
} from './schemas.js';

export interface ContentRouterDeps {
  queries: ContentQueryService;
  facets: FacetService;
  requireAuth: RequestHandler;
}

export function createContentRouter({ queries, facets, requireAuth }: ContentRouterDeps): Router {
  const router = Router();

  router.use(requireAuth);

  /**
   * GET /content/
   * Filtered, paginated listing
   */
  router.get(
    '/',
    asyncHandler(async (req, res) => {
      const { limit, offset, ...filters } = parseInput(contentListSchema, req.query);
      res.json(await queries.list(filters, { limit, offset }));
    })
  );

  /**
   * GET /content/search/query?q=
   * Substring search over title, director, cast and description
   */
  router.get(
    '/search/query',
    asyncHandler(async (req, res) => {
      const { q, limit, offset } = parseInput(searchSchema, req.query);
      res.json(await queries.search(q, { limit, offset }));
    })
  );

  router.get(
    '/filters/ratings',
    asyncHandler(async (_req, res) => {
      res.json(await facets.getRatings());
    })
  );

  router.get(
    '/filters/categories',
    asyncHandler(async (_req, res) => {
      res.json(await facets.getCategories());
    })
  );

  router.get(
    '/filters/countries',
    asyncHandler(async (_req, res) => {
      res.json(await facets.getCountries());
    })
  );

  /**
   * GET /content/stats/overview
   * Totals plus rating and top-category breakdowns
   */
  router.get(
    '/stats/overview',
    asyncHandler(async (_req, res) => {
      res.json(await facets.getStatistics());
    })
  );

  router.get(
    '/by-rating/:rating',
    asyncHandler(async (req, res) => {
      const page = parseInput(paginationSchema, req.query);
      res.json(await queries.byRating(req.params.rating, page));
    })
  );

  router.get(
    '/by-category/:category',
    asyncHandler(async (req, res) => {
      const page = parseInput(paginationSchema, req.query);
      res.json(await queries.byCategory(req.params.category, page));
    })
  );

  router.get(
    '/:id',
    asyncHandler(async (req, res) => {
      const { id } = parseInput(contentIdSchema, req.params);
      res.json(await queries.getById(id));
    })
  );

  return router;
}
