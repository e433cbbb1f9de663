import { Router, RequestHandler } from 'express';
import { asyncHandler } from '../middleware/async-handler.js';
import { FacetService } from '../services/catalog/facet.service.js';
import { CatalogImportService } from '../services/import/catalog-import.service.js';
import { loadDataSchema, parseInput } from './schemas.js';

export const SERVICE_NAME = 'Catalog Content API';
export const SERVICE_VERSION = '1.0.0';

export interface SystemRouterDeps {
  facets: FacetService;
  importer: CatalogImportService;
  requireAdmin: RequestHandler;
  defaultCsvPath: string;
}

/**
 * Root-level routes: service index, health, bulk import and the public
 * statistics/filter snapshots.
 */
export function createSystemRouter({
  facets,
  importer,
  requireAdmin,
  defaultCsvPath,
}: SystemRouterDeps): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    res.json({
      message: SERVICE_NAME,
      version: SERVICE_VERSION,
      endpoints: {
        auth: {
          register: 'POST /auth/register',
          login: 'POST /auth/login',
          me: 'GET /auth/me',
        },
        content: {
          list: 'GET /content/',
          get_by_id: 'GET /content/{id}',
          search: 'GET /content/search/query',
          by_rating: 'GET /content/by-rating/{rating}',
          by_category: 'GET /content/by-category/{category}',
          filters: {
            ratings: 'GET /content/filters/ratings',
            categories: 'GET /content/filters/categories',
            countries: 'GET /content/filters/countries',
          },
          stats: 'GET /content/stats/overview',
        },
        admin: {
          load_data: 'POST /load-data',
          stats: 'GET /stats',
          filters: 'GET /filters',
        },
      },
    });
  });

  router.get('/health', (_req, res) => {
    res.json({ status: 'healthy' });
  });

  /**
   * POST /load-data?csv_path=
   * One-shot bulk import of a CSV file
   */
  router.post(
    '/load-data',
    requireAdmin,
    asyncHandler(async (req, res) => {
      const { csv_path } = parseInput(loadDataSchema, req.query);
      res.json(await importer.importFile(csv_path ?? defaultCsvPath));
    })
  );

  router.get(
    '/stats',
    asyncHandler(async (_req, res) => {
      res.json(await facets.getStatistics());
    })
  );

  router.get(
    '/filters',
    asyncHandler(async (_req, res) => {
      res.json(await facets.getUniqueValues());
    })
  );

  return router;
}
