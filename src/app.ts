import express, { Request, Response, NextFunction } from 'express';
import cors from 'cors';
import { Env } from './config/env.js';
import { logger } from './config/logger.js';
import { ContentStore } from './db/content.store.js';
import { UserStore } from './db/user.store.js';
import { requireAuth, requireAuthOrApiKey } from './middleware/auth.middleware.js';
import { errorHandler, notFoundHandler } from './middleware/error.middleware.js';
import { ContentQueryService } from './services/catalog/content-query.service.js';
import { FacetService } from './services/catalog/facet.service.js';
import { CatalogImportService } from './services/import/catalog-import.service.js';
import { AuthService } from './services/auth/auth.service.js';
import { UserService } from './services/auth/user.service.js';
import { createAuthRouter } from './routes/auth.js';
import { createContentRouter } from './routes/content.js';
import { createSystemRouter } from './routes/system.js';

export type AppConfig = Pick<
  Env,
  | 'JWT_SECRET'
  | 'JWT_ALGORITHM'
  | 'ACCESS_TOKEN_EXPIRE_MINUTES'
  | 'BCRYPT_ROUNDS'
  | 'ADMIN_API_KEY'
  | 'DEFAULT_CSV_PATH'
  | 'IMPORT_BATCH_SIZE'
>;

export interface AppStores {
  content: ContentStore;
  users: UserStore;
}

export interface Services {
  queries: ContentQueryService;
  facets: FacetService;
  importer: CatalogImportService;
  users: UserService;
  auth: AuthService;
}

export function createServices(stores: AppStores, config: AppConfig): Services {
  const facets = new FacetService(stores.content);
  const users = new UserService(stores.users, config.BCRYPT_ROUNDS);

  return {
    queries: new ContentQueryService(stores.content),
    facets,
    importer: new CatalogImportService(stores.content, facets, {
      batchSize: config.IMPORT_BATCH_SIZE,
    }),
    users,
    auth: new AuthService(users, {
      secret: config.JWT_SECRET,
      algorithm: config.JWT_ALGORITHM,
      expiresInMinutes: config.ACCESS_TOKEN_EXPIRE_MINUTES,
    }),
  };
}

export function createApp(services: Services, config: AppConfig) {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: true }));

  // Request logging
  app.use((req: Request, _res: Response, next: NextFunction) => {
    logger.debug(`${req.method} ${req.path}`, { query: req.query });
    next();
  });

  const authGate = requireAuth(services.auth);

  app.use(
    '/',
    createSystemRouter({
      facets: services.facets,
      importer: services.importer,
      requireAdmin: requireAuthOrApiKey(services.auth, config.ADMIN_API_KEY),
      defaultCsvPath: config.DEFAULT_CSV_PATH,
    })
  );
  app.use(
    '/auth',
    createAuthRouter({ auth: services.auth, users: services.users, requireAuth: authGate })
  );
  app.use(
    '/content',
    createContentRouter({
      queries: services.queries,
      facets: services.facets,
      requireAuth: authGate,
    })
  );

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
