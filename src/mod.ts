/**
 * Application Source
 *
 * Wires the catalog context into a framework application.
 */

import {
  Application,
  TemplateEngine,
  getLogger,
  loggingMiddleware,
  type Config,
  type Logger,
} from '../framework/mod.ts';
import { createCatalogService } from './contexts/catalog/application/catalog_service.ts';
import type { CatalogDatabase } from './contexts/catalog/infrastructure/database.ts';
import { notFoundPage, registerRoutes } from './routes/mod.ts';

export interface CatalogAppOptions {
  config: Config;
  database: CatalogDatabase;
  logger?: Logger;
}

/**
 * Build the library catalog application
 */
export function createCatalogApp(options: CatalogAppOptions): Application {
  const { config, database } = options;
  const logger = options.logger ?? getLogger();

  const views = new TemplateEngine({
    viewsPath: config.string('views.path', './views'),
    cache: config.boolean('views.cache', true),
    globals: { staticPrefix: config.string('static.prefix', '/_static') },
  });

  const app = new Application({ config, logger, notFound: notFoundPage });
  app.use(loggingMiddleware({ logger }));

  registerRoutes(app, {
    views,
    catalog: createCatalogService(database, logger),
    staticPath: config.string('static.path', './public'),
    staticPrefix: config.string('static.prefix', '/_static'),
  });

  return app;
}

export { openCatalogDatabase, type CatalogDatabase } from './contexts/catalog/infrastructure/database.ts';
export { registerRoutes, notFoundPage } from './routes/mod.ts';
