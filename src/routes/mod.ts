/**
 * Application Routes
 *
 * Defines all application routes and handlers.
 */

import { join } from 'node:path';
import {
  Router,
  WebResponse,
  html,
  type Application,
  type Context,
  type TemplateEngine,
} from '../../framework/mod.ts';
import type { CatalogService } from '../contexts/catalog/application/catalog_service.ts';
import { catalogRoutes } from '../contexts/catalog/presentation/catalog_routes.ts';

export interface RouteDependencies {
  views: TemplateEngine;
  catalog: CatalogService;
  staticPath: string;
  staticPrefix: string;
}

const STATIC_FILE = /^[\w-][\w.-]*$/;

/**
 * Register all application routes
 */
export function registerRoutes(app: Application, deps: RouteDependencies): void {
  app.get('/', (_ctx: Context) => new WebResponse().redirect('/home'));

  app.routes(staticRoutes(deps.staticPath, deps.staticPrefix));
  app.routes(catalogRoutes(deps.views, deps.catalog));
}

/**
 * Files directly inside `root`, served under `prefix`
 */
export function staticRoutes(root: string, prefix: string): Router {
  return new Router(prefix).get('/:file', async (req, res) => {
    const file = req.params.file ?? '';
    if (!STATIC_FILE.test(file)) {
      return res.notFound();
    }
    return await res.file(join(root, file));
  });
}

/**
 * 404 page for unknown paths
 */
export function notFoundPage(request: Request): Response {
  const path = new URL(request.url).pathname;
  const page = html`<!DOCTYPE html>
<html lang="en">
<head><meta charset="utf-8"><title>Page not found</title></head>
<body>
  <h1>Page not found</h1>
  <p>Nothing lives at <code>${path}</code>.</p>
  <p><a href="/home">Back to the library</a></p>
</body>
</html>`;
  return new WebResponse().status(404).html(page.content);
}
