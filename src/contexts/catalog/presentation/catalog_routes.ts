/**
 * Catalog Routes
 *
 * @module
 */

import { action } from '../../../../framework/controller/mod.ts';
import { Router } from '../../../../framework/router/mod.ts';
import type { TemplateEngine } from '../../../../framework/view/mod.ts';
import type { CatalogService } from '../application/catalog_service.ts';
import { CatalogController } from './catalog_controller.ts';

/**
 * Book delete paths only match numeric ids; anything else falls through
 * to the 404 page.
 */
export const BOOK_DELETE_PATH = '/book/:id(\\d+)/delete';

export function catalogRoutes(views: TemplateEngine, catalog: CatalogService): Router {
  const router = new Router();
  const controller = () => new CatalogController(views, catalog);

  router.get('/home', action(controller, (c) => c.home()));
  router.get('/add_author', action(controller, (c) => c.newAuthor()));
  router.post('/add_author', action(controller, (c) => c.createAuthor()));
  router.get('/add_book', action(controller, (c) => c.newBook()));
  router.post('/add_book', action(controller, (c) => c.createBook()));
  router.get(BOOK_DELETE_PATH, action(controller, (c) => c.confirmDelete()));
  router.post(BOOK_DELETE_PATH, action(controller, (c) => c.deleteBook()));

  return router;
}
