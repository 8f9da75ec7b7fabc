/**
 * Catalog Database
 *
 * @module
 */

import { SqliteDatabase } from '../../../../framework/orm/mod.ts';
import type { Logger } from '../../../../framework/telemetry/mod.ts';
import { CATALOG_MIGRATIONS, catalogSchema, type CatalogSchema } from './schema.ts';

export type CatalogDatabase = SqliteDatabase<CatalogSchema>;

/**
 * Open (and if needed create) the catalog database at `path`
 */
export function openCatalogDatabase(path: string, logger?: Logger): CatalogDatabase {
  return new SqliteDatabase({
    path,
    schema: catalogSchema,
    migrations: CATALOG_MIGRATIONS,
    logger,
  });
}
