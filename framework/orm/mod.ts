/**
 * Data Layer (ORM)
 *
 * SQLite persistence through better-sqlite3 and drizzle-orm, plus the
 * field validators shared by form parsing.
 */

export {
  SqliteDatabase,
  ConstraintError,
  translateError,
  MEMORY_DATABASE,
  type DatabaseOptions,
  type ConstraintKind,
} from './database.ts';
export {
  type Validator,
  validators,
  validate,
  parseIsoDate,
  ValidationError,
} from './validators.ts';
