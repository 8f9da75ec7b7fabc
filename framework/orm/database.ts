/**
 * SQLite Database Wrapper
 *
 * Opens a single-file SQLite database through better-sqlite3, exposes a
 * typed drizzle-orm handle, and traces every query via `withDbSpan`.
 */

import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import { existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { withDbSpan } from '../telemetry/otel.ts';
import { getLogger, type Logger } from '../telemetry/logger.ts';

export const MEMORY_DATABASE = ':memory:';

export interface DatabaseOptions<TSchema extends Record<string, unknown>> {
  /** File path, or `:memory:` for a throwaway database */
  path?: string;
  schema: TSchema;
  /** DDL statements run on open; each must be idempotent */
  migrations?: readonly string[];
  logger?: Logger;
}

export type ConstraintKind = 'foreign_key' | 'unique' | 'not_null' | 'check';

/**
 * A write rejected by an integrity constraint
 */
export class ConstraintError extends Error {
  constructor(
    public readonly kind: ConstraintKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ConstraintError';
  }
}

const CONSTRAINT_CODES: Record<string, ConstraintKind> = {
  SQLITE_CONSTRAINT_FOREIGNKEY: 'foreign_key',
  SQLITE_CONSTRAINT_UNIQUE: 'unique',
  SQLITE_CONSTRAINT_PRIMARYKEY: 'unique',
  SQLITE_CONSTRAINT_NOTNULL: 'not_null',
  SQLITE_CONSTRAINT_CHECK: 'check',
};

/**
 * Map a driver error onto ConstraintError; anything else is returned as-is
 */
export function translateError(error: unknown): unknown {
  let current: unknown = error;

  while (current instanceof Error) {
    if (current instanceof Database.SqliteError) {
      const kind = CONSTRAINT_CODES[current.code];
      return kind ? new ConstraintError(kind, current.message, { cause: error }) : error;
    }
    current = current.cause;
  }

  return error;
}

/**
 * SQLite database handle
 */
export class SqliteDatabase<TSchema extends Record<string, unknown>> {
  readonly path: string;
  readonly raw: Database.Database;
  readonly orm: BetterSQLite3Database<TSchema>;
  private logger: Logger;
  private closed = false;

  constructor(options: DatabaseOptions<TSchema>) {
    this.path = options.path ?? MEMORY_DATABASE;
    this.logger = options.logger ?? getLogger();

    if (this.path !== MEMORY_DATABASE) {
      const dir = dirname(this.path);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
    }

    this.raw = new Database(this.path);
    if (this.path !== MEMORY_DATABASE) {
      this.raw.pragma('journal_mode = WAL');
    }
    this.raw.pragma('busy_timeout = 5000');
    this.raw.pragma('foreign_keys = ON');

    for (const statement of options.migrations ?? []) {
      this.raw.exec(statement);
    }

    this.orm = drizzle(this.raw, { schema: options.schema });
    this.logger.debug('Database opened', { path: this.path });
  }

  get isOpen(): boolean {
    return !this.closed;
  }

  /**
   * Run a query inside a database span. Constraint violations surface as
   * ConstraintError.
   */
  async query<T>(
    operation: string,
    table: string,
    fn: (orm: BetterSQLite3Database<TSchema>) => T,
  ): Promise<T> {
    return await withDbSpan(operation, table, async () => {
      try {
        return fn(this.orm);
      } catch (error) {
        throw translateError(error);
      }
    });
  }

  /**
   * Run `fn` in a single transaction; a throw rolls everything back
   */
  transaction<T>(fn: () => T): T {
    return this.raw.transaction(fn)();
  }

  close(): void {
    if (this.closed) return;
    this.raw.close();
    this.closed = true;
    this.logger.debug('Database closed', { path: this.path });
  }
}
