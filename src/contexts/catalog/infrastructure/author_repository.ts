/**
 * Author Repository
 *
 * Infrastructure layer for persisting and retrieving authors.
 */

import { asc, count, eq } from 'drizzle-orm';
import type { AuthorDraft } from '../domain/author_form.ts';
import type { CatalogDatabase } from './database.ts';
import { authors, books, type AuthorRow } from './schema.ts';

/**
 * Repository for authors
 */
export class AuthorRepository {
  constructor(private db: CatalogDatabase) {}

  /**
   * All authors, ordered by name
   */
  async findAll(): Promise<AuthorRow[]> {
    return await this.db.query('select', 'authors', (orm) =>
      orm.select().from(authors).orderBy(asc(authors.name), asc(authors.id)).all()
    );
  }

  async findById(id: number): Promise<AuthorRow | null> {
    const row = await this.db.query('select', 'authors', (orm) =>
      orm.select().from(authors).where(eq(authors.id, id)).get()
    );
    return row ?? null;
  }

  /**
   * Find an author by exact name
   */
  async findByName(name: string): Promise<AuthorRow | null> {
    const row = await this.db.query('select', 'authors', (orm) =>
      orm.select().from(authors).where(eq(authors.name, name)).get()
    );
    return row ?? null;
  }

  /**
   * Insert an author. A duplicate name raises ConstraintError('unique').
   */
  async create(draft: AuthorDraft): Promise<AuthorRow> {
    return await this.db.query('insert', 'authors', (orm) =>
      orm.insert(authors).values(draft).returning().get()
    );
  }

  async count(): Promise<number> {
    const row = await this.db.query('count', 'authors', (orm) =>
      orm.select({ value: count() }).from(authors).get()
    );
    return row?.value ?? 0;
  }

  /**
   * Number of books referencing the author
   */
  async countBooks(authorId: number): Promise<number> {
    const row = await this.db.query('count', 'books', (orm) =>
      orm.select({ value: count() }).from(books).where(eq(books.authorId, authorId)).get()
    );
    return row?.value ?? 0;
  }
}
