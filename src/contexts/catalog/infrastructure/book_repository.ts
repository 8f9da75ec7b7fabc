/**
 * Book Repository
 *
 * Infrastructure layer for persisting and retrieving books. Listing rows
 * are joined with the author's name.
 */

import { asc, count, desc, eq, or, sql } from 'drizzle-orm';
import type { ListingCriteria, ListingRow } from '../domain/listing.ts';
import type { CatalogDatabase } from './database.ts';
import { authors, books, type AuthorRow, type BookRow, type NewBookRow } from './schema.ts';

export type BookWithAuthor = BookRow & { author: AuthorRow };

export interface DeletedBook {
  book: BookRow;
  /** The author was removed because this was their last book */
  authorDeleted: boolean;
}

/**
 * Escape LIKE wildcards so the term matches literally (with ESCAPE '\')
 */
export function escapeLike(term: string): string {
  return term.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

/**
 * Repository for books
 */
export class BookRepository {
  constructor(private db: CatalogDatabase) {}

  /**
   * Books with their author's name, filtered and ordered by `criteria`.
   * Text columns sort case-insensitively; ties fall back to the book id.
   */
  async list(criteria: ListingCriteria): Promise<ListingRow[]> {
    const pattern = `%${escapeLike(criteria.search)}%`;
    const filter = criteria.search
      ? or(
          sql`${books.title} LIKE ${pattern} ESCAPE '\\'`,
          sql`${authors.name} LIKE ${pattern} ESCAPE '\\'`
        )
      : undefined;

    const sortColumn = {
      title: sql`${books.title} COLLATE NOCASE`,
      author: sql`${authors.name} COLLATE NOCASE`,
      year: sql`${books.year}`,
    }[criteria.sort];
    const direction = criteria.order === 'desc' ? desc : asc;

    return await this.db.query('select', 'books', (orm) =>
      orm
        .select({
          id: books.id,
          isbn: books.isbn,
          title: books.title,
          year: books.year,
          cover: books.cover,
          author: authors.name,
        })
        .from(books)
        .innerJoin(authors, eq(books.authorId, authors.id))
        .where(filter)
        .orderBy(direction(sortColumn), asc(books.id))
        .all()
    );
  }

  /**
   * Find a book together with its author
   */
  async findById(id: number): Promise<BookWithAuthor | null> {
    const row = await this.db.query('select', 'books', (orm) =>
      orm.query.books.findFirst({ where: eq(books.id, id), with: { author: true } }).sync()
    );
    return row ?? null;
  }

  async findByIsbn(isbn: string): Promise<BookRow | null> {
    const row = await this.db.query('select', 'books', (orm) =>
      orm.select().from(books).where(eq(books.isbn, isbn)).get()
    );
    return row ?? null;
  }

  /**
   * Insert a book. A duplicate ISBN raises ConstraintError('unique'); an
   * unknown author raises ConstraintError('foreign_key').
   */
  async create(row: NewBookRow): Promise<BookRow> {
    return await this.db.query('insert', 'books', (orm) =>
      orm.insert(books).values(row).returning().get()
    );
  }

  async count(): Promise<number> {
    const row = await this.db.query('count', 'books', (orm) =>
      orm.select({ value: count() }).from(books).get()
    );
    return row?.value ?? 0;
  }

  /**
   * Delete one book, and its author when no other book references them.
   * Both happen in one transaction. Returns null when the book is missing.
   */
  async deleteWithOrphanedAuthor(id: number): Promise<DeletedBook | null> {
    return await this.db.query('delete', 'books', (orm) =>
      this.db.transaction(() => {
        const book = orm.delete(books).where(eq(books.id, id)).returning().get();
        if (!book) return null;

        const remaining = orm
          .select({ value: count() })
          .from(books)
          .where(eq(books.authorId, book.authorId))
          .get();

        const authorDeleted = (remaining?.value ?? 0) === 0;
        if (authorDeleted) {
          orm.delete(authors).where(eq(authors.id, book.authorId)).run();
        }

        return { book, authorDeleted };
      })
    );
  }
}
