/**
 * Catalog Application Service
 *
 * Orchestrates the catalog use cases: listing, adding authors and books,
 * and deleting books. User mistakes come back as result objects with a
 * message for the page; anything else propagates.
 */

import { ConstraintError, ValidationError } from '../../../../framework/orm/mod.ts';
import { getLogger, type Logger } from '../../../../framework/telemetry/mod.ts';
import { parseAuthorForm } from '../domain/author_form.ts';
import { parseBookForm } from '../domain/book_form.ts';
import { parseListingCriteria, type ListingCriteria, type ListingRow } from '../domain/listing.ts';
import { AuthorRepository } from '../infrastructure/author_repository.ts';
import { BookRepository, type BookWithAuthor } from '../infrastructure/book_repository.ts';
import type { CatalogDatabase } from '../infrastructure/database.ts';
import type { AuthorRow, BookRow } from '../infrastructure/schema.ts';

export type FailureReason = 'invalid' | 'duplicate' | 'not_found';

export type FormFields = Record<string, string | undefined>;

export interface ListBooksQuery {
  search?: string | null;
  sort?: string | null;
  order?: string | null;
}

export interface BookListResult {
  books: ListingRow[];
  criteria: ListingCriteria;
  /** Set when a search matched nothing */
  message?: string;
}

export interface AuthorResult {
  success: boolean;
  message: string;
  author?: AuthorRow;
  error?: FailureReason;
}

export interface BookResult {
  success: boolean;
  message: string;
  book?: BookRow;
  error?: FailureReason;
}

export type DeleteStatus = 'Success!' | 'Error!';

export interface DeleteBookResult {
  success: boolean;
  status: DeleteStatus;
  message: string;
  book?: BookRow;
  authorDeleted?: boolean;
}

/**
 * Catalog application service
 */
export class CatalogService {
  private logger: Logger;

  constructor(
    private authors: AuthorRepository,
    private books: BookRepository,
    logger?: Logger,
    private clock: () => Date = () => new Date()
  ) {
    this.logger = (logger ?? getLogger()).child({ service: 'catalog' });
  }

  /**
   * List books joined with author names
   */
  async listBooks(query: ListBooksQuery = {}): Promise<BookListResult> {
    const criteria = parseListingCriteria(query);
    const books = await this.books.list(criteria);

    if (criteria.search && books.length === 0) {
      return { books, criteria, message: `Search term '${criteria.search}' not found.` };
    }

    return { books, criteria };
  }

  /**
   * Authors for the add-book dropdown
   */
  async listAuthors(): Promise<AuthorRow[]> {
    return await this.authors.findAll();
  }

  async getBook(id: number): Promise<BookWithAuthor | null> {
    return await this.books.findById(id);
  }

  /**
   * Add an author
   */
  async addAuthor(fields: FormFields): Promise<AuthorResult> {
    const parsed = parseForm(() => parseAuthorForm(fields));
    if (!parsed.ok) return parsed.failure;
    const draft = parsed.value;

    const duplicate: AuthorResult = {
      success: false,
      message: `Author '${draft.name}' already exists.`,
      error: 'duplicate',
    };

    if (await this.authors.findByName(draft.name)) {
      return duplicate;
    }

    try {
      const author = await this.authors.create(draft);
      this.logger.info('Author added', { authorId: author.id });
      return { success: true, message: `Author '${author.name}' added successfully.`, author };
    } catch (error) {
      if (error instanceof ConstraintError && error.kind === 'unique') {
        return duplicate;
      }
      throw error;
    }
  }

  /**
   * Add a book for an existing author
   */
  async addBook(fields: FormFields): Promise<BookResult> {
    const parsed = parseForm(() => parseBookForm(fields, this.clock()));
    if (!parsed.ok) return parsed.failure;
    const draft = parsed.value;

    const isbn = draft.isbn.value;
    const existing = await this.books.findByIsbn(isbn);
    if (existing) {
      return duplicateIsbn(isbn, existing.title);
    }

    const authorMissing: BookResult = { success: false, message: 'Author not found.', error: 'invalid' };
    if (!(await this.authors.findById(draft.authorId))) {
      return authorMissing;
    }

    try {
      const book = await this.books.create({
        isbn,
        title: draft.title,
        year: draft.year,
        cover: draft.isbn.coverUrl,
        authorId: draft.authorId,
      });
      this.logger.info('Book added', { bookId: book.id, authorId: book.authorId });
      return { success: true, message: `Book '${book.title}' added successfully.`, book };
    } catch (error) {
      if (!(error instanceof ConstraintError)) throw error;

      if (error.kind === 'foreign_key') {
        return authorMissing;
      }
      if (error.kind === 'unique') {
        const winner = await this.books.findByIsbn(isbn);
        return duplicateIsbn(isbn, winner?.title ?? draft.title);
      }
      throw error;
    }
  }

  /**
   * Delete a book; its author goes too when this was their last book
   */
  async deleteBook(id: number): Promise<DeleteBookResult> {
    const deleted = await this.books.deleteWithOrphanedAuthor(id);

    if (!deleted) {
      return { success: false, status: 'Error!', message: 'Book not found.' };
    }

    this.logger.info('Book deleted', {
      bookId: deleted.book.id,
      authorId: deleted.book.authorId,
      authorDeleted: deleted.authorDeleted,
    });

    return {
      success: true,
      status: 'Success!',
      message: `Book '${deleted.book.title}' deleted successfully.`,
      book: deleted.book,
      authorDeleted: deleted.authorDeleted,
    };
  }
}

interface FormFailure {
  success: false;
  message: string;
  error: FailureReason;
}

type Parsed<T> = { ok: true; value: T } | { ok: false; failure: FormFailure };

/**
 * Run a form parser, turning ValidationError into a failure result
 */
function parseForm<T>(parse: () => T): Parsed<T> {
  try {
    return { ok: true, value: parse() };
  } catch (error) {
    if (error instanceof ValidationError) {
      return { ok: false, failure: { success: false, message: error.errors.join(' '), error: 'invalid' } };
    }
    throw error;
  }
}

function duplicateIsbn(isbn: string, title: string): BookResult {
  return {
    success: false,
    message: `Book with ISBN '${isbn}', '${title}', already exists.`,
    error: 'duplicate',
  };
}

/**
 * Build the service over a catalog database
 */
export function createCatalogService(db: CatalogDatabase, logger?: Logger): CatalogService {
  return new CatalogService(new AuthorRepository(db), new BookRepository(db), logger);
}
