/**
 * Catalog Controller
 *
 * Page actions for the book list, the add forms and book deletion.
 */

import { Controller } from '../../../../framework/controller/mod.ts';
import { ValidationError } from '../../../../framework/orm/mod.ts';
import type { TemplateEngine } from '../../../../framework/view/mod.ts';
import type { CatalogService, FailureReason } from '../application/catalog_service.ts';

const FAILURE_STATUS: Record<FailureReason, number> = {
  invalid: 400,
  duplicate: 409,
  not_found: 404,
};

function statusFor(result: { success: boolean; error?: FailureReason }): number {
  return result.success || !result.error ? 200 : FAILURE_STATUS[result.error];
}

export class CatalogController extends Controller {
  constructor(
    views: TemplateEngine,
    private catalog: CatalogService
  ) {
    super(views);
  }

  /**
   * GET /home
   */
  async home(): Promise<Response> {
    const result = await this.catalog.listBooks({
      search: this.queryParam('search'),
      sort: this.queryParam('sort'),
      order: this.queryParam('order'),
    });

    return await this.render('home', {
      books: result.books,
      criteria: result.criteria,
      message: result.message,
    });
  }

  /**
   * GET /add_author
   */
  async newAuthor(): Promise<Response> {
    return await this.render('add_author', { form: {} });
  }

  /**
   * POST /add_author
   */
  async createAuthor(): Promise<Response> {
    const fields = await this.request.form();
    const result = await this.catalog.addAuthor(fields);

    return await this.render(
      'add_author',
      {
        success: result.success,
        message: result.message,
        form: result.success ? {} : fields,
      },
      statusFor(result)
    );
  }

  /**
   * GET /add_book
   */
  async newBook(): Promise<Response> {
    const authors = await this.catalog.listAuthors();
    return await this.render('add_book', { authors, form: {} });
  }

  /**
   * POST /add_book
   */
  async createBook(): Promise<Response> {
    const fields = await this.request.form();
    const result = await this.catalog.addBook(fields);
    const authors = await this.catalog.listAuthors();

    return await this.render(
      'add_book',
      {
        authors,
        success: result.success,
        message: result.message,
        form: result.success ? {} : fields,
      },
      statusFor(result)
    );
  }

  /**
   * GET /book/:id/delete
   */
  async confirmDelete(): Promise<Response> {
    const id = this.bookId();
    const book = await this.catalog.getBook(id);

    if (!book) {
      return await this.render('redirect', { status: 'Error!', message: 'Book not found.' }, 404);
    }

    return await this.render('delete_book', { book });
  }

  /**
   * POST /book/:id/delete
   */
  async deleteBook(): Promise<Response> {
    const result = await this.catalog.deleteBook(this.bookId());

    return await this.render(
      'redirect',
      { status: result.status, message: result.message },
      result.success ? 200 : 404
    );
  }

  private bookId(): number {
    const id = Number(this.requireParam('id'));
    if (!Number.isSafeInteger(id) || id < 1) {
      throw new ValidationError(['Book id must be a positive integer']);
    }
    return id;
  }
}
