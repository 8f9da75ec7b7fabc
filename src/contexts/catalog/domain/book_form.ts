/**
 * Book Form
 *
 * Turns the submitted add-book form into a validated draft.
 *
 * @module
 */

import { ValidationError, validate, validators } from '../../../../framework/orm/mod.ts';
import { Isbn } from './value_objects/isbn.ts';

export const MIN_PUBLICATION_YEAR = -3000;

export interface BookDraft {
  isbn: Isbn;
  title: string;
  year: number;
  authorId: number;
}

/**
 * Validate the add-book form. The upper bound for `year` is the current
 * year of `now`.
 *
 * @throws ValidationError
 */
export function parseBookForm(
  fields: Record<string, string | undefined>,
  now: Date = new Date()
): BookDraft {
  const rawIsbn = (fields.isbn ?? '').trim();
  const title = (fields.title ?? '').trim();
  const year = (fields.year ?? '').trim();
  const authorId = (fields.author_id ?? '').trim();

  const errors = [
    validate(rawIsbn, 'ISBN', [
      validators.required(),
      validators.custom(Isbn.isValid, 'ISBN must have 10 characters (the last may be X) or 13 digits.'),
    ]),
    validate(title, 'Title', [validators.required()]),
    validate(year, 'Year', [
      validators.required(),
      validators.integer(MIN_PUBLICATION_YEAR, now.getFullYear()),
    ]),
    validate(authorId, 'Author', [
      validators.required('Please choose an author.'),
      validators.integer(1, Number.MAX_SAFE_INTEGER),
    ]),
  ].filter((error): error is string => error !== null);

  if (errors.length > 0) {
    throw new ValidationError(errors);
  }

  return {
    isbn: Isbn.create(rawIsbn),
    title,
    year: Number(year),
    authorId: Number(authorId),
  };
}
