/**
 * Author Form
 *
 * Turns the submitted add-author form into a validated draft.
 *
 * @module
 */

import { ValidationError, parseIsoDate, validate, validators } from '../../../../framework/orm/mod.ts';

export const AUTHOR_NAME_MAX_LENGTH = 200;

export interface AuthorDraft {
  name: string;
  birthDate: string;
  dateOfDeath: string | null;
}

/**
 * Validate the add-author form. Every failing field is reported at once.
 *
 * @throws ValidationError
 */
export function parseAuthorForm(fields: Record<string, string | undefined>): AuthorDraft {
  const name = (fields.name ?? '').trim();
  const birthDate = (fields.birth_date ?? '').trim();
  const dateOfDeath = (fields.date_of_death ?? '').trim();

  const errors = [
    validate(name, 'Author name', [
      validators.required('Author name cannot be empty.'),
      validators.maxLength(AUTHOR_NAME_MAX_LENGTH),
    ]),
    validate(birthDate, 'Birth date', [validators.required(), validators.isoDate()]),
    validate(dateOfDeath, 'Date of death', [validators.isoDate()]),
  ].filter((error): error is string => error !== null);

  const born = parseIsoDate(birthDate);
  const died = parseIsoDate(dateOfDeath);
  if (born && died && died < born) {
    errors.push('Date of death cannot be before the birth date.');
  }

  if (errors.length > 0) {
    throw new ValidationError(errors);
  }

  return { name, birthDate, dateOfDeath: dateOfDeath === '' ? null : dateOfDeath };
}
