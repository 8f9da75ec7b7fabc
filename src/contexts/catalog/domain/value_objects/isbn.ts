/**
 * ISBN Value Object
 *
 * An ISBN-10 or ISBN-13 with hyphens and spaces stripped. The check digit
 * is not verified.
 *
 * @module
 */

import { ValueObject } from '../../../../shared/domain/value_object.ts';

type IsbnProps = {
  value: string;
};

export const COVER_BASE_URL = 'https://covers.openlibrary.org/b/isbn';

const ISBN_10 = /^\d{9}[\dX]$/;
const ISBN_13 = /^\d{13}$/;

/**
 * ISBN value object
 */
export class Isbn extends ValueObject<IsbnProps> {
  private constructor(props: IsbnProps) {
    super(props);
  }

  /**
   * Create an ISBN from user input
   */
  static create(raw: string): Isbn {
    const value = Isbn.normalize(raw);
    if (!Isbn.isValid(value)) {
      throw new Error(`Invalid ISBN: ${raw}`);
    }
    return new Isbn({ value });
  }

  /**
   * Strip hyphens and whitespace; a trailing `x` check digit becomes `X`
   */
  static normalize(raw: string): string {
    return raw.replace(/[\s-]/g, '').toUpperCase();
  }

  static isValid(raw: string): boolean {
    const value = Isbn.normalize(raw);
    return ISBN_10.test(value) || ISBN_13.test(value);
  }

  get value(): string {
    return this.props.value;
  }

  /**
   * Medium-size cover image on Open Library
   */
  get coverUrl(): string {
    return `${COVER_BASE_URL}/${this.props.value}-M.jpg`;
  }

  toString(): string {
    return this.props.value;
  }
}
