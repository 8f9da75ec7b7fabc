/**
 * Field Validators
 *
 * Validators for submitted form fields. Each returns an error message, or
 * null when the value passes. Empty values pass every validator except
 * `required`, so optional fields can share the same chain.
 */

export type Validator = (value: string, field: string) => string | null;

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Parse `YYYY-MM-DD` into a UTC date, rejecting impossible days
 */
export function parseIsoDate(value: string): Date | null {
  const match = ISO_DATE.exec(value);
  if (!match) return null;

  const [, year, month, day] = match.map(Number);
  // Date.UTC maps years 0-99 onto 1900-1999
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return date;
}

/**
 * Built-in validators
 */
export const validators = {
  required(message?: string): Validator {
    return (value, field) => (value.trim() === '' ? (message ?? `${field} is required.`) : null);
  },

  maxLength(max: number): Validator {
    return (value, field) => {
      if (value.length > max) {
        return `${field} must be at most ${max} characters.`;
      }
      return null;
    };
  },

  /**
   * Whole number within [min, max]
   */
  integer(min: number, max: number): Validator {
    return (value, field) => {
      if (value === '') return null;
      if (!/^-?\d+$/.test(value)) {
        return `${field} must be a whole number.`;
      }
      const n = Number(value);
      if (n < min || n > max) {
        return `${field} must be between ${min} and ${max}.`;
      }
      return null;
    };
  },

  isoDate(): Validator {
    return (value, field) => {
      if (value === '') return null;
      return parseIsoDate(value) ? null : `${field} must be a valid date (YYYY-MM-DD).`;
    };
  },

  pattern(regex: RegExp, message?: string): Validator {
    return (value, field) => {
      if (value !== '' && !regex.test(value)) {
        return message ?? `${field} format is invalid.`;
      }
      return null;
    };
  },

  /**
   * Custom validation function; `{field}` in the message is replaced
   */
  custom(fn: (value: string) => boolean, message: string): Validator {
    return (value, field) => {
      if (value !== '' && !fn(value)) {
        return message.replace('{field}', field);
      }
      return null;
    };
  },
};

/**
 * Run validators in order and return the first failure
 */
export function validate(value: string, field: string, chain: readonly Validator[]): string | null {
  for (const validator of chain) {
    const error = validator(value, field);
    if (error) return error;
  }
  return null;
}

/**
 * Submitted input failed one or more validators
 */
export class ValidationError extends Error {
  readonly errors: string[];

  constructor(errors: string[]) {
    super(`Validation failed: ${errors.join(', ')}`);
    this.name = 'ValidationError';
    this.errors = errors;
  }
}
