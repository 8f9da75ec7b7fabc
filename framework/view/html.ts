/**
 * HTML Utilities
 *
 * Tagged template literal for building HTML snippets in code, with every
 * interpolated value escaped unless it is already SafeHtml.
 */

/**
 * Safe HTML content wrapper. The template engine and `html` both emit it
 * as-is.
 */
export class SafeHtml {
  constructor(public readonly content: string) {}

  toString(): string {
    return this.content;
  }
}

const ENTITIES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

/**
 * Escape HTML entities. Arrays are escaped item by item and concatenated;
 * null and undefined render as the empty string.
 */
export function escape(value: unknown): string {
  if (value instanceof SafeHtml) {
    return value.content;
  }
  if (Array.isArray(value)) {
    return value.map((item) => escape(item)).join('');
  }

  return String(value ?? '').replace(/[&<>"']/g, (ch) => ENTITIES[ch] ?? ch);
}

/**
 * Mark content as safe (no escaping)
 */
export function raw(content: string): SafeHtml {
  return new SafeHtml(content);
}

/**
 * HTML tagged template literal
 *
 * @example
 * const title = '<b>Dune</b>';
 * html`<li>${title}</li>`.content
 * // '<li>&lt;b&gt;Dune&lt;/b&gt;</li>'
 */
export function html(
  strings: TemplateStringsArray,
  ...values: unknown[]
): SafeHtml {
  let result = strings[0] ?? '';

  for (let i = 0; i < values.length; i++) {
    result += escape(values[i]) + (strings[i + 1] ?? '');
  }

  return new SafeHtml(result);
}
