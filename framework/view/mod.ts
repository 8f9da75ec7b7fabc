/**
 * Presentation Layer (View/Template)
 *
 * Turns data into HTML with auto-escaping, layout inheritance and
 * partials.
 */

export {
  TemplateEngine,
  TemplateError,
  type TemplateOptions,
  type TemplateContext,
} from './template.ts';
export { SafeHtml, html, escape, raw } from './html.ts';
