/**
 * Controller Layer
 *
 * Request handling that reads input, delegates to application services and
 * renders views. Controllers stay thin.
 */

export { Controller, action } from './base.ts';
