/**
 * Routing Layer
 *
 * Maps incoming request URLs to handlers and extracts path parameters.
 */

export { Router, type RouteDefinition, type RouteMatch } from './router.ts';
