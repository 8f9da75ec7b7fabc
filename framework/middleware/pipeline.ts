/**
 * Middleware Pipeline
 *
 * Manages the execution of middleware in a chain (onion model).
 * Each middleware can:
 * - Inspect/modify request state before the handler
 * - Short-circuit and return an early response
 * - Inspect/replace the response after the handler
 * - Handle exceptions thrown further down the chain
 */

import type { Context, Middleware, Next } from '../http/types.ts';

/**
 * Middleware pipeline for request processing
 */
export class MiddlewarePipeline {
  private middleware: Middleware[] = [];

  /**
   * Add middleware to the end of the pipeline
   */
  use(middleware: Middleware): this {
    this.middleware.push(middleware);
    return this;
  }

  /**
   * Remove middleware from the pipeline
   */
  remove(middleware: Middleware): this {
    const index = this.middleware.indexOf(middleware);
    if (index !== -1) {
      this.middleware.splice(index, 1);
    }
    return this;
  }

  get length(): number {
    return this.middleware.length;
  }

  /**
   * Run every middleware in order, then the final handler
   */
  async execute(ctx: Context, finalHandler: Middleware): Promise<Response> {
    const dispatch = async (index: number): Promise<Response> => {
      const next: Next = () => dispatch(index + 1);
      if (index >= this.middleware.length) {
        return await finalHandler(ctx, next);
      }
      return await this.middleware[index](ctx, next);
    };

    return await dispatch(0);
  }
}
