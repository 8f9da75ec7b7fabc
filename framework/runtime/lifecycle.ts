/**
 * Process Lifecycle Management
 *
 * Handles application startup, shutdown, and signal handling.
 * Provides hooks for graceful shutdown of resources.
 */

import { getLogger, type Logger } from '../telemetry/logger.ts';

export type LifecycleHook = () => Promise<void> | void;

export interface LifecycleEvents {
  onStart: LifecycleHook[];
  onReady: LifecycleHook[];
  onShutdown: LifecycleHook[];
}

export interface LifecycleOptions {
  shutdownTimeout?: number;
  /** Listen for SIGINT/SIGTERM (default: true) */
  handleSignals?: boolean;
  logger?: Logger;
}

/**
 * Lifecycle manager
 */
export class Lifecycle {
  private events: LifecycleEvents = {
    onStart: [],
    onReady: [],
    onShutdown: [],
  };

  private abortController: AbortController;
  private isShuttingDown = false;
  private shutdownTimeout: number;
  private logger: Logger;
  private readonly signalListener = (signal: NodeJS.Signals): void => {
    this.shutdown(`Received ${signal}`).catch((error: unknown) => {
      this.logger.error('Shutdown failed', error instanceof Error ? error : new Error(String(error)));
    });
  };

  constructor(options: LifecycleOptions = {}) {
    this.abortController = new AbortController();
    this.shutdownTimeout = options.shutdownTimeout ?? 10000;
    this.logger = options.logger ?? getLogger();
    if (options.handleSignals ?? true) {
      process.once('SIGINT', this.signalListener);
      process.once('SIGTERM', this.signalListener);
    }
  }

  /**
   * Abort signal fired when shutdown begins
   */
  get signal(): AbortSignal {
    return this.abortController.signal;
  }

  get shuttingDown(): boolean {
    return this.isShuttingDown;
  }

  onStart(hook: LifecycleHook): void {
    this.events.onStart.push(hook);
  }

  onReady(hook: LifecycleHook): void {
    this.events.onReady.push(hook);
  }

  /**
   * Register a hook to run on graceful shutdown. Hooks run in reverse
   * registration order.
   */
  onShutdown(hook: LifecycleHook): void {
    this.events.onShutdown.push(hook);
  }

  async emitStart(): Promise<void> {
    for (const hook of this.events.onStart) {
      await hook();
    }
  }

  async emitReady(): Promise<void> {
    for (const hook of this.events.onReady) {
      await hook();
    }
  }

  /**
   * Trigger graceful shutdown
   */
  async shutdown(reason?: string): Promise<void> {
    if (this.isShuttingDown) return;
    this.isShuttingDown = true;
    this.removeSignalHandlers();

    this.logger.info(`Shutting down${reason ? `: ${reason}` : ''}`);

    this.abortController.abort();

    const forceShutdown = setTimeout(() => {
      this.logger.error('Shutdown timeout exceeded, forcing exit');
      process.exit(1);
    }, this.shutdownTimeout);
    forceShutdown.unref();

    try {
      for (const hook of [...this.events.onShutdown].reverse()) {
        await hook();
      }
      this.logger.info('Shutdown complete');
    } finally {
      clearTimeout(forceShutdown);
    }
  }

  /**
   * Detach the process signal listeners
   */
  removeSignalHandlers(): void {
    process.off('SIGINT', this.signalListener);
    process.off('SIGTERM', this.signalListener);
  }
}
