/**
 * Runtime
 *
 * Process lifecycle: startup hooks, signal handling and graceful shutdown.
 */

export { Lifecycle, type LifecycleHook, type LifecycleOptions } from './lifecycle.ts';
