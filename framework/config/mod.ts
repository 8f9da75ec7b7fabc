/**
 * Configuration & Environment Management
 *
 * Keeps settings out of code and lets the environment override them.
 */

export { Config, type ConfigOptions, loadConfig, DEFAULT_CONFIG_PATH } from './config.ts';
