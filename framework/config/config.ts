/**
 * Configuration Management
 *
 * Layers built-in defaults, a JSON config file and environment variables
 * (in that order of precedence, lowest first).
 */

import { readFile } from 'node:fs/promises';
import type { LogLevel } from '../telemetry/logger.ts';

export interface ConfigOptions {
  port?: number;
  host?: string;
  env?: string;
  logLevel?: LogLevel;
  /** Open a browser tab once the server is listening */
  open?: boolean;
  database?: {
    path?: string;
  };
  views?: {
    path?: string;
    cache?: boolean;
  };
  static?: {
    path?: string;
    prefix?: string;
  };
  [key: string]: unknown;
}

const DEFAULT_CONFIG: ConfigOptions = {
  port: 5002,
  host: '127.0.0.1',
  env: 'development',
  open: true,
  database: {
    path: './data/library.sqlite',
  },
  views: {
    path: './views',
    cache: true,
  },
  static: {
    path: './public',
    prefix: '/_static',
  },
};

export const DEFAULT_CONFIG_PATH = './config/app.json';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/**
 * Configuration manager
 */
export class Config {
  private config: ConfigOptions;

  constructor(options: ConfigOptions = {}) {
    this.config = mergeConfig(DEFAULT_CONFIG, options);
  }

  /**
   * Get a configuration value by dot path (e.g. `database.path`)
   */
  get(key: string): unknown {
    return getNestedValue(this.config, key);
  }

  /**
   * Get a string value, falling back when the stored value is not a string
   */
  string(key: string, fallback: string): string {
    const value = this.get(key);
    return typeof value === 'string' ? value : fallback;
  }

  /**
   * Get a numeric value, falling back when the stored value is not a finite number
   */
  number(key: string, fallback: number): number {
    const value = this.get(key);
    return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
  }

  /**
   * Get a boolean value, falling back when the stored value is not a boolean
   */
  boolean(key: string, fallback: boolean): boolean {
    const value = this.get(key);
    return typeof value === 'boolean' ? value : fallback;
  }

  /**
   * Configured log level, if one was set
   */
  logLevel(): LogLevel | undefined {
    const value = this.get('logLevel');
    return typeof value === 'string' ? parseLogLevel(value) : undefined;
  }

  /**
   * Set a configuration value by dot path
   */
  set(key: string, value: unknown): void {
    setNestedValue(this.config, key, value);
  }

  has(key: string): boolean {
    return getNestedValue(this.config, key) !== undefined;
  }

  all(): ConfigOptions {
    return { ...this.config };
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep-merge two configuration objects; `undefined` never overrides
 */
function mergeConfig(base: ConfigOptions, override: Record<string, unknown>): ConfigOptions {
  const result: ConfigOptions = { ...base };

  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) continue;
    const current = base[key];
    if (isPlainObject(value)) {
      result[key] = mergeConfig(isPlainObject(current) ? current : {}, value);
    } else {
      result[key] = value;
    }
  }

  return result;
}

function getNestedValue(obj: Record<string, unknown>, path: string): unknown {
  let current: unknown = obj;
  for (const key of path.split('.')) {
    if (!isPlainObject(current)) return undefined;
    current = current[key];
  }
  return current;
}

function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split('.');
  const last = parts.pop();
  if (last === undefined) return;
  let current = obj;

  for (const part of parts) {
    const next = current[part];
    if (isPlainObject(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }

  current[last] = value;
}

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  return !['false', '0', 'no', 'off'].includes(value.trim().toLowerCase());
}

function parseLogLevel(value: string | undefined): LogLevel | undefined {
  return LOG_LEVELS.find((level) => level === value?.trim().toLowerCase());
}

/**
 * Read a JSON config file. A missing file yields an empty object; a file
 * that exists but is not a JSON object is an error.
 */
async function readConfigFile(path: string): Promise<Record<string, unknown>> {
  let content: string;
  try {
    content = await readFile(path, 'utf8');
  } catch (error) {
    if (isPlainObject(error) && error.code === 'ENOENT') {
      return {};
    }
    throw error;
  }

  const parsed: unknown = JSON.parse(content);
  if (!isPlainObject(parsed)) {
    throw new Error(`Config file ${path} must contain a JSON object`);
  }
  return parsed;
}

/**
 * Load configuration from the config file and environment variables
 */
export async function loadConfig(
  configPath: string = DEFAULT_CONFIG_PATH,
  env: NodeJS.ProcessEnv = process.env,
): Promise<Config> {
  const config = new Config(await readConfigFile(configPath));

  const port = env.PORT !== undefined ? Number.parseInt(env.PORT, 10) : undefined;
  const overrides: Record<string, unknown> = {
    port: port !== undefined && Number.isFinite(port) ? port : undefined,
    host: env.HOST,
    env: env.NODE_ENV,
    logLevel: parseLogLevel(env.LOG_LEVEL),
    open: parseBoolean(env.LIBRARY_OPEN_BROWSER),
    'database.path': env.DATABASE_PATH,
  };

  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      config.set(key, value);
    }
  }

  return config;
}
