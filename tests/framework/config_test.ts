/**
 * Config Tests
 */

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Config, loadConfig } from '../../framework/config/config.ts';

async function withConfigFile(content: string, fn: (path: string) => Promise<void>): Promise<void> {
  const dir = await mkdtemp(join(tmpdir(), 'config-'));
  try {
    const path = join(dir, 'app.json');
    await writeFile(path, content);
    await fn(path);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

test('Config - defaults', () => {
  const config = new Config();

  assert.equal(config.get('port'), 5002);
  assert.equal(config.get('host'), '127.0.0.1');
  assert.equal(config.get('database.path'), './data/library.sqlite');
  assert.equal(config.get('static.prefix'), '/_static');
  assert.equal(config.boolean('open', false), true);
});

test('Config - options deep-merge over defaults', () => {
  const config = new Config({ database: { path: ':memory:' } });

  assert.equal(config.get('database.path'), ':memory:');
  assert.equal(config.get('views.path'), './views');
});

test('Config - typed getters fall back on missing or mistyped values', () => {
  const config = new Config({ port: 8080 });

  assert.equal(config.number('port', 1), 8080);
  assert.equal(config.string('port', 'fallback'), 'fallback');
  assert.equal(config.number('missing.key', 7), 7);
});

test('Config - set and has with dot paths', () => {
  const config = new Config();

  assert.equal(config.has('feature.enabled'), false);
  config.set('feature.enabled', true);
  assert.equal(config.has('feature.enabled'), true);
  assert.equal(config.boolean('feature.enabled', false), true);
});

test('loadConfig - missing file yields defaults', async () => {
  const config = await loadConfig(join(tmpdir(), 'does-not-exist', 'app.json'), {});

  assert.equal(config.get('port'), 5002);
});

test('loadConfig - file values override defaults', async () => {
  await withConfigFile('{"port": 6000, "views": {"cache": false}}', async (path) => {
    const config = await loadConfig(path, {});

    assert.equal(config.get('port'), 6000);
    assert.equal(config.get('views.cache'), false);
    assert.equal(config.get('views.path'), './views');
  });
});

test('loadConfig - environment overrides the file', async () => {
  await withConfigFile('{"port": 6000, "open": true}', async (path) => {
    const config = await loadConfig(path, {
      PORT: '7000',
      HOST: '0.0.0.0',
      NODE_ENV: 'production',
      LOG_LEVEL: 'WARN',
      DATABASE_PATH: '/tmp/catalog.sqlite',
      LIBRARY_OPEN_BROWSER: 'false',
    });

    assert.equal(config.get('port'), 7000);
    assert.equal(config.get('host'), '0.0.0.0');
    assert.equal(config.get('env'), 'production');
    assert.equal(config.logLevel(), 'warn');
    assert.equal(config.get('database.path'), '/tmp/catalog.sqlite');
    assert.equal(config.get('open'), false);
  });
});

test('loadConfig - invalid environment values are ignored', async () => {
  const config = await loadConfig(join(tmpdir(), 'does-not-exist', 'app.json'), {
    PORT: 'not-a-port',
    LOG_LEVEL: 'verbose',
  });

  assert.equal(config.get('port'), 5002);
  assert.equal(config.logLevel(), undefined);
});

test('loadConfig - a file that is not a JSON object is rejected', async () => {
  await withConfigFile('[1, 2]', async (path) => {
    await assert.rejects(loadConfig(path, {}), /must contain a JSON object/);
  });
});
