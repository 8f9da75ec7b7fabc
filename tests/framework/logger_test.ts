/**
 * Logger Tests
 */

import { test } from 'node:test';
import assert from 'node:assert/strict';
import {
  Logger,
  createLogger,
  createRequestLogger,
  serializeError,
  type LogEntry,
} from '../../framework/telemetry/logger.ts';

function capture(level: 'debug' | 'info' | 'warn' | 'error' = 'debug'): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  return { logger: new Logger({ level, output: (e) => entries.push(e) }), entries };
}

test('Logger - filters below the configured level', () => {
  const { logger, entries } = capture('warn');

  logger.debug('d');
  logger.info('i');
  logger.warn('w');
  logger.error('e');

  assert.deepEqual(
    entries.map((e) => e.message),
    ['w', 'e']
  );
});

test('Logger - child loggers merge context', () => {
  const { logger, entries } = capture();

  logger.child({ service: 'catalog' }).info('Book added', { bookId: 3 });

  assert.deepEqual(entries[0].context, { service: 'catalog', bookId: 3 });
});

test('Logger - errors are serialized with their cause', () => {
  const { logger, entries } = capture();
  const cause = new Error('constraint failed');

  logger.error('Request error', new Error('insert failed', { cause }));

  assert.equal(entries[0].error?.message, 'insert failed');
  assert.equal(entries[0].error?.cause?.message, 'constraint failed');
});

test('Logger - setLevel and isLevelEnabled', () => {
  const { logger } = capture('info');

  assert.equal(logger.isLevelEnabled('debug'), false);
  logger.setLevel('debug');
  assert.equal(logger.getLevel(), 'debug');
  assert.equal(logger.isLevelEnabled('debug'), true);
});

test('createLogger - environment defaults and explicit level', () => {
  assert.equal(createLogger('production').getLevel(), 'info');
  assert.equal(createLogger('test').getLevel(), 'error');
  assert.equal(createLogger('development').getLevel(), 'debug');
  assert.equal(createLogger('production', 'warn').getLevel(), 'warn');
});

test('createRequestLogger - carries request identity', () => {
  const { logger, entries } = capture();

  createRequestLogger(logger, { requestId: 'r-1', method: 'GET', path: '/home' }).info('hit');

  assert.deepEqual(entries[0].context, { requestId: 'r-1', method: 'GET', path: '/home', userAgent: undefined });
});

test('serializeError - stops at non-Error causes', () => {
  const serialized = serializeError(new Error('outer', { cause: 'text' }));

  assert.equal(serialized.name, 'Error');
  assert.equal(serialized.cause, undefined);
});
