import { afterEach, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { EventEmitter } from 'node:events';

import { ConfigService, MemoryKVService, SimpleLogger, installProcessHandlers, isLogLevel } from '../src/index.js';
import type { LogPayload } from '../src/index.js';

describe('SimpleLogger', () => {
  it('filters below its level and merges child meta', () => {
    const records: LogPayload[] = [];
    const logger = new SimpleLogger({ level: 'info', console: false, meta: { service: 'test' } });
    logger.addListener((payload) => records.push(payload));

    logger.debug('hidden');
    logger.child({ sessionId: 's-1' }).warn('careful', { round: 2 });

    assert.equal(records.length, 1);
    assert.equal(records[0]?.level, 'warn');
    assert.equal(records[0]?.msg, 'careful');
    assert.deepEqual(records[0]?.meta, { service: 'test', sessionId: 's-1', round: 2 });
  });

  it('recognises log levels', () => {
    assert.equal(isLogLevel('debug'), true);
    assert.equal(isLogLevel('verbose'), false);
  });
});

describe('MemoryKVService', () => {
  it('stores, lists by prefix and deletes', () => {
    const kv = new MemoryKVService();
    kv.set('note:1', { title: 'a' });
    kv.set('note:2', { title: 'b' });
    kv.set('cache:x', 'y');

    assert.deepEqual(kv.keys('note:'), ['note:1', 'note:2']);
    assert.deepEqual(kv.get('note:2'), { title: 'b' });

    kv.del('note:1');
    assert.equal(kv.has('note:1'), false);
    assert.deepEqual(kv.keys('note:'), ['note:2']);
  });
});

describe('ConfigService', () => {
  afterEach(() => {
    delete process.env.HTTPKIT_TEST_VALUE;
  });

  it('reads typed values with defaults', () => {
    assert.equal(ConfigService.env('HTTPKIT_TEST_VALUE', 'fallback'), 'fallback');
    assert.equal(ConfigService.envNumber('HTTPKIT_TEST_VALUE', 7), 7);

    process.env.HTTPKIT_TEST_VALUE = '42';
    assert.equal(ConfigService.envNumber('HTTPKIT_TEST_VALUE', 7), 42);

    process.env.HTTPKIT_TEST_VALUE = 'Yes';
    assert.equal(ConfigService.envFlag('HTTPKIT_TEST_VALUE'), true);
    assert.equal(ConfigService.envNumber('HTTPKIT_TEST_VALUE', 7), 7);
  });
});

describe('installProcessHandlers', () => {
  const setup = () => {
    const target = new EventEmitter();
    const records: LogPayload[] = [];
    const logger = new SimpleLogger({ level: 'debug', console: false });
    logger.addListener((payload) => records.push(payload));
    const calls: string[] = [];
    let exited: (code: number) => void = () => undefined;
    const exitCode = new Promise<number>((resolve) => {
      exited = resolve;
    });

    installProcessHandlers({
      logger,
      target,
      stop: async () => {
        calls.push('stop');
      },
      exit: (code) => {
        calls.push(`exit ${code}`);
        exited(code);
      },
    });

    return { target, records, calls, exitCode };
  };

  it('stops the server and exits non-zero on an uncaught exception', async () => {
    const { target, records, calls, exitCode } = setup();

    target.emit('uncaughtException', new Error('boom'));

    assert.equal(await exitCode, 1);
    assert.deepEqual(calls, ['stop', 'exit 1']);
    assert.equal(records[0]?.msg, 'uncaught exception');
  });

  it('stops the server and exits non-zero on an unhandled rejection', async () => {
    const { target, records, calls, exitCode } = setup();

    target.emit('unhandledRejection', 'lost promise');

    assert.equal(await exitCode, 1);
    assert.deepEqual(calls, ['stop', 'exit 1']);
    assert.deepEqual(records[0]?.meta, { reason: 'lost promise' });
  });

  it('stops without exiting on SIGTERM', async () => {
    const { target, calls } = setup();

    target.emit('SIGTERM');
    await new Promise((resolve) => setImmediate(resolve));

    assert.deepEqual(calls, ['stop']);
  });
});
