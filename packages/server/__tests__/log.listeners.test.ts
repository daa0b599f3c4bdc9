import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import chalk from 'chalk';

import { createConsoleLogListener, createFileLogListener, formatLogLine } from '../src/logging/log.listeners.js';

const time = Date.UTC(2026, 0, 1, 8, 30);

describe('log listeners', () => {
  it('formats a tagged line with its metadata', () => {
    assert.equal(
      formatLogLine({ level: 'info', msg: 'server started', time, meta: { port: 8080 } }),
      `${chalk.blue('[INFO]')} [2026-01-01T08:30:00.000Z] - server started {"port":8080}\n`,
    );
    assert.equal(
      formatLogLine({ level: 'debug', msg: 'tick', time, meta: {} }),
      `${chalk.gray('[DEBUG]')} [2026-01-01T08:30:00.000Z] - tick\n`,
    );
  });

  it('sends warnings and errors to the error stream', () => {
    const out: string[] = [];
    const err: string[] = [];
    const listener = createConsoleLogListener((line) => out.push(line), (line) => err.push(line));

    listener({ level: 'info', msg: 'a', time });
    listener({ level: 'warn', msg: 'b', time });
    listener({ level: 'error', msg: 'c', time });

    assert.equal(out.length, 1);
    assert.equal(err.length, 2);
  });

  it('appends json lines to the log file', () => {
    const dir = mkdtempSync(join(tmpdir(), 'codescout-log-'));
    const filename = join(dir, 'logs', 'app.log');

    try {
      const listener = createFileLogListener(filename);
      listener({ level: 'info', msg: 'first', time, meta: { id: 1 } });
      listener({ level: 'error', msg: 'second', time });

      const lines = readFileSync(filename, 'utf-8').trim().split('\n').map((line) => JSON.parse(line));
      assert.deepEqual(lines, [
        { time, level: 'info', msg: 'first', meta: { id: 1 } },
        { time, level: 'error', msg: 'second' },
      ]);
    }
    finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
