import { after, before, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import * as z from 'zod';

import { HttpError, httpkit } from '../src/index.js';
import type { LogPayload, RPCConfig } from '../src/index.js';
import { createTestKv, createTestLogger } from './helpers.js';

const echo: RPCConfig = {
  type: 'api',
  method: 'POST',
  path: '/echo',
  strict: true,
  responseSchema: z.object({ text: z.string() }),
  handler: async (req) => ({ body: { text: `${req.body.text}` } }),
};

const teapot: RPCConfig = {
  type: 'api',
  method: 'GET',
  path: '/teapot',
  handler: async () => {
    throw new HttpError(418, 'short and stout', { spout: true });
  },
};

const broken: RPCConfig = {
  type: 'api',
  method: 'GET',
  path: '/broken',
  strict: true,
  responseSchema: { 200: z.object({ ok: z.boolean() }) },
  handler: async () => ({ body: { ok: 'yes' } }),
};

const lenient: RPCConfig = {
  type: 'api',
  method: 'GET',
  path: '/lenient',
  responseSchema: z.object({ ok: z.boolean() }),
  handler: async () => ({ body: { ok: 'yes' } }),
};

describe('httpkit api routes', () => {
  let baseUrl = '';
  let records: LogPayload[] = [];

  before(async () => {
    const { logger, records: logged } = createTestLogger();
    records = logged;
    httpkit.init({ config: { port: 0, hostname: '127.0.0.1', loadEnv: false }, logger, kv: createTestKv() });
    httpkit.addHandlers([echo, teapot, broken, lenient]);
    const { port } = await httpkit.start();
    baseUrl = `http://127.0.0.1:${port}`;
  });

  after(async () => {
    await httpkit.stop();
  });

  it('returns the handler body as JSON', async () => {
    const response = await fetch(`${baseUrl}/echo`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ text: 'hello' }),
    });

    assert.equal(response.status, 200);
    assert.deepEqual(await response.json(), { text: 'hello' });
  });

  it('maps an error status onto the response', async () => {
    const response = await fetch(`${baseUrl}/teapot`);

    assert.equal(response.status, 418);
    assert.deepEqual(await response.json(), { error: 'short and stout', spout: true });
  });

  it('refuses a response that breaks its schema', async () => {
    const response = await fetch(`${baseUrl}/broken`);

    assert.equal(response.status, 500);
    assert.deepEqual(await response.json(), { error: 'Invalid API response' });
  });

  it('logs a schema break without strict and still answers', async () => {
    const response = await fetch(`${baseUrl}/lenient`);

    assert.equal(response.status, 200);
    assert.deepEqual(await response.json(), { ok: 'yes' });
    assert.ok(records.some((record) => record.level === 'warn' && record.msg === 'Invalid response for GET /lenient'));
  });

  it('answers unknown paths with 404', async () => {
    const response = await fetch(`${baseUrl}/missing`);

    assert.equal(response.status, 404);
    assert.deepEqual(await response.json(), { error: 'Not found' });
  });
});
