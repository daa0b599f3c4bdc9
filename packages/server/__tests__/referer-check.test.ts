import { after, before, describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { startServer, stopServer } from '../src/app.js';
import {
  FakeCompletion,
  FakeSearch,
  createTestKv,
  createTestLogger,
  createTestServices,
  testConfig,
} from './fakes.js';

describe('referer check', () => {
  let baseUrl = '';

  before(async () => {
    const { logger } = createTestLogger();
    const config = testConfig({
      ENVIRONMENT: 'production',
      ALLOWED_UI_ORIGINS: 'ui.example.test, localhost',
      STRICT_REFERER_CHECK: 'true',
    });
    const kv = createTestKv();
    const services = createTestServices({ config, search: new FakeSearch(), completion: new FakeCompletion(), kv });
    const { port } = await startServer({ config, services, logger, kv });
    baseUrl = `http://127.0.0.1:${port}`;
  });

  after(async () => {
    await stopServer();
  });

  it('lets api requests from an allowed UI host through', async () => {
    const response = await fetch(`${baseUrl}/api/health`, { headers: { Referer: 'https://ui.example.test:8443/app' } });

    assert.equal(response.status, 200);
  });

  it('blocks api requests from other hosts', async () => {
    const response = await fetch(`${baseUrl}/api/health`, { headers: { Referer: 'https://elsewhere.example.test/' } });

    assert.equal(response.status, 403);
    assert.deepEqual(await response.json(), { detail: 'Invalid request' });
  });

  it('blocks api requests without a referer in strict mode', async () => {
    const response = await fetch(`${baseUrl}/api/note`);

    assert.equal(response.status, 403);
    assert.deepEqual(await response.json(), { detail: 'Invalid request' });
  });

  it('leaves non-api paths alone', async () => {
    const response = await fetch(`${baseUrl}/`);

    assert.equal(response.status, 200);
  });
});
