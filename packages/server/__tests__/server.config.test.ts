import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { DEFAULT_ALLOWED_ORIGINS, loadServerConfig } from '../src/config/server.config.js';

describe('loadServerConfig', () => {
  it('fills in defaults', () => {
    const config = loadServerConfig({});

    assert.equal(config.port, 8080);
    assert.equal(config.logLevel, 'info');
    assert.equal(config.completion.provider, 'Azure OpenAI');
    assert.deepEqual(config.research, {
      maxRounds: 5,
      keywordLimit: 5,
      timeoutMs: 300_000,
      bufferSize: 64,
      stopOnNoNewHits: false,
    });
    assert.deepEqual(config.referer, { allowedOrigins: DEFAULT_ALLOWED_ORIGINS, strict: false });
    assert.equal(config.devops.cacheTtlSeconds, 604_800);
  });

  it('reads lists, flags and numbers', () => {
    const config = loadServerConfig({
      PORT: '9000',
      RESEARCH_MAX_ROUNDS: '3',
      RESEARCH_STOP_ON_NO_NEW_HITS: 'yes',
      ALLOWED_UI_ORIGINS: 'ui.example.test, admin.example.test',
      STRICT_REFERER_CHECK: 'TRUE',
      AZURE_DEVOPS_ORG: '  test-org ',
      COMPLETION_PROVIDER: 'OpenAI',
    });

    assert.equal(config.port, 9000);
    assert.equal(config.research.maxRounds, 3);
    assert.equal(config.research.stopOnNoNewHits, true);
    assert.deepEqual(config.referer, { allowedOrigins: ['ui.example.test', 'admin.example.test'], strict: true });
    assert.equal(config.devops.organization, 'test-org');
    assert.equal(config.completion.provider, 'OpenAI');
  });

  it('treats blank values as unset', () => {
    const config = loadServerConfig({ OPENAI_API_KEY: '   ', ALLOWED_UI_ORIGINS: '' });

    assert.equal(config.completion.openai.apiKey, undefined);
    assert.deepEqual(config.referer.allowedOrigins, DEFAULT_ALLOWED_ORIGINS);
  });

  it('rejects a session timeout beyond the timer range', () => {
    assert.equal(loadServerConfig({ RESEARCH_TIMEOUT_MS: '2147483647' }).research.timeoutMs, 2_147_483_647);
    assert.throws(
      () => loadServerConfig({ RESEARCH_TIMEOUT_MS: '3000000000' }),
      (error: unknown) => error instanceof Error && error.message.includes('RESEARCH_TIMEOUT_MS:'),
    );
  });

  it('names every invalid variable', () => {
    assert.throws(
      () => loadServerConfig({ RESEARCH_MAX_ROUNDS: '0', COMPLETION_PROVIDER: 'Gemini' }),
      (error: unknown) => error instanceof Error
        && error.message.startsWith('Invalid server configuration (')
        && error.message.includes('RESEARCH_MAX_ROUNDS:')
        && error.message.includes('COMPLETION_PROVIDER:'),
    );
  });
});
