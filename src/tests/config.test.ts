/**
 * Tests for environment configuration
 */

import { describe, it, expect } from 'vitest';
import { ConfigError, DEFAULT_CONFIG, loadConfig } from '../config.js';

describe('loadConfig', () => {
  it('uses the defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it('reads every variable', () => {
    const config = loadConfig({
      PORT: '9000',
      HOST: '0.0.0.0',
      OLLAMA_HOST: 'http://gpu-box:11434/',
      REQUEST_TIMEOUT_MS: '15000',
      CHAT_TIMEOUT_MS: '60000',
      MODELS_TIMEOUT_MS: '5000',
      MAX_COMMENT_DEPTH: '200',
      CORS_ORIGINS: 'http://a.test, http://b.test,',
      NODE_ENV: 'production',
    });

    expect(config).toEqual({
      port: 9000,
      host: '0.0.0.0',
      ollamaHost: 'http://gpu-box:11434',
      requestTimeoutMs: 15000,
      chatTimeoutMs: 60000,
      modelsTimeoutMs: 5000,
      maxCommentDepth: 200,
      corsOrigins: ['http://a.test', 'http://b.test'],
      production: true,
    });
  });

  it('ignores blank values', () => {
    expect(loadConfig({ PORT: ' ', HOST: '' })).toMatchObject({ port: 8050, host: '127.0.0.1' });
  });

  it('rejects values that are not positive integers', () => {
    expect(() => loadConfig({ PORT: 'abc' })).toThrow(new ConfigError('PORT must be a positive integer (got "abc")'));
    expect(() => loadConfig({ CHAT_TIMEOUT_MS: '0' })).toThrow(ConfigError);
    expect(() => loadConfig({ MAX_COMMENT_DEPTH: '2.5' })).toThrow(ConfigError);
  });
});
