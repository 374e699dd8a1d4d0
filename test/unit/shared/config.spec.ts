import { describe, it, expect } from 'vitest';

import { buildConfig } from '../../../src/app/config';

describe('buildConfig', () => {
  it('applies defaults', () => {
    expect(buildConfig({})).toEqual({
      nodeEnv: 'development',
      databaseFile: 'llama.db',
      ollama: {
        baseUrl: 'http://localhost:11434',
        model: 'llama3.2',
        timeoutMs: 300_000,
      },
      logLevel: 'warn',
      serviceName: 'llama-users',
    });
  });

  it('coerces numbers and strips trailing slashes from the server URL', () => {
    const config = buildConfig({
      OLLAMA_URL: 'http://gpu-box:11434/',
      OLLAMA_TIMEOUT_MS: '60000',
      OLLAMA_MODEL: 'llama3.1',
    });

    expect(config.ollama).toEqual({
      baseUrl: 'http://gpu-box:11434',
      model: 'llama3.1',
      timeoutMs: 60_000,
    });
  });

  it('rejects unknown environments and log levels', () => {
    expect(() => buildConfig({ NODE_ENV: 'staging' })).toThrow();
    expect(() => buildConfig({ LOG_LEVEL: 'loud' })).toThrow();
  });
});
