import { describe, it, expect } from 'vitest';
import { ConfigError, loadAppConfig } from '../src/config/app-config.js';

function issuesOf(env: NodeJS.ProcessEnv): string[] {
  try {
    loadAppConfig(env);
  } catch (err) {
    if (err instanceof ConfigError) return err.issues;
    throw err;
  }
  throw new Error('expected a ConfigError');
}

describe('loadAppConfig', () => {
  it('applies defaults around the OpenAI key', () => {
    expect(loadAppConfig({ OPENAI_API_KEY: 'test-key' })).toEqual({
      port: 8000,
      host: '0.0.0.0',
      provider: { provider: 'openai', apiKey: 'test-key', defaultModel: 'gpt-4o-mini' },
      agentId: 'pharmacy-assistant',
      corsOrigin: '*',
      logLevel: 'info',
    });
  });

  it('reads every override', () => {
    const config = loadAppConfig({
      PORT: '3000',
      HOST: '127.0.0.1',
      OPENAI_API_KEY: 'test-key',
      OPENAI_MODEL: 'gpt-4o',
      OPENAI_BASE_URL: 'http://localhost:11434/v1',
      AGENT_ID: 'night-shift',
      PERSONAS_DIR: '/srv/personas',
      MAX_TOOL_ROUNDS: '3',
      GATEWAY_TIMEOUT_MS: '5000',
      CORS_ORIGIN: 'http://localhost:5173',
      LOG_LEVEL: 'debug',
    });
    expect(config).toEqual({
      port: 3000,
      host: '127.0.0.1',
      provider: {
        provider: 'openai',
        apiKey: 'test-key',
        defaultModel: 'gpt-4o',
        baseURL: 'http://localhost:11434/v1',
      },
      agentId: 'night-shift',
      personasDir: '/srv/personas',
      maxToolRounds: 3,
      gatewayTimeoutMs: 5000,
      corsOrigin: 'http://localhost:5173',
      logLevel: 'debug',
    });
  });

  it('builds an Anthropic provider', () => {
    const config = loadAppConfig({ MODEL_PROVIDER: 'anthropic', ANTHROPIC_API_KEY: 'test-key' });
    expect(config.provider).toEqual({
      provider: 'anthropic',
      apiKey: 'test-key',
      defaultModel: 'claude-3-5-haiku-latest',
    });
  });

  it('requires the key of the selected provider', () => {
    expect(issuesOf({ MODEL_PROVIDER: 'anthropic', OPENAI_API_KEY: 'test-key' })).toEqual([
      'ANTHROPIC_API_KEY: ANTHROPIC_API_KEY is required when MODEL_PROVIDER=anthropic',
    ]);
  });

  it('treats a blank key as missing', () => {
    expect(issuesOf({ OPENAI_API_KEY: '   ' })).toEqual([
      'OPENAI_API_KEY: OPENAI_API_KEY is required when MODEL_PROVIDER=openai',
    ]);
  });

  it('rejects malformed numbers and unknown providers', () => {
    expect(issuesOf({ OPENAI_API_KEY: 'test-key', MAX_TOOL_ROUNDS: '0' })).toEqual([
      'MAX_TOOL_ROUNDS: Number must be greater than 0',
    ]);
    expect(issuesOf({ MODEL_PROVIDER: 'gemini' })).toEqual([
      "MODEL_PROVIDER: Invalid enum value. Expected 'openai' | 'anthropic', received 'gemini'",
    ]);
  });

  it('lists every issue in the error message', () => {
    expect(() => loadAppConfig({ MODEL_PROVIDER: 'anthropic' })).toThrow(
      'Invalid configuration:\n  - ANTHROPIC_API_KEY: ANTHROPIC_API_KEY is required when MODEL_PROVIDER=anthropic'
    );
  });
});
