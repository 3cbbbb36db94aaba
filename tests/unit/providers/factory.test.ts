import { describe, it, expect } from 'vitest';
import { ValidationError } from '../../../src/errors.js';
import {
  createAnthropic,
  createOllama,
  createOpenAI,
  createOpenRouter,
  createProvider,
  createProviderFromEnv,
  getSupportedProviders,
  isProviderType,
} from '../../../src/providers/factory.js';

describe('createProvider', () => {
  it('builds a provider for a supported type', () => {
    const provider = createProvider('openai', { apiKey: 'test-key' });
    expect(provider.name).toBe('openai');
  });

  it('rejects unsupported types', () => {
    try {
      createProvider('unsupported-tag');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({
        field: 'providerType',
        reason: 'unsupported provider type: unsupported-tag',
        value: 'unsupported-tag',
      });
    }
  });

  it('names every dialect', () => {
    expect(createOpenAI().name).toBe('openai');
    expect(createAnthropic().name).toBe('anthropic');
    expect(createOpenRouter().name).toBe('openrouter');
    expect(createOllama().name).toBe('ollama');
  });

  it('applies dialect defaults', () => {
    expect(createOllama().options).toEqual({
      baseURL: 'http://localhost:11434',
      apiKey: '',
      timeout: 10_000,
      maxAttempts: 1,
      maxDelay: 0,
      headers: {},
    });
    expect(createOpenRouter().options.baseURL).toBe('https://openrouter.ai/api/v1');
    expect(createAnthropic().dialect.defaultModel).toBe('claude-3-5-sonnet-20240620');
  });

  it('trims trailing slashes from the base URL', () => {
    expect(createOpenAI({ baseURL: 'https://proxy.test/v1/' }).options.baseURL).toBe('https://proxy.test/v1');
  });

  it('rejects out-of-range options', () => {
    expect(() => createOpenAI({ maxAttempts: 0 })).toThrow(ValidationError);
    expect(() => createOpenAI({ maxAttempts: 0 })).toThrow('Invalid maxAttempts');
    expect(() => createOpenAI({ baseURL: 'not a url' })).toThrow('Invalid baseURL');
    expect(() => createOpenAI({ timeout: -1 })).toThrow('Invalid timeout');
  });

  it('freezes resolved options', () => {
    const provider = createOpenAI({ apiKey: 'test-key', headers: { 'X-Title': 'tests' } });
    expect(Object.isFrozen(provider.options)).toBe(true);
    expect(Object.isFrozen(provider.options.headers)).toBe(true);
  });
});

describe('createProviderFromEnv', () => {
  it('reads options from the environment', () => {
    const provider = createProviderFromEnv('openrouter', {
      OPENROUTER_API_KEY: 'test-key',
      OPENROUTER_MAX_ATTEMPTS: '3',
    });

    expect(provider.options.apiKey).toBe('test-key');
    expect(provider.options.maxAttempts).toBe(3);
  });

  it('lets overrides win', () => {
    const provider = createProviderFromEnv('openai', { OPENAI_TIMEOUT_MS: '5000' }, { timeout: 2_000 });
    expect(provider.options.timeout).toBe(2_000);
  });
});

describe('supported providers', () => {
  it('lists every type', () => {
    expect(getSupportedProviders()).toEqual(['openai', 'anthropic', 'openrouter', 'ollama']);
  });

  it('guards provider types', () => {
    expect(isProviderType('ollama')).toBe(true);
    expect(isProviderType('bedrock')).toBe(false);
    expect(isProviderType(42)).toBe(false);
  });
});
