import { loadProviderOptions } from '../config.js';
import { ValidationError } from '../errors.js';
import { PROVIDER_TYPES, type ProviderOptions, type ProviderType } from './base.js';
import { ChatProvider } from './chat-provider.js';
import { DIALECTS } from './dialects.js';

export function isProviderType(value: unknown): value is ProviderType {
  return typeof value === 'string' && (PROVIDER_TYPES as readonly string[]).includes(value);
}

export function getSupportedProviders(): ProviderType[] {
  return [...PROVIDER_TYPES];
}

/**
 * Build the provider registered under `type`.
 *
 * @throws ValidationError for an unknown type or invalid options
 */
export function createProvider(type: string, options: ProviderOptions = {}): ChatProvider {
  if (!isProviderType(type)) {
    throw new ValidationError('providerType', `unsupported provider type: ${type}`, type);
  }
  return new ChatProvider(DIALECTS[type], options);
}

/**
 * Build a provider from environment variables (see loadProviderOptions);
 * `overrides` win over the environment.
 */
export function createProviderFromEnv(
  type: ProviderType,
  env: NodeJS.ProcessEnv = process.env,
  overrides: ProviderOptions = {}
): ChatProvider {
  return createProvider(type, { ...loadProviderOptions(type, env), ...overrides });
}

export const createOpenAI = (options?: ProviderOptions) => new ChatProvider(DIALECTS.openai, options);
export const createAnthropic = (options?: ProviderOptions) => new ChatProvider(DIALECTS.anthropic, options);
export const createOpenRouter = (options?: ProviderOptions) => new ChatProvider(DIALECTS.openrouter, options);
export const createOllama = (options?: ProviderOptions) => new ChatProvider(DIALECTS.ollama, options);
