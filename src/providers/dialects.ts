import type { Dialect, ProviderType } from './base.js';

export const DIALECTS: Readonly<Record<ProviderType, Readonly<Dialect>>> = Object.freeze({
  openai: {
    type: 'openai',
    label: 'OpenAI',
    baseURL: 'https://api.openai.com/v1',
    path: '/chat/completions',
    auth: 'bearer',
    defaultModel: 'gpt-4o-mini',
    requiresApiKey: true,
  },
  // OpenAI-compatible endpoint; the native Messages API is not used.
  anthropic: {
    type: 'anthropic',
    label: 'Anthropic',
    baseURL: 'https://api.anthropic.com/v1',
    path: '/chat/completions',
    auth: 'bearer',
    defaultModel: 'claude-3-5-sonnet-20240620',
    requiresApiKey: true,
  },
  openrouter: {
    type: 'openrouter',
    label: 'OpenRouter',
    baseURL: 'https://openrouter.ai/api/v1',
    path: '/chat/completions',
    auth: 'bearer',
    defaultModel: 'gpt-4o-mini',
    requiresApiKey: true,
  },
  ollama: {
    type: 'ollama',
    label: 'Ollama',
    baseURL: 'http://localhost:11434',
    path: '/chat',
    auth: 'none',
    defaultModel: 'llama3.1:8b',
    requiresApiKey: false,
  },
});
