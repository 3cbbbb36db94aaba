import { ChatProvider } from './chat-provider.js';
import { DIALECTS } from './dialects.js';
import {
  createProvider,
  createProviderFromEnv,
  createOpenAI,
  createAnthropic,
  createOpenRouter,
  createOllama,
  getSupportedProviders,
  isProviderType,
} from './factory.js';

export {
  ChatProvider,
  DIALECTS,
  createProvider,
  createProviderFromEnv,
  createOpenAI,
  createAnthropic,
  createOpenRouter,
  createOllama,
  getSupportedProviders,
  isProviderType,
};
export { PROVIDER_TYPES } from './base.js';
export type {
  LLMProvider,
  Dialect,
  ProviderType,
  ProviderOptions,
  ResolvedProviderOptions,
  InvokeOptions,
  InvokeResult,
  StructuredOutputTarget,
} from './base.js';
