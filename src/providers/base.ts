import type { Message } from '../conversation/message.js';
import type { Template } from '../conversation/template.js';
import type { Logger } from '../middleware/logger.js';
import type { InvocationMetrics } from '../middleware/metrics.js';
import type { ResponseFormat } from '../schemas/wire.js';
import type { HttpClient } from '../services/http-client.js';

export const PROVIDER_TYPES = ['openai', 'anthropic', 'openrouter', 'ollama'] as const;

export type ProviderType = (typeof PROVIDER_TYPES)[number];

/**
 * What distinguishes one backend from another. Everything else is the
 * shared pipeline in ChatProvider.
 */
export interface Dialect {
  type: ProviderType;
  /** Human-readable name used in error messages. */
  label: string;
  baseURL: string;
  path: string;
  auth: 'bearer' | 'none';
  defaultModel: string;
  requiresApiKey: boolean;
}

export interface ProviderOptions {
  baseURL?: string;
  apiKey?: string;
  /** Per-attempt timeout in milliseconds (default: 10000) */
  timeout?: number;
  /** Attempts per invocation, 1 meaning no retry (default: 1) */
  maxAttempts?: number;
  /** Delay between attempts in milliseconds (default: 0) */
  maxDelay?: number;
  /** Extra headers sent with every request */
  headers?: Record<string, string>;
  /** Transport; a FetchHttpClient by default */
  httpClient?: HttpClient;
  /** fetch used by the default FetchHttpClient */
  fetch?: typeof globalThis.fetch;
  logger?: Logger;
  metrics?: InvocationMetrics;
}

export interface ResolvedProviderOptions {
  readonly baseURL: string;
  readonly apiKey: string;
  readonly timeout: number;
  readonly maxAttempts: number;
  readonly maxDelay: number;
  readonly headers: Readonly<Record<string, string>>;
}

/**
 * The receiving end of a structured-output request. StructuredOutput is
 * the implementation shipped with the package.
 */
export interface StructuredOutputTarget {
  readonly responseFormat: ResponseFormat;
  /** Parse and store the response content; throws when it does not fit. */
  resolve(content: string): unknown;
}

export interface InvokeOptions {
  model?: string;
  temperature?: number;
  maxTokens?: number;
  structuredOutput?: StructuredOutputTarget;
  signal?: AbortSignal;
}

export type InvokeResult =
  | { success: true; data: Message }
  | { success: false; error: Error };

export interface LLMProvider {
  readonly name: string;
  invoke(template: Template, options?: InvokeOptions): Promise<Message>;
}

export const DEFAULT_TIMEOUT = 10_000;
export const DEFAULT_TEMPERATURE = 0.7;
export const DEFAULT_MAX_TOKENS = 1000;
