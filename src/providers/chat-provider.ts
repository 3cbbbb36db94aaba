import { Message } from '../conversation/message.js';
import type { Template } from '../conversation/template.js';
import { MessageError, ValidationError } from '../errors.js';
import { logger as defaultLogger, type Logger } from '../middleware/logger.js';
import type { InvocationMetrics, InvocationStatus } from '../middleware/metrics.js';
import { toValidationError } from '../schemas/issues.js';
import { InvokeSettingsSchema, ProviderSettingsSchema, type InvokeSettings } from '../schemas/options.js';
import {
  ChatCompletionsResponseSchema,
  type ChatCompletionsRequest,
  type ChatCompletionsResponse,
} from '../schemas/wire.js';
import {
  FetchHttpClient,
  HttpStatusError,
  isRetryableError,
  isSuccessStatus,
  type HttpClient,
  type HttpResponse,
} from '../services/http-client.js';
import { retryWithFixedDelay } from '../services/retry.js';
import {
  DEFAULT_MAX_TOKENS,
  DEFAULT_TEMPERATURE,
  DEFAULT_TIMEOUT,
  type Dialect,
  type InvokeOptions,
  type InvokeResult,
  type LLMProvider,
  type ProviderOptions,
  type ResolvedProviderOptions,
  type StructuredOutputTarget,
} from './base.js';

/**
 * Provider for any backend that speaks the chat-completions shape. The
 * dialect supplies the base URL, path, auth scheme and default model.
 *
 * Instances keep no per-call state and can serve concurrent invocations.
 */
export class ChatProvider implements LLMProvider {
  readonly name: string;
  readonly dialect: Readonly<Dialect>;
  readonly options: ResolvedProviderOptions;
  private readonly http: HttpClient;
  private readonly logger: Logger;
  private readonly metrics?: InvocationMetrics;

  /**
   * @throws ValidationError when an option is out of range
   */
  constructor(dialect: Readonly<Dialect>, options: ProviderOptions = {}) {
    this.dialect = dialect;
    this.name = dialect.type;
    this.options = resolveOptions(dialect, options);
    this.http = options.httpClient ?? new FetchHttpClient({ fetch: options.fetch, timeout: this.options.timeout });
    this.logger = (options.logger ?? defaultLogger).child({ provider: this.name });
    this.metrics = options.metrics;
  }

  /**
   * Send the template and return the assistant's answer.
   *
   * Rejects with a MessageError for pipeline failures, a ValidationError
   * for missing credentials or bad options, and with `signal.reason` when
   * the call is aborted.
   */
  async invoke(template: Template, options: InvokeOptions = {}): Promise<Message> {
    const startTime = Date.now();
    const model = options.model ?? this.dialect.defaultModel;

    try {
      const message = await this.run(template, options);
      this.metrics?.trackInvocation(this.name, model, 'success', (Date.now() - startTime) / 1000);
      this.metrics?.trackTokens(this.name, model, message.usage.promptTokens, message.usage.completionTokens);
      return message;
    } catch (error) {
      const status = statusOf(error, options.signal);
      this.metrics?.trackInvocation(this.name, model, status, (Date.now() - startTime) / 1000);
      if (status !== 'aborted') {
        this.logger.warn({ model, status, error: errorMessage(error) }, 'Provider invocation failed');
      }
      throw error;
    }
  }

  /**
   * Like `invoke`, but resolves with the outcome instead of rejecting.
   */
  async safeInvoke(template: Template, options?: InvokeOptions): Promise<InvokeResult> {
    try {
      return { success: true, data: await this.invoke(template, options) };
    } catch (error) {
      return { success: false, error: error instanceof Error ? error : new Error(String(error)) };
    }
  }

  private async run(template: Template, options: InvokeOptions): Promise<Message> {
    const templateError = template.validate();
    if (templateError) {
      throw new MessageError('template_validation', 'invalid template provided', templateError);
    }

    if (this.dialect.requiresApiKey && !this.options.apiKey) {
      throw new ValidationError('apiKey', `${this.dialect.label} API key is required`, '');
    }

    const settings = this.resolveSettings(options);
    const { structuredOutput, signal } = options;
    const { maxAttempts, maxDelay } = this.options;

    this.logger.debug({
      model: settings.model,
      messageCount: template.length,
      structured: structuredOutput !== undefined,
    }, 'Invoking provider');

    let response: HttpResponse;
    try {
      response = await retryWithFixedDelay(
        () => this.send(this.buildRequest(template, settings, structuredOutput), signal),
        {
          maxAttempts,
          delay: maxDelay,
          signal,
          shouldRetry: isRetryableError,
          onRetry: (error, attempt) => {
            this.logger.warn({ attempt, maxAttempts, error: errorMessage(error) }, 'Provider request failed, retrying');
          },
        }
      );
    } catch (error) {
      if (signal?.aborted) throw error;
      throw new MessageError('http_request', 'failed to send request', error);
    }

    const result = this.decode(response.body);
    if (result.choices.length === 0) {
      throw new MessageError('no_choices', 'no choices in response');
    }

    const [choice] = result.choices;
    const content = choice.message.content;

    if (structuredOutput) {
      try {
        structuredOutput.resolve(content);
      } catch (error) {
        throw new MessageError('json_unmarshal', 'failed to unmarshal structured output', error);
      }
    }

    this.logger.debug({
      model: settings.model,
      responseId: result.id,
      finishReason: choice.finish_reason,
      tokens: result.usage.total_tokens,
    }, 'Provider invocation succeeded');

    return Message.assistant(content, {
      promptTokens: result.usage.prompt_tokens,
      completionTokens: result.usage.completion_tokens,
      totalTokens: result.usage.total_tokens,
    });
  }

  private resolveSettings(options: InvokeOptions): InvokeSettings {
    const input = {
      model: options.model ?? this.dialect.defaultModel,
      temperature: options.temperature ?? DEFAULT_TEMPERATURE,
      maxTokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
    };
    const result = InvokeSettingsSchema.safeParse(input);
    if (!result.success) {
      throw toValidationError(result.error, input);
    }
    return result.data;
  }

  private buildRequest(
    template: Template,
    settings: InvokeSettings,
    structuredOutput?: StructuredOutputTarget
  ): ChatCompletionsRequest {
    return {
      model: settings.model,
      messages: template.toWire(),
      temperature: settings.temperature,
      max_tokens: settings.maxTokens,
      response_format: structuredOutput?.responseFormat,
    };
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      'Accept': 'application/json',
      ...this.options.headers,
    };

    if (this.dialect.auth === 'bearer' && this.options.apiKey) {
      headers['Authorization'] = `Bearer ${this.options.apiKey}`;
    }

    return headers;
  }

  private async send(body: ChatCompletionsRequest, signal?: AbortSignal): Promise<HttpResponse> {
    try {
      const response = await this.http.request({
        method: 'POST',
        url: `${this.options.baseURL}${this.dialect.path}`,
        headers: this.headers(),
        body,
        timeout: this.options.timeout,
        signal,
      });

      if (!isSuccessStatus(response.status)) {
        throw new HttpStatusError(response.status, response.body);
      }

      this.metrics?.trackAttempt(this.name, 'success');
      return response;
    } catch (error) {
      this.metrics?.trackAttempt(this.name, 'failure');
      throw error;
    }
  }

  private decode(body: string): ChatCompletionsResponse {
    let json: unknown;
    try {
      json = JSON.parse(body);
    } catch (error) {
      throw new MessageError('response_decode', 'failed to decode response', error);
    }

    const result = ChatCompletionsResponseSchema.safeParse(json);
    if (!result.success) {
      throw new MessageError('response_decode', 'failed to decode response', toValidationError(result.error, json, 'response'));
    }
    return result.data;
  }
}

function resolveOptions(dialect: Readonly<Dialect>, options: ProviderOptions): ResolvedProviderOptions {
  const input = {
    baseURL: (options.baseURL ?? dialect.baseURL).replace(/\/+$/, ''),
    apiKey: options.apiKey ?? '',
    timeout: options.timeout ?? DEFAULT_TIMEOUT,
    maxAttempts: options.maxAttempts ?? 1,
    maxDelay: options.maxDelay ?? 0,
    headers: { ...options.headers },
  };

  const result = ProviderSettingsSchema.safeParse(input);
  if (!result.success) {
    throw toValidationError(result.error, input);
  }

  return Object.freeze({ ...result.data, headers: Object.freeze(result.data.headers) });
}

function statusOf(error: unknown, signal?: AbortSignal): InvocationStatus {
  if (signal?.aborted) return 'aborted';
  if (error instanceof MessageError) return error.kind;
  return 'validation';
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
