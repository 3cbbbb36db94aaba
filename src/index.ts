export * from './conversation/index.js';
export * from './providers/index.js';
export {
  MESSAGE_ERROR_KINDS,
  MessageError,
  TemplateError,
  ValidationError,
  findCause,
  isMessageError,
  isTemplateError,
  isValidationError,
  type MessageErrorKind,
} from './errors.js';
export { loadProviderOptions } from './config.js';
export { StructuredOutput } from './services/structured-output.js';
export {
  FetchHttpClient,
  HttpStatusError,
  TransportError,
  isRetryableError,
  type FetchHttpClientOptions,
  type HttpClient,
  type HttpRequest,
  type HttpResponse,
} from './services/http-client.js';
export { retryWithFixedDelay, type RetryOptions } from './services/retry.js';
export { InvocationMetrics, type InvocationStatus } from './middleware/metrics.js';
export { logger, type Logger } from './middleware/logger.js';
export type {
  ChatCompletionsRequest,
  ChatCompletionsResponse,
  Choice,
  ResponseFormat,
  WireMessage,
} from './schemas/wire.js';
