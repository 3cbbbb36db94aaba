/**
 * Error taxonomy for the invocation pipeline.
 *
 * Callers branch on the class (or on `MessageError.kind`) through the
 * predicates below, never on message text.
 */

export const MESSAGE_ERROR_KINDS = [
  'template_validation',
  'http_request',
  'response_decode',
  'no_choices',
  'json_unmarshal',
] as const;

export type MessageErrorKind = (typeof MESSAGE_ERROR_KINDS)[number];

/**
 * A single field failed validation: empty content, unknown role,
 * missing API key, out-of-range option.
 */
export class ValidationError extends Error {
  public readonly field: string;
  public readonly reason: string;
  public readonly value: unknown;

  constructor(field: string, reason: string, value?: unknown, options?: { cause?: unknown }) {
    super(`Invalid ${field}: ${reason}`, options);
    this.name = 'ValidationError';
    this.field = field;
    this.reason = reason;
    this.value = value;
  }
}

/**
 * A message inside a template failed validation. `position` is the
 * `message[i]` reference, `cause` the underlying ValidationError.
 */
export class TemplateError extends Error {
  public readonly position: string;
  public readonly index: number;

  constructor(index: number, cause: ValidationError) {
    const position = `message[${index}]`;
    super(`${position}: validation failed: ${cause.message}`, { cause });
    this.name = 'TemplateError';
    this.position = position;
    this.index = index;
  }
}

/**
 * A provider invocation failed at the stage named by `kind`.
 */
export class MessageError extends Error {
  public readonly kind: MessageErrorKind;
  public readonly description: string;

  constructor(kind: MessageErrorKind, description: string, cause?: unknown) {
    const detail = cause instanceof Error ? `: ${cause.message}` : '';
    super(`[${kind}] ${description}${detail}`, cause === undefined ? undefined : { cause });
    this.name = 'MessageError';
    this.kind = kind;
    this.description = description;
  }
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

export function isTemplateError(error: unknown): error is TemplateError {
  return error instanceof TemplateError;
}

export function isMessageError(error: unknown, kind?: MessageErrorKind): error is MessageError {
  return error instanceof MessageError && (kind === undefined || error.kind === kind);
}

/**
 * Walk `error` and its `cause` chain, returning the first link that
 * satisfies the guard.
 */
export function findCause<T>(error: unknown, guard: (value: unknown) => value is T): T | undefined {
  const seen = new Set<unknown>();
  let current: unknown = error;

  while (current !== undefined && current !== null && !seen.has(current)) {
    if (guard(current)) return current;
    seen.add(current);
    current = current instanceof Error ? current.cause : undefined;
  }

  return undefined;
}
