import { ValidationError } from '../errors.js';
import { logger } from '../middleware/logger.js';
import { toValidationError } from '../schemas/issues.js';
import { MessageSchema, SerializedMessageSchema, type SerializedMessage } from '../schemas/message.js';
import type { WireMessage } from '../schemas/wire.js';
import type { Role } from './role.js';

export interface Usage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export type Variables = Readonly<Record<string, unknown>>;

export interface MessageInit {
  role: string;
  content: string;
  usage?: Partial<Usage>;
}

const EMPTY_USAGE: Readonly<Usage> = Object.freeze({
  promptTokens: 0,
  completionTokens: 0,
  totalTokens: 0,
});

const PLACEHOLDER = /\{\{([^{}]+)\}\}/g;

/**
 * One turn of a conversation. Messages are frozen; `invoke` and the other
 * transformations return new instances.
 */
export class Message {
  /** One of {@link Role} for any message that passes `validate()`. */
  readonly role: string;
  readonly content: string;
  readonly usage: Readonly<Usage>;

  private constructor(role: string, content: string, usage: Partial<Usage> = EMPTY_USAGE) {
    this.role = role;
    this.content = content;
    this.usage = Object.freeze({
      promptTokens: usage.promptTokens ?? 0,
      completionTokens: usage.completionTokens ?? 0,
      totalTokens: usage.totalTokens ?? 0,
    });
    Object.freeze(this);
  }

  /**
   * Sets the behaviour of the assistant. An empty `content` is accepted
   * here and reported by `validate()`.
   */
  static system(content: string): Message {
    return new Message('system' satisfies Role, content);
  }

  static user(content: string): Message {
    return new Message('user' satisfies Role, content);
  }

  /**
   * A model response. `usage` is the token accounting reported by the
   * provider; missing counters are zero.
   */
  static assistant(content: string, usage?: Partial<Usage>): Message {
    return new Message('assistant' satisfies Role, content, usage);
  }

  /** Rebuild a message from untyped data such as stored history. */
  static from(init: MessageInit): Message {
    return new Message(init.role, init.content, init.usage);
  }

  /**
   * Inverse of `toJSON`. Throws a ValidationError when `value` does not
   * have the serialized message shape.
   */
  static parse(value: unknown): Message {
    const result = SerializedMessageSchema.safeParse(value);
    if (!result.success) {
      throw toValidationError(result.error, value);
    }

    const { role, content, usage } = result.data;
    return new Message(role, content, usage && {
      promptTokens: usage.prompt_tokens,
      completionTokens: usage.completion_tokens,
      totalTokens: usage.total_tokens,
    });
  }

  validate(): ValidationError | null {
    const input = { role: this.role, content: this.content };
    const result = MessageSchema.safeParse(input);
    return result.success ? null : toValidationError(result.error, input);
  }

  isValid(): boolean {
    return this.validate() === null;
  }

  /**
   * Replace every `{{key}}` in the content with the matching variable.
   * Placeholders without a variable are left as they are.
   */
  invoke(variables?: Variables | null): Message {
    if (!variables || Object.keys(variables).length === 0) {
      return this;
    }
    return new Message(this.role, substitute(this.content, variables), this.usage);
  }

  /** Placeholder names in order of first appearance. */
  placeholders(): string[] {
    const names = new Set<string>();
    for (const match of this.content.matchAll(PLACEHOLDER)) {
      names.add(match[1]);
    }
    return [...names];
  }

  hasUsage(): boolean {
    return this.usage.promptTokens > 0 || this.usage.completionTokens > 0 || this.usage.totalTokens > 0;
  }

  toWire(): WireMessage {
    return { role: this.role, content: this.content };
  }

  toJSON(): SerializedMessage {
    if (!this.hasUsage()) {
      return this.toWire();
    }
    return {
      role: this.role,
      content: this.content,
      usage: {
        prompt_tokens: this.usage.promptTokens,
        completion_tokens: this.usage.completionTokens,
        total_tokens: this.usage.totalTokens,
      },
    };
  }

  /** JSON text of the message, or '' if it cannot be serialized. */
  serialize(): string {
    return serialize(this);
  }
}

/**
 * Plain textual substitution of `{{key}}` tokens in a single pass.
 * Replacement text is inserted literally and never expanded again.
 */
export function substitute(content: string, variables: Variables): string {
  return content.replace(PLACEHOLDER, (match, name: string) =>
    Object.hasOwn(variables, name) ? stringify(variables[name]) : match
  );
}

function stringify(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'object' && value !== null) return JSON.stringify(value);
  return String(value);
}

export function serialize(value: unknown): string {
  try {
    return JSON.stringify(value);
  } catch (error) {
    logger.warn({ error }, 'Failed to serialize conversation');
    return '';
  }
}
