import { TemplateError, ValidationError } from '../errors.js';
import { toValidationError } from '../schemas/issues.js';
import { SerializedTemplateSchema, type SerializedMessage } from '../schemas/message.js';
import type { WireMessage } from '../schemas/wire.js';
import { Message, serialize, type Variables } from './message.js';

/**
 * An ordered conversation. The order of `messages` is the order in which
 * they are sent to the provider.
 */
export class Template {
  readonly messages: readonly Message[];

  private constructor(messages: readonly Message[]) {
    this.messages = Object.freeze([...messages]);
    Object.freeze(this);
  }

  /**
   * @example
   * const template = Template.from(
   *   Message.system('You are a helpful assistant.'),
   *   Message.user('Hello, {{name}}!'),
   * );
   */
  static from(...messages: Message[]): Template {
    return new Template(messages);
  }

  /**
   * Rebuild a template from the output of `toJSON`. Messages are checked
   * for shape only; call `validate()` for content rules.
   */
  static parse(value: unknown): Template {
    const result = SerializedTemplateSchema.safeParse(value);
    if (!result.success) {
      throw toValidationError(result.error, value, 'messages');
    }
    return new Template(result.data.map(entry => Message.parse(entry)));
  }

  get length(): number {
    return this.messages.length;
  }

  append(...messages: Message[]): Template {
    return new Template([...this.messages, ...messages]);
  }

  /**
   * Substitute the same variables into every message. Without variables
   * the template itself is returned.
   */
  invoke(variables?: Variables | null): Template {
    if (!variables || Object.keys(variables).length === 0) {
      return this;
    }
    return new Template(this.messages.map(message => message.invoke(variables)));
  }

  placeholders(): string[] {
    return [...new Set(this.messages.flatMap(message => message.placeholders()))];
  }

  validate(): ValidationError | TemplateError | null {
    if (this.messages.length === 0) {
      return new ValidationError('messages', 'template cannot be empty', []);
    }

    for (const [index, message] of this.messages.entries()) {
      const error = message.validate();
      if (error) {
        return new TemplateError(index, error);
      }
    }

    return null;
  }

  toWire(): WireMessage[] {
    return this.messages.map(message => message.toWire());
  }

  toJSON(): SerializedMessage[] {
    return this.messages.map(message => message.toJSON());
  }

  serialize(): string {
    return serialize(this);
  }
}
