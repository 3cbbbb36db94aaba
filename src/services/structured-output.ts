import { zodResponseFormat } from 'openai/helpers/zod';
import type { z } from 'zod';
import { ValidationError } from '../errors.js';
import type { ResponseFormat } from '../schemas/wire.js';

/**
 * Constrains a response to the shape of a zod schema and receives the
 * parsed result.
 *
 * The JSON Schema is derived once, here; a schema that cannot be derived
 * (or whose root is not an object) throws instead of producing an
 * unconstrained request.
 *
 * @example
 * const weather = new StructuredOutput(z.object({ temperature: z.number(), condition: z.string() }), 'weather');
 * await provider.invoke(template, { structuredOutput: weather });
 * weather.value; // { temperature: 21.5, condition: 'clear' }
 */
export class StructuredOutput<T> {
  readonly name: string;
  readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  readonly responseFormat: ResponseFormat;
  private _value: T | undefined;
  private _hasValue = false;

  constructor(schema: z.ZodType<T, z.ZodTypeDef, unknown>, name = 'schema') {
    this.schema = schema;
    this.name = name;
    this.responseFormat = deriveResponseFormat(schema, name);
  }

  get jsonSchema(): Record<string, unknown> {
    return this.responseFormat.json_schema.schema;
  }

  get value(): T | undefined {
    return this._value;
  }

  get hasValue(): boolean {
    return this._hasValue;
  }

  /**
   * Parse `content` as JSON, check it against the schema and store it as
   * `value`. Throws SyntaxError or ZodError; `value` is untouched then.
   */
  resolve(content: string): T {
    const parsed: unknown = JSON.parse(content);
    const value = this.schema.parse(parsed);
    this._value = value;
    this._hasValue = true;
    return value;
  }
}

function deriveResponseFormat(schema: z.ZodType, name: string): ResponseFormat {
  let schemaJson: Record<string, unknown> | undefined;
  try {
    schemaJson = zodResponseFormat(schema, name).json_schema.schema;
  } catch (error) {
    throw new ValidationError('structuredOutput', 'failed to derive JSON schema', name, { cause: error });
  }

  if (!schemaJson || schemaJson.type !== 'object') {
    throw new ValidationError('structuredOutput', 'schema root must be an object', schemaJson?.type);
  }

  return {
    type: 'json_schema',
    json_schema: { name, strict: true, schema: schemaJson },
  };
}
