import type { ZodError } from 'zod';
import { ValidationError } from '../errors.js';

/**
 * Report the first issue of a failed parse as a ValidationError. The
 * field is the issue path (`messages[0].role`), optionally under `prefix`.
 */
export function toValidationError(error: ZodError, input: unknown, prefix?: string): ValidationError {
  const issue = error.issues[0];
  if (!issue) {
    return new ValidationError(prefix ?? 'value', 'invalid value', input, { cause: error });
  }

  const field = issue.path.reduce<string>(
    (acc, key) => (typeof key === 'number' ? `${acc}[${key}]` : acc ? `${acc}.${key}` : key),
    prefix ?? '',
  );

  return new ValidationError(field || 'value', issue.message, valueAt(input, issue.path), { cause: error });
}

function valueAt(input: unknown, path: ReadonlyArray<string | number>): unknown {
  let current = input;
  for (const key of path) {
    if (typeof current !== 'object' || current === null) return undefined;
    current = Reflect.get(current, key);
  }
  return current;
}
