import { z } from 'zod';
import { ValidationError } from './errors.js';
import type { ProviderOptions, ProviderType } from './providers/base.js';
import { toValidationError } from './schemas/issues.js';

const ENV_PREFIX: Readonly<Record<ProviderType, string>> = {
  openai: 'OPENAI',
  anthropic: 'ANTHROPIC',
  openrouter: 'OPENROUTER',
  ollama: 'OLLAMA',
};

const blank = (value: unknown) => (value === '' ? undefined : value);

const ProviderEnvSchema = z.object({
  API_KEY: z.preprocess(blank, z.string().optional()),
  BASE_URL: z.preprocess(blank, z.string().url().optional()),
  TIMEOUT_MS: z.preprocess(blank, z.coerce.number().int().positive().optional()),
  MAX_ATTEMPTS: z.preprocess(blank, z.coerce.number().int().min(1).optional()),
  RETRY_DELAY_MS: z.preprocess(blank, z.coerce.number().int().min(0).optional()),
});

/**
 * Read provider options from `<PREFIX>_API_KEY`, `<PREFIX>_BASE_URL`,
 * `<PREFIX>_TIMEOUT_MS`, `<PREFIX>_MAX_ATTEMPTS` and
 * `<PREFIX>_RETRY_DELAY_MS`, e.g. `OPENAI_API_KEY`. Unset and empty
 * variables are left out so the dialect defaults apply.
 *
 * @throws ValidationError naming the offending variable
 */
export function loadProviderOptions(
  type: ProviderType,
  env: NodeJS.ProcessEnv = process.env
): ProviderOptions {
  const prefix = ENV_PREFIX[type];
  const input = {
    API_KEY: env[`${prefix}_API_KEY`],
    BASE_URL: env[`${prefix}_BASE_URL`],
    TIMEOUT_MS: env[`${prefix}_TIMEOUT_MS`],
    MAX_ATTEMPTS: env[`${prefix}_MAX_ATTEMPTS`],
    RETRY_DELAY_MS: env[`${prefix}_RETRY_DELAY_MS`],
  };

  const result = ProviderEnvSchema.safeParse(input);
  if (!result.success) {
    const { field, reason, value } = toValidationError(result.error, input);
    throw new ValidationError(`${prefix}_${field}`, reason, value, { cause: result.error });
  }

  const options: ProviderOptions = {};
  const { API_KEY, BASE_URL, TIMEOUT_MS, MAX_ATTEMPTS, RETRY_DELAY_MS } = result.data;
  if (API_KEY !== undefined) options.apiKey = API_KEY;
  if (BASE_URL !== undefined) options.baseURL = BASE_URL;
  if (TIMEOUT_MS !== undefined) options.timeout = TIMEOUT_MS;
  if (MAX_ATTEMPTS !== undefined) options.maxAttempts = MAX_ATTEMPTS;
  if (RETRY_DELAY_MS !== undefined) options.maxDelay = RETRY_DELAY_MS;
  return options;
}
