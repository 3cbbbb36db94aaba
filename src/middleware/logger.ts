import pino from 'pino';

export type { Logger } from 'pino';

/**
 * Default logger for providers built without an injected one.
 */
export const logger = pino({
  name: 'llm-conduit',
  level: process.env.LOG_LEVEL ?? 'info',
});
