import pino from 'pino';
import type { Logger } from 'pino';

/**
 * Shared logger for services, workers and cron jobs.
 * Request-scoped logging goes through Fastify's own `request.log`.
 */
export const logger: Logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  base: { service: 'number-custody' },
});

export type { Logger };

export function moduleLogger(module: string): Logger {
  return logger.child({ module });
}
