import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import type { Database } from '../db';
import { systemErrors } from '../db/schema';
import { isAppError } from './errors';

type ErrorHandler = (error: FastifyError | Error, request: FastifyRequest, reply: FastifyReply) => Promise<void>;

function fastifyStatus(error: FastifyError | Error): number | undefined {
  return 'statusCode' in error && typeof error.statusCode === 'number' ? error.statusCode : undefined;
}

/**
 * Global Error Handler
 *
 * Intercepts all unhandled errors in the application.
 * 1. Domain errors map to their status with `{ success, error, code }`
 * 2. Request validation and other client errors pass through as 4xx
 * 3. Anything else is logged to system_errors and answered with a reference
 */
export function createGlobalErrorHandler(db: Database, isProduction: boolean): ErrorHandler {
  return async function globalErrorHandler(error, request, reply) {
    if (isAppError(error) && error.statusCode < 500) {
      await reply.status(error.statusCode).send({ success: false, error: error.message, code: error.code });
      return;
    }

    if ('validation' in error && error.validation) {
      await reply.status(400).send({ success: false, error: error.message, code: 'VALIDATION_ERROR' });
      return;
    }

    const status = fastifyStatus(error);
    if (status !== undefined && status >= 400 && status < 500) {
      const code = 'code' in error && typeof error.code === 'string' ? error.code : 'BAD_REQUEST';
      await reply.status(status).send({ success: false, error: error.message, code });
      return;
    }

    request.log.error({
      err: error,
      url: request.url,
      method: request.method,
      userId: request.adminUser?.userId,
    }, 'Unhandled exception details');

    const code = isAppError(error) ? error.code : 'INTERNAL_ERROR';

    try {
      const [savedError] = await db.insert(systemErrors).values({
        message: error.message || 'Unknown error',
        stack: error.stack,
        path: request.url,
        method: request.method,
        userId: request.adminUser?.userId,
        severity: isAppError(error) ? 'HIGH' : 'CRITICAL',
        metadata: {
          code,
          query: request.query,
          params: request.params,
          ip: request.ip,
        },
      }).returning({ id: systemErrors.id });

      // In production, don't leak internals
      await reply.status(500).send({
        success: false,
        error: isProduction ? 'An unexpected error occurred' : error.message,
        code,
        reference: `#${savedError.id}`,
      });
    } catch (loggingError) {
      request.log.error({ err: loggingError }, 'CRITICAL: Failed to log error to database');

      await reply.status(500).send({
        success: false,
        error: 'Service temporarily unavailable',
        code,
      });
    }
  };
}
