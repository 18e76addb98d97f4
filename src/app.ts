import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import underPressure from '@fastify/under-pressure';
import type { Database } from './db';
import { verifyDb } from './db';
import type { AppConfig } from './config/env';
import type { AppServices } from './app-context';
import { createRequireAdminAuth } from './config/auth';
import { registerSwagger } from './plugins/swagger';
import { registerSecurity } from './plugins/security';
import { createGlobalErrorHandler } from './utils/global-error-handler';
import { registerAuthRoutes } from './modules/auth/auth.routes';
import { registerEmployeeRoutes } from './modules/employees/employee.routes';
import { registerNumberRoutes } from './modules/numbers/number.routes';
import { registerVerificationRoutes } from './modules/verification/verification.routes';

export interface BuildAppOptions {
  db: Database;
  config: AppConfig;
  /** Event-loop and heap guard; the test suite turns it off. */
  underPressure?: boolean;
}

export function buildApp(services: AppServices, options: BuildAppOptions): FastifyInstance {
  const { db, config } = options;

  const app = Fastify({
    logger: { level: config.logLevel },
  });

  // Core plugins
  app.register(cors, {
    origin: config.isProduction ? config.frontendBaseUrl : true,
  });
  app.register(helmet, {
    // Swagger UI needs inline scripts and styles
    contentSecurityPolicy: config.enableSwagger ? false : undefined,
  });
  if (options.underPressure ?? true) {
    app.register(underPressure, {
      maxEventLoopDelay: 1000,
      maxHeapUsedBytes: 512 * 1024 * 1024,
      exposeStatusRoute: false,
    });
  }

  // Docs & security
  registerSwagger(app, { enabled: config.enableSwagger, isProduction: config.isProduction });
  registerSecurity(app, { isProduction: config.isProduction });

  app.decorateRequest('adminUser', null);
  const requireAdminAuth = createRequireAdminAuth(services.auth);

  // Routes (prefix global /api/v1)
  app.register(async (api: FastifyInstance) => {
    await registerAuthRoutes(api, services.auth, requireAdminAuth);
    await registerEmployeeRoutes(api, services.employees, requireAdminAuth);
    await registerNumberRoutes(api, {
      lifecycle: services.numberLifecycle,
      queries: services.numberQueries,
    }, requireAdminAuth);
    await registerVerificationRoutes(api, {
      batches: services.verificationBatches,
      submissions: services.verificationSubmissions,
      admin: services.verificationAdmin,
    }, requireAdminAuth);
  }, { prefix: '/api/v1' });

  app.get('/health', {
    schema: {
      tags: ['system'],
      summary: 'Service health',
      response: {
        200: {
          type: 'object',
          properties: { status: { type: 'string' } },
        },
      },
    },
  }, async () => ({ status: 'ok' }));

  app.get('/health/db', {
    schema: {
      tags: ['system'],
      summary: 'Database health',
      response: {
        200: {
          type: 'object',
          properties: { connected: { type: 'boolean' } },
        },
      },
    },
  }, async () => ({ connected: await verifyDb(db) }));

  app.setErrorHandler(createGlobalErrorHandler(db, config.isProduction));

  return app;
}
