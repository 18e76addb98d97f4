import type { FastifyInstance } from 'fastify';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';

export interface SwaggerOptions {
  enabled: boolean;
  isProduction: boolean;
}

/**
 * Register Swagger Documentation
 *
 * Off unless enabled in config. In production the UI only answers
 * loopback callers.
 */
export function registerSwagger(app: FastifyInstance, options: SwaggerOptions) {
  if (!options.enabled) {
    app.log.info('Swagger documentation disabled');
    return;
  }

  app.register(swagger, {
    mode: 'dynamic',
    openapi: {
      info: {
        title: 'Number Custody API',
        description: 'Company phone number lifecycle and verification campaigns',
        version: '1.0.0',
      },
      servers: [
        { url: '/', description: 'Current server' },
      ],
      tags: [
        { name: 'system', description: 'System health and monitoring' },
        { name: 'auth', description: 'Admin sessions' },
        { name: 'employees', description: 'Employee roster (authentication required)' },
        { name: 'numbers', description: 'Number lifecycle (authentication required)' },
        { name: 'verification', description: 'Verification campaigns' },
      ],
      components: {
        securitySchemes: {
          bearerAuth: { type: 'http', scheme: 'bearer', bearerFormat: 'JWT' },
        },
      },
    },
    hideUntagged: false,
  });

  app.register(swaggerUi, {
    routePrefix: '/docs',
    uiConfig: {
      docExpansion: 'list',
      deepLinking: true,
      displayRequestDuration: true,
      filter: true,
    },
    uiHooks: {
      onRequest: async (request, reply) => {
        if (options.isProduction) {
          const allowedIPs = ['127.0.0.1', '::1'];
          if (!allowedIPs.includes(request.ip)) {
            app.log.warn({ ip: request.ip }, 'Unauthorized Swagger access attempt');
            return reply.status(403).send({
              success: false,
              error: 'API documentation is not publicly accessible in production',
              code: 'FORBIDDEN',
            });
          }
        }
      },
    },
  });

  app.log.info('Swagger documentation enabled at /docs');
}
