import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';

const SENSITIVE_PREFIXES = ['/api/v1/admin', '/api/v1/mobilenumbers', '/api/v1/employees', '/api/v1/verification/admin'];

const SUSPICIOUS_PATTERNS = [
  /(\.\.|\/etc\/|\/proc\/|\/sys\/)/i, // Path traversal
  /(union.*select|javascript:|onerror=)/i,
  /(<script|<iframe|<object)/i,
];

/**
 * Security Plugin
 *
 * Request correlation header, audit logging of admin traffic and rejection
 * of obviously hostile URLs. Response headers come from helmet.
 */
export function registerSecurity(app: FastifyInstance, options: { isProduction: boolean }) {
  app.addHook('onRequest', async (req: FastifyRequest, reply: FastifyReply) => {
    reply.header('X-Request-Id', req.id);
  });

  app.addHook('onRequest', async (req: FastifyRequest) => {
    const isSensitive = SENSITIVE_PREFIXES.some((prefix) => req.url.startsWith(prefix));
    if (isSensitive || options.isProduction) {
      // Never the body: submissions carry comments and tokens
      req.log.info({
        method: req.method,
        url: req.url,
        ip: req.ip,
        userAgent: req.headers['user-agent'],
      }, 'Security: Incoming request');
    }
  });

  app.addHook('onRequest', async (req: FastifyRequest, reply: FastifyReply) => {
    const urlAndQuery = req.url + JSON.stringify(req.query ?? {});

    for (const pattern of SUSPICIOUS_PATTERNS) {
      if (pattern.test(urlAndQuery)) {
        req.log.warn({
          ip: req.ip,
          url: req.url,
          pattern: pattern.source,
        }, 'SECURITY ALERT: Suspicious request pattern detected');

        return reply.status(400).send({
          success: false,
          error: 'Invalid request format',
          code: 'BAD_REQUEST',
        });
      }
    }
  });
}
