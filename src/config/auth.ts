/**
 * Authentication Configuration
 * Bearer-token guard shared by every admin route.
 */
import type { FastifyReply, FastifyRequest, preHandlerAsyncHookHandler } from 'fastify';
import type { AdminPrincipal, AuthService } from '../modules/auth/auth.service';
import { isAppError } from '../utils/errors';

declare module 'fastify' {
  interface FastifyRequest {
    adminUser: AdminPrincipal | null;
  }
}

export function extractBearerToken(request: FastifyRequest): string | null {
  const authHeader = String(request.headers['authorization'] || '');
  if (!authHeader.startsWith('Bearer ')) {
    return null;
  }
  const token = authHeader.slice(7).trim();
  return token || null;
}

/**
 * Builds the preHandler that requires a valid, non-revoked admin session
 * and exposes it as `request.adminUser`.
 */
export function createRequireAdminAuth(auth: AuthService): preHandlerAsyncHookHandler {
  return async function requireAdminAuth(request: FastifyRequest, reply: FastifyReply) {
    const token = extractBearerToken(request);
    if (!token) {
      return reply.status(401).send({ success: false, error: 'Authentication required', code: 'UNAUTHORIZED' });
    }

    try {
      request.adminUser = await auth.authenticate(token);
    } catch (error) {
      if (isAppError(error) && error.kind === 'Unauthorized') {
        request.log.warn({ url: request.url, code: error.code }, 'Rejected admin session');
        return reply.status(401).send({ success: false, error: error.message, code: error.code });
      }
      throw error;
    }
  };
}

export function requirePrincipal(request: FastifyRequest): AdminPrincipal {
  if (!request.adminUser) {
    throw new Error('Admin route reached without an authenticated principal');
  }
  return request.adminUser;
}
