import type { FastifyInstance, preHandlerAsyncHookHandler } from 'fastify';
import { requirePrincipal } from '../../config/auth';
import type { AuthService } from './auth.service';

interface LoginBody {
  username: string;
  password: string;
}

export async function registerAuthRoutes(
  fastify: FastifyInstance,
  auth: AuthService,
  requireAdminAuth: preHandlerAsyncHookHandler,
) {
  /**
   * POST /auth/login
   * Exchange admin credentials for a bearer token
   */
  fastify.post<{ Body: LoginBody }>('/auth/login', {
    schema: {
      tags: ['auth'],
      summary: 'Admin login',
      body: {
        type: 'object',
        required: ['username', 'password'],
        properties: {
          username: { type: 'string', minLength: 1 },
          password: { type: 'string', minLength: 1 },
        },
      },
    },
  }, async (request) => {
    const result = await auth.login(request.body.username, request.body.password);
    return { success: true, ...result };
  });

  /**
   * POST /auth/logout
   * Revoke the presented token until it would have expired anyway
   */
  fastify.post('/auth/logout', {
    preHandler: requireAdminAuth,
    schema: {
      tags: ['auth'],
      summary: 'Admin logout',
      security: [{ bearerAuth: [] }],
    },
  }, async (request) => {
    await auth.logout(requirePrincipal(request));
    return { success: true };
  });
}
