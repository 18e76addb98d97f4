/**
 * VERIFICATION CAMPAIGN ROUTES
 *
 * Admin: start a campaign, poll a batch, read the campaign view, close
 * reported issues.
 * Public: the token-gated employee page (info + submit).
 */

import type { FastifyInstance, FastifyReply, preHandlerAsyncHookHandler } from 'fastify';
import { InvalidVerificationLinkError } from '../../utils/errors';
import type { VerificationAdminService } from './admin-status.service';
import type { VerificationBatchService } from './batch.service';
import type { VerificationSubmissionService } from './submission.service';
import type {
  AdminStatusFilters,
  InitiateVerificationInput,
  ResolveIssueInput,
  SubmitVerificationInput,
} from './verification.types';

interface TokenQuery {
  token: string;
}

const tokenQuerystring = {
  type: 'object',
  required: ['token'],
  properties: { token: { type: 'string' } },
};

const nullableString = { type: ['string', 'null'] };

export interface VerificationRouteServices {
  batches: VerificationBatchService;
  submissions: VerificationSubmissionService;
  admin: VerificationAdminService;
}

/**
 * Unknown, expired and already-closed links all look the same to the
 * caller; the distinction is only logged.
 */
async function withLinkGuard<T>(reply: FastifyReply, work: () => Promise<T>): Promise<T | FastifyReply> {
  try {
    return await work();
  } catch (error) {
    if (error instanceof InvalidVerificationLinkError) {
      reply.log.info({ code: error.code }, 'verification link rejected');
      return reply.status(403).send({
        success: false,
        error: 'This verification link is invalid or has expired',
        code: 'INVALID_LINK',
      });
    }
    throw error;
  }
}

export async function registerVerificationRoutes(
  fastify: FastifyInstance,
  { batches, submissions, admin }: VerificationRouteServices,
  requireAdminAuth: preHandlerAsyncHookHandler,
) {
  const adminDocs = (summary: string) => ({ tags: ['verification'], summary, security: [{ bearerAuth: [] }] });

  /**
   * POST /verification/initiate
   * Returns as soon as the batch is queued; poll /verification/batch/:batchId
   */
  fastify.post<{ Body: InitiateVerificationInput }>('/verification/initiate', {
    preHandler: requireAdminAuth,
    schema: {
      ...adminDocs('Start a verification campaign'),
      body: {
        type: 'object',
        required: ['scope'],
        properties: {
          scope: { type: 'string' },
          scopeValues: { type: 'array', items: { type: 'string' } },
          durationDays: { type: 'integer' },
        },
      },
    },
  }, async (request, reply) => {
    const batch = await batches.initiateVerification(request.body);
    return reply.status(202).send({
      success: true,
      message: 'Verification batch accepted for processing',
      ...batch,
    });
  });

  fastify.get<{ Params: { batchId: string } }>('/verification/batch/:batchId', {
    preHandler: requireAdminAuth,
    schema: adminDocs('Batch progress and counters'),
  }, async (request) => {
    const batch = await batches.getBatchStatus(request.params.batchId);
    return { success: true, batch };
  });

  fastify.get<{ Querystring: TokenQuery }>('/verification/info', {
    schema: {
      tags: ['verification'],
      summary: 'Numbers to verify for the link holder',
      querystring: tokenQuerystring,
    },
  }, async (request, reply) => withLinkGuard(reply, async () => {
    const info = await submissions.getInfo(request.query.token);
    return { success: true, ...info };
  }));

  fastify.post<{ Querystring: TokenQuery; Body: SubmitVerificationInput }>('/verification/submit', {
    schema: {
      tags: ['verification'],
      summary: 'Confirm or report numbers, declare unlisted ones',
      querystring: tokenQuerystring,
      body: {
        type: 'object',
        properties: {
          verifiedNumbers: {
            type: 'array',
            items: {
              type: 'object',
              required: ['mobileNumberId', 'action'],
              properties: {
                mobileNumberId: { type: 'integer' },
                action: { type: 'string', enum: ['confirm_usage', 'report_issue'] },
                purpose: nullableString,
                userComment: nullableString,
              },
            },
          },
          unlistedNumbers: {
            type: 'array',
            items: {
              type: 'object',
              required: ['phoneNumber', 'purpose'],
              properties: {
                phoneNumber: { type: 'string' },
                purpose: { type: 'string' },
                userComment: nullableString,
              },
            },
          },
        },
      },
    },
  }, async (request, reply) => withLinkGuard(reply, async () => {
    const result = await submissions.submit(request.query.token, request.body);
    return { success: true, message: 'Verification recorded', ...result };
  }));

  fastify.get<{ Querystring: AdminStatusFilters }>('/verification/admin/status', {
    preHandler: requireAdminAuth,
    schema: {
      ...adminDocs('Campaign-wide verification view'),
      querystring: {
        type: 'object',
        properties: {
          employeeId: { type: 'string' },
          departmentName: { type: 'string' },
        },
      },
    },
  }, async (request) => {
    const view = await admin.getStatus(request.query);
    return { success: true, ...view };
  });

  fastify.post<{ Params: { issueId: number }; Body: ResolveIssueInput }>('/verification/admin/issues/:issueId/resolve', {
    preHandler: requireAdminAuth,
    schema: {
      ...adminDocs('Close a reported issue'),
      params: {
        type: 'object',
        required: ['issueId'],
        properties: { issueId: { type: 'integer' } },
      },
      body: {
        type: 'object',
        required: ['status'],
        properties: {
          status: { type: 'string', enum: ['resolved', 'dismissed'] },
          remarks: nullableString,
        },
      },
    },
  }, async (request) => {
    const issue = await admin.resolveIssue(request.params.issueId, request.body);
    return { success: true, issue };
  });
}
