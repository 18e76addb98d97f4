/**
 * NUMBER LIFECYCLE - ADMIN API ROUTES
 *
 * Registration, assignment, reclaim, metadata updates and departure-risk
 * handling for company phone numbers.
 */

import type { FastifyInstance, preHandlerAsyncHookHandler } from 'fastify';
import { requirePrincipal } from '../../config/auth';
import { NUMBER_STATUSES } from '../../db/schema';
import { PreconditionFailedError } from '../../utils/errors';
import type { NumberLifecycleService } from './number-lifecycle.service';
import type { NumberQueryService } from './number-query.service';
import { NUMBER_SORT_KEYS, RISK_ACTIONS } from './number.types';
import type {
  AssignNumberInput,
  CreateNumberInput,
  HandleRiskInput,
  ListNumbersQuery,
  UpdateNumberInput,
} from './number.types';

interface PhoneParams {
  phoneNumber: string;
}

interface UnassignBody {
  reclaimDate: string;
}

const nullableString = { type: ['string', 'null'] };

const phoneParams = {
  type: 'object',
  required: ['phoneNumber'],
  properties: { phoneNumber: { type: 'string' } },
};

const listQuerystring = {
  type: 'object',
  properties: {
    page: { type: 'integer', minimum: 1 },
    limit: { type: 'integer', minimum: 1 },
    sortBy: { type: 'string', enum: [...NUMBER_SORT_KEYS] },
    sortOrder: { type: 'string', enum: ['asc', 'desc'] },
    search: { type: 'string' },
    status: { type: 'string', enum: [...NUMBER_STATUSES] },
    applicantStatus: { type: 'string', enum: ['Active', 'Departed'] },
  },
};

export interface NumberRouteServices {
  lifecycle: NumberLifecycleService;
  queries: NumberQueryService;
}

export async function registerNumberRoutes(
  fastify: FastifyInstance,
  { lifecycle, queries }: NumberRouteServices,
  requireAdminAuth: preHandlerAsyncHookHandler,
) {
  const admin = { preHandler: requireAdminAuth };
  const docs = (summary: string) => ({ tags: ['numbers'], summary, security: [{ bearerAuth: [] }] });

  fastify.post<{ Body: CreateNumberInput }>('/mobilenumbers', {
    ...admin,
    schema: {
      ...docs('Register a number'),
      body: {
        type: 'object',
        required: ['phoneNumber', 'applicantEmployeeId', 'applicationDate'],
        properties: {
          phoneNumber: { type: 'string' },
          applicantEmployeeId: { type: 'string' },
          applicationDate: { type: 'string' },
          purpose: nullableString,
          vendor: nullableString,
          remarks: nullableString,
        },
      },
    },
  }, async (request, reply) => {
    const number = await lifecycle.createNumber(request.body);
    return reply.status(201).send({ success: true, number });
  });

  fastify.get<{ Querystring: ListNumbersQuery }>('/mobilenumbers', {
    ...admin,
    schema: { ...docs('List numbers'), querystring: listQuerystring },
  }, async (request) => {
    const page = await queries.listNumbers(request.query);
    return { success: true, ...page };
  });

  // Registered before /:phoneNumber so the static segment wins
  fastify.get<{ Querystring: Omit<ListNumbersQuery, 'status'> }>('/mobilenumbers/risk-pending', {
    ...admin,
    schema: { ...docs('Numbers awaiting departure-risk handling'), querystring: listQuerystring },
  }, async (request) => {
    const page = await queries.listRiskPendingNumbers(request.query);
    return { success: true, ...page };
  });

  fastify.get<{ Params: PhoneParams }>('/mobilenumbers/:phoneNumber', {
    ...admin,
    schema: { ...docs('Number detail with usage and applicant history'), params: phoneParams },
  }, async (request) => {
    const number = await queries.getNumberDetail(request.params.phoneNumber);
    return { success: true, number };
  });

  fastify.post<{ Params: PhoneParams; Body: UpdateNumberInput }>('/mobilenumbers/:phoneNumber/update', {
    ...admin,
    schema: {
      ...docs('Update status or metadata'),
      params: phoneParams,
      body: {
        type: 'object',
        properties: {
          status: { type: 'string', enum: [...NUMBER_STATUSES] },
          purpose: nullableString,
          vendor: nullableString,
          remarks: nullableString,
        },
      },
    },
  }, async (request) => {
    const number = await lifecycle.updateNumber(request.params.phoneNumber, request.body);
    return { success: true, number };
  });

  fastify.post<{ Params: PhoneParams; Body: AssignNumberInput }>('/mobilenumbers/:phoneNumber/assign', {
    ...admin,
    schema: {
      ...docs('Assign an idle number to an active employee'),
      params: phoneParams,
      body: {
        type: 'object',
        required: ['employeeId', 'assignmentDate'],
        properties: {
          employeeId: { type: 'string' },
          assignmentDate: { type: 'string' },
          purpose: nullableString,
        },
      },
    },
  }, async (request) => {
    const number = await lifecycle.assignNumber(request.params.phoneNumber, request.body);
    return { success: true, number };
  });

  fastify.post<{ Params: PhoneParams; Body: UnassignBody }>('/mobilenumbers/:phoneNumber/unassign', {
    ...admin,
    schema: {
      ...docs('Reclaim a number from its holder'),
      params: phoneParams,
      body: {
        type: 'object',
        required: ['reclaimDate'],
        properties: { reclaimDate: { type: 'string' } },
      },
    },
  }, async (request) => {
    const number = await lifecycle.unassignNumber(request.params.phoneNumber, request.body.reclaimDate);
    return { success: true, number };
  });

  /**
   * POST /mobilenumbers/:phoneNumber/handle-risk
   * The operator is the employee linked to the calling admin account
   */
  fastify.post<{ Params: PhoneParams; Body: HandleRiskInput }>('/mobilenumbers/:phoneNumber/handle-risk', {
    ...admin,
    schema: {
      ...docs('Resolve a risk_pending number'),
      params: phoneParams,
      body: {
        type: 'object',
        required: ['action'],
        properties: {
          action: { type: 'string', enum: [...RISK_ACTIONS] },
          newApplicantEmployeeId: { type: 'string' },
          changeDate: { type: 'string' },
          remarks: nullableString,
        },
      },
    },
  }, async (request) => {
    const principal = requirePrincipal(request);
    if (!principal.employeeId) {
      throw new PreconditionFailedError(
        `Admin account ${principal.username} is not linked to an employee`,
        'OPERATOR_NOT_LINKED',
      );
    }
    const number = await lifecycle.handleRisk(request.params.phoneNumber, request.body, principal.employeeId);
    return { success: true, number };
  });

  fastify.delete<{ Params: PhoneParams }>('/mobilenumbers/:phoneNumber', {
    ...admin,
    schema: { ...docs('Soft-delete a number'), params: phoneParams },
  }, async (request) => {
    const number = await lifecycle.softDeleteNumber(request.params.phoneNumber);
    return { success: true, number };
  });
}
