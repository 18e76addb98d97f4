import type { FastifyInstance, preHandlerAsyncHookHandler } from 'fastify';
import { EMPLOYMENT_STATUSES } from '../../db/schema';
import type { EmployeeService } from './employee.service';
import type { CreateEmployeeInput, UpdateEmployeeInput } from './employee.types';

interface EmployeeParams {
  employeeId: string;
}

const nullableString = { type: ['string', 'null'] };

export async function registerEmployeeRoutes(
  fastify: FastifyInstance,
  employees: EmployeeService,
  requireAdminAuth: preHandlerAsyncHookHandler,
) {
  fastify.post<{ Body: CreateEmployeeInput }>('/employees', {
    preHandler: requireAdminAuth,
    schema: {
      tags: ['employees'],
      summary: 'Create an employee with the next EMP id',
      security: [{ bearerAuth: [] }],
      body: {
        type: 'object',
        required: ['fullName'],
        properties: {
          fullName: { type: 'string', minLength: 1 },
          departmentName: nullableString,
          email: nullableString,
          phoneNumber: nullableString,
          hireDate: nullableString,
        },
      },
    },
  }, async (request, reply) => {
    const employee = await employees.createEmployee(request.body);
    return reply.status(201).send({ success: true, employee });
  });

  fastify.get<{ Params: EmployeeParams }>('/employees/:employeeId', {
    preHandler: requireAdminAuth,
    schema: {
      tags: ['employees'],
      summary: 'Employee record',
      security: [{ bearerAuth: [] }],
    },
  }, async (request) => {
    const employee = await employees.getEmployee(request.params.employeeId);
    return { success: true, employee };
  });

  /**
   * POST /employees/:employeeId/update
   * A move to Departed flags the employee's applied numbers as risk_pending
   */
  fastify.post<{ Params: EmployeeParams; Body: UpdateEmployeeInput }>('/employees/:employeeId/update', {
    preHandler: requireAdminAuth,
    schema: {
      tags: ['employees'],
      summary: 'Update an employee',
      security: [{ bearerAuth: [] }],
      body: {
        type: 'object',
        properties: {
          fullName: { type: 'string', minLength: 1 },
          departmentName: nullableString,
          email: nullableString,
          employmentStatus: { type: 'string', enum: [...EMPLOYMENT_STATUSES] },
          hireDate: nullableString,
          terminationDate: nullableString,
        },
      },
    },
  }, async (request) => {
    const employee = await employees.updateEmployee(request.params.employeeId, request.body);
    return { success: true, employee };
  });
}
