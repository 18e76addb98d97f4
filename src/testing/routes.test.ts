import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, it } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildApp } from '../app';
import { createServices } from '../app-context';
import type { AppServices } from '../app-context';
import { createTestDatabase, FakeMailer, testConfig } from './test-db';
import type { TestDatabase } from './test-db';

describe('http api', () => {
  let testDb: TestDatabase;
  let services: AppServices;
  let app: FastifyInstance;

  beforeAll(async () => {
    testDb = await createTestDatabase();
  });

  afterAll(async () => {
    await testDb.close();
  });

  beforeEach(async () => {
    await testDb.reset();
    const config = testConfig();
    services = createServices(testDb.db, { config, mailer: new FakeMailer() });
    app = buildApp(services, { db: testDb.db, config, underPressure: false });
    await app.ready();
    await services.auth.createUser({ username: 'operator', password: 'test-password' });
  });

  afterEach(async () => {
    await services.batchWorker.onIdle();
    await app.close();
  });

  async function login(): Promise<string> {
    const response = await app.inject({
      method: 'POST',
      url: '/api/v1/auth/login',
      payload: { username: 'operator', password: 'test-password' },
    });
    expect(response.statusCode).toBe(200);
    const body: { token: string } = response.json();
    return body.token;
  }

  it('answers the health checks', async () => {
    const health = await app.inject({ method: 'GET', url: '/health' });
    expect(health.json()).toEqual({ status: 'ok' });
    expect(health.headers['x-request-id']).toBeDefined();

    const db = await app.inject({ method: 'GET', url: '/health/db' });
    expect(db.json()).toEqual({ connected: true });
  });

  it('requires a valid bearer token on admin routes', async () => {
    const missing = await app.inject({ method: 'GET', url: '/api/v1/mobilenumbers' });
    expect(missing.statusCode).toBe(401);
    expect(missing.json()).toEqual({ success: false, error: 'Authentication required', code: 'UNAUTHORIZED' });

    const garbage = await app.inject({
      method: 'GET',
      url: '/api/v1/mobilenumbers',
      headers: { authorization: 'Bearer not-a-jwt' },
    });
    expect(garbage.statusCode).toBe(401);
    expect(garbage.json()).toEqual({ success: false, error: 'Invalid session token', code: 'INVALID_SESSION' });
  });

  it('maps a failed login to 401', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/api/v1/auth/login',
      payload: { username: 'operator', password: 'wrong' },
    });
    expect(response.statusCode).toBe(401);
    expect(response.json()).toEqual({ success: false, error: 'Invalid username or password', code: 'INVALID_CREDENTIALS' });
  });

  it('rejects the token after logout', async () => {
    const token = await login();
    const headers = { authorization: `Bearer ${token}` };

    const logout = await app.inject({ method: 'POST', url: '/api/v1/auth/logout', headers });
    expect(logout.json()).toEqual({ success: true });

    const after = await app.inject({ method: 'GET', url: '/api/v1/mobilenumbers', headers });
    expect(after.statusCode).toBe(401);
    expect(after.json()).toMatchObject({ code: 'SESSION_REVOKED' });
  });

  it('registers numbers and maps domain errors to statuses', async () => {
    const headers = { authorization: `Bearer ${await login()}` };

    const employee = await app.inject({
      method: 'POST',
      url: '/api/v1/employees',
      headers,
      payload: { fullName: 'Ana Field', departmentName: 'Sales', email: 'ana@example.com' },
    });
    expect(employee.statusCode).toBe(201);
    expect(employee.json()).toMatchObject({ success: true, employee: { employeeId: 'EMP0000001' } });

    const payload = { phoneNumber: '13800000001', applicantEmployeeId: 'EMP0000001', applicationDate: '2025-01-05' };
    const created = await app.inject({ method: 'POST', url: '/api/v1/mobilenumbers', headers, payload });
    expect(created.statusCode).toBe(201);
    expect(created.json()).toMatchObject({ success: true, number: { phoneNumber: '13800000001' } });

    const duplicate = await app.inject({ method: 'POST', url: '/api/v1/mobilenumbers', headers, payload });
    expect(duplicate.statusCode).toBe(409);
    expect(duplicate.json()).toMatchObject({ success: false, code: 'NUMBER_EXISTS' });

    const invalid = await app.inject({
      method: 'POST',
      url: '/api/v1/mobilenumbers',
      headers,
      payload: { phoneNumber: '13800000002' },
    });
    expect(invalid.statusCode).toBe(400);
    expect(invalid.json()).toMatchObject({ success: false, code: 'VALIDATION_ERROR' });

    const missing = await app.inject({ method: 'GET', url: '/api/v1/mobilenumbers/13899999999', headers });
    expect(missing.statusCode).toBe(404);
  });

  it('refuses risk handling from an account with no linked employee', async () => {
    const headers = { authorization: `Bearer ${await login()}` };

    const response = await app.inject({
      method: 'POST',
      url: '/api/v1/mobilenumbers/13800000001/handle-risk',
      headers,
      payload: { action: 'reclaim' },
    });
    expect(response.statusCode).toBe(412);
    expect(response.json()).toMatchObject({ success: false, code: 'OPERATOR_NOT_LINKED' });
  });

  it('accepts a campaign for background processing', async () => {
    const headers = { authorization: `Bearer ${await login()}` };
    await services.employees.createEmployee({ fullName: 'Ana Field', departmentName: 'Sales', email: 'ana@example.com' });

    const accepted = await app.inject({
      method: 'POST',
      url: '/api/v1/verification/initiate',
      headers,
      payload: { scope: 'department', scopeValues: ['Sales'] },
    });
    expect(accepted.statusCode).toBe(202);
    const body: { batchId: string; totalToProcess: number; message: string } = accepted.json();
    expect(body.totalToProcess).toBe(1);
    expect(body.message).toBe('Verification batch accepted for processing');

    await services.batchWorker.onIdle();
    const status = await app.inject({ method: 'GET', url: `/api/v1/verification/batch/${body.batchId}`, headers });
    expect(status.json()).toMatchObject({ success: true, batch: { status: 'Completed', emailsSucceeded: 1 } });

    const badScope = await app.inject({
      method: 'POST',
      url: '/api/v1/verification/initiate',
      headers,
      payload: { scope: 'everyone' },
    });
    expect(badScope.statusCode).toBe(400);
    expect(badScope.json()).toMatchObject({ code: 'INVALID_SCOPE' });
  });

  it('answers every bad verification link the same way', async () => {
    const response = await app.inject({ method: 'GET', url: '/api/v1/verification/info?token=not-a-real-token' });
    expect(response.statusCode).toBe(403);
    expect(response.json()).toEqual({
      success: false,
      error: 'This verification link is invalid or has expired',
      code: 'INVALID_LINK',
    });

    const submit = await app.inject({
      method: 'POST',
      url: '/api/v1/verification/submit?token=not-a-real-token',
      payload: {},
    });
    expect(submit.statusCode).toBe(403);
    expect(submit.json()).toMatchObject({ code: 'INVALID_LINK' });
  });

  it('blocks hostile query strings', async () => {
    const headers = { authorization: `Bearer ${await login()}` };
    const response = await app.inject({
      method: 'GET',
      url: '/api/v1/mobilenumbers',
      query: { search: '<script>alert(1)</script>' },
      headers,
    });
    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({ success: false, error: 'Invalid request format', code: 'BAD_REQUEST' });
  });
});
