import { afterAll, beforeAll, beforeEach, describe, expect, it, vi } from 'vitest';
import { createServices } from '../app-context';
import type { AppServices } from '../app-context';
import { createVerificationCronJobs } from '../jobs/verification-cron-jobs';
import { createTestDatabase, FakeMailer, TestClock, testConfig } from './test-db';
import type { TestDatabase } from './test-db';

describe('verification cron jobs', () => {
  let testDb: TestDatabase;
  let clock: TestClock;
  let services: AppServices;

  beforeAll(async () => {
    testDb = await createTestDatabase();
  });

  afterAll(async () => {
    await testDb.close();
  });

  beforeEach(async () => {
    await testDb.reset();
    clock = new TestClock('2025-03-10T09:00:00.000Z');
    services = createServices(testDb.db, { config: testConfig(), mailer: new FakeMailer(), clock: clock.now });
  });

  it('expires overdue tokens on demand', async () => {
    await services.employees.createEmployee({ fullName: 'Ana Field', departmentName: 'Sales', email: 'ana@example.com' });
    await services.verificationBatches.initiateVerification({ scope: 'all_users', durationDays: 1 });
    await services.batchWorker.onIdle();

    const jobs = createVerificationCronJobs(services);
    expect(await jobs.runTokenExpiry()).toBe(0);

    clock.advanceDays(2);
    expect(await jobs.runTokenExpiry()).toBe(1);
    expect(await jobs.runTokenExpiry()).toBe(0);
  });

  it('reports zero when a run fails instead of throwing', async () => {
    vi.spyOn(services.auth, 'purgeExpiredRevocations').mockRejectedValueOnce(new Error('connection lost'));
    const jobs = createVerificationCronJobs(services);

    expect(await jobs.runRevocationPurge()).toBe(0);
  });

  it('skips a tick while the previous one is still running', async () => {
    let release: (affected: number) => void = () => undefined;
    vi.spyOn(services.verificationBatches, 'expireOverdueTokens').mockImplementationOnce(
      () => new Promise<number>((resolve) => {
        release = resolve;
      }),
    );
    const jobs = createVerificationCronJobs(services);

    const first = jobs.runTokenExpiry();
    expect(await jobs.runTokenExpiry()).toBe(0);
    release(4);
    expect(await first).toBe(4);
  });
});
