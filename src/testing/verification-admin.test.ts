import { afterAll, beforeAll, beforeEach, describe, expect, it } from 'vitest';
import { eq } from 'drizzle-orm';
import { mobileNumbers, userReportedIssues, verificationTokens } from '../db/schema';
import type { MobileNumber } from '../db/schema';
import { createServices } from '../app-context';
import type { AppServices } from '../app-context';
import { createTestDatabase, FakeMailer, TestClock, testConfig } from './test-db';
import type { TestDatabase } from './test-db';

const PHONE_A = '13800000001';
const PHONE_B = '13800000002';
const PHONE_C = '13800000003';
const PHONE_D = '13800000004';
const UNLISTED = '13900000009';
const SUBMITTED_AT = new Date('2025-03-11T08:00:00.000Z');

describe('verification admin view', () => {
  let testDb: TestDatabase;
  let clock: TestClock;
  let services: AppServices;
  let numberA: MobileNumber;
  let numberB: MobileNumber;

  beforeAll(async () => {
    testDb = await createTestDatabase();
  });

  afterAll(async () => {
    await testDb.close();
  });

  async function numberByPhone(phone: string): Promise<MobileNumber> {
    const [row] = await testDb.db.select().from(mobileNumbers).where(eq(mobileNumbers.phoneNumber, phone));
    return row;
  }

  beforeEach(async () => {
    await testDb.reset();
    clock = new TestClock('2025-03-10T09:00:00.000Z');
    services = createServices(testDb.db, { config: testConfig(), mailer: new FakeMailer(), clock: clock.now });

    await services.employees.createEmployee({ fullName: 'Ana Field', departmentName: 'Sales', email: 'ana@example.com' });
    await services.employees.createEmployee({ fullName: 'Ben Stone', departmentName: 'Sales', email: 'ben@example.com' });
    await services.employees.createEmployee({ fullName: 'Cleo Park', departmentName: 'IT', email: 'cleo@example.com' });

    const lifecycle = services.numberLifecycle;
    for (const [phone, holder] of [[PHONE_A, 'EMP0000001'], [PHONE_B, 'EMP0000001'], [PHONE_C, 'EMP0000002']]) {
      await lifecycle.createNumber({ phoneNumber: phone, applicantEmployeeId: 'EMP0000001', applicationDate: '2025-01-05' });
      await lifecycle.assignNumber(phone, { employeeId: holder, assignmentDate: '2025-02-01', purpose: 'Sales line' });
    }
    await lifecycle.createNumber({ phoneNumber: PHONE_D, applicantEmployeeId: 'EMP0000001', applicationDate: '2025-01-05' });
    await lifecycle.updateNumber(PHONE_D, { status: 'deactivated' });
    numberA = await numberByPhone(PHONE_A);
    numberB = await numberByPhone(PHONE_B);

    await services.verificationBatches.initiateVerification({ scope: 'all_users', durationDays: 7 });
    await services.batchWorker.onIdle();

    const [token] = await testDb.db
      .select({ token: verificationTokens.token })
      .from(verificationTokens)
      .where(eq(verificationTokens.employeeId, 'EMP0000001'));

    clock.set(SUBMITTED_AT.toISOString());
    await services.verificationSubmissions.submit(token.token, {
      verifiedNumbers: [
        { mobileNumberId: numberA.id, action: 'confirm_usage' },
        { mobileNumberId: numberB.id, action: 'report_issue', userComment: 'Lost SIM' },
      ],
      unlistedNumbers: [{ phoneNumber: UNLISTED, purpose: 'Test line' }],
    });
  });

  it('summarizes the campaign from the latest action per number', async () => {
    const view = await services.verificationAdmin.getStatus();

    expect(view.summary).toEqual({
      totalPhonesCount: 3,
      confirmedPhonesCount: 1,
      reportedIssuesCount: 1,
      pendingPhonesCount: 1,
      newlyReportedPhonesCount: 1,
    });
    expect(view.confirmedPhones).toEqual([{
      id: numberA.id,
      phoneNumber: PHONE_A,
      departmentName: 'Sales',
      currentUser: 'Ana Field',
      purpose: 'Sales line',
      confirmedBy: 'Ana Field',
      confirmedAt: SUBMITTED_AT,
    }]);
    expect(view.pendingUsers.map((user) => user.employeeId)).toEqual(['EMP0000001', 'EMP0000002', 'EMP0000003']);
    expect(view.reportedIssues).toEqual([{
      issueId: 1,
      phoneNumber: PHONE_B,
      reportedBy: 'Ana Field',
      employeeId: 'EMP0000001',
      comment: 'Lost SIM',
      purpose: 'Sales line',
      originalStatus: 'in_use',
      adminActionStatus: 'pending_review',
      reportedAt: SUBMITTED_AT,
    }]);
    expect(view.unlistedNumbers).toEqual([{
      issueId: 2,
      phoneNumber: UNLISTED,
      reportedBy: 'Ana Field',
      employeeId: 'EMP0000001',
      purpose: 'Test line',
      comment: null,
      adminActionStatus: 'pending_review',
      reportedAt: SUBMITTED_AT,
    }]);
  });

  it('filters the itemized lists by department or employee', async () => {
    const itDept = await services.verificationAdmin.getStatus({ departmentName: 'IT' });
    expect(itDept.pendingUsers.map((user) => user.employeeId)).toEqual(['EMP0000003']);
    expect(itDept.reportedIssues).toEqual([]);
    expect(itDept.unlistedNumbers).toEqual([]);
    expect(itDept.summary.totalPhonesCount).toBe(3);

    const ben = await services.verificationAdmin.getStatus({ employeeId: 'EMP0000002' });
    expect(ben.pendingUsers.map((user) => user.fullName)).toEqual(['Ben Stone']);
    expect(ben.reportedIssues).toEqual([]);
  });

  it('lets a later confirmation override an earlier report', async () => {
    const [token] = await testDb.db
      .select({ token: verificationTokens.token })
      .from(verificationTokens)
      .where(eq(verificationTokens.employeeId, 'EMP0000001'));
    clock.set('2025-03-12T08:00:00.000Z');
    await services.verificationSubmissions.submit(token.token, {
      verifiedNumbers: [{ mobileNumberId: numberB.id, action: 'confirm_usage' }],
    });

    const view = await services.verificationAdmin.getStatus();
    expect(view.summary).toMatchObject({ confirmedPhonesCount: 2, reportedIssuesCount: 0, pendingPhonesCount: 1 });
    expect(view.confirmedPhones.map((phone) => phone.phoneNumber)).toEqual([PHONE_B, PHONE_A]);
  });

  it('drops expired tokens from the pending list', async () => {
    clock.set('2025-03-18T09:00:00.000Z');
    const view = await services.verificationAdmin.getStatus();
    expect(view.pendingUsers).toEqual([]);
  });

  it('closes an issue and returns the number to use', async () => {
    clock.set('2025-03-12T12:00:00.000Z');
    const closed = await services.verificationAdmin.resolveIssue(1, { status: 'resolved', remarks: 'SIM replaced' });
    expect(closed).toMatchObject({
      adminActionStatus: 'resolved',
      adminRemarks: 'SIM replaced',
      resolvedAt: new Date('2025-03-12T12:00:00.000Z'),
    });

    const number = await numberByPhone(PHONE_B);
    expect(number.status).toBe('in_use');
    expect(number.currentHolderEmployeeId).toBe('EMP0000001');

    await expect(services.verificationAdmin.resolveIssue(1, { status: 'dismissed' }))
      .rejects.toMatchObject({ kind: 'InvalidState' });
    await expect(services.verificationAdmin.resolveIssue(999, { status: 'dismissed' }))
      .rejects.toMatchObject({ kind: 'NotFound', code: 'ISSUE_NOT_FOUND' });
  });

  it('opens a fresh issue when a closed one is reported again', async () => {
    await services.verificationAdmin.resolveIssue(1, { status: 'dismissed' });
    const [token] = await testDb.db
      .select({ token: verificationTokens.token })
      .from(verificationTokens)
      .where(eq(verificationTokens.employeeId, 'EMP0000001'));

    await services.verificationSubmissions.submit(token.token, {
      verifiedNumbers: [{ mobileNumberId: numberB.id, action: 'report_issue', userComment: 'Still lost' }],
    });

    const issues = await testDb.db.select().from(userReportedIssues).where(eq(userReportedIssues.mobileNumberId, numberB.id));
    expect(issues.map((issue) => issue.adminActionStatus).sort()).toEqual(['dismissed', 'pending_review']);
  });

  it('leaves numbers untouched when an unlisted report is dismissed', async () => {
    const closed = await services.verificationAdmin.resolveIssue(2, { status: 'dismissed', remarks: '  ' });
    expect(closed.adminActionStatus).toBe('dismissed');
    expect(closed.adminRemarks).toBeNull();
    expect((await numberByPhone(PHONE_B)).status).toBe('user_reported');
  });

  describe('after the applicant departs', () => {
    beforeEach(async () => {
      await services.numberLifecycle.unassignNumber(PHONE_A, '2025-03-11');
      await services.employees.updateEmployee('EMP0000001', { employmentStatus: 'Departed' });
    });

    it('keeps a risk_pending number flagged once its report is closed', async () => {
      expect((await numberByPhone(PHONE_C)).status).toBe('risk_pending');

      const [token] = await testDb.db
        .select({ token: verificationTokens.token })
        .from(verificationTokens)
        .where(eq(verificationTokens.employeeId, 'EMP0000002'));
      const numberC = await numberByPhone(PHONE_C);
      await services.verificationSubmissions.submit(token.token, {
        verifiedNumbers: [{ mobileNumberId: numberC.id, action: 'report_issue', userComment: 'Not my line' }],
      });
      expect((await numberByPhone(PHONE_C)).status).toBe('user_reported');

      const closed = await services.verificationAdmin.resolveIssue(3, { status: 'dismissed' });
      expect(closed.originalStatus).toBe('risk_pending');
      expect((await numberByPhone(PHONE_C)).status).toBe('risk_pending');

      const handled = await services.numberLifecycle.handleRisk(PHONE_C, {
        action: 'change_applicant',
        newApplicantEmployeeId: 'EMP0000002',
      }, 'EMP0000003');
      expect(handled.status).toBe('in_use');
      expect(handled.applicantEmployeeId).toBe('EMP0000002');
    });

    it('leaves the departure flag in place when an earlier report is resolved', async () => {
      expect((await numberByPhone(PHONE_B)).status).toBe('risk_pending');

      await services.verificationAdmin.resolveIssue(1, { status: 'resolved' });
      expect((await numberByPhone(PHONE_B)).status).toBe('risk_pending');
    });
  });
});
