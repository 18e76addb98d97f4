import { afterAll, beforeAll, beforeEach, describe, expect, it } from 'vitest';
import { eq } from 'drizzle-orm';
import { mobileNumbers, numberApplicantHistory, numberUsageHistory } from '../db/schema';
import { EmployeeService } from '../modules/employees/employee.service';
import { NumberLifecycleService } from '../modules/numbers/number-lifecycle.service';
import { NumberQueryService } from '../modules/numbers/number-query.service';
import { createTestDatabase, TestClock } from './test-db';
import type { TestDatabase } from './test-db';

const PHONE_A = '13800000001';
const PHONE_B = '13800000002';

describe('number lifecycle', () => {
  let testDb: TestDatabase;
  let clock: TestClock;
  let employees: EmployeeService;
  let lifecycle: NumberLifecycleService;
  let queries: NumberQueryService;

  beforeAll(async () => {
    testDb = await createTestDatabase();
  });

  afterAll(async () => {
    await testDb.close();
  });

  beforeEach(async () => {
    await testDb.reset();
    clock = new TestClock('2025-03-10T09:00:00.000Z');
    employees = new EmployeeService(testDb.db, clock.now);
    lifecycle = new NumberLifecycleService(testDb.db, employees, clock.now);
    employees.onStatusChanged(lifecycle.handleEmployeeStatusChanged);
    queries = new NumberQueryService(testDb.db);

    // EMP0000001 applies, EMP0000002 holds, EMP0000003 operates
    await employees.createEmployee({ fullName: 'Ana Field', departmentName: 'Sales', email: 'ana@example.com' });
    await employees.createEmployee({ fullName: 'Ben Stone', departmentName: 'Sales', email: 'ben@example.com' });
    await employees.createEmployee({ fullName: 'Cleo Park', departmentName: 'IT', email: 'cleo@example.com' });
  });

  async function usageRows(phone: string) {
    const [number] = await testDb.db.select().from(mobileNumbers).where(eq(mobileNumbers.phoneNumber, phone));
    return testDb.db.select().from(numberUsageHistory).where(eq(numberUsageHistory.mobileNumberId, number.id));
  }

  async function registerAndAssign(phone: string) {
    await lifecycle.createNumber({ phoneNumber: phone, applicantEmployeeId: 'EMP0000001', applicationDate: '2025-01-05' });
    return lifecycle.assignNumber(phone, { employeeId: 'EMP0000002', assignmentDate: '2025-02-01' });
  }

  it('allocates sequential employee ids', async () => {
    const created = await employees.createEmployee({ fullName: 'Dan Reed' });
    expect(created.employeeId).toBe('EMP0000004');
    expect(created.employmentStatus).toBe('Active');
  });

  it('registers a number as idle with normalized dates', async () => {
    const number = await lifecycle.createNumber({
      phoneNumber: ` ${PHONE_A} `,
      applicantEmployeeId: 'EMP0000001',
      applicationDate: '2025/1/5',
      vendor: 'Carrier One',
    });

    expect(number.phoneNumber).toBe(PHONE_A);
    expect(number.status).toBe('idle');
    expect(number.applicationDate).toBe('2025-01-05');
    expect(number.currentHolderEmployeeId).toBeNull();
    expect(number.vendor).toBe('Carrier One');
  });

  it('rejects malformed phones and duplicate registrations', async () => {
    await expect(lifecycle.createNumber({
      phoneNumber: '2380000000',
      applicantEmployeeId: 'EMP0000001',
      applicationDate: '2025-01-05',
    })).rejects.toMatchObject({ kind: 'Validation', code: 'INVALID_PHONE' });

    await lifecycle.createNumber({ phoneNumber: PHONE_A, applicantEmployeeId: 'EMP0000001', applicationDate: '2025-01-05' });
    await expect(lifecycle.createNumber({
      phoneNumber: PHONE_A,
      applicantEmployeeId: 'EMP0000002',
      applicationDate: '2025-01-06',
    })).rejects.toMatchObject({ kind: 'Conflict', code: 'NUMBER_EXISTS' });
  });

  it('rejects an unknown applicant', async () => {
    await expect(lifecycle.createNumber({
      phoneNumber: PHONE_A,
      applicantEmployeeId: 'EMP0000099',
      applicationDate: '2025-01-05',
    })).rejects.toMatchObject({ kind: 'NotFound', code: 'EMPLOYEE_NOT_FOUND' });
  });

  it('assign then unassign leaves one closed usage interval', async () => {
    const assigned = await registerAndAssign(PHONE_A);
    expect(assigned.status).toBe('in_use');
    expect(assigned.currentHolderEmployeeId).toBe('EMP0000002');

    const released = await lifecycle.unassignNumber(PHONE_A, '2025-03-01');
    expect(released.status).toBe('idle');
    expect(released.currentHolderEmployeeId).toBeNull();

    const rows = await usageRows(PHONE_A);
    expect(rows).toHaveLength(1);
    expect(rows[0]).toMatchObject({ employeeId: 'EMP0000002', startDate: '2025-02-01', endDate: '2025-03-01' });
  });

  it('refuses to assign a number already in use and keeps the open interval', async () => {
    await registerAndAssign(PHONE_A);

    await expect(lifecycle.assignNumber(PHONE_A, { employeeId: 'EMP0000003', assignmentDate: '2025-02-15' }))
      .rejects.toMatchObject({ kind: 'InvalidState' });

    const [number] = await testDb.db.select().from(mobileNumbers).where(eq(mobileNumbers.phoneNumber, PHONE_A));
    expect(number.currentHolderEmployeeId).toBe('EMP0000002');
    const rows = await usageRows(PHONE_A);
    expect(rows).toHaveLength(1);
    expect(rows[0]).toMatchObject({ employeeId: 'EMP0000002', startDate: '2025-02-01', endDate: null });
  });

  it('refuses to assign to a departed employee', async () => {
    await lifecycle.createNumber({ phoneNumber: PHONE_A, applicantEmployeeId: 'EMP0000001', applicationDate: '2025-01-05' });
    await employees.updateEmployee('EMP0000003', { employmentStatus: 'Departed' });

    await expect(lifecycle.assignNumber(PHONE_A, { employeeId: 'EMP0000003', assignmentDate: '2025-02-01' }))
      .rejects.toMatchObject({ kind: 'PreconditionFailed', code: 'EMPLOYEE_NOT_ACTIVE' });
    expect(await usageRows(PHONE_A)).toHaveLength(0);
  });

  it('only unassigns numbers in use, never before the assignment date', async () => {
    await lifecycle.createNumber({ phoneNumber: PHONE_A, applicantEmployeeId: 'EMP0000001', applicationDate: '2025-01-05' });
    await expect(lifecycle.unassignNumber(PHONE_A, '2025-03-01')).rejects.toMatchObject({ kind: 'InvalidState' });

    await lifecycle.assignNumber(PHONE_A, { employeeId: 'EMP0000002', assignmentDate: '2025-02-01' });
    await expect(lifecycle.unassignNumber(PHONE_A, '2025-01-31')).rejects.toMatchObject({ kind: 'Validation' });
  });

  it('reports a missing open interval as a data inconsistency', async () => {
    await registerAndAssign(PHONE_A);
    await testDb.db.delete(numberUsageHistory);

    await expect(lifecycle.unassignNumber(PHONE_A, '2025-03-01'))
      .rejects.toMatchObject({ kind: 'DataInconsistency' });
    const [number] = await testDb.db.select().from(mobileNumbers).where(eq(mobileNumbers.phoneNumber, PHONE_A));
    expect(number.status).toBe('in_use');
  });

  it('guards status edits that would break the holder invariant', async () => {
    await registerAndAssign(PHONE_A);

    await expect(lifecycle.updateNumber(PHONE_A, { status: 'idle' })).rejects.toMatchObject({ kind: 'InvalidState' });
    await expect(lifecycle.updateNumber(PHONE_B, { status: 'in_use' })).rejects.toMatchObject({ kind: 'InvalidState' });
    await expect(lifecycle.updateNumber(PHONE_A, {})).rejects.toMatchObject({ kind: 'Validation' });

    const updated = await lifecycle.updateNumber(PHONE_A, { purpose: 'Field support' });
    expect(updated.purpose).toBe('Field support');
    expect(updated.status).toBe('in_use');
  });

  it('stamps the cancellation date when a number is deactivated', async () => {
    await lifecycle.createNumber({ phoneNumber: PHONE_A, applicantEmployeeId: 'EMP0000001', applicationDate: '2025-01-05' });

    const updated = await lifecycle.updateNumber(PHONE_A, { status: 'deactivated', remarks: 'Contract ended' });
    expect(updated.status).toBe('deactivated');
    expect(updated.cancellationDate).toBe('2025-03-10');
    expect(updated.remarks).toBe('Contract ended');
  });

  describe('applicant departure', () => {
    beforeEach(async () => {
      await lifecycle.createNumber({ phoneNumber: PHONE_A, applicantEmployeeId: 'EMP0000001', applicationDate: '2025-01-05' });
      await registerAndAssign(PHONE_B);
    });

    it('flags every live number of the departed applicant as risk_pending', async () => {
      const departed = await employees.updateEmployee('EMP0000001', { employmentStatus: 'Departed' });
      expect(departed.terminationDate).toBe('2025-03-10');

      const page = await queries.listRiskPendingNumbers({ sortBy: 'phoneNumber', sortOrder: 'asc' });
      expect(page.items.map((item) => item.phoneNumber)).toEqual([PHONE_A, PHONE_B]);
      expect(page.items[1].currentHolderEmployeeId).toBe('EMP0000002');
      expect(page.pagination.total).toBe(2);
    });

    it('clears the termination date when a departed employee returns', async () => {
      await employees.updateEmployee('EMP0000001', { employmentStatus: 'Departed' });
      const rehired = await employees.updateEmployee('EMP0000001', { employmentStatus: 'Active' });
      expect(rehired.terminationDate).toBeNull();

      const explicit = await employees.updateEmployee('EMP0000001', { employmentStatus: 'Departed', terminationDate: '2025-04-01' });
      expect(explicit.terminationDate).toBe('2025-04-01');
    });

    it('blocks the departure of an employee who still holds numbers', async () => {
      await expect(employees.updateEmployee('EMP0000002', { employmentStatus: 'Departed' }))
        .rejects.toMatchObject({ kind: 'PreconditionFailed', code: 'EMPLOYEE_HOLDS_NUMBERS' });

      const holder = await employees.getEmployee('EMP0000002');
      expect(holder.employmentStatus).toBe('Active');
      expect(holder.terminationDate).toBeNull();
    });

    it('hands an idle number to a new applicant and records who did it', async () => {
      await employees.updateEmployee('EMP0000001', { employmentStatus: 'Departed' });

      const handled = await lifecycle.handleRisk(PHONE_A, {
        action: 'change_applicant',
        newApplicantEmployeeId: 'EMP0000003',
        remarks: 'Team lead takes over',
      }, 'EMP0000003');
      expect(handled.status).toBe('idle');
      expect(handled.applicantEmployeeId).toBe('EMP0000003');

      const history = await testDb.db.select().from(numberApplicantHistory);
      expect(history).toHaveLength(1);
      expect(history[0]).toMatchObject({
        previousApplicantEmployeeId: 'EMP0000001',
        newApplicantEmployeeId: 'EMP0000003',
        operatorEmployeeId: 'EMP0000003',
        changeDate: '2025-03-10',
        reason: 'applicant_departed',
        remarks: 'Team lead takes over',
      });
    });

    it('keeps a held number in use when only the applicant changes', async () => {
      await employees.updateEmployee('EMP0000001', { employmentStatus: 'Departed' });

      const handled = await lifecycle.handleRisk(PHONE_B, {
        action: 'change_applicant',
        newApplicantEmployeeId: 'EMP0000002',
      }, 'EMP0000003');
      expect(handled.status).toBe('in_use');
      expect(handled.currentHolderEmployeeId).toBe('EMP0000002');
    });

    it('reclaims a held number and closes its usage interval', async () => {
      await employees.updateEmployee('EMP0000001', { employmentStatus: 'Departed' });

      const handled = await lifecycle.handleRisk(PHONE_B, { action: 'reclaim', changeDate: '2025-03-08' }, 'EMP0000003');
      expect(handled.status).toBe('idle');
      expect(handled.currentHolderEmployeeId).toBeNull();

      const rows = await usageRows(PHONE_B);
      expect(rows[0]).toMatchObject({ employeeId: 'EMP0000002', startDate: '2025-02-01', endDate: '2025-03-08' });
    });

    it('deactivates a held number', async () => {
      await employees.updateEmployee('EMP0000001', { employmentStatus: 'Departed' });

      const handled = await lifecycle.handleRisk(PHONE_B, { action: 'deactivate' }, 'EMP0000003');
      expect(handled.status).toBe('deactivated');
      expect(handled.currentHolderEmployeeId).toBeNull();
      expect(handled.cancellationDate).toBe('2025-03-10');
      expect((await usageRows(PHONE_B))[0].endDate).toBe('2025-03-10');
    });

    it('only handles risk_pending numbers, by an active operator', async () => {
      await expect(lifecycle.handleRisk(PHONE_A, { action: 'reclaim' }, 'EMP0000003'))
        .rejects.toMatchObject({ kind: 'InvalidState' });

      await employees.updateEmployee('EMP0000001', { employmentStatus: 'Departed' });
      await expect(lifecycle.handleRisk(PHONE_A, { action: 'reclaim' }, 'EMP0000001'))
        .rejects.toMatchObject({ kind: 'PreconditionFailed', code: 'OPERATOR_NOT_ACTIVE' });
    });
  });

  it('hides soft-deleted numbers but keeps their phone reserved', async () => {
    await lifecycle.createNumber({ phoneNumber: PHONE_A, applicantEmployeeId: 'EMP0000001', applicationDate: '2025-01-05' });
    const deleted = await lifecycle.softDeleteNumber(PHONE_A);
    expect(deleted.deletedAt).toEqual(new Date('2025-03-10T09:00:00.000Z'));

    await expect(queries.getNumberDetail(PHONE_A)).rejects.toMatchObject({ kind: 'NotFound', code: 'NUMBER_NOT_FOUND' });
    await expect(lifecycle.createNumber({ phoneNumber: PHONE_A, applicantEmployeeId: 'EMP0000001', applicationDate: '2025-01-05' }))
      .rejects.toMatchObject({ kind: 'Conflict' });
  });

  it('returns usage history newest first in the detail view', async () => {
    await registerAndAssign(PHONE_A);
    await lifecycle.unassignNumber(PHONE_A, '2025-02-20');
    await lifecycle.assignNumber(PHONE_A, { employeeId: 'EMP0000003', assignmentDate: '2025-02-21' });

    const detail = await queries.getNumberDetail(PHONE_A);
    expect(detail.currentHolderName).toBe('Cleo Park');
    expect(detail.applicantName).toBe('Ana Field');
    expect(detail.usageHistory.map((row) => [row.employeeId, row.startDate, row.endDate])).toEqual([
      ['EMP0000003', '2025-02-21', null],
      ['EMP0000002', '2025-02-01', '2025-02-20'],
    ]);
  });

  it('searches by holder name and paginates', async () => {
    await registerAndAssign(PHONE_A);
    await lifecycle.createNumber({ phoneNumber: PHONE_B, applicantEmployeeId: 'EMP0000003', applicationDate: '2025-01-06' });

    const byHolder = await queries.listNumbers({ search: 'ben' });
    expect(byHolder.items.map((item) => item.phoneNumber)).toEqual([PHONE_A]);

    const paged = await queries.listNumbers({ limit: 1, page: 2, sortBy: 'phoneNumber', sortOrder: 'asc' });
    expect(paged.items.map((item) => item.phoneNumber)).toEqual([PHONE_B]);
    expect(paged.pagination).toEqual({ page: 2, limit: 1, total: 2, totalPages: 2 });
  });
});
