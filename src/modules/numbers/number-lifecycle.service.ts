import { and, eq, isNull, ne } from 'drizzle-orm';
import type { Database } from '../../db';
import { mobileNumbers, numberApplicantHistory, numberUsageHistory } from '../../db/schema';
import type { MobileNumber } from '../../db/schema';
import {
  ConflictError,
  DataInconsistencyError,
  InvalidStateError,
  NotFoundError,
  PreconditionFailedError,
  ValidationError,
} from '../../utils/errors';
import { withConflictMapping } from '../../utils/database-error-handler';
import { normalizePhoneNumber, optionalText, parseCalendarDate, requireNonBlank } from '../../utils/validators';
import { systemClock, toCalendarDate } from '../../utils/clock';
import type { Clock } from '../../utils/clock';
import { moduleLogger } from '../../utils/logger';
import type { EmployeeDirectory, EmployeeStatusChangedEvent } from '../employees/employee.types';
import type { AssignNumberInput, CreateNumberInput, HandleRiskInput, UpdateNumberInput } from './number.types';

const log = moduleLogger('number-lifecycle');

/**
 * Owns every MobileNumber state transition and the usage/applicant trails.
 *
 * Holder invariant: `currentHolderEmployeeId` is set exactly when one open
 * usage row exists for the number, and `in_use` always has a holder.
 * Mutations that touch both the number and its history lock the number row
 * (`FOR UPDATE`) inside one transaction.
 */
export class NumberLifecycleService {
  constructor(
    private readonly db: Database,
    private readonly employees: EmployeeDirectory,
    private readonly clock: Clock = systemClock,
  ) {}

  async createNumber(input: CreateNumberInput): Promise<MobileNumber> {
    const phoneNumber = normalizePhoneNumber(input.phoneNumber);
    const applicantEmployeeId = requireNonBlank(input.applicantEmployeeId, 'applicantEmployeeId');
    const applicationDate = parseCalendarDate(input.applicationDate, 'applicationDate');

    const applicant = await this.employees.getById(applicantEmployeeId);
    if (!applicant) {
      throw new NotFoundError(`Applicant ${applicantEmployeeId} not found`, 'EMPLOYEE_NOT_FOUND');
    }

    // Soft-deleted rows count: the phone unique index spans them too
    const [existing] = await this.db
      .select({ id: mobileNumbers.id })
      .from(mobileNumbers)
      .where(eq(mobileNumbers.phoneNumber, phoneNumber))
      .limit(1);
    if (existing) {
      throw new ConflictError(`Phone number ${phoneNumber} already exists`, 'NUMBER_EXISTS');
    }

    const [created] = await withConflictMapping(
      () => this.db.insert(mobileNumbers).values({
        phoneNumber,
        applicantEmployeeId,
        applicationDate,
        status: 'idle',
        purpose: optionalText(input.purpose) ?? null,
        vendor: optionalText(input.vendor) ?? null,
        remarks: optionalText(input.remarks) ?? null,
      }).returning(),
      `Phone number ${phoneNumber} already exists`,
      'NUMBER_EXISTS',
    );

    log.info({ phoneNumber, applicantEmployeeId }, 'number created');
    return created;
  }

  async assignNumber(phone: string, input: AssignNumberInput): Promise<MobileNumber> {
    const phoneNumber = normalizePhoneNumber(phone);
    const employeeId = requireNonBlank(input.employeeId, 'employeeId');
    const assignmentDate = parseCalendarDate(input.assignmentDate, 'assignmentDate');
    const purpose = optionalText(input.purpose);

    return this.db.transaction(async (tx) => {
      const number = await this.lockNumber(tx, phoneNumber);
      if (number.status !== 'idle') {
        throw new InvalidStateError(`Number ${phoneNumber} is ${number.status}, only idle numbers can be assigned`);
      }
      if (number.currentHolderEmployeeId) {
        throw new DataInconsistencyError(`Idle number ${phoneNumber} still has holder ${number.currentHolderEmployeeId}`);
      }

      const employee = await this.employees.getById(employeeId, tx);
      if (!employee) {
        throw new NotFoundError(`Employee ${employeeId} not found`, 'EMPLOYEE_NOT_FOUND');
      }
      if (employee.employmentStatus !== 'Active') {
        throw new PreconditionFailedError(`Employee ${employeeId} is not active`, 'EMPLOYEE_NOT_ACTIVE');
      }

      const [updated] = await tx.update(mobileNumbers)
        .set({
          currentHolderEmployeeId: employeeId,
          status: 'in_use',
          purpose,
          updatedAt: this.clock(),
        })
        .where(eq(mobileNumbers.id, number.id))
        .returning();

      await tx.insert(numberUsageHistory).values({
        mobileNumberId: number.id,
        employeeId,
        startDate: assignmentDate,
      });

      log.info({ phoneNumber, employeeId, assignmentDate }, 'number assigned');
      return updated;
    });
  }

  async unassignNumber(phone: string, reclaimDate: string): Promise<MobileNumber> {
    const phoneNumber = normalizePhoneNumber(phone);
    const endDate = parseCalendarDate(reclaimDate, 'reclaimDate');

    return this.db.transaction(async (tx) => {
      const number = await this.lockNumber(tx, phoneNumber);
      if (number.status !== 'in_use') {
        throw new InvalidStateError(`Number ${phoneNumber} is ${number.status}, only numbers in use can be unassigned`);
      }

      const updated = await this.releaseHolder(tx, number, endDate, { requireOpenRow: true });
      log.info({ phoneNumber, reclaimDate: endDate }, 'number unassigned');
      return updated;
    });
  }

  async updateNumber(phone: string, patch: UpdateNumberInput): Promise<MobileNumber> {
    const phoneNumber = normalizePhoneNumber(phone);
    const purpose = optionalText(patch.purpose);
    const vendor = optionalText(patch.vendor);
    const remarks = optionalText(patch.remarks);

    if ([patch.status, purpose, vendor, remarks].every((value) => value === undefined)) {
      throw new ValidationError('No fields to update');
    }
    if (patch.status === 'in_use') {
      throw new InvalidStateError('Use the assign operation to put a number in use');
    }

    return this.db.transaction(async (tx) => {
      const number = await this.lockNumber(tx, phoneNumber);
      const statusChanges = patch.status !== undefined && patch.status !== number.status;

      if (statusChanges && number.status === 'in_use') {
        throw new InvalidStateError(`Number ${phoneNumber} is in use, unassign it before changing its status`);
      }
      if (statusChanges && number.currentHolderEmployeeId && (patch.status === 'idle' || patch.status === 'deactivated')) {
        throw new InvalidStateError(`Number ${phoneNumber} is still held by ${number.currentHolderEmployeeId}`);
      }

      const now = this.clock();
      const [updated] = await tx.update(mobileNumbers)
        .set({
          status: patch.status,
          purpose,
          vendor,
          remarks,
          cancellationDate: statusChanges && patch.status === 'deactivated' ? toCalendarDate(now) : undefined,
          updatedAt: now,
        })
        .where(eq(mobileNumbers.id, number.id))
        .returning();

      log.info({ phoneNumber, status: updated.status }, 'number updated');
      return updated;
    });
  }

  /**
   * Resolves a number flagged `risk_pending` after its applicant left.
   * The operator must be an active employee.
   */
  async handleRisk(phone: string, input: HandleRiskInput, operatorEmployeeId: string): Promise<MobileNumber> {
    const phoneNumber = normalizePhoneNumber(phone);
    const remarks = optionalText(input.remarks) ?? null;

    const operator = await this.employees.getById(operatorEmployeeId);
    if (!operator) {
      throw new NotFoundError(`Operator ${operatorEmployeeId} not found`, 'OPERATOR_NOT_FOUND');
    }
    if (operator.employmentStatus !== 'Active') {
      throw new PreconditionFailedError(`Operator ${operatorEmployeeId} is not active`, 'OPERATOR_NOT_ACTIVE');
    }

    return this.db.transaction(async (tx) => {
      const number = await this.lockNumber(tx, phoneNumber);
      if (number.status !== 'risk_pending') {
        throw new InvalidStateError(`Number ${phoneNumber} is ${number.status}, only risk_pending numbers can be handled`);
      }

      const now = this.clock();
      const today = input.changeDate ? parseCalendarDate(input.changeDate, 'changeDate') : toCalendarDate(now);
      let updated: MobileNumber;

      switch (input.action) {
        case 'change_applicant': {
          const newApplicantId = requireNonBlank(input.newApplicantEmployeeId, 'newApplicantEmployeeId');
          if (newApplicantId === number.applicantEmployeeId) {
            throw new ValidationError('New applicant is the same as the current applicant');
          }
          const newApplicant = await this.employees.getById(newApplicantId, tx);
          if (!newApplicant) {
            throw new NotFoundError(`Employee ${newApplicantId} not found`, 'EMPLOYEE_NOT_FOUND');
          }
          if (newApplicant.employmentStatus !== 'Active') {
            throw new PreconditionFailedError(`Employee ${newApplicantId} is not active`, 'EMPLOYEE_NOT_ACTIVE');
          }

          [updated] = await tx.update(mobileNumbers)
            .set({
              applicantEmployeeId: newApplicantId,
              status: number.currentHolderEmployeeId ? 'in_use' : 'idle',
              remarks: remarks ?? undefined,
              updatedAt: now,
            })
            .where(eq(mobileNumbers.id, number.id))
            .returning();

          await tx.insert(numberApplicantHistory).values({
            mobileNumberId: number.id,
            previousApplicantEmployeeId: number.applicantEmployeeId,
            newApplicantEmployeeId: newApplicantId,
            changeDate: today,
            operatorEmployeeId,
            reason: 'applicant_departed',
            remarks,
          });
          break;
        }
        case 'reclaim': {
          updated = await this.releaseHolder(tx, number, today, { requireOpenRow: false, remarks });
          break;
        }
        case 'deactivate': {
          if (number.currentHolderEmployeeId) {
            await this.releaseHolder(tx, number, today, { requireOpenRow: false });
          }
          [updated] = await tx.update(mobileNumbers)
            .set({
              status: 'deactivated',
              currentHolderEmployeeId: null,
              cancellationDate: today,
              remarks: remarks ?? undefined,
              updatedAt: now,
            })
            .where(eq(mobileNumbers.id, number.id))
            .returning();
          break;
        }
        default:
          throw new ValidationError(`Unknown risk action "${String(input.action)}"`);
      }

      log.info({ phoneNumber, action: input.action, operatorEmployeeId }, 'risk number handled');
      return updated;
    });
  }

  /**
   * Departure trigger. Refuses the departure while the employee still holds
   * numbers in use; otherwise flags every live number they applied for.
   */
  async flagRiskForDepartedApplicant(employeeId: string, executor: Database = this.db): Promise<string[]> {
    const held = await executor
      .select({ phoneNumber: mobileNumbers.phoneNumber })
      .from(mobileNumbers)
      .where(and(
        eq(mobileNumbers.currentHolderEmployeeId, employeeId),
        eq(mobileNumbers.status, 'in_use'),
        isNull(mobileNumbers.deletedAt),
      ));
    if (held.length > 0) {
      throw new PreconditionFailedError(
        `Employee ${employeeId} still holds ${held.map((row) => row.phoneNumber).join(', ')}; reclaim them first`,
        'EMPLOYEE_HOLDS_NUMBERS',
      );
    }

    const flagged = await executor.update(mobileNumbers)
      .set({ status: 'risk_pending', updatedAt: this.clock() })
      .where(and(
        eq(mobileNumbers.applicantEmployeeId, employeeId),
        ne(mobileNumbers.status, 'deactivated'),
        ne(mobileNumbers.status, 'risk_pending'),
        isNull(mobileNumbers.deletedAt),
      ))
      .returning({ phoneNumber: mobileNumbers.phoneNumber });

    const phones = flagged.map((row) => row.phoneNumber);
    if (phones.length > 0) {
      log.warn({ employeeId, phones }, 'applicant departed, numbers flagged risk_pending');
    }
    return phones;
  }

  /** Listener wired into EmployeeService.onStatusChanged. */
  readonly handleEmployeeStatusChanged = async (event: EmployeeStatusChangedEvent, tx: Database): Promise<void> => {
    if (event.newStatus === 'Departed') {
      await this.flagRiskForDepartedApplicant(event.employeeId, tx);
    }
  };

  async softDeleteNumber(phone: string): Promise<MobileNumber> {
    const phoneNumber = normalizePhoneNumber(phone);

    return this.db.transaction(async (tx) => {
      const number = await this.lockNumber(tx, phoneNumber);
      if (number.status === 'in_use' || number.currentHolderEmployeeId) {
        throw new InvalidStateError(`Number ${phoneNumber} is held, unassign it before deleting`);
      }
      const now = this.clock();
      const [deleted] = await tx.update(mobileNumbers)
        .set({ deletedAt: now, updatedAt: now })
        .where(eq(mobileNumbers.id, number.id))
        .returning();
      log.info({ phoneNumber }, 'number soft-deleted');
      return deleted;
    });
  }

  private async lockNumber(tx: Database, phoneNumber: string): Promise<MobileNumber> {
    const [number] = await tx
      .select()
      .from(mobileNumbers)
      .where(and(eq(mobileNumbers.phoneNumber, phoneNumber), isNull(mobileNumbers.deletedAt)))
      .for('update');
    if (!number) {
      throw new NotFoundError(`Number ${phoneNumber} not found`, 'NUMBER_NOT_FOUND');
    }
    return number;
  }

  /**
   * Closes the open usage interval of the current holder and returns the
   * number to idle. `requireOpenRow` turns a missing interval into a
   * DataInconsistencyError instead of tolerating it.
   */
  private async releaseHolder(
    tx: Database,
    number: MobileNumber,
    endDate: string,
    options: { requireOpenRow: boolean; remarks?: string | null },
  ): Promise<MobileNumber> {
    const holder = number.currentHolderEmployeeId;

    if (holder) {
      const [openRow] = await tx
        .select()
        .from(numberUsageHistory)
        .where(and(
          eq(numberUsageHistory.mobileNumberId, number.id),
          eq(numberUsageHistory.employeeId, holder),
          isNull(numberUsageHistory.endDate),
        ))
        .for('update');

      if (!openRow && options.requireOpenRow) {
        throw new DataInconsistencyError(`No open usage record for ${number.phoneNumber} held by ${holder}`);
      }
      if (openRow) {
        if (endDate < openRow.startDate) {
          throw new ValidationError(`Reclaim date ${endDate} is before the assignment date ${openRow.startDate}`);
        }
        await tx.update(numberUsageHistory)
          .set({ endDate })
          .where(eq(numberUsageHistory.id, openRow.id));
      }
    } else if (options.requireOpenRow) {
      throw new DataInconsistencyError(`Number ${number.phoneNumber} is in use without a holder`);
    }

    const [updated] = await tx.update(mobileNumbers)
      .set({
        currentHolderEmployeeId: null,
        status: 'idle',
        remarks: options.remarks ?? undefined,
        updatedAt: this.clock(),
      })
      .where(eq(mobileNumbers.id, number.id))
      .returning();
    return updated;
  }
}
