import { and, asc, eq, inArray, isNull } from 'drizzle-orm';
import type { Database } from '../../db';
import { employees } from '../../db/schema';
import type { Employee } from '../../db/schema';
import { NotFoundError, ValidationError } from '../../utils/errors';
import { withConflictMapping } from '../../utils/database-error-handler';
import { normalizePhoneNumber, optionalText, parseCalendarDate, requireNonBlank } from '../../utils/validators';
import { systemClock, toCalendarDate } from '../../utils/clock';
import type { Clock } from '../../utils/clock';
import { moduleLogger } from '../../utils/logger';
import { allocateBusinessId, EMPLOYEE_ID_COUNTER, EMPLOYEE_ID_PREFIX } from './id-allocator';
import type {
  CreateEmployeeInput,
  EmployeeDirectory,
  EmployeeScope,
  EmployeeStatusChangedEvent,
  EmployeeStatusListener,
  UpdateEmployeeInput,
} from './employee.types';

const log = moduleLogger('employees');

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

function normalizeEmail(raw: string | null | undefined): string | null | undefined {
  const email = optionalText(raw);
  if (email && !EMAIL_PATTERN.test(email)) {
    throw new ValidationError(`Invalid email address "${email}"`, 'INVALID_EMAIL');
  }
  return email;
}

/**
 * Employee records: the minimal collaborator the number lifecycle and the
 * verification campaigns depend on.
 */
export class EmployeeService implements EmployeeDirectory {
  private readonly statusListeners: EmployeeStatusListener[] = [];

  constructor(private readonly db: Database, private readonly clock: Clock = systemClock) {}

  onStatusChanged(listener: EmployeeStatusListener): void {
    this.statusListeners.push(listener);
  }

  async createEmployee(input: CreateEmployeeInput): Promise<Employee> {
    const fullName = requireNonBlank(input.fullName, 'fullName');
    const email = normalizeEmail(input.email) ?? null;
    const phone = optionalText(input.phoneNumber);
    const phoneNumber = phone ? normalizePhoneNumber(phone) : null;
    const hireDate = input.hireDate ? parseCalendarDate(input.hireDate, 'hireDate') : null;

    const created = await withConflictMapping(
      () => this.db.transaction(async (tx) => {
        const employeeId = await allocateBusinessId(tx, EMPLOYEE_ID_COUNTER, EMPLOYEE_ID_PREFIX);
        const [row] = await tx.insert(employees).values({
          employeeId,
          fullName,
          departmentName: optionalText(input.departmentName) ?? null,
          email,
          phoneNumber,
          hireDate,
          employmentStatus: 'Active',
        }).returning();
        return row;
      }),
      'An employee with this email or phone number already exists',
      'EMPLOYEE_EXISTS',
    );

    log.info({ employeeId: created.employeeId }, 'employee created');
    return created;
  }

  async getById(employeeId: string, executor: Database = this.db): Promise<Employee | null> {
    const [row] = await executor
      .select()
      .from(employees)
      .where(and(eq(employees.employeeId, employeeId), isNull(employees.deletedAt)))
      .limit(1);
    return row ?? null;
  }

  async getEmployee(employeeId: string): Promise<Employee> {
    const employee = await this.getById(employeeId);
    if (!employee) {
      throw new NotFoundError(`Employee ${employeeId} not found`, 'EMPLOYEE_NOT_FOUND');
    }
    return employee;
  }

  async findByIds(employeeIds: string[]): Promise<Employee[]> {
    if (employeeIds.length === 0) return [];
    return this.db
      .select()
      .from(employees)
      .where(and(inArray(employees.employeeId, employeeIds), isNull(employees.deletedAt)))
      .orderBy(asc(employees.employeeId));
  }

  async findActiveByScope(scope: EmployeeScope): Promise<Employee[]> {
    const conditions = [eq(employees.employmentStatus, 'Active'), isNull(employees.deletedAt)];

    switch (scope.kind) {
      case 'all':
        break;
      case 'departments':
        if (scope.names.length === 0) return [];
        conditions.push(inArray(employees.departmentName, scope.names));
        break;
      case 'ids':
        if (scope.ids.length === 0) return [];
        conditions.push(inArray(employees.employeeId, scope.ids));
        break;
    }

    return this.db
      .select()
      .from(employees)
      .where(and(...conditions))
      .orderBy(asc(employees.employeeId));
  }

  /**
   * Patches an employee. A status change notifies the registered listeners
   * inside the same transaction; a listener that throws cancels the update.
   */
  async updateEmployee(employeeId: string, patch: UpdateEmployeeInput): Promise<Employee> {
    const fullName = patch.fullName === undefined ? undefined : requireNonBlank(patch.fullName, 'fullName');
    const email = normalizeEmail(patch.email);
    const hireDate = patch.hireDate ? parseCalendarDate(patch.hireDate, 'hireDate') : patch.hireDate;
    const terminationDate = patch.terminationDate
      ? parseCalendarDate(patch.terminationDate, 'terminationDate')
      : patch.terminationDate;

    const hasChanges = [fullName, patch.departmentName, email, patch.employmentStatus, hireDate, terminationDate]
      .some((value) => value !== undefined);
    if (!hasChanges) {
      throw new ValidationError('No fields to update');
    }

    return withConflictMapping(
      () => this.db.transaction(async (tx) => {
        const [current] = await tx
          .select()
          .from(employees)
          .where(and(eq(employees.employeeId, employeeId), isNull(employees.deletedAt)))
          .for('update');
        if (!current) {
          throw new NotFoundError(`Employee ${employeeId} not found`, 'EMPLOYEE_NOT_FOUND');
        }

        const now = this.clock();
        const statusChanged = patch.employmentStatus !== undefined && patch.employmentStatus !== current.employmentStatus;
        let effectiveTermination = terminationDate;
        if (statusChanged && effectiveTermination === undefined) {
          if (patch.employmentStatus === 'Departed' && !current.terminationDate) {
            effectiveTermination = toCalendarDate(now);
          } else if (patch.employmentStatus === 'Active') {
            // Rehired: the old termination no longer applies
            effectiveTermination = null;
          }
        }

        const [updated] = await tx.update(employees)
          .set({
            fullName,
            departmentName: optionalText(patch.departmentName),
            email,
            employmentStatus: patch.employmentStatus,
            hireDate,
            terminationDate: effectiveTermination,
            updatedAt: now,
          })
          .where(eq(employees.id, current.id))
          .returning();

        if (statusChanged && patch.employmentStatus) {
          const event: EmployeeStatusChangedEvent = {
            employeeId,
            previousStatus: current.employmentStatus,
            newStatus: patch.employmentStatus,
            changedAt: now,
          };
          for (const listener of this.statusListeners) {
            await listener(event, tx);
          }
          log.info({ employeeId, from: event.previousStatus, to: event.newStatus }, 'employment status changed');
        }

        return updated;
      }),
      'An employee with this email already exists',
      'EMPLOYEE_EXISTS',
    );
  }
}
