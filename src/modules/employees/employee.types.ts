import type { Database } from '../../db';
import type { Employee, EmploymentStatus } from '../../db/schema';

export type EmployeeScope =
  | { kind: 'all' }
  | { kind: 'departments'; names: string[] }
  | { kind: 'ids'; ids: string[] };

/** Read side consumed by the lifecycle manager and the verification engine. */
export interface EmployeeDirectory {
  getById(employeeId: string, executor?: Database): Promise<Employee | null>;
  findByIds(employeeIds: string[]): Promise<Employee[]>;
  findActiveByScope(scope: EmployeeScope): Promise<Employee[]>;
}

export interface EmployeeStatusChangedEvent {
  employeeId: string;
  previousStatus: EmploymentStatus;
  newStatus: EmploymentStatus;
  changedAt: Date;
}

/**
 * Runs inside the transaction that changes the status; throwing rolls the
 * status change back.
 */
export type EmployeeStatusListener = (event: EmployeeStatusChangedEvent, tx: Database) => Promise<void>;

export interface CreateEmployeeInput {
  fullName: string;
  departmentName?: string | null;
  email?: string | null;
  phoneNumber?: string | null;
  hireDate?: string | null;
}

export interface UpdateEmployeeInput {
  fullName?: string;
  departmentName?: string | null;
  email?: string | null;
  employmentStatus?: EmploymentStatus;
  hireDate?: string | null;
  terminationDate?: string | null;
}
