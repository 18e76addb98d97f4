import type { NumberStatus } from '../../db/schema';

export interface CreateNumberInput {
  phoneNumber: string;
  applicantEmployeeId: string;
  applicationDate: string;
  purpose?: string | null;
  vendor?: string | null;
  remarks?: string | null;
}

export interface AssignNumberInput {
  employeeId: string;
  assignmentDate: string;
  purpose?: string | null;
}

export interface UpdateNumberInput {
  status?: NumberStatus;
  purpose?: string | null;
  vendor?: string | null;
  remarks?: string | null;
}

export const RISK_ACTIONS = ['change_applicant', 'reclaim', 'deactivate'] as const;
export type RiskAction = typeof RISK_ACTIONS[number];

export interface HandleRiskInput {
  action: RiskAction;
  newApplicantEmployeeId?: string;
  changeDate?: string;
  remarks?: string | null;
}

export const NUMBER_SORT_KEYS = [
  'phoneNumber',
  'applicationDate',
  'status',
  'vendor',
  'createdAt',
  'applicantName',
  'currentHolderName',
] as const;
export type NumberSortKey = typeof NUMBER_SORT_KEYS[number];

export interface ListNumbersQuery {
  page?: number;
  limit?: number;
  sortBy?: NumberSortKey;
  sortOrder?: 'asc' | 'desc';
  search?: string;
  status?: NumberStatus;
  applicantStatus?: 'Active' | 'Departed';
}

export interface NumberListItem {
  id: number;
  phoneNumber: string;
  applicantEmployeeId: string;
  applicantName: string | null;
  applicantStatus: string | null;
  currentHolderEmployeeId: string | null;
  currentHolderName: string | null;
  status: NumberStatus;
  applicationDate: string;
  purpose: string | null;
  vendor: string | null;
  remarks: string | null;
  cancellationDate: string | null;
  lastConfirmationDate: Date | null;
  createdAt: Date;
}

export interface Paged<T> {
  items: T[];
  pagination: {
    page: number;
    limit: number;
    total: number;
    totalPages: number;
  };
}
