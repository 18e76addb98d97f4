import { and, asc, count, desc, eq, ilike, isNull, or } from 'drizzle-orm';
import type { SQL } from 'drizzle-orm';
import { alias } from 'drizzle-orm/pg-core';
import type { Database } from '../../db';
import { employees, mobileNumbers, numberApplicantHistory, numberUsageHistory } from '../../db/schema';
import type { ApplicantHistoryRow, UsageHistoryRow } from '../../db/schema';
import { NotFoundError } from '../../utils/errors';
import { normalizePhoneNumber } from '../../utils/validators';
import type { ListNumbersQuery, NumberListItem, NumberSortKey, Paged } from './number.types';

const DEFAULT_LIMIT = 20;
const MAX_LIMIT = 100;

const applicant = alias(employees, 'applicant');
const holder = alias(employees, 'holder');

const SORT_COLUMNS = {
  phoneNumber: mobileNumbers.phoneNumber,
  applicationDate: mobileNumbers.applicationDate,
  status: mobileNumbers.status,
  vendor: mobileNumbers.vendor,
  createdAt: mobileNumbers.createdAt,
  applicantName: applicant.fullName,
  currentHolderName: holder.fullName,
} satisfies Record<NumberSortKey, unknown>;

const listSelection = {
  id: mobileNumbers.id,
  phoneNumber: mobileNumbers.phoneNumber,
  applicantEmployeeId: mobileNumbers.applicantEmployeeId,
  applicantName: applicant.fullName,
  applicantStatus: applicant.employmentStatus,
  currentHolderEmployeeId: mobileNumbers.currentHolderEmployeeId,
  currentHolderName: holder.fullName,
  status: mobileNumbers.status,
  applicationDate: mobileNumbers.applicationDate,
  purpose: mobileNumbers.purpose,
  vendor: mobileNumbers.vendor,
  remarks: mobileNumbers.remarks,
  cancellationDate: mobileNumbers.cancellationDate,
  lastConfirmationDate: mobileNumbers.lastConfirmationDate,
  createdAt: mobileNumbers.createdAt,
};

export interface NumberDetail extends NumberListItem {
  usageHistory: UsageHistoryRow[];
  applicantHistory: ApplicantHistoryRow[];
}

/**
 * Read-side queries over the number roster (admin listing and detail).
 */
export class NumberQueryService {
  constructor(private readonly db: Database) {}

  async listNumbers(query: ListNumbersQuery): Promise<Paged<NumberListItem>> {
    const page = Math.max(1, Math.floor(query.page ?? 1));
    const limit = Math.min(MAX_LIMIT, Math.max(1, Math.floor(query.limit ?? DEFAULT_LIMIT)));

    const conditions: SQL[] = [isNull(mobileNumbers.deletedAt)];
    if (query.status) {
      conditions.push(eq(mobileNumbers.status, query.status));
    }
    if (query.applicantStatus) {
      conditions.push(eq(applicant.employmentStatus, query.applicantStatus));
    }
    const search = query.search?.trim();
    if (search) {
      const pattern = `%${search.replace(/[\\%_]/g, (ch) => `\\${ch}`)}%`;
      const match = or(
        ilike(mobileNumbers.phoneNumber, pattern),
        ilike(applicant.fullName, pattern),
        ilike(holder.fullName, pattern),
      );
      if (match) conditions.push(match);
    }
    const where = and(...conditions);

    const sortColumn = SORT_COLUMNS[query.sortBy ?? 'createdAt'];
    const direction = query.sortOrder === 'asc' ? asc : desc;

    const [{ total }] = await this.db
      .select({ total: count() })
      .from(mobileNumbers)
      .leftJoin(applicant, eq(mobileNumbers.applicantEmployeeId, applicant.employeeId))
      .leftJoin(holder, eq(mobileNumbers.currentHolderEmployeeId, holder.employeeId))
      .where(where);

    const items = await this.db
      .select(listSelection)
      .from(mobileNumbers)
      .leftJoin(applicant, eq(mobileNumbers.applicantEmployeeId, applicant.employeeId))
      .leftJoin(holder, eq(mobileNumbers.currentHolderEmployeeId, holder.employeeId))
      .where(where)
      .orderBy(direction(sortColumn), asc(mobileNumbers.id))
      .limit(limit)
      .offset((page - 1) * limit);

    return {
      items,
      pagination: {
        page,
        limit,
        total,
        totalPages: Math.ceil(total / limit),
      },
    };
  }

  async listRiskPendingNumbers(query: Omit<ListNumbersQuery, 'status'>): Promise<Paged<NumberListItem>> {
    return this.listNumbers({ ...query, status: 'risk_pending' });
  }

  async getNumberDetail(phone: string): Promise<NumberDetail> {
    const phoneNumber = normalizePhoneNumber(phone);

    const [number] = await this.db
      .select(listSelection)
      .from(mobileNumbers)
      .leftJoin(applicant, eq(mobileNumbers.applicantEmployeeId, applicant.employeeId))
      .leftJoin(holder, eq(mobileNumbers.currentHolderEmployeeId, holder.employeeId))
      .where(and(eq(mobileNumbers.phoneNumber, phoneNumber), isNull(mobileNumbers.deletedAt)))
      .limit(1);
    if (!number) {
      throw new NotFoundError(`Number ${phoneNumber} not found`, 'NUMBER_NOT_FOUND');
    }

    const usageHistory = await this.db
      .select()
      .from(numberUsageHistory)
      .where(eq(numberUsageHistory.mobileNumberId, number.id))
      .orderBy(desc(numberUsageHistory.startDate), desc(numberUsageHistory.id));

    const applicantHistory = await this.db
      .select()
      .from(numberApplicantHistory)
      .where(eq(numberApplicantHistory.mobileNumberId, number.id))
      .orderBy(desc(numberApplicantHistory.id));

    return { ...number, usageHistory, applicantHistory };
  }
}
