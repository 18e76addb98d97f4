import { and, asc, count, desc, eq, gt, inArray, isNotNull, isNull, ne } from 'drizzle-orm';
import type { SQL } from 'drizzle-orm';
import { alias } from 'drizzle-orm/pg-core';
import type { Database } from '../../db';
import {
  employees,
  mobileNumbers,
  userReportedIssues,
  verificationSubmissionLog,
  verificationTokens,
} from '../../db/schema';
import type { NumberStatus, UserReportedIssue } from '../../db/schema';
import { InvalidStateError, NotFoundError, ValidationError } from '../../utils/errors';
import { optionalText } from '../../utils/validators';
import { systemClock } from '../../utils/clock';
import type { Clock } from '../../utils/clock';
import { moduleLogger } from '../../utils/logger';
import type {
  AdminStatusFilters,
  AdminStatusView,
  ConfirmedPhoneDetail,
  ReportedIssueDetail,
  ResolveIssueInput,
  UnlistedNumberDetail,
  VerificationSummary,
} from './verification.types';

const log = moduleLogger('verification-admin');

const holder = alias(employees, 'holder');
const confirmer = alias(employees, 'confirmer');
const applicant = alias(employees, 'applicant');

/**
 * Read-only campaign view computed from the submission log and the live
 * roster, plus the administrator's issue close-out.
 *
 * "Latest" is the newest log row per number by created_at, ties broken by
 * insertion order (id), so repeated submissions are last-write-wins.
 */
export class VerificationAdminService {
  constructor(private readonly db: Database, private readonly clock: Clock = systemClock) {}

  async getStatus(filters: AdminStatusFilters = {}): Promise<AdminStatusView> {
    const employeeId = filters.employeeId?.trim() || undefined;
    const departmentName = filters.departmentName?.trim() || undefined;

    const [summary, confirmedPhones] = await this.computeSummary();

    return {
      summary,
      confirmedPhones,
      pendingUsers: await this.findPendingUsers(employeeId, departmentName),
      reportedIssues: await this.findReportedIssues(employeeId, departmentName),
      unlistedNumbers: await this.findUnlistedNumbers(employeeId, departmentName),
    };
  }

  async resolveIssue(issueId: number, input: ResolveIssueInput): Promise<UserReportedIssue> {
    if (input.status !== 'resolved' && input.status !== 'dismissed') {
      throw new ValidationError(`Issue status must be resolved or dismissed, got "${String(input.status)}"`);
    }
    const remarks = optionalText(input.remarks) ?? null;

    const updated = await this.db.transaction(async (tx) => {
      const [issue] = await tx
        .select()
        .from(userReportedIssues)
        .where(eq(userReportedIssues.id, issueId))
        .for('update');
      if (!issue) {
        throw new NotFoundError(`Issue ${issueId} not found`, 'ISSUE_NOT_FOUND');
      }
      if (issue.adminActionStatus !== 'pending_review') {
        throw new InvalidStateError(`Issue ${issueId} is already ${issue.adminActionStatus}`);
      }

      const now = this.clock();
      const [closed] = await tx.update(userReportedIssues)
        .set({ adminActionStatus: input.status, adminRemarks: remarks, resolvedAt: now, updatedAt: now })
        .where(eq(userReportedIssues.id, issueId))
        .returning();

      if (issue.mobileNumberId !== null) {
        await this.clearReportedFlag(tx, issue.mobileNumberId, issue.originalStatus, now);
      }
      return closed;
    });

    log.info({ issueId, status: input.status }, 'reported issue closed');
    return updated;
  }

  /**
   * A number stays `user_reported` while any report on it is pending. Once
   * the last one is closed it goes back to `risk_pending` when it was
   * reported in that state or its applicant has departed, otherwise to
   * in_use (held) or idle.
   */
  private async clearReportedFlag(
    tx: Database,
    mobileNumberId: number,
    originalStatus: string | null,
    now: Date,
  ): Promise<void> {
    const [stillPending] = await tx
      .select({ total: count() })
      .from(userReportedIssues)
      .where(and(
        eq(userReportedIssues.mobileNumberId, mobileNumberId),
        eq(userReportedIssues.adminActionStatus, 'pending_review'),
      ));
    if (stillPending && stillPending.total > 0) return;

    const [number] = await tx
      .select({
        status: mobileNumbers.status,
        holderId: mobileNumbers.currentHolderEmployeeId,
        applicantStatus: applicant.employmentStatus,
      })
      .from(mobileNumbers)
      .leftJoin(applicant, eq(mobileNumbers.applicantEmployeeId, applicant.employeeId))
      .where(eq(mobileNumbers.id, mobileNumberId));
    if (!number || number.status !== 'user_reported') return;

    let restored: NumberStatus = number.holderId ? 'in_use' : 'idle';
    if (originalStatus === 'risk_pending' || number.applicantStatus === 'Departed') {
      restored = 'risk_pending';
    }

    await tx.update(mobileNumbers)
      .set({ status: restored, updatedAt: now })
      .where(eq(mobileNumbers.id, mobileNumberId));
    log.info({ mobileNumberId, status: restored }, 'reported flag cleared');
  }

  private async computeSummary(): Promise<[VerificationSummary, ConfirmedPhoneDetail[]]> {
    const eligible = and(isNull(mobileNumbers.deletedAt), ne(mobileNumbers.status, 'deactivated'));

    const [{ total }] = await this.db
      .select({ total: count() })
      .from(mobileNumbers)
      .where(eligible);

    const latest = await this.db
      .selectDistinctOn([verificationSubmissionLog.mobileNumberId], {
        mobileNumberId: verificationSubmissionLog.mobileNumberId,
        numberId: mobileNumbers.id,
        actionType: verificationSubmissionLog.actionType,
        purpose: verificationSubmissionLog.purpose,
        confirmedAt: verificationSubmissionLog.createdAt,
        confirmedBy: confirmer.fullName,
        confirmerId: verificationSubmissionLog.employeeId,
        phoneNumber: mobileNumbers.phoneNumber,
        numberPurpose: mobileNumbers.purpose,
        currentUser: holder.fullName,
        departmentName: holder.departmentName,
      })
      .from(verificationSubmissionLog)
      .innerJoin(mobileNumbers, eq(verificationSubmissionLog.mobileNumberId, mobileNumbers.id))
      .leftJoin(holder, eq(mobileNumbers.currentHolderEmployeeId, holder.employeeId))
      .leftJoin(confirmer, eq(verificationSubmissionLog.employeeId, confirmer.employeeId))
      .where(and(
        eligible,
        isNotNull(verificationSubmissionLog.mobileNumberId),
        inArray(verificationSubmissionLog.actionType, ['confirm_usage', 'report_issue']),
      ))
      .orderBy(
        verificationSubmissionLog.mobileNumberId,
        desc(verificationSubmissionLog.createdAt),
        desc(verificationSubmissionLog.id),
      );

    const confirmed = latest.filter((entry) => entry.actionType === 'confirm_usage');
    const reportedCount = latest.filter((entry) => entry.actionType === 'report_issue').length;

    const unlistedPhones = await this.db
      .selectDistinct({ phoneNumber: verificationSubmissionLog.phoneNumber })
      .from(verificationSubmissionLog)
      .where(eq(verificationSubmissionLog.actionType, 'report_unlisted'));

    const summary: VerificationSummary = {
      totalPhonesCount: total,
      confirmedPhonesCount: confirmed.length,
      reportedIssuesCount: reportedCount,
      pendingPhonesCount: total - latest.length,
      newlyReportedPhonesCount: unlistedPhones.length,
    };

    const confirmedPhones: ConfirmedPhoneDetail[] = confirmed
      .map((entry) => ({
        id: entry.numberId,
        phoneNumber: entry.phoneNumber,
        departmentName: entry.departmentName,
        currentUser: entry.currentUser,
        purpose: entry.purpose ?? entry.numberPurpose,
        confirmedBy: entry.confirmedBy ?? entry.confirmerId,
        confirmedAt: entry.confirmedAt,
      }))
      .sort((a, b) => b.confirmedAt.getTime() - a.confirmedAt.getTime());

    return [summary, confirmedPhones];
  }

  private async findPendingUsers(employeeId?: string, departmentName?: string) {
    const conditions: SQL[] = [
      eq(verificationTokens.status, 'pending'),
      gt(verificationTokens.expiresAt, this.clock()),
    ];
    if (employeeId) conditions.push(eq(verificationTokens.employeeId, employeeId));
    if (departmentName) conditions.push(eq(employees.departmentName, departmentName));

    return this.db
      .select({
        tokenId: verificationTokens.id,
        employeeId: verificationTokens.employeeId,
        fullName: employees.fullName,
        email: employees.email,
        departmentName: employees.departmentName,
        expiresAt: verificationTokens.expiresAt,
      })
      .from(verificationTokens)
      .innerJoin(employees, eq(verificationTokens.employeeId, employees.employeeId))
      .where(and(...conditions))
      .orderBy(asc(verificationTokens.expiresAt), asc(verificationTokens.id));
  }

  private issueConditions(issueType: 'number_issue' | 'unlisted_number', employeeId?: string, departmentName?: string): SQL[] {
    const conditions: SQL[] = [eq(userReportedIssues.issueType, issueType)];
    if (employeeId) conditions.push(eq(userReportedIssues.employeeId, employeeId));
    if (departmentName) conditions.push(eq(employees.departmentName, departmentName));
    return conditions;
  }

  private async findReportedIssues(employeeId?: string, departmentName?: string): Promise<ReportedIssueDetail[]> {
    return this.db
      .select({
        issueId: userReportedIssues.id,
        phoneNumber: mobileNumbers.phoneNumber,
        reportedBy: employees.fullName,
        employeeId: userReportedIssues.employeeId,
        comment: userReportedIssues.userComment,
        purpose: userReportedIssues.purpose,
        originalStatus: userReportedIssues.originalStatus,
        adminActionStatus: userReportedIssues.adminActionStatus,
        reportedAt: userReportedIssues.updatedAt,
      })
      .from(userReportedIssues)
      .innerJoin(employees, eq(userReportedIssues.employeeId, employees.employeeId))
      .leftJoin(mobileNumbers, eq(userReportedIssues.mobileNumberId, mobileNumbers.id))
      .where(and(...this.issueConditions('number_issue', employeeId, departmentName)))
      .orderBy(desc(userReportedIssues.updatedAt), desc(userReportedIssues.id));
  }

  private async findUnlistedNumbers(employeeId?: string, departmentName?: string): Promise<UnlistedNumberDetail[]> {
    return this.db
      .select({
        issueId: userReportedIssues.id,
        phoneNumber: userReportedIssues.reportedPhoneNumber,
        reportedBy: employees.fullName,
        employeeId: userReportedIssues.employeeId,
        purpose: userReportedIssues.purpose,
        comment: userReportedIssues.userComment,
        adminActionStatus: userReportedIssues.adminActionStatus,
        reportedAt: userReportedIssues.updatedAt,
      })
      .from(userReportedIssues)
      .innerJoin(employees, eq(userReportedIssues.employeeId, employees.employeeId))
      .where(and(...this.issueConditions('unlisted_number', employeeId, departmentName)))
      .orderBy(desc(userReportedIssues.updatedAt), desc(userReportedIssues.id));
  }
}
