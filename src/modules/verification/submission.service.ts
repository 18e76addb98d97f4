import { and, asc, desc, eq, inArray, isNull, sql } from 'drizzle-orm';
import type { Database } from '../../db';
import {
  mobileNumbers,
  userReportedIssues,
  verificationSubmissionLog,
  verificationTokens,
} from '../../db/schema';
import type { VerificationToken } from '../../db/schema';
import { InvalidVerificationLinkError, ValidationError } from '../../utils/errors';
import { normalizePhoneNumber, optionalText, requireNonBlank } from '../../utils/validators';
import { systemClock } from '../../utils/clock';
import type { Clock } from '../../utils/clock';
import { moduleLogger } from '../../utils/logger';
import type { EmployeeDirectory } from '../employees/employee.types';
import type {
  ReportedUnlistedNumberView,
  SubmissionResult,
  SubmitVerificationInput,
  VerificationInfo,
  VerificationState,
} from './verification.types';

const log = moduleLogger('verification-submission');

// Matches the partial unique indexes on user_reported_issues
const PENDING_ISSUE = sql.raw(`admin_action_status = 'pending_review'`);

/**
 * Token-gated employee side of a campaign. Tokens are never consumed: an
 * employee may submit again until the token expires, and the latest log
 * entry wins.
 */
export class VerificationSubmissionService {
  constructor(
    private readonly db: Database,
    private readonly employees: EmployeeDirectory,
    private readonly clock: Clock = systemClock,
  ) {}

  async getInfo(rawToken: string): Promise<VerificationInfo> {
    const token = await this.validateToken(this.db, rawToken);

    const employee = await this.employees.getById(token.employeeId);
    if (!employee) {
      throw new InvalidVerificationLinkError('NotFound', `Employee ${token.employeeId} of token no longer exists`);
    }

    const numbers = await this.db
      .select({
        id: mobileNumbers.id,
        phoneNumber: mobileNumbers.phoneNumber,
        purpose: mobileNumbers.purpose,
        status: mobileNumbers.status,
      })
      .from(mobileNumbers)
      .where(and(eq(mobileNumbers.currentHolderEmployeeId, employee.employeeId), isNull(mobileNumbers.deletedAt)))
      .orderBy(asc(mobileNumbers.phoneNumber));

    const latest = numbers.length === 0 ? [] : await this.db
      .selectDistinctOn([verificationSubmissionLog.mobileNumberId], {
        mobileNumberId: verificationSubmissionLog.mobileNumberId,
        actionType: verificationSubmissionLog.actionType,
        userComment: verificationSubmissionLog.userComment,
      })
      .from(verificationSubmissionLog)
      .where(and(
        eq(verificationSubmissionLog.verificationTokenId, token.id),
        inArray(verificationSubmissionLog.mobileNumberId, numbers.map((number) => number.id)),
      ))
      .orderBy(
        verificationSubmissionLog.mobileNumberId,
        desc(verificationSubmissionLog.createdAt),
        desc(verificationSubmissionLog.id),
      );
    const latestByNumber = new Map(latest.map((entry) => [entry.mobileNumberId, entry]));

    const unlisted = await this.db
      .selectDistinctOn([verificationSubmissionLog.phoneNumber], {
        phoneNumber: verificationSubmissionLog.phoneNumber,
        purpose: verificationSubmissionLog.purpose,
        userComment: verificationSubmissionLog.userComment,
        reportedAt: verificationSubmissionLog.createdAt,
      })
      .from(verificationSubmissionLog)
      .where(and(
        eq(verificationSubmissionLog.verificationTokenId, token.id),
        eq(verificationSubmissionLog.actionType, 'report_unlisted'),
      ))
      .orderBy(
        verificationSubmissionLog.phoneNumber,
        desc(verificationSubmissionLog.createdAt),
        desc(verificationSubmissionLog.id),
      );

    return {
      employee: {
        employeeId: employee.employeeId,
        fullName: employee.fullName,
        departmentName: employee.departmentName,
      },
      numbers: numbers.map((number) => {
        const entry = latestByNumber.get(number.id);
        let verificationState: VerificationState = 'pending';
        if (entry?.actionType === 'confirm_usage') verificationState = 'confirmed';
        if (entry?.actionType === 'report_issue') verificationState = 'reported';
        return {
          ...number,
          verificationState,
          userComment: verificationState === 'reported' && entry ? entry.userComment : null,
        };
      }),
      previouslyReportedUnlisted: unlisted satisfies ReportedUnlistedNumberView[],
      expiresAt: token.expiresAt,
    };
  }

  async submit(rawToken: string, input: SubmitVerificationInput): Promise<SubmissionResult> {
    const result = await this.db.transaction(async (tx) => {
      // Link first: an invalid link wins over a malformed body
      const token = await this.validateToken(tx, rawToken);
      const { verified, unlistedEntries } = this.parseSubmission(input);
      const employeeId = token.employeeId;
      const now = this.clock();
      const counts: SubmissionResult = { confirmed: 0, reported: 0, unlisted: 0 };

      for (const entry of verified) {
        const [number] = await tx
          .select()
          .from(mobileNumbers)
          .where(and(eq(mobileNumbers.id, entry.mobileNumberId), isNull(mobileNumbers.deletedAt)))
          .for('update');
        if (!number || number.currentHolderEmployeeId !== employeeId) {
          throw new ValidationError(`Number ${entry.mobileNumberId} is not currently assigned to you`, 'NUMBER_NOT_HELD');
        }

        const purpose = optionalText(entry.purpose);
        const userComment = optionalText(entry.userComment) ?? null;

        if (entry.action === 'confirm_usage') {
          await tx.update(mobileNumbers)
            .set({ lastConfirmationDate: now, purpose, updatedAt: now })
            .where(eq(mobileNumbers.id, number.id));
          counts.confirmed++;
        } else {
          if (!userComment) {
            throw new ValidationError(`A comment is required to report ${number.phoneNumber}`);
          }
          await tx.update(mobileNumbers)
            .set({ status: 'user_reported', updatedAt: now })
            .where(eq(mobileNumbers.id, number.id));

          await tx.insert(userReportedIssues)
            .values({
              verificationTokenId: token.id,
              employeeId,
              mobileNumberId: number.id,
              issueType: 'number_issue',
              userComment,
              purpose: purpose ?? number.purpose,
              originalStatus: number.status,
              adminActionStatus: 'pending_review',
              createdAt: now,
              updatedAt: now,
            })
            .onConflictDoUpdate({
              target: [userReportedIssues.employeeId, userReportedIssues.mobileNumberId],
              targetWhere: PENDING_ISSUE,
              set: { userComment, verificationTokenId: token.id, updatedAt: now },
            });
          counts.reported++;
        }

        await tx.insert(verificationSubmissionLog).values({
          employeeId,
          verificationTokenId: token.id,
          mobileNumberId: number.id,
          phoneNumber: number.phoneNumber,
          actionType: entry.action,
          purpose: purpose ?? null,
          userComment,
          createdAt: now,
        });
      }

      for (const entry of unlistedEntries) {
        await tx.insert(userReportedIssues)
          .values({
            verificationTokenId: token.id,
            employeeId,
            reportedPhoneNumber: entry.phoneNumber,
            issueType: 'unlisted_number',
            userComment: entry.userComment,
            purpose: entry.purpose,
            adminActionStatus: 'pending_review',
            createdAt: now,
            updatedAt: now,
          })
          .onConflictDoUpdate({
            target: [userReportedIssues.employeeId, userReportedIssues.reportedPhoneNumber],
            targetWhere: PENDING_ISSUE,
            set: {
              userComment: entry.userComment,
              purpose: entry.purpose,
              verificationTokenId: token.id,
              updatedAt: now,
            },
          });

        await tx.insert(verificationSubmissionLog).values({
          employeeId,
          verificationTokenId: token.id,
          phoneNumber: entry.phoneNumber,
          actionType: 'report_unlisted',
          purpose: entry.purpose,
          userComment: entry.userComment,
          createdAt: now,
        });
        counts.unlisted++;
      }

      return { employeeId, counts };
    });

    log.info({ employeeId: result.employeeId, ...result.counts }, 'verification submission recorded');
    return result.counts;
  }

  private parseSubmission(input: SubmitVerificationInput) {
    const verified = input.verifiedNumbers ?? [];
    const unlisted = input.unlistedNumbers ?? [];
    if (verified.length === 0 && unlisted.length === 0) {
      throw new ValidationError('Nothing to submit');
    }

    const seen = new Set<number>();
    for (const entry of verified) {
      if (seen.has(entry.mobileNumberId)) {
        throw new ValidationError(`Number ${entry.mobileNumberId} appears more than once`);
      }
      seen.add(entry.mobileNumberId);
      if (entry.action !== 'confirm_usage' && entry.action !== 'report_issue') {
        throw new ValidationError(`Unknown action "${String(entry.action)}"`);
      }
    }
    const unlistedEntries = unlisted.map((entry) => ({
      phoneNumber: normalizePhoneNumber(entry.phoneNumber),
      purpose: requireNonBlank(entry.purpose, 'purpose'),
      userComment: optionalText(entry.userComment) ?? null,
    }));
    return { verified, unlistedEntries };
  }

  /**
   * Token must exist, still be pending and not be past its expiry.
   * All three failures share one error type so callers can collapse them.
   */
  private async validateToken(executor: Database, rawToken: string): Promise<VerificationToken> {
    const value = rawToken.trim();
    if (!value) {
      throw new InvalidVerificationLinkError('NotFound', 'Verification token missing');
    }

    const [token] = await executor
      .select()
      .from(verificationTokens)
      .where(eq(verificationTokens.token, value))
      .limit(1);
    if (!token) {
      throw new InvalidVerificationLinkError('NotFound', 'Verification token not found');
    }
    if (token.status !== 'pending' || this.clock().getTime() > token.expiresAt.getTime()) {
      throw new InvalidVerificationLinkError('Expired', 'Verification token expired');
    }
    return token;
  }
}
