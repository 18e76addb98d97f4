import { randomBytes } from 'crypto';
import { and, eq, inArray, sql } from 'drizzle-orm';
import type { Database } from '../../db';
import { verificationBatchTasks, verificationTokens } from '../../db/schema';
import type { DispatchFailure, Employee, VerificationBatchTask, VerificationToken } from '../../db/schema';
import type { VerificationMailer } from '../../services/email.service';
import type { EmployeeDirectory } from '../employees/employee.types';
import { addDays, systemClock } from '../../utils/clock';
import type { Clock } from '../../utils/clock';
import { withTimeout } from '../../utils/timeout';
import { moduleLogger } from '../../utils/logger';
import type { BatchTaskProcessor } from './batch-worker';

const log = moduleLogger('batch-processor');

const NON_TERMINAL = ['Pending', 'InProgress'] as const;

export const MISSING_EMAIL_REASON = 'Missing email address';
export const MISSING_EMPLOYEE_REASON = 'Employee record not found';

export interface BatchProcessorOptions {
  frontendBaseUrl: string;
  emailTimeoutMs: number;
  emailMaxAttempts: number;
  clock?: Clock;
}

type DispatchOutcome = { ok: true } | { ok: false; reason: string };
type Recipient = Pick<Employee, 'employeeId' | 'fullName' | 'email'>;

export function generateVerificationToken(): string {
  return randomBytes(32).toString('base64url');
}

export function buildVerificationLink(frontendBaseUrl: string, token: string): string {
  return `${frontendBaseUrl}/verify-numbers?token=${encodeURIComponent(token)}`;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Runs one verification batch: a token and an email per target employee,
 * one employee at a time. Every employee's outcome is committed on its own
 * so a crash leaves a readable, partially progressed task. Re-running a
 * task skips employees whose token was already dispatched.
 */
export class BatchProcessor implements BatchTaskProcessor {
  private readonly clock: Clock;

  constructor(
    private readonly db: Database,
    private readonly employees: EmployeeDirectory,
    private readonly mailer: VerificationMailer,
    private readonly options: BatchProcessorOptions,
  ) {
    this.clock = options.clock ?? systemClock;
  }

  async process(taskId: string): Promise<void> {
    const [task] = await this.db
      .select()
      .from(verificationBatchTasks)
      .where(eq(verificationBatchTasks.id, taskId))
      .limit(1);
    if (!task) {
      log.warn({ taskId }, 'batch task not found, skipping');
      return;
    }
    if (task.status !== 'Pending' && task.status !== 'InProgress') {
      log.info({ taskId, status: task.status }, 'batch task already terminal, skipping');
      return;
    }

    const now = this.clock();
    await this.db.update(verificationBatchTasks)
      .set({ status: 'InProgress', startedAt: task.startedAt ?? now, updatedAt: now })
      .where(this.whereOpen(taskId));

    let targets: Employee[];
    try {
      targets = await this.employees.findByIds(task.targetEmployeeIds);
    } catch (error) {
      await this.markFailed(taskId, `Employee enumeration failed: ${errorMessage(error)}`);
      return;
    }

    const byId = new Map(targets.map((employee) => [employee.employeeId, employee]));
    log.info({ taskId, total: task.targetEmployeeIds.length }, 'processing verification batch');

    try {
      for (const employeeId of task.targetEmployeeIds) {
        const employee = byId.get(employeeId);
        if (!employee) {
          await this.recordUnreachable(task, employeeId);
          continue;
        }
        await this.processEmployee(task, employee);
      }

      await this.finalize(taskId);
    } catch (error) {
      // A task never stays InProgress after its run; a store failure ends it
      await this.markFailed(taskId, `Batch processing aborted: ${errorMessage(error)}`);
    }
  }

  private async processEmployee(task: VerificationBatchTask, employee: Employee): Promise<void> {
    const [existing] = await this.db
      .select()
      .from(verificationTokens)
      .where(and(
        eq(verificationTokens.batchTaskId, task.id),
        eq(verificationTokens.employeeId, employee.employeeId),
      ))
      .limit(1);

    if (existing && existing.dispatchStatus !== 'queued') {
      return;
    }

    let token: VerificationToken;
    if (existing) {
      token = existing;
    } else {
      try {
        token = await this.issueToken(task, employee);
      } catch (error) {
        log.error({ err: error, taskId: task.id, employeeId: employee.employeeId }, 'token generation failed');
        await this.recordOutcome(task.id, null, employee, { ok: false, reason: `Token generation failed: ${errorMessage(error)}` });
        return;
      }
    }

    const outcome: DispatchOutcome = employee.email
      ? await this.dispatch(employee.email, employee, token)
      : { ok: false, reason: MISSING_EMAIL_REASON };

    await this.recordOutcome(task.id, token, employee, outcome);
  }

  private async issueToken(task: VerificationBatchTask, employee: Employee): Promise<VerificationToken> {
    const now = this.clock();
    return this.db.transaction(async (tx) => {
      const [token] = await tx.insert(verificationTokens).values({
        token: generateVerificationToken(),
        employeeId: employee.employeeId,
        batchTaskId: task.id,
        status: 'pending',
        expiresAt: addDays(now, task.tokenLifetimeDays),
        dispatchStatus: 'queued',
      }).returning();

      await tx.update(verificationBatchTasks)
        .set({
          tokensGenerated: sql`${verificationBatchTasks.tokensGenerated} + 1`,
          updatedAt: now,
        })
        .where(eq(verificationBatchTasks.id, task.id));

      return token;
    });
  }

  private async dispatch(email: string, employee: Employee, token: VerificationToken): Promise<DispatchOutcome> {
    const message = {
      to: email,
      employeeName: employee.fullName,
      verificationLink: buildVerificationLink(this.options.frontendBaseUrl, token.token),
      expiresAt: token.expiresAt,
    };

    let lastError = 'unknown error';
    for (let attempt = 1; attempt <= this.options.emailMaxAttempts; attempt++) {
      try {
        await withTimeout(this.mailer.sendVerificationEmail(message), this.options.emailTimeoutMs, 'verification email');
        return { ok: true };
      } catch (error) {
        lastError = errorMessage(error);
        log.warn({ employeeId: employee.employeeId, attempt, err: error }, 'verification email attempt failed');
      }
    }
    return { ok: false, reason: lastError };
  }

  /** Email outcome, token dispatch state and counters commit together. */
  private async recordOutcome(
    taskId: string,
    token: VerificationToken | null,
    employee: Recipient,
    outcome: DispatchOutcome,
  ): Promise<void> {
    const now = this.clock();
    await this.db.transaction(async (tx) => {
      if (token) {
        await tx.update(verificationTokens)
          .set({
            dispatchStatus: outcome.ok ? 'sent' : 'failed',
            dispatchError: outcome.ok ? null : outcome.reason,
            updatedAt: now,
          })
          .where(eq(verificationTokens.id, token.id));
      }

      if (outcome.ok) {
        await tx.update(verificationBatchTasks)
          .set({
            emailsAttempted: sql`${verificationBatchTasks.emailsAttempted} + 1`,
            emailsSucceeded: sql`${verificationBatchTasks.emailsSucceeded} + 1`,
            updatedAt: now,
          })
          .where(eq(verificationBatchTasks.id, taskId));
        return;
      }

      const failure: DispatchFailure = {
        employeeId: employee.employeeId,
        employeeName: employee.fullName,
        emailAddress: employee.email,
        reason: outcome.reason,
      };
      await tx.update(verificationBatchTasks)
        .set({
          emailsAttempted: sql`${verificationBatchTasks.emailsAttempted} + 1`,
          emailsFailed: sql`${verificationBatchTasks.emailsFailed} + 1`,
          failureDetails: sql`${verificationBatchTasks.failureDetails} || ${JSON.stringify([failure])}::jsonb`,
          updatedAt: now,
        })
        .where(eq(verificationBatchTasks.id, taskId));
    });

    if (!outcome.ok) {
      log.warn({ taskId, employeeId: employee.employeeId, reason: outcome.reason }, 'verification dispatch failed');
    }
  }

  private async recordUnreachable(task: VerificationBatchTask, employeeId: string): Promise<void> {
    const [already] = await this.db
      .select({ id: verificationTokens.id })
      .from(verificationTokens)
      .where(and(eq(verificationTokens.batchTaskId, task.id), eq(verificationTokens.employeeId, employeeId)))
      .limit(1);
    const recorded = task.failureDetails.some((failure) => failure.employeeId === employeeId);
    if (already || recorded) return;

    await this.recordOutcome(task.id, null, {
      employeeId,
      fullName: employeeId,
      email: null,
    }, { ok: false, reason: MISSING_EMPLOYEE_REASON });
  }

  private async finalize(taskId: string): Promise<void> {
    const [task] = await this.db
      .select({ emailsFailed: verificationBatchTasks.emailsFailed })
      .from(verificationBatchTasks)
      .where(eq(verificationBatchTasks.id, taskId));
    if (!task) return;

    const status = task.emailsFailed === 0 ? 'Completed' : 'CompletedWithErrors';
    const now = this.clock();
    await this.db.update(verificationBatchTasks)
      .set({ status, completedAt: now, updatedAt: now })
      .where(this.whereOpen(taskId));
    log.info({ taskId, status }, 'verification batch completed');
  }

  private async markFailed(taskId: string, reason: string): Promise<void> {
    const now = this.clock();
    await this.db.update(verificationBatchTasks)
      .set({ status: 'Failed', errorSummary: reason, completedAt: now, updatedAt: now })
      .where(this.whereOpen(taskId));
    log.error({ taskId, reason }, 'verification batch failed');
  }

  private whereOpen(taskId: string) {
    return and(eq(verificationBatchTasks.id, taskId), inArray(verificationBatchTasks.status, [...NON_TERMINAL]));
  }
}
