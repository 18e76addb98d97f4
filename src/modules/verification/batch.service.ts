import { v4 as uuidv4 } from 'uuid';
import { and, asc, eq, inArray, lt } from 'drizzle-orm';
import type { Database } from '../../db';
import { BATCH_SCOPES, verificationBatchTasks, verificationTokens } from '../../db/schema';
import type { BatchScope, VerificationBatchTask } from '../../db/schema';
import { NotFoundError, ValidationError } from '../../utils/errors';
import { systemClock } from '../../utils/clock';
import type { Clock } from '../../utils/clock';
import { moduleLogger } from '../../utils/logger';
import type { EmployeeDirectory, EmployeeScope } from '../employees/employee.types';
import type { BatchWorker } from './batch-worker';
import type { BatchStatusView, InitiateVerificationInput, InitiatedBatch } from './verification.types';

const log = moduleLogger('verification-batch');

export interface BatchServiceOptions {
  defaultTokenLifetimeDays: number;
  maxTokenLifetimeDays: number;
  clock?: Clock;
}

function isBatchScope(value: string): value is BatchScope {
  return BATCH_SCOPES.some((scope) => scope === value);
}

function toEmployeeScope(scope: BatchScope, values: string[]): EmployeeScope {
  switch (scope) {
    case 'all_users':
      return { kind: 'all' };
    case 'department':
      return { kind: 'departments', names: values };
    case 'employee_ids':
      return { kind: 'ids', ids: values };
  }
}

function toStatusView(task: VerificationBatchTask): BatchStatusView {
  return {
    batchId: task.id,
    status: task.status,
    scope: task.scopeType,
    scopeValues: task.scopeValues,
    tokenLifetimeDays: task.tokenLifetimeDays,
    totalToProcess: task.totalToProcess,
    tokensGenerated: task.tokensGenerated,
    emailsAttempted: task.emailsAttempted,
    emailsSucceeded: task.emailsSucceeded,
    emailsFailed: task.emailsFailed,
    errorSummary: task.errorSummary,
    failureDetails: task.failureDetails,
    createdAt: task.createdAt,
    startedAt: task.startedAt,
    completedAt: task.completedAt,
  };
}

/**
 * Verification campaign orchestration: scope resolution, task creation and
 * hand-off to the background worker, plus status polling.
 */
export class VerificationBatchService {
  private readonly clock: Clock;

  constructor(
    private readonly db: Database,
    private readonly employees: EmployeeDirectory,
    private readonly worker: BatchWorker,
    private readonly options: BatchServiceOptions,
  ) {
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Resolves the scope synchronously. An empty resolution fails here and no
   * task is persisted; otherwise the task is created Pending, queued, and
   * its id returned without waiting for processing.
   */
  async initiateVerification(input: InitiateVerificationInput): Promise<InitiatedBatch> {
    const scope: string = input.scope;
    if (!isBatchScope(scope)) {
      throw new ValidationError(`Unknown scope "${scope}", expected one of ${BATCH_SCOPES.join(', ')}`, 'INVALID_SCOPE');
    }

    const scopeValues = Array.from(new Set((input.scopeValues ?? []).map((value) => value.trim()).filter(Boolean)));
    if (scope !== 'all_users' && scopeValues.length === 0) {
      throw new ValidationError(`Scope "${scope}" requires at least one value`, 'SCOPE_VALUES_REQUIRED');
    }

    const durationDays = input.durationDays ?? this.options.defaultTokenLifetimeDays;
    if (!Number.isInteger(durationDays) || durationDays < 1 || durationDays > this.options.maxTokenLifetimeDays) {
      throw new ValidationError(
        `durationDays must be an integer between 1 and ${this.options.maxTokenLifetimeDays}`,
        'INVALID_DURATION',
      );
    }

    const targets = await this.employees.findActiveByScope(toEmployeeScope(scope, scope === 'all_users' ? [] : scopeValues));
    if (targets.length === 0) {
      throw new ValidationError('No active employees match the requested scope', 'EMPTY_SCOPE');
    }

    const batchId = uuidv4();
    const targetEmployeeIds = targets.map((employee) => employee.employeeId);
    await this.db.insert(verificationBatchTasks).values({
      id: batchId,
      status: 'Pending',
      scopeType: scope,
      scopeValues: scope === 'all_users' ? [] : scopeValues,
      tokenLifetimeDays: durationDays,
      targetEmployeeIds,
      totalToProcess: targetEmployeeIds.length,
      createdAt: this.clock(),
    });

    this.worker.enqueue(batchId);
    log.info({ batchId, scope, total: targetEmployeeIds.length, durationDays }, 'verification batch initiated');

    return { batchId, totalToProcess: targetEmployeeIds.length };
  }

  async getBatchStatus(batchId: string): Promise<BatchStatusView> {
    const [task] = await this.db
      .select()
      .from(verificationBatchTasks)
      .where(eq(verificationBatchTasks.id, batchId))
      .limit(1);
    if (!task) {
      throw new NotFoundError(`Batch task ${batchId} not found`, 'BATCH_NOT_FOUND');
    }
    return toStatusView(task);
  }

  /** Re-queues tasks a previous process left Pending or InProgress. */
  async resumeUnfinished(): Promise<string[]> {
    const unfinished = await this.db
      .select({ id: verificationBatchTasks.id })
      .from(verificationBatchTasks)
      .where(inArray(verificationBatchTasks.status, ['Pending', 'InProgress']))
      .orderBy(asc(verificationBatchTasks.createdAt));

    const ids = unfinished.map((task) => task.id);
    for (const id of ids) {
      this.worker.enqueue(id);
    }
    if (ids.length > 0) {
      log.warn({ count: ids.length }, 'resuming unfinished verification batches');
    }
    return ids;
  }

  /** Marks pending tokens past their expiry as expired. Returns how many changed. */
  async expireOverdueTokens(): Promise<number> {
    const now = this.clock();
    const expired = await this.db.update(verificationTokens)
      .set({ status: 'expired', updatedAt: now })
      .where(and(eq(verificationTokens.status, 'pending'), lt(verificationTokens.expiresAt, now)))
      .returning({ id: verificationTokens.id });
    return expired.length;
  }
}
