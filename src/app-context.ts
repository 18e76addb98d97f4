import type { Database } from './db';
import type { AppConfig } from './config/env';
import type { VerificationMailer } from './services/email.service';
import { systemClock } from './utils/clock';
import type { Clock } from './utils/clock';
import { EmployeeService } from './modules/employees/employee.service';
import { NumberLifecycleService } from './modules/numbers/number-lifecycle.service';
import { NumberQueryService } from './modules/numbers/number-query.service';
import { BatchProcessor } from './modules/verification/batch-processor';
import { BatchWorker } from './modules/verification/batch-worker';
import { VerificationBatchService } from './modules/verification/batch.service';
import { VerificationSubmissionService } from './modules/verification/submission.service';
import { VerificationAdminService } from './modules/verification/admin-status.service';
import { AuthService } from './modules/auth/auth.service';
import { DbRevocationStore } from './modules/auth/revocation-store';
import type { RevocationStore } from './modules/auth/revocation-store';

export interface AppServices {
  employees: EmployeeService;
  numberLifecycle: NumberLifecycleService;
  numberQueries: NumberQueryService;
  batchWorker: BatchWorker;
  verificationBatches: VerificationBatchService;
  verificationSubmissions: VerificationSubmissionService;
  verificationAdmin: VerificationAdminService;
  auth: AuthService;
}

export interface ServiceDependencies {
  config: AppConfig;
  mailer: VerificationMailer;
  clock?: Clock;
  revocations?: RevocationStore;
}

/**
 * Builds the service graph over one database handle. Departures flow from
 * the employee service to the lifecycle manager through the status
 * listener, inside the same transaction.
 */
export function createServices(db: Database, deps: ServiceDependencies): AppServices {
  const { config } = deps;
  const clock = deps.clock ?? systemClock;

  const employees = new EmployeeService(db, clock);
  const numberLifecycle = new NumberLifecycleService(db, employees, clock);
  employees.onStatusChanged(numberLifecycle.handleEmployeeStatusChanged);

  const processor = new BatchProcessor(db, employees, deps.mailer, {
    frontendBaseUrl: config.frontendBaseUrl,
    emailTimeoutMs: config.emailTimeoutMs,
    emailMaxAttempts: config.emailMaxAttempts,
    clock,
  });
  const batchWorker = new BatchWorker(processor, config.batchWorkerConcurrency);

  return {
    employees,
    numberLifecycle,
    numberQueries: new NumberQueryService(db),
    batchWorker,
    verificationBatches: new VerificationBatchService(db, employees, batchWorker, {
      defaultTokenLifetimeDays: config.defaultTokenLifetimeDays,
      maxTokenLifetimeDays: config.maxTokenLifetimeDays,
      clock,
    }),
    verificationSubmissions: new VerificationSubmissionService(db, employees, clock),
    verificationAdmin: new VerificationAdminService(db, clock),
    auth: new AuthService(
      db,
      deps.revocations ?? new DbRevocationStore(db),
      { jwtSecret: config.jwtSecret, jwtTtlHours: config.jwtTtlHours },
      clock,
    ),
  };
}
