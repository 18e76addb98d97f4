/**
 * Verification Cron Jobs
 *
 * Schedule:
 * - TOKEN_EXPIRY: every hour, pending tokens past their expiry become expired
 * - REVOCATION_PURGE: every day at 03:00, logged-out sessions past their
 *   own expiry are forgotten
 */

import { CronJob } from 'cron';
import type { AuthService } from '../modules/auth/auth.service';
import type { VerificationBatchService } from '../modules/verification/batch.service';
import { moduleLogger } from '../utils/logger';

const log = moduleLogger('cron');

export interface CronServices {
  verificationBatches: VerificationBatchService;
  auth: AuthService;
}

export interface VerificationCronJobs {
  start(): void;
  stop(): void;
  /** Runs the expiry sweep now, outside the schedule. Returns tokens expired. */
  runTokenExpiry(): Promise<number>;
  runRevocationPurge(): Promise<number>;
}

/**
 * Wraps a job body so overlapping ticks skip instead of stacking up.
 * Failures are logged; the next tick tries again.
 */
function guarded(name: string, work: () => Promise<number>): () => Promise<number> {
  let isRunning = false;

  return async () => {
    if (isRunning) {
      log.warn({ job: name }, 'job already running, skipping');
      return 0;
    }

    isRunning = true;
    const startTime = Date.now();
    try {
      const affected = await work();
      log.info({ job: name, affected, durationMs: Date.now() - startTime }, 'job completed');
      return affected;
    } catch (error) {
      log.error({ job: name, err: error }, 'job failed');
      return 0;
    } finally {
      isRunning = false;
    }
  };
}

export function createVerificationCronJobs(services: CronServices, timeZone = 'UTC'): VerificationCronJobs {
  const runTokenExpiry = guarded('token-expiry', () => services.verificationBatches.expireOverdueTokens());
  const runRevocationPurge = guarded('revocation-purge', () => services.auth.purgeExpiredRevocations());

  const tokenExpiryJob = new CronJob('0 * * * *', async () => {
    await runTokenExpiry();
  }, null, false, timeZone);
  const revocationPurgeJob = new CronJob('0 3 * * *', async () => {
    await runRevocationPurge();
  }, null, false, timeZone);

  return {
    start() {
      tokenExpiryJob.start();
      revocationPurgeJob.start();
      log.info('verification cron jobs started (token expiry hourly, revocation purge 03:00)');
    },
    stop() {
      tokenExpiryJob.stop();
      revocationPurgeJob.stop();
      log.info('verification cron jobs stopped');
    },
    runTokenExpiry,
    runRevocationPurge,
  };
}
