import { config, usesDevJwtSecret } from './config/env';
import { createDb, verifyDb } from './db';
import { ensureSchema } from './db/bootstrap';
import { SmtpVerificationMailer } from './services/email.service';
import { createServices } from './app-context';
import { buildApp } from './app';
import { createVerificationCronJobs } from './jobs/verification-cron-jobs';
import { logger } from './utils/logger';

const start = async () => {
  const { db, close } = createDb(config.databaseUrl);
  const mailer = new SmtpVerificationMailer(config.smtp);
  const services = createServices(db, { config, mailer });
  const app = buildApp(services, { db, config });
  const cronJobs = createVerificationCronJobs(services);

  if (usesDevJwtSecret(config)) {
    logger.warn('JWT_SECRET not set; using the development secret');
  }

  try {
    app.log.info('Verifying database connection...');
    if (!(await verifyDb(db))) {
      throw new Error('database unreachable');
    }
    await ensureSchema(db);

    await app.listen({ port: config.port, host: config.host });
    app.log.info({ port: config.port, host: config.host }, 'number custody server started');

    // Batches interrupted by the previous shutdown pick up where they stopped
    await services.verificationBatches.resumeUnfinished();

    if (config.enableCronJobs) {
      cronJobs.start();
    }
  } catch (err) {
    app.log.error(err, 'failed to start number custody server');
    await close();
    process.exit(1);
  }

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    app.log.info({ signal }, 'shutting down');

    cronJobs.stop();
    await services.batchWorker.stop();
    await app.close();
    await mailer.close();
    await close();
    process.exit(0);
  };

  for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        logger.error({ err }, 'shutdown failed');
        process.exit(1);
      });
    });
  }
};

start().catch((err: unknown) => {
  logger.fatal({ err }, 'unexpected startup failure');
  process.exit(1);
});
