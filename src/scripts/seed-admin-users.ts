import { config } from '../config/env';
import { createDb } from '../db';
import { ensureSchema } from '../db/bootstrap';
import { AuthService } from '../modules/auth/auth.service';
import { DbRevocationStore } from '../modules/auth/revocation-store';
import { isAppError } from '../utils/errors';
import { logger } from '../utils/logger';

/**
 * Creates the first admin account.
 *
 *   ADMIN_USERNAME=ops ADMIN_PASSWORD=... [ADMIN_EMPLOYEE_ID=EMP0000001] npm run seed:admin
 *
 * ADMIN_EMPLOYEE_ID links the account to an employee so it can act as the
 * operator of departure-risk handling. Re-running with an existing
 * username leaves the account untouched.
 */
async function seedAdminUsers() {
  const username = process.env.ADMIN_USERNAME || process.argv[2];
  const password = process.env.ADMIN_PASSWORD || process.argv[3];
  if (!username || !password) {
    throw new Error('ADMIN_USERNAME and ADMIN_PASSWORD are required');
  }

  const { db, close } = createDb(config.databaseUrl);
  try {
    await ensureSchema(db);
    const auth = new AuthService(db, new DbRevocationStore(db), {
      jwtSecret: config.jwtSecret,
      jwtTtlHours: config.jwtTtlHours,
    });

    try {
      const user = await auth.createUser({
        username,
        password,
        role: 'admin',
        employeeId: process.env.ADMIN_EMPLOYEE_ID || null,
      });
      logger.info({ userId: user.id, username }, 'admin user seeded');
    } catch (error) {
      if (isAppError(error) && error.code === 'USER_EXISTS') {
        logger.info({ username }, 'admin user already exists');
        return;
      }
      throw error;
    }
  } finally {
    await close();
  }
}

seedAdminUsers().catch((error: unknown) => {
  logger.error({ err: error }, 'admin seeding failed');
  process.exit(1);
});
