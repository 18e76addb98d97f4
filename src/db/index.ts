import { drizzle } from 'drizzle-orm/postgres-js';
import { sql } from 'drizzle-orm';
import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core';
import postgres from 'postgres';
import * as schema from './schema';

/**
 * Driver-neutral handle. Production runs on postgres-js, the test suite on
 * an in-process PGlite; services only ever see this type.
 * Transactions (`tx`) are assignable to it as well.
 */
export type Database = PgDatabase<PgQueryResultHKT, typeof schema>;

export interface DbHandle {
  db: Database;
  close: () => Promise<void>;
}

export function createDb(databaseUrl: string | undefined): DbHandle {
  if (!databaseUrl) {
    throw new Error('DATABASE_URL is missing');
  }

  const client = postgres(databaseUrl, {
    max: 10,
    idle_timeout: 0,
    connect_timeout: 5,
    onnotice: () => {},
    connection: {
      application_name: 'number-custody-server',
    },
  });

  return {
    db: drizzle(client, { schema }),
    close: () => client.end({ timeout: 5 }),
  };
}

export async function verifyDb(db: Database): Promise<boolean> {
  try {
    await db.execute(sql`select 1`);
    return true;
  } catch {
    return false;
  }
}

export { schema };
