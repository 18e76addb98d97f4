import { sql } from 'drizzle-orm';
import type { Database } from '../../db';
import { idCounters } from '../../db/schema';

/**
 * Reserves the next value of a named counter and formats it as a business
 * identifier (`EMP` + 7 digits). The counter row is upserted and bumped in
 * one statement, so concurrent callers never get the same value. The id is
 * reserved before the owning row is inserted.
 */
export async function allocateBusinessId(db: Database, counter: string, prefix: string, width = 7): Promise<string> {
  const [row] = await db
    .insert(idCounters)
    .values({ name: counter, value: 1 })
    .onConflictDoUpdate({
      target: idCounters.name,
      set: { value: sql`${idCounters.value} + 1` },
    })
    .returning({ value: idCounters.value });

  if (!row) {
    throw new Error(`Counter "${counter}" did not return a value`);
  }
  return `${prefix}${String(row.value).padStart(width, '0')}`;
}

export const EMPLOYEE_ID_COUNTER = 'employee_id';
export const EMPLOYEE_ID_PREFIX = 'EMP';
