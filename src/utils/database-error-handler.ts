import { ConflictError } from './errors';

/**
 * Postgres SQLSTATE codes we translate into domain errors.
 * Both the postgres-js driver and PGlite expose them on `error.code`.
 */
export const PG_UNIQUE_VIOLATION = '23505';
export const PG_FOREIGN_KEY_VIOLATION = '23503';

export function pgErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  // Query builders may wrap the driver error
  if (error instanceof Error && error.cause !== undefined) {
    return pgErrorCode(error.cause);
  }
  return undefined;
}

export function isUniqueViolation(error: unknown): boolean {
  return pgErrorCode(error) === PG_UNIQUE_VIOLATION;
}

/**
 * Run an insert/update and turn a unique violation into a ConflictError.
 * Never expose the constraint name or SQL to the client.
 */
export async function withConflictMapping<T>(work: () => Promise<T>, message: string, code?: string): Promise<T> {
  try {
    return await work();
  } catch (error) {
    if (isUniqueViolation(error)) {
      throw new ConflictError(message, code);
    }
    throw error;
  }
}
