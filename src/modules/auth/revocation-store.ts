import { eq, lt } from 'drizzle-orm';
import type { Database } from '../../db';
import { revokedTokens } from '../../db/schema';

/**
 * Where revoked session ids (JWT `jti`) live until their token would have
 * expired anyway.
 */
export interface RevocationStore {
  revoke(jti: string, expiresAt: Date): Promise<void>;
  isRevoked(jti: string): Promise<boolean>;
  purgeExpired(now: Date): Promise<number>;
}

/**
 * Revocations shared by every instance through the database and kept
 * across restarts.
 */
export class DbRevocationStore implements RevocationStore {
  constructor(private readonly db: Database) {}

  async revoke(jti: string, expiresAt: Date): Promise<void> {
    await this.db.insert(revokedTokens)
      .values({ jti, expiresAt })
      .onConflictDoNothing({ target: revokedTokens.jti });
  }

  async isRevoked(jti: string): Promise<boolean> {
    const [row] = await this.db
      .select({ jti: revokedTokens.jti })
      .from(revokedTokens)
      .where(eq(revokedTokens.jti, jti))
      .limit(1);
    return row !== undefined;
  }

  async purgeExpired(now: Date): Promise<number> {
    const purged = await this.db.delete(revokedTokens)
      .where(lt(revokedTokens.expiresAt, now))
      .returning({ jti: revokedTokens.jti });
    return purged.length;
  }
}
