import { eq } from 'drizzle-orm';
import { hash, verify } from 'argon2';
import jwt, { TokenExpiredError } from 'jsonwebtoken';
import type { JwtPayload } from 'jsonwebtoken';
import { v4 as uuidv4 } from 'uuid';
import type { Database } from '../../db';
import { users } from '../../db/schema';
import type { User } from '../../db/schema';
import { UnauthorizedError } from '../../utils/errors';
import { withConflictMapping } from '../../utils/database-error-handler';
import { requireNonBlank } from '../../utils/validators';
import { systemClock } from '../../utils/clock';
import type { Clock } from '../../utils/clock';
import { moduleLogger } from '../../utils/logger';
import type { RevocationStore } from './revocation-store';

const log = moduleLogger('auth');

export interface AdminPrincipal {
  userId: number;
  username: string;
  role: string;
  /** Employee record of the operator, when the account is linked to one. */
  employeeId: string | null;
  jti: string;
  expiresAt: Date;
}

export interface LoginResult {
  token: string;
  expiresAt: Date;
  user: {
    id: number;
    username: string;
    role: string;
    employeeId: string | null;
  };
}

export interface CreateUserInput {
  username: string;
  password: string;
  role?: string;
  employeeId?: string | null;
}

export interface AuthServiceOptions {
  jwtSecret: string;
  jwtTtlHours: number;
}

const INVALID_CREDENTIALS = 'Invalid username or password';

/**
 * Admin authentication: argon2 password check, HS256 session tokens,
 * logout through the revocation store.
 */
export class AuthService {
  constructor(
    private readonly db: Database,
    private readonly revocations: RevocationStore,
    private readonly options: AuthServiceOptions,
    private readonly clock: Clock = systemClock,
  ) {}

  async createUser(input: CreateUserInput): Promise<User> {
    const username = requireNonBlank(input.username, 'username');
    const password = requireNonBlank(input.password, 'password');
    const passwordHash = await hash(password);

    const [user] = await withConflictMapping(
      () => this.db.insert(users).values({
        username,
        passwordHash,
        role: input.role ?? 'admin',
        employeeId: input.employeeId ?? null,
      }).returning(),
      `User ${username} already exists`,
      'USER_EXISTS',
    );
    log.info({ username }, 'admin user created');
    return user;
  }

  async login(username: string, password: string): Promise<LoginResult> {
    const [user] = await this.db
      .select()
      .from(users)
      .where(eq(users.username, username.trim()))
      .limit(1);

    if (!user || !(await verify(user.passwordHash, password))) {
      throw new UnauthorizedError(INVALID_CREDENTIALS, 'INVALID_CREDENTIALS');
    }
    if (!user.isActive) {
      throw new UnauthorizedError('Account disabled', 'ACCOUNT_DISABLED');
    }

    const now = this.clock();
    const expiresAt = new Date(now.getTime() + this.options.jwtTtlHours * 60 * 60 * 1000);
    const token = jwt.sign(
      {
        username: user.username,
        role: user.role,
        employeeId: user.employeeId,
        iat: Math.floor(now.getTime() / 1000),
        exp: Math.floor(expiresAt.getTime() / 1000),
      },
      this.options.jwtSecret,
      { algorithm: 'HS256', subject: String(user.id), jwtid: uuidv4() },
    );

    await this.db.update(users).set({ lastLogin: now }).where(eq(users.id, user.id));
    log.info({ userId: user.id }, 'admin login');

    return {
      token,
      expiresAt,
      user: { id: user.id, username: user.username, role: user.role, employeeId: user.employeeId },
    };
  }

  async authenticate(token: string): Promise<AdminPrincipal> {
    let decoded: string | JwtPayload;
    try {
      decoded = jwt.verify(token, this.options.jwtSecret, {
        algorithms: ['HS256'],
        clockTimestamp: Math.floor(this.clock().getTime() / 1000),
      });
    } catch (error) {
      const reason = error instanceof TokenExpiredError ? 'Session expired' : 'Invalid session token';
      throw new UnauthorizedError(reason, 'INVALID_SESSION');
    }

    if (typeof decoded === 'string' || !decoded.jti || !decoded.sub || typeof decoded.exp !== 'number') {
      throw new UnauthorizedError('Invalid session token', 'INVALID_SESSION');
    }
    const userId = Number(decoded.sub);
    const { username, role, employeeId } = decoded;
    if (!Number.isInteger(userId) || typeof username !== 'string' || typeof role !== 'string') {
      throw new UnauthorizedError('Invalid session token', 'INVALID_SESSION');
    }

    if (await this.revocations.isRevoked(decoded.jti)) {
      throw new UnauthorizedError('Session has been logged out', 'SESSION_REVOKED');
    }

    return {
      userId,
      username,
      role,
      employeeId: typeof employeeId === 'string' ? employeeId : null,
      jti: decoded.jti,
      expiresAt: new Date(decoded.exp * 1000),
    };
  }

  async logout(principal: AdminPrincipal): Promise<void> {
    await this.revocations.revoke(principal.jti, principal.expiresAt);
    log.info({ userId: principal.userId }, 'admin logout');
  }

  async purgeExpiredRevocations(): Promise<number> {
    return this.revocations.purgeExpired(this.clock());
  }
}
