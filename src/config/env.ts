import * as dotenv from 'dotenv';

dotenv.config({ path: '.env.local' });
dotenv.config();

const DEV_JWT_SECRET = 'dev-only-jwt-secret';

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = parseInt(raw, 10);
  if (Number.isNaN(value)) {
    throw new Error(`${name} must be an integer, got "${raw}"`);
  }
  return value;
}

function boolFromEnv(name: string, fallback = false): boolean {
  const raw = process.env[name];
  if (raw === undefined) return fallback;
  return raw === 'true' || raw === '1';
}

export interface SmtpConfig {
  host: string;
  port: number;
  secure: boolean;
  user: string;
  password: string;
  sender: string;
}

export interface AppConfig {
  nodeEnv: string;
  isProduction: boolean;
  port: number;
  host: string;
  logLevel: string;
  databaseUrl: string | undefined;
  frontendBaseUrl: string;
  jwtSecret: string;
  jwtTtlHours: number;
  smtp: SmtpConfig;
  emailTimeoutMs: number;
  emailMaxAttempts: number;
  batchWorkerConcurrency: number;
  defaultTokenLifetimeDays: number;
  maxTokenLifetimeDays: number;
  enableCronJobs: boolean;
  enableSwagger: boolean;
}

export function loadConfig(): AppConfig {
  const nodeEnv = process.env.NODE_ENV || 'development';
  const isProduction = nodeEnv === 'production';

  const jwtSecret = process.env.JWT_SECRET || '';
  if (!jwtSecret && isProduction) {
    throw new Error('JWT_SECRET is missing');
  }

  return {
    nodeEnv,
    isProduction,
    port: intFromEnv('PORT', 8080),
    host: process.env.HOST || '0.0.0.0',
    logLevel: process.env.LOG_LEVEL || 'info',
    databaseUrl: process.env.DATABASE_URL,
    frontendBaseUrl: (process.env.FRONTEND_BASE_URL || 'http://localhost:5173').replace(/\/+$/, ''),
    jwtSecret: jwtSecret || DEV_JWT_SECRET,
    jwtTtlHours: intFromEnv('JWT_TTL_HOURS', 24),
    smtp: {
      host: process.env.SMTP_HOST || 'localhost',
      port: intFromEnv('SMTP_PORT', 587),
      secure: boolFromEnv('SMTP_SECURE'),
      user: process.env.SMTP_USER || '',
      password: process.env.SMTP_PASSWORD || '',
      sender: process.env.SMTP_SENDER || 'no-reply@localhost',
    },
    emailTimeoutMs: intFromEnv('EMAIL_TIMEOUT_MS', 15000),
    emailMaxAttempts: Math.max(1, intFromEnv('EMAIL_MAX_ATTEMPTS', 2)),
    batchWorkerConcurrency: Math.max(1, intFromEnv('BATCH_WORKER_CONCURRENCY', 2)),
    defaultTokenLifetimeDays: intFromEnv('VERIFICATION_DEFAULT_DAYS', 7),
    maxTokenLifetimeDays: intFromEnv('VERIFICATION_MAX_DAYS', 90),
    enableCronJobs: isProduction || boolFromEnv('ENABLE_CRON_JOBS'),
    enableSwagger: !isProduction || boolFromEnv('ENABLE_SWAGGER'),
  };
}

export const config = loadConfig();

export function usesDevJwtSecret(cfg: AppConfig): boolean {
  return cfg.jwtSecret === DEV_JWT_SECRET;
}
