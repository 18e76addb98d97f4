import { sql } from 'drizzle-orm';
import type { Database } from './index';
import { moduleLogger } from '../utils/logger';

const log = moduleLogger('schema');

/**
 * Idempotent DDL matching ./schema.ts. Each statement runs on its own so
 * drivers that refuse multi-statement strings are fine with it.
 */
const STATEMENTS: string[] = [
  `create table if not exists employees (
    id serial primary key,
    employee_id varchar(10) not null,
    full_name text not null,
    department_name text,
    email text,
    phone_number varchar(20),
    employment_status text not null default 'Active',
    hire_date date,
    termination_date date,
    created_at timestamptz not null default now(),
    updated_at timestamptz not null default now(),
    deleted_at timestamptz
  )`,
  `create unique index if not exists employees_employee_id_key on employees (employee_id)`,
  `create unique index if not exists employees_email_key on employees (email)`,
  `create unique index if not exists employees_phone_number_key on employees (phone_number)`,
  `create index if not exists employees_department_name_idx on employees (department_name)`,
  `create index if not exists employees_employment_status_idx on employees (employment_status)`,

  `create table if not exists id_counters (
    name text primary key,
    value integer not null default 0
  )`,

  `create table if not exists mobile_numbers (
    id serial primary key,
    phone_number varchar(20) not null,
    applicant_employee_id varchar(10) not null,
    application_date date not null,
    current_holder_employee_id varchar(10),
    status text not null default 'idle',
    purpose text,
    vendor text,
    remarks text,
    cancellation_date date,
    last_confirmation_date timestamptz,
    created_at timestamptz not null default now(),
    updated_at timestamptz not null default now(),
    deleted_at timestamptz,
    constraint mobile_numbers_applicant_fkey foreign key (applicant_employee_id)
      references employees (employee_id) on update cascade on delete restrict,
    constraint mobile_numbers_holder_fkey foreign key (current_holder_employee_id)
      references employees (employee_id) on update cascade on delete restrict
  )`,
  `create unique index if not exists mobile_numbers_phone_number_key on mobile_numbers (phone_number)`,
  `create index if not exists mobile_numbers_applicant_idx on mobile_numbers (applicant_employee_id)`,
  `create index if not exists mobile_numbers_holder_idx on mobile_numbers (current_holder_employee_id)`,
  `create index if not exists mobile_numbers_status_idx on mobile_numbers (status)`,

  `create table if not exists number_usage_history (
    id serial primary key,
    mobile_number_id integer not null,
    employee_id varchar(10) not null,
    start_date date not null,
    end_date date,
    created_at timestamptz not null default now(),
    constraint number_usage_history_number_fkey foreign key (mobile_number_id)
      references mobile_numbers (id) on delete restrict
  )`,
  `create index if not exists number_usage_history_number_idx on number_usage_history (mobile_number_id)`,
  `create index if not exists number_usage_history_employee_idx on number_usage_history (employee_id)`,
  `create unique index if not exists number_usage_history_open_key on number_usage_history (mobile_number_id) where end_date is null`,

  `create table if not exists number_applicant_history (
    id serial primary key,
    mobile_number_id integer not null,
    previous_applicant_employee_id varchar(10) not null,
    new_applicant_employee_id varchar(10) not null,
    change_date date not null,
    operator_employee_id varchar(10) not null,
    reason text not null,
    remarks text,
    created_at timestamptz not null default now(),
    constraint number_applicant_history_number_fkey foreign key (mobile_number_id)
      references mobile_numbers (id) on delete restrict
  )`,
  `create index if not exists number_applicant_history_number_idx on number_applicant_history (mobile_number_id)`,

  `create table if not exists verification_batch_tasks (
    id varchar(36) primary key,
    status text not null default 'Pending',
    scope_type text not null,
    scope_values jsonb not null default '[]'::jsonb,
    token_lifetime_days integer not null,
    target_employee_ids jsonb not null default '[]'::jsonb,
    total_to_process integer not null default 0,
    tokens_generated integer not null default 0,
    emails_attempted integer not null default 0,
    emails_succeeded integer not null default 0,
    emails_failed integer not null default 0,
    error_summary text,
    failure_details jsonb not null default '[]'::jsonb,
    created_at timestamptz not null default now(),
    started_at timestamptz,
    completed_at timestamptz,
    updated_at timestamptz not null default now()
  )`,
  `create index if not exists verification_batch_tasks_status_idx on verification_batch_tasks (status)`,

  `create table if not exists verification_tokens (
    id serial primary key,
    token varchar(64) not null,
    employee_id varchar(10) not null,
    batch_task_id varchar(36) not null,
    status text not null default 'pending',
    expires_at timestamptz not null,
    dispatch_status text not null default 'queued',
    dispatch_error text,
    created_at timestamptz not null default now(),
    updated_at timestamptz not null default now(),
    constraint verification_tokens_batch_fkey foreign key (batch_task_id)
      references verification_batch_tasks (id) on delete restrict
  )`,
  `create unique index if not exists verification_tokens_token_key on verification_tokens (token)`,
  `create unique index if not exists verification_tokens_batch_employee_key on verification_tokens (batch_task_id, employee_id)`,
  `create index if not exists verification_tokens_employee_idx on verification_tokens (employee_id)`,
  `create index if not exists verification_tokens_status_expires_idx on verification_tokens (status, expires_at)`,

  `create table if not exists user_reported_issues (
    id serial primary key,
    verification_token_id integer,
    employee_id varchar(10) not null,
    mobile_number_id integer,
    reported_phone_number varchar(20),
    issue_type text not null,
    user_comment text,
    purpose text,
    original_status text,
    admin_action_status text not null default 'pending_review',
    admin_remarks text,
    resolved_at timestamptz,
    created_at timestamptz not null default now(),
    updated_at timestamptz not null default now()
  )`,
  `create index if not exists user_reported_issues_employee_idx on user_reported_issues (employee_id)`,
  `create index if not exists user_reported_issues_status_idx on user_reported_issues (admin_action_status)`,
  `create unique index if not exists user_reported_issues_pending_number_key on user_reported_issues (employee_id, mobile_number_id) where admin_action_status = 'pending_review'`,
  `create unique index if not exists user_reported_issues_pending_phone_key on user_reported_issues (employee_id, reported_phone_number) where admin_action_status = 'pending_review'`,

  `create table if not exists verification_submission_log (
    id serial primary key,
    employee_id varchar(10) not null,
    verification_token_id integer not null,
    mobile_number_id integer,
    phone_number varchar(20) not null,
    action_type text not null,
    purpose text,
    user_comment text,
    created_at timestamptz not null default now()
  )`,
  `create index if not exists verification_submission_log_number_idx on verification_submission_log (mobile_number_id, created_at)`,
  `create index if not exists verification_submission_log_token_idx on verification_submission_log (verification_token_id)`,
  `create index if not exists verification_submission_log_action_idx on verification_submission_log (action_type)`,

  `create table if not exists users (
    id serial primary key,
    username varchar(64) not null,
    password_hash text not null,
    role text not null default 'admin',
    employee_id varchar(10),
    is_active boolean not null default true,
    last_login timestamptz,
    created_at timestamptz not null default now()
  )`,
  `create unique index if not exists users_username_key on users (username)`,

  `create table if not exists revoked_tokens (
    jti varchar(64) primary key,
    expires_at timestamptz not null,
    revoked_at timestamptz not null default now()
  )`,
  `create index if not exists revoked_tokens_expires_at_idx on revoked_tokens (expires_at)`,

  `create table if not exists system_errors (
    id serial primary key,
    message text not null,
    stack text,
    path text,
    method text,
    user_id integer,
    severity text not null default 'CRITICAL',
    metadata jsonb,
    is_resolved boolean not null default false,
    created_at timestamptz not null default now()
  )`,
  `create index if not exists system_errors_created_at_idx on system_errors (created_at)`,
];

export const TABLES = [
  'verification_submission_log',
  'user_reported_issues',
  'verification_tokens',
  'verification_batch_tasks',
  'number_applicant_history',
  'number_usage_history',
  'mobile_numbers',
  'employees',
  'id_counters',
  'users',
  'revoked_tokens',
  'system_errors',
] as const;

export async function ensureSchema(db: Database): Promise<void> {
  for (const statement of STATEMENTS) {
    await db.execute(sql.raw(statement));
  }
  log.info({ statements: STATEMENTS.length }, 'database schema ensured');
}
