import { pgTable, index, foreignKey, text, timestamp, integer, uniqueIndex, jsonb, boolean, varchar, serial, date } from "drizzle-orm/pg-core"
import { sql } from "drizzle-orm"

// Status vocabularies (stored as text, narrowed in TypeScript)
export const EMPLOYMENT_STATUSES = ['Active', 'Departed'] as const
export type EmploymentStatus = typeof EMPLOYMENT_STATUSES[number]

export const NUMBER_STATUSES = ['idle', 'in_use', 'pending_deactivation', 'deactivated', 'risk_pending', 'user_reported'] as const
export type NumberStatus = typeof NUMBER_STATUSES[number]

export const BATCH_STATUSES = ['Pending', 'InProgress', 'Completed', 'CompletedWithErrors', 'Failed'] as const
export type BatchStatus = typeof BATCH_STATUSES[number]

export const BATCH_SCOPES = ['all_users', 'department', 'employee_ids'] as const
export type BatchScope = typeof BATCH_SCOPES[number]

export const TOKEN_STATUSES = ['pending', 'expired'] as const
export type TokenStatus = typeof TOKEN_STATUSES[number]

export const DISPATCH_STATUSES = ['queued', 'sent', 'failed'] as const
export type DispatchStatus = typeof DISPATCH_STATUSES[number]

export const ISSUE_TYPES = ['number_issue', 'unlisted_number'] as const
export type IssueType = typeof ISSUE_TYPES[number]

export const ADMIN_ACTION_STATUSES = ['pending_review', 'resolved', 'dismissed'] as const
export type AdminActionStatus = typeof ADMIN_ACTION_STATUSES[number]

export const SUBMISSION_ACTIONS = ['confirm_usage', 'report_issue', 'report_unlisted'] as const
export type SubmissionAction = typeof SUBMISSION_ACTIONS[number]

export interface DispatchFailure {
    employeeId: string;
    employeeName: string;
    emailAddress: string | null;
    reason: string;
}

// ============================================================================
// EMPLOYEES
// ============================================================================

export const employees = pgTable("employees", {
    id: serial("id").primaryKey().notNull(),
    employeeId: varchar("employee_id", { length: 10 }).notNull(),
    fullName: text("full_name").notNull(),
    departmentName: text("department_name"),
    email: text("email"),
    phoneNumber: varchar("phone_number", { length: 20 }),
    employmentStatus: text("employment_status", { enum: EMPLOYMENT_STATUSES }).default('Active').notNull(),
    hireDate: date("hire_date", { mode: 'string' }),
    terminationDate: date("termination_date", { mode: 'string' }),
    createdAt: timestamp("created_at", { withTimezone: true, mode: 'date' }).defaultNow().notNull(),
    updatedAt: timestamp("updated_at", { withTimezone: true, mode: 'date' }).defaultNow().notNull(),
    deletedAt: timestamp("deleted_at", { withTimezone: true, mode: 'date' }),
}, (table) => [
    uniqueIndex("employees_employee_id_key").on(table.employeeId),
    uniqueIndex("employees_email_key").on(table.email),
    uniqueIndex("employees_phone_number_key").on(table.phoneNumber),
    index("employees_department_name_idx").on(table.departmentName),
    index("employees_employment_status_idx").on(table.employmentStatus),
]);

// Sequence-style counters for business identifiers (EMP0000001, ...)
export const idCounters = pgTable("id_counters", {
    name: text("name").primaryKey().notNull(),
    value: integer("value").default(0).notNull(),
});

// ============================================================================
// MOBILE NUMBERS
// ============================================================================

export const mobileNumbers = pgTable("mobile_numbers", {
    id: serial("id").primaryKey().notNull(),
    phoneNumber: varchar("phone_number", { length: 20 }).notNull(),
    applicantEmployeeId: varchar("applicant_employee_id", { length: 10 }).notNull(),
    applicationDate: date("application_date", { mode: 'string' }).notNull(),
    currentHolderEmployeeId: varchar("current_holder_employee_id", { length: 10 }),
    status: text("status", { enum: NUMBER_STATUSES }).default('idle').notNull(),
    purpose: text("purpose"),
    vendor: text("vendor"),
    remarks: text("remarks"),
    cancellationDate: date("cancellation_date", { mode: 'string' }),
    lastConfirmationDate: timestamp("last_confirmation_date", { withTimezone: true, mode: 'date' }),
    createdAt: timestamp("created_at", { withTimezone: true, mode: 'date' }).defaultNow().notNull(),
    updatedAt: timestamp("updated_at", { withTimezone: true, mode: 'date' }).defaultNow().notNull(),
    deletedAt: timestamp("deleted_at", { withTimezone: true, mode: 'date' }),
}, (table) => [
    // Covers soft-deleted rows too: a deleted phone can never be re-created
    uniqueIndex("mobile_numbers_phone_number_key").on(table.phoneNumber),
    index("mobile_numbers_applicant_idx").on(table.applicantEmployeeId),
    index("mobile_numbers_holder_idx").on(table.currentHolderEmployeeId),
    index("mobile_numbers_status_idx").on(table.status),
    foreignKey({
        columns: [table.applicantEmployeeId],
        foreignColumns: [employees.employeeId],
        name: "mobile_numbers_applicant_fkey"
    }).onUpdate("cascade").onDelete("restrict"),
    foreignKey({
        columns: [table.currentHolderEmployeeId],
        foreignColumns: [employees.employeeId],
        name: "mobile_numbers_holder_fkey"
    }).onUpdate("cascade").onDelete("restrict"),
]);

export const numberUsageHistory = pgTable("number_usage_history", {
    id: serial("id").primaryKey().notNull(),
    mobileNumberId: integer("mobile_number_id").notNull(),
    employeeId: varchar("employee_id", { length: 10 }).notNull(),
    startDate: date("start_date", { mode: 'string' }).notNull(),
    endDate: date("end_date", { mode: 'string' }),
    createdAt: timestamp("created_at", { withTimezone: true, mode: 'date' }).defaultNow().notNull(),
}, (table) => [
    index("number_usage_history_number_idx").on(table.mobileNumberId),
    index("number_usage_history_employee_idx").on(table.employeeId),
    // At most one open possession interval per number
    uniqueIndex("number_usage_history_open_key").on(table.mobileNumberId).where(sql`end_date is null`),
    foreignKey({
        columns: [table.mobileNumberId],
        foreignColumns: [mobileNumbers.id],
        name: "number_usage_history_number_fkey"
    }).onDelete("restrict"),
]);

export const numberApplicantHistory = pgTable("number_applicant_history", {
    id: serial("id").primaryKey().notNull(),
    mobileNumberId: integer("mobile_number_id").notNull(),
    previousApplicantEmployeeId: varchar("previous_applicant_employee_id", { length: 10 }).notNull(),
    newApplicantEmployeeId: varchar("new_applicant_employee_id", { length: 10 }).notNull(),
    changeDate: date("change_date", { mode: 'string' }).notNull(),
    operatorEmployeeId: varchar("operator_employee_id", { length: 10 }).notNull(),
    reason: text("reason").notNull(),
    remarks: text("remarks"),
    createdAt: timestamp("created_at", { withTimezone: true, mode: 'date' }).defaultNow().notNull(),
}, (table) => [
    index("number_applicant_history_number_idx").on(table.mobileNumberId),
    foreignKey({
        columns: [table.mobileNumberId],
        foreignColumns: [mobileNumbers.id],
        name: "number_applicant_history_number_fkey"
    }).onDelete("restrict"),
]);

// ============================================================================
// VERIFICATION CAMPAIGNS
// ============================================================================

export const verificationBatchTasks = pgTable("verification_batch_tasks", {
    id: varchar("id", { length: 36 }).primaryKey().notNull(),
    status: text("status", { enum: BATCH_STATUSES }).default('Pending').notNull(),
    scopeType: text("scope_type", { enum: BATCH_SCOPES }).notNull(),
    scopeValues: jsonb("scope_values").$type<string[]>().default([]).notNull(),
    tokenLifetimeDays: integer("token_lifetime_days").notNull(),
    targetEmployeeIds: jsonb("target_employee_ids").$type<string[]>().default([]).notNull(),
    totalToProcess: integer("total_to_process").default(0).notNull(),
    tokensGenerated: integer("tokens_generated").default(0).notNull(),
    emailsAttempted: integer("emails_attempted").default(0).notNull(),
    emailsSucceeded: integer("emails_succeeded").default(0).notNull(),
    emailsFailed: integer("emails_failed").default(0).notNull(),
    errorSummary: text("error_summary"),
    failureDetails: jsonb("failure_details").$type<DispatchFailure[]>().default([]).notNull(),
    createdAt: timestamp("created_at", { withTimezone: true, mode: 'date' }).defaultNow().notNull(),
    startedAt: timestamp("started_at", { withTimezone: true, mode: 'date' }),
    completedAt: timestamp("completed_at", { withTimezone: true, mode: 'date' }),
    updatedAt: timestamp("updated_at", { withTimezone: true, mode: 'date' }).defaultNow().notNull(),
}, (table) => [
    index("verification_batch_tasks_status_idx").on(table.status),
]);

export const verificationTokens = pgTable("verification_tokens", {
    id: serial("id").primaryKey().notNull(),
    token: varchar("token", { length: 64 }).notNull(),
    employeeId: varchar("employee_id", { length: 10 }).notNull(),
    batchTaskId: varchar("batch_task_id", { length: 36 }).notNull(),
    status: text("status", { enum: TOKEN_STATUSES }).default('pending').notNull(),
    expiresAt: timestamp("expires_at", { withTimezone: true, mode: 'date' }).notNull(),
    dispatchStatus: text("dispatch_status", { enum: DISPATCH_STATUSES }).default('queued').notNull(),
    dispatchError: text("dispatch_error"),
    createdAt: timestamp("created_at", { withTimezone: true, mode: 'date' }).defaultNow().notNull(),
    updatedAt: timestamp("updated_at", { withTimezone: true, mode: 'date' }).defaultNow().notNull(),
}, (table) => [
    uniqueIndex("verification_tokens_token_key").on(table.token),
    uniqueIndex("verification_tokens_batch_employee_key").on(table.batchTaskId, table.employeeId),
    index("verification_tokens_employee_idx").on(table.employeeId),
    index("verification_tokens_status_expires_idx").on(table.status, table.expiresAt),
    foreignKey({
        columns: [table.batchTaskId],
        foreignColumns: [verificationBatchTasks.id],
        name: "verification_tokens_batch_fkey"
    }).onDelete("restrict"),
]);

export const userReportedIssues = pgTable("user_reported_issues", {
    id: serial("id").primaryKey().notNull(),
    verificationTokenId: integer("verification_token_id"),
    employeeId: varchar("employee_id", { length: 10 }).notNull(),
    mobileNumberId: integer("mobile_number_id"),
    reportedPhoneNumber: varchar("reported_phone_number", { length: 20 }),
    issueType: text("issue_type", { enum: ISSUE_TYPES }).notNull(),
    userComment: text("user_comment"),
    purpose: text("purpose"),
    originalStatus: text("original_status"),
    adminActionStatus: text("admin_action_status", { enum: ADMIN_ACTION_STATUSES }).default('pending_review').notNull(),
    adminRemarks: text("admin_remarks"),
    resolvedAt: timestamp("resolved_at", { withTimezone: true, mode: 'date' }),
    createdAt: timestamp("created_at", { withTimezone: true, mode: 'date' }).defaultNow().notNull(),
    updatedAt: timestamp("updated_at", { withTimezone: true, mode: 'date' }).defaultNow().notNull(),
}, (table) => [
    index("user_reported_issues_employee_idx").on(table.employeeId),
    index("user_reported_issues_status_idx").on(table.adminActionStatus),
    // One pending issue per (employee, number) and per (employee, unlisted phone)
    uniqueIndex("user_reported_issues_pending_number_key")
        .on(table.employeeId, table.mobileNumberId)
        .where(sql`admin_action_status = 'pending_review'`),
    uniqueIndex("user_reported_issues_pending_phone_key")
        .on(table.employeeId, table.reportedPhoneNumber)
        .where(sql`admin_action_status = 'pending_review'`),
]);

// Append-only: rows are never updated or deleted
export const verificationSubmissionLog = pgTable("verification_submission_log", {
    id: serial("id").primaryKey().notNull(),
    employeeId: varchar("employee_id", { length: 10 }).notNull(),
    verificationTokenId: integer("verification_token_id").notNull(),
    mobileNumberId: integer("mobile_number_id"),
    phoneNumber: varchar("phone_number", { length: 20 }).notNull(),
    actionType: text("action_type", { enum: SUBMISSION_ACTIONS }).notNull(),
    purpose: text("purpose"),
    userComment: text("user_comment"),
    createdAt: timestamp("created_at", { withTimezone: true, mode: 'date' }).defaultNow().notNull(),
}, (table) => [
    index("verification_submission_log_number_idx").on(table.mobileNumberId, table.createdAt),
    index("verification_submission_log_token_idx").on(table.verificationTokenId),
    index("verification_submission_log_action_idx").on(table.actionType),
]);

// ============================================================================
// ADMIN ACCESS & OBSERVABILITY
// ============================================================================

export const users = pgTable("users", {
    id: serial("id").primaryKey().notNull(),
    username: varchar("username", { length: 64 }).notNull(),
    passwordHash: text("password_hash").notNull(),
    role: text("role").default('admin').notNull(),
    // Links the admin account to an employee record (operator identity)
    employeeId: varchar("employee_id", { length: 10 }),
    isActive: boolean("is_active").default(true).notNull(),
    lastLogin: timestamp("last_login", { withTimezone: true, mode: 'date' }),
    createdAt: timestamp("created_at", { withTimezone: true, mode: 'date' }).defaultNow().notNull(),
}, (table) => [
    uniqueIndex("users_username_key").on(table.username),
]);

export const revokedTokens = pgTable("revoked_tokens", {
    jti: varchar("jti", { length: 64 }).primaryKey().notNull(),
    expiresAt: timestamp("expires_at", { withTimezone: true, mode: 'date' }).notNull(),
    revokedAt: timestamp("revoked_at", { withTimezone: true, mode: 'date' }).defaultNow().notNull(),
}, (table) => [
    index("revoked_tokens_expires_at_idx").on(table.expiresAt),
]);

export const systemErrors = pgTable("system_errors", {
    id: serial("id").primaryKey().notNull(),
    message: text("message").notNull(),
    stack: text("stack"),
    path: text("path"),
    method: text("method"),
    userId: integer("user_id"),
    severity: text("severity").default('CRITICAL').notNull(),
    metadata: jsonb("metadata"),
    isResolved: boolean("is_resolved").default(false).notNull(),
    createdAt: timestamp("created_at", { withTimezone: true, mode: 'date' }).defaultNow().notNull(),
}, (table) => [
    index("system_errors_created_at_idx").on(table.createdAt),
]);

export type Employee = typeof employees.$inferSelect;
export type MobileNumber = typeof mobileNumbers.$inferSelect;
export type UsageHistoryRow = typeof numberUsageHistory.$inferSelect;
export type ApplicantHistoryRow = typeof numberApplicantHistory.$inferSelect;
export type VerificationBatchTask = typeof verificationBatchTasks.$inferSelect;
export type VerificationToken = typeof verificationTokens.$inferSelect;
export type UserReportedIssue = typeof userReportedIssues.$inferSelect;
export type SubmissionLogRow = typeof verificationSubmissionLog.$inferSelect;
export type User = typeof users.$inferSelect;
