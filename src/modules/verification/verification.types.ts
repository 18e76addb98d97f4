import type {
  AdminActionStatus,
  BatchScope,
  BatchStatus,
  DispatchFailure,
  NumberStatus,
} from '../../db/schema';

export interface InitiateVerificationInput {
  scope: BatchScope;
  scopeValues?: string[];
  durationDays?: number;
}

export interface InitiatedBatch {
  batchId: string;
  totalToProcess: number;
}

export interface BatchStatusView {
  batchId: string;
  status: BatchStatus;
  scope: BatchScope;
  scopeValues: string[];
  tokenLifetimeDays: number;
  totalToProcess: number;
  tokensGenerated: number;
  emailsAttempted: number;
  emailsSucceeded: number;
  emailsFailed: number;
  errorSummary: string | null;
  failureDetails: DispatchFailure[];
  createdAt: Date;
  startedAt: Date | null;
  completedAt: Date | null;
}

export type VerificationState = 'pending' | 'confirmed' | 'reported';

export interface VerificationNumberView {
  id: number;
  phoneNumber: string;
  purpose: string | null;
  status: NumberStatus;
  verificationState: VerificationState;
  userComment: string | null;
}

export interface ReportedUnlistedNumberView {
  phoneNumber: string;
  purpose: string | null;
  userComment: string | null;
  reportedAt: Date;
}

export interface VerificationInfo {
  employee: {
    employeeId: string;
    fullName: string;
    departmentName: string | null;
  };
  numbers: VerificationNumberView[];
  previouslyReportedUnlisted: ReportedUnlistedNumberView[];
  expiresAt: Date;
}

export type VerifiedNumberAction = 'confirm_usage' | 'report_issue';

export interface VerifiedNumberEntry {
  mobileNumberId: number;
  action: VerifiedNumberAction;
  purpose?: string | null;
  userComment?: string | null;
}

export interface UnlistedNumberEntry {
  phoneNumber: string;
  purpose: string;
  userComment?: string | null;
}

export interface SubmitVerificationInput {
  verifiedNumbers?: VerifiedNumberEntry[];
  unlistedNumbers?: UnlistedNumberEntry[];
}

export interface SubmissionResult {
  confirmed: number;
  reported: number;
  unlisted: number;
}

export interface AdminStatusFilters {
  employeeId?: string;
  departmentName?: string;
}

export interface VerificationSummary {
  totalPhonesCount: number;
  confirmedPhonesCount: number;
  reportedIssuesCount: number;
  pendingPhonesCount: number;
  newlyReportedPhonesCount: number;
}

export interface ConfirmedPhoneDetail {
  id: number;
  phoneNumber: string;
  departmentName: string | null;
  currentUser: string | null;
  purpose: string | null;
  confirmedBy: string;
  confirmedAt: Date;
}

export interface PendingUserDetail {
  tokenId: number;
  employeeId: string;
  fullName: string;
  email: string | null;
  departmentName: string | null;
  expiresAt: Date;
}

export interface ReportedIssueDetail {
  issueId: number;
  phoneNumber: string | null;
  reportedBy: string;
  employeeId: string;
  comment: string | null;
  purpose: string | null;
  originalStatus: string | null;
  adminActionStatus: AdminActionStatus;
  reportedAt: Date;
}

export interface UnlistedNumberDetail {
  issueId: number;
  phoneNumber: string | null;
  reportedBy: string;
  employeeId: string;
  purpose: string | null;
  comment: string | null;
  adminActionStatus: AdminActionStatus;
  reportedAt: Date;
}

export interface AdminStatusView {
  summary: VerificationSummary;
  confirmedPhones: ConfirmedPhoneDetail[];
  pendingUsers: PendingUserDetail[];
  reportedIssues: ReportedIssueDetail[];
  unlistedNumbers: UnlistedNumberDetail[];
}

export interface ResolveIssueInput {
  status: Exclude<AdminActionStatus, 'pending_review'>;
  remarks?: string | null;
}
