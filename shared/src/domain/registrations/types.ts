/**
 * Registration Domain Types
 *
 * Entities shared by the verification pipeline and the storage layer.
 * NO DATABASE DEPENDENCIES - plain data only.
 */

// ============================================
// REGISTRATION
// ============================================

export type RegistrationStatus = 'pending' | 'approved' | 'active' | 'rejected';

export const REGISTRATION_STATUSES: readonly RegistrationStatus[] = [
    'pending', 'approved', 'active', 'rejected',
] as const;

/** Terminal statuses are never reopened by the pipeline */
export const TERMINAL_REGISTRATION_STATUSES: readonly RegistrationStatus[] = [
    'active', 'rejected',
] as const;

export interface Registration {
    id: string;
    /** ERP staff identifier; null when intake could not capture it */
    staffNumber: string | null;
    email: string;
    fullName: string;
    status: RegistrationStatus;
    /** Validation attempts consumed so far */
    retryCount: number;
    /** Pending rows with null are due immediately */
    nextAttemptAt: Date | null;
    lastValidationError: string | null;
    lastAttemptAt: Date | null;
    approvedAt: Date | null;
    activatedAt: Date | null;
    rejectedAt: Date | null;
    verificationEmailSentAt: Date | null;
    erpStaffName: string | null;
    erpDepartment: string | null;
    erpExitDate: Date | null;
    createdAt: Date;
    updatedAt: Date;
}

// ============================================
// ERP RECORDS
// ============================================

export interface EmployeeRecord {
    staffId: string;
    fullName: string | null;
    nationalId: string | null;
    department: string | null;
    employmentStatus: string | null;
    hireDate: Date | null;
    exitDate: Date | null;
}

/** Where a resolved employee record came from */
export type RecordSource = 'cache' | 'remote';

// ============================================
// VALIDATION OUTCOMES
// ============================================

export interface AcceptedOutcome {
    kind: 'accepted';
    record: EmployeeRecord;
    source: RecordSource;
}

export interface RejectedOutcome {
    kind: 'rejected';
    reason: string;
}

export interface TransientOutcome {
    kind: 'transient';
    reason: string;
}

export type ValidationOutcome = AcceptedOutcome | RejectedOutcome | TransientOutcome;

// ============================================
// RETRY POLICY
// ============================================

export type RetryBackoff = 'fixed' | 'exponential';

/**
 * consume: transient failures use up a retry slot (bounded total attempts)
 * exempt: transient failures reschedule without touching retryCount
 */
export type TransientPolicy = 'consume' | 'exempt';

export interface RetryPolicy {
    maxRetryAttempts: number;
    retryDelayMs: number;
    backoff: RetryBackoff;
    transientPolicy: TransientPolicy;
}
