/**
 * Database table types for Kysely
 * Mirrors server/src/db/schema.sql
 */

import type { ColumnType, Generated } from 'kysely';

export type Timestamp = ColumnType<Date, Date | string, Date | string>;
/** Filled by a column default on insert */
export type DefaultedTimestamp = ColumnType<Date, Date | string | undefined, Date | string>;
export type NullableTimestamp = ColumnType<Date | null, Date | string | null, Date | string | null>;

export interface RegistrationsTable {
    id: string;
    staffNumber: string | null;
    email: string;
    fullName: string;
    status: string;
    retryCount: Generated<number>;
    nextAttemptAt: NullableTimestamp;
    lastValidationError: string | null;
    lastAttemptAt: NullableTimestamp;
    approvedAt: NullableTimestamp;
    activatedAt: NullableTimestamp;
    rejectedAt: NullableTimestamp;
    verificationEmailSentAt: NullableTimestamp;
    erpStaffName: string | null;
    erpDepartment: string | null;
    erpExitDate: NullableTimestamp;
    createdAt: DefaultedTimestamp;
    updatedAt: DefaultedTimestamp;
}

export interface WorkerRunsTable {
    id: Generated<string>;
    workerName: string;
    status: Generated<string>;
    triggeredBy: string;
    startedAt: Timestamp;
    completedAt: NullableTimestamp;
    durationMs: number | null;
    /** jsonb; written as a JSON string */
    result: ColumnType<unknown, string | null, string | null>;
    error: string | null;
}

export interface AuditLogsTable {
    id: Generated<string>;
    registrationId: string;
    action: string;
    previousStatus: string;
    newStatus: string;
    notes: string | null;
    isAutomated: boolean;
    timestamp: Timestamp;
}

export interface DB {
    registrations: RegistrationsTable;
    audit_logs: AuditLogsTable;
    worker_runs: WorkerRunsTable;
}
