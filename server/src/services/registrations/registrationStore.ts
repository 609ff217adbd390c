/**
 * Storage contract for registrations.
 * The batch runner and email verification only talk to this interface.
 */

import type { Registration, RegistrationStatus } from '@regverify/shared';

export type AuditAction = 'auto_approved' | 'auto_rejected' | 'retry_scheduled' | 'email_verified';

/** One persisted status change, kept for audit */
export interface RegistrationAuditEntry {
    registrationId: string;
    action: AuditAction;
    previousStatus: RegistrationStatus;
    newStatus: RegistrationStatus;
    notes: string | null;
    /** false when a person triggered the change (email verification) */
    isAutomated: boolean;
    timestamp: Date;
}

export interface RegistrationStore {
    /**
     * Pending registrations due at `now`, oldest `nextAttemptAt` first
     * (rows with no `nextAttemptAt` come first), at most `limit`
     */
    loadEligiblePending(limit: number, now: Date): Promise<Registration[]>;

    /**
     * Persist the mutable fields of a registration
     *
     * @throws StorageError when the row could not be written
     */
    save(registration: Registration): Promise<void>;

    findById(id: string): Promise<Registration | null>;

    /**
     * Append an audit entry for a change that has been saved
     *
     * @throws StorageError when the entry could not be written
     */
    recordAudit(entry: RegistrationAuditEntry): Promise<void>;
}
