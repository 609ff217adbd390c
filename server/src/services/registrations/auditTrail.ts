/**
 * Audit trail for status changes.
 * Written after the change is saved; a failed write is logged and the change stands.
 */

import type { Registration, TransitionEffect } from '@regverify/shared';
import type { Logger } from 'pino';
import { getErrorMessage, getErrorName } from '../../utils/errors.js';
import type { AuditAction, RegistrationAuditEntry, RegistrationStore } from './registrationStore.js';

const EFFECT_ACTIONS: Record<TransitionEffect, AuditAction> = {
    send_verification_email: 'auto_approved',
    retries_exhausted: 'auto_rejected',
    retry_scheduled: 'retry_scheduled',
    activated: 'email_verified',
};

function auditNotes(next: Registration, effect: TransitionEffect): string | null {
    switch (effect) {
        case 'send_verification_email':
            return next.erpStaffName
                ? `Matched ERP record for ${next.erpStaffName}`
                : 'Matched ERP record';
        case 'retries_exhausted':
            return next.lastValidationError;
        case 'retry_scheduled': {
            const at = next.nextAttemptAt ? `, next attempt at ${next.nextAttemptAt.toISOString()}` : '';
            return `${next.lastValidationError ?? 'Validation failed'}${at}`;
        }
        case 'activated':
            return 'Email address verified';
    }
}

export function buildAuditEntry(
    previous: Registration,
    next: Registration,
    effect: TransitionEffect,
    timestamp: Date
): RegistrationAuditEntry {
    return {
        registrationId: next.id,
        action: EFFECT_ACTIONS[effect],
        previousStatus: previous.status,
        newStatus: next.status,
        notes: auditNotes(next, effect),
        isAutomated: effect !== 'activated',
        timestamp,
    };
}

export async function appendAudit(
    store: RegistrationStore,
    entry: RegistrationAuditEntry,
    log: Logger
): Promise<void> {
    try {
        await store.recordAudit(entry);
    } catch (error) {
        log.warn(
            { action: entry.action, errorName: getErrorName(error), error: getErrorMessage(error) },
            'Failed to write audit entry'
        );
    }
}
