/**
 * Registration Status State Machine - Pure Domain Logic
 * Single source of truth for registration lifecycle transitions.
 * NO DATABASE DEPENDENCIES - pure functions only.
 *
 * STATUS FLOW:
 * pending ──accepted──→ approved ──email_verified──→ active
 *    │ ↺ rejected/transient (retry budget left)
 *    └──rejected/transient (budget exhausted)──→ rejected
 *
 * active and rejected are terminal.
 */

import type {
    Registration,
    RegistrationStatus,
    RetryPolicy,
    ValidationOutcome,
} from './types.js';
import { REGISTRATION_STATUSES, TERMINAL_REGISTRATION_STATUSES } from './types.js';

// ============================================
// TYPE DEFINITIONS
// ============================================

export type RegistrationEvent =
    | { type: 'validation'; outcome: ValidationOutcome }
    | { type: 'email_verified' };

export type RegistrationEventType = RegistrationEvent['type'];

/** What the caller has to do after persisting the transition */
export type TransitionEffect =
    | 'send_verification_email'
    | 'retry_scheduled'
    | 'retries_exhausted'
    | 'activated';

export interface TransitionSuccess {
    success: true;
    registration: Registration;
    previousStatus: RegistrationStatus;
    newStatus: RegistrationStatus;
    effect: TransitionEffect;
}

export interface TransitionFailure {
    success: false;
    previousStatus: RegistrationStatus;
    error: string;
}

export type TransitionResult = TransitionSuccess | TransitionFailure;

// ============================================
// STATE MACHINE DEFINITION
// ============================================

export const REGISTRATION_TRANSITIONS: Record<RegistrationStatus, readonly RegistrationEventType[]> = {
    pending: ['validation'],
    approved: ['email_verified'],
    active: [],
    rejected: [],
};

// ============================================
// VALIDATION FUNCTIONS
// ============================================

export function isValidRegistrationStatus(status: string): status is RegistrationStatus {
    return REGISTRATION_STATUSES.some((known) => known === status);
}

export function isTerminalRegistrationStatus(status: RegistrationStatus): boolean {
    return TERMINAL_REGISTRATION_STATUSES.includes(status);
}

export function canHandleEvent(status: RegistrationStatus, eventType: RegistrationEventType): boolean {
    return REGISTRATION_TRANSITIONS[status].includes(eventType);
}

export function buildRegistrationTransitionError(status: RegistrationStatus, eventType: RegistrationEventType): string {
    const allowed = REGISTRATION_TRANSITIONS[status];
    return `Cannot apply '${eventType}' to a '${status}' registration. Allowed: ${allowed.join(', ') || 'none'}`;
}

/**
 * Whether a registration should be picked up by a batch at `now`
 */
export function isEligibleForValidation(registration: Registration, now: Date): boolean {
    if (registration.status !== 'pending') return false;
    if (!registration.nextAttemptAt) return true;
    return registration.nextAttemptAt.getTime() <= now.getTime();
}

// ============================================
// RETRY SCHEDULING
// ============================================

/**
 * Delay before the next attempt once `attempt` attempts have been used.
 * fixed: base delay every time; exponential: base * 2^(attempt - 1)
 */
export function computeRetryDelayMs(policy: RetryPolicy, attempt: number): number {
    if (policy.backoff === 'exponential') {
        return policy.retryDelayMs * Math.pow(2, Math.max(0, attempt - 1));
    }
    return policy.retryDelayMs;
}

// ============================================
// TRANSITIONS
// ============================================

function applyFailure(
    registration: Registration,
    reason: string,
    consumesAttempt: boolean,
    policy: RetryPolicy,
    now: Date
): TransitionSuccess {
    const base = {
        ...registration,
        lastValidationError: reason,
        lastAttemptAt: now,
        updatedAt: now,
    };

    if (!consumesAttempt) {
        return {
            success: true,
            registration: {
                ...base,
                nextAttemptAt: new Date(now.getTime() + policy.retryDelayMs),
            },
            previousStatus: 'pending',
            newStatus: 'pending',
            effect: 'retry_scheduled',
        };
    }

    const attempts = registration.retryCount + 1;

    if (attempts >= policy.maxRetryAttempts) {
        return {
            success: true,
            registration: {
                ...base,
                status: 'rejected',
                retryCount: Math.min(attempts, policy.maxRetryAttempts),
                nextAttemptAt: null,
                rejectedAt: now,
            },
            previousStatus: 'pending',
            newStatus: 'rejected',
            effect: 'retries_exhausted',
        };
    }

    return {
        success: true,
        registration: {
            ...base,
            retryCount: attempts,
            nextAttemptAt: new Date(now.getTime() + computeRetryDelayMs(policy, attempts)),
        },
        previousStatus: 'pending',
        newStatus: 'pending',
        effect: 'retry_scheduled',
    };
}

function applyValidation(
    registration: Registration,
    outcome: ValidationOutcome,
    policy: RetryPolicy,
    now: Date
): TransitionSuccess {
    switch (outcome.kind) {
        case 'accepted':
            return {
                success: true,
                registration: {
                    ...registration,
                    status: 'approved',
                    nextAttemptAt: null,
                    lastValidationError: null,
                    lastAttemptAt: now,
                    approvedAt: now,
                    erpStaffName: outcome.record.fullName,
                    erpDepartment: outcome.record.department,
                    erpExitDate: outcome.record.exitDate,
                    updatedAt: now,
                },
                previousStatus: 'pending',
                newStatus: 'approved',
                effect: 'send_verification_email',
            };
        case 'rejected':
            return applyFailure(registration, outcome.reason, true, policy, now);
        case 'transient':
            return applyFailure(
                registration,
                outcome.reason,
                policy.transientPolicy === 'consume',
                policy,
                now
            );
    }
}

/**
 * Apply an event to a registration. Never mutates the input.
 * Events the current status does not accept yield { success: false }.
 */
export function transition(
    registration: Registration,
    event: RegistrationEvent,
    policy: RetryPolicy,
    now: Date
): TransitionResult {
    const previousStatus = registration.status;

    if (!canHandleEvent(previousStatus, event.type)) {
        return {
            success: false,
            previousStatus,
            error: buildRegistrationTransitionError(previousStatus, event.type),
        };
    }

    if (event.type === 'validation') {
        return applyValidation(registration, event.outcome, policy, now);
    }

    return {
        success: true,
        registration: {
            ...registration,
            status: 'active',
            activatedAt: now,
            updatedAt: now,
        },
        previousStatus,
        newStatus: 'active',
        effect: 'activated',
    };
}
