/**
 * Unit tests for the Registration State Machine (shared domain)
 */

import {
    transition,
    canHandleEvent,
    computeRetryDelayMs,
    isEligibleForValidation,
    isTerminalRegistrationStatus,
    isValidRegistrationStatus,
    REGISTRATION_TRANSITIONS,
    type Registration,
    type RetryPolicy,
    type EmployeeRecord,
    type TransitionResult,
    type TransitionSuccess,
} from '../index.js';

const MINUTE = 60_000;
const t0 = new Date('2026-03-02T09:00:00.000Z');

const policy: RetryPolicy = {
    maxRetryAttempts: 3,
    retryDelayMs: 10 * MINUTE,
    backoff: 'fixed',
    transientPolicy: 'consume',
};

function makeRegistration(overrides: Partial<Registration> = {}): Registration {
    return {
        id: 'R1',
        staffNumber: 'S100',
        email: 'alumnus@example.com',
        fullName: 'Jane Wanjiru',
        status: 'pending',
        retryCount: 0,
        nextAttemptAt: t0,
        lastValidationError: null,
        lastAttemptAt: null,
        approvedAt: null,
        activatedAt: null,
        rejectedAt: null,
        verificationEmailSentAt: null,
        erpStaffName: null,
        erpDepartment: null,
        erpExitDate: null,
        createdAt: t0,
        updatedAt: t0,
        ...overrides,
    };
}

const record: EmployeeRecord = {
    staffId: 'S100',
    fullName: 'Jane Wanjiru',
    nationalId: '12345678',
    department: 'Flight Operations',
    employmentStatus: 'TERMINATED',
    hireDate: new Date('2010-01-04T00:00:00.000Z'),
    exitDate: new Date('2024-06-30T00:00:00.000Z'),
};

function expectSuccess(result: TransitionResult): TransitionSuccess {
    if (!result.success) {
        throw new Error(`expected success, got: ${result.error}`);
    }
    return result;
}

function after(minutes: number, from: Date = t0): Date {
    return new Date(from.getTime() + minutes * MINUTE);
}

describe('registrationStateMachine', () => {
    describe('REGISTRATION_TRANSITIONS', () => {
        it('only lets pending and approved registrations move', () => {
            expect(REGISTRATION_TRANSITIONS).toEqual({
                pending: ['validation'],
                approved: ['email_verified'],
                active: [],
                rejected: [],
            });
        });

        it('reports handled events per status', () => {
            expect(canHandleEvent('pending', 'validation')).toBe(true);
            expect(canHandleEvent('pending', 'email_verified')).toBe(false);
            expect(canHandleEvent('approved', 'email_verified')).toBe(true);
            expect(canHandleEvent('rejected', 'validation')).toBe(false);
        });
    });

    describe('status helpers', () => {
        it('recognises valid statuses case-sensitively', () => {
            expect(isValidRegistrationStatus('pending')).toBe(true);
            expect(isValidRegistrationStatus('active')).toBe(true);
            expect(isValidRegistrationStatus('Pending')).toBe(false);
            expect(isValidRegistrationStatus('')).toBe(false);
        });

        it('treats active and rejected as terminal', () => {
            expect(isTerminalRegistrationStatus('active')).toBe(true);
            expect(isTerminalRegistrationStatus('rejected')).toBe(true);
            expect(isTerminalRegistrationStatus('pending')).toBe(false);
            expect(isTerminalRegistrationStatus('approved')).toBe(false);
        });
    });

    describe('isEligibleForValidation', () => {
        it('accepts pending rows that are due', () => {
            expect(isEligibleForValidation(makeRegistration({ nextAttemptAt: t0 }), t0)).toBe(true);
            expect(isEligibleForValidation(makeRegistration({ nextAttemptAt: null }), t0)).toBe(true);
        });

        it('skips rows that are not yet due or not pending', () => {
            expect(isEligibleForValidation(makeRegistration({ nextAttemptAt: after(1) }), t0)).toBe(false);
            expect(isEligibleForValidation(makeRegistration({ status: 'approved' }), t0)).toBe(false);
        });
    });

    describe('computeRetryDelayMs', () => {
        it('uses the base delay for fixed backoff', () => {
            expect(computeRetryDelayMs(policy, 1)).toBe(10 * MINUTE);
            expect(computeRetryDelayMs(policy, 4)).toBe(10 * MINUTE);
        });

        it('doubles per attempt for exponential backoff', () => {
            const exponential: RetryPolicy = { ...policy, backoff: 'exponential' };
            expect(computeRetryDelayMs(exponential, 1)).toBe(10 * MINUTE);
            expect(computeRetryDelayMs(exponential, 2)).toBe(20 * MINUTE);
            expect(computeRetryDelayMs(exponential, 4)).toBe(80 * MINUTE);
        });
    });

    describe('pending + accepted', () => {
        it('moves to approved without touching retryCount', () => {
            const registration = makeRegistration({ retryCount: 2, lastValidationError: 'ERP timeout' });
            const result = expectSuccess(transition(
                registration,
                { type: 'validation', outcome: { kind: 'accepted', record, source: 'cache' } },
                policy,
                t0
            ));

            expect(result.previousStatus).toBe('pending');
            expect(result.newStatus).toBe('approved');
            expect(result.effect).toBe('send_verification_email');
            expect(result.registration.status).toBe('approved');
            expect(result.registration.retryCount).toBe(2);
            expect(result.registration.lastValidationError).toBeNull();
            expect(result.registration.nextAttemptAt).toBeNull();
            expect(result.registration.approvedAt).toEqual(t0);
            expect(result.registration.erpStaffName).toBe('Jane Wanjiru');
            expect(result.registration.erpDepartment).toBe('Flight Operations');
            expect(result.registration.erpExitDate).toEqual(new Date('2024-06-30T00:00:00.000Z'));
        });

        it('does not mutate the input registration', () => {
            const registration = makeRegistration();
            transition(registration, { type: 'validation', outcome: { kind: 'accepted', record, source: 'remote' } }, policy, t0);
            expect(registration.status).toBe('pending');
            expect(registration.approvedAt).toBeNull();
        });
    });

    describe('retry bookkeeping', () => {
        it('walks transient → rejected → rejected into a terminal rejection', () => {
            const first = expectSuccess(transition(
                makeRegistration(),
                { type: 'validation', outcome: { kind: 'transient', reason: 'ERP request timed out' } },
                policy,
                t0
            ));
            expect(first.registration.status).toBe('pending');
            expect(first.registration.retryCount).toBe(1);
            expect(first.registration.nextAttemptAt).toEqual(after(10));
            expect(first.registration.lastValidationError).toBe('ERP request timed out');
            expect(first.effect).toBe('retry_scheduled');

            const t1 = after(10);
            const second = expectSuccess(transition(
                first.registration,
                { type: 'validation', outcome: { kind: 'rejected', reason: 'Name does not match' } },
                policy,
                t1
            ));
            expect(second.registration.status).toBe('pending');
            expect(second.registration.retryCount).toBe(2);
            expect(second.registration.nextAttemptAt).toEqual(after(10, t1));

            const t2 = after(10, t1);
            const third = expectSuccess(transition(
                second.registration,
                { type: 'validation', outcome: { kind: 'rejected', reason: 'Name does not match' } },
                policy,
                t2
            ));
            expect(third.newStatus).toBe('rejected');
            expect(third.effect).toBe('retries_exhausted');
            expect(third.registration.retryCount).toBe(3);
            expect(third.registration.nextAttemptAt).toBeNull();
            expect(third.registration.rejectedAt).toEqual(t2);
            expect(third.registration.lastValidationError).toBe('Name does not match');
        });

        it('leaves the registration pending at maxRetryAttempts - 1 failures', () => {
            let registration = makeRegistration();
            for (let i = 0; i < policy.maxRetryAttempts - 1; i++) {
                registration = expectSuccess(transition(
                    registration,
                    { type: 'validation', outcome: { kind: 'rejected', reason: 'not found' } },
                    policy,
                    t0
                )).registration;
            }
            expect(registration.status).toBe('pending');
            expect(registration.retryCount).toBe(policy.maxRetryAttempts - 1);
        });

        it('schedules exponential delays from the attempt count', () => {
            const exponential: RetryPolicy = { ...policy, maxRetryAttempts: 5, backoff: 'exponential' };
            const result = expectSuccess(transition(
                makeRegistration({ retryCount: 2 }),
                { type: 'validation', outcome: { kind: 'rejected', reason: 'not found' } },
                exponential,
                t0
            ));
            expect(result.registration.retryCount).toBe(3);
            expect(result.registration.nextAttemptAt).toEqual(after(40));
        });

        it('reschedules transient failures without spending a slot when exempt', () => {
            const exempt: RetryPolicy = { ...policy, transientPolicy: 'exempt' };
            const result = expectSuccess(transition(
                makeRegistration({ retryCount: 2 }),
                { type: 'validation', outcome: { kind: 'transient', reason: 'ECONNREFUSED' } },
                exempt,
                t0
            ));
            expect(result.newStatus).toBe('pending');
            expect(result.registration.retryCount).toBe(2);
            expect(result.registration.nextAttemptAt).toEqual(after(10));
            expect(result.registration.lastValidationError).toBe('ECONNREFUSED');
        });
    });

    describe('approved + email_verified', () => {
        it('activates the registration', () => {
            const result = expectSuccess(transition(
                makeRegistration({ status: 'approved', approvedAt: t0 }),
                { type: 'email_verified' },
                policy,
                after(60)
            ));
            expect(result.newStatus).toBe('active');
            expect(result.effect).toBe('activated');
            expect(result.registration.activatedAt).toEqual(after(60));
        });
    });

    describe('invalid transitions', () => {
        it('refuses to validate an approved registration', () => {
            const result = transition(
                makeRegistration({ status: 'approved' }),
                { type: 'validation', outcome: { kind: 'accepted', record, source: 'cache' } },
                policy,
                t0
            );
            expect(result).toEqual({
                success: false,
                previousStatus: 'approved',
                error: "Cannot apply 'validation' to a 'approved' registration. Allowed: email_verified",
            });
        });

        it('never reopens terminal registrations', () => {
            for (const status of ['active', 'rejected'] as const) {
                const result = transition(
                    makeRegistration({ status }),
                    { type: 'validation', outcome: { kind: 'rejected', reason: 'x' } },
                    policy,
                    t0
                );
                expect(result.success).toBe(false);
                if (!result.success) {
                    expect(result.error).toBe(`Cannot apply 'validation' to a '${status}' registration. Allowed: none`);
                }
            }
        });

        it('refuses email verification on a pending registration', () => {
            const result = transition(makeRegistration(), { type: 'email_verified' }, policy, t0);
            expect(result.success).toBe(false);
        });
    });
});
