/**
 * Email verification: redeems a token and activates the registration.
 */

import {
    canHandleEvent,
    requireTransition,
    transition,
    type Registration,
    type RetryPolicy,
} from '@regverify/shared';
import { validationLogger } from '../../utils/logger.js';
import type { VerificationTokenService } from '../verificationToken.js';
import { appendAudit, buildAuditEntry } from './auditTrail.js';
import type { RegistrationStore } from './registrationStore.js';

export type EmailVerificationResult =
    | { success: true; registration: Registration }
    | {
        success: false;
        code: 'INVALID_TOKEN' | 'EXPIRED_TOKEN' | 'NOT_FOUND' | 'EMAIL_MISMATCH' | 'INVALID_STATUS';
        error: string;
    };

export class EmailVerificationService {
    private readonly store: RegistrationStore;
    private readonly tokens: VerificationTokenService;
    private readonly retryPolicy: RetryPolicy;

    constructor(store: RegistrationStore, tokens: VerificationTokenService, retryPolicy: RetryPolicy) {
        this.store = store;
        this.tokens = tokens;
        this.retryPolicy = retryPolicy;
    }

    /**
     * Activate the registration the token was issued for. Confirming an
     * already active registration again succeeds without writing.
     *
     * @throws StorageError when the activated registration cannot be saved
     */
    async confirm(token: string, now: Date = new Date()): Promise<EmailVerificationResult> {
        const verified = this.tokens.verify(token);
        if (!verified.success) {
            return { success: false, code: verified.code, error: verified.error };
        }

        const { registrationId, email } = verified.payload;
        const registration = await this.store.findById(registrationId);
        if (!registration) {
            return { success: false, code: 'NOT_FOUND', error: `Registration ${registrationId} not found` };
        }
        if (registration.email.toLowerCase() !== email.toLowerCase()) {
            return { success: false, code: 'EMAIL_MISMATCH', error: 'Verification link does not match this registration' };
        }
        if (registration.status === 'active') {
            return { success: true, registration };
        }

        if (!canHandleEvent(registration.status, 'email_verified')) {
            return {
                success: false,
                code: 'INVALID_STATUS',
                error: `Registration ${registrationId} is ${registration.status}, not awaiting verification`,
            };
        }

        const { registration: activated, effect } = requireTransition(
            registration.id,
            transition(registration, { type: 'email_verified' }, this.retryPolicy, now)
        );
        await this.store.save(activated);
        const log = validationLogger.child({ registrationId });
        log.info('Registration activated');
        await appendAudit(this.store, buildAuditEntry(registration, activated, effect, now), log);
        return { success: true, registration: activated };
    }
}
