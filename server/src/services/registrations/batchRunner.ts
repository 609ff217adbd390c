/**
 * Batch Runner
 *
 * One pass over the registrations that are due:
 *   load → (per registration) validate → transition → save → notify
 *
 * Registrations are processed in chunks of `concurrency`. A failure on one
 * registration is counted and logged; the batch carries on with the rest.
 */

import {
    transition,
    type Registration,
    type RetryPolicy,
    type TransitionEffect,
} from '@regverify/shared';
import { batchLogger } from '../../utils/logger.js';
import { getErrorMessage, getErrorName } from '../../utils/errors.js';
import type { NotificationSender } from '../email/notificationSender.js';
import type { VerificationTokenService } from '../verificationToken.js';
import { appendAudit, buildAuditEntry } from './auditTrail.js';
import type { RegistrationStore } from './registrationStore.js';
import type { RegistrationValidator } from './registrationValidator.js';

// ============================================
// TYPES
// ============================================

export interface BatchResult {
    startedAt: Date;
    durationMs: number;
    /** Distinct registrations picked up */
    processed: number;
    approved: number;
    /** Moved to rejected (retry budget used up) */
    rejected: number;
    /** Still pending with a new nextAttemptAt */
    retried: number;
    /** Not persisted: unexpected error, invalid transition or failed save */
    failed: number;
}

export interface BatchRunnerOptions {
    batchSize: number;
    concurrency: number;
    retryPolicy: RetryPolicy;
    verificationBaseUrl: string;
    now?: () => Date;
}

export interface BatchRunnerDeps {
    store: RegistrationStore;
    validator: RegistrationValidator;
    notifier: NotificationSender;
    tokens: VerificationTokenService;
}

type ItemResult = 'approved' | 'rejected' | 'retried' | 'failed';

const EFFECT_RESULTS: Record<TransitionEffect, ItemResult> = {
    send_verification_email: 'approved',
    retries_exhausted: 'rejected',
    retry_scheduled: 'retried',
    // never produced by a validation event
    activated: 'failed',
};

/** Drop repeated ids, keeping the first occurrence */
export function dedupeRegistrations(registrations: Registration[]): Registration[] {
    const seen = new Set<string>();
    return registrations.filter((registration) => {
        if (seen.has(registration.id)) return false;
        seen.add(registration.id);
        return true;
    });
}

// ============================================
// RUNNER
// ============================================

export class BatchRunner {
    private readonly deps: BatchRunnerDeps;
    private readonly options: BatchRunnerOptions;
    private readonly now: () => Date;

    constructor(deps: BatchRunnerDeps, options: BatchRunnerOptions) {
        this.deps = deps;
        this.options = options;
        this.now = options.now ?? (() => new Date());
    }

    /**
     * Process every eligible registration once.
     *
     * @throws StorageError when the batch cannot be loaded at all
     */
    async runOnce(): Promise<BatchResult> {
        const startedAt = this.now();
        const loaded = await this.deps.store.loadEligiblePending(this.options.batchSize, startedAt);
        const registrations = dedupeRegistrations(loaded);

        const result: BatchResult = {
            startedAt,
            durationMs: 0,
            processed: registrations.length,
            approved: 0,
            rejected: 0,
            retried: 0,
            failed: 0,
        };

        if (registrations.length === 0) {
            batchLogger.debug('No registrations due');
            result.durationMs = this.now().getTime() - startedAt.getTime();
            return result;
        }

        batchLogger.info({ count: registrations.length }, 'Batch started');

        const concurrency = Math.max(1, this.options.concurrency);
        for (let i = 0; i < registrations.length; i += concurrency) {
            const chunk = registrations.slice(i, i + concurrency);
            const outcomes = await Promise.all(chunk.map((registration) => this.processOne(registration)));
            for (const outcome of outcomes) {
                result[outcome]++;
            }
        }

        result.durationMs = this.now().getTime() - startedAt.getTime();
        batchLogger.info(
            {
                processed: result.processed,
                approved: result.approved,
                rejected: result.rejected,
                retried: result.retried,
                failed: result.failed,
                durationMs: result.durationMs,
            },
            'Batch complete'
        );
        return result;
    }

    private async processOne(registration: Registration): Promise<ItemResult> {
        const log = batchLogger.child({ registrationId: registration.id });

        let next: Registration;
        let effect: TransitionEffect;
        let now: Date;
        try {
            now = this.now();
            const outcome = await this.deps.validator.validate(registration, now);
            const transitioned = transition(
                registration,
                { type: 'validation', outcome },
                this.options.retryPolicy,
                now
            );
            if (!transitioned.success) {
                log.error({ status: registration.status, error: transitioned.error }, 'Invalid transition, skipping');
                return 'failed';
            }
            next = transitioned.registration;
            effect = transitioned.effect;
        } catch (error) {
            log.error({ errorName: getErrorName(error), error: getErrorMessage(error) }, 'Validation failed unexpectedly');
            return 'failed';
        }

        try {
            await this.deps.store.save(next);
        } catch (error) {
            log.error({ errorName: getErrorName(error), error: getErrorMessage(error) }, 'Failed to save registration');
            return 'failed';
        }

        log.debug({ status: next.status, effect, retryCount: next.retryCount }, 'Registration updated');
        await appendAudit(this.deps.store, buildAuditEntry(registration, next, effect, now), log);

        if (effect === 'send_verification_email') {
            await this.sendVerification(next);
        }
        return EFFECT_RESULTS[effect];
    }

    /**
     * Issue the token and email it. Errors are logged; the approval stands.
     */
    private async sendVerification(registration: Registration): Promise<void> {
        const log = batchLogger.child({ registrationId: registration.id });

        try {
            const token = this.deps.tokens.issue(registration);
            const url = this.deps.tokens.buildVerificationUrl(this.options.verificationBaseUrl, token);
            await this.deps.notifier.sendVerificationEmail(registration, url);
        } catch (error) {
            log.warn({ errorName: getErrorName(error), error: getErrorMessage(error) }, 'Verification email not sent');
            return;
        }

        const sentAt = this.now();
        try {
            await this.deps.store.save({ ...registration, verificationEmailSentAt: sentAt, updatedAt: sentAt });
        } catch (error) {
            log.warn({ errorName: getErrorName(error), error: getErrorMessage(error) }, 'Failed to record verification email');
        }
    }
}
