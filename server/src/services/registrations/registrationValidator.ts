/**
 * Registration Validator
 *
 * One idempotent check of a pending registration against the ERP:
 *   missing staff number      → rejected
 *   ERP unreachable / 5xx     → transient
 *   no record                 → rejected
 *   record fails a rule       → rejected
 *   otherwise                 → accepted
 *
 * Retry bookkeeping belongs to the state machine, not here.
 */

import {
    evaluateEmployeeRecord,
    type AcceptanceRuleOptions,
    type AcceptedOutcome,
    type Registration,
    type ValidationOutcome,
} from '@regverify/shared';
import { validationLogger } from '../../utils/logger.js';
import {
    TransientRemoteError,
    ValidationRejection,
    getErrorMessage,
    getErrorName,
} from '../../utils/errors.js';
import type { ErpDirectory } from '../erp/erpDirectory.js';

export type RegistrationValidatorOptions = AcceptanceRuleOptions;

/**
 * Map a classified failure to an outcome. Anything unclassified is rethrown.
 */
export function outcomeFromError(error: unknown): ValidationOutcome {
    if (error instanceof ValidationRejection) {
        return { kind: 'rejected', reason: error.message };
    }
    if (error instanceof TransientRemoteError) {
        return { kind: 'transient', reason: error.message };
    }
    throw error;
}

export class RegistrationValidator {
    private readonly directory: ErpDirectory;
    private readonly options: RegistrationValidatorOptions;

    constructor(directory: ErpDirectory, options: RegistrationValidatorOptions) {
        this.directory = directory;
        this.options = options;
    }

    async validate(registration: Registration, now: Date): Promise<ValidationOutcome> {
        try {
            return await this.check(registration, now);
        } catch (error) {
            const outcome = outcomeFromError(error);
            const context = {
                registrationId: registration.id,
                staffNumber: registration.staffNumber,
                errorName: getErrorName(error),
                reason: getErrorMessage(error),
            };
            if (outcome.kind === 'transient') {
                validationLogger.warn(context, 'ERP unavailable, validation deferred');
            } else {
                validationLogger.info(context, 'Registration rejected by validation');
            }
            return outcome;
        }
    }

    /**
     * @throws ValidationRejection when the registration cannot be approved
     * @throws TransientRemoteError when the ERP could not answer
     */
    private async check(registration: Registration, now: Date): Promise<AcceptedOutcome> {
        const staffNumber = registration.staffNumber?.trim();
        if (!staffNumber) {
            throw new ValidationRejection('Registration has no staff number', 'staff_number');
        }

        const resolution = await this.directory.resolve(staffNumber);
        if (!resolution.found) {
            throw new ValidationRejection(
                resolution.searched === 'cache'
                    ? `Staff number ${staffNumber} not found in ERP cache`
                    : `Staff number ${staffNumber} not found in ERP`,
                'record_exists'
            );
        }

        const verdict = evaluateEmployeeRecord(registration, resolution.record, this.options, now);
        if (!verdict.passed) {
            throw new ValidationRejection(verdict.reason, verdict.rule);
        }

        validationLogger.debug(
            {
                registrationId: registration.id,
                staffNumber,
                source: resolution.source,
                nameSimilarity: verdict.nameSimilarity,
            },
            'Registration accepted'
        );
        return { kind: 'accepted', record: resolution.record, source: resolution.source };
    }
}
