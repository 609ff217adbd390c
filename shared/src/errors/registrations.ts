/**
 * Registration lifecycle errors
 */

import type { RegistrationStatus } from '../domain/registrations/types.js';
import type {
    TransitionResult,
    TransitionSuccess,
} from '../domain/registrations/stateMachine.js';

/**
 * Thrown when a caller needs an exception for a rejected state machine event
 * (terminal statuses are never reopened).
 */
export class InvalidTransitionError extends Error {
    readonly name = 'InvalidTransitionError' as const;
    readonly code = 'INVALID_TRANSITION' as const;
    readonly registrationId: string;
    readonly status: RegistrationStatus;

    constructor(registrationId: string, status: RegistrationStatus, message: string) {
        super(message);
        this.registrationId = registrationId;
        this.status = status;
        Object.setPrototypeOf(this, InvalidTransitionError.prototype);
    }
}

/**
 * Unwrap a transition result or throw InvalidTransitionError
 */
export function requireTransition(registrationId: string, result: TransitionResult): TransitionSuccess {
    if (!result.success) {
        throw new InvalidTransitionError(registrationId, result.previousStatus, result.error);
    }
    return result;
}
