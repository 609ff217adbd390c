/**
 * Custom error classes for the verification pipeline
 * Use these instead of generic Error so callers can classify failures
 */

/**
 * Base interface for pipeline errors with a stable code
 */
export interface PipelineError extends Error {
    readonly code: string;
}

/**
 * Transient remote error - the ERP could not answer right now
 * Use for network failures, timeouts, 5xx responses and an open circuit
 *
 * @example
 * throw new TransientRemoteError('ERP request timed out', 'erp_api', null, err);
 */
export class TransientRemoteError extends Error implements PipelineError {
    readonly name = 'TransientRemoteError' as const;
    readonly code = 'TRANSIENT_REMOTE' as const;
    readonly serviceName: string;
    readonly statusCode: number | null;
    readonly originalError: Error | null;

    constructor(
        message: string,
        serviceName: string = 'erp_api',
        statusCode: number | null = null,
        originalError: Error | null = null
    ) {
        super(message);
        this.serviceName = serviceName;
        this.statusCode = statusCode;
        this.originalError = originalError;
        Object.setPrototypeOf(this, TransientRemoteError.prototype);
    }
}

/**
 * Validation rejection - the record was found but fails a business rule
 */
export class ValidationRejection extends Error implements PipelineError {
    readonly name = 'ValidationRejection' as const;
    readonly code = 'VALIDATION_REJECTED' as const;
    readonly rule: string | null;

    constructor(message: string, rule: string | null = null) {
        super(message);
        this.rule = rule;
        Object.setPrototypeOf(this, ValidationRejection.prototype);
    }
}

/**
 * Storage error - a registration could not be read or written
 * The stored row is left as it was
 *
 * @example
 * throw new StorageError('Failed to save registration R1', 'save', err);
 */
export class StorageError extends Error implements PipelineError {
    readonly name = 'StorageError' as const;
    readonly code = 'STORAGE_FAILED' as const;
    readonly operation: string;
    readonly originalError: Error | null;

    constructor(message: string, operation: string, originalError: Error | null = null) {
        super(message);
        this.operation = operation;
        this.originalError = originalError;
        Object.setPrototypeOf(this, StorageError.prototype);
    }
}

/**
 * Configuration error - invalid environment, cron expression or time zone
 * Only raised while loading configuration; fatal at startup
 */
export class ConfigurationError extends Error implements PipelineError {
    readonly name = 'ConfigurationError' as const;
    readonly code = 'INVALID_CONFIGURATION' as const;
    readonly issues: readonly string[];

    constructor(message: string, issues: readonly string[] = []) {
        super(issues.length > 0 ? `${message}:\n  - ${issues.join('\n  - ')}` : message);
        this.issues = issues;
        Object.setPrototypeOf(this, ConfigurationError.prototype);
    }
}

/**
 * Notification error - the verification email could not be sent
 */
export class NotificationError extends Error implements PipelineError {
    readonly name = 'NotificationError' as const;
    readonly code = 'NOTIFICATION_FAILED' as const;
    readonly recipient: string;
    readonly originalError: Error | null;

    constructor(message: string, recipient: string, originalError: Error | null = null) {
        super(message);
        this.recipient = recipient;
        this.originalError = originalError;
        Object.setPrototypeOf(this, NotificationError.prototype);
    }
}

/**
 * Type guard to check if an error is one of the pipeline errors
 */
export function isPipelineError(error: unknown): error is PipelineError {
    return (
        error instanceof TransientRemoteError ||
        error instanceof ValidationRejection ||
        error instanceof StorageError ||
        error instanceof ConfigurationError ||
        error instanceof NotificationError
    );
}

/** Message of anything thrown */
export function getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/** Class name of anything thrown, for log fields */
export function getErrorName(error: unknown): string {
    return error instanceof Error ? error.name : typeof error;
}

/** Narrow an unknown throw to an Error, wrapping non-errors */
export function toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
}
