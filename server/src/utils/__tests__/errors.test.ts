/**
 * Unit tests for pipeline error classes
 */

import {
    ConfigurationError,
    NotificationError,
    StorageError,
    TransientRemoteError,
    ValidationRejection,
    getErrorMessage,
    getErrorName,
    isPipelineError,
    toError,
} from '../errors.js';

describe('pipeline errors', () => {
    it('keep their class identity and code', () => {
        const transient = new TransientRemoteError('ERP timed out', 'erp_api', 504);
        expect(transient).toBeInstanceOf(TransientRemoteError);
        expect(transient).toBeInstanceOf(Error);
        expect(transient.name).toBe('TransientRemoteError');
        expect(transient.code).toBe('TRANSIENT_REMOTE');
        expect(transient.statusCode).toBe(504);

        expect(new ValidationRejection('no match', 'name_match').rule).toBe('name_match');
        expect(new StorageError('write failed', 'save').code).toBe('STORAGE_FAILED');
        expect(new NotificationError('send failed', 'a@example.com').recipient).toBe('a@example.com');
    });

    it('lists configuration issues in the message', () => {
        const error = new ConfigurationError('Environment validation failed', ['A: bad', 'B: worse']);

        expect(error.message).toBe('Environment validation failed:\n  - A: bad\n  - B: worse');
        expect(error.issues).toEqual(['A: bad', 'B: worse']);
        expect(new ConfigurationError('plain').message).toBe('plain');
    });

    it('isPipelineError recognises only pipeline errors', () => {
        expect(isPipelineError(new StorageError('x', 'save'))).toBe(true);
        expect(isPipelineError(new ConfigurationError('x'))).toBe(true);
        expect(isPipelineError(Object.assign(new Error('x'), { code: 'ECONNRESET' }))).toBe(false);
        expect(isPipelineError('x')).toBe(false);
    });
});

describe('error helpers', () => {
    it('describe anything thrown', () => {
        expect(getErrorMessage(new Error('boom'))).toBe('boom');
        expect(getErrorMessage('plain string')).toBe('plain string');
        expect(getErrorName(new RangeError('x'))).toBe('RangeError');
        expect(getErrorName(42)).toBe('number');
    });

    it('toError wraps non-errors', () => {
        const original = new Error('kept');
        expect(toError(original)).toBe(original);
        expect(toError('text').message).toBe('text');
    });
});
