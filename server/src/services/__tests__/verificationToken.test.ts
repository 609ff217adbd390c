/**
 * Unit tests for verification tokens
 */

import jwt from 'jsonwebtoken';
import { VerificationTokenService } from '../verificationToken.js';
import { t0 } from '../../__tests__/fakes.js';

const DAY = 24 * 60 * 60 * 1000;

describe('VerificationTokenService', () => {
    const tokens = new VerificationTokenService({ secret: 'test-secret', ttlDays: 30 });

    afterEach(() => {
        vi.useRealTimers();
    });

    it('round-trips the registration id and email', () => {
        const result = tokens.verify(tokens.issue({ id: 'R1', email: 'alumnus@example.com' }));

        expect(result.success).toBe(true);
        if (result.success) {
            expect(result.payload.registrationId).toBe('R1');
            expect(result.payload.email).toBe('alumnus@example.com');
            expect(result.payload.purpose).toBe('email_verification');
        }
    });

    it('reports an expired link', () => {
        vi.useFakeTimers();
        vi.setSystemTime(t0);
        const token = tokens.issue({ id: 'R1', email: 'alumnus@example.com' });

        vi.setSystemTime(new Date(t0.getTime() + 31 * DAY));

        expect(tokens.verify(token)).toEqual({
            success: false,
            error: 'Verification link has expired',
            code: 'EXPIRED_TOKEN',
        });
    });

    it('rejects a token signed with another secret', () => {
        const other = new VerificationTokenService({ secret: 'other-secret', ttlDays: 30 });

        const result = tokens.verify(other.issue({ id: 'R1', email: 'alumnus@example.com' }));

        expect(result).toEqual({ success: false, error: 'Verification link is invalid', code: 'INVALID_TOKEN' });
    });

    it('rejects a token issued for another purpose', () => {
        const token = jwt.sign({ registrationId: 'R1', email: 'alumnus@example.com', purpose: 'login' }, 'test-secret');

        expect(tokens.verify(token).success).toBe(false);
    });

    it('rejects garbage', () => {
        expect(tokens.verify('not-a-token').success).toBe(false);
    });

    it('builds the link with the token as a query parameter', () => {
        expect(tokens.buildVerificationUrl('https://alumni.example.com/verify?lang=en', 'a.b.c')).toBe(
            'https://alumni.example.com/verify?lang=en&token=a.b.c'
        );
    });
});
