/**
 * Email verification tokens (JWT)
 *
 * Issued when a registration is approved, redeemed by the verify-email flow
 * to move the registration from approved to active.
 */

import jwt, { type JwtPayload } from 'jsonwebtoken';
import { z } from 'zod';

// ============================================
// SCHEMAS & TYPES
// ============================================

export const VERIFICATION_TOKEN_PURPOSE = 'email_verification';

const VerificationTokenPayloadSchema = z.object({
    registrationId: z.string().min(1),
    email: z.string().email(),
    purpose: z.literal(VERIFICATION_TOKEN_PURPOSE),
    iat: z.number().optional(),
    exp: z.number().optional(),
});

export type VerificationTokenPayload = z.infer<typeof VerificationTokenPayloadSchema>;

export type VerificationTokenResult =
    | { success: true; payload: VerificationTokenPayload }
    | { success: false; error: string; code: 'INVALID_TOKEN' | 'EXPIRED_TOKEN' };

export interface VerificationTokenOptions {
    secret: string;
    ttlDays: number;
}

// ============================================
// SERVICE
// ============================================

export class VerificationTokenService {
    private readonly secret: string;
    private readonly ttlSeconds: number;

    constructor(options: VerificationTokenOptions) {
        this.secret = options.secret;
        this.ttlSeconds = options.ttlDays * 24 * 60 * 60;
    }

    issue(registration: { id: string; email: string }): string {
        return jwt.sign(
            {
                registrationId: registration.id,
                email: registration.email,
                purpose: VERIFICATION_TOKEN_PURPOSE,
            },
            this.secret,
            { expiresIn: this.ttlSeconds }
        );
    }

    verify(token: string): VerificationTokenResult {
        let decoded: string | JwtPayload;
        try {
            decoded = jwt.verify(token, this.secret);
        } catch (error) {
            if (error instanceof jwt.TokenExpiredError) {
                return { success: false, error: 'Verification link has expired', code: 'EXPIRED_TOKEN' };
            }
            return { success: false, error: 'Verification link is invalid', code: 'INVALID_TOKEN' };
        }

        const parsed = VerificationTokenPayloadSchema.safeParse(decoded);
        if (!parsed.success) {
            return { success: false, error: 'Verification link is invalid', code: 'INVALID_TOKEN' };
        }
        return { success: true, payload: parsed.data };
    }

    /** Link placed in the verification email */
    buildVerificationUrl(baseUrl: string, token: string): string {
        const url = new URL(baseUrl);
        url.searchParams.set('token', token);
        return url.toString();
    }
}
