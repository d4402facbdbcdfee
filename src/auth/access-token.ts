import jwt from 'jsonwebtoken';
import type { JwtPayload } from 'jsonwebtoken';
import type { UserIdentity } from '../types/realtime.js';

const DEFAULT_TOKEN_TTL_SECONDS = 7 * 24 * 60 * 60;

export type AccessTokenErrorCode = 'missing_secret' | 'malformed' | 'bad_signature' | 'expired' | 'invalid_claims';

export class AccessTokenError extends Error {
    readonly code: AccessTokenErrorCode;

    constructor(code: AccessTokenErrorCode, message: string) {
        super(message);
        this.name = 'AccessTokenError';
        this.code = code;
    }
}

export interface AccessTokenClaims extends UserIdentity {
    email: string | null;
    issuedAt: number;
    expiresAt: number;
}

export interface IssueAccessTokenInput extends UserIdentity {
    email?: string;
}

export interface AccessTokenOptions {
    ttlSeconds?: number;
    now?: () => number;
}

function requireSecret(secret: string): void {
    if (!secret) {
        throw new AccessTokenError('missing_secret', 'JWT_SECRET is not configured.');
    }
}

/** Mint an HS256 access token carrying `user_id`, `username` and `email`. */
export function issueAccessToken(
    identity: IssueAccessTokenInput,
    secret: string,
    options: AccessTokenOptions = {},
): string {
    requireSecret(secret);
    const nowSec = Math.floor((options.now ?? Date.now)() / 1000);
    const payload = {
        user_id: identity.userId,
        username: identity.username,
        email: identity.email ?? null,
        iat: nowSec,
        exp: nowSec + (options.ttlSeconds ?? DEFAULT_TOKEN_TTL_SECONDS),
    };

    return jwt.sign(payload, secret, { algorithm: 'HS256' });
}

/**
 * Verify signature, algorithm (HS256 only) and expiry, and return the
 * identity the token was issued for. Throws `AccessTokenError` on any failure.
 */
export function verifyAccessToken(
    token: string,
    secret: string,
    options: Pick<AccessTokenOptions, 'now'> = {},
): AccessTokenClaims {
    requireSecret(secret);

    const nowSec = Math.floor((options.now ?? Date.now)() / 1000);

    let decoded: string | JwtPayload;
    try {
        decoded = jwt.verify(token, secret, { algorithms: ['HS256'], clockTimestamp: nowSec });
    } catch (err) {
        if (err instanceof jwt.TokenExpiredError) {
            throw new AccessTokenError('expired', 'Token has expired.');
        }
        if (err instanceof jwt.JsonWebTokenError) {
            if (err.message === 'invalid signature') {
                throw new AccessTokenError('bad_signature', 'Invalid token signature.');
            }
            throw new AccessTokenError('malformed', `Token is malformed: ${err.message}.`);
        }
        throw err;
    }

    if (typeof decoded === 'string') {
        throw new AccessTokenError('invalid_claims', 'Token payload must be an object.');
    }
    const payload: Record<string, unknown> = decoded;

    const { user_id: userId, username, email, iat, exp } = payload;
    if (typeof userId !== 'number' || !Number.isInteger(userId) || userId < 1) {
        throw new AccessTokenError('invalid_claims', 'Token user_id must be a positive integer.');
    }
    if (typeof username !== 'string' || username.length === 0) {
        throw new AccessTokenError('invalid_claims', 'Token username is missing.');
    }
    if (typeof exp !== 'number') {
        throw new AccessTokenError('invalid_claims', 'Token has no expiry.');
    }

    return {
        userId,
        username,
        email: typeof email === 'string' ? email : null,
        issuedAt: typeof iat === 'number' ? iat : nowSec,
        expiresAt: exp,
    };
}
