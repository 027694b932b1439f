import { scryptSync, randomBytes, createHash, createHmac, timingSafeEqual } from 'crypto';

/**
 * Claims carried inside a session token.
 */
export type SessionClaims = {
    sub: string; // user id
    exp: number; // expiry, epoch seconds
};

/**
 * Derives the session signing key from the application's secret using scrypt.
 * @param secret The SESSION_SECRET value.
 * @returns A 32-byte Buffer used to sign session tokens.
 */
export function deriveSessionKey(secret: string): Buffer {
    return scryptSync(Buffer.from(secret, 'utf8'), Buffer.from('daily-character-guess-salt', 'utf8'), 32);
}

function sign(payload: string, key: Buffer): string {
    return createHmac('sha256', key).update(payload).digest('base64url');
}

/**
 * Issues a signed session token for a user.
 * @param userId The subject of the token.
 * @param key The session signing key.
 * @param ttlSeconds How long the token stays valid.
 * @param now Current time in milliseconds.
 */
export function issueSessionToken(userId: string, key: Buffer, ttlSeconds: number, now: number = Date.now()): string {
    const claims: SessionClaims = { sub: userId, exp: Math.floor(now / 1000) + ttlSeconds };
    const payload = Buffer.from(JSON.stringify(claims), 'utf8').toString('base64url');
    return `${payload}.${sign(payload, key)}`;
}

/**
 * Verifies a session token and returns its subject.
 * @returns The user id, or undefined if the token is malformed, forged or expired.
 */
export function verifySessionToken(token: string, key: Buffer, now: number = Date.now()): string | undefined {
    const parts = token.split('.');
    if (parts.length !== 2) return undefined;
    const [payload, signature] = parts;

    const expected = Buffer.from(sign(payload, key), 'utf8');
    const given = Buffer.from(signature, 'utf8');
    if (expected.length !== given.length || !timingSafeEqual(expected, given)) {
        return undefined;
    }

    let claims: unknown;
    try {
        claims = JSON.parse(Buffer.from(payload, 'base64url').toString('utf8'));
    } catch {
        return undefined;
    }
    if (!isSessionClaims(claims)) return undefined;
    if (claims.exp * 1000 <= now) return undefined;
    return claims.sub;
}

function isSessionClaims(value: unknown): value is SessionClaims {
    if (typeof value !== 'object' || value === null) return false;
    if (!('sub' in value) || !('exp' in value)) return false;
    return typeof value.sub === 'string' && value.sub.length > 0 && typeof value.exp === 'number';
}

/**
 * Stable 32-bit seed for a string: the first four bytes of its SHA-256 digest, big-endian.
 * Identical across processes and restarts.
 */
export function seedFromString(input: string): number {
    return createHash('sha256').update(input, 'utf8').digest().readUInt32BE(0);
}

/**
 * Generates a cryptographically secure random ID.
 * @returns A 32-character hex string.
 */
export function cryptoRandomId(): string {
    return randomBytes(16).toString('hex');
}
