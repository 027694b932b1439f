import { IncomingHttpHeaders } from 'http';
import { logger as rootLogger, Logger } from '../logger';
import { ClientKey } from './types';

/**
 * Shared bucket for requests with no derivable address. Every such client
 * counts against this one key.
 */
export const UNKNOWN_CLIENT = 'unknown';

/**
 * The parts of a request identity derivation reads. Express requests satisfy it.
 */
export type RequestLike = {
    headers: IncomingHttpHeaders;
    socket?: { remoteAddress?: string };
};

/**
 * Resolves a bearer token to a verified subject, or undefined.
 */
export type TokenVerifier = (token: string) => string | undefined;

function firstHeader(value: string | string[] | undefined): string | undefined {
    const raw = Array.isArray(value) ? value[0] : value;
    const trimmed = raw?.trim();
    return trimmed ? trimmed : undefined;
}

/**
 * First hop of X-Forwarded-For, else X-Real-IP, else the peer address, else 'unknown'.
 */
export function networkKeyOf(req: RequestLike): string {
    const forwarded = firstHeader(req.headers['x-forwarded-for']);
    if (forwarded) {
        const firstHop = forwarded.split(',')[0].trim();
        if (firstHop) return firstHop;
    }
    const realIp = firstHeader(req.headers['x-real-ip']);
    if (realIp) return realIp;
    return req.socket?.remoteAddress || UNKNOWN_CLIENT;
}

/**
 * Subject of a verified `Authorization: Bearer` token, if any.
 */
export function userKeyOf(req: RequestLike, verify: TokenVerifier): string | undefined {
    const header = firstHeader(req.headers.authorization);
    if (!header || !header.startsWith('Bearer ')) return undefined;
    const token = header.slice('Bearer '.length).trim();
    return token ? verify(token) : undefined;
}

/**
 * Derives the rate-limit identity for a request. A failure while resolving the
 * user falls back to a network-only key instead of rejecting the request.
 */
export function deriveClientKey(req: RequestLike, verify: TokenVerifier, log: Logger = rootLogger): ClientKey {
    let network = UNKNOWN_CLIENT;
    try {
        network = networkKeyOf(req);
    } catch (err) {
        log.warn({ err }, 'could not derive network key, using shared bucket');
    }

    try {
        const user = userKeyOf(req, verify);
        return user === undefined ? { network } : { network, user };
    } catch (err) {
        log.warn({ err }, 'could not derive user key, checking network only');
        return { network };
    }
}
