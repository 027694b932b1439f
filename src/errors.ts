/**
 * Every way a gameplay call can be refused. Callers render a message per kind,
 * so kinds are never collapsed into a generic failure.
 */
export type GameErrorKind =
    | 'InvalidUniverse'
    | 'InvalidDate'
    | 'InvalidGuess'
    | 'InvalidPuzzleId'
    | 'InvalidRequest'
    | 'EmptyPool'
    | 'PuzzleNotFound'
    | 'AlreadySolved'
    | 'AttemptsExhausted'
    | 'AttemptConflict'
    | 'UserNotFound'
    | 'Unauthorized'
    | 'RateLimited'
    | 'RepositoryUnavailable';

const STATUS_BY_KIND: Record<GameErrorKind, number> = {
    InvalidUniverse: 400,
    InvalidDate: 400,
    InvalidGuess: 400,
    InvalidPuzzleId: 400,
    InvalidRequest: 400,
    Unauthorized: 401,
    PuzzleNotFound: 404,
    UserNotFound: 404,
    AlreadySolved: 409,
    AttemptsExhausted: 409,
    AttemptConflict: 409,
    RateLimited: 429,
    EmptyPool: 500,
    RepositoryUnavailable: 503,
};

/**
 * HTTP status the API answers with for an error kind.
 */
export function httpStatusFor(kind: GameErrorKind): number {
    return STATUS_BY_KIND[kind];
}

export class GameError extends Error {
    readonly kind: GameErrorKind;

    constructor(kind: GameErrorKind, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = kind;
        this.kind = kind;
    }
}

/**
 * Raised by the rate-limit layer. `retryAfterSeconds` is surfaced to the client.
 */
export class RateLimitedError extends GameError {
    readonly retryAfterSeconds: number;
    readonly limitType: 'ip' | 'user';

    constructor(retryAfterSeconds: number, limitType: 'ip' | 'user', message = 'Too many requests') {
        super('RateLimited', message);
        this.retryAfterSeconds = retryAfterSeconds;
        this.limitType = limitType;
    }
}

/**
 * Thrown by repositories when the backing store cannot be reached.
 * The core propagates it unchanged and never retries.
 */
export class RepositoryUnavailableError extends GameError {
    constructor(operation: string, cause?: unknown) {
        super('RepositoryUnavailable', `Repository unavailable during ${operation}`, { cause });
    }
}
