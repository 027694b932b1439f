import pino, { Logger } from 'pino';

/**
 * Root application logger. Feature modules log through `logger.child({ module })`.
 */
export const logger: Logger = pino({
    level: process.env.LOG_LEVEL ?? (process.env.NODE_ENV === 'test' ? 'silent' : 'info'),
});

export type { Logger };
