import 'dotenv/config';
import { z } from 'zod';
import { deriveSessionKey } from './crypto';
import { DEFAULT_RATE_LIMITS, RateLimitConfig } from './ratelimit/types';

// This module is responsible for loading and validating environment variables.
// loadConfig throws, and so prevents the app from starting, if critical variables are missing.

const optionalString = z
    .string()
    .optional()
    .transform((value) => (value && value.trim() ? value.trim() : undefined));

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
    SESSION_SECRET: z
        .string({ required_error: 'SESSION_SECRET environment variable is not set. Please create a .env file.' })
        .min(1, 'SESSION_SECRET must not be empty'),
    ADMIN_KEY: optionalString,
    PORT: positiveInt(3000),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    IMAGE_BASE_URL: z.string().url().default('https://cdn.example.com'),
    SESSION_TTL_SECONDS: positiveInt(7 * 24 * 60 * 60),
    RATE_LIMIT_GUESS_IP_REQUESTS: positiveInt(DEFAULT_RATE_LIMITS.guess.ip.maxRequests),
    RATE_LIMIT_GUESS_IP_WINDOW_SECONDS: positiveInt(DEFAULT_RATE_LIMITS.guess.ip.windowSeconds),
    RATE_LIMIT_GUESS_USER_REQUESTS: positiveInt(DEFAULT_RATE_LIMITS.guess.user.maxRequests),
    RATE_LIMIT_GUESS_USER_WINDOW_SECONDS: positiveInt(DEFAULT_RATE_LIMITS.guess.user.windowSeconds),
    RATE_LIMIT_GENERAL_IP_REQUESTS: positiveInt(DEFAULT_RATE_LIMITS.general.ip.maxRequests),
    RATE_LIMIT_GENERAL_IP_WINDOW_SECONDS: positiveInt(DEFAULT_RATE_LIMITS.general.ip.windowSeconds),
    RATE_LIMIT_GENERAL_USER_REQUESTS: positiveInt(DEFAULT_RATE_LIMITS.general.user.maxRequests),
    RATE_LIMIT_GENERAL_USER_WINDOW_SECONDS: positiveInt(DEFAULT_RATE_LIMITS.general.user.windowSeconds),
    RATE_LIMIT_SWEEP_SECONDS: z.coerce.number().int().min(0).default(300),
});

export type AppConfig = {
    port: number;
    logLevel: string;
    adminKey?: string;
    imageBaseUrl: string;
    sessionKey: Buffer; // derived from SESSION_SECRET, never the secret itself
    sessionTtlSeconds: number;
    rateLimits: RateLimitConfig;
    rateLimitSweepSeconds: number; // 0 disables the background sweep
};

/**
 * Builds the application configuration from an environment.
 * @param env Usually process.env.
 * @throws Error listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv): AppConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
        throw new Error(`Invalid configuration: ${problems.join('; ')}`);
    }
    const e = parsed.data;

    return {
        port: e.PORT,
        logLevel: e.LOG_LEVEL,
        adminKey: e.ADMIN_KEY,
        imageBaseUrl: e.IMAGE_BASE_URL.replace(/\/+$/, ''),
        sessionKey: deriveSessionKey(e.SESSION_SECRET),
        sessionTtlSeconds: e.SESSION_TTL_SECONDS,
        rateLimits: {
            guess: {
                ip: { maxRequests: e.RATE_LIMIT_GUESS_IP_REQUESTS, windowSeconds: e.RATE_LIMIT_GUESS_IP_WINDOW_SECONDS },
                user: { maxRequests: e.RATE_LIMIT_GUESS_USER_REQUESTS, windowSeconds: e.RATE_LIMIT_GUESS_USER_WINDOW_SECONDS },
            },
            general: {
                ip: { maxRequests: e.RATE_LIMIT_GENERAL_IP_REQUESTS, windowSeconds: e.RATE_LIMIT_GENERAL_IP_WINDOW_SECONDS },
                user: { maxRequests: e.RATE_LIMIT_GENERAL_USER_REQUESTS, windowSeconds: e.RATE_LIMIT_GENERAL_USER_WINDOW_SECONDS },
            },
        },
        rateLimitSweepSeconds: e.RATE_LIMIT_SWEEP_SECONDS,
    };
}
