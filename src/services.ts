import { AppConfig } from './config';
import { verifySessionToken } from './crypto';
import { InMemoryGuessRepository } from './game/state';
import { GuessValidator } from './game/validator';
import { logger as rootLogger, Logger } from './logger';
import { loadCharacterPools } from './puzzle/pool';
import { PuzzleSelector } from './puzzle/selector';
import { InMemoryPuzzleRepository } from './puzzle/state';
import { CharacterPools } from './puzzle/types';
import { TokenVerifier } from './ratelimit/identity';
import { RateLimiter } from './ratelimit/limiter';
import { StreakTracker } from './streak/tracker';
import { InMemoryUserRepository } from './user/state';

/**
 * Everything the HTTP layer talks to, wired once per process.
 */
export type AppServices = {
    config: AppConfig;
    log: Logger;
    users: InMemoryUserRepository;
    puzzles: InMemoryPuzzleRepository;
    selector: PuzzleSelector;
    streaks: StreakTracker;
    validator: GuessValidator;
    limiter: RateLimiter;
    verifyToken: TokenVerifier;
    clock: () => number;
};

export type ServiceOverrides = {
    pools?: CharacterPools;
    log?: Logger;
    clock?: () => number;
};

export function createServices(config: AppConfig, overrides: ServiceOverrides = {}): AppServices {
    const log = overrides.log ?? rootLogger;
    const clock = overrides.clock ?? Date.now;
    const users = new InMemoryUserRepository();
    const puzzles = new InMemoryPuzzleRepository();
    const guesses = new InMemoryGuessRepository();

    const selector = new PuzzleSelector(puzzles, overrides.pools ?? loadCharacterPools(), log);
    const streaks = new StreakTracker(users, log);
    const validator = new GuessValidator(guesses, users, selector, streaks, {
        imageBaseUrl: config.imageBaseUrl,
        logger: log,
        clock,
    });
    const limiter = new RateLimiter(config.rateLimits, {
        logger: log,
        sweepIntervalSeconds: config.rateLimitSweepSeconds,
    });

    return {
        config,
        log,
        users,
        puzzles,
        selector,
        streaks,
        validator,
        limiter,
        verifyToken: (token) => verifySessionToken(token, config.sessionKey, clock()),
        clock,
    };
}
