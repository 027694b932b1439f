import { createApp } from './app';
import { loadConfig } from './config';
import { utcDay } from './date';
import { logger } from './logger';
import { createServices } from './services';

/**
 * Main application entry point.
 */
async function main() {
    // Throws, and so stops start-up, if critical variables are missing.
    const config = loadConfig(process.env);
    logger.level = config.logLevel;

    const services = createServices(config);
    services.limiter.start();

    // Make sure today's puzzles exist before the first request asks for them.
    const today = utcDay();
    await services.selector.generateDailyPuzzles(today);
    await services.selector.cleanupOldPuzzles(today);

    const app = createApp(services);
    const server = app.listen(config.port, () => {
        logger.info({ port: config.port }, 'daily character guess server listening');
    });

    const shutdown = () => {
        services.limiter.stop();
        server.close();
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
}

main().catch((err) => {
    logger.fatal({ err }, 'failed to start');
    process.exitCode = 1;
});
