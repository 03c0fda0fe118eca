import 'reflect-metadata';
import 'dotenv/config';
import { Container } from 'typedi';
import { createApp } from './app';
import { loadConfig } from './config';
import { SessionRegistry } from './services/session/SessionRegistry';
import { createLogger, setLogLevel } from './utils/logger';

const logger = createLogger('SERVER');

function main(): void {
    const config = loadConfig();
    setLogLevel(config.logLevel);

    const app = createApp(config);
    const registry = Container.get(SessionRegistry);
    registry.start();

    const { host, port } = config.server;
    const server = app.listen(port, host, () => {
        logger.info(`Chat gateway listening on http://${host}:${port}`);
    });

    const shutdown = (signal: NodeJS.Signals) => {
        logger.info(`${signal} received, shutting down`);
        registry.stop();
        server.close((error) => {
            if (error) {
                logger.error('Error while closing the HTTP server', error);
                process.exit(1);
            }
            process.exit(0);
        });
    };

    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
}

try {
    main();
} catch (error) {
    logger.error('Failed to start', error);
    process.exit(1);
}
