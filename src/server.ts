/**
 * Server - HTTP entry point.
 */

import { createServer, IncomingMessage, ServerResponse } from 'http';
import { AppContainer } from './AppContainer.js';
import { AppConfig, ConfigError, loadConfig } from './infrastructure/config/AppConfig.js';
import { ConsoleLogger } from './infrastructure/observability/Logger.js';

function start(): void {
    let config: AppConfig;
    try {
        config = loadConfig(process.env);
    } catch (error) {
        const logger = new ConsoleLogger({ context: { service: 'streakline' } });
        logger.error('Refusing to start', error, error instanceof ConfigError ? { problems: error.problems } : undefined);
        process.exitCode = 1;
        return;
    }

    // Composition Root
    const container = new AppContainer(config);

    const server = createServer((req: IncomingMessage, res: ServerResponse) => {
        res.setHeader('Access-Control-Allow-Origin', '*');
        res.setHeader('Access-Control-Allow-Methods', 'GET, POST, DELETE, OPTIONS');
        res.setHeader('Access-Control-Allow-Headers', 'Content-Type, X-Correlation-Id');
        res.setHeader('Access-Control-Expose-Headers', 'X-Correlation-Id, X-Request-Id');

        if (req.method === 'OPTIONS') {
            res.writeHead(204);
            res.end();
            return;
        }

        container.apiRouter.handle(req, res).catch((error: unknown) => {
            container.logger.error('Request handling failed', error);
            if (!res.headersSent) {
                res.writeHead(500, { 'Content-Type': 'application/json' });
            }
            res.end();
        });
    });

    server.listen(config.port, () => {
        container.logger.info(`Streak API listening on port ${config.port}`, {
            timeZone: config.timeZone,
            weekStart: config.weekStart,
            currentStreakPolicy: config.currentStreakPolicy,
        });
    });

    const shutdown = (signal: string): void => {
        container.logger.info('Shutting down', { signal });
        server.close(error => {
            if (error) {
                container.logger.error('Server close failed', error);
                process.exitCode = 1;
            }
        });
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));
}

start();
