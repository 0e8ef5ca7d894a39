/**
 * ApiRouter - wires every endpoint and wraps requests with correlation
 * context, timeouts, request metrics and access logging.
 */

import { IncomingMessage, ServerResponse } from 'http';
import { Router } from './Router.js';
import { TimeoutMiddleware } from '../middleware/TimeoutMiddleware.js';
import { StreakController } from '../controllers/StreakController.js';
import { SubjectActivityController } from '../controllers/SubjectActivityController.js';
import { HealthController } from '../controllers/HealthController.js';
import { MetricsController } from '../controllers/MetricsController.js';
import { RequestContext } from '../../infrastructure/observability/RequestContext.js';
import { parseRoute, withCorrelation } from '../../infrastructure/observability/CorrelationMiddleware.js';
import { AppMetrics } from '../../infrastructure/observability/AppMetrics.js';
import { ILogger } from '../../infrastructure/observability/Logger.js';
import { ApiError } from '../../shared/errors/ApiError.js';
import { sendApiError, sendErrorResponse, sendJson } from '../../shared/errors/ErrorNormalizer.js';

export interface ApiRouterDependencies {
    streakController: StreakController;
    subjectActivityController: SubjectActivityController;
    healthController: HealthController;
    metricsController: MetricsController;
    timeoutMiddleware: TimeoutMiddleware;
    appMetrics: AppMetrics;
    logger: ILogger;
}

export class ApiRouter {
    private router: Router;
    private timeoutMiddleware: TimeoutMiddleware;
    private appMetrics: AppMetrics;
    private logger: ILogger;

    constructor(private readonly dependencies: ApiRouterDependencies) {
        this.router = new Router();
        this.timeoutMiddleware = dependencies.timeoutMiddleware;
        this.appMetrics = dependencies.appMetrics;
        this.logger = dependencies.logger.child({ component: 'http' });

        this.setupRoutes();
    }

    private setupRoutes(): void {
        const {
            streakController,
            subjectActivityController,
            healthController,
            metricsController,
        } = this.dependencies;

        // Operational routes
        this.router.get('/health', async (_req, res) => {
            const result = await healthController.handle();
            sendJson(res, result.statusCode, result.body);
        });
        this.router.get('/metrics', async (_req, res, { query }) =>
            metricsController.handle(res, query)
        );

        // Stateless calculations
        this.router.post('/api/streaks/calculate', (req, res) =>
            streakController.calculate(req, res)
        );
        this.router.post('/api/calendar/build', (req, res) =>
            streakController.buildCalendar(req, res)
        );

        // Subject activity
        this.router.post('/api/subjects/:subjectId/activity', (req, res, params) =>
            subjectActivityController.record(req, res, params)
        );
        this.router.get('/api/subjects/:subjectId/activity', (req, res, params) =>
            subjectActivityController.list(req, res, params)
        );
        this.router.delete('/api/subjects/:subjectId/activity', (req, res, params) =>
            subjectActivityController.clear(req, res, params)
        );
        this.router.get('/api/subjects/:subjectId/streak', (req, res, params) =>
            subjectActivityController.streak(req, res, params)
        );
        this.router.get('/api/subjects/:subjectId/calendar', (req, res, params) =>
            subjectActivityController.calendar(req, res, params)
        );
    }

    /**
     * Handle a request. Always answers, with 404 for unknown routes.
     */
    async handle(req: IncomingMessage, res: ServerResponse): Promise<void> {
        const method = req.method ?? 'GET';
        const url = req.url ?? '/';

        await withCorrelation(req, res, async () => {
            const correlationId = RequestContext.getCorrelationId();

            try {
                await this.timeoutMiddleware.withTimeout(res, method, async () => {
                    const handled = await this.router.handle(req, res);
                    if (!handled) {
                        sendApiError(res, ApiError.notFound('Endpoint', `${method} ${parseRoute(url)}`), correlationId);
                    }
                });
            } catch (error) {
                if (!(error instanceof ApiError)) {
                    this.logger.error('Unhandled request error', error);
                }
                if (!res.headersSent) {
                    sendErrorResponse(res, error, correlationId);
                }
            } finally {
                const durationMs = RequestContext.getElapsedMs();
                const statusCode = res.statusCode;
                this.appMetrics.recordRequest(method, url, statusCode, durationMs);
                if (statusCode === 400) {
                    this.appMetrics.recordValidationError(url);
                }
                this.logger.info('Request completed', {
                    method,
                    statusCode,
                    latencyMs: durationMs,
                });
            }
        });
    }
}
