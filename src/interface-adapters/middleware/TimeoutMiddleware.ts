/**
 * TimeoutMiddleware - bounds how long a route handler may run.
 *
 * Reads and writes get separate limits. A handler that overruns gets a
 * 503 TIMEOUT response; its eventual outcome is discarded.
 */

import { ServerResponse } from 'http';
import { RequestContext } from '../../infrastructure/observability/RequestContext.js';
import { ILogger, NullLogger } from '../../infrastructure/observability/Logger.js';
import { ApiError } from '../../shared/errors/ApiError.js';
import { sendApiError } from '../../shared/errors/ErrorNormalizer.js';

export interface TimeoutConfig {
    readTimeoutMs: number;
    mutationTimeoutMs: number;
    enabled: boolean;
}

export const DEFAULT_TIMEOUT_CONFIG: TimeoutConfig = {
    readTimeoutMs: 3000,
    mutationTimeoutMs: 10000,
    enabled: true,
};

const READ_METHODS = new Set(['GET', 'HEAD', 'OPTIONS']);

export class TimeoutMiddleware {
    private readonly config: TimeoutConfig;

    constructor(
        config: Partial<TimeoutConfig> = {},
        private readonly logger: ILogger = new NullLogger()
    ) {
        this.config = { ...DEFAULT_TIMEOUT_CONFIG, ...config };
    }

    getTimeout(method: string): number {
        return READ_METHODS.has(method.toUpperCase())
            ? this.config.readTimeoutMs
            : this.config.mutationTimeoutMs;
    }

    /**
     * Resolves to the handler's result, or to undefined once the limit
     * passes and the timeout response is written.
     */
    async withTimeout<T>(
        res: ServerResponse,
        method: string,
        handler: () => Promise<T>
    ): Promise<T | undefined> {
        if (!this.config.enabled) {
            return handler();
        }

        const limitMs = this.getTimeout(method);
        let timer: ReturnType<typeof setTimeout> | undefined;
        const expired = new Promise<null>(resolve => {
            timer = setTimeout(() => resolve(null), limitMs);
        });
        const settled = handler().then(value => ({ value }));

        const outcome = await Promise.race([settled, expired]).finally(() => clearTimeout(timer));
        if (outcome) {
            return outcome.value;
        }

        void settled.catch((error: unknown) => {
            this.logger.warn('Handler failed after request timed out', {
                error: error instanceof Error ? error.message : String(error),
            });
        });
        if (!res.headersSent) {
            sendApiError(res, ApiError.timeout(`Request timed out after ${limitMs}ms`), RequestContext.getCorrelationId());
        }
        return undefined;
    }
}
