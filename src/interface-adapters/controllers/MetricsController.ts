/**
 * MetricsController - GET /metrics?format=json|prometheus
 */

import { ServerResponse } from 'http';
import { IMetricsCollector } from '../../infrastructure/observability/MetricsCollector.js';
import { PROMETHEUS_CONTENT_TYPE, renderPrometheus } from '../../infrastructure/observability/PrometheusFormat.js';
import { RequestContext } from '../../infrastructure/observability/RequestContext.js';
import { ApiError } from '../../shared/errors/ApiError.js';
import { sendApiError, sendSuccessResponse } from '../../shared/errors/ErrorNormalizer.js';

export type MetricsFormat = 'json' | 'prometheus';

const METRICS_FORMATS: readonly MetricsFormat[] = ['json', 'prometheus'];

export class MetricsController {
    constructor(private readonly metrics: IMetricsCollector) {}

    handle(res: ServerResponse, query: Record<string, string>): void {
        const requested = query.format ?? 'json';
        const format = METRICS_FORMATS.find(candidate => candidate === requested);
        const correlationId = RequestContext.getCorrelationId();

        if (!format) {
            sendApiError(
                res,
                ApiError.validation(`format must be one of [${METRICS_FORMATS.join(', ')}]`, {
                    fields: [{ field: 'format', message: `Unsupported format: ${requested}` }],
                }),
                correlationId
            );
            return;
        }

        const snapshot = this.metrics.getMetrics();
        if (format === 'json') {
            sendSuccessResponse(res, snapshot, correlationId);
            return;
        }
        res.writeHead(200, { 'Content-Type': PROMETHEUS_CONTENT_TYPE });
        res.end(renderPrometheus(snapshot));
    }
}
