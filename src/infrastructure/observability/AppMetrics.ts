/**
 * AppMetrics - named metric helpers for the HTTP layer.
 */

import { IMetricsCollector } from './MetricsCollector.js';
import { MetricNames } from '../../application/ports/IObservabilityContext.js';

const ID_SEGMENT = /^[^/]+$/;

export class AppMetrics {
    constructor(private readonly metrics: IMetricsCollector) {}

    /**
     * Record an HTTP request.
     */
    recordRequest(method: string, route: string, status: number, durationMs: number): void {
        const normalizedRoute = this.normalizeRoute(route);
        this.metrics.incrementCounter(MetricNames.HTTP_REQUESTS_TOTAL, 1, {
            method,
            route: normalizedRoute,
            status: status.toString(),
        });
        this.metrics.recordHistogram(MetricNames.HTTP_REQUEST_DURATION_MS, durationMs, {
            method,
            route: normalizedRoute,
        });
    }

    recordValidationError(route: string): void {
        this.metrics.incrementCounter(MetricNames.VALIDATION_ERRORS_TOTAL, 1, { route: this.normalizeRoute(route) });
    }

    /**
     * Collapse subject ids so label cardinality stays bounded.
     */
    normalizeRoute(route: string): string {
        const path = route.split('?')[0];
        const segments = path.split('/');
        return segments
            .map((segment, index) => (segments[index - 1] === 'subjects' && ID_SEGMENT.test(segment) ? ':subjectId' : segment))
            .join('/');
    }
}
