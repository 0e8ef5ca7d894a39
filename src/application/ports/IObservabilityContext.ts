/**
 * IObservabilityContext - Bundled observability components.
 *
 * Single injection point for the logger and the metrics collector.
 */

import { ILogger } from '../../infrastructure/observability/Logger.js';
import { IMetricsCollector } from '../../infrastructure/observability/MetricsCollector.js';

export interface IObservabilityContext {
    readonly logger: ILogger;
    readonly metrics: IMetricsCollector;
}

/**
 * Standard metric names used across the application.
 */
export const MetricNames = {
    // HTTP
    HTTP_REQUESTS_TOTAL: 'http_requests_total',
    HTTP_REQUEST_DURATION_MS: 'http_request_duration_ms',
    VALIDATION_ERRORS_TOTAL: 'validation_errors_total',

    // Streaks
    ACTIVITIES_RECORDED_TOTAL: 'activities_recorded_total',
    TRACKED_SUBJECTS: 'tracked_subjects',
    STREAK_CALCULATIONS_TOTAL: 'streak_calculations_total',
    STREAK_CALCULATION_DURATION_MS: 'streak_calculation_duration_ms',
    CALENDARS_BUILT_TOTAL: 'calendars_built_total',
    STREAK_MILESTONES_TOTAL: 'streak_milestones_total',

    // Events
    EVENTS_DISPATCHED_TOTAL: 'events_dispatched_total',
} as const;
