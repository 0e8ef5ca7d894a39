/**
 * Prometheus text exposition of a metrics snapshot.
 */

import { HistogramData, MetricsSnapshot } from './MetricsCollector.js';
import { MetricNames } from '../../application/ports/IObservabilityContext.js';

export const PROMETHEUS_CONTENT_TYPE = 'text/plain; version=0.0.4';

/**
 * Upper bounds, in ms, of the histogram buckets.
 */
export const HISTOGRAM_BUCKETS = [1, 5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000];

const HELP: Record<string, string> = {
    [MetricNames.HTTP_REQUESTS_TOTAL]: 'HTTP requests by method, route and status',
    [MetricNames.HTTP_REQUEST_DURATION_MS]: 'HTTP request latency in milliseconds',
    [MetricNames.VALIDATION_ERRORS_TOTAL]: 'Requests rejected with a validation error',
    [MetricNames.ACTIVITIES_RECORDED_TOTAL]: 'Activity entries recorded',
    [MetricNames.TRACKED_SUBJECTS]: 'Subjects with recorded activity',
    [MetricNames.STREAK_CALCULATIONS_TOTAL]: 'Streak reports computed',
    [MetricNames.STREAK_CALCULATION_DURATION_MS]: 'Streak report computation time in milliseconds',
    [MetricNames.CALENDARS_BUILT_TOTAL]: 'Contribution calendars built',
    [MetricNames.STREAK_MILESTONES_TOTAL]: 'Streak milestones reached',
    [MetricNames.EVENTS_DISPATCHED_TOTAL]: 'Domain events dispatched',
};

type Kind = 'counter' | 'gauge' | 'histogram';

interface Series<T> {
    /** `{a="1",b="2"}`, or empty */
    labels: string;
    value: T;
}

/**
 * Split `name{labels}` keys and group them by metric name.
 */
function families<T>(entries: Record<string, T>): Map<string, Series<T>[]> {
    const grouped = new Map<string, Series<T>[]>();
    for (const [key, value] of Object.entries(entries)) {
        const brace = key.indexOf('{');
        const name = brace === -1 ? key : key.slice(0, brace);
        const labels = brace === -1 ? '' : key.slice(brace);
        const series = grouped.get(name) ?? [];
        series.push({ labels, value });
        grouped.set(name, series);
    }
    return grouped;
}

function header(name: string, kind: Kind): string[] {
    const help = HELP[name];
    return help
        ? [`# HELP ${name} ${help}`, `# TYPE ${name} ${kind}`]
        : [`# TYPE ${name} ${kind}`];
}

/**
 * `{a="1"}` plus `le="10"` gives `{a="1",le="10"}`.
 */
function withLabel(labels: string, label: string): string {
    return labels === '' ? `{${label}}` : `${labels.slice(0, -1)},${label}}`;
}

function histogramLines(name: string, { labels, value }: Series<HistogramData>): string[] {
    const lines = HISTOGRAM_BUCKETS.map(le => {
        const count = value.values.filter(v => v <= le).length;
        return `${name}_bucket${withLabel(labels, `le="${le}"`)} ${count}`;
    });
    lines.push(`${name}_bucket${withLabel(labels, 'le="+Inf"')} ${value.count}`);
    lines.push(`${name}_sum${labels} ${value.sum}`);
    lines.push(`${name}_count${labels} ${value.count}`);
    return lines;
}

export function renderPrometheus(snapshot: MetricsSnapshot): string {
    const lines: string[] = [];

    const scalars = (entries: Record<string, number>, kind: Kind): void => {
        for (const [name, series] of families(entries)) {
            lines.push(...header(name, kind));
            lines.push(...series.map(({ labels, value }) => `${name}${labels} ${value}`));
        }
    };
    scalars(snapshot.counters, 'counter');
    scalars(snapshot.gauges, 'gauge');

    for (const [name, series] of families(snapshot.histograms)) {
        lines.push(...header(name, 'histogram'));
        for (const entry of series) {
            lines.push(...histogramLines(name, entry));
        }
    }

    return lines.join('\n') + '\n';
}
