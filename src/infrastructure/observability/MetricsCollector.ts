/**
 * MetricsCollector - Counters, gauges and histograms keyed by name and labels.
 */

export interface MetricLabels {
    [key: string]: string;
}

export interface HistogramData {
    count: number;
    sum: number;
    min: number;
    max: number;
    avg: number;
    values: number[];
}

export interface MetricsSnapshot {
    timestamp: Date;
    counters: Record<string, number>;
    gauges: Record<string, number>;
    histograms: Record<string, HistogramData>;
}

export interface IMetricsCollector {
    incrementCounter(name: string, value?: number, labels?: MetricLabels): void;
    setGauge(name: string, value: number, labels?: MetricLabels): void;
    recordHistogram(name: string, value: number, labels?: MetricLabels): void;

    /**
     * Start a timer; calling the returned function records the elapsed
     * milliseconds to a histogram and returns them.
     */
    startTimer(name: string, labels?: MetricLabels): () => number;

    getMetrics(): MetricsSnapshot;
}

/**
 * `name{a="1",b="2"}` with labels sorted by key.
 */
export function metricKey(name: string, labels?: MetricLabels): string {
    if (!labels || Object.keys(labels).length === 0) {
        return name;
    }
    const labelStr = Object.entries(labels)
        .sort(([a], [b]) => a.localeCompare(b))
        .map(([k, v]) => `${k}="${v}"`)
        .join(',');
    return `${name}{${labelStr}}`;
}

function summarize(values: number[]): HistogramData {
    const sum = values.reduce((a, b) => a + b, 0);
    return {
        count: values.length,
        sum,
        min: Math.min(...values),
        max: Math.max(...values),
        avg: sum / values.length,
        values: [...values],
    };
}

/**
 * In-memory metrics collector.
 */
export class InMemoryMetricsCollector implements IMetricsCollector {
    private counters: Map<string, number> = new Map();
    private gauges: Map<string, number> = new Map();
    private histograms: Map<string, number[]> = new Map();

    /**
     * Samples kept per histogram; older ones are dropped.
     */
    constructor(private readonly maxHistogramSamples = 1000) { }

    incrementCounter(name: string, value: number = 1, labels?: MetricLabels): void {
        const key = metricKey(name, labels);
        this.counters.set(key, (this.counters.get(key) ?? 0) + value);
    }

    setGauge(name: string, value: number, labels?: MetricLabels): void {
        this.gauges.set(metricKey(name, labels), value);
    }

    recordHistogram(name: string, value: number, labels?: MetricLabels): void {
        const key = metricKey(name, labels);
        const values = this.histograms.get(key) ?? [];
        values.push(value);
        if (values.length > this.maxHistogramSamples) {
            values.splice(0, values.length - this.maxHistogramSamples);
        }
        this.histograms.set(key, values);
    }

    startTimer(name: string, labels?: MetricLabels): () => number {
        const start = Date.now();
        return () => {
            const duration = Date.now() - start;
            this.recordHistogram(name, duration, labels);
            return duration;
        };
    }

    getMetrics(): MetricsSnapshot {
        const histograms: Record<string, HistogramData> = {};
        this.histograms.forEach((values, key) => {
            if (values.length > 0) {
                histograms[key] = summarize(values);
            }
        });

        return {
            timestamp: new Date(),
            counters: Object.fromEntries(this.counters),
            gauges: Object.fromEntries(this.gauges),
            histograms,
        };
    }

    getCounter(name: string, labels?: MetricLabels): number {
        return this.counters.get(metricKey(name, labels)) ?? 0;
    }
}

