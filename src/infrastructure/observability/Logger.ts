/**
 * Logger - structured JSON logging, one object per line.
 *
 * The correlation id and route of the current request are filled in from
 * RequestContext unless the caller passes its own.
 */

import { RequestContext } from './RequestContext.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export function parseLogLevel(value: string): LogLevel | undefined {
    return LOG_LEVELS.find(level => level === value.toLowerCase());
}

export interface LogContext {
    correlationId?: string;
    eventType?: string;
    aggregateId?: string;
    subjectId?: string;
    service?: string;
    component?: string;
    route?: string;
    method?: string;
    statusCode?: number;
    latencyMs?: number;
    [key: string]: unknown;
}

export interface ILogger {
    debug(message: string, context?: LogContext): void;
    info(message: string, context?: LogContext): void;
    warn(message: string, context?: LogContext): void;
    /** `error` may be any thrown value */
    error(message: string, error?: unknown, context?: LogContext): void;
    child(context: LogContext): ILogger;
}

export interface SerializedError {
    name: string;
    message: string;
    stack?: string;
}

export function serializeError(error: unknown): SerializedError {
    if (error instanceof Error) {
        return { name: error.name, message: error.message, stack: error.stack };
    }
    return { name: 'NonError', message: String(error) };
}

/**
 * Receives each formatted line.
 */
export type LogSink = (level: LogLevel, line: string) => void;

const consoleSink: LogSink = (level, line) => {
    console[level](line);
};

export interface ConsoleLoggerOptions {
    context?: LogContext;
    /** Lines below this level are dropped */
    level?: LogLevel;
    sink?: LogSink;
}

export class ConsoleLogger implements ILogger {
    private readonly context: LogContext;
    private readonly level: LogLevel;
    private readonly sink: LogSink;

    constructor(options: ConsoleLoggerOptions = {}) {
        this.context = options.context ?? {};
        this.level = options.level ?? 'debug';
        this.sink = options.sink ?? consoleSink;
    }

    debug(message: string, context?: LogContext): void {
        this.write('debug', message, context);
    }

    info(message: string, context?: LogContext): void {
        this.write('info', message, context);
    }

    warn(message: string, context?: LogContext): void {
        this.write('warn', message, context);
    }

    error(message: string, error?: unknown, context?: LogContext): void {
        this.write('error', message, error === undefined ? context : { ...context, error: serializeError(error) });
    }

    child(context: LogContext): ILogger {
        return new ConsoleLogger({
            context: { ...this.context, ...context },
            level: this.level,
            sink: this.sink,
        });
    }

    private write(level: LogLevel, message: string, context: LogContext = {}): void {
        if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(this.level)) {
            return;
        }

        const request = RequestContext.get();
        const fromRequest: LogContext = {};
        if (request) {
            if (context.correlationId === undefined && this.context.correlationId === undefined) {
                fromRequest.correlationId = request.correlationId;
            }
            if (context.route === undefined && this.context.route === undefined && request.route) {
                fromRequest.route = request.route;
            }
        }

        this.sink(level, JSON.stringify({
            timestamp: new Date().toISOString(),
            level,
            message,
            ...this.context,
            ...fromRequest,
            ...context,
        }));
    }
}

/**
 * No-op logger for tests.
 */
export class NullLogger implements ILogger {
    debug(_message: string, _context?: LogContext): void {}
    info(_message: string, _context?: LogContext): void {}
    warn(_message: string, _context?: LogContext): void {}
    error(_message: string, _error?: unknown, _context?: LogContext): void {}
    child(_context: LogContext): ILogger {
        return this;
    }
}
