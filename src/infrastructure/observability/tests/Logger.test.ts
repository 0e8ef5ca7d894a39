import { describe, it, expect } from 'vitest';
import { ConsoleLogger, LogLevel, parseLogLevel, serializeError } from '../Logger.js';
import { RequestContext } from '../RequestContext.js';

function capture(level?: LogLevel) {
    const lines: { level: LogLevel; entry: unknown }[] = [];
    const logger = new ConsoleLogger({
        context: { service: 'streakline' },
        level,
        sink: (lineLevel, line) => lines.push({ level: lineLevel, entry: JSON.parse(line) }),
    });
    return { logger, lines };
}

describe('ConsoleLogger', () => {
    it('should write one JSON object per entry', () => {
        const { logger, lines } = capture();

        logger.info('Activity recorded', { subjectId: 'reading', count: 2 });

        expect(lines).toHaveLength(1);
        expect(lines[0].level).toBe('info');
        expect(lines[0].entry).toMatchObject({
            level: 'info',
            message: 'Activity recorded',
            service: 'streakline',
            subjectId: 'reading',
            count: 2,
        });
    });

    it('should drop entries below the configured level', () => {
        const { logger, lines } = capture('warn');

        logger.debug('debug');
        logger.info('info');
        logger.warn('warn');
        logger.error('error');

        expect(lines.map(line => line.level)).toEqual(['warn', 'error']);
    });

    it('should carry context into child loggers', () => {
        const { logger, lines } = capture();

        logger.child({ component: 'http' }).info('Request completed', { statusCode: 200 });

        expect(lines[0].entry).toMatchObject({ service: 'streakline', component: 'http', statusCode: 200 });
    });

    it('should fill in the request correlation id and route', () => {
        const { logger, lines } = capture();

        RequestContext.run({ correlationId: 'corr-1', route: '/health' }, () => {
            logger.info('inside');
            logger.info('explicit', { correlationId: 'corr-2' });
        });
        logger.info('outside');

        expect(lines[0].entry).toMatchObject({ correlationId: 'corr-1', route: '/health' });
        expect(lines[1].entry).toMatchObject({ correlationId: 'corr-2', route: '/health' });
        expect(lines[2].entry).not.toHaveProperty('correlationId');
    });

    it('should serialize thrown values', () => {
        const { logger, lines } = capture();

        logger.error('Request failed', new TypeError('bad state'));
        logger.error('Request failed', 'plain string');

        expect(lines[0].entry).toMatchObject({ error: { name: 'TypeError', message: 'bad state' } });
        expect(lines[1].entry).toMatchObject({ error: { name: 'NonError', message: 'plain string' } });
    });
});

describe('Logger helpers', () => {
    it('should parse log levels case-insensitively', () => {
        expect(parseLogLevel('WARN')).toBe('warn');
        expect(parseLogLevel('trace')).toBeUndefined();
    });

    it('should serialize non-errors by their string form', () => {
        expect(serializeError(42)).toEqual({ name: 'NonError', message: '42' });
    });
});
