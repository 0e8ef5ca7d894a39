/**
 * Correlation of a request across log lines and responses.
 *
 * An inbound `X-Correlation-Id` is kept when it is a short token; any
 * other value is replaced. Every response carries the correlation id and
 * a fresh `X-Request-Id`.
 */

import { IncomingMessage, ServerResponse } from 'http';
import { RequestContext } from './RequestContext.js';
import { IdGenerator } from '../../shared/utils/IdGenerator.js';

export const CORRELATION_ID_HEADER = 'x-correlation-id';

const CORRELATION_ID = /^[A-Za-z0-9._:-]{1,128}$/;

export function extractCorrelationId(req: IncomingMessage): string {
    const inbound = req.headers[CORRELATION_ID_HEADER];
    return typeof inbound === 'string' && CORRELATION_ID.test(inbound) ? inbound : IdGenerator.generate();
}

/**
 * Path part of a request URL.
 */
export function parseRoute(url: string | undefined): string {
    return url ? url.split('?', 1)[0] : 'unknown';
}

export function withCorrelation<T>(
    req: IncomingMessage,
    res: ServerResponse,
    handler: () => Promise<T>
): Promise<T> {
    const correlationId = extractCorrelationId(req);
    const requestId = IdGenerator.generate();
    res.setHeader('X-Correlation-Id', correlationId);
    res.setHeader('X-Request-Id', requestId);

    return RequestContext.run(
        { correlationId, requestId, route: parseRoute(req.url), method: req.method ?? 'UNKNOWN' },
        handler
    );
}
