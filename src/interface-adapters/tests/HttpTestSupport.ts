/**
 * In-process request and response objects for driving the router.
 */

import { IncomingMessage, ServerResponse } from 'http';
import { Socket } from 'net';
import { vi } from 'vitest';

export interface TestRequestOptions {
    method: string;
    url: string;
    /** Serialized as JSON */
    body?: unknown;
    /** Sent as-is, overriding `body` */
    rawBody?: string;
    headers?: Record<string, string>;
}

export interface CapturedResponse {
    res: ServerResponse;
    /** Body passed to `res.end`, as text */
    text(): string;
    json(): unknown;
}

export function createRequest(options: TestRequestOptions): IncomingMessage {
    const req = new IncomingMessage(new Socket());
    req.method = options.method;
    req.url = options.url;
    req.headers = {};
    for (const [name, value] of Object.entries(options.headers ?? {})) {
        req.headers[name.toLowerCase()] = value;
    }

    const payload = options.rawBody ?? (options.body === undefined ? undefined : JSON.stringify(options.body));
    if (payload !== undefined) {
        req.push(payload);
    }
    req.push(null);
    return req;
}

export function captureResponse(req: IncomingMessage): CapturedResponse {
    const res = new ServerResponse(req);
    const end = vi.spyOn(res, 'end');

    const text = (): string => {
        const call = end.mock.calls[0];
        const chunk: unknown = call ? call[0] : undefined;
        if (typeof chunk === 'string') return chunk;
        if (Buffer.isBuffer(chunk)) return chunk.toString('utf8');
        return '';
    };

    return {
        res,
        text,
        json: () => JSON.parse(text()),
    };
}
