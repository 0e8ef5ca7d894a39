/**
 * Router - method and path dispatch with `:param` segments.
 *
 * A path that matches under another method answers 405 with `Allow`.
 */

import { IncomingMessage, ServerResponse } from 'http';
import { ApiError } from '../../shared/errors/ApiError.js';

export type HttpMethod = 'GET' | 'POST' | 'DELETE';

export interface RouteParams {
    /** Decoded `:param` segments */
    params: Record<string, string>;
    /** Query string, last value wins */
    query: Record<string, string>;
}

export type RouteHandler = (
    req: IncomingMessage,
    res: ServerResponse,
    params: RouteParams
) => Promise<void>;

type Segment = { kind: 'literal'; value: string } | { kind: 'param'; name: string };

interface Route {
    method: HttpMethod;
    segments: Segment[];
    handler: RouteHandler;
}

function decode(component: string): string {
    try {
        return decodeURIComponent(component);
    } catch {
        throw ApiError.validation(`Malformed URL encoding: ${component}`);
    }
}

function splitPath(path: string): string[] {
    return path.split('/').filter(segment => segment !== '');
}

function compile(path: string): Segment[] {
    return splitPath(path).map((segment): Segment => segment.startsWith(':')
        ? { kind: 'param', name: segment.slice(1) }
        : { kind: 'literal', value: segment });
}

/**
 * Raw (still encoded) parameter values, or undefined when the path differs.
 */
function matchSegments(segments: Segment[], parts: string[]): Record<string, string> | undefined {
    if (segments.length !== parts.length) {
        return undefined;
    }
    const raw: Record<string, string> = {};
    for (let i = 0; i < segments.length; i++) {
        const segment = segments[i];
        if (segment.kind === 'param') {
            raw[segment.name] = parts[i];
        } else if (segment.value !== parts[i]) {
            return undefined;
        }
    }
    return raw;
}

export function parseQuery(queryString: string): Record<string, string> {
    const query: Record<string, string> = {};
    for (const pair of queryString.split('&')) {
        if (pair === '') continue;
        const separator = pair.indexOf('=');
        const key = separator === -1 ? pair : pair.slice(0, separator);
        const value = separator === -1 ? '' : pair.slice(separator + 1);
        query[decode(key.replace(/\+/g, ' '))] = decode(value.replace(/\+/g, ' '));
    }
    return query;
}

export class Router {
    private routes: Route[] = [];

    get(path: string, handler: RouteHandler): this {
        return this.add('GET', path, handler);
    }

    post(path: string, handler: RouteHandler): this {
        return this.add('POST', path, handler);
    }

    delete(path: string, handler: RouteHandler): this {
        return this.add('DELETE', path, handler);
    }

    private add(method: HttpMethod, path: string, handler: RouteHandler): this {
        this.routes.push({ method, segments: compile(path), handler });
        return this;
    }

    /**
     * Dispatch a request. Resolves false when no route has the path;
     * throws METHOD_NOT_ALLOWED when routes have it under other methods.
     */
    async handle(req: IncomingMessage, res: ServerResponse): Promise<boolean> {
        const method = req.method ?? 'GET';
        const url = req.url ?? '/';
        const queryIndex = url.indexOf('?');
        const parts = splitPath(queryIndex === -1 ? url : url.slice(0, queryIndex));

        const allowed: HttpMethod[] = [];
        for (const route of this.routes) {
            const raw = matchSegments(route.segments, parts);
            if (!raw) continue;
            if (route.method !== method) {
                allowed.push(route.method);
                continue;
            }

            const params: Record<string, string> = {};
            for (const [name, value] of Object.entries(raw)) {
                params[name] = decode(value);
            }
            const query = queryIndex === -1 ? {} : parseQuery(url.slice(queryIndex + 1));

            await route.handler(req, res, { params, query });
            return true;
        }

        if (allowed.length > 0) {
            throw ApiError.methodNotAllowed(method, allowed);
        }
        return false;
    }
}
