import { describe, it, expect, vi } from 'vitest';
import { Router, RouteParams, parseQuery } from '../Router.js';
import { captureResponse, createRequest } from '../../tests/HttpTestSupport.js';

describe('Router', () => {
    it('should pass decoded params and query to the handler', async () => {
        const seen: RouteParams[] = [];
        const router = new Router().get('/api/subjects/:subjectId/streak', async (_req, _res, params) => {
            seen.push(params);
        });
        const req = createRequest({ method: 'GET', url: '/api/subjects/team%3Aalpha/streak?from=2024-01-01&note=a+b' });

        expect(await router.handle(req, captureResponse(req).res)).toBe(true);
        expect(seen).toEqual([{
            params: { subjectId: 'team:alpha' },
            query: { from: '2024-01-01', note: 'a b' },
        }]);
    });

    it('should ignore trailing slashes and report unknown paths', async () => {
        const handler = vi.fn(async () => undefined);
        const router = new Router().get('/health', handler);

        const known = createRequest({ method: 'GET', url: '/health/' });
        const unknown = createRequest({ method: 'GET', url: '/health/deep' });

        expect(await router.handle(known, captureResponse(known).res)).toBe(true);
        expect(await router.handle(unknown, captureResponse(unknown).res)).toBe(false);
        expect(handler).toHaveBeenCalledTimes(1);
    });

    it('should reject a known path under another method', async () => {
        const router = new Router()
            .get('/items/:id', async () => undefined)
            .delete('/items/:id', async () => undefined);
        const req = createRequest({ method: 'POST', url: '/items/7' });

        await expect(router.handle(req, captureResponse(req).res)).rejects.toMatchObject({
            statusCode: 405,
            headers: { Allow: 'GET, DELETE' },
        });
    });

    it('should parse query strings', () => {
        expect(parseQuery('a=1&b=&c&a=2&d=x%20y')).toEqual({ a: '2', b: '', c: '', d: 'x y' });
        expect(() => parseQuery('bad=%ZZ')).toThrow('Malformed URL encoding: %ZZ');
    });
});
