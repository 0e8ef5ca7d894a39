/**
 * RequestContext - request-scoped data carried through async calls.
 */

import { AsyncLocalStorage } from 'async_hooks';
import { IdGenerator } from '../../shared/utils/IdGenerator.js';

export interface RequestContextData {
    correlationId: string;
    requestId: string;
    /** `Date.now()` when the request arrived */
    startedAt: number;
    /** Path without the query string */
    route?: string;
    method?: string;
}

const storage = new AsyncLocalStorage<RequestContextData>();

export class RequestContext {
    /**
     * Run `fn` with a context; missing ids are generated.
     */
    static run<T>(context: Partial<RequestContextData>, fn: () => T): T {
        return storage.run({
            correlationId: context.correlationId ?? IdGenerator.generate(),
            requestId: context.requestId ?? IdGenerator.generate(),
            startedAt: context.startedAt ?? Date.now(),
            route: context.route,
            method: context.method,
        }, fn);
    }

    static get(): RequestContextData | undefined {
        return storage.getStore();
    }

    /**
     * Correlation id of the current request, or a fresh one outside any.
     */
    static getCorrelationId(): string {
        return storage.getStore()?.correlationId ?? IdGenerator.generate();
    }

    static getElapsedMs(): number {
        const context = storage.getStore();
        return context ? Date.now() - context.startedAt : 0;
    }
}
