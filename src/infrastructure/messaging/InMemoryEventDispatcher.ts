import { IDomainEvent } from '../../domain/events/IDomainEvent.js';
import {
    DomainEvent,
    DomainEventMap,
    DomainEventName,
    IEventDispatcher,
    IEventHandler,
} from '../../application/ports/IEventDispatcher.js';
import { IObservabilityContext, MetricNames } from '../../application/ports/IObservabilityContext.js';

/**
 * Runs subscribed handlers one after another, in subscription order.
 * A handler failure rejects the dispatch.
 */
export class InMemoryEventDispatcher implements IEventDispatcher {
    private handlers = new Map<string, IEventHandler<IDomainEvent>[]>();

    constructor(private readonly observability?: IObservabilityContext) { }

    async dispatch(event: DomainEvent): Promise<void> {
        this.observability?.metrics.incrementCounter(MetricNames.EVENTS_DISPATCHED_TOTAL, 1, { event: event.eventName });
        for (const handler of this.handlers.get(event.eventName) ?? []) {
            await handler.handle(event);
        }
    }

    subscribe<K extends DomainEventName>(eventName: K, handler: IEventHandler<DomainEventMap[K]>): void {
        this.handlers.set(eventName, [...(this.handlers.get(eventName) ?? []), handler]);
    }

    getSubscriberCount(): number {
        let count = 0;
        for (const handlers of this.handlers.values()) {
            count += handlers.length;
        }
        return count;
    }
}
