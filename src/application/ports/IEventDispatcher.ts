import { IDomainEvent } from '../../domain/events/IDomainEvent.js';
import { ActivityRecorded } from '../../domain/events/ActivityRecorded.js';
import { StreakMilestoneReached } from '../../domain/events/StreakMilestoneReached.js';

/**
 * Published events by name.
 */
export interface DomainEventMap {
    ActivityRecorded: ActivityRecorded;
    StreakMilestoneReached: StreakMilestoneReached;
}

export type DomainEventName = keyof DomainEventMap;

export type DomainEvent = DomainEventMap[DomainEventName];

export interface IEventHandler<T extends IDomainEvent> {
    handle(event: T): Promise<void>;
}

export interface IEventDispatcher {
    dispatch(event: DomainEvent): Promise<void>;
    subscribe<K extends DomainEventName>(eventName: K, handler: IEventHandler<DomainEventMap[K]>): void;
}
