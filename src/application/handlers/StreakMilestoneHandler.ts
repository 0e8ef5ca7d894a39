import { IEventHandler } from '../ports/IEventDispatcher.js';
import { IObservabilityContext, MetricNames } from '../ports/IObservabilityContext.js';
import { StreakMilestoneReached } from '../../domain/events/StreakMilestoneReached.js';

/**
 * Logs each streak milestone and counts it per milestone length.
 */
export class StreakMilestoneHandler implements IEventHandler<StreakMilestoneReached> {
    constructor(private observability: IObservabilityContext) { }

    async handle(event: StreakMilestoneReached): Promise<void> {
        this.observability.metrics.incrementCounter(MetricNames.STREAK_MILESTONES_TOTAL, 1, {
            milestone: String(event.milestone),
        });
        this.observability.logger.info('Streak milestone reached', {
            eventType: 'StreakMilestoneReached',
            aggregateId: event.getAggregateId(),
            subjectId: event.subjectId,
            milestone: event.milestone,
            streakStartDate: event.streakStartDate,
            reachedOn: event.reachedOn,
        });
    }
}
