import { describe, it, expect, vi } from 'vitest';
import { StreakMilestoneHandler } from '../StreakMilestoneHandler.js';
import { StreakMilestoneReached } from '../../../domain/events/StreakMilestoneReached.js';
import { InMemoryMetricsCollector } from '../../../infrastructure/observability/MetricsCollector.js';
import { NullLogger } from '../../../infrastructure/observability/Logger.js';
import { InMemoryEventDispatcher } from '../../../infrastructure/messaging/InMemoryEventDispatcher.js';

describe('StreakMilestoneHandler', () => {
    it('should count milestones per length and log them', async () => {
        const metrics = new InMemoryMetricsCollector();
        const logger = new NullLogger();
        const info = vi.spyOn(logger, 'info');
        const handler = new StreakMilestoneHandler({ logger, metrics });

        await handler.handle(new StreakMilestoneReached('reading', 7, '2024-03-01', '2024-03-07'));
        await handler.handle(new StreakMilestoneReached('running', 7, '2024-03-02', '2024-03-08'));
        await handler.handle(new StreakMilestoneReached('reading', 30, '2024-03-01', '2024-03-30'));

        expect(metrics.getCounter('streak_milestones_total', { milestone: '7' })).toBe(2);
        expect(metrics.getCounter('streak_milestones_total', { milestone: '30' })).toBe(1);
        expect(info).toHaveBeenLastCalledWith('Streak milestone reached', {
            eventType: 'StreakMilestoneReached',
            aggregateId: 'reading',
            subjectId: 'reading',
            milestone: 30,
            streakStartDate: '2024-03-01',
            reachedOn: '2024-03-30',
        });
    });

    it('should receive events through the dispatcher', async () => {
        const metrics = new InMemoryMetricsCollector();
        const dispatcher = new InMemoryEventDispatcher({ logger: new NullLogger(), metrics });
        dispatcher.subscribe('StreakMilestoneReached', new StreakMilestoneHandler({ logger: new NullLogger(), metrics }));

        await dispatcher.dispatch(new StreakMilestoneReached('reading', 100, '2024-01-01', '2024-04-09'));

        expect(metrics.getCounter('streak_milestones_total', { milestone: '100' })).toBe(1);
        expect(metrics.getCounter('events_dispatched_total', { event: 'StreakMilestoneReached' })).toBe(1);
    });
});
