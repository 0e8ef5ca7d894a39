import { describe, it, expect, beforeEach } from 'vitest';
import { GetSubjectStreak } from '../implementation/GetSubjectStreak.js';
import { GetSubjectCalendar } from '../implementation/GetSubjectCalendar.js';
import { ListSubjectActivity } from '../implementation/ListSubjectActivity.js';
import { ClearSubjectActivity } from '../implementation/ClearSubjectActivity.js';
import { InMemoryActivityRepository } from '../../../infrastructure/persistence/in-memory/InMemoryActivityRepository.js';
import { InMemoryMetricsCollector } from '../../../infrastructure/observability/MetricsCollector.js';
import { NullLogger } from '../../../infrastructure/observability/Logger.js';
import { IActivityLog } from '../../../domain/entities/ActivityLog.js';
import { StreakCalculator } from '../../../domain/services/StreakCalculator.js';
import { ContributionCalendarBuilder } from '../../../domain/services/ContributionCalendar.js';
import { CalculationDefaults } from '../../../domain/services/CalculationOptions.js';
import { CurrentStreakPolicy } from '../../../domain/enums/CurrentStreakPolicy.js';
import { WeekStart } from '../../../domain/enums/WeekStart.js';
import { MetricNames } from '../../ports/IObservabilityContext.js';

function log(date: string, count = 1, subjectId = 'reading'): IActivityLog {
    return {
        id: `${subjectId}-${date}-${count}`,
        subjectId,
        date,
        count,
        recordedAt: new Date(`${date}T09:00:00Z`),
    };
}

describe('Subject progress use cases', () => {
    let repository: InMemoryActivityRepository;
    let metrics: InMemoryMetricsCollector;
    const defaults: CalculationDefaults = {
        weekStart: WeekStart.Monday,
        minCount: 1,
        timeZone: 'UTC',
        currentStreakPolicy: CurrentStreakPolicy.Grace,
        clock: () => new Date('2024-03-10T12:00:00Z'),
    };

    beforeEach(async () => {
        repository = new InMemoryActivityRepository();
        metrics = new InMemoryMetricsCollector();
        for (const entry of [log('2024-03-01'), log('2024-03-02', 3), log('2024-03-03'), log('2024-03-08'), log('2024-03-09', 2)]) {
            await repository.save(entry);
        }
        await repository.save(log('2024-03-09', 1, 'running'));
    });

    describe('GetSubjectStreak', () => {
        it('should build the streak entity from stored activity', async () => {
            const useCase = new GetSubjectStreak(repository, new StreakCalculator(defaults), {
                logger: new NullLogger(),
                metrics,
            });

            const { streak, weeks } = await useCase.execute('reading');

            expect(streak.subjectId).toBe('reading');
            expect(streak.currentStreakCount).toBe(2);
            expect(streak.currentStreakStartDate).toBe('2024-03-08');
            expect(streak.longestStreakCount).toBe(3);
            expect(streak.longestStreakStartDate).toBe('2024-03-01');
            expect(streak.longestStreakEndDate).toBe('2024-03-03');
            expect(streak.lastActivityDate).toBe('2024-03-09');
            expect(streak.totalActiveDays).toBe(5);
            expect(weeks.map(week => week.weekStart)).toEqual(['2024-02-26', '2024-03-04']);
            expect(metrics.getCounter(MetricNames.STREAK_CALCULATIONS_TOTAL, { source: 'subject' })).toBe(1);
        });

        it('should report zero streaks for an unknown subject', async () => {
            const useCase = new GetSubjectStreak(repository, new StreakCalculator(defaults));

            const { streak, weeks } = await useCase.execute('swimming');

            expect(streak.currentStreakCount).toBe(0);
            expect(streak.longestStreakCount).toBe(0);
            expect(streak.lastActivityDate).toBeNull();
            expect(weeks).toEqual([]);
        });

        it('should reject malformed subject ids', async () => {
            const useCase = new GetSubjectStreak(repository, new StreakCalculator(defaults));
            await expect(useCase.execute('a/b')).rejects.toThrow(
                'Subject id may only contain letters, digits, ".", "_", ":" and "-"'
            );
        });
    });

    describe('GetSubjectCalendar', () => {
        it('should build the calendar of a subject', async () => {
            const useCase = new GetSubjectCalendar(repository, new ContributionCalendarBuilder(defaults), {
                logger: new NullLogger(),
                metrics,
            });

            const calendar = await useCase.execute('reading', { from: '2024-03-01', to: '2024-03-10' });

            expect(calendar.weeks.map(week => week.weekStart)).toEqual(['2024-02-26', '2024-03-04']);
            expect(calendar.totalContributions).toBe(8);
            expect(calendar.activeDays).toBe(5);
            expect(calendar.maxCount).toBe(3);
            expect(calendar.weeks[0].days[5]).toEqual({ date: '2024-03-02', weekday: 6, count: 3, level: 4, inRange: true });
            expect(metrics.getCounter(MetricNames.CALENDARS_BUILT_TOTAL, { source: 'subject' })).toBe(1);
        });

        it('should default to the year up to today', async () => {
            const useCase = new GetSubjectCalendar(repository, new ContributionCalendarBuilder(defaults));

            const calendar = await useCase.execute('reading');

            expect(calendar.to).toBe('2024-03-10');
            expect(calendar.weeks).toHaveLength(53);
        });
    });

    describe('ListSubjectActivity', () => {
        it('should page through the log oldest first', async () => {
            const useCase = new ListSubjectActivity(repository);

            const page = await useCase.execute('reading', { page: 2, pageSize: 2 });

            expect(page.data.map(entry => entry.date)).toEqual(['2024-03-03', '2024-03-08']);
            expect(page.pagination).toEqual({ page: 2, pageSize: 2, total: 5, totalPages: 3 });
        });
    });

    describe('ClearSubjectActivity', () => {
        it('should remove only the given subject', async () => {
            const useCase = new ClearSubjectActivity(repository);

            expect(await useCase.execute('reading')).toBe(5);
            expect(await repository.findBySubject('reading')).toEqual([]);
            expect(await repository.listSubjects()).toEqual(['running']);
        });
    });
});
