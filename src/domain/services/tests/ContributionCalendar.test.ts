import { describe, it, expect } from 'vitest';
import { ContributionCalendarBuilder, buildContributionCalendar, intensityLevel } from '../ContributionCalendar.js';
import { WeekStart } from '../../enums/WeekStart.js';

const ACTIVITY = [
    { date: '2024-03-04', count: 5 }, // before the range
    { date: '2024-03-06', count: 2 },
    { date: '2024-03-07', count: 8 },
    { date: '2024-03-12', count: 1 },
    { date: '2024-03-13', count: 3 }, // after the range
];

const RANGE = { from: '2024-03-06', to: '2024-03-12', today: '2024-03-12' };

describe('intensityLevel', () => {
    it('buckets counts relative to the busiest day', () => {
        expect(intensityLevel(3, 12, true)).toBe(1);
        expect(intensityLevel(7, 12, true)).toBe(3);
        expect(intensityLevel(12, 12, true)).toBe(4);
    });

    it('is 0 for inactive days and at least 1 for active ones', () => {
        expect(intensityLevel(5, 10, false)).toBe(0);
        expect(intensityLevel(2, 0, true)).toBe(1);
        expect(intensityLevel(1, 1000, true)).toBe(1);
    });

    it('is 0 for a zero count', () => {
        expect(intensityLevel(0, 0, true)).toBe(0);
        expect(intensityLevel(0, 4, true)).toBe(0);
    });
});

describe('ContributionCalendarBuilder', () => {
    it('lays out whole weeks around the range', () => {
        const calendar = buildContributionCalendar(ACTIVITY, RANGE);

        expect(calendar.from).toBe('2024-03-06');
        expect(calendar.to).toBe('2024-03-12');
        expect(calendar.weeks.map(week => week.weekStart)).toEqual(['2024-03-04', '2024-03-11']);
        expect(calendar.weeks.every(week => week.days.length === 7)).toBe(true);
    });

    it('totals in-range activity only', () => {
        const calendar = buildContributionCalendar(ACTIVITY, RANGE);

        expect(calendar.totalContributions).toBe(11);
        expect(calendar.activeDays).toBe(3);
        expect(calendar.maxCount).toBe(8);
    });

    it('fills day cells with counts and levels', () => {
        const [first, second] = buildContributionCalendar(ACTIVITY, RANGE).weeks;

        expect(first.days[0]).toEqual({ date: '2024-03-04', weekday: 1, count: 0, level: 0, inRange: false });
        expect(first.days[2]).toEqual({ date: '2024-03-06', weekday: 3, count: 2, level: 1, inRange: true });
        expect(first.days[3]).toEqual({ date: '2024-03-07', weekday: 4, count: 8, level: 4, inRange: true });
        expect(first.days[4]).toEqual({ date: '2024-03-08', weekday: 5, count: 0, level: 0, inRange: true });
        expect(second.days[1]).toEqual({ date: '2024-03-12', weekday: 2, count: 1, level: 1, inRange: true });
        expect(second.days[2]).toEqual({ date: '2024-03-13', weekday: 3, count: 0, level: 0, inRange: false });
    });

    it('keeps below-threshold days out of the active days but in the total', () => {
        const calendar = buildContributionCalendar(ACTIVITY, { ...RANGE, minCount: 2 });

        expect(calendar.activeDays).toBe(2);
        expect(calendar.totalContributions).toBe(11);
        expect(calendar.weeks[1].days[1]).toEqual({ date: '2024-03-12', weekday: 2, count: 1, level: 0, inRange: true });
    });

    it('defaults to 53 weeks ending today', () => {
        const calendar = buildContributionCalendar([], { today: '2024-03-12' });

        expect(calendar.to).toBe('2024-03-12');
        expect(calendar.from).toBe('2023-03-13');
        expect(calendar.weeks).toHaveLength(53);
        expect(calendar.weeks[52].days[6]).toEqual({ date: '2024-03-17', weekday: 0, count: 0, level: 0, inRange: false });
        expect(calendar.totalContributions).toBe(0);
        expect(calendar.maxCount).toBe(0);
    });

    it('never counts a zero-count day as active, even with minCount 0', () => {
        const calendar = buildContributionCalendar(
            { '2024-03-04': 0, '2024-03-05': 4 },
            { from: '2024-03-04', to: '2024-03-05', minCount: 0 }
        );

        expect(calendar.weeks[0].days.slice(0, 2)).toEqual([
            { date: '2024-03-04', weekday: 1, count: 0, level: 0, inRange: true },
            { date: '2024-03-05', weekday: 2, count: 4, level: 4, inRange: true },
        ]);
        expect(calendar.activeDays).toBe(1);
        expect(calendar.maxCount).toBe(4);
        expect(calendar.totalContributions).toBe(4);
    });

    it('aligns to the configured week start', () => {
        const builder = new ContributionCalendarBuilder({ weekStart: WeekStart.Sunday });
        const calendar = builder.build(ACTIVITY, RANGE);

        expect(calendar.weekStart).toBe(WeekStart.Sunday);
        expect(calendar.weeks.map(week => week.weekStart)).toEqual(['2024-03-03', '2024-03-10']);
        expect(calendar.weeks[0].days[3].date).toBe('2024-03-06');
    });

    it('rejects a reversed range', () => {
        expect(() => buildContributionCalendar([], { from: '2024-03-12', to: '2024-03-01' }))
            .toThrowError('Invalid option from: from must not be after to');
    });

    it('rejects ranges beyond the week limit', () => {
        expect(() => buildContributionCalendar([], { from: '1900-01-01', to: '2024-03-01' }))
            .toThrowError(/at most 5300 are allowed/);
    });
});
