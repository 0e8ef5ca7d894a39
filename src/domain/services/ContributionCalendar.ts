/**
 * ContributionCalendar - the weeks x weekdays grid behind an activity
 * heatmap, with per-day counts and intensity levels.
 */

import { WeekStart } from '../enums/WeekStart.js';
import { ActivityDateInput, ActivityInput, DailyCounts, collectDailyCounts, toDayKey } from '../value-objects/ActivityDate.js';
import { DayKey, dayOfWeek, formatDayKey, startOfWeek } from '../value-objects/DayKey.js';
import { InvalidInputError } from '../errors/InvalidInputError.js';
import {
    CalculationDefaults,
    CalculationOptions,
    MAX_WEEK_SPAN,
    resolveCalculationOptions,
} from './CalculationOptions.js';

export type IntensityLevel = 0 | 1 | 2 | 3 | 4;

const LEVELS: readonly IntensityLevel[] = [0, 1, 2, 3, 4];

/**
 * Weeks shown before the week of `to` when `from` is omitted.
 */
export const DEFAULT_CALENDAR_WEEKS = 52;

export interface CalendarDay {
    date: string;
    /** 0 = Sunday through 6 = Saturday */
    weekday: number;
    count: number;
    level: IntensityLevel;
    /** False for padding cells outside `from..to` */
    inRange: boolean;
}

export interface CalendarWeek {
    weekStart: string;
    days: CalendarDay[];
}

export interface ContributionCalendar {
    from: string;
    to: string;
    weekStart: WeekStart;
    timeZone: string;
    minCount: number;
    weeks: CalendarWeek[];
    totalContributions: number;
    activeDays: number;
    maxCount: number;
}

export interface CalendarOptions extends CalculationOptions {
    from?: ActivityDateInput;
    /** Defaults to today */
    to?: ActivityDateInput;
}

/**
 * Intensity bucket of a day's count relative to the busiest day.
 * Inactive and zero-count days are 0; active days land in 1..4.
 */
export function intensityLevel(count: number, maxCount: number, active: boolean): IntensityLevel {
    if (!active || count <= 0) {
        return 0;
    }
    if (maxCount <= 0) {
        return 1;
    }
    const bucket = Math.ceil((count / maxCount) * 4);
    return LEVELS[Math.min(4, Math.max(1, bucket))];
}

export class ContributionCalendarBuilder {
    constructor(private readonly defaults: Partial<CalculationDefaults> = {}) { }

    build(input: ActivityInput, options: CalendarOptions = {}): ContributionCalendar {
        const resolved = resolveCalculationOptions(options, this.defaults);
        const to = options.to === undefined ? resolved.today : toDayKey(options.to, resolved.zone, 'to');
        const from = options.from === undefined
            ? startOfWeek(to, resolved.weekStart) - DEFAULT_CALENDAR_WEEKS * 7
            : toDayKey(options.from, resolved.zone, 'from');

        if (from > to) {
            throw InvalidInputError.forOption('from', options.from, 'from must not be after to');
        }

        const firstWeek = startOfWeek(from, resolved.weekStart);
        const lastWeek = startOfWeek(to, resolved.weekStart);
        const weekCount = (lastWeek - firstWeek) / 7 + 1;
        if (weekCount > MAX_WEEK_SPAN) {
            throw InvalidInputError.forOption('from', options.from, `calendar spans ${weekCount} weeks; at most ${MAX_WEEK_SPAN} are allowed`);
        }

        const counts = collectDailyCounts(input, resolved.zone);
        const isActive = (day: DayKey, count: number): boolean =>
            counts.has(day) && count > 0 && count >= resolved.minCount;

        let maxCount = 0;
        let totalContributions = 0;
        let activeDays = 0;
        forEachInRange(counts, from, to, (day, count) => {
            totalContributions += count;
            if (isActive(day, count)) {
                activeDays++;
                maxCount = Math.max(maxCount, count);
            }
        });

        const weeks: CalendarWeek[] = [];
        for (let week = firstWeek; week <= lastWeek; week += 7) {
            const days: CalendarDay[] = [];
            for (let offset = 0; offset < 7; offset++) {
                const day = week + offset;
                const inRange = day >= from && day <= to;
                const count = inRange ? counts.get(day) ?? 0 : 0;
                days.push({
                    date: formatDayKey(day),
                    weekday: dayOfWeek(day),
                    count,
                    level: intensityLevel(count, maxCount, inRange && isActive(day, count)),
                    inRange,
                });
            }
            weeks.push({ weekStart: formatDayKey(week), days });
        }

        return {
            from: formatDayKey(from),
            to: formatDayKey(to),
            weekStart: resolved.weekStart,
            timeZone: resolved.zone.name,
            minCount: resolved.minCount,
            weeks,
            totalContributions,
            activeDays,
            maxCount,
        };
    }
}

function forEachInRange(
    counts: DailyCounts,
    from: DayKey,
    to: DayKey,
    visit: (day: DayKey, count: number) => void
): void {
    counts.forEach((count, day) => {
        if (day >= from && day <= to) {
            visit(day, count);
        }
    });
}

export function buildContributionCalendar(input: ActivityInput, options: CalendarOptions = {}): ContributionCalendar {
    return new ContributionCalendarBuilder().build(input, options);
}
