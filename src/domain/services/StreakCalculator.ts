/**
 * StreakCalculator - current and longest streaks over a set of dates.
 *
 * Input is normalized to a DateSet (one key per active day, ascending);
 * the longest streak is a single forward scan and the current streak a
 * backward scan from an anchor chosen by the CurrentStreakPolicy.
 */

import { CurrentStreakPolicy } from '../enums/CurrentStreakPolicy.js';
import { WeekStart } from '../enums/WeekStart.js';
import { ActivityDateInput, ActivityInput, collectDailyCounts, toDayKey } from '../value-objects/ActivityDate.js';
import { DateSet } from '../value-objects/DateSet.js';
import { DayKey, formatDayKey, startOfWeek } from '../value-objects/DayKey.js';
import { InvalidInputError } from '../errors/InvalidInputError.js';
import {
    CalculationDefaults,
    CalculationOptions,
    MAX_WEEK_SPAN,
    ResolvedCalculationOptions,
    resolveCalculationOptions,
} from './CalculationOptions.js';

export interface StreakResult {
    currentStreak: number;
    longestStreak: number;
}

/**
 * A contiguous run of active days, inclusive on both ends.
 */
export interface DayRun {
    start: DayKey;
    end: DayKey;
    length: number;
}

export interface StreakRun {
    start: string;
    end: string;
    length: number;
}

export interface WeekActivity {
    /** First day of the week, `YYYY-MM-DD` */
    weekStart: string;
    /** One flag per day, starting at the configured week start */
    days: boolean[];
    activeDays: number;
    active: boolean;
}

export interface StreakReport extends StreakResult {
    currentRun: StreakRun | null;
    longestRun: StreakRun | null;
    totalActiveDays: number;
    firstActiveDate: string | null;
    lastActiveDate: string | null;
    today: string;
    timeZone: string;
    weekStart: WeekStart;
    minCount: number;
    currentStreakPolicy: CurrentStreakPolicy;
    weeks: WeekActivity[];
}

export interface StreakCalculationOptions extends CalculationOptions {
    /**
     * Span of the weekly flags. Defaults to first..last active day, cut to
     * the latest MAX_WEEK_SPAN weeks when `from` is omitted.
     */
    range?: { from?: ActivityDateInput; to?: ActivityDateInput };
    /** Skip the weekly flags */
    includeWeeks?: boolean;
}

/**
 * Longest run in the set. Ties keep the earliest run.
 */
export function findLongestRun(dateSet: DateSet): DayRun | null {
    let best: DayRun | null = null;
    let runStart: DayKey | undefined;
    let previous: DayKey | undefined;
    let runLength = 0;

    for (const day of dateSet) {
        if (previous !== undefined && runStart !== undefined && day === previous + 1) {
            runLength++;
        } else {
            runStart = day;
            runLength = 1;
        }
        if (best === null || runLength > best.length) {
            best = { start: runStart, end: day, length: runLength };
        }
        previous = day;
    }

    return best;
}

/**
 * Day the current streak counts back from, if any.
 */
export function currentStreakAnchor(
    dateSet: DateSet,
    today: DayKey,
    policy: CurrentStreakPolicy
): DayKey | undefined {
    switch (policy) {
        case CurrentStreakPolicy.Latest:
            return dateSet.last;
        case CurrentStreakPolicy.Grace:
            if (dateSet.has(today)) return today;
            return dateSet.has(today - 1) ? today - 1 : undefined;
        case CurrentStreakPolicy.Strict:
            return dateSet.has(today) ? today : undefined;
    }
}

export function findCurrentRun(
    dateSet: DateSet,
    today: DayKey,
    policy: CurrentStreakPolicy
): DayRun | null {
    const anchor = currentStreakAnchor(dateSet, today, policy);
    if (anchor === undefined) {
        return null;
    }

    let index = dateSet.indexOf(anchor);
    let start = anchor;
    while (index > 0) {
        const before = dateSet.at(index - 1);
        if (before !== start - 1) {
            break;
        }
        start = before;
        index--;
    }

    return { start, end: anchor, length: anchor - start + 1 };
}

/**
 * Activity flags for each week touching `from..to`.
 */
export function summarizeWeeks(dateSet: DateSet, weekStart: WeekStart, from: DayKey, to: DayKey): WeekActivity[] {
    const firstWeek = startOfWeek(from, weekStart);
    const lastWeek = startOfWeek(to, weekStart);
    const weekCount = (lastWeek - firstWeek) / 7 + 1;
    if (weekCount > MAX_WEEK_SPAN) {
        throw InvalidInputError.forOption('range', formatDayKey(from), `spans ${weekCount} weeks; at most ${MAX_WEEK_SPAN} are allowed`);
    }

    const weeks: WeekActivity[] = [];
    for (let week = firstWeek; week <= lastWeek; week += 7) {
        const days: boolean[] = [];
        for (let offset = 0; offset < 7; offset++) {
            const day = week + offset;
            days.push(day >= from && day <= to && dateSet.has(day));
        }
        const activeDays = days.filter(Boolean).length;
        weeks.push({ weekStart: formatDayKey(week), days, activeDays, active: activeDays > 0 });
    }
    return weeks;
}

function toStreakRun(run: DayRun | null): StreakRun | null {
    return run === null
        ? null
        : { start: formatDayKey(run.start), end: formatDayKey(run.end), length: run.length };
}

export class StreakCalculator {
    constructor(private readonly defaults: Partial<CalculationDefaults> = {}) { }

    /**
     * Normalize `input` and compute the streak report.
     * Throws InvalidInputError on the first entry that cannot be normalized.
     */
    calculate(input: ActivityInput, options: StreakCalculationOptions = {}): StreakReport {
        const resolved = resolveCalculationOptions(options, this.defaults);
        const dateSet = DateSet.fromDailyCounts(collectDailyCounts(input, resolved.zone), resolved.minCount);
        return this.report(dateSet, resolved, options);
    }

    /**
     * Normalize `input` to its DateSet without computing streaks.
     */
    normalize(input: ActivityInput, options: CalculationOptions = {}): DateSet {
        const resolved = resolveCalculationOptions(options, this.defaults);
        return DateSet.fromDailyCounts(collectDailyCounts(input, resolved.zone), resolved.minCount);
    }

    /**
     * The `YYYY-MM-DD` day `value` falls on in the reference zone, or
     * today when no value is given.
     */
    dayOf(value?: ActivityDateInput, field = 'date'): string {
        const resolved = resolveCalculationOptions({}, this.defaults);
        return formatDayKey(value === undefined ? resolved.today : toDayKey(value, resolved.zone, field));
    }

    private report(
        dateSet: DateSet,
        resolved: ResolvedCalculationOptions,
        options: StreakCalculationOptions
    ): StreakReport {
        const longest = findLongestRun(dateSet);
        const current = findCurrentRun(dateSet, resolved.today, resolved.currentStreakPolicy);
        const first = dateSet.first;
        const last = dateSet.last;

        return {
            currentStreak: current?.length ?? 0,
            longestStreak: longest?.length ?? 0,
            currentRun: toStreakRun(current),
            longestRun: toStreakRun(longest),
            totalActiveDays: dateSet.size,
            firstActiveDate: first === undefined ? null : formatDayKey(first),
            lastActiveDate: last === undefined ? null : formatDayKey(last),
            today: formatDayKey(resolved.today),
            timeZone: resolved.zone.name,
            weekStart: resolved.weekStart,
            minCount: resolved.minCount,
            currentStreakPolicy: resolved.currentStreakPolicy,
            weeks: options.includeWeeks === false ? [] : this.weeks(dateSet, resolved, options),
        };
    }

    private weeks(
        dateSet: DateSet,
        resolved: ResolvedCalculationOptions,
        options: StreakCalculationOptions
    ): WeekActivity[] {
        const range = options.range ?? {};
        const to = range.to === undefined ? dateSet.last : toDayKey(range.to, resolved.zone, 'range.to');
        const first = dateSet.first;
        if (to === undefined || (range.from === undefined && first === undefined)) {
            return [];
        }
        // An omitted start keeps only the most recent MAX_WEEK_SPAN weeks
        const from = range.from === undefined
            ? Math.max(first ?? to, startOfWeek(to, resolved.weekStart) - (MAX_WEEK_SPAN - 1) * 7)
            : toDayKey(range.from, resolved.zone, 'range.from');

        if (from > to) {
            throw InvalidInputError.forOption('range', range, 'from must not be after to');
        }
        return summarizeWeeks(dateSet, resolved.weekStart, from, to);
    }
}

/**
 * One-off calculation with default settings.
 */
export function calculateStreaks(input: ActivityInput, options: StreakCalculationOptions = {}): StreakReport {
    return new StreakCalculator().calculate(input, options);
}
