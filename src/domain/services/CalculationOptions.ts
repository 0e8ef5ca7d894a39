/**
 * Options shared by the streak calculator and the contribution calendar,
 * and their resolution against defaults.
 */

import { WeekStart, WEEK_STARTS } from '../enums/WeekStart.js';
import { CurrentStreakPolicy, CURRENT_STREAK_POLICIES } from '../enums/CurrentStreakPolicy.js';
import { ActivityDateInput, toDayKey } from '../value-objects/ActivityDate.js';
import { DayKey } from '../value-objects/DayKey.js';
import { ReferenceZone } from '../value-objects/ReferenceZone.js';
import { InvalidInputError } from '../errors/InvalidInputError.js';

export interface CalculationDefaults {
    weekStart: WeekStart;
    /** Minimum daily total for a day to count as active */
    minCount: number;
    /** `UTC`, `±HH:MM` or an IANA zone name */
    timeZone: string;
    currentStreakPolicy: CurrentStreakPolicy;
    /** Source of "today" when a call does not pass one */
    clock: () => Date;
}

export interface CalculationOptions extends Partial<Omit<CalculationDefaults, 'clock'>> {
    /** The day treated as today; defaults to the clock */
    today?: ActivityDateInput;
}

export interface ResolvedCalculationOptions {
    weekStart: WeekStart;
    minCount: number;
    zone: ReferenceZone;
    currentStreakPolicy: CurrentStreakPolicy;
    today: DayKey;
}

export const DEFAULT_CALCULATION_DEFAULTS: CalculationDefaults = {
    weekStart: WeekStart.Monday,
    minCount: 1,
    timeZone: 'UTC',
    currentStreakPolicy: CurrentStreakPolicy.Latest,
    clock: () => new Date(),
};

/**
 * Upper bound on weekly groupings and calendar grids.
 */
export const MAX_WEEK_SPAN = 5300;

export function resolveCalculationOptions(
    options: CalculationOptions,
    defaults: Partial<CalculationDefaults> = {}
): ResolvedCalculationOptions {
    const base: CalculationDefaults = { ...DEFAULT_CALCULATION_DEFAULTS, ...defaults };

    const weekStart = options.weekStart ?? base.weekStart;
    if (!WEEK_STARTS.includes(weekStart)) {
        throw InvalidInputError.forOption('weekStart', weekStart, `must be one of [${WEEK_STARTS.join(', ')}]`);
    }

    const currentStreakPolicy = options.currentStreakPolicy ?? base.currentStreakPolicy;
    if (!CURRENT_STREAK_POLICIES.includes(currentStreakPolicy)) {
        throw InvalidInputError.forOption(
            'currentStreakPolicy',
            currentStreakPolicy,
            `must be one of [${CURRENT_STREAK_POLICIES.join(', ')}]`
        );
    }

    const minCount = options.minCount ?? base.minCount;
    if (typeof minCount !== 'number' || !Number.isFinite(minCount) || minCount < 0) {
        throw InvalidInputError.forOption('minCount', minCount, 'must be a non-negative finite number');
    }

    const zone = ReferenceZone.of(options.timeZone ?? base.timeZone);
    const today = options.today === undefined
        ? toDayKey(base.clock(), zone, 'clock')
        : toDayKey(options.today, zone, 'today');

    return { weekStart, minCount, zone, currentStreakPolicy, today };
}
