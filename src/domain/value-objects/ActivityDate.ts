/**
 * ActivityDate - raw activity input and its normalization to day keys.
 */

import { CalendarDate, DayKey, dayKeyFromCalendarDate, isValidCalendarDate } from './DayKey.js';
import { ReferenceZone, parseUtcOffset } from './ReferenceZone.js';
import { InvalidInputError } from '../errors/InvalidInputError.js';

/**
 * A date as callers hand it over: a `Date`, epoch milliseconds, a
 * `YYYY-MM-DD` calendar date or an ISO 8601 date-time.
 */
export type ActivityDateInput = Date | string | number;

/**
 * A date with the number of activities that happened on it.
 */
export interface ActivityEntry {
    date: ActivityDateInput;
    count?: number;
}

/**
 * A list of dates or entries, or a `YYYY-MM-DD` -> count record.
 */
export type ActivityInput =
    | ReadonlyArray<ActivityDateInput | ActivityEntry>
    | Readonly<Record<string, number>>;

export type DateParseResult =
    | { valid: true; day: DayKey }
    | { valid: false; reason: string };

/**
 * Per-day activity totals, keyed by day key.
 */
export type DailyCounts = Map<DayKey, number>;

const ISO_DATE_PATTERN =
    /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?(Z|z|[+-]\d{2}:?\d{2})?)?$/;

// ECMAScript time values are limited to +-8.64e15 ms
const MAX_EPOCH_MS = 8.64e15;

/**
 * Normalize one date value to a day key in `zone`.
 *
 * Calendar dates and date-times without an offset keep their written
 * date. Instants (a `Date`, epoch ms, a date-time with `Z` or an offset)
 * are projected into the zone.
 */
export function parseActivityDate(value: unknown, zone: ReferenceZone): DateParseResult {
    if (value instanceof Date) {
        const time = value.getTime();
        if (Number.isNaN(time)) {
            return { valid: false, reason: 'invalid Date' };
        }
        return { valid: true, day: zone.dayOf(time) };
    }

    if (typeof value === 'number') {
        if (!Number.isFinite(value) || Math.abs(value) > MAX_EPOCH_MS) {
            return { valid: false, reason: 'epoch milliseconds must be a finite time value' };
        }
        return { valid: true, day: zone.dayOf(value) };
    }

    if (typeof value === 'string') {
        return parseDateString(value.trim(), zone);
    }

    return { valid: false, reason: `unsupported date value of type ${value === null ? 'null' : typeof value}` };
}

function parseDateString(value: string, zone: ReferenceZone): DateParseResult {
    const match = ISO_DATE_PATTERN.exec(value);
    if (!match) {
        return { valid: false, reason: `unrecognized date format "${value}"` };
    }

    const date: CalendarDate = {
        year: Number(match[1]),
        month: Number(match[2]),
        day: Number(match[3]),
    };
    if (!isValidCalendarDate(date)) {
        return { valid: false, reason: `"${value}" is not a calendar date` };
    }

    const day = dayKeyFromCalendarDate(date);
    if (match[4] === undefined) {
        return { valid: true, day };
    }

    const hours = Number(match[4]);
    const minutes = Number(match[5]);
    const seconds = match[6] === undefined ? 0 : Number(match[6]);
    if (hours > 23 || minutes > 59 || seconds > 59) {
        return { valid: false, reason: `time of day out of range in "${value}"` };
    }

    const zoneDesignator = match[8];
    if (zoneDesignator === undefined) {
        // Wall-clock time, already in the reference zone
        return { valid: true, day };
    }

    const offsetMinutes = zoneDesignator.toUpperCase() === 'Z' ? 0 : parseUtcOffset(zoneDesignator);
    if (offsetMinutes === undefined) {
        return { valid: false, reason: `invalid UTC offset "${zoneDesignator}"` };
    }

    const millis = match[7] === undefined ? 0 : Number(match[7].slice(0, 3).padEnd(3, '0'));
    const wallMs = day * 86_400_000 + ((hours * 60 + minutes) * 60 + seconds) * 1000 + millis;
    return { valid: true, day: zone.dayOf(wallMs - offsetMinutes * 60_000) };
}

/**
 * Normalize one value or throw InvalidInputError naming `field`.
 */
export function toDayKey(value: unknown, zone: ReferenceZone, field: string): DayKey {
    const result = parseActivityDate(value, zone);
    if (!result.valid) {
        throw new InvalidInputError(`Invalid ${field}: ${result.reason}`, field, value);
    }
    return result.day;
}

export function isActivityEntry(value: unknown): value is ActivityEntry {
    return typeof value === 'object'
        && value !== null
        && !(value instanceof Date)
        && !Array.isArray(value)
        && 'date' in value;
}

function isActivityList(input: ActivityInput): input is ReadonlyArray<ActivityDateInput | ActivityEntry> {
    return Array.isArray(input);
}

/**
 * Reason `count` is not a usable activity count, if any.
 */
export function validateCount(count: unknown): string | undefined {
    if (typeof count !== 'number' || !Number.isFinite(count) || count < 0) {
        return 'count must be a non-negative finite number';
    }
    return undefined;
}

/**
 * Sum the activity of every entry per day. The first bad entry aborts
 * the whole call.
 */
export function collectDailyCounts(input: ActivityInput, zone: ReferenceZone): DailyCounts {
    const counts: DailyCounts = new Map();
    const add = (day: DayKey, count: number): void => {
        counts.set(day, (counts.get(day) ?? 0) + count);
    };

    if (!isActivityList(input)) {
        for (const [key, count] of Object.entries(input)) {
            const field = `dates["${key}"]`;
            const countError = validateCount(count);
            if (countError) {
                throw new InvalidInputError(`Invalid ${field}: ${countError}`, field, count);
            }
            add(toDayKey(key, zone, field), count);
        }
        return counts;
    }

    input.forEach((item: unknown, index: number) => {
        if (isActivityEntry(item)) {
            const count = item.count ?? 1;
            const countError = validateCount(count);
            if (countError) {
                throw InvalidInputError.atIndex(index, item, countError);
            }
            const result = parseActivityDate(item.date, zone);
            if (!result.valid) {
                throw InvalidInputError.atIndex(index, item.date, result.reason);
            }
            add(result.day, count);
            return;
        }

        const result = parseActivityDate(item, zone);
        if (!result.valid) {
            throw InvalidInputError.atIndex(index, item, result.reason);
        }
        add(result.day, 1);
    });

    return counts;
}
