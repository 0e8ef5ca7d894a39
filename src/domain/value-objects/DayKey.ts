/**
 * DayKey - canonical form of a calendar date.
 *
 * A day key is the number of days since 1970-01-01 in the proleptic
 * Gregorian calendar. Consecutive calendar days have consecutive keys,
 * so streak scans reduce to integer comparisons.
 */

import { WeekStart } from '../enums/WeekStart.js';

export type DayKey = number;

export interface CalendarDate {
    year: number;
    month: number;
    day: number;
}

export const MS_PER_DAY = 86_400_000;

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

export function isLeapYear(year: number): boolean {
    return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

export function daysInMonth(year: number, month: number): number {
    return month === 2 && isLeapYear(year) ? 29 : DAYS_IN_MONTH[month - 1];
}

export function isValidCalendarDate({ year, month, day }: CalendarDate): boolean {
    return Number.isInteger(year)
        && Number.isInteger(month)
        && Number.isInteger(day)
        && month >= 1 && month <= 12
        && day >= 1 && day <= daysInMonth(year, month);
}

/**
 * Days since the epoch for a calendar date. Integer arithmetic only, so
 * years 0-99 are not remapped the way `Date.UTC` remaps them.
 */
export function dayKeyFromCalendarDate({ year, month, day }: CalendarDate): DayKey {
    const y = month <= 2 ? year - 1 : year;
    const era = Math.floor(y / 400);
    const yearOfEra = y - era * 400;
    const shiftedMonth = (month + 9) % 12;
    const dayOfYear = Math.floor((153 * shiftedMonth + 2) / 5) + day - 1;
    const dayOfEra = yearOfEra * 365 + Math.floor(yearOfEra / 4) - Math.floor(yearOfEra / 100) + dayOfYear;
    return era * 146097 + dayOfEra - 719468;
}

export function calendarDateFromDayKey(key: DayKey): CalendarDate {
    const z = key + 719468;
    const era = Math.floor(z / 146097);
    const dayOfEra = z - era * 146097;
    const yearOfEra = Math.floor(
        (dayOfEra - Math.floor(dayOfEra / 1460) + Math.floor(dayOfEra / 36524) - Math.floor(dayOfEra / 146096)) / 365
    );
    const dayOfYear = dayOfEra - (365 * yearOfEra + Math.floor(yearOfEra / 4) - Math.floor(yearOfEra / 100));
    const shiftedMonth = Math.floor((5 * dayOfYear + 2) / 153);
    const day = dayOfYear - Math.floor((153 * shiftedMonth + 2) / 5) + 1;
    const month = shiftedMonth < 10 ? shiftedMonth + 3 : shiftedMonth - 9;
    const year = yearOfEra + era * 400 + (month <= 2 ? 1 : 0);
    return { year, month, day };
}

/**
 * Day key of the UTC calendar day containing an instant.
 */
export function dayKeyFromEpochMs(epochMs: number): DayKey {
    return Math.floor(epochMs / MS_PER_DAY);
}

/**
 * `YYYY-MM-DD` for a day key.
 */
export function formatDayKey(key: DayKey): string {
    const { year, month, day } = calendarDateFromDayKey(key);
    const yyyy = String(Math.abs(year)).padStart(4, '0');
    return `${year < 0 ? '-' : ''}${yyyy}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}

/**
 * Weekday of a day key, 0 = Sunday through 6 = Saturday.
 */
export function dayOfWeek(key: DayKey): number {
    // 1970-01-01 was a Thursday
    return (((key + 4) % 7) + 7) % 7;
}

/**
 * Position of a day inside its week, 0 being `weekStart`.
 */
export function weekdayIndex(key: DayKey, weekStart: WeekStart): number {
    const weekday = dayOfWeek(key);
    return weekStart === WeekStart.Monday ? (weekday + 6) % 7 : weekday;
}

export function startOfWeek(key: DayKey, weekStart: WeekStart): DayKey {
    return key - weekdayIndex(key, weekStart);
}
