import { describe, it, expect } from 'vitest';
import {
    calendarDateFromDayKey,
    dayKeyFromCalendarDate,
    dayKeyFromEpochMs,
    dayOfWeek,
    formatDayKey,
    isValidCalendarDate,
    startOfWeek,
    weekdayIndex,
} from '../DayKey.js';
import { WeekStart } from '../../enums/WeekStart.js';

// 2024-01-01 was a Monday
const JAN_1_2024 = 19723;

describe('DayKey', () => {
    it('counts days from 1970-01-01', () => {
        expect(dayKeyFromCalendarDate({ year: 1970, month: 1, day: 1 })).toBe(0);
        expect(dayKeyFromCalendarDate({ year: 1969, month: 12, day: 31 })).toBe(-1);
        expect(dayKeyFromCalendarDate({ year: 2024, month: 1, day: 1 })).toBe(JAN_1_2024);
    });

    it('converts day keys back to calendar dates', () => {
        expect(calendarDateFromDayKey(JAN_1_2024)).toEqual({ year: 2024, month: 1, day: 1 });
        expect(calendarDateFromDayKey(-1)).toEqual({ year: 1969, month: 12, day: 31 });
    });

    it('keeps consecutive keys across month, leap day and year boundaries', () => {
        const feb28 = dayKeyFromCalendarDate({ year: 2024, month: 2, day: 28 });
        expect(dayKeyFromCalendarDate({ year: 2024, month: 2, day: 29 })).toBe(feb28 + 1);
        expect(dayKeyFromCalendarDate({ year: 2024, month: 3, day: 1 })).toBe(feb28 + 2);
        expect(dayKeyFromCalendarDate({ year: 2023, month: 12, day: 31 })).toBe(JAN_1_2024 - 1);
    });

    it('does not remap years below 100', () => {
        const key = dayKeyFromCalendarDate({ year: 50, month: 6, day: 15 });
        expect(key).toBe(-701100);
        expect(formatDayKey(key)).toBe('0050-06-15');
    });

    it('formats as YYYY-MM-DD', () => {
        expect(formatDayKey(0)).toBe('1970-01-01');
        expect(formatDayKey(JAN_1_2024 + 59)).toBe('2024-02-29');
    });

    it('validates calendar dates', () => {
        expect(isValidCalendarDate({ year: 2024, month: 2, day: 29 })).toBe(true);
        expect(isValidCalendarDate({ year: 2000, month: 2, day: 29 })).toBe(true);
        expect(isValidCalendarDate({ year: 2023, month: 2, day: 29 })).toBe(false);
        expect(isValidCalendarDate({ year: 1900, month: 2, day: 29 })).toBe(false);
        expect(isValidCalendarDate({ year: 2023, month: 4, day: 31 })).toBe(false);
        expect(isValidCalendarDate({ year: 2023, month: 13, day: 1 })).toBe(false);
        expect(isValidCalendarDate({ year: 2023, month: 1, day: 0 })).toBe(false);
    });

    it('takes the UTC day of an instant', () => {
        expect(dayKeyFromEpochMs(0)).toBe(0);
        expect(dayKeyFromEpochMs(-1)).toBe(-1);
        expect(dayKeyFromEpochMs(Date.UTC(2024, 0, 1, 23, 59, 59))).toBe(JAN_1_2024);
    });

    describe('weeks', () => {
        it('knows the weekday of a key', () => {
            expect(dayOfWeek(0)).toBe(4); // Thursday
            expect(dayOfWeek(JAN_1_2024)).toBe(1); // Monday
            expect(dayOfWeek(-1)).toBe(3); // Wednesday
        });

        it('positions days inside the week', () => {
            const sunday = JAN_1_2024 - 1;
            expect(weekdayIndex(sunday, WeekStart.Monday)).toBe(6);
            expect(weekdayIndex(sunday, WeekStart.Sunday)).toBe(0);
            expect(weekdayIndex(JAN_1_2024, WeekStart.Monday)).toBe(0);
            expect(weekdayIndex(JAN_1_2024, WeekStart.Sunday)).toBe(1);
        });

        it('finds the start of the week', () => {
            const wednesday = JAN_1_2024 + 2;
            expect(startOfWeek(wednesday, WeekStart.Monday)).toBe(JAN_1_2024);
            expect(startOfWeek(wednesday, WeekStart.Sunday)).toBe(JAN_1_2024 - 1);
        });
    });
});
