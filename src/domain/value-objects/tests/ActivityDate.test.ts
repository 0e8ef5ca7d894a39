import { describe, it, expect } from 'vitest';
import { collectDailyCounts, parseActivityDate, toDayKey } from '../ActivityDate.js';
import { ReferenceZone, parseUtcOffset } from '../ReferenceZone.js';
import { dayKeyFromCalendarDate, formatDayKey } from '../DayKey.js';
import { InvalidInputError } from '../../errors/InvalidInputError.js';

const utc = ReferenceZone.UTC;

function dayOf(value: unknown, zone: ReferenceZone = utc): string {
    return formatDayKey(toDayKey(value, zone, 'date'));
}

describe('ReferenceZone', () => {
    it('parses fixed offsets', () => {
        expect(parseUtcOffset('+05:30')).toBe(330);
        expect(parseUtcOffset('-0800')).toBe(-480);
        expect(parseUtcOffset('+24:00')).toBeUndefined();
        expect(parseUtcOffset('0530')).toBeUndefined();
    });

    it('treats UTC spellings as the UTC zone', () => {
        expect(ReferenceZone.of('utc')).toBe(ReferenceZone.UTC);
        expect(ReferenceZone.of('Z')).toBe(ReferenceZone.UTC);
        expect(ReferenceZone.of('+0530').name).toBe('+0530');
    });

    it('rejects unknown zones', () => {
        expect(() => ReferenceZone.of('Mars/Olympus_Mons')).toThrow(InvalidInputError);
        try {
            ReferenceZone.of('Mars/Olympus_Mons');
        } catch (error) {
            expect(error).toBeInstanceOf(InvalidInputError);
            if (error instanceof InvalidInputError) {
                expect(error.field).toBe('timeZone');
            }
        }
    });

    it('projects instants into IANA zones', () => {
        // 22:30 on March 9th in New York, before the DST switch
        expect(dayOf('2024-03-10T03:30:00Z', ReferenceZone.of('America/New_York'))).toBe('2024-03-09');
        expect(dayOf('2024-03-10T16:00:00Z', ReferenceZone.of('Asia/Tokyo'))).toBe('2024-03-11');
    });
});

describe('parseActivityDate', () => {
    it('keeps calendar dates as written', () => {
        expect(dayOf('2024-03-10')).toBe('2024-03-10');
        expect(dayOf('2024-03-10', ReferenceZone.of('-11:00'))).toBe('2024-03-10');
        expect(dayOf('  2024-03-10  ')).toBe('2024-03-10');
    });

    it('keeps the date of wall-clock times without an offset', () => {
        expect(dayOf('2024-03-10T23:30:00', ReferenceZone.of('+09:00'))).toBe('2024-03-10');
        expect(dayOf('2024-03-10 06:15', ReferenceZone.of('-05:00'))).toBe('2024-03-10');
    });

    it('projects date-times with an offset into the zone', () => {
        expect(dayOf('2024-03-10T23:30:00-05:00')).toBe('2024-03-11');
        expect(dayOf('2024-03-10T20:00:00Z', ReferenceZone.of('+05:30'))).toBe('2024-03-11');
        expect(dayOf('2024-03-10T01:00:00.500+0200')).toBe('2024-03-09');
    });

    it('projects Date instances and epoch milliseconds', () => {
        const instant = new Date(Date.UTC(2024, 2, 10, 22, 0));
        expect(dayOf(instant, ReferenceZone.of('-03:00'))).toBe('2024-03-10');
        expect(dayOf(instant, ReferenceZone.of('+03:00'))).toBe('2024-03-11');
        expect(dayOf(0)).toBe('1970-01-01');
    });

    it('reports why a value is rejected', () => {
        expect(parseActivityDate('2023-02-30', utc)).toEqual({ valid: false, reason: '"2023-02-30" is not a calendar date' });
        expect(parseActivityDate('not-a-date', utc)).toEqual({ valid: false, reason: 'unrecognized date format "not-a-date"' });
        expect(parseActivityDate('2024-03-10T24:00:00Z', utc)).toEqual({
            valid: false,
            reason: 'time of day out of range in "2024-03-10T24:00:00Z"',
        });
        expect(parseActivityDate(new Date('nope'), utc)).toEqual({ valid: false, reason: 'invalid Date' });
        expect(parseActivityDate(Number.NaN, utc)).toEqual({
            valid: false,
            reason: 'epoch milliseconds must be a finite time value',
        });
        expect(parseActivityDate(null, utc)).toEqual({ valid: false, reason: 'unsupported date value of type null' });
        expect(parseActivityDate(true, utc)).toEqual({ valid: false, reason: 'unsupported date value of type boolean' });
    });

    it('names the field in thrown errors', () => {
        expect(() => toDayKey('soon', utc, 'today')).toThrowError('Invalid today: unrecognized date format "soon"');
    });
});

describe('collectDailyCounts', () => {
    const march1 = dayKeyFromCalendarDate({ year: 2024, month: 3, day: 1 });

    it('sums counts per day, bare dates counting once', () => {
        const counts = collectDailyCounts(
            ['2024-03-01', { date: '2024-03-01', count: 3 }, '2024-03-02T08:00:00Z', { date: '2024-03-02' }],
            utc
        );
        expect(Array.from(counts.entries())).toEqual([[march1, 4], [march1 + 1, 2]]);
    });

    it('accepts a date to count record', () => {
        const counts = collectDailyCounts({ '2024-03-01': 2, '2024-03-03': 0 }, utc);
        expect(counts.get(march1)).toBe(2);
        expect(counts.get(march1 + 2)).toBe(0);
        expect(counts.size).toBe(2);
    });

    it('fails on the first bad entry with its index', () => {
        expect(() => collectDailyCounts(['2024-03-01', 'nope'], utc))
            .toThrowError('Invalid activity date at index 1: unrecognized date format "nope"');
        expect(() => collectDailyCounts([{ date: '2024-03-01', count: -1 }], utc))
            .toThrowError('Invalid activity date at index 0: count must be a non-negative finite number');
        expect(() => collectDailyCounts({ '2024-03-01': -2 }, utc))
            .toThrowError('Invalid dates["2024-03-01"]: count must be a non-negative finite number');
    });

    it('exposes the offending field', () => {
        try {
            collectDailyCounts(['2024-03-01', '2024-03-02', '2024-13-01'], utc);
            expect.unreachable();
        } catch (error) {
            expect(error).toBeInstanceOf(InvalidInputError);
            if (error instanceof InvalidInputError) {
                expect(error.field).toBe('dates[2]');
                expect(error.value).toBe('2024-13-01');
            }
        }
    });
});
