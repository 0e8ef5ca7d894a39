/**
 * DateSet - deduplicated, ascending active days.
 */

import { DayKey, formatDayKey } from './DayKey.js';
import { DailyCounts } from './ActivityDate.js';

/**
 * A normalized day with its merged count.
 */
export interface DailyTotal {
    date: string;
    count: number;
}

export class DateSet implements Iterable<DayKey> {
    private constructor(
        private readonly days: readonly DayKey[],
        private readonly totals: ReadonlyMap<DayKey, number>
    ) { }

    static empty(): DateSet {
        return new DateSet([], new Map());
    }

    /**
     * Each key counts once, however often it repeats.
     */
    static fromDayKeys(keys: Iterable<DayKey>): DateSet {
        const totals = new Map<DayKey, number>();
        for (const key of keys) {
            totals.set(key, 1);
        }
        return DateSet.fromTotals(totals);
    }

    /**
     * Days whose total is positive and reaches `minCount`, keeping
     * those totals.
     */
    static fromDailyCounts(counts: DailyCounts, minCount: number): DateSet {
        const active = new Map<DayKey, number>();
        counts.forEach((count, day) => {
            if (count > 0 && count >= minCount) {
                active.set(day, count);
            }
        });
        return DateSet.fromTotals(active);
    }

    private static fromTotals(totals: ReadonlyMap<DayKey, number>): DateSet {
        return new DateSet(Array.from(totals.keys()).sort((a, b) => a - b), totals);
    }

    get size(): number {
        return this.days.length;
    }

    get first(): DayKey | undefined {
        return this.days[0];
    }

    get last(): DayKey | undefined {
        return this.days[this.days.length - 1];
    }

    has(day: DayKey): boolean {
        return this.totals.has(day);
    }

    /**
     * Merged count of an active day; 0 for days not in the set.
     */
    countOf(day: DayKey): number {
        return this.totals.get(day) ?? 0;
    }

    at(index: number): DayKey | undefined {
        return this.days[index];
    }

    /**
     * Binary search; -1 when absent.
     */
    indexOf(day: DayKey): number {
        let low = 0;
        let high = this.days.length - 1;
        while (low <= high) {
            const mid = (low + high) >>> 1;
            const value = this.days[mid];
            if (value === day) {
                return mid;
            }
            if (value < day) {
                low = mid + 1;
            } else {
                high = mid - 1;
            }
        }
        return -1;
    }

    toArray(): DayKey[] {
        return [...this.days];
    }

    toIsoDates(): string[] {
        return this.days.map(formatDayKey);
    }

    /**
     * `{ date, count }` per day. Unlike bare dates, these feed back into a
     * calculation with the same `minCount` and yield the same set.
     */
    toEntries(): DailyTotal[] {
        return this.days.map(day => ({ date: formatDayKey(day), count: this.countOf(day) }));
    }

    [Symbol.iterator](): Iterator<DayKey> {
        return this.days[Symbol.iterator]();
    }
}
