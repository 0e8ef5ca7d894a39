/**
 * ReferenceZone - the time zone instants are projected into before they
 * become calendar days.
 *
 * Accepts `UTC`, a fixed offset (`+05:30`, `-0800`) or an IANA zone name
 * resolved through `Intl.DateTimeFormat`.
 */

import { DayKey, MS_PER_DAY, dayKeyFromCalendarDate, dayKeyFromEpochMs } from './DayKey.js';
import { InvalidInputError } from '../errors/InvalidInputError.js';

const OFFSET_PATTERN = /^([+-])(\d{2}):?(\d{2})$/;

/**
 * Parse `±HH:MM` / `±HHMM` into minutes east of UTC.
 */
export function parseUtcOffset(value: string): number | undefined {
    const match = OFFSET_PATTERN.exec(value);
    if (!match) {
        return undefined;
    }
    const hours = Number(match[2]);
    const minutes = Number(match[3]);
    if (hours > 23 || minutes > 59) {
        return undefined;
    }
    const sign = match[1] === '-' ? -1 : 1;
    return sign * (hours * 60 + minutes);
}

export class ReferenceZone {
    static readonly UTC = new ReferenceZone('UTC', dayKeyFromEpochMs);

    private constructor(
        readonly name: string,
        private readonly resolveDay: (epochMs: number) => DayKey
    ) { }

    /**
     * Resolve a zone name. Unknown names fail with InvalidInputError.
     */
    static of(timeZone: string): ReferenceZone {
        const trimmed = timeZone.trim();
        if (trimmed === '' || trimmed.toUpperCase() === 'UTC' || trimmed === 'Z') {
            return ReferenceZone.UTC;
        }

        const offsetMinutes = parseUtcOffset(trimmed);
        if (offsetMinutes !== undefined) {
            const offsetMs = offsetMinutes * 60_000;
            return new ReferenceZone(trimmed, epochMs => Math.floor((epochMs + offsetMs) / MS_PER_DAY));
        }

        let formatter: Intl.DateTimeFormat;
        try {
            formatter = new Intl.DateTimeFormat('en-US-u-ca-gregory-nu-latn', {
                timeZone: trimmed,
                year: 'numeric',
                month: 'numeric',
                day: 'numeric',
            });
        } catch (error) {
            const reason = error instanceof Error ? error.message : 'unknown time zone';
            throw InvalidInputError.forOption('timeZone', timeZone, reason);
        }

        return new ReferenceZone(
            formatter.resolvedOptions().timeZone,
            epochMs => dayKeyFromParts(formatter.formatToParts(epochMs))
        );
    }

    /**
     * Calendar day containing an instant, in this zone.
     */
    dayOf(epochMs: number): DayKey {
        return this.resolveDay(epochMs);
    }
}

function dayKeyFromParts(parts: Intl.DateTimeFormatPart[]): DayKey {
    const read = (type: Intl.DateTimeFormatPartTypes): number => {
        const part = parts.find(p => p.type === type);
        if (!part) {
            throw new Error(`Time zone formatter returned no ${type} part`);
        }
        return Number(part.value);
    };
    return dayKeyFromCalendarDate({ year: read('year'), month: read('month'), day: read('day') });
}
