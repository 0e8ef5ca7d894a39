/**
 * Narrowing of validated JSON bodies into calculator input.
 */

import { ActivityDateInput, ActivityEntry, ActivityInput } from '../../domain/value-objects/ActivityDate.js';
import { CalculationOptions } from '../../domain/services/CalculationOptions.js';
import { InvalidInputError } from '../../domain/errors/InvalidInputError.js';
import { parseWeekStart } from '../../domain/enums/WeekStart.js';
import { parseCurrentStreakPolicy } from '../../domain/enums/CurrentStreakPolicy.js';
import { isRecord } from '../../shared/validation/RequestValidator.js';

export function readDateInput(value: unknown): ActivityDateInput | undefined {
    return typeof value === 'string' || typeof value === 'number' ? value : undefined;
}

function readActivityItem(item: unknown, index: number): ActivityDateInput | ActivityEntry {
    const date = readDateInput(item);
    if (date !== undefined) {
        return date;
    }
    if (isRecord(item)) {
        const entryDate = readDateInput(item.date);
        const count = item.count;
        if (entryDate !== undefined && count === undefined) {
            return { date: entryDate };
        }
        if (entryDate !== undefined && typeof count === 'number') {
            return { date: entryDate, count };
        }
    }
    throw InvalidInputError.atIndex(index, item, 'expected a date string, epoch milliseconds or { date, count }');
}

/**
 * The `dates` field of a request: a list of dates and entries, or a
 * date -> count object.
 */
export function readActivityInput(value: unknown): ActivityInput {
    if (Array.isArray(value)) {
        return value.map((item: unknown, index: number) => readActivityItem(item, index));
    }
    if (isRecord(value)) {
        // fromEntries defines own keys, so "__proto__" reaches date parsing
        return Object.fromEntries(Object.entries(value).map(([date, count]): [string, number] => {
            if (typeof count !== 'number') {
                const field = `dates["${date}"]`;
                throw new InvalidInputError(`Invalid ${field}: count must be a number`, field, count);
            }
            return [date, count];
        }));
    }
    throw new InvalidInputError('dates must be a list or a date -> count object', 'dates', value);
}

/**
 * Calculation options present on a request body.
 */
export function readCalculationOptions(body: Record<string, unknown>): CalculationOptions {
    return {
        today: readDateInput(body.today),
        timeZone: typeof body.timeZone === 'string' ? body.timeZone : undefined,
        weekStart: typeof body.weekStart === 'string' ? parseWeekStart(body.weekStart) : undefined,
        minCount: typeof body.minCount === 'number' ? body.minCount : undefined,
        currentStreakPolicy: typeof body.currentStreakPolicy === 'string'
            ? parseCurrentStreakPolicy(body.currentStreakPolicy)
            : undefined,
    };
}
