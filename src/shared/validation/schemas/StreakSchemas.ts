/**
 * StreakSchemas - request schemas for streak, calendar and activity routes.
 *
 * Schemas check shapes only. Date parsing, time zones and count rules are
 * enforced by the domain, which reports the offending entry.
 */

import {
    ValidationSchema,
    booleanField,
    numberField,
    objectField,
    stringField,
    unionField,
} from '../ValidationSchema.js';
import { dateInputField, optionalDateField } from './CommonSchemas.js';
import { WEEK_STARTS } from '../../../domain/enums/WeekStart.js';
import { CURRENT_STREAK_POLICIES } from '../../../domain/enums/CurrentStreakPolicy.js';
import { MAX_NOTE_LENGTH } from '../../../domain/entities/ActivityLog.js';

/**
 * Largest accepted date list.
 */
export const MAX_ACTIVITY_DATES = 10_000;

const datesField = unionField(
    [
        { type: 'array', max: MAX_ACTIVITY_DATES },
        objectField({}, { allowAdditional: true }),
    ],
    {
        required: true,
        message: `dates must be a list of at most ${MAX_ACTIVITY_DATES} entries or a date -> count object`,
    }
);

const calculationOptionFields: ValidationSchema = {
    today: dateInputField,
    timeZone: stringField({ min: 1, max: 64 }),
    weekStart: stringField({ enum: WEEK_STARTS }),
    minCount: numberField({ min: 0 }),
};

/**
 * POST /api/streaks/calculate
 */
export const CalculateStreaksSchema: ValidationSchema = {
    dates: datesField,
    ...calculationOptionFields,
    currentStreakPolicy: stringField({ enum: CURRENT_STREAK_POLICIES }),
    range: objectField(
        { from: dateInputField, to: dateInputField },
        { allowAdditional: false }
    ),
    includeWeeks: booleanField(),
};

/**
 * POST /api/calendar/build
 */
export const BuildCalendarSchema: ValidationSchema = {
    dates: datesField,
    ...calculationOptionFields,
    from: dateInputField,
    to: dateInputField,
};

/**
 * POST /api/subjects/:subjectId/activity
 */
export const RecordActivitySchema: ValidationSchema = {
    date: dateInputField,
    count: numberField({ min: 0 }),
    note: stringField({ max: MAX_NOTE_LENGTH }),
};

/**
 * GET /api/subjects/:subjectId/calendar
 */
export const CalendarQuerySchema: ValidationSchema = {
    from: optionalDateField,
    to: optionalDateField,
};
