/**
 * First weekday of a weekly grouping. Streaks ignore it.
 */
export enum WeekStart {
    Monday = 'monday',
    Sunday = 'sunday',
}

export const WEEK_STARTS: readonly WeekStart[] = [WeekStart.Monday, WeekStart.Sunday];

export function parseWeekStart(value: string): WeekStart | undefined {
    return WEEK_STARTS.find(weekStart => weekStart === value.toLowerCase());
}
