/**
 * Which day the current streak is counted back from.
 *
 * - `latest`: the most recent active day, however old.
 * - `grace`: today, or yesterday when today has no activity yet.
 * - `strict`: today only.
 */
export enum CurrentStreakPolicy {
    Latest = 'latest',
    Grace = 'grace',
    Strict = 'strict',
}

export const CURRENT_STREAK_POLICIES: readonly CurrentStreakPolicy[] = [
    CurrentStreakPolicy.Latest,
    CurrentStreakPolicy.Grace,
    CurrentStreakPolicy.Strict,
];

export function parseCurrentStreakPolicy(value: string): CurrentStreakPolicy | undefined {
    return CURRENT_STREAK_POLICIES.find(policy => policy === value.toLowerCase());
}
