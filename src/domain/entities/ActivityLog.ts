import { ActivityEntry } from '../value-objects/ActivityDate.js';

export const MAX_NOTE_LENGTH = 500;

export interface IActivityLog {
    id: string;
    subjectId: string; // Habit, user or anything else tracked day by day
    date: string; // YYYY-MM-DD in the service's reference zone
    count: number;
    note?: string;
    recordedAt: Date;
}

export class ActivityLogUtils {
    /**
     * Calculator input for a subject's history.
     */
    static toEntries(logs: readonly IActivityLog[]): ActivityEntry[] {
        return logs.map(log => ({ date: log.date, count: log.count }));
    }
}
