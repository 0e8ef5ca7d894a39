import { IActivityLog } from '../../domain/entities/ActivityLog.js';

/**
 * Inclusive `YYYY-MM-DD` bounds.
 */
export interface ActivityDateRange {
    from?: string;
    to?: string;
}

export interface IActivityRepository {
    save(activity: IActivityLog): Promise<void>;
    /** Ordered by date, then by recording time */
    findBySubject(subjectId: string, range?: ActivityDateRange): Promise<IActivityLog[]>;
    listSubjects(): Promise<string[]>;
    /** Returns the number of removed entries */
    deleteBySubject(subjectId: string): Promise<number>;
    count(): Promise<number>;
}
