import { IActivityLog } from '../../domain/entities/ActivityLog.js';
import { IStreak } from '../../domain/entities/Streak.js';
import { ActivityDateInput } from '../../domain/value-objects/ActivityDate.js';
import { PaginatedResponse, PaginationQuery } from '../../shared/types/Pagination.js';

export interface RecordActivityRequest {
    subjectId: string;
    /** Defaults to today in the reference zone */
    date?: ActivityDateInput;
    /** Defaults to 1 */
    count?: number;
    note?: string;
}

export interface RecordActivityResult {
    activity: IActivityLog;
    streak: IStreak;
    /** Milestones the current streak reached with this activity */
    milestonesReached: number[];
}

export interface IRecordActivityUseCase {
    /**
     * Records activity for a subject and recomputes its streak.
     */
    execute(request: RecordActivityRequest): Promise<RecordActivityResult>;
}

export interface IListSubjectActivityUseCase {
    /**
     * A subject's activity log, oldest first.
     */
    execute(subjectId: string, pagination?: PaginationQuery): Promise<PaginatedResponse<IActivityLog>>;
}

export interface IClearSubjectActivityUseCase {
    /**
     * Removes a subject's history.
     * @returns the number of removed entries
     */
    execute(subjectId: string): Promise<number>;
}
