import { IStreak } from '../../domain/entities/Streak.js';
import { WeekActivity } from '../../domain/services/StreakCalculator.js';
import { ContributionCalendar } from '../../domain/services/ContributionCalendar.js';

export interface SubjectStreak {
    streak: IStreak;
    weeks: WeekActivity[];
}

export interface SubjectCalendarRequest {
    /** `YYYY-MM-DD`; defaults to 52 weeks before `to` */
    from?: string;
    /** `YYYY-MM-DD`; defaults to today */
    to?: string;
}

export interface IGetSubjectStreakUseCase {
    /**
     * Current and longest streak of a subject. Unknown subjects have
     * zero streaks.
     */
    execute(subjectId: string): Promise<SubjectStreak>;
}

export interface IGetSubjectCalendarUseCase {
    /**
     * Contribution calendar of a subject's recorded activity.
     */
    execute(subjectId: string, request?: SubjectCalendarRequest): Promise<ContributionCalendar>;
}
