import { StreakReport } from '../services/StreakCalculator.js';

export interface IStreak {
    subjectId: string;
    currentStreakCount: number;
    longestStreakCount: number;
    currentStreakStartDate: string | null;
    longestStreakStartDate: string | null;
    longestStreakEndDate: string | null;
    lastActivityDate: string | null;
    totalActiveDays: number;
    calculatedAt: Date;
}

export class StreakUtils {
    static fromReport(subjectId: string, report: StreakReport, calculatedAt: Date = new Date()): IStreak {
        return {
            subjectId,
            currentStreakCount: report.currentStreak,
            longestStreakCount: report.longestStreak,
            currentStreakStartDate: report.currentRun?.start ?? null,
            longestStreakStartDate: report.longestRun?.start ?? null,
            longestStreakEndDate: report.longestRun?.end ?? null,
            lastActivityDate: report.lastActiveDate,
            totalActiveDays: report.totalActiveDays,
            calculatedAt,
        };
    }
}
