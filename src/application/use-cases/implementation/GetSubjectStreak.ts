import { IActivityRepository } from '../../ports/IActivityRepository.js';
import { IObservabilityContext, MetricNames } from '../../ports/IObservabilityContext.js';
import { IGetSubjectStreakUseCase, SubjectStreak } from '../ProgressTracking.js';
import { ActivityLogUtils } from '../../../domain/entities/ActivityLog.js';
import { StreakUtils } from '../../../domain/entities/Streak.js';
import { StreakCalculator } from '../../../domain/services/StreakCalculator.js';
import { parseSubjectId } from '../../../domain/value-objects/SubjectId.js';

export class GetSubjectStreak implements IGetSubjectStreakUseCase {
    constructor(
        private activityRepository: IActivityRepository,
        private calculator: StreakCalculator,
        private observability?: IObservabilityContext
    ) { }

    async execute(subjectId: string): Promise<SubjectStreak> {
        const id = parseSubjectId(subjectId);
        const logs = await this.activityRepository.findBySubject(id);

        const stopTimer = this.observability?.metrics.startTimer(MetricNames.STREAK_CALCULATION_DURATION_MS);
        const report = this.calculator.calculate(ActivityLogUtils.toEntries(logs));
        stopTimer?.();
        this.observability?.metrics.incrementCounter(MetricNames.STREAK_CALCULATIONS_TOTAL, 1, { source: 'subject' });

        return {
            streak: StreakUtils.fromReport(id, report),
            weeks: report.weeks,
        };
    }
}
