import { IActivityRepository } from '../../ports/IActivityRepository.js';
import { IObservabilityContext, MetricNames } from '../../ports/IObservabilityContext.js';
import { IGetSubjectCalendarUseCase, SubjectCalendarRequest } from '../ProgressTracking.js';
import { ActivityLogUtils } from '../../../domain/entities/ActivityLog.js';
import { ContributionCalendar, ContributionCalendarBuilder } from '../../../domain/services/ContributionCalendar.js';
import { parseSubjectId } from '../../../domain/value-objects/SubjectId.js';

export class GetSubjectCalendar implements IGetSubjectCalendarUseCase {
    constructor(
        private activityRepository: IActivityRepository,
        private calendarBuilder: ContributionCalendarBuilder,
        private observability?: IObservabilityContext
    ) { }

    async execute(subjectId: string, request: SubjectCalendarRequest = {}): Promise<ContributionCalendar> {
        const logs = await this.activityRepository.findBySubject(parseSubjectId(subjectId));
        const calendar = this.calendarBuilder.build(ActivityLogUtils.toEntries(logs), {
            from: request.from,
            to: request.to,
        });
        this.observability?.metrics.incrementCounter(MetricNames.CALENDARS_BUILT_TOTAL, 1, { source: 'subject' });
        return calendar;
    }
}
