import { IActivityRepository } from '../../ports/IActivityRepository.js';
import { IObservabilityContext, MetricNames } from '../../ports/IObservabilityContext.js';
import { IClearSubjectActivityUseCase } from '../LogActivity.js';
import { parseSubjectId } from '../../../domain/value-objects/SubjectId.js';

export class ClearSubjectActivity implements IClearSubjectActivityUseCase {
    constructor(
        private activityRepository: IActivityRepository,
        private observability?: IObservabilityContext
    ) { }

    async execute(subjectId: string): Promise<number> {
        const id = parseSubjectId(subjectId);
        const removed = await this.activityRepository.deleteBySubject(id);
        if (this.observability) {
            const subjects = await this.activityRepository.listSubjects();
            this.observability.metrics.setGauge(MetricNames.TRACKED_SUBJECTS, subjects.length);
            this.observability.logger.info('Subject activity cleared', { subjectId: id, removed });
        }
        return removed;
    }
}
