import { IActivityRepository } from '../../ports/IActivityRepository.js';
import { IEventDispatcher } from '../../ports/IEventDispatcher.js';
import { IObservabilityContext, MetricNames } from '../../ports/IObservabilityContext.js';
import { IRecordActivityUseCase, RecordActivityRequest, RecordActivityResult } from '../LogActivity.js';
import { IActivityLog, ActivityLogUtils, MAX_NOTE_LENGTH } from '../../../domain/entities/ActivityLog.js';
import { StreakUtils } from '../../../domain/entities/Streak.js';
import { ActivityRecorded } from '../../../domain/events/ActivityRecorded.js';
import { StreakMilestoneReached } from '../../../domain/events/StreakMilestoneReached.js';
import { InvalidInputError } from '../../../domain/errors/InvalidInputError.js';
import { StreakCalculator } from '../../../domain/services/StreakCalculator.js';
import { validateCount } from '../../../domain/value-objects/ActivityDate.js';
import { parseSubjectId } from '../../../domain/value-objects/SubjectId.js';
import { IdGenerator } from '../../../shared/utils/IdGenerator.js';

export const DEFAULT_STREAK_MILESTONES: readonly number[] = [7, 30, 100, 365];

export class RecordActivity implements IRecordActivityUseCase {
    constructor(
        private activityRepository: IActivityRepository,
        private eventDispatcher: IEventDispatcher,
        private calculator: StreakCalculator,
        private milestones: readonly number[] = DEFAULT_STREAK_MILESTONES,
        private observability?: IObservabilityContext
    ) { }

    async execute(request: RecordActivityRequest): Promise<RecordActivityResult> {
        // 1. Validate input
        const subjectId = parseSubjectId(request.subjectId);
        const count = request.count ?? 1;
        const countError = validateCount(count);
        if (countError) {
            throw new InvalidInputError(`Invalid count: ${countError}`, 'count', count);
        }
        if (request.note !== undefined && request.note.length > MAX_NOTE_LENGTH) {
            throw new InvalidInputError(`Note must be at most ${MAX_NOTE_LENGTH} characters`, 'note', request.note);
        }
        const date = this.calculator.dayOf(request.date);

        // 2. Streak before this activity
        const history = await this.activityRepository.findBySubject(subjectId);
        const before = this.calculator.calculate(ActivityLogUtils.toEntries(history), { includeWeeks: false });

        // 3. Persist
        const activity: IActivityLog = {
            id: IdGenerator.generate(),
            subjectId,
            date,
            count,
            note: request.note,
            recordedAt: new Date(),
        };
        await this.activityRepository.save(activity);

        // 4. Streak after
        const after = this.calculator.calculate(
            ActivityLogUtils.toEntries([...history, activity]),
            { includeWeeks: false }
        );
        const streak = StreakUtils.fromReport(subjectId, after, activity.recordedAt);

        if (this.observability) {
            this.observability.metrics.incrementCounter(MetricNames.ACTIVITIES_RECORDED_TOTAL);
            const subjects = await this.activityRepository.listSubjects();
            this.observability.metrics.setGauge(MetricNames.TRACKED_SUBJECTS, subjects.length);
        }
        this.observability?.logger.info('Activity recorded', {
            subjectId,
            date,
            count,
            currentStreak: streak.currentStreakCount,
        });

        // 5. Emit events
        await this.eventDispatcher.dispatch(new ActivityRecorded(activity));

        const milestonesReached = this.milestones.filter(
            milestone => before.currentStreak < milestone && after.currentStreak >= milestone
        );
        const run = after.currentRun;
        if (run) {
            for (const milestone of milestonesReached) {
                await this.eventDispatcher.dispatch(
                    new StreakMilestoneReached(subjectId, milestone, run.start, run.end)
                );
            }
        }

        return { activity, streak, milestonesReached };
    }
}
