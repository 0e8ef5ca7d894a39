import { IDomainEvent } from './IDomainEvent.js';

export class StreakMilestoneReached implements IDomainEvent {
    readonly eventName = 'StreakMilestoneReached';
    public dateTimeOccurred: Date;

    constructor(
        public subjectId: string,
        public milestone: number,
        public streakStartDate: string,
        public reachedOn: string
    ) {
        this.dateTimeOccurred = new Date();
    }

    getAggregateId(): string {
        return this.subjectId;
    }
}
