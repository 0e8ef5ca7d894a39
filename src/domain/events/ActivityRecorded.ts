import { IDomainEvent } from './IDomainEvent.js';
import { IActivityLog } from '../entities/ActivityLog.js';

export class ActivityRecorded implements IDomainEvent {
    readonly eventName = 'ActivityRecorded';
    public dateTimeOccurred: Date;
    public activity: IActivityLog;

    constructor(activity: IActivityLog) {
        this.dateTimeOccurred = new Date();
        this.activity = activity;
    }

    getAggregateId(): string {
        return this.activity.subjectId;
    }
}
