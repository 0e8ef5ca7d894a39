export interface IDomainEvent {
    /** Name handlers subscribe under */
    readonly eventName: string;
    dateTimeOccurred: Date;
    getAggregateId(): string;
}
