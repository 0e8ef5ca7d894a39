// Domain Layer - Streak calculation
export * from './domain/enums/WeekStart.js';
export * from './domain/enums/CurrentStreakPolicy.js';
export * from './domain/errors/InvalidInputError.js';
export * from './domain/value-objects/DayKey.js';
export * from './domain/value-objects/ReferenceZone.js';
export * from './domain/value-objects/ActivityDate.js';
export * from './domain/value-objects/DateSet.js';
export * from './domain/value-objects/SubjectId.js';
export * from './domain/services/CalculationOptions.js';
export * from './domain/services/StreakCalculator.js';
export * from './domain/services/ContributionCalendar.js';

// Domain Layer - Entities & Events
export * from './domain/entities/ActivityLog.js';
export * from './domain/entities/Streak.js';
export * from './domain/events/IDomainEvent.js';
export * from './domain/events/ActivityRecorded.js';
export * from './domain/events/StreakMilestoneReached.js';

// Application Layer
export * from './application/ports/IActivityRepository.js';
export * from './application/ports/IEventDispatcher.js';
export * from './application/ports/IObservabilityContext.js';
export * from './application/use-cases/LogActivity.js';
export * from './application/use-cases/ProgressTracking.js';
export * from './application/use-cases/implementation/RecordActivity.js';
export * from './application/use-cases/implementation/ListSubjectActivity.js';
export * from './application/use-cases/implementation/ClearSubjectActivity.js';
export * from './application/use-cases/implementation/GetSubjectStreak.js';
export * from './application/use-cases/implementation/GetSubjectCalendar.js';
export * from './application/handlers/StreakMilestoneHandler.js';

// Infrastructure Layer
export * from './infrastructure/config/AppConfig.js';
export * from './infrastructure/messaging/InMemoryEventDispatcher.js';
export * from './infrastructure/persistence/in-memory/InMemoryActivityRepository.js';
export * from './infrastructure/observability/Logger.js';
export * from './infrastructure/observability/MetricsCollector.js';

// Shared
export * from './shared/types/Pagination.js';
export * from './shared/utils/IdGenerator.js';
