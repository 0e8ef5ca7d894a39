import { AppConfig, DEFAULT_APP_CONFIG } from './infrastructure/config/AppConfig.js';
import { InMemoryActivityRepository } from './infrastructure/persistence/in-memory/InMemoryActivityRepository.js';
import { InMemoryEventDispatcher } from './infrastructure/messaging/InMemoryEventDispatcher.js';
import { IActivityRepository } from './application/ports/IActivityRepository.js';
import { IObservabilityContext } from './application/ports/IObservabilityContext.js';
import { StreakMilestoneHandler } from './application/handlers/StreakMilestoneHandler.js';
import { RecordActivity } from './application/use-cases/implementation/RecordActivity.js';
import { ListSubjectActivity } from './application/use-cases/implementation/ListSubjectActivity.js';
import { ClearSubjectActivity } from './application/use-cases/implementation/ClearSubjectActivity.js';
import { GetSubjectStreak } from './application/use-cases/implementation/GetSubjectStreak.js';
import { GetSubjectCalendar } from './application/use-cases/implementation/GetSubjectCalendar.js';
import { CalculationDefaults } from './domain/services/CalculationOptions.js';
import { StreakCalculator } from './domain/services/StreakCalculator.js';
import { ContributionCalendarBuilder } from './domain/services/ContributionCalendar.js';
import { HealthController } from './interface-adapters/controllers/HealthController.js';
import { MetricsController } from './interface-adapters/controllers/MetricsController.js';
import { StreakController } from './interface-adapters/controllers/StreakController.js';
import { SubjectActivityController } from './interface-adapters/controllers/SubjectActivityController.js';
import { BodyParser } from './interface-adapters/middleware/BodyParser.js';
import { TimeoutMiddleware } from './interface-adapters/middleware/TimeoutMiddleware.js';
import { ApiRouter } from './interface-adapters/routing/ApiRouter.js';
import { ConsoleLogger, ILogger } from './infrastructure/observability/Logger.js';
import { InMemoryMetricsCollector, IMetricsCollector } from './infrastructure/observability/MetricsCollector.js';
import { AppMetrics } from './infrastructure/observability/AppMetrics.js';

export interface AppContainerOptions {
    /** Source of "today"; the system clock by default */
    clock?: () => Date;
    logger?: ILogger;
    activityRepository?: IActivityRepository;
}

export class AppContainer {
    // Observability
    public logger: ILogger;
    public metrics: IMetricsCollector;
    public observability: IObservabilityContext;

    // Infrastructure
    public eventDispatcher: InMemoryEventDispatcher;
    public activityRepository: IActivityRepository;

    // Domain services
    public calculator: StreakCalculator;
    public calendarBuilder: ContributionCalendarBuilder;

    // Use cases
    public recordActivity: RecordActivity;
    public listSubjectActivity: ListSubjectActivity;
    public clearSubjectActivity: ClearSubjectActivity;
    public getSubjectStreak: GetSubjectStreak;
    public getSubjectCalendar: GetSubjectCalendar;

    // Interface adapters
    public healthController: HealthController;
    public metricsController: MetricsController;
    public streakController: StreakController;
    public subjectActivityController: SubjectActivityController;
    public apiRouter: ApiRouter;

    constructor(public readonly config: AppConfig = DEFAULT_APP_CONFIG, options: AppContainerOptions = {}) {
        // 1. Observability
        this.logger = options.logger ?? new ConsoleLogger({ context: { service: 'streakline' }, level: config.logLevel });
        this.metrics = new InMemoryMetricsCollector();
        this.observability = {
            logger: this.logger,
            metrics: this.metrics,
        };

        // 2. Infrastructure
        this.eventDispatcher = new InMemoryEventDispatcher(this.observability);
        this.activityRepository = options.activityRepository ?? new InMemoryActivityRepository();

        // 3. Domain services share the configured defaults
        const defaults: CalculationDefaults = {
            weekStart: config.weekStart,
            minCount: config.minCount,
            timeZone: config.timeZone,
            currentStreakPolicy: config.currentStreakPolicy,
            clock: options.clock ?? (() => new Date()),
        };
        this.calculator = new StreakCalculator(defaults);
        this.calendarBuilder = new ContributionCalendarBuilder(defaults);

        // 4. Handlers
        this.eventDispatcher.subscribe('StreakMilestoneReached', new StreakMilestoneHandler(this.observability));

        // 5. Use cases
        this.recordActivity = new RecordActivity(
            this.activityRepository,
            this.eventDispatcher,
            this.calculator,
            config.milestones,
            this.observability
        );
        this.listSubjectActivity = new ListSubjectActivity(this.activityRepository);
        this.clearSubjectActivity = new ClearSubjectActivity(this.activityRepository, this.observability);
        this.getSubjectStreak = new GetSubjectStreak(this.activityRepository, this.calculator, this.observability);
        this.getSubjectCalendar = new GetSubjectCalendar(this.activityRepository, this.calendarBuilder, this.observability);

        // 6. Interface adapters
        const bodyParser = new BodyParser(config.maxBodyBytes);
        this.healthController = new HealthController(this.eventDispatcher, this.activityRepository);
        this.metricsController = new MetricsController(this.metrics);
        this.streakController = new StreakController(this.calculator, this.calendarBuilder, bodyParser, this.metrics);
        this.subjectActivityController = new SubjectActivityController(
            {
                recordActivity: this.recordActivity,
                listActivity: this.listSubjectActivity,
                clearActivity: this.clearSubjectActivity,
                getStreak: this.getSubjectStreak,
                getCalendar: this.getSubjectCalendar,
            },
            bodyParser
        );
        this.apiRouter = new ApiRouter({
            streakController: this.streakController,
            subjectActivityController: this.subjectActivityController,
            healthController: this.healthController,
            metricsController: this.metricsController,
            timeoutMiddleware: new TimeoutMiddleware(
                { readTimeoutMs: config.readTimeoutMs, mutationTimeoutMs: config.mutationTimeoutMs },
                this.logger
            ),
            appMetrics: new AppMetrics(this.metrics),
            logger: this.logger,
        });
    }
}
