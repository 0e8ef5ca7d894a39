/**
 * StreakController - stateless streak and calendar calculations.
 */

import { IncomingMessage, ServerResponse } from 'http';
import { BodyParser } from '../middleware/BodyParser.js';
import { readActivityInput, readCalculationOptions, readDateInput } from './ActivityPayload.js';
import { StreakCalculator } from '../../domain/services/StreakCalculator.js';
import { ContributionCalendarBuilder } from '../../domain/services/ContributionCalendar.js';
import { IMetricsCollector } from '../../infrastructure/observability/MetricsCollector.js';
import { RequestContext } from '../../infrastructure/observability/RequestContext.js';
import { MetricNames } from '../../application/ports/IObservabilityContext.js';
import { sendErrorResponse, sendSuccessResponse } from '../../shared/errors/ErrorNormalizer.js';
import { isRecord, validateOrThrow } from '../../shared/validation/RequestValidator.js';
import { BuildCalendarSchema, CalculateStreaksSchema } from '../../shared/validation/schemas/StreakSchemas.js';

export class StreakController {
    constructor(
        private readonly calculator: StreakCalculator,
        private readonly calendarBuilder: ContributionCalendarBuilder,
        private readonly bodyParser: BodyParser,
        private readonly metrics: IMetricsCollector
    ) { }

    /**
     * POST /api/streaks/calculate
     * Body: { dates, today?, timeZone?, weekStart?, minCount?, currentStreakPolicy?, range?, includeWeeks? }
     */
    async calculate(req: IncomingMessage, res: ServerResponse): Promise<void> {
        const correlationId = RequestContext.getCorrelationId();

        try {
            const body = await this.bodyParser.read(req);
            validateOrThrow(body, CalculateStreaksSchema, { rejectUnknown: true });

            const range = isRecord(body.range)
                ? { from: readDateInput(body.range.from), to: readDateInput(body.range.to) }
                : undefined;

            const stopTimer = this.metrics.startTimer(MetricNames.STREAK_CALCULATION_DURATION_MS);
            const report = this.calculator.calculate(readActivityInput(body.dates), {
                ...readCalculationOptions(body),
                range,
                includeWeeks: typeof body.includeWeeks === 'boolean' ? body.includeWeeks : undefined,
            });
            stopTimer();
            this.metrics.incrementCounter(MetricNames.STREAK_CALCULATIONS_TOTAL, 1, { source: 'request' });

            sendSuccessResponse(res, report, correlationId);
        } catch (error) {
            sendErrorResponse(res, error, correlationId);
        }
    }

    /**
     * POST /api/calendar/build
     * Body: { dates, from?, to?, today?, timeZone?, weekStart?, minCount? }
     */
    async buildCalendar(req: IncomingMessage, res: ServerResponse): Promise<void> {
        const correlationId = RequestContext.getCorrelationId();

        try {
            const body = await this.bodyParser.read(req);
            validateOrThrow(body, BuildCalendarSchema, { rejectUnknown: true });

            const calendar = this.calendarBuilder.build(readActivityInput(body.dates), {
                ...readCalculationOptions(body),
                from: readDateInput(body.from),
                to: readDateInput(body.to),
            });
            this.metrics.incrementCounter(MetricNames.CALENDARS_BUILT_TOTAL, 1, { source: 'request' });

            sendSuccessResponse(res, calendar, correlationId);
        } catch (error) {
            sendErrorResponse(res, error, correlationId);
        }
    }
}
