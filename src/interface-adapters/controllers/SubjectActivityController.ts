/**
 * SubjectActivityController - recorded activity and read models per subject.
 */

import { IncomingMessage, ServerResponse } from 'http';
import { RouteParams } from '../routing/Router.js';
import { BodyParser } from '../middleware/BodyParser.js';
import { readDateInput } from './ActivityPayload.js';
import {
    IClearSubjectActivityUseCase,
    IListSubjectActivityUseCase,
    IRecordActivityUseCase,
} from '../../application/use-cases/LogActivity.js';
import { IGetSubjectCalendarUseCase, IGetSubjectStreakUseCase } from '../../application/use-cases/ProgressTracking.js';
import { RequestContext } from '../../infrastructure/observability/RequestContext.js';
import { sendErrorResponse, sendJson, sendSuccessResponse } from '../../shared/errors/ErrorNormalizer.js';
import { validateOrThrow, validatePaginationOrThrow } from '../../shared/validation/RequestValidator.js';
import { CalendarQuerySchema, RecordActivitySchema } from '../../shared/validation/schemas/StreakSchemas.js';

export interface SubjectActivityUseCases {
    recordActivity: IRecordActivityUseCase;
    listActivity: IListSubjectActivityUseCase;
    clearActivity: IClearSubjectActivityUseCase;
    getStreak: IGetSubjectStreakUseCase;
    getCalendar: IGetSubjectCalendarUseCase;
}

export class SubjectActivityController {
    constructor(
        private readonly useCases: SubjectActivityUseCases,
        private readonly bodyParser: BodyParser
    ) { }

    /**
     * POST /api/subjects/:subjectId/activity
     * Body: { date?, count?, note? }
     */
    async record(req: IncomingMessage, res: ServerResponse, { params }: RouteParams): Promise<void> {
        const correlationId = RequestContext.getCorrelationId();

        try {
            const body = await this.bodyParser.read(req);
            validateOrThrow(body, RecordActivitySchema, { rejectUnknown: true });

            const result = await this.useCases.recordActivity.execute({
                subjectId: params.subjectId,
                date: readDateInput(body.date),
                count: typeof body.count === 'number' ? body.count : undefined,
                note: typeof body.note === 'string' ? body.note : undefined,
            });

            sendSuccessResponse(res, result, correlationId, 201);
        } catch (error) {
            sendErrorResponse(res, error, correlationId);
        }
    }

    /**
     * GET /api/subjects/:subjectId/activity?page=&pageSize=
     */
    async list(req: IncomingMessage, res: ServerResponse, { params, query }: RouteParams): Promise<void> {
        const correlationId = RequestContext.getCorrelationId();

        try {
            const pagination = validatePaginationOrThrow(query);
            const result = await this.useCases.listActivity.execute(params.subjectId, pagination);

            sendJson(res, 200, { ...result, correlationId });
        } catch (error) {
            sendErrorResponse(res, error, correlationId);
        }
    }

    /**
     * DELETE /api/subjects/:subjectId/activity
     */
    async clear(req: IncomingMessage, res: ServerResponse, { params }: RouteParams): Promise<void> {
        const correlationId = RequestContext.getCorrelationId();

        try {
            const removed = await this.useCases.clearActivity.execute(params.subjectId);
            sendSuccessResponse(res, { subjectId: params.subjectId, removed }, correlationId);
        } catch (error) {
            sendErrorResponse(res, error, correlationId);
        }
    }

    /**
     * GET /api/subjects/:subjectId/streak
     */
    async streak(req: IncomingMessage, res: ServerResponse, { params }: RouteParams): Promise<void> {
        const correlationId = RequestContext.getCorrelationId();

        try {
            const result = await this.useCases.getStreak.execute(params.subjectId);
            sendSuccessResponse(res, result, correlationId);
        } catch (error) {
            sendErrorResponse(res, error, correlationId);
        }
    }

    /**
     * GET /api/subjects/:subjectId/calendar?from=&to=
     */
    async calendar(req: IncomingMessage, res: ServerResponse, { params, query }: RouteParams): Promise<void> {
        const correlationId = RequestContext.getCorrelationId();

        try {
            validateOrThrow(query, CalendarQuerySchema);
            const calendar = await this.useCases.getCalendar.execute(params.subjectId, {
                from: query.from,
                to: query.to,
            });
            sendSuccessResponse(res, calendar, correlationId);
        } catch (error) {
            sendErrorResponse(res, error, correlationId);
        }
    }
}
