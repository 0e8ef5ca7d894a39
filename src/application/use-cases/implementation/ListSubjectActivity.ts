import { IActivityRepository } from '../../ports/IActivityRepository.js';
import { IListSubjectActivityUseCase } from '../LogActivity.js';
import { IActivityLog } from '../../../domain/entities/ActivityLog.js';
import { parseSubjectId } from '../../../domain/value-objects/SubjectId.js';
import { PaginatedResponse, PaginationQuery, paginate } from '../../../shared/types/Pagination.js';

export class ListSubjectActivity implements IListSubjectActivityUseCase {
    constructor(private activityRepository: IActivityRepository) { }

    async execute(subjectId: string, pagination: PaginationQuery = {}): Promise<PaginatedResponse<IActivityLog>> {
        const logs = await this.activityRepository.findBySubject(parseSubjectId(subjectId));
        return paginate(logs, pagination);
    }
}
