import { ActivityDateRange, IActivityRepository } from '../../../application/ports/IActivityRepository.js';
import { IActivityLog } from '../../../domain/entities/ActivityLog.js';

export class InMemoryActivityRepository implements IActivityRepository {
    private activities: Map<string, IActivityLog[]> = new Map();

    async save(activity: IActivityLog): Promise<void> {
        const logs = this.activities.get(activity.subjectId) ?? [];
        logs.push({ ...activity });
        this.activities.set(activity.subjectId, logs);
    }

    async findBySubject(subjectId: string, range: ActivityDateRange = {}): Promise<IActivityLog[]> {
        const { from, to } = range;
        // YYYY-MM-DD compares correctly as a string
        return (this.activities.get(subjectId) ?? [])
            .filter(log => (from === undefined || log.date >= from) && (to === undefined || log.date <= to))
            .map(log => ({ ...log }))
            .sort((a, b) => a.date.localeCompare(b.date) || a.recordedAt.getTime() - b.recordedAt.getTime());
    }

    async listSubjects(): Promise<string[]> {
        return Array.from(this.activities.keys()).sort();
    }

    async deleteBySubject(subjectId: string): Promise<number> {
        const removed = this.activities.get(subjectId)?.length ?? 0;
        this.activities.delete(subjectId);
        return removed;
    }

    async count(): Promise<number> {
        let total = 0;
        this.activities.forEach(logs => total += logs.length);
        return total;
    }
}
