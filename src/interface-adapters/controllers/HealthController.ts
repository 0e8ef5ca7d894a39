import { InMemoryEventDispatcher } from '../../infrastructure/messaging/InMemoryEventDispatcher.js';
import { IActivityRepository } from '../../application/ports/IActivityRepository.js';

export type HealthState = 'ok' | 'warning' | 'error';

export interface HealthStatus {
    status: HealthState;
    checks: {
        store: string;
        dispatcher: string;
    };
    timestamp: string;
}

export interface HealthResult {
    statusCode: number;
    body: HealthStatus;
}

export class HealthController {
    constructor(
        private eventDispatcher: InMemoryEventDispatcher,
        private activityRepository: IActivityRepository
    ) { }

    async handle(): Promise<HealthResult> {
        const healthStatus: HealthStatus = {
            status: 'ok',
            checks: {
                store: 'unknown',
                dispatcher: 'unknown',
            },
            timestamp: new Date().toISOString(),
        };

        // 1. Check the activity store
        try {
            const entries = await this.activityRepository.count();
            healthStatus.checks.store = `ok (${entries} entries)`;
        } catch (error) {
            healthStatus.status = 'error';
            healthStatus.checks.store = `failed: ${error instanceof Error ? error.message : String(error)}`;
        }

        // 2. Check the dispatcher
        const subscriberCount = this.eventDispatcher.getSubscriberCount();
        if (subscriberCount > 0) {
            healthStatus.checks.dispatcher = `active (${subscriberCount} subscribers)`;
        } else {
            if (healthStatus.status === 'ok') healthStatus.status = 'warning';
            healthStatus.checks.dispatcher = 'no-subscribers';
        }

        const statusCode = healthStatus.status === 'error' ? 503 : 200;
        return {
            statusCode,
            body: healthStatus,
        };
    }
}
