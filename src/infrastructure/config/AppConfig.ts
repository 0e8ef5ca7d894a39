/**
 * AppConfig - service configuration read from environment variables.
 *
 * Environment variables:
 * - PORT: HTTP port (default: 3000)
 * - LOG_LEVEL: debug | info | warn | error (default: info)
 * - STREAK_TIME_ZONE: UTC, a ±HH:MM offset or an IANA zone (default: UTC)
 * - STREAK_WEEK_START: monday | sunday (default: monday)
 * - STREAK_MIN_COUNT: minimum daily total for an active day (default: 1)
 * - STREAK_CURRENT_POLICY: latest | grace | strict (default: latest)
 * - STREAK_MILESTONES: comma-separated streak lengths (default: 7,30,100,365)
 * - REQUEST_TIMEOUT_MS: timeout for reads (default: 3000)
 * - MUTATION_TIMEOUT_MS: timeout for writes (default: 10000)
 * - MAX_BODY_BYTES: largest accepted request body (default: 1048576)
 */

import { LogLevel, parseLogLevel } from '../observability/Logger.js';
import { WeekStart, parseWeekStart } from '../../domain/enums/WeekStart.js';
import { CurrentStreakPolicy, parseCurrentStreakPolicy } from '../../domain/enums/CurrentStreakPolicy.js';
import { ReferenceZone } from '../../domain/value-objects/ReferenceZone.js';

export interface AppConfig {
    port: number;
    logLevel: LogLevel;
    timeZone: string;
    weekStart: WeekStart;
    minCount: number;
    currentStreakPolicy: CurrentStreakPolicy;
    milestones: number[];
    readTimeoutMs: number;
    mutationTimeoutMs: number;
    maxBodyBytes: number;
}

export const DEFAULT_APP_CONFIG: AppConfig = {
    port: 3000,
    logLevel: 'info',
    timeZone: 'UTC',
    weekStart: WeekStart.Monday,
    minCount: 1,
    currentStreakPolicy: CurrentStreakPolicy.Latest,
    milestones: [7, 30, 100, 365],
    readTimeoutMs: 3000,
    mutationTimeoutMs: 10000,
    maxBodyBytes: 1_048_576,
};

export class ConfigError extends Error {
    constructor(readonly problems: string[]) {
        super(`Invalid configuration: ${problems.join('; ')}`);
        this.name = 'ConfigError';
        Object.setPrototypeOf(this, ConfigError.prototype);
    }
}

type Env = Record<string, string | undefined>;

/**
 * Read the configuration, reporting every invalid variable at once.
 */
export function loadConfig(env: Env = process.env): AppConfig {
    const problems: string[] = [];
    const config: AppConfig = { ...DEFAULT_APP_CONFIG, milestones: [...DEFAULT_APP_CONFIG.milestones] };

    const integer = (name: string, fallback: number, min: number, max = Number.MAX_SAFE_INTEGER): number => {
        const raw = env[name]?.trim();
        if (raw === undefined || raw === '') {
            return fallback;
        }
        const value = Number(raw);
        if (!Number.isInteger(value) || value < min || value > max) {
            problems.push(`${name} must be an integer between ${min} and ${max}, got "${raw}"`);
            return fallback;
        }
        return value;
    };

    config.port = integer('PORT', config.port, 0, 65535);
    config.minCount = integer('STREAK_MIN_COUNT', config.minCount, 0);
    config.readTimeoutMs = integer('REQUEST_TIMEOUT_MS', config.readTimeoutMs, 1);
    config.mutationTimeoutMs = integer('MUTATION_TIMEOUT_MS', config.mutationTimeoutMs, 1);
    config.maxBodyBytes = integer('MAX_BODY_BYTES', config.maxBodyBytes, 1);

    if (env.LOG_LEVEL) {
        const level = parseLogLevel(env.LOG_LEVEL);
        if (level) {
            config.logLevel = level;
        } else {
            problems.push(`LOG_LEVEL must be one of debug, info, warn, error, got "${env.LOG_LEVEL}"`);
        }
    }

    if (env.STREAK_WEEK_START) {
        const weekStart = parseWeekStart(env.STREAK_WEEK_START);
        if (weekStart) {
            config.weekStart = weekStart;
        } else {
            problems.push(`STREAK_WEEK_START must be monday or sunday, got "${env.STREAK_WEEK_START}"`);
        }
    }

    if (env.STREAK_CURRENT_POLICY) {
        const policy = parseCurrentStreakPolicy(env.STREAK_CURRENT_POLICY);
        if (policy) {
            config.currentStreakPolicy = policy;
        } else {
            problems.push(`STREAK_CURRENT_POLICY must be latest, grace or strict, got "${env.STREAK_CURRENT_POLICY}"`);
        }
    }

    if (env.STREAK_TIME_ZONE) {
        try {
            config.timeZone = ReferenceZone.of(env.STREAK_TIME_ZONE).name;
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            problems.push(`STREAK_TIME_ZONE is not usable: ${reason}`);
        }
    }

    if (env.STREAK_MILESTONES !== undefined) {
        const parts = env.STREAK_MILESTONES.split(',').map(part => part.trim()).filter(part => part !== '');
        const milestones = parts.map(Number);
        if (milestones.some(m => !Number.isInteger(m) || m < 1)) {
            problems.push(`STREAK_MILESTONES must be positive integers, got "${env.STREAK_MILESTONES}"`);
        } else {
            config.milestones = Array.from(new Set(milestones)).sort((a, b) => a - b);
        }
    }

    if (problems.length > 0) {
        throw new ConfigError(problems);
    }
    return config;
}
