import { ConfigError } from './errors';

export interface EngineConfig {
    port: number;
    databaseUrl: string | null;
    redisUrl: string | null;
    queueTimeoutMs: number;
    visibilityTimeoutMs: number;
    maxRetries: number;
    retryBackoffMs: number;
    maxWorkers: number;
    minWorkers: number;
    tasksPerWorker: number;
    autoscaleIntervalMs: number;
    heartbeatIntervalMs: number;
    heartbeatThresholdMs: number;
    schedulerPollMs: number;
    leaseTtlSeconds: number;
    workerModels: string[];
    handlerModules: string[];
    handlerName: string;
    modelPricesFile: string | null;
    goal: string | null;
}

function int(env: NodeJS.ProcessEnv, name: string, fallback: number, min = 0): number {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') return fallback;

    const value = Number(raw);
    if (!Number.isInteger(value)) {
        throw new ConfigError(`${name} must be an integer, got "${raw}"`);
    }
    if (value < min) {
        throw new ConfigError(`${name} must be >= ${min}, got ${value}`);
    }
    return value;
}

function list(raw: string | undefined): string[] {
    return (raw ?? '').split(',').map(s => s.trim()).filter(Boolean);
}

function optional(raw: string | undefined): string | null {
    return raw && raw.trim() !== '' ? raw.trim() : null;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
    const config: EngineConfig = {
        port: int(env, 'PORT', 50051, 1),
        databaseUrl: optional(env.DATABASE_URL),
        redisUrl: optional(env.REDIS_URL),
        queueTimeoutMs: int(env, 'QUEUE_TIMEOUT_MS', 5000, 1),
        visibilityTimeoutMs: int(env, 'VISIBILITY_TIMEOUT_MS', 300_000, 1),
        maxRetries: int(env, 'TASK_MAX_RETRIES', 3, 1),
        retryBackoffMs: int(env, 'RETRY_BACKOFF_MS', 1000),
        maxWorkers: int(env, 'MAX_WORKERS', 3, 1),
        minWorkers: int(env, 'MIN_WORKERS', 1),
        tasksPerWorker: int(env, 'TASKS_PER_WORKER', 2, 1),
        autoscaleIntervalMs: int(env, 'AUTOSCALE_INTERVAL_MS', 10_000, 1),
        heartbeatIntervalMs: int(env, 'HEARTBEAT_INTERVAL_MS', 5000, 1),
        heartbeatThresholdMs: int(env, 'HEARTBEAT_THRESHOLD_MS', 30_000, 1),
        schedulerPollMs: int(env, 'SCHEDULER_POLL_MS', 1000, 1),
        leaseTtlSeconds: int(env, 'SCHEDULER_LEASE_TTL_SECONDS', 30, 2),
        workerModels: list(env.WORKER_MODELS),
        handlerModules: list(env.SWARMLINE_HANDLERS),
        handlerName: optional(env.SWARMLINE_HANDLER) ?? 'echo',
        modelPricesFile: optional(env.MODEL_PRICES_FILE),
        goal: optional(env.SWARMLINE_GOAL),
    };

    if (config.workerModels.length === 0) {
        config.workerModels = ['default'];
    }
    if (config.minWorkers > config.maxWorkers) {
        throw new ConfigError(`MIN_WORKERS (${config.minWorkers}) exceeds MAX_WORKERS (${config.maxWorkers})`);
    }
    if (config.heartbeatThresholdMs <= config.heartbeatIntervalMs) {
        throw new ConfigError(
            `HEARTBEAT_THRESHOLD_MS (${config.heartbeatThresholdMs}) must exceed HEARTBEAT_INTERVAL_MS (${config.heartbeatIntervalMs})`,
        );
    }

    return config;
}
