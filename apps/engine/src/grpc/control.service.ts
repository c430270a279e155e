import * as grpc from '@grpc/grpc-js';
import { ServerUnaryCall, sendUnaryData, ServiceError } from '@grpc/grpc-js';
import { CostTotals, WorkerRecord } from '../db/worker.entity';
import { TaskDescription } from '../decomposer/decomposer';
import {
    InvalidTaskDescriptionError,
    ScaleLimitExceededError,
    SwarmlineError,
    WorkerNotFoundError,
} from '../errors';
import { validateDescription } from '../services/ingestion';
import { Scheduler, schedulerState } from '../services/scheduler';
import { WorkerPoolManager } from '../services/pool-manager';

const TAG = '[grpc]';

interface SubmitGoalRequest {
    goal: string;
}

interface TaskDescriptionMessage {
    key: string;
    title: string;
    instruction: string;
    target_paths: string[];
    branch: string;
    priority: string;
    depends_on: string[];
}

interface SubmitTasksRequest {
    tasks: TaskDescriptionMessage[];
}

interface SubmitResponse {
    submitted: number;
    keys: string[];
}

type SpawnWorkerRequest = Record<string, never>;

interface WorkerInfo {
    id: string;
    model: string;
    status: string;
    current_task_id: string;
    last_heartbeat: string;
    tasks_completed: number;
    tasks_failed: number;
    busy_ms: number;
    started_at: string;
    input_tokens: number;
    output_tokens: number;
    cost: number;
}

interface StopWorkerRequest {
    worker_id: string;
}

interface StopWorkerResponse {
    stopped: boolean;
}

type GetStatusRequest = Record<string, never>;

interface TaskInfo {
    id: string;
    title: string;
    status: string;
    priority: string;
    branch: string;
    dependencies: string[];
    attempts: number;
    worker_id: string;
    error_code: string;
    error_message: string;
}

export interface StatusResponse {
    scheduler_state: string;
    reason: string;
    counts: Record<string, number>;
    tasks: TaskInfo[];
    workers: WorkerInfo[];
    queue_depth: number;
    ceiling: number;
    floor: number;
    rejections: { key: string; title: string; code: string; message: string }[];
    cost: CostTotals;
}

interface HealthCheckRequest {
    service: string;
}

interface HealthCheckResponse {
    status: 'SERVING' | 'NOT_SERVING';
}

/** The part of a unary call the handlers read. */
export type UnaryCall<Req> = Pick<ServerUnaryCall<Req, unknown>, 'request'>;

export type ControlScheduler = Pick<Scheduler, 'submit' | 'submitGoal' | 'status'>;
export type ControlPool = Pick<WorkerPoolManager, 'spawn' | 'stop' | 'status'>;

export function toGrpcError(err: unknown): Partial<ServiceError> {
    const message = err instanceof Error ? err.message : 'Unknown error';
    if (err instanceof WorkerNotFoundError) return { code: grpc.status.NOT_FOUND, message };
    if (err instanceof ScaleLimitExceededError) return { code: grpc.status.RESOURCE_EXHAUSTED, message };
    if (err instanceof InvalidTaskDescriptionError) return { code: grpc.status.INVALID_ARGUMENT, message };
    if (err instanceof SwarmlineError) return { code: grpc.status.FAILED_PRECONDITION, message };
    return { code: grpc.status.INTERNAL, message };
}

function workerInfo(record: WorkerRecord): WorkerInfo {
    return {
        id: record.id,
        model: record.model,
        status: record.status,
        current_task_id: record.current_task_id ?? '',
        last_heartbeat: record.last_heartbeat?.toISOString() ?? '',
        tasks_completed: record.usage.tasks_completed,
        tasks_failed: record.usage.tasks_failed,
        busy_ms: record.usage.busy_ms,
        started_at: record.started_at.toISOString(),
        input_tokens: record.usage.input_tokens,
        output_tokens: record.usage.output_tokens,
        cost: record.usage.cost,
    };
}

// proto3 sends "" and [] for unset fields
function fromMessage(msg: TaskDescriptionMessage): unknown {
    return {
        title: msg.title,
        instruction: msg.instruction,
        ...(msg.key ? { key: msg.key } : {}),
        ...(msg.branch ? { branch: msg.branch } : {}),
        ...(msg.priority ? { priority: msg.priority } : {}),
        ...(msg.target_paths?.length ? { target_paths: msg.target_paths } : {}),
        ...(msg.depends_on?.length ? { depends_on: msg.depends_on } : {}),
    };
}

/**
 * gRPC control surface: submissions go to the scheduler's inbox, worker
 * operations to the pool manager. Dependency validation happens on the
 * scheduler's next tick; its rejections show up in GetStatus.
 */
export class ControlServiceImpl {
    constructor(
        private readonly scheduler: ControlScheduler,
        private readonly pool: ControlPool,
    ) { }

    async submitGoal(
        call: UnaryCall<SubmitGoalRequest>,
        callback: sendUnaryData<SubmitResponse>,
    ) {
        try {
            const goal = call.request.goal?.trim() ?? '';
            if (goal === '') {
                throw new InvalidTaskDescriptionError('Goal must be a non-empty string');
            }
            const descriptions = await this.scheduler.submitGoal(goal);
            callback(null, {
                submitted: descriptions.length,
                keys: descriptions.flatMap(d => (d.key ? [d.key] : [])),
            });
        } catch (error) {
            console.error(`${TAG} submitGoal error:`, error);
            callback(toGrpcError(error));
        }
    }

    async submitTasks(
        call: UnaryCall<SubmitTasksRequest>,
        callback: sendUnaryData<SubmitResponse>,
    ) {
        try {
            const tasks = call.request.tasks ?? [];
            if (tasks.length === 0) {
                throw new InvalidTaskDescriptionError('At least one task is required');
            }
            const descriptions: TaskDescription[] = tasks.map(t => validateDescription(fromMessage(t)));
            this.scheduler.submit(descriptions);
            callback(null, {
                submitted: descriptions.length,
                keys: descriptions.flatMap(d => (d.key ? [d.key] : [])),
            });
        } catch (error) {
            console.error(`${TAG} submitTasks error:`, error);
            callback(toGrpcError(error));
        }
    }

    async spawnWorker(
        _call: UnaryCall<SpawnWorkerRequest>,
        callback: sendUnaryData<WorkerInfo>,
    ) {
        try {
            callback(null, workerInfo(await this.pool.spawn()));
        } catch (error) {
            console.error(`${TAG} spawnWorker error:`, error);
            callback(toGrpcError(error));
        }
    }

    async stopWorker(
        call: UnaryCall<StopWorkerRequest>,
        callback: sendUnaryData<StopWorkerResponse>,
    ) {
        try {
            await this.pool.stop(call.request.worker_id);
            callback(null, { stopped: true });
        } catch (error) {
            console.error(`${TAG} stopWorker error:`, error);
            callback(toGrpcError(error));
        }
    }

    async getStatus(
        _call: UnaryCall<GetStatusRequest>,
        callback: sendUnaryData<StatusResponse>,
    ) {
        try {
            const scheduler = this.scheduler.status();
            const pool = await this.pool.status();
            callback(null, {
                scheduler_state: scheduler.state,
                reason: scheduler.reason ?? '',
                counts: { ...scheduler.counts },
                tasks: scheduler.tasks.map(t => ({
                    id: t.id,
                    title: t.title,
                    status: t.status,
                    priority: t.priority,
                    branch: t.branch,
                    dependencies: [...t.dependencies],
                    attempts: t.attempts,
                    worker_id: t.worker_id ?? '',
                    error_code: t.error?.code ?? '',
                    error_message: t.error?.message ?? '',
                })),
                workers: pool.workers.map(workerInfo),
                queue_depth: pool.queue_depth,
                ceiling: pool.ceiling,
                floor: pool.floor,
                rejections: scheduler.rejections.map(r => ({
                    key: r.key ?? '',
                    title: r.title ?? '',
                    code: r.code,
                    message: r.message,
                })),
                cost: { ...pool.cost },
            });
        } catch (error) {
            console.error(`${TAG} getStatus error:`, error);
            callback(toGrpcError(error));
        }
    }

    async check(
        _call: UnaryCall<HealthCheckRequest>,
        callback: sendUnaryData<HealthCheckResponse>,
    ) {
        const state = this.scheduler.status().state;
        callback(null, { status: state === schedulerState.FAILED ? 'NOT_SERVING' : 'SERVING' });
    }
}
