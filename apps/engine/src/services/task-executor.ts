import path from 'path';
import os from 'os';
import Piscina from 'piscina';
import { encodeTask, TaskContext, TaskPayload, TokenUsage } from '@swarmline/sdk';

const TAG = '[executor]';

/** What one successful attempt produced. usage is null when the handler reported none. */
export interface TaskResult {
    detail: string;
    usage: TokenUsage | null;
}

/**
 * The "execute task" capability a worker calls once per payload. Resolves
 * with the report detail and token usage; a rejection is a failed attempt.
 */
export interface TaskExecutor {
    execute(payload: TaskPayload, ctx: TaskContext): Promise<TaskResult>;
    destroy(): Promise<void>;
}

/** Message posted to a worker thread. The payload travels encoded. */
export interface ThreadJob {
    handler: string;
    payload: string;
    workerId: string;
    model: string;
}

/** The part of Piscina the executor drives. */
export interface ThreadPool {
    run(job: ThreadJob, options?: { signal?: AbortSignal }): Promise<unknown>;
    destroy(): Promise<void>;
}

export interface ThreadExecutorOptions {
    handler: string;
    handlerModules?: string[];
    maxThreads?: number;
}

function count(value: unknown): number {
    return typeof value === 'number' && Number.isFinite(value) && value > 0 ? Math.floor(value) : 0;
}

/** Narrows whatever the worker thread posted back into a TaskResult. */
export function toTaskResult(raw: unknown): TaskResult {
    if (typeof raw === 'string') return { detail: raw, usage: null };
    if (typeof raw !== 'object' || raw === null) return { detail: '', usage: null };

    const detail = 'detail' in raw && typeof raw.detail === 'string' ? raw.detail : '';
    const usage = 'usage' in raw && typeof raw.usage === 'object' && raw.usage !== null ? raw.usage : null;
    if (!usage) return { detail, usage: null };
    return {
        detail,
        usage: {
            input_tokens: count('input_tokens' in usage ? usage.input_tokens : 0),
            output_tokens: count('output_tokens' in usage ? usage.output_tokens : 0),
        },
    };
}

function createPool(opts: ThreadExecutorOptions): ThreadPool {
    const isTs = path.extname(__filename) === '.ts';
    const workerPath = path.resolve(__dirname, `../workers/task.worker${isTs ? '.ts' : '.js'}`);
    const maxThreads = opts.maxThreads ?? Math.max(2, os.cpus().length - 1);

    const pool = new Piscina({
        filename: workerPath,
        execArgv: isTs ? ['--import', 'tsx'] : [],
        maxThreads,
        minThreads: 1,
        maxQueue: 10000,
        idleTimeout: 30000,
        env: {
            ...process.env,
            SWARMLINE_HANDLERS: (opts.handlerModules ?? []).join(','),
        },
    });

    console.log(`${TAG} Piscina pool: ${maxThreads} threads, maxQueue=10000`);
    return pool;
}

/**
 * Runs the configured task handler in a Piscina worker thread, so a
 * CPU-heavy handler cannot starve the scheduler's event loop.
 */
export class ThreadTaskExecutor implements TaskExecutor {
    private readonly pool: ThreadPool;

    constructor(private readonly opts: ThreadExecutorOptions, pool?: ThreadPool) {
        this.pool = pool ?? createPool(opts);
    }

    async execute(payload: TaskPayload, ctx: TaskContext): Promise<TaskResult> {
        console.log(`${TAG} task ${payload.id} submitted by ${ctx.workerId}`);

        const job: ThreadJob = {
            handler: this.opts.handler,
            payload: encodeTask(payload),
            workerId: ctx.workerId,
            model: ctx.model,
        };

        try {
            const result = await this.pool.run(job, ctx.signal ? { signal: ctx.signal } : undefined);
            return toTaskResult(result);
        } catch (err) {
            console.error(`${TAG} task ${payload.id} failed:`, err);
            throw err;
        }
    }

    async destroy(): Promise<void> {
        await this.pool.destroy();
        console.log(`${TAG} pool destroyed`);
    }
}
