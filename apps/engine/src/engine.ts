import { EngineConfig } from './config';
import { migrate } from './db/migrate';
import { Decomposer } from './decomposer/decomposer';
import { HeuristicDecomposer } from './decomposer/heuristic.decomposer';
import {
    InMemoryResultChannel,
    InMemoryWorkQueue,
    LeaseRedis,
    QueueRedis,
    RedisResultChannel,
    RedisWorkQueue,
    ResultChannel,
    WorkQueue,
} from './queue';
import { TaskStore } from './repositories/task-store';
import { Queryable, TaskRepository } from './repositories/task.repository';
import { InProcessWorkerRuntime } from './runtime/in-process.runtime';
import { WorkerPoolManager } from './services/pool-manager';
import { PriceTable } from './services/price-table';
import { Scheduler, SchedulerOutcome } from './services/scheduler';
import { SchedulerLease } from './services/scheduler-lease';
import { TaskExecutor, ThreadTaskExecutor } from './services/task-executor';

const TAG = '[swarmline]';

export interface EngineDeps {
    pgPool?: Queryable | null;
    redis?: (QueueRedis & LeaseRedis) | null;
    /** Overrides for tests and embedding. */
    queueRedis?: QueueRedis;
    executor?: TaskExecutor;
    decomposer?: Decomposer;
    /** Defaults to the built-in model prices. */
    prices?: PriceTable;
}

/**
 * Builds every component once and hands the shared channels to the
 * scheduler, runtime and pool manager.
 */
export class Engine {
    readonly store = new TaskStore();
    readonly queue: WorkQueue;
    readonly results: ResultChannel;
    readonly executor: TaskExecutor;
    readonly runtime: InProcessWorkerRuntime;
    readonly scheduler: Scheduler;
    readonly pool: WorkerPoolManager;
    readonly repository: TaskRepository | null;
    readonly lease: SchedulerLease | null;
    private running: Promise<SchedulerOutcome> | null = null;

    constructor(private readonly config: EngineConfig, private readonly deps: EngineDeps = {}) {
        const queueRedis = deps.queueRedis ?? deps.redis ?? null;
        if (queueRedis) {
            this.queue = new RedisWorkQueue(queueRedis, { visibilityTimeoutMs: config.visibilityTimeoutMs });
            this.results = new RedisResultChannel(queueRedis);
        } else {
            this.queue = new InMemoryWorkQueue({ visibilityTimeoutMs: config.visibilityTimeoutMs });
            this.results = new InMemoryResultChannel();
        }

        this.executor = deps.executor ?? new ThreadTaskExecutor({
            handler: config.handlerName,
            handlerModules: config.handlerModules,
        });
        this.runtime = new InProcessWorkerRuntime({
            queue: this.queue,
            results: this.results,
            executor: this.executor,
            dequeueTimeoutMs: config.queueTimeoutMs,
            heartbeatIntervalMs: config.heartbeatIntervalMs,
            prices: deps.prices ?? PriceTable.builtIn(),
        });

        this.repository = deps.pgPool ? new TaskRepository(deps.pgPool) : null;
        this.lease = deps.redis
            ? new SchedulerLease(deps.redis, config.leaseTtlSeconds, undefined, () => this.onLeaseLost())
            : null;

        this.scheduler = new Scheduler(
            {
                store: this.store,
                queue: this.queue,
                results: this.results,
                decomposer: deps.decomposer ?? new HeuristicDecomposer(),
                persistence: this.repository ?? undefined,
            },
            {
                maxRetries: config.maxRetries,
                retryBackoffMs: config.retryBackoffMs,
                pollIntervalMs: config.schedulerPollMs,
                keepAlive: true,
            },
        );

        this.pool = new WorkerPoolManager(this.runtime, this.queue, {
            ceiling: config.maxWorkers,
            floor: config.minWorkers,
            tasksPerWorker: config.tasksPerWorker,
            heartbeatThresholdMs: config.heartbeatThresholdMs,
            intervalMs: config.autoscaleIntervalMs,
            models: config.workerModels,
        });
    }

    async start(): Promise<void> {
        if (this.lease && !(await this.lease.acquire())) {
            throw new Error('another scheduler holds the lease; refusing to start');
        }

        if (this.repository && this.deps.pgPool) {
            await migrate(this.deps.pgPool);
            const records = await this.repository.findAll();
            this.store.restore(records);
            console.log(`${TAG} restored ${records.length} tasks`);
            await this.scheduler.recover();
        }

        this.running = this.scheduler.run();
        this.pool.start();

        if (this.config.goal) {
            await this.scheduler.submitGoal(this.config.goal);
        }
        console.log(`${TAG} engine ready`);
    }

    /** Resolves with the scheduler's outcome once its loop ends; null before start(). */
    async stopped(): Promise<SchedulerOutcome | null> {
        return this.running;
    }

    // another instance may hold the lease by now; this one must stop scheduling
    private onLeaseLost(): void {
        console.error(`${TAG} scheduler lease lost, stopping the scheduler and the pool`);
        this.scheduler.stop();
        this.pool.shutdown().catch(err => console.error(`${TAG} pool shutdown failed:`, err));
    }

    async shutdown(): Promise<void> {
        this.scheduler.stop();
        if (this.running) await this.running;
        await this.pool.shutdown();
        await this.executor.destroy();
        await this.queue.close();
        await this.results.close();
        if (this.lease) await this.lease.release();
    }
}
