import { WorkerUsage } from '../db/worker.entity';
import { WorkerNotFoundError } from '../errors';
import { ResultChannel, WorkQueue } from '../queue';
import { HeartbeatService } from '../services/heartbeat.service';
import { PriceTable } from '../services/price-table';
import { TaskExecutor } from '../services/task-executor';
import { Worker } from './worker';
import { WorkerHandle, WorkerRuntime, WorkerSpec } from './worker-runtime';

const TAG = '[runtime]';

export interface InProcessRuntimeOptions {
    queue: WorkQueue;
    results: ResultChannel;
    executor: TaskExecutor;
    dequeueTimeoutMs: number;
    heartbeatIntervalMs: number;
    prices?: PriceTable;
}

/**
 * Runs each worker as an async loop inside this process, sharing one
 * executor. Heartbeats come from a per-worker ticker that only beats while
 * the loop is running.
 */
export class InProcessWorkerRuntime implements WorkerRuntime {
    private workers = new Map<string, Worker>();
    private beats = new Map<string, Date>();
    private readonly heartbeats: HeartbeatService;

    constructor(private readonly opts: InProcessRuntimeOptions) {
        this.heartbeats = new HeartbeatService(
            { recordHeartbeat: workerId => this.recordHeartbeat(workerId) },
            opts.heartbeatIntervalMs,
        );
    }

    async start(spec: WorkerSpec): Promise<WorkerHandle> {
        if (this.workers.has(spec.id)) {
            throw new Error(`worker ${spec.id} is already running`);
        }

        const worker = new Worker({
            id: spec.id,
            model: spec.model,
            queue: this.opts.queue,
            results: this.opts.results,
            executor: this.opts.executor,
            dequeueTimeoutMs: this.opts.dequeueTimeoutMs,
            prices: this.opts.prices,
        });
        this.workers.set(spec.id, worker);
        worker.start();
        this.heartbeats.start(spec.id);

        return { id: spec.id, model: spec.model };
    }

    async terminate(handle: WorkerHandle, opts: { force?: boolean } = {}): Promise<WorkerUsage> {
        const worker = this.workers.get(handle.id);
        if (!worker) throw new WorkerNotFoundError(handle.id);

        this.heartbeats.stop(handle.id);
        this.workers.delete(handle.id);
        this.beats.delete(handle.id);
        await worker.stop(opts);
        return worker.usage;
    }

    async heartbeat(handle: WorkerHandle): Promise<Date | null> {
        return this.beats.get(handle.id) ?? null;
    }

    usage(handle: WorkerHandle): WorkerUsage {
        const worker = this.workers.get(handle.id);
        if (!worker) throw new WorkerNotFoundError(handle.id);
        return worker.usage;
    }

    get size(): number {
        return this.workers.size;
    }

    async shutdown(): Promise<void> {
        const handles = Array.from(this.workers.keys(), id => ({ id, model: '' }));
        await Promise.all(handles.map(h => this.terminate(h)));
        this.heartbeats.stopAll();
        console.log(`${TAG} shut down ${handles.length} workers`);
    }

    private recordHeartbeat(workerId: string): void {
        if (this.workers.get(workerId)?.isRunning) {
            this.beats.set(workerId, new Date());
        }
    }
}
