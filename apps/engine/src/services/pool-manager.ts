import { v4 as uuidv4 } from 'uuid';
import { addCost, CostTotals, emptyUsage, WorkerRecord, workerStatus } from '../db/worker.entity';
import { ScaleLimitExceededError, WorkerCrashError, WorkerNotFoundError } from '../errors';
import { Lease, WorkQueue } from '../queue';
import { WorkerHandle, WorkerRuntime } from '../runtime/worker-runtime';
import { desiredWorkerCount, ScalingPolicy } from '../utils/scaling';

const TAG = '[pool]';

export interface PoolConfig extends ScalingPolicy {
    heartbeatThresholdMs: number;
    intervalMs: number;
    models: string[];
}

export interface PoolStatus {
    workers: WorkerRecord[];
    ceiling: number;
    floor: number;
    live: number;
    queue_depth: number;
    /** Tokens and spend of live workers plus every worker already stopped. */
    cost: CostTotals;
}

export interface ScaleDecision {
    queue_depth: number;
    current: number;
    desired: number;
    spawned: string[];
    stopped: string[];
}

interface PoolEntry {
    record: WorkerRecord;
    handle: WorkerHandle;
}

function copy(record: WorkerRecord): WorkerRecord {
    return { ...record, usage: { ...record.usage } };
}

/**
 * Owns the live workers. The ceiling check and the slot reservation in
 * spawn() happen before the first await, so manual and auto-scaler spawns
 * can never overshoot it together.
 */
export class WorkerPoolManager {
    private workers = new Map<string, PoolEntry>();
    private starting = 0;
    private modelCursor = 0;
    private intervalHandle: NodeJS.Timeout | null = null;
    private running = false;
    private isTicking = false;
    private retired: CostTotals = { input_tokens: 0, output_tokens: 0, cost: 0 };

    constructor(
        private readonly runtime: WorkerRuntime,
        private readonly queue: WorkQueue,
        private readonly config: PoolConfig,
        private readonly now: () => Date = () => new Date(),
    ) {
        if (config.models.length === 0) {
            throw new Error('pool needs at least one worker model');
        }
    }

    get liveCount(): number {
        return this.workers.size + this.starting;
    }

    async spawn(): Promise<WorkerRecord> {
        if (this.liveCount >= this.config.ceiling) {
            throw new ScaleLimitExceededError(this.config.ceiling);
        }
        this.starting++;

        const id = `worker-${uuidv4().slice(0, 8)}`;
        const model = this.config.models[this.modelCursor++ % this.config.models.length];

        let handle: WorkerHandle;
        try {
            handle = await this.runtime.start({ id, model });
        } finally {
            this.starting--;
        }

        const record: WorkerRecord = {
            id,
            model,
            status: workerStatus.STARTING,
            current_task_id: null,
            last_heartbeat: null,
            usage: emptyUsage(),
            started_at: this.now(),
            idle_since: null,
        };
        this.workers.set(id, { record, handle });
        console.log(`${TAG} spawned ${id} (model: ${model}, live: ${this.liveCount}/${this.config.ceiling})`);
        return copy(record);
    }

    async stop(workerId: string, reason = 'stopped by request'): Promise<void> {
        const entry = this.workers.get(workerId);
        if (!entry) throw new WorkerNotFoundError(workerId);
        await this.teardown(entry, reason, false);
    }

    private async teardown(entry: PoolEntry, reason: string, force: boolean): Promise<void> {
        // removed before the first await so counts and scale decisions see it gone
        this.workers.delete(entry.record.id);
        entry.record.status = workerStatus.STOPPED;
        entry.record.current_task_id = null;

        try {
            entry.record.usage = await this.runtime.terminate(entry.handle, { force });
        } finally {
            this.retired = addCost(this.retired, entry.record.usage);
            const released = await this.queue.releaseWorker(entry.record.id, reason);
            await this.queue.detach(entry.record.id);
            console.log(`${TAG} stopped ${entry.record.id} (${reason}${released > 0 ? `, released ${released} lease(s)` : ''})`);
        }
    }

    /**
     * Pulls heartbeats and usage from the runtime and derives busy/idle from
     * the queue's leases.
     */
    async refresh(now: Date = this.now()): Promise<void> {
        const leaseByWorker = new Map<string, Lease>();
        for (const lease of await this.queue.activeLeases()) {
            leaseByWorker.set(lease.worker_id, lease);
        }

        for (const { record, handle } of Array.from(this.workers.values())) {
            if (record.status === workerStatus.UNHEALTHY) continue;

            const beat = await this.runtime.heartbeat(handle);
            if (beat) record.last_heartbeat = beat;
            if (!this.workers.has(record.id)) continue;
            record.usage = this.runtime.usage(handle);

            const lease = leaseByWorker.get(record.id);
            if (lease) {
                record.status = workerStatus.BUSY;
                record.current_task_id = lease.task_id;
                record.idle_since = null;
            } else if (record.last_heartbeat) {
                if (record.status !== workerStatus.IDLE) record.idle_since = now;
                record.status = workerStatus.IDLE;
                record.current_task_id = null;
            }
        }
    }

    /**
     * Force-stops every worker whose last heartbeat (or start, before the
     * first beat) is older than the threshold. Returns their ids.
     */
    async checkHealth(now: Date = this.now()): Promise<string[]> {
        await this.refresh(now);

        const unhealthy: PoolEntry[] = [];
        for (const entry of this.workers.values()) {
            const baseline = entry.record.last_heartbeat ?? entry.record.started_at;
            const silentMs = now.getTime() - baseline.getTime();
            if (silentMs > this.config.heartbeatThresholdMs) {
                entry.record.status = workerStatus.UNHEALTHY;
                entry.record.current_task_id = null;
                unhealthy.push(entry);
            }
        }

        for (const entry of unhealthy) {
            const silentMs = now.getTime() - (entry.record.last_heartbeat ?? entry.record.started_at).getTime();
            const crash = new WorkerCrashError(entry.record.id, `no heartbeat for ${silentMs}ms`);
            console.error(`${TAG} ${crash.message}`);
            try {
                await this.teardown(entry, crash.message, true);
            } catch (err) {
                console.error(`${TAG} failed to terminate ${entry.record.id}:`, err);
            }
        }

        return unhealthy.map(e => e.record.id);
    }

    /**
     * desired = min(ceiling, max(floor, ceil(depth / tasksPerWorker))).
     * Scale-down stops the most recently idle workers first and never a
     * busy one, so a repeated call with unchanged inputs does nothing.
     */
    async autoscale(): Promise<ScaleDecision> {
        const depth = await this.queue.depth();
        await this.refresh();

        const current = this.liveCount;
        const desired = desiredWorkerCount(depth, this.config);
        const decision: ScaleDecision = { queue_depth: depth, current, desired, spawned: [], stopped: [] };

        if (desired > current) {
            for (let i = current; i < desired; i++) {
                try {
                    decision.spawned.push((await this.spawn()).id);
                } catch (err) {
                    if (err instanceof ScaleLimitExceededError) {
                        console.warn(`${TAG} ${err.message}, spawn skipped`);
                        break;
                    }
                    throw err;
                }
            }
        } else if (desired < current) {
            const idle = Array.from(this.workers.values())
                .filter(e => e.record.status === workerStatus.IDLE)
                .sort((a, b) => (b.record.idle_since?.getTime() ?? 0) - (a.record.idle_since?.getTime() ?? 0))
                .slice(0, current - desired);

            for (const entry of idle) {
                await this.teardown(entry, 'scaled down', false);
                decision.stopped.push(entry.record.id);
            }
        }

        if (decision.spawned.length > 0 || decision.stopped.length > 0) {
            console.log(`${TAG} autoscale depth=${depth} current=${current} desired=${desired} spawned=${decision.spawned.length} stopped=${decision.stopped.length}`);
        }
        return decision;
    }

    async status(): Promise<PoolStatus> {
        const workers = Array.from(this.workers.values(), e => copy(e.record));
        return {
            workers,
            ceiling: this.config.ceiling,
            floor: this.config.floor,
            live: this.liveCount,
            queue_depth: await this.queue.depth(),
            cost: workers.reduce<CostTotals>((total, w) => addCost(total, w.usage), this.retired),
        };
    }

    start(): void {
        if (this.running) {
            console.warn(`${TAG} already running`);
            return;
        }
        this.running = true;
        console.log(`${TAG} started (interval: ${this.config.intervalMs}ms, floor: ${this.config.floor}, ceiling: ${this.config.ceiling})`);

        // Fire immediately, then on schedule
        this.tick().catch(err => console.error(`${TAG} tick failed:`, err));
        this.intervalHandle = setInterval(
            () => this.tick().catch(err => console.error(`${TAG} tick failed:`, err)),
            this.config.intervalMs,
        );
        this.intervalHandle.unref();
    }

    async tick(): Promise<void> {
        if (this.isTicking) return;
        this.isTicking = true;
        try {
            await this.checkHealth();
            await this.autoscale();
        } finally {
            this.isTicking = false;
        }
    }

    async shutdown(): Promise<void> {
        this.running = false;
        if (this.intervalHandle) {
            clearInterval(this.intervalHandle);
            this.intervalHandle = null;
        }

        const entries = Array.from(this.workers.values());
        const results = await Promise.allSettled(entries.map(e => this.teardown(e, 'pool shutdown', false)));
        for (const result of results) {
            if (result.status === 'rejected') {
                console.error(`${TAG} worker teardown failed:`, result.reason);
            }
        }
        console.log(`${TAG} stopped ${entries.length} workers`);
    }
}
