import { ResultPayload, TaskPayload, TokenUsage } from '@swarmline/sdk';
import { emptyUsage, WorkerUsage } from '../db/worker.entity';
import { DequeueResult, NO_WORK, ResultChannel, WorkQueue } from '../queue';
import { PriceTable } from '../services/price-table';
import { TaskExecutor } from '../services/task-executor';
import { sleep } from '../utils/notifier';

const TAG = '[worker]';
const STOP_GRACE_MS = 1000;
const FREE = new PriceTable();

export interface WorkerOptions {
    id: string;
    model: string;
    queue: WorkQueue;
    results: ResultChannel;
    executor: TaskExecutor;
    dequeueTimeoutMs: number;
    /** Prices the token usage of completed tasks. Without one, tokens are counted at no cost. */
    prices?: PriceTable;
}

/**
 * Agent loop: dequeue with a timeout, execute, publish the report, repeat.
 * Stopping cancels the pending dequeue at once. A graceful stop lets the
 * task in flight finish within one dequeue timeout plus a grace period;
 * past that, or on a forced stop, the task is aborted and its report
 * dropped, and the scheduler requeues it once the pool releases the lease.
 */
export class Worker {
    private backoff = 100;
    private readonly minBackoff = 100;
    private readonly maxBackoff = 500;
    private running = false;
    private loop: Promise<void> | null = null;
    private halt = new AbortController();
    private abort = new AbortController();
    private currentTaskId: string | null = null;
    private readonly counters: WorkerUsage = emptyUsage();

    constructor(private readonly opts: WorkerOptions) { }

    get id(): string {
        return this.opts.id;
    }

    get isRunning(): boolean {
        return this.running;
    }

    get currentTask(): string | null {
        return this.currentTaskId;
    }

    get usage(): WorkerUsage {
        return { ...this.counters };
    }

    start(): void {
        if (this.running) {
            console.warn(`${TAG} ${this.id} already running`);
            return;
        }
        this.running = true;
        this.halt = new AbortController();
        this.abort = new AbortController();
        console.log(`${TAG} ${this.id} started (model: ${this.opts.model})`);
        this.loop = this.run();
    }

    async stop(opts: { force?: boolean } = {}): Promise<void> {
        if (!this.running) return;
        this.running = false;
        this.halt.abort();

        if (!opts.force && this.loop) {
            await Promise.race([this.loop, sleep(this.opts.dequeueTimeoutMs + STOP_GRACE_MS)]);
        }
        if (this.currentTaskId) {
            console.warn(`${TAG} ${this.id} aborting ${this.currentTaskId}`);
        }
        this.abort.abort();
        console.log(`${TAG} ${this.id} stopped`);
    }

    private async run(): Promise<void> {
        while (this.running) {
            let next: DequeueResult;
            try {
                next = await this.opts.queue.dequeue(this.id, this.opts.dequeueTimeoutMs, this.halt.signal);
                this.backoff = this.minBackoff;
            } catch (err) {
                console.error(`${TAG} ${this.id} dequeue error:`, err);
                await sleep(this.backoff);
                // 100 -> 200 -> 400 -> 500ms cap
                this.backoff = Math.min(this.backoff * 2, this.maxBackoff);
                continue;
            }

            if (next === NO_WORK) continue;
            await this.process(next);
        }
    }

    private async process(task: TaskPayload): Promise<void> {
        this.currentTaskId = task.id;
        const started = Date.now();
        let report: ResultPayload;

        try {
            const { detail, usage } = await this.opts.executor.execute(task, {
                workerId: this.id,
                model: this.opts.model,
                signal: this.abort.signal,
            });
            if (usage) this.charge(usage);
            report = { task_id: task.id, worker_id: this.id, outcome: 'completed', detail };
        } catch (err) {
            const detail = err instanceof Error ? err.message : String(err);
            report = { task_id: task.id, worker_id: this.id, outcome: 'failed', detail };
        } finally {
            this.counters.busy_ms += Date.now() - started;
            this.currentTaskId = null;
        }

        if (this.abort.signal.aborted) {
            console.warn(`${TAG} ${this.id} dropped report for ${task.id} after stop`);
            return;
        }

        if (report.outcome === 'completed') this.counters.tasks_completed++;
        else this.counters.tasks_failed++;

        try {
            await this.opts.results.publish(report);
        } catch (err) {
            // the lease expires and the scheduler requeues
            console.error(`${TAG} ${this.id} failed to publish report for ${task.id}:`, err);
        }
    }

    private charge(usage: TokenUsage): void {
        const spent = (this.opts.prices ?? FREE).charge(this.opts.model, usage);
        this.counters.input_tokens += spent.input_tokens;
        this.counters.output_tokens += spent.output_tokens;
        this.counters.cost += spent.cost;
    }
}
