import { ResultPayload, TaskPayload } from '@swarmline/sdk';
import { TaskRecord, taskStatus } from '../db/task.entity';
import { Decomposer, TaskDescription } from '../decomposer/decomposer';
import { SwarmlineError } from '../errors';
import { ResultChannel, WorkQueue } from '../queue';
import { TaskStore } from '../repositories/task-store';
import type { TaskPersistence } from '../repositories/task.repository';
import { Notifier } from '../utils/notifier';
import { findCycle, resolveReady } from './dependency-resolver';
import { FailurePolicy } from './failure-policy';
import { ingest, Rejection } from './ingestion';
import { Reaper } from './reaper';

const TAG = '[scheduler]';

export enum schedulerState {
    IDLE = 'idle',
    DISPATCHING = 'dispatching',
    AWAITING_RESULTS = 'awaiting_results',
    DONE = 'done',
    FAILED = 'failed',
}

const SCHEDULER_TRANSITIONS: Record<schedulerState, readonly schedulerState[]> = {
    [schedulerState.IDLE]: [schedulerState.DISPATCHING],
    [schedulerState.DISPATCHING]: [
        schedulerState.AWAITING_RESULTS,
        schedulerState.DONE,
        schedulerState.FAILED,
        schedulerState.IDLE,
    ],
    [schedulerState.AWAITING_RESULTS]: [
        schedulerState.DISPATCHING,
        schedulerState.DONE,
        schedulerState.FAILED,
    ],
    [schedulerState.DONE]: [],
    [schedulerState.FAILED]: [],
};

export interface SchedulerOptions {
    maxRetries: number;
    retryBackoffMs: number;
    pollIntervalMs: number;
    /** A drained scheduler goes back to idle instead of ending in done. */
    keepAlive?: boolean;
    now?: () => Date;
    random?: () => number;
}

export interface SchedulerDeps {
    store: TaskStore;
    queue: WorkQueue;
    results: ResultChannel;
    decomposer?: Decomposer;
    persistence?: TaskPersistence;
}

export type StatusCounts = Record<taskStatus, number>;

export interface SchedulerOutcome {
    state: schedulerState;
    reason: string | null;
    counts: StatusCounts;
}

export interface SchedulerStatus extends SchedulerOutcome {
    rejections: Rejection[];
    tasks: Readonly<TaskRecord>[];
}

export function toPayload(task: Readonly<TaskRecord>): TaskPayload {
    return {
        id: task.id,
        title: task.title,
        instruction: task.instruction,
        branch: task.branch,
        target_paths: [...task.target_paths],
        priority: task.priority,
    };
}

function isTerminal(state: schedulerState): boolean {
    return SCHEDULER_TRANSITIONS[state].length === 0;
}

/**
 * Reconciliation loop and sole writer of the task store. Each tick ingests
 * submissions, applies claims, reports and expired leases, requeues due
 * retries, dispatches the ready set and decides the next state.
 */
export class Scheduler {
    private state = schedulerState.IDLE;
    private reason: string | null = null;
    private inbox: unknown[][] = [];
    private decomposing = 0;
    private rejections: Rejection[] = [];
    private stopped = false;
    private readonly wake = new Notifier();
    private readonly failures: FailurePolicy;
    private readonly reaper: Reaper;
    private readonly now: () => Date;

    constructor(
        private readonly deps: SchedulerDeps,
        private readonly opts: SchedulerOptions,
    ) {
        this.now = opts.now ?? (() => new Date());
        this.failures = new FailurePolicy(deps.store, {
            maxRetries: opts.maxRetries,
            retryBackoffMs: opts.retryBackoffMs,
            random: opts.random,
        });
        this.reaper = new Reaper(deps.queue, deps.store, this.failures, () => this.applyClaims());
    }

    get currentState(): schedulerState {
        return this.state;
    }

    /** Queues untrusted descriptions for the next tick. */
    submit(descriptions: readonly unknown[]): void {
        this.inbox.push([...descriptions]);
        this.wake.notify();
    }

    async submitGoal(goal: string): Promise<TaskDescription[]> {
        const { decomposer } = this.deps;
        if (!decomposer) {
            throw new Error('no decomposer configured');
        }

        this.decomposing++;
        try {
            const descriptions = await decomposer.decompose(goal);
            this.submit(descriptions);
            return descriptions;
        } finally {
            this.decomposing--;
            this.wake.notify();
        }
    }

    /**
     * Re-enqueues every queued task after TaskStore.restore(); their
     * payloads died with the previous process. A Redis queue may still hold
     * some of them, and those duplicates are ignored as stale claims.
     */
    async recover(): Promise<number> {
        const queued = this.deps.store.list(taskStatus.QUEUED);
        for (const task of queued) {
            await this.deps.queue.enqueue(toPayload(task));
        }
        if (queued.length > 0) {
            console.log(`${TAG} re-enqueued ${queued.length} restored tasks`);
        }
        return queued.length;
    }

    stop(): void {
        this.stopped = true;
        this.wake.notify();
    }

    status(): SchedulerStatus {
        return {
            state: this.state,
            reason: this.reason,
            counts: this.counts(),
            rejections: [...this.rejections],
            tasks: this.deps.store.list(),
        };
    }

    async run(): Promise<SchedulerOutcome> {
        console.log(`${TAG} started${this.opts.keepAlive ? ' (keep-alive)' : ''}`);

        while (!isTerminal(this.state) && !this.stopped) {
            try {
                await this.tick();
            } catch (err) {
                console.error(`${TAG} tick failed:`, err);
                if (!(err instanceof SwarmlineError)) {
                    this.fail(`unexpected error: ${err instanceof Error ? err.message : String(err)}`);
                    break;
                }
            }
            if (isTerminal(this.state) || this.stopped) break;
            await this.waitForEvent();
        }

        console.log(`${TAG} finished in state ${this.state}${this.reason ? `: ${this.reason}` : ''}`);
        return { state: this.state, reason: this.reason, counts: this.counts() };
    }

    async tick(): Promise<schedulerState> {
        if (isTerminal(this.state)) return this.state;
        this.moveTo(schedulerState.DISPATCHING);

        const now = this.now();
        this.ingestInbox();
        await this.applyClaims();
        await this.applyResults(now);
        await this.reaper.reap(now);
        await this.dispatchRetries(now);
        await this.dispatchReady();
        await this.persist();

        this.decide();
        return this.state;
    }

    private moveTo(next: schedulerState): void {
        if (next === this.state) return;
        if (!SCHEDULER_TRANSITIONS[this.state].includes(next)) {
            throw new Error(`scheduler cannot move from ${this.state} to ${next}`);
        }
        this.state = next;
    }

    private fail(reason: string): void {
        this.reason = reason;
        this.state = schedulerState.FAILED;
        console.error(`${TAG} failed: ${reason}`);
    }

    private ingestInbox(): void {
        const batches = this.inbox;
        this.inbox = [];
        for (const batch of batches) {
            const { accepted, rejected } = ingest(this.deps.store, batch);
            this.rejections.push(...rejected);
            this.failures.failOrphans(accepted.map(t => t.id));
        }
    }

    private async applyClaims(): Promise<void> {
        const { store } = this.deps;
        for (const claim of await this.deps.queue.drainClaims()) {
            const task = store.get(claim.task_id);
            if (task?.status !== taskStatus.QUEUED) {
                console.warn(`${TAG} stale claim of ${claim.task_id} by ${claim.worker_id} (status: ${task?.status ?? 'unknown'})`);
                continue;
            }
            store.transition(task.id, taskStatus.IN_PROGRESS, { worker_id: claim.worker_id });
        }
    }

    private async applyResults(now: Date): Promise<void> {
        for (const report of await this.deps.results.drain()) {
            await this.deps.queue.ack(report.task_id, report.worker_id);
            try {
                this.applyReport(report, now);
            } catch (err) {
                if (!(err instanceof SwarmlineError)) throw err;
                console.error(`${TAG} report for ${report.task_id} rejected:`, err);
            }
        }
    }

    private applyReport(report: ResultPayload, now: Date): void {
        const { store } = this.deps;
        const task = store.get(report.task_id);
        if (!task || task.status !== taskStatus.IN_PROGRESS || task.worker_id !== report.worker_id) {
            console.warn(`${TAG} ignoring stale ${report.outcome} report for ${report.task_id} from ${report.worker_id}`);
            return;
        }

        if (report.outcome === 'completed') {
            store.transition(task.id, taskStatus.COMPLETED);
            console.log(`${TAG} task ${task.id} completed by ${report.worker_id}`);
            return;
        }
        this.failures.recordFailure(task.id, { code: 'TASK_FAILED', message: report.detail || 'task failed' }, now);
    }

    private async dispatchRetries(now: Date): Promise<void> {
        for (const task of this.failures.dueRetries(now)) {
            try {
                await this.deps.queue.enqueue(toPayload(task));
            } catch (err) {
                console.error(`${TAG} failed to requeue ${task.id}, will retry:`, err);
                continue;
            }
            this.deps.store.transition(task.id, taskStatus.QUEUED, {}, { retryBound: this.failures.maxRetries });
        }
    }

    private async dispatchReady(): Promise<void> {
        for (const task of resolveReady(this.deps.store.snapshot())) {
            // enqueue first: a failed enqueue leaves the task pending for the next tick
            try {
                await this.deps.queue.enqueue(toPayload(task));
            } catch (err) {
                console.error(`${TAG} failed to enqueue ${task.id}, will retry:`, err);
                continue;
            }
            this.deps.store.transition(task.id, taskStatus.QUEUED);
        }
    }

    private async persist(): Promise<void> {
        const { persistence, store } = this.deps;
        if (!persistence) return;

        const ids = store.takeDirty();
        if (ids.length === 0) return;

        // creation order, so first inserts number their seq the way restore() needs
        const dirty = new Set(ids);
        const records = store.list().filter(r => dirty.has(r.id));
        try {
            await persistence.saveMany(records);
        } catch (err) {
            console.error(`${TAG} failed to persist ${ids.length} tasks, will retry:`, err);
            store.markDirty(ids);
        }
    }

    private decide(): void {
        const counts = this.counts();
        const active = counts[taskStatus.PENDING] + counts[taskStatus.QUEUED] + counts[taskStatus.IN_PROGRESS];
        const retries = this.failures.waitingRetries();
        const outstanding = this.inbox.length + this.decomposing;

        if (active === 0 && retries === 0 && outstanding === 0) {
            this.moveTo(this.opts.keepAlive ? schedulerState.IDLE : schedulerState.DONE);
            return;
        }

        const inFlight = counts[taskStatus.QUEUED] + counts[taskStatus.IN_PROGRESS] + retries + outstanding;
        if (inFlight === 0 && counts[taskStatus.PENDING] > 0) {
            const cycle = findCycle(this.deps.store.snapshot());
            this.fail(cycle
                ? `dependency cycle ${cycle.join(' -> ')}`
                : `${counts[taskStatus.PENDING]} pending tasks can never become eligible`);
            return;
        }

        this.moveTo(schedulerState.AWAITING_RESULTS);
    }

    private counts(): StatusCounts {
        const { store } = this.deps;
        return {
            [taskStatus.PENDING]: store.count(taskStatus.PENDING),
            [taskStatus.QUEUED]: store.count(taskStatus.QUEUED),
            [taskStatus.IN_PROGRESS]: store.count(taskStatus.IN_PROGRESS),
            [taskStatus.COMPLETED]: store.count(taskStatus.COMPLETED),
            [taskStatus.FAILED]: store.count(taskStatus.FAILED),
        };
    }

    private async waitForEvent(): Promise<void> {
        await Promise.race([
            this.deps.results.waitForReports(this.opts.pollIntervalMs),
            this.wake.wait(this.opts.pollIntervalMs),
        ]);
    }
}
