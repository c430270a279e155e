import { TaskError, TaskRecord, taskStatus } from '../db/task.entity';
import { TaskRetryExhaustedError } from '../errors';
import { TaskStore } from '../repositories/task-store';
import { calculateBackOff } from '../utils/backoff';
import { transitiveDependents } from './dependency-resolver';

const TAG = '[scheduler]';

export const DEPENDENCY_FAILED = 'DEPENDENCY_FAILED';

export interface FailurePolicyOptions {
    maxRetries: number;
    retryBackoffMs: number;
    random?: () => number;
}

export interface FailureOutcome {
    task: Readonly<TaskRecord>;
    action: 'retry_scheduled' | 'exhausted';
    propagated: string[];
}

/**
 * Applies one failed attempt to an in_progress task: schedules a retry
 * below the bound, otherwise fails it for good and fails every pending
 * transitive dependent.
 */
export class FailurePolicy {
    constructor(
        private readonly store: TaskStore,
        private readonly opts: FailurePolicyOptions,
    ) { }

    get maxRetries(): number {
        return this.opts.maxRetries;
    }

    recordFailure(taskId: string, reason: TaskError, now: Date): FailureOutcome {
        const current = this.store.get(taskId);
        const attempts = (current?.attempts ?? 0) + 1;

        if (attempts < this.opts.maxRetries) {
            const delay = calculateBackOff(attempts, {
                baseMs: this.opts.retryBackoffMs,
                random: this.opts.random,
            });
            const task = this.store.transition(taskId, taskStatus.FAILED, {
                attempts,
                error: reason,
                retry_at: new Date(now.getTime() + delay),
            });
            console.warn(`${TAG} task ${taskId} failed (attempt ${attempts}/${this.opts.maxRetries}), retry in ${delay}ms: ${reason.message}`);
            return { task, action: 'retry_scheduled', propagated: [] };
        }

        const exhausted = new TaskRetryExhaustedError(taskId, attempts, reason.message);
        const task = this.store.transition(taskId, taskStatus.FAILED, {
            attempts,
            error: { code: exhausted.code, message: exhausted.message },
            retry_at: null,
        });
        console.error(`${TAG} ${exhausted.message}`);

        const propagated = this.propagate(taskId);
        return { task, action: 'exhausted', propagated };
    }

    /**
     * Fails newly ingested pending tasks that depend on a task already failed
     * for good, then their own pending dependents.
     */
    failOrphans(ids: readonly string[]): string[] {
        const failed: string[] = [];
        for (const id of ids) {
            const task = this.store.get(id);
            if (task?.status !== taskStatus.PENDING) continue;
            const dead = task.dependencies.find(dep => this.isExhausted(dep));
            if (!dead) continue;

            this.failDependent(id, dead);
            console.warn(`${TAG} task ${id} depends on ${dead}, which already failed`);
            failed.push(id, ...this.propagate(id));
        }
        return failed;
    }

    private isExhausted(id: string): boolean {
        const task = this.store.get(id);
        return task?.status === taskStatus.FAILED && task.retry_at === null;
    }

    private failDependent(id: string, dependency: string): void {
        this.store.transition(
            id,
            taskStatus.FAILED,
            { error: { code: DEPENDENCY_FAILED, message: `dependency ${dependency} failed` } },
            { propagated: true },
        );
    }

    private propagate(taskId: string): string[] {
        const failed: string[] = [];
        for (const dependent of transitiveDependents(this.store.snapshot(), taskId)) {
            if (dependent.status !== taskStatus.PENDING) continue;
            this.failDependent(dependent.id, taskId);
            failed.push(dependent.id);
        }
        if (failed.length > 0) {
            console.warn(`${TAG} failed ${failed.length} dependents of ${taskId}: ${failed.join(', ')}`);
        }
        return failed;
    }

    /** Failed tasks whose retry slot has come, oldest first. */
    dueRetries(now: Date): Readonly<TaskRecord>[] {
        return this.store
            .list(taskStatus.FAILED)
            .filter(t => t.retry_at !== null && t.retry_at.getTime() <= now.getTime());
    }

    waitingRetries(): number {
        return this.store.list(taskStatus.FAILED).filter(t => t.retry_at !== null).length;
    }
}
