import { taskStatus } from '../db/task.entity';
import { WorkerCrashError } from '../errors';
import { WorkQueue } from '../queue';
import { TaskStore } from '../repositories/task-store';
import { FailurePolicy } from './failure-policy';

const TAG = '[reaper]';

export interface ReapedTask {
    id: string;
    worker_id: string;
    attempts: number;
    action: 'requeued' | 'failed';
}

/**
 * Recovers tasks whose lease expired: the visibility timeout elapsed, or the
 * pool released the worker. Called from the scheduler tick, so the store
 * keeps its single writer.
 *
 * A worker writes its claim before its lease, so an expired lease on a task
 * that is still queued means the claim landed after the tick read claims.
 * `settleClaims` applies it before the lease is judged.
 */
export class Reaper {
    constructor(
        private readonly queue: WorkQueue,
        private readonly store: TaskStore,
        private readonly failures: FailurePolicy,
        private readonly settleClaims: () => Promise<void> = async () => undefined,
    ) { }

    async reap(now: Date = new Date()): Promise<ReapedTask[]> {
        const reaped: ReapedTask[] = [];

        const expired = await this.queue.reclaimExpired(now);
        if (expired.length === 0) return reaped;
        if (expired.some(l => this.store.get(l.task_id)?.status === taskStatus.QUEUED)) {
            await this.settleClaims();
        }
        const leased = new Set((await this.queue.activeLeases()).map(l => l.task_id));

        for (const lease of expired) {
            const task = this.store.get(lease.task_id);
            if (!task || task.status !== taskStatus.IN_PROGRESS) continue;
            // a duplicate delivery can overwrite the owner's lease; reclaim only when no lease covers the task
            if (task.worker_id !== lease.worker_id && leased.has(task.id)) continue;

            const crash = new WorkerCrashError(task.worker_id ?? lease.worker_id, lease.reason);
            const outcome = this.failures.recordFailure(task.id, { code: crash.code, message: crash.message }, now);
            reaped.push({
                id: task.id,
                worker_id: task.worker_id ?? lease.worker_id,
                attempts: outcome.task.attempts,
                action: outcome.action === 'exhausted' ? 'failed' : 'requeued',
            });
        }

        if (reaped.length > 0) {
            console.log(`${TAG} reaped ${reaped.length} tasks: ${reaped.map(t => `${t.id}(${t.action})`).join(', ')}`);
        }
        return reaped;
    }
}
