import { TaskPayload } from '@swarmline/sdk';
import { Notifier } from '../utils/notifier';

export const NO_WORK: unique symbol = Symbol('no-work');
export type DequeueResult = TaskPayload | typeof NO_WORK;

export const VISIBILITY_EXPIRED = 'visibility timeout elapsed';

/**
 * A dequeued task that has not been reported yet. The scheduler reclaims it
 * once `deadline` passes; releaseWorker() moves the deadline to now.
 */
export interface Lease {
    task_id: string;
    worker_id: string;
    deadline: Date;
    reason: string;
}

export interface Claim {
    task_id: string;
    worker_id: string;
    claimed_at: Date;
}

export interface WorkQueue {
    enqueue(payload: TaskPayload): Promise<void>;
    /**
     * Resolves NO_WORK when nothing arrives within timeoutMs, the queue
     * closes or `signal` aborts. An aborted dequeue never takes an item.
     */
    dequeue(workerId: string, timeoutMs: number, signal?: AbortSignal): Promise<DequeueResult>;
    drainClaims(): Promise<Claim[]>;
    ack(taskId: string, workerId: string): Promise<boolean>;
    releaseWorker(workerId: string, reason: string): Promise<number>;
    /** Frees whatever the queue holds for a worker that is gone. */
    detach(workerId: string): Promise<void>;
    /** Removes and returns expired leases; each lease is returned once. */
    reclaimExpired(now?: Date): Promise<Lease[]>;
    activeLeases(): Promise<Lease[]>;
    depth(): Promise<number>;
    close(): Promise<void>;
}

export interface WorkQueueOptions {
    visibilityTimeoutMs: number;
    now?: () => Date;
}

export class InMemoryWorkQueue implements WorkQueue {
    private items: TaskPayload[] = [];
    private leases = new Map<string, Lease>();
    private claims: Claim[] = [];
    private readonly available = new Notifier();
    private readonly visibilityTimeoutMs: number;
    private readonly now: () => Date;
    private closed = false;

    constructor(opts: WorkQueueOptions) {
        this.visibilityTimeoutMs = opts.visibilityTimeoutMs;
        this.now = opts.now ?? (() => new Date());
    }

    async enqueue(payload: TaskPayload): Promise<void> {
        if (this.closed) {
            throw new Error('work queue is closed');
        }
        this.items.push(payload);
        this.available.notify();
    }

    async dequeue(workerId: string, timeoutMs: number, signal?: AbortSignal): Promise<DequeueResult> {
        const deadline = Date.now() + timeoutMs;
        const wake = () => this.available.notify();
        signal?.addEventListener('abort', wake, { once: true });

        try {
            for (;;) {
                if (this.closed || signal?.aborted) return NO_WORK;

                const item = this.items.shift();
                if (item) {
                    this.lease(item.id, workerId);
                    return item;
                }

                const remaining = deadline - Date.now();
                if (remaining <= 0) return NO_WORK;
                await this.available.wait(remaining);
            }
        } finally {
            signal?.removeEventListener('abort', wake);
        }
    }

    private lease(taskId: string, workerId: string): void {
        const now = this.now();
        this.leases.set(taskId, {
            task_id: taskId,
            worker_id: workerId,
            deadline: new Date(now.getTime() + this.visibilityTimeoutMs),
            reason: VISIBILITY_EXPIRED,
        });
        this.claims.push({ task_id: taskId, worker_id: workerId, claimed_at: now });
    }

    async drainClaims(): Promise<Claim[]> {
        const claims = this.claims;
        this.claims = [];
        return claims;
    }

    async ack(taskId: string, workerId: string): Promise<boolean> {
        const lease = this.leases.get(taskId);
        if (!lease || lease.worker_id !== workerId) return false;
        return this.leases.delete(taskId);
    }

    async releaseWorker(workerId: string, reason: string): Promise<number> {
        let released = 0;
        for (const lease of this.leases.values()) {
            if (lease.worker_id === workerId) {
                lease.deadline = new Date(0);
                lease.reason = reason;
                released++;
            }
        }
        return released;
    }

    async detach(): Promise<void> { }

    async reclaimExpired(now: Date = this.now()): Promise<Lease[]> {
        const expired: Lease[] = [];
        for (const [taskId, lease] of this.leases) {
            if (lease.deadline.getTime() <= now.getTime()) {
                this.leases.delete(taskId);
                expired.push(lease);
            }
        }
        return expired;
    }

    async activeLeases(): Promise<Lease[]> {
        return Array.from(this.leases.values(), lease => ({ ...lease }));
    }

    async depth(): Promise<number> {
        return this.items.length;
    }

    async close(): Promise<void> {
        this.closed = true;
        this.available.notify();
    }
}
