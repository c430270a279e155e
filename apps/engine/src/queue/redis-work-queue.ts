import { decodeTask, encodeTask, SerializationError, TaskPayload } from '@swarmline/sdk';
import { QueueRedis } from './redis-client';
import { Claim, DequeueResult, Lease, NO_WORK, VISIBILITY_EXPIRED, WorkQueue, WorkQueueOptions } from './work-queue';

const TAG = '[queue]';

export interface RedisWorkQueueOptions extends WorkQueueOptions {
    prefix?: string;
}

// Leases and claims share one JSON shape: `at` is the deadline for a lease
// and the claim time for a claim.
interface StoredEntry {
    task_id: string;
    worker_id: string;
    at: number;
    reason?: string;
}

function parseEntry(raw: string): StoredEntry | null {
    let value: unknown;
    try {
        value = JSON.parse(raw);
    } catch {
        return null;
    }
    if (typeof value !== 'object' || value === null) return null;
    if (!('task_id' in value) || !('worker_id' in value) || !('at' in value)) return null;

    const { task_id, worker_id, at } = value;
    if (typeof task_id !== 'string' || typeof worker_id !== 'string' || typeof at !== 'number') {
        return null;
    }
    const reason = 'reason' in value && typeof value.reason === 'string' ? value.reason : undefined;
    return { task_id, worker_id, at, reason };
}

function toLease(entry: StoredEntry): Lease {
    return {
        task_id: entry.task_id,
        worker_id: entry.worker_id,
        deadline: new Date(entry.at),
        reason: entry.reason ?? VISIBILITY_EXPIRED,
    };
}

function storeLease(lease: Lease): string {
    const stored: StoredEntry = {
        task_id: lease.task_id,
        worker_id: lease.worker_id,
        at: lease.deadline.getTime(),
        reason: lease.reason,
    };
    return JSON.stringify(stored);
}

// A worker's blocking connection. Detaching during a BRPOP defers the
// disconnect until the pop returns, so a popped item is never lost.
interface BlockingConnection {
    conn: QueueRedis;
    popping: boolean;
    detached: boolean;
}

/**
 * Work queue on Redis lists: LPUSH to enqueue, BRPOP to take (FIFO).
 * Leases live in a hash keyed by task id, claims in a list the scheduler
 * trims after reading. BRPOP blocks its connection, so every worker gets
 * its own duplicate until detach().
 */
export class RedisWorkQueue implements WorkQueue {
    private readonly workKey: string;
    private readonly leaseKey: string;
    private readonly claimKey: string;
    private readonly visibilityTimeoutMs: number;
    private readonly now: () => Date;
    private blocking = new Map<string, BlockingConnection>();
    private closed = false;

    constructor(
        private readonly redis: QueueRedis,
        opts: RedisWorkQueueOptions,
    ) {
        const prefix = opts.prefix ?? 'swarmline';
        this.workKey = `${prefix}:work`;
        this.leaseKey = `${prefix}:leases`;
        this.claimKey = `${prefix}:claims`;
        this.visibilityTimeoutMs = opts.visibilityTimeoutMs;
        this.now = opts.now ?? (() => new Date());
    }

    async enqueue(payload: TaskPayload): Promise<void> {
        await this.redis.lpush(this.workKey, encodeTask(payload));
    }

    private connectionFor(workerId: string): BlockingConnection {
        let slot = this.blocking.get(workerId);
        if (!slot) {
            slot = { conn: this.redis.duplicate(), popping: false, detached: false };
            this.blocking.set(workerId, slot);
        }
        return slot;
    }

    get openConnections(): number {
        return this.blocking.size;
    }

    async dequeue(workerId: string, timeoutMs: number, signal?: AbortSignal): Promise<DequeueResult> {
        if (this.closed || signal?.aborted) return NO_WORK;

        const slot = this.connectionFor(workerId);
        let popped: [string, string] | null;
        slot.popping = true;
        try {
            // BRPOP treats 0 as "block forever"
            popped = await slot.conn.brpop(this.workKey, Math.max(timeoutMs, 10) / 1000);
        } catch (err) {
            if (this.closed || slot.detached) return NO_WORK;
            throw err;
        } finally {
            slot.popping = false;
            if (slot.detached) slot.conn.disconnect();
        }
        if (!popped) return NO_WORK;

        if (signal?.aborted || slot.detached) {
            // BRPOP takes from the tail, so RPUSH puts it back at the head
            await this.redis.rpush(this.workKey, popped[1]);
            return NO_WORK;
        }

        let payload: TaskPayload;
        try {
            payload = decodeTask(popped[1]);
        } catch (err) {
            if (err instanceof SerializationError) {
                console.error(`${TAG} dropping malformed payload:`, err);
                return NO_WORK;
            }
            throw err;
        }

        const now = this.now();
        const lease: Lease = {
            task_id: payload.id,
            worker_id: workerId,
            deadline: new Date(now.getTime() + this.visibilityTimeoutMs),
            reason: VISIBILITY_EXPIRED,
        };
        const claim: StoredEntry = { task_id: payload.id, worker_id: workerId, at: now.getTime() };

        // claim before lease: a lease must never be reclaimable ahead of its claim
        await this.redis.rpush(this.claimKey, JSON.stringify(claim));
        await this.redis.hset(this.leaseKey, payload.id, storeLease(lease));
        return payload;
    }

    async drainClaims(): Promise<Claim[]> {
        const raw = await this.redis.lrange(this.claimKey, 0, -1);
        if (raw.length === 0) return [];
        // claims pushed after the read sit past raw.length and survive the trim
        await this.redis.ltrim(this.claimKey, raw.length, -1);

        const claims: Claim[] = [];
        for (const item of raw) {
            const entry = parseEntry(item);
            if (entry) {
                claims.push({ task_id: entry.task_id, worker_id: entry.worker_id, claimed_at: new Date(entry.at) });
            } else {
                console.error(`${TAG} dropping malformed claim: ${item}`);
            }
        }
        return claims;
    }

    async ack(taskId: string, workerId: string): Promise<boolean> {
        const raw = await this.redis.hget(this.leaseKey, taskId);
        const entry = raw ? parseEntry(raw) : null;
        if (!entry || entry.worker_id !== workerId) return false;
        return (await this.redis.hdel(this.leaseKey, taskId)) === 1;
    }

    async releaseWorker(workerId: string, reason: string): Promise<number> {
        let released = 0;
        for (const lease of await this.activeLeases()) {
            if (lease.worker_id === workerId) {
                await this.redis.hset(this.leaseKey, lease.task_id, storeLease({ ...lease, deadline: new Date(0), reason }));
                released++;
            }
        }
        return released;
    }

    async detach(workerId: string): Promise<void> {
        const slot = this.blocking.get(workerId);
        if (!slot) return;
        this.blocking.delete(workerId);
        slot.detached = true;
        if (!slot.popping) slot.conn.disconnect();
    }

    async reclaimExpired(now: Date = this.now()): Promise<Lease[]> {
        const expired: Lease[] = [];
        for (const lease of await this.activeLeases()) {
            if (lease.deadline.getTime() > now.getTime()) continue;
            // HDEL is the arbiter: only the caller that removes the field reclaims it
            if ((await this.redis.hdel(this.leaseKey, lease.task_id)) === 1) {
                expired.push(lease);
            }
        }
        return expired;
    }

    async activeLeases(): Promise<Lease[]> {
        const all = await this.redis.hgetall(this.leaseKey);
        const leases: Lease[] = [];
        for (const raw of Object.values(all)) {
            const entry = parseEntry(raw);
            if (entry) leases.push(toLease(entry));
        }
        return leases;
    }

    async depth(): Promise<number> {
        return this.redis.llen(this.workKey);
    }

    async close(): Promise<void> {
        this.closed = true;
        for (const slot of this.blocking.values()) {
            slot.conn.disconnect();
        }
        this.blocking.clear();
    }
}
