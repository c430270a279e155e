import { InMemoryWorkQueue, NO_WORK, VISIBILITY_EXPIRED } from '../../src/queue';
import { payload } from '../helpers/payloads';

describe('InMemoryWorkQueue', () => {
    let now: Date;
    let queue: InMemoryWorkQueue;

    beforeEach(() => {
        now = new Date(Date.UTC(2026, 0, 1));
        queue = new InMemoryWorkQueue({ visibilityTimeoutMs: 1000, now: () => now });
    });

    afterEach(async () => {
        await queue.close();
    });

    it('delivers in enqueue order', async () => {
        await queue.enqueue(payload('a'));
        await queue.enqueue(payload('b'));

        expect(await queue.depth()).toBe(2);
        expect(await queue.dequeue('w1', 10)).toEqual(payload('a'));
        expect(await queue.dequeue('w1', 10)).toEqual(payload('b'));
        expect(await queue.depth()).toBe(0);
    });

    it('returns NO_WORK when the timeout elapses', async () => {
        expect(await queue.dequeue('w1', 20)).toBe(NO_WORK);
    });

    it('wakes a blocked consumer on enqueue', async () => {
        const pending = queue.dequeue('w1', 2000);
        await queue.enqueue(payload('late'));
        expect(await pending).toEqual(payload('late'));
    });

    it('hands each payload to exactly one of several consumers', async () => {
        const consumers = [queue.dequeue('w1', 100), queue.dequeue('w2', 100), queue.dequeue('w3', 100)];
        await queue.enqueue(payload('only'));

        const results = await Promise.all(consumers);
        expect(results.filter(r => r !== NO_WORK)).toEqual([payload('only')]);
    });

    it('resolves an aborted dequeue with NO_WORK and leaves the item queued', async () => {
        const halt = new AbortController();
        const pending = queue.dequeue('w1', 2000, halt.signal);

        halt.abort();
        await queue.enqueue(payload('a'));

        expect(await pending).toBe(NO_WORK);
        expect(await queue.depth()).toBe(1);
        expect(await queue.activeLeases()).toEqual([]);
    });

    it('records a lease and a claim on dequeue', async () => {
        await queue.enqueue(payload('a'));
        await queue.dequeue('w1', 10);

        expect(await queue.activeLeases()).toEqual([
            { task_id: 'a', worker_id: 'w1', deadline: new Date(now.getTime() + 1000), reason: VISIBILITY_EXPIRED },
        ]);
        expect(await queue.drainClaims()).toEqual([{ task_id: 'a', worker_id: 'w1', claimed_at: now }]);
        expect(await queue.drainClaims()).toEqual([]);
    });

    it('acks only for the lease owner', async () => {
        await queue.enqueue(payload('a'));
        await queue.dequeue('w1', 10);

        expect(await queue.ack('a', 'w2')).toBe(false);
        expect(await queue.ack('a', 'w1')).toBe(true);
        expect(await queue.ack('a', 'w1')).toBe(false);
        expect(await queue.activeLeases()).toEqual([]);
    });

    it('reclaims an expired lease exactly once', async () => {
        await queue.enqueue(payload('a'));
        await queue.dequeue('w1', 10);

        expect(await queue.reclaimExpired(new Date(now.getTime() + 999))).toEqual([]);

        const later = new Date(now.getTime() + 1000);
        const reclaimed = await queue.reclaimExpired(later);
        expect(reclaimed.map(l => l.task_id)).toEqual(['a']);
        expect(await queue.reclaimExpired(later)).toEqual([]);
    });

    it('releaseWorker expires every lease the worker holds', async () => {
        await queue.enqueue(payload('a'));
        await queue.enqueue(payload('b'));
        await queue.enqueue(payload('c'));
        await queue.dequeue('w1', 10);
        await queue.dequeue('w2', 10);
        await queue.dequeue('w1', 10);

        expect(await queue.releaseWorker('w1', 'worker stopped')).toBe(2);

        const reclaimed = await queue.reclaimExpired(now);
        expect(reclaimed.map(l => [l.task_id, l.reason])).toEqual([
            ['a', 'worker stopped'],
            ['c', 'worker stopped'],
        ]);
        expect((await queue.activeLeases()).map(l => l.task_id)).toEqual(['b']);
    });

    it('close wakes blocked consumers with NO_WORK and rejects enqueue', async () => {
        const pending = queue.dequeue('w1', 5000);
        await queue.close();
        expect(await pending).toBe(NO_WORK);
        await expect(queue.enqueue(payload('a'))).rejects.toThrow('work queue is closed');
    });
});
