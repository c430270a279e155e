import { taskStatus } from '../../src/db/task.entity';
import { InMemoryWorkQueue } from '../../src/queue';
import { TaskStore } from '../../src/repositories/task-store';
import { DEPENDENCY_FAILED, FailurePolicy } from '../../src/services/failure-policy';
import { Reaper } from '../../src/services/reaper';
import { toPayload } from '../../src/services/scheduler';
import { steppingClock, taskInput } from '../helpers/tasks';

describe('FailurePolicy', () => {
    let store: TaskStore;
    let policy: FailurePolicy;
    const now = new Date(Date.UTC(2026, 0, 1));

    function start(id: string, worker = 'w1'): void {
        store.transition(id, taskStatus.QUEUED);
        store.transition(id, taskStatus.IN_PROGRESS, { worker_id: worker });
    }

    beforeEach(() => {
        store = new TaskStore(steppingClock());
        policy = new FailurePolicy(store, { maxRetries: 2, retryBackoffMs: 100, random: () => 0.5 });
    });

    it('schedules a retry below the bound', () => {
        store.upsert(taskInput('a'));
        start('a');

        const outcome = policy.recordFailure('a', { code: 'TASK_FAILED', message: 'boom' }, now);

        expect(outcome.action).toBe('retry_scheduled');
        expect(outcome.task).toMatchObject({
            status: taskStatus.FAILED,
            attempts: 1,
            worker_id: null,
            error: { code: 'TASK_FAILED', message: 'boom' },
            retry_at: new Date(now.getTime() + 100),
        });
        expect(policy.waitingRetries()).toBe(1);
        expect(policy.dueRetries(now)).toEqual([]);
        expect(policy.dueRetries(new Date(now.getTime() + 100)).map(t => t.id)).toEqual(['a']);
    });

    it('fails for good at the bound and propagates to pending dependents', () => {
        store.upsert(taskInput('a'));
        store.upsert(taskInput('b', { dependencies: ['a'] }));
        store.upsert(taskInput('c', { dependencies: ['b'] }));
        store.upsert(taskInput('unrelated'));

        start('a');
        policy.recordFailure('a', { code: 'TASK_FAILED', message: 'first' }, now);
        store.transition('a', taskStatus.QUEUED, {}, { retryBound: 2 });
        store.transition('a', taskStatus.IN_PROGRESS, { worker_id: 'w2' });

        const outcome = policy.recordFailure('a', { code: 'TASK_FAILED', message: 'second' }, now);

        expect(outcome.action).toBe('exhausted');
        expect(outcome.propagated).toEqual(['b', 'c']);
        expect(store.get('a')).toMatchObject({
            status: taskStatus.FAILED,
            attempts: 2,
            retry_at: null,
            error: { code: 'MAX_RETRIES_EXCEEDED', message: 'Task a exceeded max retries after 2 attempts: second' },
        });
        expect(store.get('b')?.error).toEqual({ code: DEPENDENCY_FAILED, message: 'dependency a failed' });
        expect(store.get('c')?.status).toBe(taskStatus.FAILED);
        expect(store.get('unrelated')?.status).toBe(taskStatus.PENDING);
        expect(policy.waitingRetries()).toBe(0);
    });
});

describe('FailurePolicy.failOrphans', () => {
    it('fails new pending tasks whose dependency already failed for good', () => {
        const store = new TaskStore(steppingClock());
        const policy = new FailurePolicy(store, { maxRetries: 1, retryBackoffMs: 0 });
        store.upsert(taskInput('a'));
        store.transition('a', taskStatus.QUEUED);
        store.transition('a', taskStatus.IN_PROGRESS, { worker_id: 'w1' });
        policy.recordFailure('a', { code: 'TASK_FAILED', message: 'boom' }, new Date(Date.UTC(2026, 0, 1)));

        store.upsert(taskInput('b', { dependencies: ['a'] }));
        store.upsert(taskInput('c', { dependencies: ['b'] }));
        store.upsert(taskInput('free'));

        expect(policy.failOrphans(['b', 'c', 'free'])).toEqual(['b', 'c']);
        expect(store.get('c')?.error).toEqual({ code: DEPENDENCY_FAILED, message: 'dependency b failed' });
        expect(store.get('free')?.status).toBe(taskStatus.PENDING);
    });
});

describe('Reaper', () => {
    let store: TaskStore;
    let queue: InMemoryWorkQueue;
    let reaper: Reaper;
    const t0 = new Date(Date.UTC(2026, 0, 1));

    beforeEach(() => {
        store = new TaskStore(steppingClock());
        queue = new InMemoryWorkQueue({ visibilityTimeoutMs: 1000, now: () => t0 });
        reaper = new Reaper(queue, store, new FailurePolicy(store, { maxRetries: 3, retryBackoffMs: 0 }));
    });

    afterEach(async () => {
        await queue.close();
    });

    async function dispatch(id: string, worker: string): Promise<void> {
        store.upsert(taskInput(id));
        await queue.enqueue(toPayload(store.transition(id, taskStatus.QUEUED)));
        await queue.dequeue(worker, 10);
        store.transition(id, taskStatus.IN_PROGRESS, { worker_id: worker });
    }

    it('requeues tasks whose lease expired', async () => {
        await dispatch('a', 'dead-worker');

        const reaped = await reaper.reap(new Date(t0.getTime() + 1000));

        expect(reaped).toEqual([{ id: 'a', worker_id: 'dead-worker', attempts: 1, action: 'requeued' }]);
        expect(store.get('a')).toMatchObject({
            status: taskStatus.FAILED,
            error: { code: 'WORKER_CRASH', message: 'Worker dead-worker lost: visibility timeout elapsed' },
        });
    });

    it('does not touch active leases', async () => {
        await dispatch('a', 'w1');
        expect(await reaper.reap(new Date(t0.getTime() + 999))).toEqual([]);
        expect(store.get('a')?.status).toBe(taskStatus.IN_PROGRESS);
    });

    it('reclaims each released lease once', async () => {
        await dispatch('a', 'w1');
        await queue.releaseWorker('w1', 'worker stopped');

        expect((await reaper.reap(t0)).map(r => r.id)).toEqual(['a']);
        expect(await reaper.reap(t0)).toEqual([]);
    });

    it('ignores a lease whose task already completed', async () => {
        await dispatch('a', 'w1');
        store.transition('a', taskStatus.COMPLETED);

        expect(await reaper.reap(new Date(t0.getTime() + 1000))).toEqual([]);
        expect(store.get('a')?.status).toBe(taskStatus.COMPLETED);
    });

    it('applies a claim that landed after the tick read claims before judging its lease', async () => {
        store.upsert(taskInput('a'));
        await queue.enqueue(toPayload(store.transition('a', taskStatus.QUEUED)));
        await queue.dequeue('w1', 10);
        await queue.releaseWorker('w1', 'worker stopped');

        const settling = new Reaper(queue, store, new FailurePolicy(store, { maxRetries: 3, retryBackoffMs: 0 }), async () => {
            for (const claim of await queue.drainClaims()) {
                store.transition(claim.task_id, taskStatus.IN_PROGRESS, { worker_id: claim.worker_id });
            }
        });

        expect(await settling.reap(t0)).toEqual([{ id: 'a', worker_id: 'w1', attempts: 1, action: 'requeued' }]);
        expect(store.get('a')).toMatchObject({
            status: taskStatus.FAILED,
            worker_id: null,
            error: { code: 'WORKER_CRASH', message: 'Worker w1 lost: worker stopped' },
        });
    });

    it('fails tasks that exceeded max retries', async () => {
        await dispatch('a', 'w1');
        const failures = new FailurePolicy(store, { maxRetries: 1, retryBackoffMs: 0 });
        const strict = new Reaper(queue, store, failures);

        const reaped = await strict.reap(new Date(t0.getTime() + 1000));

        expect(reaped).toEqual([{ id: 'a', worker_id: 'w1', attempts: 1, action: 'failed' }]);
        expect(store.get('a')?.error?.code).toBe('MAX_RETRIES_EXCEEDED');
    });
});
