import { WorkerNotFoundError } from '../../src/errors';
import { InMemoryResultChannel, InMemoryWorkQueue } from '../../src/queue';
import { InProcessWorkerRuntime } from '../../src/runtime/in-process.runtime';
import { Worker } from '../../src/runtime/worker';
import { PriceTable } from '../../src/services/price-table';
import { FakeExecutor } from '../helpers/fake-executor';
import { payload } from '../helpers/payloads';
import { waitUntil } from '../helpers/poll';

describe('Worker', () => {
    let queue: InMemoryWorkQueue;
    let results: InMemoryResultChannel;
    let executor: FakeExecutor;

    function worker(id = 'w1'): Worker {
        return new Worker({ id, model: 'small', queue, results, executor, dequeueTimeoutMs: 20 });
    }

    beforeEach(() => {
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
        jest.spyOn(console, 'warn').mockImplementation(() => undefined);
        jest.spyOn(console, 'error').mockImplementation(() => undefined);
        queue = new InMemoryWorkQueue({ visibilityTimeoutMs: 60_000 });
        results = new InMemoryResultChannel();
        executor = new FakeExecutor();
    });

    afterEach(async () => {
        await queue.close();
        await results.close();
        jest.restoreAllMocks();
    });

    it('executes dequeued tasks and publishes attributed reports', async () => {
        executor.failures.set('b', 1);
        const w = worker();
        w.start();
        await queue.enqueue(payload('a'));
        await queue.enqueue(payload('b'));

        await waitUntil(async () => (await results.size()) === 2);
        await w.stop();

        expect(await results.drain()).toEqual([
            { task_id: 'a', worker_id: 'w1', outcome: 'completed', detail: 'done a by w1' },
            { task_id: 'b', worker_id: 'w1', outcome: 'failed', detail: 'scripted failure of b' },
        ]);
        expect(w.usage).toMatchObject({ tasks_completed: 1, tasks_failed: 1 });
        expect(w.isRunning).toBe(false);
    });

    it('counts the tokens of completed tasks at the price of its model', async () => {
        executor.usage.set('a', { input_tokens: 500_000, output_tokens: 250_000 });
        executor.usage.set('b', { input_tokens: 1_000_000, output_tokens: 0 });
        const prices = new PriceTable([['small', { input: 2, output: 8 }], ['large', { input: 10, output: 40 }]]);
        const w = new Worker({ id: 'w1', model: 'small', queue, results, executor, dequeueTimeoutMs: 20, prices });
        w.start();
        await queue.enqueue(payload('a'));
        await queue.enqueue(payload('b'));
        await queue.enqueue(payload('c'));

        await waitUntil(async () => (await results.size()) === 3);
        await w.stop();

        expect(w.usage).toMatchObject({ tasks_completed: 3, input_tokens: 1_500_000, output_tokens: 250_000, cost: 5 });
    });

    it('counts tokens at no cost without a price table', async () => {
        executor.usage.set('a', { input_tokens: 40, output_tokens: 60 });
        const w = worker();
        w.start();
        await queue.enqueue(payload('a'));

        await waitUntil(async () => (await results.size()) === 1);
        await w.stop();

        expect(w.usage).toMatchObject({ input_tokens: 40, output_tokens: 60, cost: 0 });
    });

    it('lets a graceful stop finish the task in flight and publish its report', async () => {
        executor.delayMs = 200;
        const w = worker();
        w.start();
        await queue.enqueue(payload('a'));
        await waitUntil(() => w.currentTask === 'a');

        await w.stop();

        expect(await results.drain()).toEqual([
            { task_id: 'a', worker_id: 'w1', outcome: 'completed', detail: 'done a by w1' },
        ]);
        expect(w.currentTask).toBeNull();
    });

    it('aborts a task that outlives the graceful stop window', async () => {
        executor.hang.add('a');
        const w = worker();
        w.start();
        await queue.enqueue(payload('a'));
        await waitUntil(() => w.currentTask === 'a');

        await w.stop();
        await waitUntil(() => w.currentTask === null);

        expect(console.warn).toHaveBeenCalledWith('[worker] w1 aborting a');
        expect(await results.size()).toBe(0);
    });

    it('drops the report of a task aborted by a forced stop', async () => {
        executor.hang.add('a');
        const w = worker();
        w.start();
        await queue.enqueue(payload('a'));
        await waitUntil(() => w.currentTask === 'a');

        await w.stop({ force: true });
        await waitUntil(() => w.currentTask === null);

        expect(await results.size()).toBe(0);
        expect((await queue.activeLeases()).map(l => l.worker_id)).toEqual(['w1']);
    });
});

describe('InProcessWorkerRuntime', () => {
    let queue: InMemoryWorkQueue;
    let results: InMemoryResultChannel;
    let runtime: InProcessWorkerRuntime;

    beforeEach(() => {
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
        jest.spyOn(console, 'warn').mockImplementation(() => undefined);
        queue = new InMemoryWorkQueue({ visibilityTimeoutMs: 60_000 });
        results = new InMemoryResultChannel();
        runtime = new InProcessWorkerRuntime({
            queue,
            results,
            executor: new FakeExecutor(),
            dequeueTimeoutMs: 20,
            heartbeatIntervalMs: 10,
        });
    });

    afterEach(async () => {
        await runtime.shutdown();
        await queue.close();
        await results.close();
        jest.restoreAllMocks();
    });

    it('beats for a running worker and stops beating once terminated', async () => {
        const handle = await runtime.start({ id: 'w1', model: 'small' });
        await waitUntil(async () => (await runtime.heartbeat(handle)) !== null);

        await runtime.terminate(handle);

        expect(await runtime.heartbeat(handle)).toBeNull();
        expect(runtime.size).toBe(0);
        await expect(runtime.terminate(handle)).rejects.toBeInstanceOf(WorkerNotFoundError);
    });

    it('refuses a duplicate worker id', async () => {
        await runtime.start({ id: 'w1', model: 'small' });
        await expect(runtime.start({ id: 'w1', model: 'small' })).rejects.toThrow('worker w1 is already running');
    });

    it('exposes per-worker usage', async () => {
        const handle = await runtime.start({ id: 'w1', model: 'small' });
        await queue.enqueue(payload('a'));
        await waitUntil(() => runtime.usage(handle).tasks_completed === 1);
        expect(await results.drain()).toEqual([
            { task_id: 'a', worker_id: 'w1', outcome: 'completed', detail: 'done a by w1' },
        ]);
    });

    it('resolves terminate with the final usage', async () => {
        const handle = await runtime.start({ id: 'w1', model: 'small' });
        await queue.enqueue(payload('a'));
        await waitUntil(() => runtime.usage(handle).tasks_completed === 1);

        const usage = await runtime.terminate(handle);

        expect(usage).toMatchObject({ tasks_completed: 1, tasks_failed: 0 });
    });
});
