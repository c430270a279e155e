import { taskStatus } from '../../src/db/task.entity';
import { findCycle, resolveReady, transitiveDependents } from '../../src/services/dependency-resolver';
import { TaskStore } from '../../src/repositories/task-store';
import { steppingClock, taskInput } from '../helpers/tasks';

function complete(store: TaskStore, id: string): void {
    store.transition(id, taskStatus.QUEUED);
    store.transition(id, taskStatus.IN_PROGRESS, { worker_id: 'w1' });
    store.transition(id, taskStatus.COMPLETED);
}

describe('resolveReady', () => {
    let store: TaskStore;

    beforeEach(() => {
        store = new TaskStore(steppingClock());
    });

    it('returns A and B first, then C once both completed', () => {
        store.upsert(taskInput('A'));
        store.upsert(taskInput('B'));
        store.upsert(taskInput('C', { dependencies: ['A', 'B'] }));

        expect(resolveReady(store.snapshot()).map(t => t.id)).toEqual(['A', 'B']);

        complete(store, 'A');
        expect(resolveReady(store.snapshot()).map(t => t.id)).toEqual(['B']);

        complete(store, 'B');
        expect(resolveReady(store.snapshot()).map(t => t.id)).toEqual(['C']);
    });

    it('orders by priority, then creation order', () => {
        store.upsert(taskInput('low-1', { priority: 'low' }));
        store.upsert(taskInput('med-1'));
        store.upsert(taskInput('high-1', { priority: 'high' }));
        store.upsert(taskInput('med-2'));
        store.upsert(taskInput('high-2', { priority: 'high' }));

        expect(resolveReady(store.snapshot()).map(t => t.id)).toEqual(['high-1', 'high-2', 'med-1', 'med-2', 'low-1']);
    });

    it('skips tasks that already left pending', () => {
        store.upsert(taskInput('A'));
        store.transition('A', taskStatus.QUEUED);
        expect(resolveReady(store.snapshot())).toEqual([]);
    });

    it('never offers a task whose dependency failed', () => {
        store.upsert(taskInput('A'));
        store.upsert(taskInput('B', { dependencies: ['A'] }));
        store.transition('A', taskStatus.QUEUED);
        store.transition('A', taskStatus.IN_PROGRESS, { worker_id: 'w1' });
        store.transition('A', taskStatus.FAILED);

        expect(resolveReady(store.snapshot())).toEqual([]);
    });

    it('is deterministic for the same snapshot', () => {
        store.upsert(taskInput('x', { priority: 'low' }));
        store.upsert(taskInput('y', { priority: 'high' }));
        const snapshot = store.snapshot();
        expect(resolveReady(snapshot)).toEqual(resolveReady(snapshot));
    });
});

describe('findCycle', () => {
    it('returns null for a DAG', () => {
        expect(findCycle([
            { id: 'a', dependencies: [] },
            { id: 'b', dependencies: ['a'] },
            { id: 'c', dependencies: ['a', 'b'] },
        ])).toBeNull();
    });

    it('returns the cycle path closed on its first id', () => {
        expect(findCycle([
            { id: 'a', dependencies: ['c'] },
            { id: 'b', dependencies: ['a'] },
            { id: 'c', dependencies: ['b'] },
        ])).toEqual(['a', 'c', 'b', 'a']);
    });

    it('ignores edges to ids outside the snapshot', () => {
        expect(findCycle([{ id: 'a', dependencies: ['elsewhere'] }])).toBeNull();
    });
});

describe('transitiveDependents', () => {
    it('walks direct and indirect dependents in creation order', () => {
        const store = new TaskStore(steppingClock());
        store.upsert(taskInput('root'));
        store.upsert(taskInput('side'));
        store.upsert(taskInput('child', { dependencies: ['root'] }));
        store.upsert(taskInput('grandchild', { dependencies: ['child', 'side'] }));

        expect(transitiveDependents(store.snapshot(), 'root').map(t => t.id)).toEqual(['child', 'grandchild']);
        expect(transitiveDependents(store.snapshot(), 'side').map(t => t.id)).toEqual(['grandchild']);
        expect(transitiveDependents(store.snapshot(), 'grandchild')).toEqual([]);
    });
});
