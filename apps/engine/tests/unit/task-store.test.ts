import { taskStatus } from '../../src/db/task.entity';
import {
    DependencyCycleError,
    InvalidTransitionError,
    TaskNotFoundError,
    UnknownDependencyError,
} from '../../src/errors';
import { TaskStore } from '../../src/repositories/task-store';
import { steppingClock, taskInput } from '../helpers/tasks';

describe('TaskStore', () => {
    let store: TaskStore;

    beforeEach(() => {
        store = new TaskStore(steppingClock());
    });

    describe('upsert', () => {
        it('inserts a pending record with no attempts', () => {
            const task = store.upsert(taskInput('a'));
            expect(task.status).toBe(taskStatus.PENDING);
            expect(task.attempts).toBe(0);
            expect(task.worker_id).toBeNull();
            expect(store.size).toBe(1);
        });

        it('removes duplicate dependencies', () => {
            store.upsert(taskInput('a'));
            const b = store.upsert(taskInput('b', { dependencies: ['a', 'a'] }));
            expect(b.dependencies).toEqual(['a']);
        });

        it('rejects an unknown dependency and stores nothing', () => {
            expect(() => store.upsert(taskInput('b', { dependencies: ['missing'] }))).toThrow(UnknownDependencyError);
            expect(store.has('b')).toBe(false);
        });

        it('rejects a self-dependency as a cycle', () => {
            const err = (() => {
                try {
                    store.upsert(taskInput('a', { dependencies: ['a'] }));
                } catch (e) {
                    return e;
                }
                return null;
            })();
            expect(err).toBeInstanceOf(DependencyCycleError);
            expect(err).toMatchObject({ code: 'DEPENDENCY_CYCLE', cycle: ['a', 'a'] });
            expect(store.has('a')).toBe(false);
        });

        it('rejects a replacement that would close a cycle', () => {
            store.upsert(taskInput('a'));
            store.upsert(taskInput('b', { dependencies: ['a'] }));
            expect(() => store.upsert(taskInput('a', { dependencies: ['b'] }))).toThrow(DependencyCycleError);
            expect(store.get('a')?.dependencies).toEqual([]);
        });

        it('replaces the attributes of a pending task', () => {
            store.upsert(taskInput('a'));
            const replaced = store.upsert(taskInput('a', { title: 'Renamed', priority: 'high' }));
            expect(replaced.title).toBe('Renamed');
            expect(replaced.priority).toBe('high');
            expect(store.size).toBe(1);
        });

        it('refuses to replace a task that left pending', () => {
            store.upsert(taskInput('a'));
            store.transition('a', taskStatus.QUEUED);
            expect(() => store.upsert(taskInput('a'))).toThrow(InvalidTransitionError);
        });
    });

    describe('transition', () => {
        beforeEach(() => {
            store.upsert(taskInput('a'));
        });

        it('follows pending → queued → in_progress → completed', () => {
            store.transition('a', taskStatus.QUEUED);
            const running = store.transition('a', taskStatus.IN_PROGRESS, { worker_id: 'w1' });
            expect(running.worker_id).toBe('w1');

            const done = store.transition('a', taskStatus.COMPLETED);
            expect(done.status).toBe(taskStatus.COMPLETED);
            expect(done.worker_id).toBeNull();
        });

        it('requires an owner for in_progress', () => {
            store.transition('a', taskStatus.QUEUED);
            expect(() => store.transition('a', taskStatus.IN_PROGRESS)).toThrow(InvalidTransitionError);
        });

        it('rejects moves outside the table', () => {
            expect(() => store.transition('a', taskStatus.COMPLETED)).toThrow(InvalidTransitionError);
            expect(() => store.transition('a', taskStatus.IN_PROGRESS, { worker_id: 'w1' })).toThrow(InvalidTransitionError);
        });

        it('fails a pending task only through propagation', () => {
            expect(() => store.transition('a', taskStatus.FAILED)).toThrow(InvalidTransitionError);
            const failed = store.transition('a', taskStatus.FAILED, {}, { propagated: true });
            expect(failed.status).toBe(taskStatus.FAILED);
        });

        it('requeues a failed task only below the retry bound', () => {
            store.transition('a', taskStatus.QUEUED);
            store.transition('a', taskStatus.IN_PROGRESS, { worker_id: 'w1' });
            store.transition('a', taskStatus.FAILED, { attempts: 3, retry_at: new Date(0) });

            expect(() => store.transition('a', taskStatus.QUEUED, {}, { retryBound: 3 })).toThrow(InvalidTransitionError);
            expect(() => store.transition('a', taskStatus.QUEUED)).toThrow(InvalidTransitionError);
            const queued = store.transition('a', taskStatus.QUEUED, {}, { retryBound: 4 });
            expect(queued.retry_at).toBeNull();
        });

        it('throws TaskNotFoundError for unknown ids', () => {
            expect(() => store.transition('nope', taskStatus.QUEUED)).toThrow(TaskNotFoundError);
        });
    });

    it('lists in creation order and filters by status', () => {
        store.upsert(taskInput('c'));
        store.upsert(taskInput('a'));
        store.upsert(taskInput('b'));
        store.transition('a', taskStatus.QUEUED);

        expect(store.list().map(t => t.id)).toEqual(['c', 'a', 'b']);
        expect(store.list(taskStatus.PENDING).map(t => t.id)).toEqual(['c', 'b']);
        expect(store.list([taskStatus.QUEUED, taskStatus.PENDING]).map(t => t.id)).toEqual(['c', 'a', 'b']);
        expect(store.count(taskStatus.QUEUED)).toBe(1);
    });

    it('hands out frozen snapshots', () => {
        store.upsert(taskInput('a'));
        const snapshot = store.snapshot();
        expect(Object.isFrozen(snapshot)).toBe(true);
        expect(Object.isFrozen(snapshot[0])).toBe(true);

        store.transition('a', taskStatus.QUEUED);
        expect(snapshot[0].status).toBe(taskStatus.PENDING);
    });

    it('tracks dirty ids until taken', () => {
        store.upsert(taskInput('a'));
        store.upsert(taskInput('b'));
        expect(store.takeDirty()).toEqual(['a', 'b']);
        expect(store.takeDirty()).toEqual([]);

        store.markDirty(['a', 'ghost']);
        expect(store.takeDirty()).toEqual(['a']);
    });

    it('restores in-flight records as queued without an owner', () => {
        const now = new Date(0);
        const base = { ...taskInput('x'), attempts: 1, error: null, retry_at: null, created_at: now, updated_at: now };
        store.restore([
            { ...base, id: 'x', status: taskStatus.IN_PROGRESS, worker_id: 'dead' },
            { ...base, id: 'y', status: taskStatus.QUEUED, worker_id: null },
            { ...base, id: 'z', status: taskStatus.COMPLETED, worker_id: null },
        ]);

        expect(store.get('x')).toMatchObject({ status: taskStatus.QUEUED, worker_id: null, attempts: 1 });
        expect(store.get('y')?.status).toBe(taskStatus.QUEUED);
        expect(store.get('z')?.status).toBe(taskStatus.COMPLETED);
    });
});
