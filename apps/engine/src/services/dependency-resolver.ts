import { TaskPriority } from '@swarmline/sdk';
import { TaskRecord, taskStatus } from '../db/task.entity';

export type TaskSnapshot = readonly Readonly<TaskRecord>[];

const PRIORITY_RANK: Record<TaskPriority, number> = {
    high: 0,
    medium: 1,
    low: 2,
};

/**
 * Ready set for a snapshot: pending tasks whose dependencies are all
 * completed, ordered high → medium → low. The snapshot is in creation order
 * and Array.prototype.sort is stable, so ties keep oldest-first.
 */
export function resolveReady(snapshot: TaskSnapshot): Readonly<TaskRecord>[] {
    const statusById = new Map(snapshot.map(t => [t.id, t.status]));

    return snapshot
        .filter(task =>
            task.status === taskStatus.PENDING &&
            task.dependencies.every(dep => statusById.get(dep) === taskStatus.COMPLETED),
        )
        .sort((a, b) => PRIORITY_RANK[a.priority] - PRIORITY_RANK[b.priority]);
}

type Edges = ReadonlyMap<string, readonly string[]>;

// Iterative DFS; returns the cycle as a path that starts and ends on the same id.
function findCycleIn(edges: Edges, roots: Iterable<string>): string[] | null {
    const done = new Set<string>();
    const onPath = new Set<string>();

    for (const root of roots) {
        if (done.has(root)) continue;

        const path: string[] = [];
        const stack: { id: string; next: number }[] = [{ id: root, next: 0 }];
        onPath.add(root);
        path.push(root);

        while (stack.length > 0) {
            const frame = stack[stack.length - 1];
            const deps = edges.get(frame.id) ?? [];

            if (frame.next >= deps.length) {
                stack.pop();
                path.pop();
                onPath.delete(frame.id);
                done.add(frame.id);
                continue;
            }

            const dep = deps[frame.next++];
            if (onPath.has(dep)) {
                return [...path.slice(path.indexOf(dep)), dep];
            }
            if (!done.has(dep) && edges.has(dep)) {
                onPath.add(dep);
                path.push(dep);
                stack.push({ id: dep, next: 0 });
            }
        }
    }

    return null;
}

export function findCycle(snapshot: readonly Pick<TaskRecord, 'id' | 'dependencies'>[]): string[] | null {
    const edges = new Map(snapshot.map(t => [t.id, t.dependencies]));
    return findCycleIn(edges, edges.keys());
}

/**
 * Cycle that `candidate` would close if its edges replaced the current ones,
 * or null. Only paths through the candidate are explored.
 */
export function findCycleWith(snapshot: readonly Pick<TaskRecord, 'id' | 'dependencies'>[], candidate: Pick<TaskRecord, 'id' | 'dependencies'>): string[] | null {
    const edges = new Map(snapshot.map(t => [t.id, t.dependencies]));
    edges.set(candidate.id, candidate.dependencies);
    return findCycleIn(edges, [candidate.id]);
}

/**
 * Every task that depends on `id` directly or transitively, in creation order.
 */
export function transitiveDependents(snapshot: TaskSnapshot, id: string): Readonly<TaskRecord>[] {
    const dependents = new Map<string, string[]>();
    for (const task of snapshot) {
        for (const dep of task.dependencies) {
            const list = dependents.get(dep) ?? [];
            list.push(task.id);
            dependents.set(dep, list);
        }
    }

    const seen = new Set<string>();
    const queue = [id];
    while (queue.length > 0) {
        const current = queue.shift();
        if (current === undefined) break;
        for (const next of dependents.get(current) ?? []) {
            if (!seen.has(next)) {
                seen.add(next);
                queue.push(next);
            }
        }
    }

    return snapshot.filter(t => seen.has(t.id));
}
