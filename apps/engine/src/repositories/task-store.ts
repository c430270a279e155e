import { TaskInput, TaskRecord, taskStatus } from '../db/task.entity';
import {
    DependencyCycleError,
    InvalidTransitionError,
    TaskNotFoundError,
    UnknownDependencyError,
} from '../errors';
import { findCycleWith, TaskSnapshot } from '../services/dependency-resolver';

const LEGAL_TRANSITIONS: Record<taskStatus, readonly taskStatus[]> = {
    [taskStatus.PENDING]: [taskStatus.QUEUED, taskStatus.FAILED],
    [taskStatus.QUEUED]: [taskStatus.IN_PROGRESS],
    [taskStatus.IN_PROGRESS]: [taskStatus.COMPLETED, taskStatus.FAILED],
    [taskStatus.COMPLETED]: [],
    [taskStatus.FAILED]: [taskStatus.QUEUED],
};

export type TransitionPatch = Partial<Pick<TaskRecord, 'worker_id' | 'attempts' | 'error' | 'retry_at'>>;

export interface TransitionOptions {
    retryBound?: number;        // guards FAILED → QUEUED
    propagated?: boolean;       // required for PENDING → FAILED
}

function freeze(record: TaskRecord): Readonly<TaskRecord> {
    return Object.freeze({
        ...record,
        target_paths: [...record.target_paths],
        dependencies: [...record.dependencies],
        error: record.error ? { ...record.error } : null,
    });
}

/**
 * Authoritative task map and dependency edges. Every mutation runs
 * synchronously on the scheduler, the single writer, so readers always
 * observe a consistent DAG. Iteration order of the map is creation order.
 */
export class TaskStore {
    private tasks = new Map<string, TaskRecord>();
    private dirty = new Set<string>();

    constructor(private readonly now: () => Date = () => new Date()) { }

    upsert(input: TaskInput): Readonly<TaskRecord> {
        const dependencies = Array.from(new Set(input.dependencies));
        const existing = this.tasks.get(input.id);

        if (existing && existing.status !== taskStatus.PENDING) {
            throw new InvalidTransitionError(input.id, existing.status, existing.status, 'only pending tasks can be replaced');
        }

        for (const dep of dependencies) {
            if (dep !== input.id && !this.tasks.has(dep)) {
                throw new UnknownDependencyError(input.id, dep);
            }
        }

        const cycle = findCycleWith(this.snapshot(), { id: input.id, dependencies });
        if (cycle) {
            throw new DependencyCycleError(cycle);
        }

        const now = this.now();
        const record: TaskRecord = existing
            ? {
                ...existing,
                title: input.title,
                instruction: input.instruction,
                target_paths: [...input.target_paths],
                branch: input.branch,
                priority: input.priority,
                dependencies,
                updated_at: now,
            }
            : {
                id: input.id,
                title: input.title,
                instruction: input.instruction,
                target_paths: [...input.target_paths],
                branch: input.branch,
                priority: input.priority,
                status: taskStatus.PENDING,
                dependencies,
                attempts: 0,
                worker_id: null,
                error: null,
                retry_at: null,
                created_at: now,
                updated_at: now,
            };

        this.tasks.set(record.id, record);
        this.dirty.add(record.id);
        return freeze(record);
    }

    get(id: string): Readonly<TaskRecord> | undefined {
        const record = this.tasks.get(id);
        return record ? freeze(record) : undefined;
    }

    has(id: string): boolean {
        return this.tasks.has(id);
    }

    list(status?: taskStatus | readonly taskStatus[]): Readonly<TaskRecord>[] {
        const wanted = status === undefined ? null : new Set<taskStatus>(typeof status === 'string' ? [status] : status);
        const out: Readonly<TaskRecord>[] = [];
        for (const record of this.tasks.values()) {
            if (!wanted || wanted.has(record.status)) {
                out.push(freeze(record));
            }
        }
        return out;
    }

    count(status: taskStatus): number {
        let n = 0;
        for (const record of this.tasks.values()) {
            if (record.status === status) n++;
        }
        return n;
    }

    get size(): number {
        return this.tasks.size;
    }

    snapshot(): TaskSnapshot {
        return Object.freeze(this.list());
    }

    transition(id: string, to: taskStatus, patch: TransitionPatch = {}, opts: TransitionOptions = {}): Readonly<TaskRecord> {
        const record = this.tasks.get(id);
        if (!record) {
            throw new TaskNotFoundError(id);
        }

        const from = record.status;
        if (!LEGAL_TRANSITIONS[from].includes(to)) {
            throw new InvalidTransitionError(id, from, to);
        }
        if (from === taskStatus.PENDING && to === taskStatus.FAILED && !opts.propagated) {
            throw new InvalidTransitionError(id, from, to, 'pending tasks only fail through dependency propagation');
        }
        if (from === taskStatus.FAILED && to === taskStatus.QUEUED) {
            const attempts = patch.attempts ?? record.attempts;
            if (opts.retryBound === undefined || attempts >= opts.retryBound) {
                throw new InvalidTransitionError(id, from, to, `attempts ${attempts} reached the retry bound`);
            }
        }

        const workerId = to === taskStatus.IN_PROGRESS ? patch.worker_id ?? null : null;
        if (to === taskStatus.IN_PROGRESS && !workerId) {
            throw new InvalidTransitionError(id, from, to, 'an owning worker is required');
        }

        const updated: TaskRecord = {
            ...record,
            ...patch,
            status: to,
            worker_id: workerId,
            retry_at: to === taskStatus.FAILED ? patch.retry_at ?? null : null,
            error: to === taskStatus.COMPLETED ? null : patch.error ?? record.error,
            updated_at: this.now(),
        };

        this.tasks.set(id, updated);
        this.dirty.add(id);
        return freeze(updated);
    }

    /**
     * Bulk load from persistence. QUEUED and IN_PROGRESS records come back
     * QUEUED without an owner: their leases ended with the previous process.
     */
    restore(records: TaskRecord[]): void {
        for (const record of records) {
            const inFlight = record.status === taskStatus.QUEUED || record.status === taskStatus.IN_PROGRESS;
            this.tasks.set(record.id, {
                ...record,
                target_paths: [...record.target_paths],
                dependencies: [...record.dependencies],
                status: inFlight ? taskStatus.QUEUED : record.status,
                worker_id: null,
            });
        }
    }

    takeDirty(): string[] {
        const ids = Array.from(this.dirty);
        this.dirty.clear();
        return ids;
    }

    markDirty(ids: Iterable<string>): void {
        for (const id of ids) {
            if (this.tasks.has(id)) this.dirty.add(id);
        }
    }
}
