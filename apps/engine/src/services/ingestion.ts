import { TASK_PRIORITIES, TaskPriority } from '@swarmline/sdk';
import { v7 as uuidv7 } from 'uuid';
import { TaskInput, TaskRecord } from '../db/task.entity';
import { TaskDescription } from '../decomposer/decomposer';
import { slugify } from '../decomposer/heuristic.decomposer';
import { DependencyCycleError, InvalidTaskDescriptionError, SwarmlineError } from '../errors';
import { TaskStore } from '../repositories/task-store';
import { findCycle } from './dependency-resolver';

const TAG = '[ingest]';

export interface Rejection {
    key: string | null;
    title: string | null;
    code: string;
    message: string;
}

export interface IngestResult {
    accepted: Readonly<TaskRecord>[];
    rejected: Rejection[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
    return Array.isArray(value) && value.every(v => typeof v === 'string');
}

function isPriority(value: unknown): value is TaskPriority {
    return typeof value === 'string' && TASK_PRIORITIES.some(p => p === value);
}

function nonEmpty(raw: Record<string, unknown>, field: string): string {
    const value = raw[field];
    if (typeof value !== 'string' || value.trim() === '') {
        throw new InvalidTaskDescriptionError(`Field "${field}" must be a non-empty string`);
    }
    return value.trim();
}

/**
 * Shape check for one untrusted description.
 */
export function validateDescription(raw: unknown): TaskDescription {
    if (!isRecord(raw)) {
        throw new InvalidTaskDescriptionError('Task description must be an object');
    }

    const description: TaskDescription = {
        title: nonEmpty(raw, 'title'),
        instruction: nonEmpty(raw, 'instruction'),
    };

    if (raw.key !== undefined) description.key = nonEmpty(raw, 'key');
    if (raw.branch !== undefined) description.branch = nonEmpty(raw, 'branch');

    if (raw.target_paths !== undefined) {
        if (!isStringArray(raw.target_paths)) {
            throw new InvalidTaskDescriptionError('Field "target_paths" must be an array of strings');
        }
        description.target_paths = raw.target_paths;
    }
    if (raw.priority !== undefined) {
        if (!isPriority(raw.priority)) {
            throw new InvalidTaskDescriptionError(`Field "priority" must be one of ${TASK_PRIORITIES.join(', ')}`);
        }
        description.priority = raw.priority;
    }
    if (raw.depends_on !== undefined) {
        if (!isStringArray(raw.depends_on)) {
            throw new InvalidTaskDescriptionError('Field "depends_on" must be an array of strings');
        }
        description.depends_on = raw.depends_on;
    }

    return description;
}

function reject(raw: unknown, err: SwarmlineError): Rejection {
    const key = isRecord(raw) && typeof raw.key === 'string' ? raw.key : null;
    const title = isRecord(raw) && typeof raw.title === 'string' ? raw.title : null;
    console.warn(`${TAG} rejected ${key ?? title ?? 'task'}: ${err.message}`);
    return { key, title, code: err.code, message: err.message };
}

/**
 * Validates a batch and upserts it into the store. Within the batch,
 * descriptions are inserted in dependency order, so a description may
 * reference a later one by key. Rejections never throw.
 */
export function ingest(
    store: TaskStore,
    batch: readonly unknown[],
    newId: () => string = uuidv7,
): IngestResult {
    const accepted: Readonly<TaskRecord>[] = [];
    const rejected: Rejection[] = [];

    const inputs: { raw: unknown; input: TaskInput; key: string | null }[] = [];
    const idByKey = new Map<string, string>();

    for (const raw of batch) {
        let description: TaskDescription;
        try {
            description = validateDescription(raw);
        } catch (err) {
            if (err instanceof SwarmlineError) {
                rejected.push(reject(raw, err));
                continue;
            }
            throw err;
        }

        const id = description.key ?? newId();
        const key = description.key ?? null;
        if (key) idByKey.set(key, id);

        inputs.push({
            raw,
            key,
            input: {
                id,
                title: description.title,
                instruction: description.instruction,
                target_paths: description.target_paths ?? [],
                branch: description.branch ?? `swarm/${slugify(description.title) || id}`,
                priority: description.priority ?? 'medium',
                dependencies: description.depends_on ?? [],
            },
        });
    }

    for (const entry of inputs) {
        entry.input.dependencies = entry.input.dependencies.map(dep => idByKey.get(dep) ?? dep);
    }

    // insert whatever has its in-batch dependencies in place, until nothing moves
    let remaining = inputs;
    let progressed = true;
    while (remaining.length > 0 && progressed) {
        progressed = false;
        const next: typeof inputs = [];
        const pendingIds = new Set(remaining.map(e => e.input.id));

        for (const entry of remaining) {
            const blocked = entry.input.dependencies.some(
                dep => dep !== entry.input.id && pendingIds.has(dep) && !store.has(dep),
            );
            if (blocked) {
                next.push(entry);
                continue;
            }
            try {
                accepted.push(store.upsert(entry.input));
            } catch (err) {
                if (!(err instanceof SwarmlineError)) throw err;
                rejected.push(reject(entry.raw, err));
            }
            pendingIds.delete(entry.input.id);
            progressed = true;
        }
        remaining = next;
    }

    // leftovers wait on each other or on a rejected description
    for (let cycle = findCycle(remaining.map(e => e.input)); cycle; cycle = findCycle(remaining.map(e => e.input))) {
        const members = new Set(cycle);
        for (const entry of remaining) {
            if (members.has(entry.input.id)) {
                rejected.push(reject(entry.raw, new DependencyCycleError(cycle)));
            }
        }
        remaining = remaining.filter(e => !members.has(e.input.id));
    }
    for (const entry of remaining) {
        try {
            accepted.push(store.upsert(entry.input));
        } catch (err) {
            if (!(err instanceof SwarmlineError)) throw err;
            rejected.push(reject(entry.raw, err));
        }
    }

    if (accepted.length > 0) {
        console.log(`${TAG} accepted ${accepted.length} tasks (${rejected.length} rejected)`);
    }
    return { accepted, rejected };
}
