import superjson from 'superjson';
import { ResultPayload, TaskPayload, TASK_PRIORITIES, TaskPriority } from '../types';

const MAX_PAYLOAD_SIZE = 1024 * 1024; // 1MB

export class SerializationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'SerializationError';
    }
}

export function serialize(value: unknown): string {
    if (value === undefined) return '';

    try {
        const stringified = superjson.stringify(value);

        if (Buffer.byteLength(stringified) > MAX_PAYLOAD_SIZE) {
            throw new SerializationError(
                `Payload size exceeds maximum limit of 1MB. Current size: ${(Buffer.byteLength(stringified) / 1024 / 1024).toFixed(2)}MB`
            );
        }

        return stringified;
    } catch (err) {
        if (err instanceof SerializationError) throw err;
        throw new SerializationError(`Failed to serialize data: ${err instanceof Error ? err.message : String(err)}`);
    }
}

export function deserialize<T>(value: string | null | undefined): T | undefined {
    if (!value || value.trim() === '') return undefined;

    try {
        return superjson.parse<T>(value);
    } catch (err) {
        throw new SerializationError(`Failed to deserialize data: ${err instanceof Error ? err.message : String(err)}`);
    }
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireString(obj: Record<string, unknown>, key: string): string {
    const value = obj[key];
    if (typeof value !== 'string') {
        throw new SerializationError(`Field "${key}" must be a string`);
    }
    return value;
}

function isPriority(value: unknown): value is TaskPriority {
    return typeof value === 'string' && TASK_PRIORITIES.some(p => p === value);
}

export function encodeTask(payload: TaskPayload): string {
    return serialize(payload);
}

export function decodeTask(raw: string | null | undefined): TaskPayload {
    const obj = deserialize<unknown>(raw);
    if (!isRecord(obj)) {
        throw new SerializationError('Task payload must be an object');
    }

    const targetPaths = obj.target_paths;
    if (!Array.isArray(targetPaths) || !targetPaths.every((p): p is string => typeof p === 'string')) {
        throw new SerializationError('Field "target_paths" must be an array of strings');
    }
    if (!isPriority(obj.priority)) {
        throw new SerializationError(`Field "priority" must be one of ${TASK_PRIORITIES.join(', ')}`);
    }

    return {
        id: requireString(obj, 'id'),
        title: requireString(obj, 'title'),
        instruction: requireString(obj, 'instruction'),
        branch: requireString(obj, 'branch'),
        target_paths: targetPaths,
        priority: obj.priority,
    };
}

export function encodeResult(report: ResultPayload): string {
    return serialize(report);
}

export function decodeResult(raw: string | null | undefined): ResultPayload {
    const obj = deserialize<unknown>(raw);
    if (!isRecord(obj)) {
        throw new SerializationError('Result payload must be an object');
    }

    const outcome = obj.outcome;
    if (outcome !== 'completed' && outcome !== 'failed') {
        throw new SerializationError('Field "outcome" must be "completed" or "failed"');
    }

    return {
        task_id: requireString(obj, 'task_id'),
        worker_id: requireString(obj, 'worker_id'),
        outcome,
        detail: requireString(obj, 'detail'),
    };
}
