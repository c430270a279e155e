import { TaskInput, TaskRecord, taskStatus } from '../../src/db/task.entity';

export function taskInput(id: string, overrides: Partial<TaskInput> = {}): TaskInput {
    return {
        id,
        title: `Task ${id}`,
        instruction: `do ${id}`,
        target_paths: ['src'],
        branch: `feature/${id}`,
        priority: 'medium',
        dependencies: [],
        ...overrides,
    };
}

/** Deterministic clock that advances one millisecond per call. */
export function steppingClock(start = Date.UTC(2026, 0, 1)): () => Date {
    let t = start;
    return () => new Date(t++);
}

export function taskRecord(id: string, overrides: Partial<TaskRecord> = {}): TaskRecord {
    const at = new Date(Date.UTC(2026, 0, 1));
    return {
        ...taskInput(id),
        status: taskStatus.PENDING,
        attempts: 0,
        worker_id: null,
        error: null,
        retry_at: null,
        created_at: at,
        updated_at: at,
        ...overrides,
    };
}
