import { TASK_PRIORITIES, TaskPriority } from '@swarmline/sdk';
import { TaskError, TaskRecord, taskStatus } from '../db/task.entity';

/** Where the scheduler writes dirty records after each tick. */
export interface TaskPersistence {
    saveMany(records: readonly Readonly<TaskRecord>[]): Promise<void>;
}

/**
 * The one pg call the repository makes. pg's Pool and PoolClient satisfy
 * it; rows come back unchecked and are validated by fromRow().
 */
export interface Queryable {
    query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
}

const COLUMNS = [
    'id', 'title', 'instruction', 'target_paths', 'branch', 'priority', 'status',
    'dependencies', 'attempts', 'worker_id', 'error', 'retry_at', 'created_at', 'updated_at',
] as const;

const STATUSES: readonly string[] = Object.values(taskStatus);

function isStatus(value: unknown): value is taskStatus {
    return typeof value === 'string' && STATUSES.includes(value);
}

function isPriority(value: unknown): value is TaskPriority {
    return typeof value === 'string' && TASK_PRIORITIES.some(p => p === value);
}

function strings(value: unknown): string[] {
    return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}

function taskError(value: unknown): TaskError | null {
    if (typeof value !== 'object' || value === null) return null;
    const code = 'code' in value && typeof value.code === 'string' ? value.code : 'UNKNOWN';
    const message = 'message' in value && typeof value.message === 'string' ? value.message : '';
    return { code, message };
}

function text(row: Record<string, unknown>, column: string): string {
    const value = row[column];
    if (typeof value !== 'string') {
        throw new Error(`swarm_tasks.${column} must be text, got ${typeof value}`);
    }
    return value;
}

function timestamp(row: Record<string, unknown>, column: string): Date {
    const value = row[column];
    if (!(value instanceof Date)) {
        throw new Error(`swarm_tasks.${column} must be a timestamp`);
    }
    return value;
}

export function fromRow(raw: unknown): TaskRecord {
    if (typeof raw !== 'object' || raw === null) {
        throw new Error('swarm_tasks row must be an object');
    }
    const row: Record<string, unknown> = { ...raw };
    const id = text(row, 'id');

    if (!isStatus(row.status)) {
        throw new Error(`task ${id} has unknown status "${String(row.status)}"`);
    }
    if (!isPriority(row.priority)) {
        throw new Error(`task ${id} has unknown priority "${String(row.priority)}"`);
    }
    return {
        id,
        title: text(row, 'title'),
        instruction: text(row, 'instruction'),
        target_paths: strings(row.target_paths),
        branch: text(row, 'branch'),
        priority: row.priority,
        status: row.status,
        dependencies: strings(row.dependencies),
        attempts: typeof row.attempts === 'number' ? row.attempts : 0,
        worker_id: typeof row.worker_id === 'string' ? row.worker_id : null,
        error: taskError(row.error),
        retry_at: row.retry_at instanceof Date ? row.retry_at : null,
        created_at: timestamp(row, 'created_at'),
        updated_at: timestamp(row, 'updated_at'),
    };
}

export class TaskRepository implements TaskPersistence {
    constructor(private pool: Queryable) { }

    async saveMany(records: readonly Readonly<TaskRecord>[]): Promise<void> {
        if (records.length === 0) return;

        const values: unknown[] = [];
        const tuples = records.map((record, i) => {
            values.push(
                record.id,
                record.title,
                record.instruction,
                JSON.stringify(record.target_paths),
                record.branch,
                record.priority,
                record.status,
                JSON.stringify(record.dependencies),
                record.attempts,
                record.worker_id,
                record.error ? JSON.stringify(record.error) : null,
                record.retry_at,
                record.created_at,
                record.updated_at,
            );
            const base = i * COLUMNS.length;
            return `(${COLUMNS.map((_, c) => `$${base + c + 1}`).join(', ')})`;
        });

        const updates = COLUMNS
            .filter(c => c !== 'id' && c !== 'created_at')
            .map(c => `${c} = EXCLUDED.${c}`)
            .join(', ');

        await this.pool.query(
            `INSERT INTO swarm_tasks (${COLUMNS.join(', ')})
             VALUES ${tuples.join(', ')}
             ON CONFLICT (id) DO UPDATE SET ${updates}`,
            values,
        );
    }

    /** Rows in insertion order, which restore() turns back into creation order. */
    async findAll(): Promise<TaskRecord[]> {
        const res = await this.pool.query('SELECT * FROM swarm_tasks ORDER BY seq ASC');
        return res.rows.map(fromRow);
    }
}
