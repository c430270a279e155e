import { TaskPriority } from '@swarmline/sdk';

/**
 * Lifecycle states for decomposed tasks.
 * Tasks progress: PENDING → QUEUED → IN_PROGRESS → COMPLETED/FAILED.
 * FAILED returns to QUEUED while retries remain.
 */
export enum taskStatus {
    PENDING = 'pending',
    QUEUED = 'queued',
    IN_PROGRESS = 'in_progress',
    COMPLETED = 'completed',
    FAILED = 'failed',
}

export interface TaskError {
    code: string;
    message: string;
}

/**
 * One unit of decomposed work. Records are never deleted; terminal
 * statuses keep the audit trail.
 */
export interface TaskRecord {
    id: string;
    title: string;
    instruction: string;
    target_paths: string[];
    branch: string;
    priority: TaskPriority;
    status: taskStatus;
    dependencies: string[];
    attempts: number;
    worker_id: string | null;   // set exactly while IN_PROGRESS
    error: TaskError | null;
    retry_at: Date | null;      // failed task waiting for its retry slot
    created_at: Date;
    updated_at: Date;
}

export type TaskInput = Pick<TaskRecord, 'id' | 'title' | 'instruction' | 'target_paths' | 'branch' | 'priority' | 'dependencies'>;

export const ACTIVE_STATUSES: readonly taskStatus[] = [
    taskStatus.PENDING,
    taskStatus.QUEUED,
    taskStatus.IN_PROGRESS,
];
