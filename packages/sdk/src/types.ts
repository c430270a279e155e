export type TaskPriority = 'high' | 'medium' | 'low';

export type TaskOutcome = 'completed' | 'failed';

/**
 * Work queue wire format. One payload per dispatched task.
 */
export interface TaskPayload {
    id: string;
    title: string;
    instruction: string;
    branch: string;
    target_paths: string[];
    priority: TaskPriority;
}

/**
 * Result channel wire format. `worker_id` attributes the report so the
 * scheduler can drop reports from workers that no longer own the task.
 */
export interface ResultPayload {
    task_id: string;
    worker_id: string;
    outcome: TaskOutcome;
    detail: string;
}

export interface TaskContext {
    workerId: string;
    model: string;
    signal?: AbortSignal;
}

/** Tokens a handler spent on one task, as reported by its model provider. */
export interface TokenUsage {
    input_tokens: number;
    output_tokens: number;
}

/** A handler may return just the detail line, or the detail and its token usage. */
export interface TaskOutput {
    detail?: string;
    usage?: TokenUsage;
}

export type TaskHandler = (payload: TaskPayload, ctx: TaskContext) => Promise<string | TaskOutput | void>;

export const TASK_PRIORITIES: readonly TaskPriority[] = ['high', 'medium', 'low'];
