export enum workerStatus {
    STARTING = 'starting',
    IDLE = 'idle',
    BUSY = 'busy',
    UNHEALTHY = 'unhealthy',
    STOPPED = 'stopped',
}

/** Token spend and its price in USD. */
export interface CostTotals {
    input_tokens: number;
    output_tokens: number;
    cost: number;
}

export interface WorkerUsage extends CostTotals {
    tasks_completed: number;
    tasks_failed: number;
    busy_ms: number;
}

/**
 * Live worker tracked by the pool manager.
 * current_task_id is non-null iff status is BUSY.
 */
export interface WorkerRecord {
    id: string;
    model: string;
    status: workerStatus;
    current_task_id: string | null;
    last_heartbeat: Date | null;
    usage: WorkerUsage;
    started_at: Date;
    idle_since: Date | null;
}

export function emptyUsage(): WorkerUsage {
    return { tasks_completed: 0, tasks_failed: 0, busy_ms: 0, input_tokens: 0, output_tokens: 0, cost: 0 };
}

export function addCost(total: CostTotals, more: CostTotals): CostTotals {
    return {
        input_tokens: total.input_tokens + more.input_tokens,
        output_tokens: total.output_tokens + more.output_tokens,
        cost: total.cost + more.cost,
    };
}
