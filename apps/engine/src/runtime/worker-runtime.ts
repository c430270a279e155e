import { WorkerUsage } from '../db/worker.entity';

export interface WorkerSpec {
    id: string;
    model: string;
}

export interface WorkerHandle {
    readonly id: string;
    readonly model: string;
}

/**
 * How the pool manager starts and stops workers. The engine ships an
 * in-process implementation; container or process runtimes fit the same
 * shape.
 */
export interface WorkerRuntime {
    start(spec: WorkerSpec): Promise<WorkerHandle>;
    /**
     * Stops the worker and resolves with its final usage. force skips waiting
     * for the in-flight task to wind down.
     */
    terminate(handle: WorkerHandle, opts?: { force?: boolean }): Promise<WorkerUsage>;
    /** Last heartbeat, or null before the first one. */
    heartbeat(handle: WorkerHandle): Promise<Date | null>;
    usage(handle: WorkerHandle): WorkerUsage;
}
