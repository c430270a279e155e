export interface ScalingPolicy {
    ceiling: number;
    floor: number;
    tasksPerWorker: number;
}

/**
 * desired = min(ceiling, max(floor, ceil(depth / tasksPerWorker)))
 */
export function desiredWorkerCount(queueDepth: number, policy: ScalingPolicy): number {
    const byDepth = Math.ceil(Math.max(queueDepth, 0) / policy.tasksPerWorker);
    return Math.min(policy.ceiling, Math.max(policy.floor, byDepth));
}
