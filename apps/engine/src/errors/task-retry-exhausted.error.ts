import { SwarmlineError } from './swarmline.error';

export class TaskRetryExhaustedError extends SwarmlineError {
    readonly code = 'MAX_RETRIES_EXCEEDED';

    constructor(
        public readonly taskId: string,
        public readonly attempts: number,
        lastFailure: string,
    ) {
        super(`Task ${taskId} exceeded max retries after ${attempts} attempts: ${lastFailure}`);
    }
}
