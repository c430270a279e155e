import { SwarmlineError } from './swarmline.error';

export class TaskNotFoundError extends SwarmlineError {
    readonly code = 'TASK_NOT_FOUND';

    constructor(public readonly taskId: string) {
        super(`Task ${taskId} not found`);
    }
}
