import { SwarmlineError } from './swarmline.error';

export class WorkerNotFoundError extends SwarmlineError {
    readonly code = 'WORKER_NOT_FOUND';

    constructor(public readonly workerId: string) {
        super(`Worker ${workerId} not found`);
    }
}
