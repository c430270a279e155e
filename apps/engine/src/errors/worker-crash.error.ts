import { SwarmlineError } from './swarmline.error';

export class WorkerCrashError extends SwarmlineError {
    readonly code = 'WORKER_CRASH';

    constructor(
        public readonly workerId: string,
        detail: string,
    ) {
        super(`Worker ${workerId} lost: ${detail}`);
    }
}
