import { SwarmlineError } from './swarmline.error';

export class ScaleLimitExceededError extends SwarmlineError {
    readonly code = 'SCALE_LIMIT';

    constructor(public readonly ceiling: number) {
        super(`Worker pool is at its ceiling of ${ceiling}`);
    }
}
