import { SwarmlineError } from './swarmline.error';

export class InvalidTransitionError extends SwarmlineError {
    readonly code = 'INVALID_TRANSITION';

    constructor(
        public readonly taskId: string,
        public readonly from: string,
        public readonly to: string,
        reason?: string,
    ) {
        super(`Task ${taskId}: cannot move ${from} -> ${to}${reason ? ` (${reason})` : ''}`);
    }
}
