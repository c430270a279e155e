import { SwarmlineError } from './swarmline.error';

export class UnknownDependencyError extends SwarmlineError {
    readonly code = 'UNKNOWN_DEPENDENCY';

    constructor(
        public readonly taskId: string,
        public readonly dependencyId: string,
    ) {
        super(`Task ${taskId} depends on unknown task ${dependencyId}`);
    }
}
