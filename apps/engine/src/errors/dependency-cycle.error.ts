import { SwarmlineError } from './swarmline.error';

export class DependencyCycleError extends SwarmlineError {
    readonly code = 'DEPENDENCY_CYCLE';

    constructor(public readonly cycle: string[]) {
        super(`Dependency cycle: ${cycle.join(' -> ')}`);
    }
}
