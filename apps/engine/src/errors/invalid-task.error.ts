import { SwarmlineError } from './swarmline.error';

export class InvalidTaskDescriptionError extends SwarmlineError {
    readonly code = 'INVALID_TASK';
}
