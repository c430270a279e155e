import { SwarmlineError } from './swarmline.error';

export class ConfigError extends SwarmlineError {
    readonly code = 'CONFIG';
}
