export { SwarmlineError } from './swarmline.error';
export { DependencyCycleError } from './dependency-cycle.error';
export { UnknownDependencyError } from './unknown-dependency.error';
export { InvalidTaskDescriptionError } from './invalid-task.error';
export { InvalidTransitionError } from './invalid-transition.error';
export { TaskNotFoundError } from './task-not-found.error';
export { WorkerCrashError } from './worker-crash.error';
export { TaskRetryExhaustedError } from './task-retry-exhausted.error';
export { ScaleLimitExceededError } from './scale-limit-exceeded.error';
export { WorkerNotFoundError } from './worker-not-found.error';
export { ConfigError } from './config.error';
